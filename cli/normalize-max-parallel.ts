/**
 * Normalizes the --max-parallel option.
 *
 * @param value - Raw option value.
 * @returns Positive integer, or undefined to keep the workflow's setting.
 */
export function normalizeMaxParallel(
  value: undefined | string | number,
): number | undefined {
  if (value === undefined) {
    return undefined
  }
  let parsed = typeof value === 'number' ? value : Number(value.trim())
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(
      `Invalid --max-parallel value "${value}". Expected a positive integer.`,
    )
  }
  return parsed
}
