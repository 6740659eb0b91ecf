/**
 * Normalizes the --fail-fast option.
 *
 * @param value - Raw option value.
 * @returns Parsed flag, or undefined to keep the workflow's setting.
 */
export function normalizeFailFast(
  value: undefined | boolean | string,
): boolean | undefined {
  if (value === undefined || typeof value === 'boolean') {
    return value
  }
  let normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === 'on') {
    return true
  }
  if (normalized === 'false' || normalized === 'off') {
    return false
  }
  throw new Error(
    `Invalid --fail-fast value "${value}". Expected "true" or "false".`,
  )
}
