import { PipelineConfigError } from '../errors/pipeline-config-error'

/**
 * Converts an `env` or `with` map into string values.
 *
 * Numbers and booleans are written the way YAML shows them. Nested maps and
 * lists are rejected.
 *
 * @param value - Raw map from the workflow.
 * @param path - Location used in error messages.
 * @returns Map of strings; empty when the value is undefined.
 * @throws {PipelineConfigError} When the value is not a flat map of scalars.
 */
export function toStringRecord(
  value: unknown,
  path: string,
): Record<string, string> {
  if (value === undefined || value === null) {
    return {}
  }
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new PipelineConfigError('expected a map', path)
  }

  let result: Record<string, string> = {}
  for (let [key, entry] of Object.entries(value)) {
    if (
      typeof entry === 'string' ||
      typeof entry === 'number' ||
      typeof entry === 'boolean'
    ) {
      result[key] = String(entry)
    } else if (entry === null) {
      result[key] = ''
    } else {
      throw new PipelineConfigError('expected a scalar value', `${path}.${key}`)
    }
  }
  return result
}
