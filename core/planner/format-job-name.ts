import type { MatrixCombination } from '../../types/matrix-combination'

/**
 * Builds the display name of a matrix job: the job name followed by its
 * matrix values in parentheses.
 *
 * @example
 *   formatJobName('test', { os: 'ubuntu', version: '3.12' })
 *   // => 'test (ubuntu, 3.12)'
 *
 * @param name - Job name.
 * @param matrix - Matrix values.
 * @returns Display name.
 */
export function formatJobName(name: string, matrix: MatrixCombination): string {
  let values = Object.values(matrix)
  if (values.length === 0) {
    return name
  }
  return `${name} (${values.map(value => String(value)).join(', ')})`
}
