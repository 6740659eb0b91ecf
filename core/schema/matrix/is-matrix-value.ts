import type { MatrixValue } from '../../../types/matrix-value'

/**
 * Type guard to check if a value can be used as a matrix value.
 *
 * @param value - The value to check.
 * @returns True for strings, finite numbers and booleans.
 */
export function isMatrixValue(value: unknown): value is MatrixValue {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  )
}
