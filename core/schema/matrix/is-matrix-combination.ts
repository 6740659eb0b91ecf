import type { MatrixCombination } from '../../../types/matrix-combination'

import { isMatrixValue } from './is-matrix-value'

/**
 * Type guard to check if a value is a map of matrix keys to scalar values.
 *
 * @param value - The value to check.
 * @returns True if the value can be used as an include or exclude rule.
 */
export function isMatrixCombination(
  value: unknown,
): value is MatrixCombination {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }

  return Object.values(value).every(entry => isMatrixValue(entry))
}
