import type { MatrixCombination } from '../../types/matrix-combination'
import type { MatrixDimension } from '../../types/matrix-dimension'

/**
 * Expands dimensions into every combination of their values.
 *
 * Dimensions are walked in declaration order and the last one varies fastest,
 * so `{os: [A, B], ver: [1, 2]}` yields `A1, A2, B1, B2`. No dimensions yield
 * no combinations.
 *
 * @param dimensions - Declared dimensions.
 * @returns Combinations in enumeration order.
 */
export function expandCrossProduct(
  dimensions: MatrixDimension[],
): MatrixCombination[] {
  if (dimensions.length === 0) {
    return []
  }

  let combinations: MatrixCombination[] = [{}]
  for (let dimension of dimensions) {
    let next: MatrixCombination[] = []
    for (let combination of combinations) {
      for (let value of dimension.values) {
        next.push({ ...combination, [dimension.name]: value })
      }
    }
    combinations = next
  }

  return combinations
}
