import type { MatrixCombination } from './matrix-combination'

/** Resolved combination that could not be bound to a runner. */
export interface UnplannableJob {
  /** Matrix values of the combination. */
  matrix: MatrixCombination

  /** Why planning failed. */
  reason: string

  /** Display name. */
  name: string

  /** Position in the resolved order. */
  index: number
}
