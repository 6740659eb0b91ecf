import type { MatrixCombination } from './matrix-combination'
import type { MatrixDimension } from './matrix-dimension'

/** Matrix strategy declared for a single workflow job. */
export interface MatrixStrategy {
  /** Include rules in declaration order. */
  include: MatrixCombination[]

  /** Exclude rules in declaration order. */
  exclude: MatrixCombination[]

  /** Dimensions in declaration order. */
  dimensions: MatrixDimension[]

  /** Upper bound on concurrently running jobs, null when unbounded. */
  maxParallel: number | null

  /** Cancel the remaining jobs once one of them fails. */
  failFast: boolean
}
