import type { MatrixCombination } from './matrix-combination'

/** One combination produced by matrix resolution. */
export interface ResolvedJob {
  /**
   * Dimension values plus merged include fields. Dimensions a synthesized
   * include did not name are absent.
   */
  matrix: MatrixCombination

  /** True when the job was created by an include rule that matched nothing. */
  synthesized: boolean

  /** Position in the resolved order, starting at 0. */
  index: number
}
