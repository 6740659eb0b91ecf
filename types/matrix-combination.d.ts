import type { MatrixValue } from './matrix-value'

/**
 * Assignment of matrix keys to values. Used for cross-product candidates,
 * exclude rules, include rules and the final `matrix` context of a job.
 */
export type MatrixCombination = Record<string, MatrixValue>
