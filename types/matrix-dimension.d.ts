import type { MatrixValue } from './matrix-value'

/** Named axis of variation in a build matrix. */
export interface MatrixDimension {
  /** Ordered, unique permissible values. */
  values: MatrixValue[]

  /** Dimension key as written in the workflow (e.g., 'os-type'). */
  name: string
}
