/**
 * Scalar value allowed in a matrix dimension or an include rule field.
 */
export type MatrixValue = boolean | string | number
