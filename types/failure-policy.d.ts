/**
 * How a failing step affects its job: `fatal` stops the job, `tolerant`
 * records the failure and continues.
 */
export type FailurePolicy = 'tolerant' | 'fatal'
