import type { StepResult } from './step-result'
import type { Diagnostic } from './diagnostic'

/** Terminal state of a job. */
export type JobStatus = 'cancelled' | 'succeeded' | 'failed'

/** Aggregate result of running one job. */
export interface JobOutcome {
  /** Problems found while evaluating step conditions. */
  diagnostics: Diagnostic[]

  /** Step results in declared order. */
  steps: StepResult[]

  /** Identifier of the fatal step that stopped the job. */
  stoppedAt?: string

  /** Terminal state. */
  status: JobStatus

  /** Display name of the job. */
  name: string

  /** Position in the resolved order. */
  index: number
}
