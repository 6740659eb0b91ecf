import type { UnplannableJob } from './unplannable-job'
import type { JobOutcome } from './job-outcome'
import type { Diagnostic } from './diagnostic'

/** Aggregate result of a pipeline run. */
export interface PipelineResult {
  /** Combinations that were excluded from execution. */
  unplannable: UnplannableJob[]

  /** Diagnostics from every stage. */
  diagnostics: Diagnostic[]

  /** `success` iff no job failed or was cancelled. */
  status: 'success' | 'failure'

  /** Job outcomes in resolved order. */
  jobs: JobOutcome[]
}
