import type { FailurePolicy } from './failure-policy'
import type { PipelineStep } from './pipeline-step'

/** Step with its name and inputs interpolated for one matrix combination. */
export interface ExecutableStep extends Omit<PipelineStep, 'continueOnError'> {
  /** Failure policy resolved from `continue-on-error`. */
  policy: FailurePolicy
}
