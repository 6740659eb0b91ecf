import type { FailurePolicy } from './failure-policy'

/** Why a step did not run. */
export type SkipReason =
  | 'condition-error'
  | 'prior-failure'
  | 'condition'
  | 'cancelled'
  | 'platform'

/** Final state of a single step. */
export interface StepResult {
  /** Final state. */
  status: 'succeeded' | 'skipped' | 'failed'

  /** Failure policy the step ran under. */
  policy: FailurePolicy

  /** Set when the step was skipped. */
  skipReason?: SkipReason

  /** Failure message reported by the action. */
  error?: string

  /** Interpolated display name. */
  name: string

  /** Step identifier. */
  id: string
}
