/** Non-fatal problem reported alongside a pipeline result. */
export interface Diagnostic {
  /** Kind of problem. */
  kind:
    | 'UnresolvableDimensionValue'
    | 'ConditionEvaluationError'
    | 'UnplannableJob'

  /** Display name of the affected job, when there is one. */
  job?: string

  /** Step identifier, for condition errors. */
  step?: string

  /** Human-readable description. */
  message: string
}
