import type { MatrixCombination } from './matrix-combination'

/** Recorded outcome of a completed step, as seen by later expressions. */
export interface StepContext {
  /** Result after `continue-on-error` is applied. */
  conclusion: 'success' | 'failure' | 'skipped'

  /** Result before `continue-on-error` is applied. */
  outcome: 'success' | 'failure' | 'skipped'
}

/** Values available to condition and template expressions. */
export interface ExpressionContext {
  /** Runner information. */
  runner: {
    /** Runner OS name ('Linux', 'macOS' or 'Windows'). */
    os: string
  }

  /** Job status as returned by the status functions. */
  job: {
    status: 'cancelled' | 'success' | 'failure'
  }

  /** Outcomes of earlier steps keyed by step id. */
  steps: Record<string, StepContext>

  /** Environment variables. */
  env: Record<string, string>

  /** Matrix values of the current job. */
  matrix: MatrixCombination
}
