import type { ExpressionContext } from './expression-context'
import type { ExecutableStep } from './executable-step'
import type { ExecutableJob } from './executable-job'

/** Result reported by an action. */
export interface ActionResult {
  /** Failure details when `success` is false. */
  message?: string

  /** Whether the action succeeded. */
  success: boolean
}

/** External collaborator that carries out a step's action. */
export interface ActionRunner {
  /**
   * Runs a step. Rejections are treated as failures.
   *
   * @param step - Step to run.
   * @param job - Job the step belongs to.
   * @param context - Expression context at the moment the step starts.
   */
  run(
    step: ExecutableStep,
    job: ExecutableJob,
    context: ExpressionContext,
  ): Promise<ActionResult>
}
