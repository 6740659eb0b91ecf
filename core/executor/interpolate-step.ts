import type { ExpressionContext } from '../../types/expression-context'
import type { ExecutableStep } from '../../types/executable-step'

import { interpolateTemplate } from '../condition/interpolate-template'
import { interpolateRecord } from '../condition/interpolate-record'

/**
 * Fills in the templates of a step's script, inputs and environment right
 * before it runs, so that `steps.<id>` and `job.status` reflect the steps
 * already finished.
 *
 * Step environment values see the job environment; the script and inputs see
 * both.
 *
 * @param step - Planned step with its templates still in place.
 * @param context - Live job context.
 * @returns Step ready for the action runner.
 * @throws {ConditionEvaluationError} When an embedded expression is malformed.
 */
export function interpolateStep(
  step: ExecutableStep,
  context: ExpressionContext,
): ExecutableStep {
  let env = interpolateRecord(step.env, context)
  let stepContext: ExpressionContext = {
    ...context,
    env: { ...context.env, ...env },
  }

  let prepared: ExecutableStep = {
    ...step,
    with: interpolateRecord(step.with, stepContext),
    env,
  }
  if (step.run !== undefined) {
    prepared.run = interpolateTemplate(step.run, stepContext)
  }
  return prepared
}
