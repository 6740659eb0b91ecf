import type { ExpressionContext } from '../../types/expression-context'
import type { FailurePolicy } from '../../types/failure-policy'

import { stripExpressionWrapper } from '../condition/strip-expression-wrapper'
import { evaluateExpression } from '../condition/evaluate-expression'
import { parseExpression } from '../condition/parse-expression'
import { isTruthy } from '../condition/coerce-value'

/**
 * Turns a step's `continue-on-error` value into a failure policy.
 *
 * Expressions such as `${{ matrix.experimental }}` are evaluated against the
 * job's matrix, so a single step can be tolerant on some jobs only.
 *
 * @param continueOnError - Raw value from the step.
 * @param context - Context of the job being planned.
 * @returns `tolerant` when the value is truthy, otherwise `fatal`.
 * @throws {ConditionEvaluationError} When the expression is malformed.
 */
export function resolveFailurePolicy(
  continueOnError: boolean | string,
  context: ExpressionContext,
): FailurePolicy {
  if (typeof continueOnError === 'boolean') {
    return continueOnError ? 'tolerant' : 'fatal'
  }

  let expression = stripExpressionWrapper(continueOnError)
  if (expression === '') {
    return 'fatal'
  }

  let value = evaluateExpression(
    parseExpression(expression),
    context,
    expression,
  )
  return isTruthy(value) ? 'tolerant' : 'fatal'
}
