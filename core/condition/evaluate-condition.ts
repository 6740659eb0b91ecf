import type { ExpressionContext } from '../../types/expression-context'

import { evaluateExpression, callsStatusFunction } from './evaluate-expression'
import { stripExpressionWrapper } from './strip-expression-wrapper'
import { parseExpression } from './parse-expression'
import { isTruthy } from './coerce-value'

/**
 * Decides whether a step should run.
 *
 * A missing condition means `success()`. A condition that calls no status
 * function is guarded the same way, so after a fatal failure only steps that
 * ask for `always()`, `failure()` or `cancelled()` still run.
 *
 * @example
 *   evaluateCondition("matrix.os == 'windows'", context)
 *   evaluateCondition('${{ always() }}', context)
 *
 * @param condition - Expression from the step's `if` key.
 * @param context - Current job context.
 * @returns True when the step should run.
 * @throws {ConditionEvaluationError} When the expression is malformed.
 */
export function evaluateCondition(
  condition: undefined | string,
  context: ExpressionContext,
): boolean {
  let expression = condition === undefined ? '' : stripExpressionWrapper(condition)
  if (expression === '') {
    return context.job.status === 'success'
  }

  let tree = parseExpression(expression)
  if (!callsStatusFunction(tree) && context.job.status !== 'success') {
    return false
  }

  return isTruthy(evaluateExpression(tree, context, expression))
}
