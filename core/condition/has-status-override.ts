import { stripExpressionWrapper } from './strip-expression-wrapper'
import { callsStatusFunction } from './evaluate-expression'
import { parseExpression } from './parse-expression'

/**
 * Checks whether a condition opts out of the implicit `success()` guard by
 * calling a status function such as `always()` or `failure()`.
 *
 * @param condition - Expression from the step's `if` key.
 * @returns True when the condition calls a status function.
 * @throws {ConditionEvaluationError} When the expression is malformed.
 */
export function hasStatusOverride(condition: undefined | string): boolean {
  if (condition === undefined) {
    return false
  }
  let expression = stripExpressionWrapper(condition)
  return expression !== '' && callsStatusFunction(parseExpression(expression))
}
