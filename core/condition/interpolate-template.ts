import type { ExpressionContext } from '../../types/expression-context'

import { evaluateExpression } from './evaluate-expression'
import { parseExpression } from './parse-expression'
import { stringifyValue } from './coerce-value'

/**
 * Replaces every `${{ expression }}` segment of a string with its value.
 *
 * @example
 *   interpolateTemplate('Set up ${{ matrix.version }}', context)
 *   // => 'Set up 3.12'
 *
 * @param template - Text with embedded expressions.
 * @param context - Values visible to the expressions.
 * @returns Interpolated text.
 * @throws {ConditionEvaluationError} When an embedded expression is malformed.
 */
export function interpolateTemplate(
  template: string,
  context: ExpressionContext,
): string {
  return template.replaceAll(
    /\$\{\{(?<expression>.*?)\}\}/gsu,
    (_match, expression: string) => {
      let source = expression.trim()
      return stringifyValue(
        evaluateExpression(parseExpression(source), context, source),
      )
    },
  )
}
