import type { ExpressionContext } from '../../types/expression-context'

import { interpolateTemplate } from './interpolate-template'

/**
 * Interpolates every value of a string map.
 *
 * @param record - Map with template values.
 * @param context - Expression context.
 * @returns Map with interpolated values.
 * @throws {ConditionEvaluationError} When an embedded expression is malformed.
 */
export function interpolateRecord(
  record: Record<string, string>,
  context: ExpressionContext,
): Record<string, string> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [
      key,
      interpolateTemplate(value, context),
    ]),
  )
}
