import type { MatrixStrategy } from '../../types/matrix-strategy'
import type { Diagnostic } from '../../types/diagnostic'

/**
 * Lists exclude and include entries that name a dimension value nobody
 * declared.
 *
 * Resolution ignores such references, so these diagnostics are informational.
 * Exclude keys that are not dimensions are reported as well, since they make
 * the rule match nothing.
 *
 * @param strategy - Matrix strategy to inspect.
 * @returns One diagnostic per unknown reference.
 */
export function findUnresolvableReferences(
  strategy: MatrixStrategy,
): Diagnostic[] {
  let declared = new Map(
    strategy.dimensions.map(dimension => [
      dimension.name,
      new Set(dimension.values),
    ]),
  )

  let diagnostics: Diagnostic[] = []

  for (let [index, rule] of strategy.exclude.entries()) {
    for (let [key, value] of Object.entries(rule)) {
      let values = declared.get(key)
      if (!values) {
        diagnostics.push({
          message: `exclude[${index}] names unknown dimension "${key}"`,
          kind: 'UnresolvableDimensionValue',
        })
      } else if (!values.has(value)) {
        diagnostics.push({
          message: `exclude[${index}] names undeclared value ${JSON.stringify(value)} for "${key}"`,
          kind: 'UnresolvableDimensionValue',
        })
      }
    }
  }

  for (let [index, rule] of strategy.include.entries()) {
    for (let [key, value] of Object.entries(rule)) {
      let values = declared.get(key)
      if (values && !values.has(value)) {
        diagnostics.push({
          message: `include[${index}] names undeclared value ${JSON.stringify(value)} for "${key}"`,
          kind: 'UnresolvableDimensionValue',
        })
      }
    }
  }

  return diagnostics
}
