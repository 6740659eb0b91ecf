import { describe, expect, it } from 'vitest'

import { createExpressionContext } from '../../core/condition/create-expression-context'
import { resolveFailurePolicy } from '../../core/planner/resolve-failure-policy'

let context = createExpressionContext({
  matrix: { experimental: true, stable: false },
})

describe('resolveFailurePolicy', () => {
  it('maps booleans', () => {
    expect(resolveFailurePolicy(true, context)).toBe('tolerant')
    expect(resolveFailurePolicy(false, context)).toBe('fatal')
  })

  it('evaluates expressions against the matrix', () => {
    expect(resolveFailurePolicy('${{ matrix.experimental }}', context)).toBe(
      'tolerant',
    )
    expect(resolveFailurePolicy('matrix.stable', context)).toBe('fatal')
    expect(resolveFailurePolicy('${{ matrix.missing }}', context)).toBe(
      'fatal',
    )
    expect(resolveFailurePolicy('', context)).toBe('fatal')
  })

  it('throws for malformed expressions', () => {
    expect(() => resolveFailurePolicy('matrix.', context)).toThrowError(
      'Cannot evaluate "matrix.": expected property name at 7',
    )
  })
})
