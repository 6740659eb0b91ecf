import { describe, expect, it } from 'vitest'

import { ConditionEvaluationError } from '../../core/errors/condition-evaluation-error'
import { StepActionFailure } from '../../core/errors/step-action-failure'

describe('ConditionEvaluationError', () => {
  it('names the failing expression', () => {
    let error = new ConditionEvaluationError('matrix.os ==', 'unexpected end')

    expect(error.name).toBe('ConditionEvaluationError')
    expect(error.expression).toBe('matrix.os ==')
    expect(error.message).toBe('Cannot evaluate "matrix.os ==": unexpected end')
  })
})

describe('StepActionFailure', () => {
  it('records the step identifier', () => {
    let error = new StepActionFailure('test', 'exit 1')

    expect(error.name).toBe('StepActionFailure')
    expect(error.stepId).toBe('test')
    expect(error.message).toBe('exit 1')
  })
})
