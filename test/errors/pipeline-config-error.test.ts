import { describe, expect, it } from 'vitest'

import { PipelineConfigError } from '../../core/errors/pipeline-config-error'

describe('PipelineConfigError', () => {
  it('prefixes the message with the path', () => {
    let error = new PipelineConfigError('must be a map', 'jobs.test')

    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('PipelineConfigError')
    expect(error.message).toBe('jobs.test: must be a map')
    expect(error.path).toBe('jobs.test')
  })

  it('keeps the message as is without a path', () => {
    expect(new PipelineConfigError('no jobs').message).toBe('no jobs')
  })
})
