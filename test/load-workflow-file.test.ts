import { fileURLToPath } from 'node:url'
import { describe, expect, it } from 'vitest'

import { PipelineConfigError } from '../core/errors/pipeline-config-error'
import { loadWorkflowFile } from '../core/load-workflow-file'

function fixture(name: string): string {
  return fileURLToPath(new URL(`fixtures/workflows/${name}`, import.meta.url))
}

describe('loadWorkflowFile', () => {
  it('loads every job of a workflow', async () => {
    let pipelines = await loadWorkflowFile(fixture('library-tests.yml'))

    expect(pipelines.map(pipeline => pipeline.id)).toEqual(['test', 'lint'])

    let [test] = pipelines
    expect(test?.runsOn).toBe('${{ matrix.os-type }}-${{ matrix.os-ver }}')
    expect(test?.shell).toBe('bash --noprofile --norc -exo pipefail {0}')
    expect(test?.env).toEqual({ PIP_DISABLE_PIP_VERSION_CHECK: '1' })
    expect(test?.strategy.failFast).toBeFalsy()
    expect(test?.strategy.dimensions).toEqual([
      { values: ['ubuntu', 'macos', 'windows'], name: 'os-type' },
      {
        values: ['3.9', '3.10', '3.11', '3.12', '3.13'],
        name: 'python-version',
      },
    ])
    expect(test?.strategy.include).toEqual([
      { 'os-ver': 'latest' },
      { 'python-version': '3.9', 'os-type': 'ubuntu', 'os-ver': '22.04' },
      { experimental: false },
    ])
    expect(test?.steps.map(step => step.id)).toEqual([
      'step-1',
      'step-2',
      'step-3',
      'types',
      'pytest',
      'step-6',
      'step-7',
    ])
    expect(test?.steps[2]).toEqual({
      condition: "matrix.os-type == 'windows'",
      name: 'Show shell candidates (Windows)',
      continueOnError: true,
      run: 'where bash',
      platforms: null,
      id: 'step-3',
      with: {},
      env: {},
    })
    expect(test?.steps[6]?.platforms).toEqual(['linux'])
  })

  it('reports YAML syntax errors with the file path', async () => {
    let path = fixture('broken.yml')
    let error: unknown = await loadWorkflowFile(path).catch(
      (caught: unknown) => caught,
    )

    expect(error).toBeInstanceOf(PipelineConfigError)
    expect(error instanceof Error && error.message.startsWith(`${path}: `)).toBe(
      true,
    )
  })

  it('rejects duplicate dimension values', async () => {
    await expect(
      loadWorkflowFile(fixture('duplicate-dimension.yml')),
    ).rejects.toThrowError(
      'jobs.test.strategy.matrix.python: duplicate value "3.12"',
    )
  })

  it('propagates read errors', async () => {
    await expect(loadWorkflowFile(fixture('missing.yml'))).rejects.toThrowError(
      'ENOENT',
    )
  })
})
