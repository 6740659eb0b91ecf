import type { Mock } from 'vitest'

import { describe, expect, it, vi } from 'vitest'

import type { ExecutableStep } from '../../types/executable-step'
import type { ExecutableJob } from '../../types/executable-job'
import type { ActionRunner } from '../../types/action-runner'

import { executeJob } from '../../core/executor/execute-job'

function createStep(
  id: string,
  overrides: Partial<ExecutableStep> = {},
): ExecutableStep {
  return {
    run: `echo ${id}`,
    platforms: null,
    policy: 'fatal',
    name: id,
    with: {},
    env: {},
    id,
    ...overrides,
  }
}

function createJob(steps: ExecutableStep[]): ExecutableJob {
  return {
    matrix: { os: 'ubuntu-latest' },
    name: 'test (ubuntu-latest)',
    runsOn: 'ubuntu-latest',
    runnerOs: 'Linux',
    platform: 'linux',
    env: {},
    index: 0,
    steps,
  }
}

function createRunner(failing: string[] = []): {
  run: Mock<ActionRunner['run']>
} {
  return {
    run: vi.fn<ActionRunner['run']>(step =>
      Promise.resolve(
        failing.includes(step.id)
          ? { message: `${step.id} failed`, success: false }
          : { success: true },
      ),
    ),
  }
}

describe('executeJob', () => {
  it('runs steps in declared order', async () => {
    let runner = createRunner()
    let outcome = await executeJob(
      createJob([createStep('a'), createStep('b'), createStep('c')]),
      { runner },
    )

    expect(runner.run.mock.calls.map(([step]) => step.id)).toEqual([
      'a',
      'b',
      'c',
    ])
    expect(outcome).toEqual({
      steps: [
        { status: 'succeeded', policy: 'fatal', name: 'a', id: 'a' },
        { status: 'succeeded', policy: 'fatal', name: 'b', id: 'b' },
        { status: 'succeeded', policy: 'fatal', name: 'c', id: 'c' },
      ],
      name: 'test (ubuntu-latest)',
      status: 'succeeded',
      diagnostics: [],
      index: 0,
    })
  })

  it('skips later steps after a fatal failure', async () => {
    let runner = createRunner(['a'])
    let outcome = await executeJob(
      createJob([
        createStep('a'),
        createStep('b', { policy: 'tolerant' }),
        createStep('c'),
      ]),
      { runner },
    )

    expect(runner.run).toHaveBeenCalledOnce()
    expect(outcome.status).toBe('failed')
    expect(outcome.stoppedAt).toBe('a')
    expect(outcome.steps).toEqual([
      {
        error: 'a failed',
        status: 'failed',
        policy: 'fatal',
        name: 'a',
        id: 'a',
      },
      {
        skipReason: 'prior-failure',
        policy: 'tolerant',
        status: 'skipped',
        name: 'b',
        id: 'b',
      },
      {
        skipReason: 'prior-failure',
        status: 'skipped',
        policy: 'fatal',
        name: 'c',
        id: 'c',
      },
    ])
  })

  it('keeps going after a tolerant failure', async () => {
    let runner = createRunner(['a'])
    let outcome = await executeJob(
      createJob([
        createStep('a', { policy: 'tolerant' }),
        createStep('b', {
          condition:
            "steps.a.outcome == 'failure' && steps.a.conclusion == 'success'",
        }),
      ]),
      { runner },
    )

    expect(outcome.status).toBe('succeeded')
    expect(outcome.stoppedAt).toBeUndefined()
    expect(outcome.steps.map(step => step.status)).toEqual([
      'failed',
      'succeeded',
    ])
    expect(outcome.steps[0]?.policy).toBe('tolerant')
  })

  it('runs status overrides after a fatal failure', async () => {
    let runner = createRunner(['a', 'f'])
    let outcome = await executeJob(
      createJob([
        createStep('a'),
        createStep('b', { condition: 'always()' }),
        createStep('c', { condition: '${{ failure() }}' }),
        createStep('d', { condition: 'success()' }),
        createStep('e'),
        createStep('f', { condition: 'always()' }),
      ]),
      { runner },
    )

    expect(outcome.steps.map(step => [step.id, step.status])).toEqual([
      ['a', 'failed'],
      ['b', 'succeeded'],
      ['c', 'succeeded'],
      ['d', 'skipped'],
      ['e', 'skipped'],
      ['f', 'failed'],
    ])
    expect(outcome.steps[3]?.skipReason).toBe('condition')
    expect(outcome.steps[4]?.skipReason).toBe('prior-failure')
    expect(outcome.stoppedAt).toBe('a')
  })

  it('skips steps whose condition is false', async () => {
    let outcome = await executeJob(
      createJob([createStep('a', { condition: "matrix.os == 'windows'" })]),
      { runner: createRunner() },
    )
    expect(outcome.steps[0]?.skipReason).toBe('condition')
    expect(outcome.status).toBe('succeeded')
  })

  it('skips malformed conditions with a diagnostic', async () => {
    let outcome = await executeJob(
      createJob([createStep('a', { condition: 'matrix.os ==' }), createStep('b')]),
      { runner: createRunner() },
    )

    expect(outcome.steps.map(step => step.status)).toEqual([
      'skipped',
      'succeeded',
    ])
    expect(outcome.steps[0]?.skipReason).toBe('condition-error')
    expect(outcome.status).toBe('succeeded')
    expect(outcome.diagnostics).toEqual([
      {
        message: 'Cannot evaluate "matrix.os ==": unexpected end of expression',
        kind: 'ConditionEvaluationError',
        job: 'test (ubuntu-latest)',
        step: 'a',
      },
    ])
  })

  it('fills in step templates with the outcomes of earlier steps', async () => {
    let runner = createRunner()
    await executeJob(
      createJob([
        createStep('a', { run: 'true' }),
        createStep('b', { run: 'echo ${{ steps.a.outcome }}' }),
      ]),
      { runner },
    )

    expect(runner.run.mock.calls.map(([step]) => step.run)).toEqual([
      'true',
      'echo success',
    ])
  })

  it('sees tolerant failures in inputs and environment', async () => {
    let runner = createRunner(['a'])
    await executeJob(
      createJob([
        createStep('a', { policy: 'tolerant' }),
        createStep('b', {
          run: 'echo ${{ job.status }} $PREV',
          env: { PREV: '${{ steps.a.conclusion }}' },
          with: { status: '${{ steps.a.outcome }}' },
        }),
      ]),
      { runner },
    )

    let step = runner.run.mock.calls[1]?.[0]
    expect(step?.run).toBe('echo success $PREV')
    expect(step?.env).toEqual({ PREV: 'success' })
    expect(step?.with).toEqual({ status: 'failure' })
  })

  it('fails steps with malformed templates', async () => {
    let runner = createRunner()
    let outcome = await executeJob(
      createJob([createStep('a', { run: 'echo ${{ foo( }}' }), createStep('b')]),
      { runner },
    )

    expect(runner.run).not.toHaveBeenCalled()
    expect(outcome.status).toBe('failed')
    expect(outcome.stoppedAt).toBe('a')
    expect(outcome.steps[0]?.error).toBe(
      'Cannot evaluate "foo(": unexpected end of expression',
    )
    expect(outcome.steps[1]?.skipReason).toBe('prior-failure')
    expect(outcome.diagnostics).toEqual([
      {
        message: 'Cannot evaluate "foo(": unexpected end of expression',
        kind: 'ConditionEvaluationError',
        job: 'test (ubuntu-latest)',
        step: 'a',
      },
    ])
  })

  it('skips steps limited to other platforms', async () => {
    let runner = createRunner()
    let outcome = await executeJob(
      createJob([createStep('a', { platforms: ['windows', 'macos'] })]),
      { runner },
    )
    expect(outcome.steps[0]?.skipReason).toBe('platform')
    expect(runner.run).not.toHaveBeenCalled()
  })

  it('only runs cancel-aware steps once cancelled', async () => {
    let controller = new AbortController()
    controller.abort()
    let runner = createRunner()

    let outcome = await executeJob(
      createJob([
        createStep('a'),
        createStep('b', { condition: 'always()' }),
        createStep('c', { condition: 'cancelled()' }),
      ]),
      { signal: controller.signal, runner },
    )

    expect(outcome.status).toBe('cancelled')
    expect(outcome.steps.map(step => step.status)).toEqual([
      'skipped',
      'succeeded',
      'succeeded',
    ])
    expect(outcome.steps[0]?.skipReason).toBe('cancelled')
  })

  it('stops at the next step when cancelled while running', async () => {
    let controller = new AbortController()
    let runner: ActionRunner = {
      run: () => {
        controller.abort()
        return Promise.resolve({ success: true })
      },
    }

    let outcome = await executeJob(
      createJob([createStep('a'), createStep('b')]),
      { signal: controller.signal, runner },
    )

    expect(outcome.status).toBe('cancelled')
    expect(outcome.steps.map(step => step.skipReason)).toEqual([
      undefined,
      'cancelled',
    ])
  })

  it('treats rejected actions as failures', async () => {
    let runner: ActionRunner = {
      run: step =>
        step.id === 'a'
          ? Promise.reject(new Error('spawn bash ENOENT'))
          : Promise.resolve({ success: false }),
    }

    let outcome = await executeJob(
      createJob([
        createStep('a', { policy: 'tolerant' }),
        createStep('b', { policy: 'tolerant' }),
      ]),
      { runner },
    )

    expect(outcome.steps.map(step => step.error)).toEqual([
      'spawn bash ENOENT',
      'step failed',
    ])
  })

  it('passes the job and a snapshot of the context to the runner', async () => {
    let runner = createRunner()
    let job = createJob([createStep('a'), createStep('b')])
    await executeJob(job, { runner })

    let call = runner.run.mock.calls[1]
    expect(call?.[1]).toBe(job)
    expect(call?.[2].steps).toEqual({
      a: { conclusion: 'success', outcome: 'success' },
    })
    expect(call?.[2].runner.os).toBe('Linux')
  })

  it('reports step progress', async () => {
    let onStepStart = vi.fn()
    let onStepFinish = vi.fn()
    await executeJob(
      createJob([
        createStep('a'),
        createStep('b', { platforms: ['windows'] }),
      ]),
      { runner: createRunner(), onStepFinish, onStepStart },
    )

    expect(onStepStart).toHaveBeenCalledOnce()
    expect(onStepFinish).toHaveBeenCalledTimes(2)
    expect(onStepFinish).toHaveBeenLastCalledWith(
      expect.objectContaining({ skipReason: 'platform', id: 'b' }),
      expect.objectContaining({ name: 'test (ubuntu-latest)' }),
    )
  })
})
