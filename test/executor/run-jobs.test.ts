import { describe, expect, it, vi } from 'vitest'

import type { ExecutableJob } from '../../types/executable-job'
import type { ActionRunner } from '../../types/action-runner'

import { createCancelledOutcome, runJobs } from '../../core/executor/run-jobs'

function createJob(index: number, stepIds: string[] = ['build']): ExecutableJob {
  return {
    steps: stepIds.map(id => ({
      policy: 'fatal',
      platforms: null,
      run: 'make',
      name: id,
      with: {},
      env: {},
      id,
    })),
    name: `test (${index})`,
    runsOn: 'ubuntu-latest',
    matrix: { shard: index },
    runnerOs: 'Linux',
    platform: 'linux',
    env: {},
    index,
  }
}

function failingJob(...indices: number[]): ActionRunner {
  return {
    run: (_step, job) =>
      Promise.resolve(
        indices.includes(job.index)
          ? { message: 'exit 1', success: false }
          : { success: true },
      ),
  }
}

function delay(): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, 5)
  })
}

describe('runJobs', () => {
  it('returns outcomes in job order', async () => {
    let outcomes = await runJobs([createJob(0), createJob(1), createJob(2)], {
      runner: failingJob(),
    })
    expect(outcomes.map(outcome => [outcome.index, outcome.status])).toEqual([
      [0, 'succeeded'],
      [1, 'succeeded'],
      [2, 'succeeded'],
    ])
  })

  it('cancels pending jobs after a failure', async () => {
    let runner = failingJob(0)
    let run = vi.spyOn(runner, 'run')

    let outcomes = await runJobs([createJob(0), createJob(1), createJob(2)], {
      maxParallel: 1,
      runner,
    })

    expect(run).toHaveBeenCalledOnce()
    expect(outcomes.map(outcome => outcome.status)).toEqual([
      'failed',
      'cancelled',
      'cancelled',
    ])
    expect(outcomes[1]?.steps).toEqual([
      {
        skipReason: 'cancelled',
        status: 'skipped',
        policy: 'fatal',
        name: 'build',
        id: 'build',
      },
    ])
  })

  it('runs every job without fail-fast', async () => {
    let outcomes = await runJobs([createJob(0), createJob(1), createJob(2)], {
      runner: failingJob(0),
      failFast: false,
      maxParallel: 1,
    })
    expect(outcomes.map(outcome => outcome.status)).toEqual([
      'failed',
      'succeeded',
      'succeeded',
    ])
  })

  it('stops running jobs at the next step boundary', async () => {
    let runner: ActionRunner = {
      run: async (_step, job) => {
        if (job.index === 0) {
          return { message: 'exit 1', success: false }
        }
        await delay()
        return { success: true }
      },
    }

    let outcomes = await runJobs(
      [createJob(0), createJob(1, ['build', 'test'])],
      { runner },
    )

    expect(outcomes[0]?.status).toBe('failed')
    expect(outcomes[1]?.status).toBe('cancelled')
    expect(outcomes[1]?.steps.map(step => step.status)).toEqual([
      'succeeded',
      'skipped',
    ])
  })

  it('limits the number of jobs running at once', async () => {
    let active = 0
    let peak = 0
    let runner: ActionRunner = {
      run: async () => {
        active++
        peak = Math.max(peak, active)
        await delay()
        active--
        return { success: true }
      },
    }

    await runJobs([0, 1, 2, 3].map(index => createJob(index)), {
      maxParallel: 2,
      runner,
    })
    expect(peak).toBe(2)
  })

  it('runs every job at once by default', async () => {
    let active = 0
    let peak = 0
    let runner: ActionRunner = {
      run: async () => {
        active++
        peak = Math.max(peak, active)
        await delay()
        active--
        return { success: true }
      },
    }

    await runJobs([0, 1, 2].map(index => createJob(index)), { runner })
    expect(peak).toBe(3)
  })

  it.each([Number.NaN, 0, -1, 1.5])(
    'runs every job when max-parallel is %s',
    async maxParallel => {
      let runner = failingJob(0)
      let run = vi.spyOn(runner, 'run')

      let outcomes = await runJobs([createJob(0), createJob(1)], {
        failFast: false,
        maxParallel,
        runner,
      })

      expect(run).toHaveBeenCalledTimes(2)
      expect(outcomes.map(outcome => outcome.status)).toEqual([
        'failed',
        'succeeded',
      ])
    },
  )

  it('cancels everything when the signal is already aborted', async () => {
    let controller = new AbortController()
    controller.abort()
    let runner = failingJob()
    let run = vi.spyOn(runner, 'run')

    let outcomes = await runJobs([createJob(0), createJob(1)], {
      signal: controller.signal,
      runner,
    })

    expect(run).not.toHaveBeenCalled()
    expect(outcomes.map(outcome => outcome.status)).toEqual([
      'cancelled',
      'cancelled',
    ])
  })

  it('reports job progress', async () => {
    let onJobStart = vi.fn()
    let onJobFinish = vi.fn()

    await runJobs([createJob(0), createJob(1)], {
      runner: failingJob(0),
      maxParallel: 1,
      onJobFinish,
      onJobStart,
    })

    expect(onJobStart).toHaveBeenCalledOnce()
    expect(onJobFinish).toHaveBeenCalledTimes(2)
    expect(onJobFinish).toHaveBeenLastCalledWith(
      expect.objectContaining({ status: 'cancelled', index: 1 }),
      expect.objectContaining({ index: 1 }),
    )
  })

  it('handles an empty job list', async () => {
    await expect(runJobs([], { runner: failingJob() })).resolves.toEqual([])
  })
})

describe('createCancelledOutcome', () => {
  it('skips every step', () => {
    expect(createCancelledOutcome(createJob(4, ['a', 'b']))).toEqual({
      steps: [
        {
          skipReason: 'cancelled',
          status: 'skipped',
          policy: 'fatal',
          name: 'a',
          id: 'a',
        },
        {
          skipReason: 'cancelled',
          status: 'skipped',
          policy: 'fatal',
          name: 'b',
          id: 'b',
        },
      ],
      status: 'cancelled',
      name: 'test (4)',
      diagnostics: [],
      index: 4,
    })
  })
})
