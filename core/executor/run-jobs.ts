import type { ExecutableJob } from '../../types/executable-job'
import type { JobOutcome } from '../../types/job-outcome'
import type { ExecuteJobOptions } from './execute-job'

import { executeJob } from './execute-job'

/** Options for running a set of jobs. */
export interface RunJobsOptions extends ExecuteJobOptions {
  /** Called when a job reaches its final state. */
  onJobFinish?(outcome: JobOutcome, job: ExecutableJob): void

  /** Called when a job starts. */
  onJobStart?(job: ExecutableJob): void

  /**
   * Maximum number of jobs running at once; unbounded when null or not a
   * positive integer.
   */
  maxParallel?: number | null

  /** Cancel the remaining jobs once one fails. */
  failFast?: boolean
}

/**
 * Runs independent jobs with bounded parallelism.
 *
 * Cancellation, either from `signal` or from fail-fast after a failed job, is
 * cooperative: jobs that have not started finish as cancelled with every step
 * skipped, and running jobs stop scheduling steps at the next step boundary.
 *
 * @param jobs - Planned jobs.
 * @param options - Runner, limits and hooks.
 * @returns Outcomes in the order of `jobs`.
 */
export async function runJobs(
  jobs: ExecutableJob[],
  options: RunJobsOptions,
): Promise<JobOutcome[]> {
  let { maxParallel, failFast = true, signal, ...rest } = options

  let controller = new AbortController()
  let forwardAbort = (): void => controller.abort()
  if (signal?.aborted) {
    controller.abort()
  } else {
    signal?.addEventListener('abort', forwardAbort, { once: true })
  }

  let outcomes: JobOutcome[] = new Array<JobOutcome>(jobs.length)
  let next = 0

  async function worker(): Promise<void> {
    while (next < jobs.length) {
      let position = next++
      let job = jobs[position]
      if (!job) {
        continue
      }

      if (controller.signal.aborted) {
        let cancelled = createCancelledOutcome(job)
        outcomes[position] = cancelled
        rest.onJobFinish?.(cancelled, job)
        continue
      }

      rest.onJobStart?.(job)
      let outcome = await executeJob(job, {
        ...rest,
        signal: controller.signal,
      })
      outcomes[position] = outcome
      rest.onJobFinish?.(outcome, job)

      if (failFast && outcome.status === 'failed') {
        controller.abort()
      }
    }
  }

  let limit =
    typeof maxParallel === 'number' &&
    Number.isInteger(maxParallel) &&
    maxParallel >= 1
      ? Math.min(maxParallel, jobs.length)
      : jobs.length

  try {
    await Promise.all(
      Array.from({ length: Math.max(limit, 1) }, () => worker()),
    )
  } finally {
    signal?.removeEventListener('abort', forwardAbort)
  }

  return outcomes
}

/**
 * Builds the outcome of a job that was cancelled before it started.
 *
 * @param job - Job that never ran.
 * @returns Cancelled outcome with every step skipped.
 */
export function createCancelledOutcome(job: ExecutableJob): JobOutcome {
  return {
    steps: job.steps.map(step => ({
      skipReason: 'cancelled',
      policy: step.policy,
      status: 'skipped',
      name: step.name,
      id: step.id,
    })),
    status: 'cancelled',
    diagnostics: [],
    index: job.index,
    name: job.name,
  }
}
