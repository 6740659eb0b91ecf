import type { ActionRunner } from '../../types/action-runner'
import type { ExecutableStep } from '../../types/executable-step'
import type { ExecutableJob } from '../../types/executable-job'

/**
 * Creates a runner that reports every step as successful without running
 * anything.
 *
 * @param onStep - Called for each step that would run.
 * @returns Action runner.
 */
export function createDryRunner(
  onStep?: (step: ExecutableStep, job: ExecutableJob) => void,
): ActionRunner {
  return {
    run(step, job) {
      onStep?.(step, job)
      return Promise.resolve({ success: true })
    },
  }
}
