import type { MatrixCombination } from './matrix-combination'
import type { ExecutableStep } from './executable-step'
import type { Platform } from './platform'

/** Resolved job bound to a runner and ready for execution. */
export interface ExecutableJob {
  /** Merged workflow and job environment. */
  env: Record<string, string>

  /** Matrix context for expressions. */
  matrix: MatrixCombination

  /** Steps in declared order. */
  steps: ExecutableStep[]

  /** Runner OS name as exposed to expressions (e.g., 'Linux'). */
  runnerOs: string

  /** Host platform of the runner. */
  platform: Platform

  /** Interpolated runner label (e.g., 'ubuntu-latest'). */
  runsOn: string

  /** Default shell for `run` steps. */
  shell?: string

  /** Display name (e.g., 'test (ubuntu, 3.12)'). */
  name: string

  /** Position in the resolved order. */
  index: number
}
