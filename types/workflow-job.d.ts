import type { WorkflowStep } from './workflow-step'

/** Matrix strategy block of a workflow job. */
export interface WorkflowStrategy {
  /** Dimensions plus the reserved `include` and `exclude` lists. */
  matrix?: Record<string, unknown>

  /** Maximum number of jobs running at the same time. */
  'max-parallel'?: number

  /** Cancel the other jobs when one fails (default: true). */
  'fail-fast'?: boolean
}

/** Represents a job in a workflow. */
export interface WorkflowJob {
  /** Defaults applied to every `run` step. */
  defaults?: { run?: { shell?: string } }

  /** Runner label, possibly templated with matrix values. */
  'runs-on'?: string[] | string

  /** Job-level environment variables. */
  env?: Record<string, unknown>

  /** Matrix strategy. */
  strategy?: WorkflowStrategy

  /** Array of steps to execute in this job. */
  steps?: WorkflowStep[]

  /** Allow additional properties for job configuration. */
  [key: string]: unknown

  /** Display name. */
  name?: string
}
