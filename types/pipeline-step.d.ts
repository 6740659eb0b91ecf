import type { Platform } from './platform'

/** Step of a pipeline job as declared, before matrix interpolation. */
export interface PipelineStep {
  /**
   * Raw `continue-on-error` value: a boolean or an expression evaluated
   * against the matrix when the job is planned.
   */
  continueOnError: boolean | string

  /** Platforms the step is limited to, null for every platform. */
  platforms: Platform[] | null

  /** Inputs passed to a `uses` action. */
  with: Record<string, string>

  /** Step-level environment variables. */
  env: Record<string, string>

  /** Working directory for `run` scripts. */
  workingDirectory?: string

  /** Condition expression from the `if` key. */
  condition?: string

  /** Action reference (e.g., 'actions/checkout@v4'). */
  uses?: string

  /** Shell override for `run` scripts. */
  shell?: string

  /** Shell script to execute. */
  run?: string

  /** Display name, possibly containing `${{ }}` templates. */
  name: string

  /** Step identifier, generated from the position when not declared. */
  id: string
}
