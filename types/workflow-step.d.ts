/** Represents a single step in a workflow job. */
export interface WorkflowStep {
  /** Keep going when the step fails; a boolean or an expression. */
  'continue-on-error'?: boolean | string

  /** Platforms the step is limited to ('linux', 'macos', 'windows'). */
  platform?: string[] | string

  /** Working directory for `run` scripts. */
  'working-directory'?: string

  /** Input parameters to pass to the action. */
  with?: Record<string, unknown>

  /** Environment variables to set for this step. */
  env?: Record<string, unknown>

  /** Allow additional properties for step configuration. */
  [key: string]: unknown

  /** Action to use for this step (e.g., 'actions/checkout@v4'). */
  uses?: string

  /** Display name for this step. */
  name?: string

  /** Shell used for `run`. */
  shell?: string

  /** Condition expression deciding whether the step runs. */
  if?: string

  /** Shell command to run for this step. */
  run?: string

  /** Identifier used to reference the step from expressions. */
  id?: string
}
