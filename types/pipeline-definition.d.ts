import type { MatrixStrategy } from './matrix-strategy'
import type { PipelineStep } from './pipeline-step'

/** Workflow job turned into a pipeline the runner can resolve and execute. */
export interface PipelineDefinition {
  /** Job-level environment variables merged over the workflow ones. */
  env: Record<string, string>

  /** Matrix strategy, with no dimensions when the job declares none. */
  strategy: MatrixStrategy

  /** Ordered steps. */
  steps: PipelineStep[]

  /** Runner label template (e.g., '${{ matrix.os-type }}-latest'). */
  runsOn: string

  /** Default shell for `run` steps. */
  shell?: string

  /** Display name. */
  name: string

  /** Job key in the workflow file. */
  id: string
}
