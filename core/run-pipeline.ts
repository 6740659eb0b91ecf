import type { PipelineDefinition } from '../types/pipeline-definition'
import type { PipelineResult } from '../types/pipeline-result'
import type { ResolvedJob } from '../types/resolved-job'
import type { PlanJobsOptions } from './planner/plan-jobs'
import type { RunJobsOptions } from './executor/run-jobs'

import { findUnresolvableReferences } from './matrix/find-unresolvable-references'
import { resolveMatrix } from './matrix/resolve-matrix'
import { runJobs } from './executor/run-jobs'
import { planJobs } from './planner/plan-jobs'

/** Options for running a pipeline. */
export interface RunPipelineOptions extends PlanJobsOptions, RunJobsOptions {}

/**
 * Resolves the matrix combinations of a pipeline.
 *
 * A pipeline without dimensions and includes runs once with an empty matrix.
 *
 * @param pipeline - Pipeline definition.
 * @returns Resolved jobs.
 */
export function resolvePipelineJobs(pipeline: PipelineDefinition): ResolvedJob[] {
  let { dimensions, exclude, include } = pipeline.strategy
  return resolveMatrix(dimensions, exclude, include)
}

/**
 * Resolves, plans and executes a pipeline.
 *
 * `failFast` and `maxParallel` default to the pipeline's strategy. The result
 * is `success` when no job failed or was cancelled; unplannable combinations
 * are reported as diagnostics without failing the pipeline.
 *
 * @param pipeline - Pipeline definition.
 * @param options - Runner, overrides and hooks.
 * @returns Aggregate result.
 */
export async function runPipeline(
  pipeline: PipelineDefinition,
  options: RunPipelineOptions,
): Promise<PipelineResult> {
  let plan = planJobs(pipeline, resolvePipelineJobs(pipeline), options)

  let outcomes = await runJobs(plan.jobs, {
    ...options,
    maxParallel: options.maxParallel ?? pipeline.strategy.maxParallel,
    failFast: options.failFast ?? pipeline.strategy.failFast,
  })

  return {
    diagnostics: [
      ...findUnresolvableReferences(pipeline.strategy),
      ...plan.diagnostics,
      ...outcomes.flatMap(outcome => outcome.diagnostics),
    ],
    status: outcomes.every(outcome => outcome.status === 'succeeded')
      ? 'success'
      : 'failure',
    unplannable: plan.unplannable,
    jobs: outcomes,
  }
}
