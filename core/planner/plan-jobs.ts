import type { PipelineDefinition } from '../../types/pipeline-definition'
import type { ExpressionContext } from '../../types/expression-context'
import type { UnplannableJob } from '../../types/unplannable-job'
import type { ExecutableStep } from '../../types/executable-step'
import type { ExecutableJob } from '../../types/executable-job'
import type { PipelineStep } from '../../types/pipeline-step'
import type { ResolvedJob } from '../../types/resolved-job'
import type { Diagnostic } from '../../types/diagnostic'
import type { Platform } from '../../types/platform'

import { ConditionEvaluationError } from '../errors/condition-evaluation-error'
import { collectMatrixReferences } from '../condition/collect-matrix-references'
import { createExpressionContext } from '../condition/create-expression-context'
import { interpolateTemplate } from '../condition/interpolate-template'
import { interpolateRecord } from '../condition/interpolate-record'
import { resolveFailurePolicy } from './resolve-failure-policy'
import { resolvePlatform } from './resolve-platform'
import { formatJobName } from './format-job-name'
import { RUNNER_OS_NAMES } from '../constants'

/** Options for job planning. */
export interface PlanJobsOptions {
  /** Extra runner label to platform mappings (e.g., self-hosted labels). */
  runners?: Record<string, Platform>
}

/** Result of planning a pipeline's resolved jobs. */
export interface PlanJobsResult {
  /** Combinations excluded from execution. */
  unplannable: UnplannableJob[]

  /** One `UnplannableJob` diagnostic per excluded combination. */
  diagnostics: Diagnostic[]

  /** Jobs ready to run, in resolved order. */
  jobs: ExecutableJob[]
}

/**
 * Binds resolved matrix combinations to runners.
 *
 * Each combination gets its runner label, platform and interpolated steps. A
 * combination whose label needs a matrix key it does not have, whose label
 * maps to no known platform, or whose templates cannot be evaluated is
 * reported as unplannable; the others are still planned.
 *
 * @param pipeline - Pipeline the jobs were resolved from.
 * @param resolved - Resolved matrix combinations. A pipeline without a matrix
 *   passes a single job with an empty matrix.
 * @param options - Planning options.
 * @returns Planned and unplannable jobs.
 */
export function planJobs(
  pipeline: PipelineDefinition,
  resolved: ResolvedJob[],
  options: PlanJobsOptions = {},
): PlanJobsResult {
  let result: PlanJobsResult = {
    unplannable: [],
    diagnostics: [],
    jobs: [],
  }

  for (let job of resolved) {
    let name = formatJobName(pipeline.name, job.matrix)
    let planned: ExecutableJob | string

    try {
      planned = planJob(pipeline, job, name, options)
    } catch (error) {
      if (!(error instanceof ConditionEvaluationError)) {
        throw error
      }
      planned = error.message
    }

    if (typeof planned === 'string') {
      result.unplannable.push({
        matrix: job.matrix,
        index: job.index,
        reason: planned,
        name,
      })
      result.diagnostics.push({
        kind: 'UnplannableJob',
        message: planned,
        job: name,
      })
    } else {
      result.jobs.push(planned)
    }
  }

  return result
}

/**
 * Plans a single combination.
 *
 * @param pipeline - Pipeline the job belongs to.
 * @param job - Resolved combination.
 * @param name - Display name.
 * @param options - Planning options.
 * @returns Planned job, or the reason it cannot be planned.
 */
function planJob(
  pipeline: PipelineDefinition,
  job: ResolvedJob,
  name: string,
  options: PlanJobsOptions,
): ExecutableJob | string {
  let missing = collectMatrixReferences(pipeline.runsOn).filter(
    key => !Object.hasOwn(job.matrix, key),
  )
  if (missing.length > 0) {
    let keys = missing.map(key => `matrix.${key}`).join(', ')
    return `runs-on "${pipeline.runsOn}" needs ${keys}, which this job does not define`
  }

  let context = createExpressionContext({ matrix: job.matrix })
  let label = interpolateTemplate(pipeline.runsOn, context).trim()
  let platform = resolvePlatform(label, options.runners)
  if (!platform) {
    return `cannot resolve a platform for runner "${label}"`
  }

  context.runner.os = RUNNER_OS_NAMES[platform]
  context.env = interpolateRecord(pipeline.env, context)

  let planned: ExecutableJob = {
    steps: pipeline.steps.map(step => planStep(step, context)),
    runnerOs: context.runner.os,
    index: job.index,
    matrix: job.matrix,
    env: context.env,
    runsOn: label,
    platform,
    name,
  }
  if (pipeline.shell !== undefined) {
    planned.shell = pipeline.shell
  }
  return planned
}

/**
 * Interpolates a step's display name and resolves its failure policy.
 *
 * The `if` condition, script, inputs and environment are left as written;
 * they depend on earlier steps and are evaluated when the step is reached.
 *
 * @param step - Declared step.
 * @param context - Context of the job being planned.
 * @returns Executable step.
 */
function planStep(
  step: PipelineStep,
  context: ExpressionContext,
): ExecutableStep {
  let { continueOnError, ...rest } = step
  let stepContext: ExpressionContext = {
    ...context,
    env: { ...context.env, ...step.env },
  }

  return {
    ...rest,
    policy: resolveFailurePolicy(continueOnError, stepContext),
    name: interpolateTemplate(step.name, stepContext),
  }
}
