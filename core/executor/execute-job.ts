import type { ExpressionContext, StepContext } from '../../types/expression-context'
import type { StepResult, SkipReason } from '../../types/step-result'
import type { ActionRunner, ActionResult } from '../../types/action-runner'
import type { ExecutableStep } from '../../types/executable-step'
import type { ExecutableJob } from '../../types/executable-job'
import type { JobOutcome } from '../../types/job-outcome'

import { createExpressionContext } from '../condition/create-expression-context'
import { ConditionEvaluationError } from '../errors/condition-evaluation-error'
import { hasStatusOverride } from '../condition/has-status-override'
import { evaluateCondition } from '../condition/evaluate-condition'
import { StepActionFailure } from '../errors/step-action-failure'
import { interpolateStep } from './interpolate-step'

/** Callbacks fired while a job runs. */
export interface JobHooks {
  /** Called after a step reaches its final state. */
  onStepFinish?(result: StepResult, job: ExecutableJob): void

  /** Called right before a step's action starts. */
  onStepStart?(step: ExecutableStep, job: ExecutableJob): void
}

/** Options for executing a job. */
export interface ExecuteJobOptions extends JobHooks {
  /** Cancellation request, checked before each step. */
  signal?: AbortSignal

  /** Collaborator that carries out step actions. */
  runner: ActionRunner
}

/**
 * Runs a job's steps one after another.
 *
 * Before each step the executor checks for cancellation, the platform guard
 * and the step condition. The script, inputs and environment of a step are
 * interpolated when it is reached; a malformed template fails the step.
 * After a fatal failure the job is marked failed and only steps whose
 * condition calls a status function (such as `always()`) still run. Tolerant
 * failures are recorded without affecting the job. Steps are never retried.
 *
 * @param job - Planned job.
 * @param options - Runner, cancellation signal and hooks.
 * @returns Outcome with one result per step, in declared order.
 */
export async function executeJob(
  job: ExecutableJob,
  options: ExecuteJobOptions,
): Promise<JobOutcome> {
  let context = createExpressionContext({
    runnerOs: job.runnerOs,
    matrix: job.matrix,
    env: job.env,
  })

  let outcome: JobOutcome = {
    status: 'succeeded',
    diagnostics: [],
    index: job.index,
    name: job.name,
    steps: [],
  }

  function finish(result: StepResult, recorded: StepContext): void {
    context.steps[result.id] = recorded
    outcome.steps.push(result)
    options.onStepFinish?.(result, job)
  }

  for (let step of job.steps) {
    if (options.signal?.aborted && context.job.status === 'success') {
      context.job.status = 'cancelled'
    }

    let base = { policy: step.policy, name: step.name, id: step.id }

    if (step.platforms && !step.platforms.includes(job.platform)) {
      finish(skipped(base, 'platform'), skippedContext)
      continue
    }

    let shouldRun: boolean
    try {
      shouldRun = evaluateCondition(step.condition, context)
    } catch (error) {
      if (!(error instanceof ConditionEvaluationError)) {
        throw error
      }
      outcome.diagnostics.push({
        kind: 'ConditionEvaluationError',
        message: error.message,
        step: step.id,
        job: job.name,
      })
      finish(skipped(base, 'condition-error'), skippedContext)
      continue
    }

    if (!shouldRun) {
      finish(skipped(base, skipReason(step, context)), skippedContext)
      continue
    }

    let result: ActionResult
    try {
      let prepared = interpolateStep(step, context)
      options.onStepStart?.(prepared, job)
      result = await runAction(options.runner, prepared, job, context)
    } catch (error) {
      if (!(error instanceof ConditionEvaluationError)) {
        throw error
      }
      outcome.diagnostics.push({
        kind: 'ConditionEvaluationError',
        message: error.message,
        step: step.id,
        job: job.name,
      })
      result = { message: error.message, success: false }
    }

    if (result.success) {
      finish(
        { ...base, status: 'succeeded' },
        { conclusion: 'success', outcome: 'success' },
      )
      continue
    }

    let failure = new StepActionFailure(
      step.id,
      result.message ?? 'step failed',
    )

    if (step.policy === 'fatal') {
      if (outcome.status !== 'failed') {
        outcome.status = 'failed'
        outcome.stoppedAt = step.id
      }
      context.job.status = 'failure'
    }

    finish(
      { ...base, error: failure.message, status: 'failed' },
      {
        conclusion: step.policy === 'tolerant' ? 'success' : 'failure',
        outcome: 'failure',
      },
    )
  }

  if (context.job.status === 'cancelled' && outcome.status === 'succeeded') {
    outcome.status = 'cancelled'
  }

  return outcome
}

const skippedContext: StepContext = {
  conclusion: 'skipped',
  outcome: 'skipped',
}

/**
 * Builds the result of a step that did not run.
 *
 * @param base - Identity and policy of the step.
 * @param base.policy - Failure policy.
 * @param base.name - Display name.
 * @param base.id - Step identifier.
 * @param reason - Why the step was skipped.
 * @returns Skipped step result.
 */
function skipped(
  base: Pick<StepResult, 'policy' | 'name' | 'id'>,
  reason: SkipReason,
): StepResult {
  return { ...base, skipReason: reason, status: 'skipped' }
}

/**
 * Explains a false condition: the implicit guard after a failure or a
 * cancellation, or the step's own expression.
 *
 * @param step - Skipped step.
 * @param context - Current job context.
 * @returns Skip reason.
 */
function skipReason(
  step: ExecutableStep,
  context: ExpressionContext,
): SkipReason {
  if (context.job.status === 'success' || hasStatusOverride(step.condition)) {
    return 'condition'
  }
  return context.job.status === 'failure' ? 'prior-failure' : 'cancelled'
}

/**
 * Runs a step's action, turning a rejection into a failed result.
 *
 * @param runner - Action runner.
 * @param step - Step to run.
 * @param job - Job the step belongs to.
 * @param context - Current job context.
 * @returns Action result.
 */
async function runAction(
  runner: ActionRunner,
  step: ExecutableStep,
  job: ExecutableJob,
  context: ExpressionContext,
): Promise<ActionResult> {
  try {
    return await runner.run(step, job, structuredClone(context))
  } catch (error) {
    return {
      message: error instanceof Error ? error.message : String(error),
      success: false,
    }
  }
}
