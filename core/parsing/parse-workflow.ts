import type { PipelineDefinition } from '../../types/pipeline-definition'

import { isWorkflowStructure } from '../schema/workflow/is-workflow-structure'
import { PipelineConfigError } from '../errors/pipeline-config-error'
import { isWorkflowJob } from '../schema/workflow/is-workflow-job'
import { parseMatrixStrategy } from './parse-matrix-strategy'
import { parseWorkflowStep } from './parse-workflow-step'
import { toStringRecord } from './to-string-record'

/**
 * Turns a parsed workflow into one pipeline per job.
 *
 * Workflow-level `env` is merged under each job's `env`. Triggers and other
 * top-level keys are ignored.
 *
 * @param workflow - Workflow as plain data (e.g., `document.toJSON()`).
 * @returns Pipelines in the order the jobs are declared.
 * @throws {PipelineConfigError} When the workflow is malformed.
 */
export function parseWorkflow(workflow: unknown): PipelineDefinition[] {
  if (!isWorkflowStructure(workflow)) {
    throw new PipelineConfigError('workflow must contain a "jobs" map')
  }

  let workflowEnv = toStringRecord(workflow.env, 'env')
  let pipelines: PipelineDefinition[] = []

  for (let [id, job] of Object.entries(workflow.jobs ?? {})) {
    let path = `jobs.${id}`

    if (!isWorkflowJob(job)) {
      throw new PipelineConfigError(
        'a job must define "runs-on" and a "steps" list',
        path,
      )
    }

    let runsOn = job['runs-on']
    let label = Array.isArray(runsOn) ? runsOn[0] : runsOn
    if (typeof label !== 'string' || label.trim() === '') {
      throw new PipelineConfigError('expected a runner label', `${path}.runs-on`)
    }

    let steps = (job.steps ?? []).map((step, index) =>
      parseWorkflowStep(step, index, `${path}.steps[${index}]`),
    )

    let seen = new Set<string>()
    for (let step of steps) {
      if (seen.has(step.id)) {
        throw new PipelineConfigError(`duplicate step id "${step.id}"`, path)
      }
      seen.add(step.id)
    }

    let pipeline: PipelineDefinition = {
      env: { ...workflowEnv, ...toStringRecord(job.env, `${path}.env`) },
      strategy: parseMatrixStrategy(job.strategy, `${path}.strategy`),
      name: typeof job.name === 'string' ? job.name : id,
      runsOn: label.trim(),
      steps,
      id,
    }

    let shell = job.defaults?.run?.shell
    if (typeof shell === 'string') {
      pipeline.shell = shell
    }

    pipelines.push(pipeline)
  }

  if (pipelines.length === 0) {
    throw new PipelineConfigError('workflow defines no jobs', 'jobs')
  }

  return pipelines
}
