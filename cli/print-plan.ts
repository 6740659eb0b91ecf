import pc from 'picocolors'

import type { PipelineDefinition } from '../types/pipeline-definition'
import type { PlanJobsResult } from '../core/planner/plan-jobs'

/**
 * Prints the jobs a pipeline would run, without running them.
 *
 * @param pipeline - Pipeline definition.
 * @param plan - Planning result.
 */
export function printPlan(
  pipeline: PipelineDefinition,
  plan: PlanJobsResult,
): void {
  let pluralRules = new Intl.PluralRules('en-US', { type: 'cardinal' })
  let noun = pluralRules.select(plan.jobs.length) === 'one' ? 'job' : 'jobs'

  console.info(
    pc.cyan(`\n${pipeline.name}: ${pc.yellow(plan.jobs.length)} ${noun}`),
  )
  for (let job of plan.jobs) {
    let runnable = job.steps.filter(
      step => !step.platforms || step.platforms.includes(job.platform),
    )
    console.info(
      `   • ${job.name} ${pc.gray(
        `on ${job.runsOn}, ${runnable.length}/${job.steps.length} steps`,
      )}`,
    )
  }
  for (let job of plan.unplannable) {
    console.info(
      `   ${pc.yellow('⚠')} ${job.name} ${pc.yellow(`(not planned: ${job.reason})`)}`,
    )
  }
}
