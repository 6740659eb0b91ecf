import pc from 'picocolors'

import type { PipelineResult } from '../types/pipeline-result'
import type { JobStatus } from '../types/job-outcome'

import { formatStepResult } from './format-step-result'

const STATUS_ICONS: Record<JobStatus, string> = {
  succeeded: pc.green('✓'),
  cancelled: pc.gray('⊘'),
  failed: pc.redBright('✗'),
}

/**
 * Prints the per-job step log and a summary line.
 *
 * @param title - Pipeline name shown above the jobs.
 * @param result - Pipeline result.
 * @param verbose - Also print diagnostics.
 */
export function printPipelineReport(
  title: string,
  result: PipelineResult,
  verbose: boolean,
): void {
  console.info(pc.cyan(`\n${title}`))

  for (let job of result.jobs) {
    console.info(`${STATUS_ICONS[job.status]} ${job.name}`)
    for (let step of job.steps) {
      console.info(`   ${formatStepResult(step)}`)
    }
    if (job.stoppedAt !== undefined) {
      console.info(pc.redBright(`   stopped at step "${job.stoppedAt}"`))
    }
  }

  for (let job of result.unplannable) {
    console.info(
      `${pc.yellow('⚠')} ${job.name} ${pc.yellow(`(not planned: ${job.reason})`)}`,
    )
  }

  let count = (status: JobStatus): number =>
    result.jobs.filter(job => job.status === status).length

  let summary = [
    `${count('succeeded')} succeeded`,
    `${count('failed')} failed`,
    `${count('cancelled')} cancelled`,
    `${result.unplannable.length} not planned`,
  ].join(', ')

  console.info(
    result.status === 'success'
      ? pc.green(`\n✨ ${summary}\n`)
      : pc.redBright(`\n💥 ${summary}\n`),
  )

  if (verbose && result.diagnostics.length > 0) {
    console.info(pc.gray('Diagnostics:'))
    for (let diagnostic of result.diagnostics) {
      let scope = [diagnostic.job, diagnostic.step].filter(Boolean).join(' › ')
      console.info(
        pc.gray(
          `   • [${diagnostic.kind}] ${scope ? `${scope}: ` : ''}${diagnostic.message}`,
        ),
      )
    }
  }
}
