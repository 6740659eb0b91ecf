import { createSpinner } from 'nanospinner'
import { resolve } from 'node:path'
import pc from 'picocolors'
import cac from 'cac'

import type { PipelineDefinition } from '../types/pipeline-definition'
import type { PipelineResult } from '../types/pipeline-result'

import {
  resolvePipelineJobs,
  createShellRunner,
  loadWorkflowFile,
  createDryRunner,
  runPipeline,
  planJobs,
} from '../core/index'
import { normalizeMaxParallel } from './normalize-max-parallel'
import { printPipelineReport } from './print-pipeline-report'
import { normalizeFailFast } from './normalize-fail-fast'
import { parseRunnerLabels } from './parse-runner-labels'
import { WORKFLOWS_DIRECTORY } from '../core/constants'
import { isYamlFile } from '../core/fs/is-yaml-file'
import { selectPipelines } from './select-pipelines'
import { version } from '../package.json'
import { printPlan } from './print-plan'

/** CLI Options. */
interface CLIOptions {
  /** Extra runner labels as `label=platform` (repeatable). */
  runner?: string[] | string

  /** Override the workflow's fail-fast setting. */
  failFast?: boolean | string

  /** Override the workflow's max-parallel setting. */
  maxParallel?: string | number

  /** Job ids or `/regex/` patterns to run (repeatable). */
  job?: string[] | string

  /** Print diagnostics and failed step output. */
  verbose: boolean

  /** Report every step as successful without executing it. */
  dryRun: boolean

  /** Print the result as JSON instead of the colored report. */
  json: boolean
}

/**
 * Loads the workflow and applies the --job filter.
 *
 * @param file - Workflow path from the command line.
 * @param options - CLI options.
 * @returns Selected pipelines.
 */
async function loadPipelines(
  file: undefined | string,
  options: CLIOptions,
): Promise<PipelineDefinition[]> {
  if (!file) {
    throw new Error(
      `Missing workflow file (e.g., ${WORKFLOWS_DIRECTORY}/ci.yml)`,
    )
  }
  if (!isYamlFile(file)) {
    throw new Error(`Not a YAML file: ${file}`)
  }

  let pipelines = selectPipelines(
    await loadWorkflowFile(resolve(process.cwd(), file)),
    options.job,
  )
  if (pipelines.length === 0) {
    throw new Error('No jobs match the --job filter')
  }
  return pipelines
}

/**
 * Prints an error and exits.
 *
 * @param error - Caught error.
 */
function fail(error: unknown): never {
  console.error(
    pc.redBright('\nError:'),
    error instanceof Error ? error.message : String(error),
  )
  process.exit(1)
}

/** Run the CLI. */
export function run(): void {
  let cli = cac('matrix-runner')

  cli
    .help()
    .version(version)
    .option('--job <pattern>', 'Run only matching job ids (repeatable)')
    .option('--runner <label=platform>', 'Map a runner label (repeatable)')
    .option('--fail-fast <boolean>', 'Override the workflow fail-fast setting')
    .option('--max-parallel <count>', 'Override the workflow max-parallel')
    .option('--verbose', 'Print diagnostics and output of failed steps')

  cli
    .command('plan [file]', 'Show the jobs a workflow resolves to')
    .action(async (file: undefined | string, options: CLIOptions) => {
      try {
        let runners = parseRunnerLabels(options.runner)
        for (let pipeline of await loadPipelines(file, options)) {
          printPlan(
            pipeline,
            planJobs(pipeline, resolvePipelineJobs(pipeline), { runners }),
          )
        }
        console.info('')
      } catch (error) {
        fail(error)
      }
    })

  cli
    .command('[file]', 'Run a workflow')
    .option('--dry-run', 'Report steps as successful without running them')
    .option('--json', 'Print the result as JSON')
    .action(async (file: undefined | string, options: CLIOptions) => {
      if (!options.json) {
        console.info(pc.cyan('\n🧮 Matrix Runner\n'))
      }

      let results: { pipeline: PipelineDefinition; result: PipelineResult }[] =
        []
      let output = new Map<string, string>()

      try {
        let pipelines = await loadPipelines(file, options)
        let runners = parseRunnerLabels(options.runner)
        let maxParallel = normalizeMaxParallel(options.maxParallel)
        let failFast = normalizeFailFast(options.failFast)

        let runner = options.dryRun
          ? createDryRunner()
          : createShellRunner({
              onOutput: (chunk, step, job) => {
                let key = `${job.name}\u0000${step.id}`
                output.set(key, (output.get(key) ?? '') + chunk)
              },
              cwd: process.cwd(),
            })

        for (let pipeline of pipelines) {
          let spinner = options.json
            ? null
            : createSpinner(`Running ${pipeline.name}...`).start()

          let result = await runPipeline(pipeline, {
            onStepStart: (step, job) => {
              spinner?.update({ text: `${job.name} › ${step.name}` })
            },
            maxParallel,
            runners,
            failFast,
            runner,
          })

          if (result.status === 'success') {
            spinner?.success(`${pipeline.name} passed`)
          } else {
            spinner?.error(`${pipeline.name} failed`)
          }

          results.push({ pipeline, result })
        }
      } catch (error) {
        fail(error)
      }

      if (options.json) {
        console.info(
          JSON.stringify(
            results.map(({ pipeline, result }) => ({ job: pipeline.id, ...result })),
            null,
            2,
          ),
        )
      } else {
        for (let { pipeline, result } of results) {
          printPipelineReport(pipeline.name, result, options.verbose)

          if (options.verbose) {
            for (let job of result.jobs) {
              for (let step of job.steps) {
                let log = output.get(`${job.name}\u0000${step.id}`)
                if (step.status === 'failed' && log) {
                  console.info(pc.gray(`── ${job.name} › ${step.name}`))
                  console.info(log.trimEnd())
                }
              }
            }
          }
        }
      }

      if (results.some(({ result }) => result.status === 'failure')) {
        process.exit(1)
      }
    })

  cli.parse()
}
