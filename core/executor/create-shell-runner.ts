import { mkdtemp, writeFile, rm } from 'node:fs/promises'
import { spawn } from 'node:child_process'
import { tmpdir } from 'node:os'
import { resolve, join } from 'node:path'

import type { ActionRunner, ActionResult } from '../../types/action-runner'
import type { ExpressionContext } from '../../types/expression-context'
import type { ExecutableStep } from '../../types/executable-step'
import type { ExecutableJob } from '../../types/executable-job'

import { parseActionReference } from '../parsing/parse-action-reference'
import { resolveShellCommand } from './resolve-shell-command'

/** Implementation of a `uses` action. */
export type ActionHandler = (
  inputs: Record<string, string>,
  step: ExecutableStep,
  job: ExecutableJob,
  context: ExpressionContext,
) => Promise<ActionResult> | ActionResult

/** Options for the shell runner. */
export interface ShellRunnerOptions {
  /** Handlers for `uses` actions keyed by action name without version. */
  actions?: Record<string, ActionHandler>

  /** Where step output goes; inherits the parent's stdio when omitted. */
  onOutput?(chunk: string, step: ExecutableStep, job: ExecutableJob): void

  /** Base environment; defaults to the current process environment. */
  env?: NodeJS.ProcessEnv

  /** Working directory for scripts without `working-directory`. */
  cwd: string
}

/**
 * Creates a runner that executes `run` scripts in a local shell and resolves
 * `uses` actions through a handler table.
 *
 * Each script is written to a temporary file and passed to the shell; a
 * non-zero exit code fails the step. Actions without a handler fail.
 *
 * @param options - Runner options.
 * @returns Action runner.
 */
export function createShellRunner(options: ShellRunnerOptions): ActionRunner {
  let { actions = {}, onOutput, cwd } = options

  return {
    async run(step, job, context) {
      if (step.uses !== undefined) {
        let reference = parseActionReference(step.uses)
        let handler = reference ? actions[reference.name] : undefined
        if (!handler) {
          return {
            message: `no handler registered for action "${step.uses}"`,
            success: false,
          }
        }
        return handler(step.with, step, job, context)
      }

      let directory = await mkdtemp(join(tmpdir(), 'matrix-runner-'))
      let scriptPath = join(directory, 'script')

      try {
        await writeFile(scriptPath, step.run ?? '', 'utf8')
        let { command, args } = resolveShellCommand(
          step.shell ?? job.shell,
          scriptPath,
        )

        return await new Promise<ActionResult>(resolvePromise => {
          let child = spawn(command, args, {
            env: {
              ...(options.env ?? process.env),
              ...job.env,
              ...step.env,
            },
            stdio: onOutput ? ['ignore', 'pipe', 'pipe'] : 'inherit',
            cwd: step.workingDirectory
              ? resolve(cwd, step.workingDirectory)
              : cwd,
          })

          let forward = (chunk: Buffer): void => {
            onOutput?.(chunk.toString('utf8'), step, job)
          }
          child.stdout?.on('data', forward)
          child.stderr?.on('data', forward)

          child.on('error', error => {
            resolvePromise({ message: error.message, success: false })
          })
          child.on('close', code => {
            resolvePromise(
              code === 0
                ? { success: true }
                : {
                    message: `process exited with code ${code ?? 'null'}`,
                    success: false,
                  },
            )
          })
        })
      } finally {
        await rm(directory, { recursive: true, force: true })
      }
    },
  }
}
