import type { PipelineStep } from '../../types/pipeline-step'
import type { Platform } from '../../types/platform'

import { isWorkflowStep } from '../schema/workflow/is-workflow-step'
import { PipelineConfigError } from '../errors/pipeline-config-error'
import { parseActionReference } from './parse-action-reference'
import { RUNNER_OS_NAMES } from '../constants'
import { toStringRecord } from './to-string-record'

/**
 * Reads one entry of a job's `steps` list.
 *
 * @param value - Raw step.
 * @param index - Position in the list, used for the generated id.
 * @param path - Location used in error messages.
 * @returns Normalized step.
 * @throws {PipelineConfigError} When the step is malformed.
 */
export function parseWorkflowStep(
  value: unknown,
  index: number,
  path: string,
): PipelineStep {
  if (!isWorkflowStep(value)) {
    throw new PipelineConfigError('a step must define "run" or "uses"', path)
  }

  let run = readOptionalString(value.run, `${path}.run`)
  let uses = readOptionalString(value.uses, `${path}.uses`)?.trim()

  if (run !== undefined && uses !== undefined) {
    throw new PipelineConfigError(
      'a step cannot define both "run" and "uses"',
      path,
    )
  }

  if (uses !== undefined && !parseActionReference(uses)) {
    throw new PipelineConfigError(
      `invalid action reference "${uses}"`,
      `${path}.uses`,
    )
  }

  let continueOnError: unknown = value['continue-on-error'] ?? false
  if (typeof continueOnError !== 'boolean' && typeof continueOnError !== 'string') {
    throw new PipelineConfigError(
      'expected a boolean or an expression',
      `${path}.continue-on-error`,
    )
  }

  let step: PipelineStep = {
    name:
      readOptionalString(value.name, `${path}.name`) ?? defaultName(run, uses),
    id: readOptionalString(value.id, `${path}.id`) ?? `step-${index + 1}`,
    platforms: parsePlatforms(value.platform, `${path}.platform`),
    with: toStringRecord(value.with, `${path}.with`),
    env: toStringRecord(value.env, `${path}.env`),
    continueOnError,
  }

  let condition: unknown = value.if
  if (typeof condition === 'boolean' || typeof condition === 'number') {
    step.condition = String(condition)
  } else if (condition !== undefined && condition !== null) {
    step.condition = readOptionalString(condition, `${path}.if`)
  }

  if (run !== undefined) {
    step.run = run
  }
  if (uses !== undefined) {
    step.uses = uses
  }

  let shell = readOptionalString(value.shell, `${path}.shell`)
  if (shell !== undefined) {
    step.shell = shell
  }

  let workingDirectory = readOptionalString(
    value['working-directory'],
    `${path}.working-directory`,
  )
  if (workingDirectory !== undefined) {
    step.workingDirectory = workingDirectory
  }

  return step
}

/**
 * Builds the display name of an unnamed step.
 *
 * @param run - Shell script.
 * @param uses - Action reference.
 * @returns Action reference, or `Run` followed by the first script line.
 */
function defaultName(run: undefined | string, uses: undefined | string): string {
  if (uses !== undefined) {
    return uses
  }
  let firstLine = (run ?? '').trim().split('\n')[0] ?? ''
  return `Run ${firstLine}`
}

/**
 * Reads a value that must be a string when present.
 *
 * @param value - Raw value.
 * @param path - Location used in error messages.
 * @returns The string, or undefined when absent.
 */
function readOptionalString(value: unknown, path: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }
  if (typeof value !== 'string') {
    throw new PipelineConfigError('expected a string', path)
  }
  return value
}

/**
 * Reads the `platform` guard.
 *
 * @param value - A platform name or a list of them.
 * @param path - Location used in error messages.
 * @returns Platforms, or null when the step is not limited.
 */
function parsePlatforms(value: unknown, path: string): Platform[] | null {
  if (value === undefined || value === null) {
    return null
  }

  let entries: unknown[] = Array.isArray(value) ? value : [value]
  return entries.map(entry => {
    let name = typeof entry === 'string' ? entry.toLowerCase() : ''
    if (!isPlatform(name)) {
      throw new PipelineConfigError(
        `unknown platform ${JSON.stringify(entry)}`,
        path,
      )
    }
    return name
  })
}

/**
 * Type guard for platform names.
 *
 * @param name - Candidate name.
 * @returns True for 'linux', 'macos' and 'windows'.
 */
function isPlatform(name: string): name is Platform {
  return Object.hasOwn(RUNNER_OS_NAMES, name)
}
