import type { Platform } from '../types/platform'

import { RUNNER_OS_NAMES } from '../core/constants'

/**
 * Parses --runner options of the form `label=platform`.
 *
 * @example
 *   parseRunnerLabels(['self-hosted=linux', 'mac-mini=macos'])
 *   // => { 'self-hosted': 'linux', 'mac-mini': 'macos' }
 *
 * @param values - Raw option values (repeatable, comma-separated allowed).
 * @returns Label to platform table.
 */
export function parseRunnerLabels(
  values: undefined | string[] | string,
): Record<string, Platform> {
  let raw: string[] = []
  if (Array.isArray(values)) {
    raw.push(...values)
  } else if (typeof values === 'string') {
    raw.push(values)
  }

  let runners: Record<string, Platform> = {}
  for (let entry of raw.flatMap(item => item.split(','))) {
    let trimmed = entry.trim()
    if (!trimmed) {
      continue
    }

    let separator = trimmed.indexOf('=')
    let label = trimmed.slice(0, separator).trim()
    let platform = trimmed.slice(separator + 1).trim().toLowerCase()
    if (separator <= 0 || !label || !isPlatform(platform)) {
      throw new Error(
        `Invalid --runner value "${entry}". Expected "label=linux|macos|windows".`,
      )
    }
    runners[label] = platform
  }

  return runners
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
