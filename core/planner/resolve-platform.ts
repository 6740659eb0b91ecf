import type { Platform } from '../../types/platform'

import { RUNNER_PLATFORMS } from '../constants'

/**
 * Finds the host platform behind a runner label.
 *
 * Labels declared in `runners` win. Otherwise the part before the first dash
 * is looked up, so 'ubuntu-22.04' and 'ubuntu-latest' both map to linux.
 *
 * @param label - Interpolated runner label.
 * @param runners - Extra label to platform mappings.
 * @returns Platform, or null when the label is unknown.
 */
export function resolvePlatform(
  label: string,
  runners: Record<string, Platform> = {},
): Platform | null {
  let normalized = label.trim().toLowerCase()
  let table = { ...RUNNER_PLATFORMS, ...lowerKeys(runners) }

  let exact = table[normalized]
  if (exact) {
    return exact
  }

  let [prefix = ''] = normalized.split('-')
  return table[prefix] ?? null
}

/**
 * Lower-cases the keys of a label table.
 *
 * @param runners - Label table.
 * @returns Copy with lower-case keys.
 */
function lowerKeys(
  runners: Record<string, Platform>,
): Record<string, Platform> {
  return Object.fromEntries(
    Object.entries(runners).map(([key, value]) => [key.toLowerCase(), value]),
  )
}
