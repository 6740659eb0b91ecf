import type { ActionReference } from '../../types/action-reference'

/**
 * Parses a step's `uses` string into a structured reference.
 *
 * @example
 *
 * ```ts
 * const action = parseActionReference('actions/setup-python@v5')
 * // Returns:
 * // {
 * //   name: 'actions/setup-python',
 * //   type: 'external',
 * //   version: 'v5',
 * // }
 * ```
 *
 * @param reference - The action reference string to parse. Can be:
 *
 *   - External action: "owner/repo@version" or "owner/repo/path@version"
 *   - Local action: "./path/to/action" or "../path/to/action"
 *   - Docker action: "docker://image:tag".
 *
 * @returns Parsed reference, or null when the string is not a valid reference.
 */
export function parseActionReference(
  reference: string,
): ActionReference | null {
  let trimmed = reference.trim()
  if (trimmed === '') {
    return null
  }

  if (trimmed.startsWith('docker://')) {
    return { name: trimmed, type: 'docker', version: null }
  }

  if (trimmed.startsWith('./') || trimmed.startsWith('../')) {
    return { name: trimmed, type: 'local', version: null }
  }

  let parts = trimmed.split('@')
  if (parts.length !== 2) {
    return null
  }

  let [namePart, version] = parts
  if (!namePart || !version) {
    return null
  }

  /**
   * Validate owner/repo(/path...) format.
   */
  let segs = namePart.split('/')
  if (segs.length < 2 || segs.some(seg => !seg)) {
    return null
  }

  return { type: 'external', name: namePart, version }
}
