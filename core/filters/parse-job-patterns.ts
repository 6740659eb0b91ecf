/**
 * Parse CLI --job patterns into regular expressions.
 *
 * Supports two forms:
 *
 * - Raw regex literal with optional flags: `/pattern/i`
 * - Plain job id, matched exactly and case-insensitively: `test`.
 *
 * Invalid patterns are skipped with a console warning.
 *
 * @param patterns - List of pattern strings provided via CLI.
 * @returns Array of RegExp objects.
 */
export function parseJobPatterns(patterns: string[]): RegExp[] {
  let result: RegExp[] = []

  for (let original of patterns) {
    let input = original.trim()
    if (!input) {
      continue
    }

    let lastSlash = input.lastIndexOf('/')
    let source =
      input.startsWith('/') && lastSlash > 0
        ? {
            flags: input.slice(lastSlash + 1) || 'i',
            body: input.slice(1, lastSlash),
          }
        : { body: `^${escapeRegExp(input)}$`, flags: 'i' }

    try {
      result.push(new RegExp(source.body, source.flags))
    } catch (error) {
      console.warn(`Invalid job pattern: ${original}`, error)
    }
  }

  return result
}

/**
 * Escapes characters with a special meaning in regular expressions.
 *
 * @param value - Literal text.
 * @returns Text safe to embed in a pattern.
 */
function escapeRegExp(value: string): string {
  return value.replaceAll(/[$()*+.?[\\\]^{|}]/gu, String.raw`\$&`)
}
