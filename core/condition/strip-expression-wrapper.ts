/**
 * Removes a `${{ }}` wrapper around a whole expression.
 *
 * @param expression - Raw expression as written in the workflow.
 * @returns Inner expression, or the trimmed input when it is not wrapped.
 */
export function stripExpressionWrapper(expression: string): string {
  let trimmed = expression.trim()
  let match = /^\$\{\{(?<inner>.*)\}\}$/su.exec(trimmed)
  let inner = match?.groups?.['inner']
  if (inner === undefined || inner.includes('${{')) {
    return trimmed
  }
  return inner.trim()
}
