import type { MatrixCombination } from '../../types/matrix-combination'

/**
 * Checks whether a rule matches a combination on the keys it names.
 *
 * Keys the rule does not name are wildcards. A key the combination lacks
 * never matches.
 *
 * @param combination - Candidate combination.
 * @param rule - Partial assignment.
 * @param keys - Keys to compare; defaults to every key of the rule.
 * @returns True when every compared key holds the same value.
 */
export function matchesRule(
  combination: MatrixCombination,
  rule: MatrixCombination,
  keys: string[] = Object.keys(rule),
): boolean {
  return keys.every(
    key => Object.hasOwn(combination, key) && combination[key] === rule[key],
  )
}
