import type { MatrixCombination } from '../../types/matrix-combination'
import type { MatrixDimension } from '../../types/matrix-dimension'
import type { ResolvedJob } from '../../types/resolved-job'

import { expandCrossProduct } from './expand-cross-product'
import { matchesRule } from './matches-rule'

/**
 * Resolves a build matrix into the ordered list of jobs to run.
 *
 * Exclude rules are applied to the cross-product first. Include rules then run
 * in declaration order: a rule is compared with each surviving cross-product
 * combination on the dimension keys it names, and its remaining fields are
 * merged into every match. A rule that matches nothing is appended as a job of
 * its own. Values that no dimension declares simply never match.
 *
 * A matrix with neither dimensions nor include rules resolves to a single job
 * with an empty assignment. Include rules alone resolve to one job per rule.
 *
 * @example
 *   resolveMatrix(
 *     [
 *       { name: 'os', values: ['A', 'B'] },
 *       { name: 'ver', values: [1, 2] },
 *     ],
 *     [{ os: 'B', ver: 1 }],
 *     [],
 *   )
 *   // => A1, A2, B2
 *
 * @param dimensions - Declared dimensions.
 * @param excludes - Exclude rules.
 * @param includes - Include rules.
 * @returns Resolved jobs.
 */
export function resolveMatrix(
  dimensions: MatrixDimension[],
  excludes: MatrixCombination[],
  includes: MatrixCombination[],
): ResolvedJob[] {
  let dimensionNames = new Set(dimensions.map(dimension => dimension.name))

  let candidates: MatrixCombination[] =
    dimensions.length === 0 && includes.length === 0
      ? [{}]
      : expandCrossProduct(dimensions)

  let survivors = candidates.filter(
    combination => !excludes.some(rule => matchesRule(combination, rule)),
  )
  let synthesized: MatrixCombination[] = []

  for (let rule of includes) {
    let keys = Object.keys(rule).filter(key => dimensionNames.has(key))
    let extras = Object.fromEntries(
      Object.entries(rule).filter(([key]) => !dimensionNames.has(key)),
    )

    let matched = false
    for (let combination of survivors) {
      if (matchesRule(combination, rule, keys)) {
        matched = true
        Object.assign(combination, extras)
      }
    }

    if (!matched) {
      synthesized.push({ ...rule })
    }
  }

  return [
    ...survivors.map(matrix => ({ synthesized: false, matrix })),
    ...synthesized.map(matrix => ({ synthesized: true, matrix })),
  ].map((job, index) => ({ ...job, index }))
}
