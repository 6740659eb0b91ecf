import type { MatrixCombination } from '../../types/matrix-combination'
import type { WorkflowStrategy } from '../../types/workflow-job'
import type { MatrixStrategy } from '../../types/matrix-strategy'
import type { MatrixValue } from '../../types/matrix-value'

import { isMatrixCombination } from '../schema/matrix/is-matrix-combination'
import { PipelineConfigError } from '../errors/pipeline-config-error'
import { isMatrixValue } from '../schema/matrix/is-matrix-value'
import { RESERVED_MATRIX_KEYS } from '../constants'

/**
 * Reads a job's `strategy` block.
 *
 * Dimension values must be unique scalars. Include and exclude entries must be
 * maps of scalars; whether their values exist in a dimension is not checked
 * here.
 *
 * @param strategy - Raw strategy block, if any.
 * @param path - Location used in error messages.
 * @returns Normalized strategy.
 * @throws {PipelineConfigError} When the block is malformed.
 */
export function parseMatrixStrategy(
  strategy: WorkflowStrategy | undefined,
  path: string,
): MatrixStrategy {
  let result: MatrixStrategy = {
    maxParallel: null,
    failFast: true,
    dimensions: [],
    exclude: [],
    include: [],
  }

  if (strategy === undefined || strategy === null) {
    return result
  }
  if (typeof strategy !== 'object' || Array.isArray(strategy)) {
    throw new PipelineConfigError('expected a map', path)
  }

  let failFast = strategy['fail-fast']
  if (failFast !== undefined) {
    if (typeof failFast !== 'boolean') {
      throw new PipelineConfigError('expected a boolean', `${path}.fail-fast`)
    }
    result.failFast = failFast
  }

  let maxParallel = strategy['max-parallel']
  if (maxParallel !== undefined) {
    if (
      typeof maxParallel !== 'number' ||
      !Number.isInteger(maxParallel) ||
      maxParallel < 1
    ) {
      throw new PipelineConfigError(
        'expected a positive integer',
        `${path}.max-parallel`,
      )
    }
    result.maxParallel = maxParallel
  }

  let { matrix } = strategy
  if (matrix === undefined) {
    return result
  }
  if (matrix === null || typeof matrix !== 'object' || Array.isArray(matrix)) {
    throw new PipelineConfigError('expected a map', `${path}.matrix`)
  }

  for (let [name, values] of Object.entries(matrix)) {
    let location = `${path}.matrix.${name}`

    if (RESERVED_MATRIX_KEYS.has(name)) {
      let rules = parseRules(values, location)
      if (name === 'include') {
        result.include = rules
      } else {
        result.exclude = rules
      }
      continue
    }

    if (!Array.isArray(values) || values.length === 0) {
      throw new PipelineConfigError('expected a non-empty list', location)
    }

    let declared: unknown[] = values
    let seen = new Set<MatrixValue>()
    for (let value of declared) {
      if (!isMatrixValue(value)) {
        throw new PipelineConfigError('expected scalar values', location)
      }
      if (seen.has(value)) {
        throw new PipelineConfigError(
          `duplicate value ${JSON.stringify(value)}`,
          location,
        )
      }
      seen.add(value)
    }

    result.dimensions.push({ values: [...seen], name })
  }

  return result
}

/**
 * Reads an `include` or `exclude` list.
 *
 * @param value - Raw list.
 * @param path - Location used in error messages.
 * @returns Rules in declaration order.
 */
function parseRules(value: unknown, path: string): MatrixCombination[] {
  if (value === null || value === undefined) {
    return []
  }
  if (!Array.isArray(value)) {
    throw new PipelineConfigError('expected a list', path)
  }

  let rules: unknown[] = value
  return rules.map((rule, index) => {
    if (!isMatrixCombination(rule)) {
      throw new PipelineConfigError(
        'expected a map of scalar values',
        `${path}[${index}]`,
      )
    }
    return { ...rule }
  })
}
