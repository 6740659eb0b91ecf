import type { ExpressionContext } from '../../types/expression-context'
import type { MatrixCombination } from '../../types/matrix-combination'

/**
 * Builds the context a job starts with: no step outcomes yet and a
 * successful job status.
 *
 * @param options - Context values.
 * @param options.matrix - Matrix values of the job.
 * @param options.env - Environment variables.
 * @param options.runnerOs - Runner OS name.
 * @returns Fresh expression context.
 */
export function createExpressionContext(options: {
  matrix: MatrixCombination
  env?: Record<string, string>
  runnerOs?: string
}): ExpressionContext {
  return {
    runner: { os: options.runnerOs ?? '' },
    matrix: { ...options.matrix },
    env: { ...options.env },
    job: { status: 'success' },
    steps: {},
  }
}
