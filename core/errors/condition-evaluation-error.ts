/** Error raised for a malformed or unsupported expression. */
export class ConditionEvaluationError extends Error {
  /**
   * Creates a new ConditionEvaluationError.
   *
   * @param expression - Expression that failed.
   * @param reason - What went wrong.
   */
  public constructor(
    public readonly expression: string,
    reason: string,
  ) {
    super(`Cannot evaluate "${expression}": ${reason}`)
    this.name = 'ConditionEvaluationError'
  }
}
