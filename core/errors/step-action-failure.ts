/** Failure reported by an action, recorded on the step that ran it. */
export class StepActionFailure extends Error {
  /**
   * Creates a new StepActionFailure.
   *
   * @param stepId - Identifier of the failed step.
   * @param message - Failure details.
   */
  public constructor(
    public readonly stepId: string,
    message: string,
  ) {
    super(message)
    this.name = 'StepActionFailure'
  }
}
