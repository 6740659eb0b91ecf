/** Error raised when a workflow file cannot be turned into pipelines. */
export class PipelineConfigError extends Error {
  /**
   * Creates a new PipelineConfigError.
   *
   * @param message - What is wrong with the workflow.
   * @param path - Dotted location of the offending value (e.g., 'jobs.test').
   */
  public constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message)
    this.name = 'PipelineConfigError'
  }
}
