import type { WorkflowJob } from '../../../types/workflow-job'

/**
 * Type guard to check if a value conforms to the WorkflowJob interface.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid workflow job.
 */
export function isWorkflowJob(value: unknown): value is WorkflowJob {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }

  /**
   * A runnable job needs a runner and a step list. Reusable workflow calls
   * ('uses') are not runnable here.
   */
  let object = value as Record<string, unknown>
  return 'runs-on' in object && Array.isArray(object['steps'])
}
