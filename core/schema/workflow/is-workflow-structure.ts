import type { WorkflowStructure } from '../../../types/workflow-structure'

/**
 * Type guard to check if a value conforms to the WorkflowStructure interface.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid workflow structure.
 */
export function isWorkflowStructure(
  value: unknown,
): value is WorkflowStructure {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }

  /** Only the job map matters to the runner; triggers are ignored. */
  let object = value as Record<string, unknown>
  let { jobs } = object
  return jobs !== null && typeof jobs === 'object' && !Array.isArray(jobs)
}
