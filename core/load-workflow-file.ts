import type { PipelineDefinition } from '../types/pipeline-definition'

import { PipelineConfigError } from './errors/pipeline-config-error'
import { readYamlDocument } from './fs/read-yaml-document'
import { parseWorkflow } from './parsing/parse-workflow'

/**
 * Reads a workflow file and turns its jobs into pipelines.
 *
 * @param filePath - The path to the workflow YAML file.
 * @returns A promise that resolves to the pipelines declared in the file.
 * @throws {PipelineConfigError} When the YAML is invalid or the workflow is
 *   malformed.
 */
export async function loadWorkflowFile(
  filePath: string,
): Promise<PipelineDefinition[]> {
  let document = await readYamlDocument(filePath)

  let [firstError] = document.errors
  if (firstError) {
    throw new PipelineConfigError(`${filePath}: ${firstError.message}`)
  }

  return parseWorkflow(document.toJSON())
}
