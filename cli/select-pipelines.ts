import type { PipelineDefinition } from '../types/pipeline-definition'

import { parseJobPatterns } from '../core/filters/parse-job-patterns'

/**
 * Keeps the pipelines whose job id matches one of the --job patterns.
 *
 * @param pipelines - Pipelines from the workflow file.
 * @param jobs - Raw option values (repeatable, comma-separated allowed).
 * @returns Selected pipelines; all of them when no pattern is given.
 */
export function selectPipelines(
  pipelines: PipelineDefinition[],
  jobs: undefined | string[] | string,
): PipelineDefinition[] {
  let raw: string[] = []
  if (Array.isArray(jobs)) {
    raw.push(...jobs)
  } else if (typeof jobs === 'string') {
    raw.push(jobs)
  }

  let patterns = parseJobPatterns(
    raw
      .flatMap(item => item.split(','))
      .map(item => item.trim())
      .filter(Boolean),
  )
  if (patterns.length === 0) {
    return pipelines
  }

  return pipelines.filter(pipeline =>
    patterns.some(pattern => pattern.test(pipeline.id)),
  )
}
