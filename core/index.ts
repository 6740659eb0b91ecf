export type { ActionRunner, ActionResult } from '../types/action-runner'
export type { PipelineDefinition } from '../types/pipeline-definition'
export type { ExpressionContext } from '../types/expression-context'
export type { MatrixCombination } from '../types/matrix-combination'
export type { StepResult, SkipReason } from '../types/step-result'
export type { JobOutcome, JobStatus } from '../types/job-outcome'
export type { PipelineResult } from '../types/pipeline-result'
export type { UnplannableJob } from '../types/unplannable-job'
export type { MatrixDimension } from '../types/matrix-dimension'
export type { ExecutableJob } from '../types/executable-job'
export type { ResolvedJob } from '../types/resolved-job'
export type { Diagnostic } from '../types/diagnostic'

export type { ShellRunnerOptions, ActionHandler } from './executor/create-shell-runner'
export type { ExecuteJobOptions, JobHooks } from './executor/execute-job'
export type { PlanJobsOptions, PlanJobsResult } from './planner/plan-jobs'
export type { RunPipelineOptions } from './run-pipeline'
export type { RunJobsOptions } from './executor/run-jobs'

export { findUnresolvableReferences } from './matrix/find-unresolvable-references'
export { ConditionEvaluationError } from './errors/condition-evaluation-error'
export { interpolateTemplate } from './condition/interpolate-template'
export { evaluateCondition } from './condition/evaluate-condition'
export { createShellRunner } from './executor/create-shell-runner'
export { PipelineConfigError } from './errors/pipeline-config-error'
export { runPipeline, resolvePipelineJobs } from './run-pipeline'
export { createDryRunner } from './executor/create-dry-runner'
export { StepActionFailure } from './errors/step-action-failure'
export { resolveMatrix } from './matrix/resolve-matrix'
export { loadWorkflowFile } from './load-workflow-file'
export { parseWorkflow } from './parsing/parse-workflow'
export { executeJob } from './executor/execute-job'
export { planJobs } from './planner/plan-jobs'
export { runJobs } from './executor/run-jobs'
