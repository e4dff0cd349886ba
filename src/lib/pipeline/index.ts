/**
 * Pipeline module - orchestration of the ETL stages
 */

export { PipelineOrchestrator, runPipeline } from "./orchestrator.js";
export type { PipelineCollaborators } from "./orchestrator.js";
export { resolvePipelineOptions, DEFAULT_OUTLIER_FIELDS } from "./options.js";
export type { PipelineOptionsInput } from "./options.js";
export { RunState, isTerminal } from "./run-state.js";
