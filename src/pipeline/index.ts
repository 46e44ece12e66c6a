/**
 * Pipeline runs: definition, loading, execution and reporting.
 */

export {
  PipelineRunSchema,
  PipelineStageSchema,
  SettingInputSchema,
  type PipelineRun,
  type PipelineStage,
} from "./schema.js";
export { loadPipelineRun, loadPipelineRunFromFile, PipelineValidationError } from "./loader.js";
export { parsePostedForm, type PostedFields } from "./form.js";
export { runPipeline, StageExecutionError, type RunPipelineOptions } from "./runner.js";
export { formatPipelineReport } from "./report.js";
