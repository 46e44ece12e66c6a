/**
 * Pipeline runner.
 *
 * Executes the stages of a pipeline run in order against one protein pool.
 * Every run gets a fresh pool and its own run id, so runs never share
 * state. After each stage the instance's selections become the module's
 * defaults in the returned definitions, which is what a re-rendered
 * configuration page shows.
 */

import { ProteinPool } from "../proteins/pool.js";
import { dispatch } from "../modules/registry.js";
import { withSettingDefaults } from "../schema/defaults.js";
import type { ModuleDefinitions } from "../schema/schema.js";
import { createLogger, generateRunId, type Logger } from "../logging/index.js";
import type { PipelineRun } from "./schema.js";
import type { PipelineReport, StageReport } from "../types/pipeline.js";
import type { ModuleResult, SelectedSettings } from "../types/module.js";

export class StageExecutionError extends Error {
  public readonly instanceId: string;
  public readonly moduleId: string;
  public readonly stageIndex: number;

  constructor(stageIndex: number, instanceId: string, moduleId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Stage ${stageIndex + 1} (${instanceId}, module ${moduleId}) failed: ${reason}`, { cause });
    this.name = "StageExecutionError";
    this.instanceId = instanceId;
    this.moduleId = moduleId;
    this.stageIndex = stageIndex;
  }
}

export interface RunPipelineOptions {
  /** Directory that file-valued options are resolved against */
  dataDir: string;
  logger?: Logger;
  /** Cooperative cancellation check passed to every module */
  shouldContinue?: () => boolean;
}

/**
 * Run every stage in order.
 *
 * @throws StageExecutionError wrapping the first module failure
 */
export function runPipeline(
  pipeline: PipelineRun,
  definitions: Readonly<ModuleDefinitions>,
  options: RunPipelineOptions
): PipelineReport {
  const runId = generateRunId();
  const logger = (options.logger ?? createLogger({ console: false, file: false })).child({ runId });
  const pool = new ProteinPool();
  const stages: StageReport[] = [];
  let currentDefinitions = definitions;

  logger.info("Pipeline started", { pipelineId: pipeline.id, stages: pipeline.stages.length });

  pipeline.stages.forEach((stage, index) => {
    const settings: SelectedSettings = { ...stage.settings };

    let result: ModuleResult;
    try {
      result = dispatch(stage.moduleId, settings, definitions, {
        pool,
        logger,
        dataDir: options.dataDir,
        shouldContinue: options.shouldContinue,
      });
    } catch (err) {
      logger.error("Stage failed", {
        instanceId: stage.instanceId,
        moduleId: stage.moduleId,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new StageExecutionError(index, stage.instanceId, stage.moduleId, err);
    }

    currentDefinitions = withSettingDefaults(currentDefinitions, stage.moduleId, settings);
    stages.push({
      instanceId: stage.instanceId,
      moduleId: stage.moduleId,
      settings: Object.freeze(settings),
      selectedLabel: result.selectedLabel,
      proteins: result.proteins,
    });

    logger.info("Stage completed", {
      instanceId: stage.instanceId,
      moduleId: stage.moduleId,
      proteins: result.proteins.length,
      selectedLabel: result.selectedLabel,
    });
  });

  logger.info("Pipeline completed", { pipelineId: pipeline.id, proteins: pool.size });

  return {
    pipelineId: pipeline.id,
    runId,
    stages,
    definitions: currentDefinitions,
  };
}
