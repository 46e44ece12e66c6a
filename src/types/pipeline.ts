/**
 * Pipeline run reports.
 * A run executes module instances in the user's chosen order.
 */

import type { ModuleDefinitions } from "../schema/schema.js";
import type { SelectedSettings } from "./module.js";
import type { PoolSnapshot } from "./protein.js";

export interface StageReport {
  readonly instanceId: string;
  readonly moduleId: string;
  /** Settings after the stage ran, including any automatic choices */
  readonly settings: Readonly<SelectedSettings>;
  readonly selectedLabel: string | null;
  readonly proteins: PoolSnapshot;
}

export interface PipelineReport {
  readonly pipelineId: string;
  readonly runId: string;
  readonly stages: readonly StageReport[];
  /** Definitions with defaults replaced by the run's selections, for re-rendering */
  readonly definitions: Readonly<ModuleDefinitions>;
}
