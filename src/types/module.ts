/**
 * Processing module definitions.
 * Modules are discrete steps that transform the protein pool.
 */

import type { Logger } from "../logging/logger.js";
import type { ModuleDefinitions } from "../schema/schema.js";
import type { ProteinPool } from "../proteins/pool.js";
import type { PoolSnapshot } from "./protein.js";

/**
 * Raw value a user selected for one setting.
 * Form posts deliver strings, or lists of strings for multi-selects;
 * pipeline files may also carry numbers and booleans.
 */
export type SettingInput = string | readonly string[] | number | boolean;

/**
 * Setting name mapped to the user's raw selection for one module instance.
 * Handlers may write back into it (the SEC recommendation does).
 */
export type SelectedSettings = Record<string, SettingInput>;

/**
 * Per-run state shared by every module of a pipeline run.
 */
export interface ModuleSession {
  readonly pool: ProteinPool;
  readonly logger: Logger;
  /** Directory that file-valued options are resolved against */
  readonly dataDir: string;
  /** Cooperative cancellation check; returning false stops long-running work */
  readonly shouldContinue?: () => boolean;
}

export interface ModuleContext extends ModuleSession {
  readonly moduleId: string;
  readonly settings: SelectedSettings;
  readonly schema: Readonly<ModuleDefinitions>;
}

export interface ModuleOutcome {
  /** Label shown for this step, e.g. the SEC column that was applied */
  readonly selectedLabel: string | null;
}

export interface ModuleHandler<Id extends string = string> {
  readonly id: Id;
  readonly name: string;
  run(context: ModuleContext): ModuleOutcome;
}

export interface ModuleResult extends ModuleOutcome {
  readonly moduleId: string;
  readonly proteins: PoolSnapshot;
}
