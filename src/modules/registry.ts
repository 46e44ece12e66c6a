/**
 * Module dispatcher.
 *
 * The set of runnable modules is the fixed list below. Adding a module
 * means writing a handler and listing it here; `ModuleId` follows the list.
 */

import type { ModuleDefinitions } from "../schema/schema.js";
import type {
  ModuleHandler,
  ModuleResult,
  ModuleSession,
  SelectedSettings,
} from "../types/module.js";
import { fastaInputModule } from "./fasta-input.js";
import { sizeExclusionModule } from "./size-exclusion.js";
import { ModuleNotImplementedError } from "./errors.js";

export const MODULE_HANDLERS = [fastaInputModule, sizeExclusionModule] as const;

export type ModuleId = (typeof MODULE_HANDLERS)[number]["id"];

export const MODULE_IDS: readonly ModuleId[] = MODULE_HANDLERS.map((handler) => handler.id);

export function isModuleId(id: string): id is ModuleId {
  return MODULE_IDS.some((known) => known === id);
}

/**
 * Look up the handler for a module id.
 *
 * @throws ModuleNotImplementedError for ids outside the fixed list
 */
export function getModuleHandler(moduleId: string): ModuleHandler {
  const handler = MODULE_HANDLERS.find((candidate) => candidate.id === moduleId);
  if (handler === undefined) {
    throw new ModuleNotImplementedError(moduleId, MODULE_IDS);
  }
  return handler;
}

/**
 * Run one module against the session's pool and return the resulting pool
 * contents for visualization. The handler may write automatic choices back
 * into `settings`.
 */
export function dispatch(
  moduleId: string,
  settings: SelectedSettings,
  schema: Readonly<ModuleDefinitions>,
  session: ModuleSession
): ModuleResult {
  const handler = getModuleHandler(moduleId);
  const outcome = handler.run({ ...session, moduleId, settings, schema });
  return {
    moduleId,
    selectedLabel: outcome.selectedLabel,
    proteins: session.pool.snapshot(),
  };
}
