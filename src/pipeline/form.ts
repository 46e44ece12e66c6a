/**
 * Posted form parsing.
 *
 * The configuration page posts one flat field set for all module cards:
 *
 *   module_order          JSON array of instance ids, in execution order
 *   ModuleType:<instance> module id the instance runs
 *   <instance>:<setting>  selected value(s) for one setting
 *
 * Fields starting with "Field:" belong to the page itself and are ignored.
 */

import { z } from "zod";
import { loadPipelineRun, PipelineValidationError } from "./loader.js";
import type { PipelineRun } from "./schema.js";
import type { SettingInput } from "../types/module.js";

export type PostedFields = Readonly<Record<string, string | readonly string[]>>;

const MODULE_ORDER_FIELD = "module_order";
const MODULE_TYPE_PREFIX = "ModuleType:";
const PAGE_FIELD_PREFIX = "Field:";

const ModuleOrderSchema = z.array(z.string());

function firstValue(value: string | readonly string[]): string | undefined {
  return typeof value === "string" ? value : value[0];
}

function readModuleOrder(fields: PostedFields): string[] {
  const raw = fields[MODULE_ORDER_FIELD];
  const text = raw === undefined ? undefined : firstValue(raw);
  if (text === undefined || text === "") {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new PipelineValidationError("module_order is not valid JSON", [
      { path: [MODULE_ORDER_FIELD], message: err instanceof Error ? err.message : String(err), code: "invalid_json" },
    ]);
  }

  const result = ModuleOrderSchema.safeParse(parsed);
  if (!result.success) {
    throw new PipelineValidationError("module_order must be a list of instance ids", [
      { path: [MODULE_ORDER_FIELD], message: "expected an array of strings", code: "invalid_type" },
    ]);
  }
  return result.data;
}

/**
 * Turn posted form fields into a pipeline run. Instances in `module_order`
 * without a module type are skipped.
 *
 * @throws PipelineValidationError when the order is unreadable or no stage remains
 */
export function parsePostedForm(fields: PostedFields, pipelineId = "posted"): PipelineRun {
  const moduleOrder = readModuleOrder(fields);
  const instanceTypes = new Map<string, string>();
  const instanceSettings = new Map<string, Record<string, SettingInput>>();

  for (const [key, value] of Object.entries(fields)) {
    if (key.startsWith(MODULE_TYPE_PREFIX)) {
      const moduleId = firstValue(value);
      if (moduleId !== undefined) {
        instanceTypes.set(key.slice(MODULE_TYPE_PREFIX.length), moduleId);
      }
      continue;
    }

    const separator = key.indexOf(":");
    if (separator < 0 || key.startsWith(PAGE_FIELD_PREFIX)) {
      continue;
    }

    const instanceId = key.slice(0, separator);
    const settingName = key.slice(separator + 1);
    const settings = instanceSettings.get(instanceId) ?? {};
    settings[settingName] = typeof value === "string" || value.length > 1 ? value : value[0] ?? "";
    instanceSettings.set(instanceId, settings);
  }

  const stages = moduleOrder.flatMap((instanceId) => {
    const moduleId = instanceTypes.get(instanceId);
    if (moduleId === undefined) {
      return [];
    }
    return [{ instanceId, moduleId, settings: instanceSettings.get(instanceId) ?? {} }];
  });

  return loadPipelineRun({ id: pipelineId, stages });
}
