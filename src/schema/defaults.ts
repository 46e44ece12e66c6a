/**
 * Carry a run's selections back into the definitions as defaults, so a
 * re-rendered configuration form shows what the user (or an automatic
 * choice) last selected.
 */

import type { FieldDefinition, ModuleDefinitions } from "./schema.js";
import type { SelectedSettings, SettingInput } from "../types/module.js";
import { isTruthySetting, parseDecimal } from "../settings/resolver.js";
import { deepFreeze } from "./issues.js";

function withDefault(field: FieldDefinition, value: SettingInput): FieldDefinition {
  switch (field.kind) {
    case "choice":
      return typeof value === "string" && Object.hasOwn(field.options, value)
        ? { ...field, default: value }
        : field;
    case "multi_choice": {
      const labels = typeof value === "string" ? [value] : value;
      if (typeof labels === "number" || typeof labels === "boolean") {
        return field;
      }
      return { ...field, default: labels.filter((label) => Object.hasOwn(field.options, label)) };
    }
    case "decimal": {
      const parsed = parseDecimal(value);
      return parsed === null ? field : { ...field, default: parsed };
    }
    case "boolean":
      return { ...field, default: isTruthySetting(value) };
    case "file":
    case "text":
      return typeof value === "string" ? { ...field, default: value } : field;
  }
}

/**
 * Return a copy of `definitions` where each setting of `moduleId` named in
 * `settings` has its default replaced by the selected value. Selections
 * that don't fit the field (unknown label, non-numeric decimal) leave the
 * previous default in place.
 */
export function withSettingDefaults(
  definitions: Readonly<ModuleDefinitions>,
  moduleId: string,
  settings: Readonly<SelectedSettings>
): Readonly<ModuleDefinitions> {
  const definition = definitions[moduleId];
  if (definition === undefined) {
    return definitions;
  }

  const updatedSettings: Record<string, FieldDefinition> = { ...definition.settings };
  for (const [settingName, value] of Object.entries(settings)) {
    const field = definition.settings[settingName];
    if (field !== undefined && Object.hasOwn(definition.settings, settingName)) {
      updatedSettings[settingName] = withDefault(field, value);
    }
  }

  return deepFreeze({
    ...definitions,
    [moduleId]: { ...definition, settings: updatedSettings },
  });
}
