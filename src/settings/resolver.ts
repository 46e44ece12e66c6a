/**
 * Settings resolver.
 *
 * Turns the loosely-typed values a user selected for a module instance into
 * typed values, using the module's field definitions. Resolution is pure:
 * it reads the schema and the selection and never mutates either.
 *
 *   resolveSetting("SEC column", "size_exclusion", { "SEC column": "Superdex 75" }, schema)
 *   // => [3, 70]
 */

import {
  FieldKind,
  type FieldDefinition,
  type ModuleDefinitions,
  type OptionValue,
} from "../schema/schema.js";
import type { SelectedSettings, SettingInput } from "../types/module.js";
import {
  InvalidOptionError,
  MissingValueError,
  SettingKindMismatchError,
  TypeConversionError,
  UnknownModuleError,
  UnknownSettingError,
  UnsupportedFieldKindError,
} from "./errors.js";

/**
 * Resolved value tagged with the kind of the field it came from.
 */
export type ResolvedSetting =
  | { readonly kind: "choice"; readonly value: OptionValue }
  | { readonly kind: "multi_choice"; readonly value: OptionValue[] }
  | { readonly kind: "decimal"; readonly value: number }
  | { readonly kind: "file"; readonly value: SettingInput }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "text"; readonly value: string };

export type ResolvedValue = ResolvedSetting["value"];

/**
 * Truthiness of a raw form value: an empty string, zero or an empty list is
 * false, anything else is true.
 */
export function isTruthySetting(value: SettingInput | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  if (typeof value === "string") {
    return value.length > 0;
  }
  if (typeof value === "number") {
    return value !== 0;
  }
  if (typeof value === "boolean") {
    return value;
  }
  return value.length > 0;
}

/** Decimal literal; underscores may only sit between digits. */
const DECIMAL_PATTERN =
  /^[+-]?(?:(?:\d(?:_?\d)*)?\.\d(?:_?\d)*|\d(?:_?\d)*\.?)(?:[eE][+-]?\d(?:_?\d)*)?$/;

const SPECIAL_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Parse a raw form value as a decimal number, or return null.
 *
 * Strings are read as decimal literals, optionally signed, with an exponent
 * and digit-group underscores; "inf", "infinity" and "nan" are accepted in
 * any case. Hex, octal and binary prefixes are not decimals. Booleans read
 * as 1 and 0.
 */
export function parseDecimal(value: SettingInput): number | null {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value !== "string") {
    return null;
  }

  const text = value.trim();
  const special = SPECIAL_PATTERN.exec(text);
  if (special) {
    if (special[2]?.toLowerCase() === "nan") {
      return Number.NaN;
    }
    return special[1] === "-" ? -Infinity : Infinity;
  }
  if (!DECIMAL_PATTERN.test(text)) {
    return null;
  }
  return Number(text.replace(/_/g, ""));
}

function lookupField(
  settingName: string,
  moduleId: string,
  schema: Readonly<ModuleDefinitions>
): FieldDefinition {
  const definition = schema[moduleId];
  if (definition === undefined) {
    throw new UnknownModuleError(moduleId, settingName, Object.keys(schema));
  }
  const field = definition.settings[settingName];
  if (field === undefined || !Object.hasOwn(definition.settings, settingName)) {
    throw new UnknownSettingError(moduleId, settingName, Object.keys(definition.settings));
  }
  return field;
}

function lookupOption(
  options: Readonly<Record<string, OptionValue>>,
  label: SettingInput,
  moduleId: string,
  settingName: string
): OptionValue {
  if (typeof label !== "string" && typeof label !== "number") {
    throw new TypeConversionError(moduleId, settingName, label, "an option label");
  }
  const key = String(label);
  const value = options[key];
  if (value === undefined || !Object.hasOwn(options, key)) {
    throw new InvalidOptionError(moduleId, settingName, key, Object.keys(options));
  }
  return value;
}

function requireValue(
  selectedSettings: Readonly<SelectedSettings>,
  settingName: string,
  moduleId: string
): SettingInput {
  const value = Object.hasOwn(selectedSettings, settingName)
    ? selectedSettings[settingName]
    : undefined;
  if (value === undefined) {
    throw new MissingValueError(moduleId, settingName);
  }
  return value;
}

/**
 * Resolve a setting and keep the kind it was resolved as.
 *
 * @throws UnknownModuleError / UnknownSettingError when the schema has no such setting
 * @throws InvalidOptionError when a selected label is not one of the options
 * @throws TypeConversionError when a value cannot be read as the field's type
 * @throws MissingValueError when a non-boolean setting has no selection
 */
export function resolveTaggedSetting(
  settingName: string,
  moduleId: string,
  selectedSettings: Readonly<SelectedSettings>,
  schema: Readonly<ModuleDefinitions>
): ResolvedSetting {
  const field = lookupField(settingName, moduleId, schema);

  switch (field.kind) {
    case "choice": {
      const label = requireValue(selectedSettings, settingName, moduleId);
      return { kind: "choice", value: lookupOption(field.options, label, moduleId, settingName) };
    }

    case "multi_choice": {
      const raw = requireValue(selectedSettings, settingName, moduleId);
      // A single selection arrives unwrapped from a form post
      const labels = typeof raw === "string" ? [raw] : raw;
      if (typeof labels === "number" || typeof labels === "boolean") {
        throw new TypeConversionError(moduleId, settingName, raw, "a list of option labels");
      }
      return {
        kind: "multi_choice",
        value: labels.map((label) => lookupOption(field.options, label, moduleId, settingName)),
      };
    }

    case "decimal": {
      const raw = requireValue(selectedSettings, settingName, moduleId);
      const value = parseDecimal(raw);
      if (value === null) {
        throw new TypeConversionError(moduleId, settingName, raw, "a decimal number");
      }
      return { kind: "decimal", value };
    }

    case "file":
      return { kind: "file", value: requireValue(selectedSettings, settingName, moduleId) };

    case "boolean":
      return {
        kind: "boolean",
        value: isTruthySetting(
          Object.hasOwn(selectedSettings, settingName) ? selectedSettings[settingName] : undefined
        ),
      };

    case "text":
      return { kind: "text", value: String(requireValue(selectedSettings, settingName, moduleId)) };

    default: {
      const unsupported: never = field;
      throw new UnsupportedFieldKindError(
        moduleId,
        settingName,
        String(Reflect.get(unsupported, "kind")),
        FieldKind.options
      );
    }
  }
}

/**
 * Resolve a setting to its typed value.
 */
export function resolveSetting(
  settingName: string,
  moduleId: string,
  selectedSettings: Readonly<SelectedSettings>,
  schema: Readonly<ModuleDefinitions>
): ResolvedValue {
  return resolveTaggedSetting(settingName, moduleId, selectedSettings, schema).value;
}

/**
 * Resolve a setting that must be declared as a choice field.
 */
export function resolveChoice(
  settingName: string,
  moduleId: string,
  selectedSettings: Readonly<SelectedSettings>,
  schema: Readonly<ModuleDefinitions>
): OptionValue {
  const resolved = resolveTaggedSetting(settingName, moduleId, selectedSettings, schema);
  if (resolved.kind !== "choice") {
    throw new SettingKindMismatchError(moduleId, settingName, "choice", resolved.kind);
  }
  return resolved.value;
}

/**
 * Resolve a setting that must be declared as a decimal field.
 */
export function resolveDecimal(
  settingName: string,
  moduleId: string,
  selectedSettings: Readonly<SelectedSettings>,
  schema: Readonly<ModuleDefinitions>
): number {
  const resolved = resolveTaggedSetting(settingName, moduleId, selectedSettings, schema);
  if (resolved.kind !== "decimal") {
    throw new SettingKindMismatchError(moduleId, settingName, "decimal", resolved.kind);
  }
  return resolved.value;
}
