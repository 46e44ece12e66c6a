/**
 * Module definition loader and validator.
 *
 * Responsible for:
 * - Reading module definitions from a directory of JSON files
 * - Validating them against the schema with fail-fast behavior
 * - Checking cross-field constraints Zod can't express
 * - Freezing the result so handlers treat it as read-only
 */

import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import {
  ModuleDefinitionsSchema,
  type FieldDefinition,
  type ModuleDefinitions,
} from "./schema.js";
import {
  deepFreeze,
  formatIssueList,
  formatZodIssues,
  type ValidationIssue,
} from "./issues.js";

/**
 * Structured validation error for module definitions.
 */
export class ModuleSchemaError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = "ModuleSchemaError";
    this.issues = issues;
  }

  format(): string {
    return formatIssueList("Module definition validation failed:", this.issues);
  }
}

function validateField(
  moduleId: string,
  settingName: string,
  field: FieldDefinition
): ValidationIssue[] {
  const path = [moduleId, "settings", settingName];
  const issues: ValidationIssue[] = [];

  switch (field.kind) {
    case "choice": {
      const labels = Object.keys(field.options);
      if (labels.length === 0) {
        issues.push({ path: [...path, "options"], message: "choice field needs at least one option", code: "empty_options" });
      }
      if (field.default !== undefined && !labels.includes(field.default)) {
        issues.push({
          path: [...path, "default"],
          message: `default "${field.default}" is not one of: ${labels.join(", ")}`,
          code: "invalid_default",
        });
      }
      break;
    }
    case "multi_choice": {
      const labels = Object.keys(field.options);
      for (const label of field.default ?? []) {
        if (!labels.includes(label)) {
          issues.push({
            path: [...path, "default"],
            message: `default "${label}" is not one of: ${labels.join(", ")}`,
            code: "invalid_default",
          });
        }
      }
      break;
    }
    case "decimal":
      if (field.min !== undefined && field.max !== undefined && field.min > field.max) {
        issues.push({ path, message: "min must be <= max", code: "invalid_range" });
      }
      break;
    case "text":
      if (
        field.min_length !== undefined &&
        field.max_length !== undefined &&
        field.min_length > field.max_length
      ) {
        issues.push({ path, message: "min_length must be <= max_length", code: "invalid_range" });
      }
      break;
    case "file":
    case "boolean":
      break;
  }

  return issues;
}

/**
 * Validate and load module definitions.
 *
 * @param input - Raw object mapping module id to definition
 * @returns Validated and frozen definitions
 * @throws ModuleSchemaError if validation fails
 */
export function loadModuleDefinitions(input: unknown): Readonly<ModuleDefinitions> {
  const result = ModuleDefinitionsSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ModuleSchemaError(
      `Invalid module definitions: ${issues.length} validation error(s)`,
      issues
    );
  }

  const issues: ValidationIssue[] = [];
  for (const [key, definition] of Object.entries(result.data)) {
    if (key !== definition.id) {
      issues.push({
        path: [key, "id"],
        message: `Module key '${key}' does not match module 'id' field '${definition.id}'`,
        code: "id_mismatch",
      });
    }
    for (const [settingName, field] of Object.entries(definition.settings)) {
      issues.push(...validateField(key, settingName, field));
    }
  }

  if (issues.length > 0) {
    throw new ModuleSchemaError(
      `Invalid module definitions: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Load every `*.json` file in a directory and merge them into one set of
 * definitions. Files are read in name order.
 *
 * @throws ModuleSchemaError on unreadable JSON, duplicate ids, or schema errors
 */
export function loadModuleDefinitionsFromDir(dirPath: string): Readonly<ModuleDefinitions> {
  const files = readdirSync(dirPath)
    .filter((name) => name.endsWith(".json"))
    .sort();

  const merged: Record<string, unknown> = {};
  const issues: ValidationIssue[] = [];

  for (const file of files) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(join(dirPath, file), "utf-8"));
    } catch (err) {
      issues.push({
        path: [file],
        message: `could not parse JSON: ${err instanceof Error ? err.message : String(err)}`,
        code: "invalid_json",
      });
      continue;
    }

    if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
      issues.push({ path: [file], message: "expected an object keyed by module id", code: "invalid_type" });
      continue;
    }

    for (const [moduleId, definition] of Object.entries(parsed)) {
      if (moduleId in merged) {
        issues.push({
          path: [file, moduleId],
          message: `module '${moduleId}' is defined in more than one file`,
          code: "duplicate",
        });
        continue;
      }
      merged[moduleId] = definition;
    }
  }

  if (issues.length > 0) {
    throw new ModuleSchemaError(
      `Failed to read module definitions from ${dirPath}: ${issues.length} error(s)`,
      issues
    );
  }

  return loadModuleDefinitions(merged);
}
