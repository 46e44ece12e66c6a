/**
 * Module definition schema.
 *
 * Usage:
 *   import { loadModuleDefinitionsFromDir } from "./schema/index.js";
 *
 *   const definitions = loadModuleDefinitionsFromDir("modules");
 *   const secColumns = definitions.size_exclusion?.settings["SEC column"];
 */

export {
  FieldKind,
  FieldSchema,
  ModuleDefinitionSchema,
  ModuleDefinitionsSchema,
  OptionValueSchema,
  type FieldDefinition,
  type ChoiceField,
  type MultiChoiceField,
  type DecimalField,
  type FileField,
  type BooleanField,
  type TextField,
  type ModuleDefinition,
  type ModuleDefinitions,
  type OptionValue,
} from "./schema.js";

export {
  loadModuleDefinitions,
  loadModuleDefinitionsFromDir,
  ModuleSchemaError,
} from "./loader.js";

export { withSettingDefaults } from "./defaults.js";

export { type ValidationIssue } from "./issues.js";
