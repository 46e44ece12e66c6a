/**
 * Module definition schema.
 *
 * A module definition declares the settings a processing module exposes.
 * Every setting is a field with a `kind` tag and kind-specific metadata
 * (options, defaults, numeric bounds). Definitions are stored as JSON under
 * `modules/` and validated once per pipeline run.
 *
 * Example (modules/size_exclusion.json):
 *
 *   {
 *     "size_exclusion": {
 *       "id": "size_exclusion",
 *       "name": "Size-exclusion chromatography",
 *       "settings": {
 *         "SEC column": {
 *           "kind": "choice",
 *           "options": { "Superdex 75 Increase": [3, 70] }
 *         }
 *       }
 *     }
 *   }
 */

import { z } from "zod";

/**
 * Supported field kinds.
 */
export const FieldKind = z.enum([
  "choice",
  "multi_choice",
  "decimal",
  "file",
  "boolean",
  "text",
]);
export type FieldKind = z.infer<typeof FieldKind>;

/**
 * Value an option label maps to.
 * SEC columns map to a [minWeight, maxWeight] pair in kDa.
 */
export const OptionValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.number()),
]);
export type OptionValue = z.infer<typeof OptionValueSchema>;

const OptionsSchema = z
  .record(OptionValueSchema)
  .describe("Human-readable option label mapped to its resolved value");

const CommonFieldShape = {
  required: z.boolean().optional(),
  help_text: z.string().optional(),
};

export const ChoiceFieldSchema = z
  .object({
    kind: z.literal("choice"),
    options: OptionsSchema,
    default: z.string().optional(),
    ...CommonFieldShape,
  })
  .strict();

export const MultiChoiceFieldSchema = z
  .object({
    kind: z.literal("multi_choice"),
    options: OptionsSchema,
    default: z.array(z.string()).optional(),
    ...CommonFieldShape,
  })
  .strict();

export const DecimalFieldSchema = z
  .object({
    kind: z.literal("decimal"),
    default: z.number().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    decimal_places: z.number().int().min(0).optional(),
    step: z.number().positive().optional(),
    ...CommonFieldShape,
  })
  .strict();

export const FileFieldSchema = z
  .object({
    kind: z.literal("file"),
    default: z.string().optional(),
    extensions: z
      .array(z.string().min(1))
      .optional()
      .describe("Accepted file extensions, without the leading dot"),
    ...CommonFieldShape,
  })
  .strict();

export const BooleanFieldSchema = z
  .object({
    kind: z.literal("boolean"),
    default: z.boolean().optional(),
    ...CommonFieldShape,
  })
  .strict();

export const TextFieldSchema = z
  .object({
    kind: z.literal("text"),
    default: z.string().optional(),
    min_length: z.number().int().min(0).optional(),
    max_length: z.number().int().min(0).optional(),
    ...CommonFieldShape,
  })
  .strict();

export const FieldSchema = z.discriminatedUnion("kind", [
  ChoiceFieldSchema,
  MultiChoiceFieldSchema,
  DecimalFieldSchema,
  FileFieldSchema,
  BooleanFieldSchema,
  TextFieldSchema,
]);

export type ChoiceField = z.infer<typeof ChoiceFieldSchema>;
export type MultiChoiceField = z.infer<typeof MultiChoiceFieldSchema>;
export type DecimalField = z.infer<typeof DecimalFieldSchema>;
export type FileField = z.infer<typeof FileFieldSchema>;
export type BooleanField = z.infer<typeof BooleanFieldSchema>;
export type TextField = z.infer<typeof TextFieldSchema>;
export type FieldDefinition = z.infer<typeof FieldSchema>;

export const ModuleDefinitionSchema = z
  .object({
    id: z
      .string()
      .regex(/^[a-z][a-z0-9_]*$/, "Module id must be snake_case")
      .describe("Identifier the dispatcher matches against"),
    name: z.string().min(1).describe("Display name of the module"),
    description: z.string().optional(),
    settings: z
      .record(FieldSchema)
      .describe("Setting name mapped to its field definition"),
  })
  .strict();

export type ModuleDefinition = z.infer<typeof ModuleDefinitionSchema>;

/**
 * Module id mapped to its definition.
 */
export const ModuleDefinitionsSchema = z.record(ModuleDefinitionSchema);
export type ModuleDefinitions = z.infer<typeof ModuleDefinitionsSchema>;
