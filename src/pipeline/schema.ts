/**
 * Pipeline run definition schema.
 *
 * A pipeline run lists module instances in execution order. Each instance
 * names the module it runs and carries the user's raw selections:
 *
 *   {
 *     "id": "sec-demo",
 *     "stages": [
 *       { "instanceId": "load", "moduleId": "fasta_input",
 *         "settings": { "Select FASTA file": "Example mixture" } },
 *       { "instanceId": "sec-1", "moduleId": "size_exclusion",
 *         "settings": { "SEC mode": "Simulate", "SEC column": "Superdex 75 Increase" } }
 *     ]
 *   }
 */

import { z } from "zod";

export const SettingInputSchema = z.union([
  z.string(),
  z.array(z.string()),
  z.number(),
  z.boolean(),
]);

export const PipelineStageSchema = z
  .object({
    instanceId: z.string().min(1).describe("Unique id of this module instance in the run"),
    moduleId: z.string().min(1).describe("Module the instance runs"),
    settings: z
      .record(SettingInputSchema)
      .default({})
      .describe("Setting name mapped to the raw selected value"),
  })
  .strict();

export type PipelineStage = z.infer<typeof PipelineStageSchema>;

export const PipelineRunSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    stages: z.array(PipelineStageSchema).min(1),
  })
  .strict()
  .superRefine((run, ctx) => {
    const seen = new Set<string>();
    run.stages.forEach((stage, index) => {
      if (seen.has(stage.instanceId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["stages", index, "instanceId"],
          message: `Duplicate instance id: ${stage.instanceId}`,
        });
      }
      seen.add(stage.instanceId);
    });
  });

export type PipelineRun = z.infer<typeof PipelineRunSchema>;
