/**
 * Pipeline run loader.
 */

import { readFileSync } from "node:fs";
import { PipelineRunSchema, type PipelineRun } from "./schema.js";
import { formatIssueList, formatZodIssues, type ValidationIssue } from "../schema/issues.js";

export class PipelineValidationError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = "PipelineValidationError";
    this.issues = issues;
  }

  format(): string {
    return formatIssueList("Pipeline validation failed:", this.issues);
  }
}

/**
 * Validate a pipeline run definition.
 *
 * @throws PipelineValidationError if validation fails
 */
export function loadPipelineRun(input: unknown): PipelineRun {
  const result = PipelineRunSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineValidationError(
      `Invalid pipeline: ${issues.length} validation error(s)`,
      issues
    );
  }
  return result.data;
}

/**
 * Read and validate a pipeline run definition from a JSON file.
 */
export function loadPipelineRunFromFile(filePath: string): PipelineRun {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new PipelineValidationError(`Could not read pipeline file ${filePath}`, [
      {
        path: [],
        message: err instanceof Error ? err.message : String(err),
        code: "invalid_json",
      },
    ]);
  }
  return loadPipelineRun(parsed);
}
