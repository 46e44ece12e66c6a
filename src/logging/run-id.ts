/**
 * Run IDs.
 * Every pipeline run is tagged with an id that appears in its log lines.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short run id: date prefix plus random suffix,
 * e.g. "20240115-a1b2c3".
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/** Process-level run id, used by log lines that carry none of their own */
let processRunId: string | null = null;

/**
 * Set the process-level run id. Called once by the entry points.
 */
export function initRunId(): string {
  processRunId = generateRunId();
  return processRunId;
}

export function getRunId(): string | null {
  return processRunId;
}
