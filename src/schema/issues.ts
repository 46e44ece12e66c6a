/**
 * Structured validation issues shared by the JSON loaders.
 */

import type { ZodIssue } from "zod";

/**
 * Individual validation issue.
 */
export interface ValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or a loader-specific code for cross-field checks */
  code: string;
}

/**
 * Convert Zod issues to our structured format.
 */
export function formatZodIssues(
  zodIssues: ZodIssue[],
  prefix: (string | number)[] = []
): ValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: [
      ...prefix,
      ...issue.path.filter(
        (p): p is string | number => typeof p === "string" || typeof p === "number"
      ),
    ],
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Render issues as an indented list under a heading.
 */
export function formatIssueList(heading: string, issues: readonly ValidationIssue[]): string {
  const lines = [heading];
  for (const issue of issues) {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    lines.push(`  - ${path}: ${issue.message}`);
  }
  return lines.join("\n");
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}
