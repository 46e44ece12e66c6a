/**
 * Size-exclusion chromatography (SEC).
 *
 * Two modes, selected by the "SEC mode" setting:
 *
 * - simulate: fractionate the pool with the selected column's weight window.
 *   Only records whose weight lies inside the window are kept, and each
 *   survivor is annotated with the column label.
 *
 * - recommend: score every column in the catalog against a target weight
 *   window and apply the best one. A column's score is its purity for the
 *   target: abundance inside (column ∩ target) divided by abundance inside
 *   the whole column window. The highest score wins; on a tie the column
 *   listed first wins. The winning column is applied with its effective
 *   (intersected) window, and its label is written back into the instance
 *   settings so the form shows the automatic choice.
 *
 * When no column overlaps the target with a non-zero catch, recommend
 * leaves the pool as it is and notes why on every record.
 */

import type { Protein } from "../proteins/protein.js";
import type { ProteinPool } from "../proteins/pool.js";
import type { OptionValue } from "../schema/schema.js";
import { resolveChoice, resolveDecimal } from "../settings/resolver.js";
import {
  SettingKindMismatchError,
  UnknownModuleError,
  UnknownSettingError,
} from "../settings/errors.js";
import type { ModuleContext, ModuleHandler, ModuleOutcome } from "../types/module.js";
import type { WeightWindow } from "../types/protein.js";
import { InvalidModeError, MalformedColumnSpecError, RunCancelledError } from "./errors.js";

export const SEC_MODULE_ID = "size_exclusion";

export const SEC_SETTINGS = {
  mode: "SEC mode",
  column: "SEC column",
  targetMin: "Target minimum MW (kDa)",
  targetMax: "Target maximum MW (kDa)",
} as const;

export const SEC_MODES = ["simulate", "recommend"] as const;
export type SecMode = (typeof SEC_MODES)[number];

export const NO_SUITABLE_COLUMN_NOTE = "SEC: no suitable column found for target window";

export function columnNote(label: string): string {
  return `SEC: ${label}`;
}

export interface SecColumn {
  readonly label: string;
  readonly window: WeightWindow;
}

/** Candidate columns in catalog order. */
export type ColumnCatalog = readonly SecColumn[];

// ============================================================
// Windows
// ============================================================

/**
 * Window with its bounds in ascending order.
 */
export function orderWindow(a: number, b: number): WeightWindow {
  return a > b ? { min: b, max: a } : { min: a, max: b };
}

/**
 * Window as it is applied to a pool: ordered, both ends clamped to >= 0.
 */
export function normalizeWindow(a: number, b: number): WeightWindow {
  const ordered = orderWindow(a, b);
  return { min: Math.max(ordered.min, 0), max: Math.max(ordered.max, 0) };
}

/**
 * Read a column option value as an ordered [min, max] window.
 *
 * @throws MalformedColumnSpecError unless the value is a pair of numbers
 */
export function readColumnWindow(
  value: OptionValue,
  label: string,
  moduleId: string = SEC_MODULE_ID
): WeightWindow {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new MalformedColumnSpecError(moduleId, label, value);
  }
  const [first, second] = value;
  if (
    first === undefined ||
    second === undefined ||
    !Number.isFinite(first) ||
    !Number.isFinite(second)
  ) {
    throw new MalformedColumnSpecError(moduleId, label, value);
  }
  return orderWindow(first, second);
}

/**
 * Build the column catalog from a choice field's options, keeping their order.
 */
export function buildColumnCatalog(
  options: Readonly<Record<string, OptionValue>>,
  moduleId: string = SEC_MODULE_ID
): ColumnCatalog {
  return Object.entries(options).map(([label, value]) => ({
    label,
    window: readColumnWindow(value, label, moduleId),
  }));
}

// ============================================================
// Simulate
// ============================================================

/**
 * Keep only records inside the window and, when a label is given,
 * annotate the survivors with it.
 *
 * @returns The same pool, filtered in place
 */
export function simulateSec(pool: ProteinPool, window: WeightWindow, label: string | null): ProteinPool {
  const { min, max } = normalizeWindow(window.min, window.max);
  pool.filterByWeightWindow("inside", min, max);
  if (label) {
    pool.annotateAll(columnNote(label));
  }
  return pool;
}

// ============================================================
// Recommend
// ============================================================

/**
 * Total positive abundance of records with a known weight in [a, b].
 */
export function abundanceInWindow(proteins: readonly Protein[], a: number, b: number): number {
  const { min, max } = orderWindow(a, b);
  let total = 0;
  for (const protein of proteins) {
    if (protein.abundance > 0 && protein.isWithinWeight(min, max)) {
      total += protein.abundance;
    }
  }
  return total;
}

export type ColumnScore =
  | {
      readonly label: string;
      readonly column: WeightWindow;
      readonly status: "no_overlap";
    }
  | {
      readonly label: string;
      readonly column: WeightWindow;
      readonly status: "no_abundance" | "scored";
      readonly effective: WeightWindow;
      readonly inTarget: number;
      readonly inColumn: number;
      /** inTarget / inColumn; 0 when the column catches nothing */
      readonly score: number;
    };

/**
 * Score one column against an ordered target window.
 */
export function scoreColumn(
  proteins: readonly Protein[],
  target: WeightWindow,
  column: SecColumn
): ColumnScore {
  const { label, window } = column;
  const effective: WeightWindow = {
    min: Math.max(window.min, target.min),
    max: Math.min(window.max, target.max),
  };
  if (effective.min > effective.max) {
    return { label, column: window, status: "no_overlap" };
  }

  const inTarget = abundanceInWindow(proteins, effective.min, effective.max);
  const inColumn = abundanceInWindow(proteins, window.min, window.max);
  if (inColumn <= 0) {
    return { label, column: window, status: "no_abundance", effective, inTarget, inColumn, score: 0 };
  }

  return { label, column: window, status: "scored", effective, inTarget, inColumn, score: inTarget / inColumn };
}

export interface RecommendOptions {
  /** Checked before each column is scored; returning false cancels */
  shouldContinue?: () => boolean;
  /** Module id reported in errors */
  moduleId?: string;
}

/**
 * Score every column in catalog order. Scoring only reads the pool.
 *
 * @throws RunCancelledError when `shouldContinue` returns false
 */
export function scoreColumns(
  proteins: readonly Protein[],
  target: WeightWindow,
  catalog: ColumnCatalog,
  options: RecommendOptions = {}
): ColumnScore[] {
  const ordered = orderWindow(target.min, target.max);
  const scores: ColumnScore[] = [];
  for (const column of catalog) {
    if (options.shouldContinue && !options.shouldContinue()) {
      throw new RunCancelledError(options.moduleId ?? SEC_MODULE_ID);
    }
    scores.push(scoreColumn(proteins, ordered, column));
  }
  return scores;
}

export type SecRecommendation =
  | {
      readonly label: string;
      readonly effective: WeightWindow;
      readonly score: number;
      readonly scores: readonly ColumnScore[];
    }
  | {
      readonly label: null;
      readonly effective: null;
      readonly score: null;
      readonly scores: readonly ColumnScore[];
    };

/**
 * Pick the column with the best purity for the target window and apply it.
 * Without a usable column the pool is left unfiltered and every record is
 * annotated with {@link NO_SUITABLE_COLUMN_NOTE}.
 */
export function recommendColumn(
  pool: ProteinPool,
  target: WeightWindow,
  catalog: ColumnCatalog,
  options: RecommendOptions = {}
): SecRecommendation {
  const scores = scoreColumns(pool.getAll(), target, catalog, options);

  let best: { label: string; effective: WeightWindow; score: number } | null = null;
  for (const entry of scores) {
    if (entry.status === "scored" && (best === null || entry.score > best.score)) {
      best = { label: entry.label, effective: entry.effective, score: entry.score };
    }
  }

  if (best === null) {
    pool.annotateAll(NO_SUITABLE_COLUMN_NOTE);
    return { label: null, effective: null, score: null, scores };
  }

  simulateSec(pool, best.effective, best.label);
  return { ...best, scores };
}

// ============================================================
// Module handler
// ============================================================

function isSecMode(value: OptionValue): value is SecMode {
  return SEC_MODES.some((mode) => mode === value);
}

function columnOptions(context: ModuleContext): Readonly<Record<string, OptionValue>> {
  const { moduleId, schema } = context;
  const definition = schema[moduleId];
  if (definition === undefined) {
    throw new UnknownModuleError(moduleId, SEC_SETTINGS.column, Object.keys(schema));
  }
  const field = definition.settings[SEC_SETTINGS.column];
  if (field === undefined) {
    throw new UnknownSettingError(moduleId, SEC_SETTINGS.column, Object.keys(definition.settings));
  }
  if (field.kind !== "choice") {
    throw new SettingKindMismatchError(moduleId, SEC_SETTINGS.column, "choice", field.kind);
  }
  return field.options;
}

function runSimulate(context: ModuleContext): ModuleOutcome {
  const { moduleId, settings, schema, pool, logger } = context;
  const range = resolveChoice(SEC_SETTINGS.column, moduleId, settings, schema);
  const label = String(settings[SEC_SETTINGS.column]);
  const window = readColumnWindow(range, label, moduleId);

  const before = pool.size;
  simulateSec(pool, window, label);
  logger.info("SEC simulated", {
    moduleId,
    column: label,
    window,
    retained: pool.size,
    removed: before - pool.size,
  });

  return { selectedLabel: label };
}

function runRecommend(context: ModuleContext): ModuleOutcome {
  const { moduleId, settings, schema, pool, logger, shouldContinue } = context;
  const target = orderWindow(
    resolveDecimal(SEC_SETTINGS.targetMin, moduleId, settings, schema),
    resolveDecimal(SEC_SETTINGS.targetMax, moduleId, settings, schema)
  );
  const catalog = buildColumnCatalog(columnOptions(context), moduleId);

  const before = pool.size;
  const recommendation = recommendColumn(pool, target, catalog, { shouldContinue, moduleId });
  for (const entry of recommendation.scores) {
    logger.debug("SEC column scored", { moduleId, ...entry });
  }

  if (recommendation.label === null) {
    logger.warn("SEC found no suitable column", { moduleId, target, columns: catalog.length });
    return { selectedLabel: null };
  }

  settings[SEC_SETTINGS.column] = recommendation.label;
  logger.info("SEC column recommended", {
    moduleId,
    column: recommendation.label,
    score: recommendation.score,
    window: recommendation.effective,
    retained: pool.size,
    removed: before - pool.size,
  });
  return { selectedLabel: recommendation.label };
}

export const sizeExclusionModule: ModuleHandler<typeof SEC_MODULE_ID> = {
  id: SEC_MODULE_ID,
  name: "Size-exclusion chromatography",
  run(context) {
    const mode = resolveChoice(SEC_SETTINGS.mode, context.moduleId, context.settings, context.schema);
    if (!isSecMode(mode)) {
      throw new InvalidModeError(context.moduleId, mode, SEC_MODES);
    }
    switch (mode) {
      case "simulate":
        return runSimulate(context);
      case "recommend":
        return runRecommend(context);
    }
  },
};
