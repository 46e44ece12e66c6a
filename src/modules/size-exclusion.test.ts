/**
 * Size-exclusion chromatography tests.
 *
 * Run: node --import tsx src/modules/size-exclusion.test.ts
 *
 * Tests cover:
 *   1. Window ordering and clamping
 *   2. Column specs read from option values
 *   3. Simulation filters and annotates
 *   4. Column scoring and recommendation
 */

import { strict as assert } from "node:assert";

import { Protein } from "../proteins/protein.js";
import { ProteinPool } from "../proteins/pool.js";
import {
  NO_SUITABLE_COLUMN_NOTE,
  normalizeWindow,
  readColumnWindow,
  buildColumnCatalog,
  simulateSec,
  abundanceInWindow,
  scoreColumn,
  scoreColumns,
  recommendColumn,
  type ColumnCatalog,
} from "./size-exclusion.js";
import { MalformedColumnSpecError, RunCancelledError } from "./errors.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function makeProtein(accession: string, weight: number | null, abundance: number): Protein {
  return new Protein({ header: `sp|${accession}|TEST`, sequence: "", weight, abundance });
}

function accessions(pool: ProteinPool): string[] {
  return pool.getAll().map((protein) => protein.accession);
}

const TWO_COLUMNS: ColumnCatalog = [
  { label: "A", window: { min: 0, max: 100 } },
  { label: "B", window: { min: 100, max: 200 } },
];

// ═══════════════════════════════════════════════════════════════════════════
// WINDOWS AND COLUMN SPECS
// ═══════════════════════════════════════════════════════════════════════════

section("Windows and column specs");

test("windows are ordered and clamped at zero", () => {
  assert.deepEqual(normalizeWindow(-5, 10), { min: 0, max: 10 });
  assert.deepEqual(normalizeWindow(10, -5), { min: 0, max: 10 });
  assert.deepEqual(normalizeWindow(70, 3), { min: 3, max: 70 });
});

test("column option value is read as an ordered pair", () => {
  assert.deepEqual(readColumnWindow([70, 3], "Reversed"), { min: 3, max: 70 });
});

test("anything but a pair of numbers is malformed", () => {
  assert.throws(() => readColumnWindow("abc", "Text"), MalformedColumnSpecError);
  assert.throws(() => readColumnWindow([1], "Short"), MalformedColumnSpecError);
  assert.throws(() => readColumnWindow([1, 2, 3], "Long"), MalformedColumnSpecError);
  assert.throws(
    () => readColumnWindow(5, "Scalar"),
    (err: unknown) => err instanceof MalformedColumnSpecError && err.label === "Scalar"
  );
});

test("catalog keeps option order", () => {
  const catalog = buildColumnCatalog({ Second: [10, 20], First: [0, 5] });
  assert.deepEqual(
    catalog.map((column) => column.label),
    ["Second", "First"]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// SIMULATE
// ═══════════════════════════════════════════════════════════════════════════

section("Simulate");

test("keeps records inside the window and annotates them", () => {
  const pool = new ProteinPool([
    makeProtein("P5", 5, 1),
    makeProtein("P50", 50, 1),
    makeProtein("P70", 70, 1),
    makeProtein("PX", null, 1),
  ]);
  simulateSec(pool, { min: 3, max: 70 }, "Superdex 75 Increase");
  assert.deepEqual(accessions(pool), ["P5", "P50", "P70"]);
  assert.deepEqual(pool.getAll()[2]?.modifications, ["SEC: Superdex 75 Increase"]);
});

test("negative bounds are clamped before filtering", () => {
  const pool = new ProteinPool([makeProtein("P0", 0, 1), makeProtein("P2", 2, 1)]);
  simulateSec(pool, { min: -10, max: 1 }, null);
  assert.deepEqual(accessions(pool), ["P0"]);
  assert.deepEqual(pool.getAll()[0]?.modifications, []);
});

// ═══════════════════════════════════════════════════════════════════════════
// RECOMMEND
// ═══════════════════════════════════════════════════════════════════════════

section("Recommend");

test("abundance counts known weights with positive abundance", () => {
  const proteins = [
    makeProtein("P1", 10, 4),
    makeProtein("P2", 20, 0),
    makeProtein("P3", null, 7),
    makeProtein("P4", 30, 2),
  ];
  assert.equal(abundanceInWindow(proteins, 30, 0), 6);
});

test("tied purity goes to the column listed first", () => {
  const pool = new ProteinPool([makeProtein("P1", 50, 10), makeProtein("P2", 150, 5)]);
  const recommendation = recommendColumn(pool, { min: 40, max: 160 }, TWO_COLUMNS);

  assert.equal(recommendation.label, "A");
  assert.equal(recommendation.score, 1);
  assert.deepEqual(recommendation.effective, { min: 40, max: 100 });
  assert.deepEqual(accessions(pool), ["P1"]);
  assert.deepEqual(pool.getAll()[0]?.modifications, ["SEC: A"]);
});

test("column catching other proteins scores below 1", () => {
  const proteins = [makeProtein("P1", 50, 10), makeProtein("P3", 90, 10)];
  const score = scoreColumn(proteins, { min: 40, max: 60 }, { label: "A", window: { min: 0, max: 100 } });
  assert.equal(score.status, "scored");
  assert.ok(score.status !== "no_overlap");
  assert.equal(score.inTarget, 10);
  assert.equal(score.inColumn, 20);
  assert.equal(score.score, 0.5);
});

test("purer column wins over one listed earlier", () => {
  const pool = new ProteinPool([makeProtein("P1", 50, 10), makeProtein("P2", 150, 10)]);
  const catalog: ColumnCatalog = [
    { label: "Wide", window: { min: 0, max: 200 } },
    { label: "Narrow", window: { min: 0, max: 100 } },
  ];
  const recommendation = recommendColumn(pool, { min: 0, max: 100 }, catalog);
  assert.equal(recommendation.label, "Narrow");
  assert.deepEqual(recommendation.scores.map((entry) => entry.status), ["scored", "scored"]);
});

test("reversed target bounds are ordered before scoring", () => {
  const scores = scoreColumns([makeProtein("P1", 50, 10)], { min: 160, max: 40 }, TWO_COLUMNS);
  const first = scores[0];
  assert.ok(first && first.status !== "no_overlap");
  assert.deepEqual(first.effective, { min: 40, max: 100 });
});

test("no overlapping column leaves the pool and notes why", () => {
  const pool = new ProteinPool([makeProtein("P1", 50, 10), makeProtein("P2", 150, 5)]);
  const recommendation = recommendColumn(pool, { min: 300, max: 400 }, TWO_COLUMNS);

  assert.equal(recommendation.label, null);
  assert.deepEqual(recommendation.scores.map((entry) => entry.status), ["no_overlap", "no_overlap"]);
  assert.deepEqual(accessions(pool), ["P1", "P2"]);
  assert.deepEqual(
    pool.getAll().map((protein) => protein.modifications),
    [[NO_SUITABLE_COLUMN_NOTE], [NO_SUITABLE_COLUMN_NOTE]]
  );
});

test("empty pool has no usable column", () => {
  const pool = new ProteinPool();
  const recommendation = recommendColumn(pool, { min: 0, max: 50 }, TWO_COLUMNS);
  assert.equal(recommendation.label, null);
  assert.deepEqual(recommendation.scores.map((entry) => entry.status), ["no_abundance", "no_overlap"]);
  assert.equal(pool.size, 0);
});

test("cancellation stops scoring before the pool changes", () => {
  const pool = new ProteinPool([makeProtein("P1", 50, 10), makeProtein("P2", 150, 5)]);
  let calls = 0;
  assert.throws(
    () =>
      recommendColumn(pool, { min: 40, max: 160 }, TWO_COLUMNS, {
        shouldContinue: () => ++calls < 2,
        moduleId: "sec-test",
      }),
    (err: unknown) => err instanceof RunCancelledError && err.moduleId === "sec-test"
  );
  assert.equal(calls, 2);
  assert.deepEqual(accessions(pool), ["P1", "P2"]);
  assert.deepEqual(pool.getAll()[0]?.modifications, []);
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
