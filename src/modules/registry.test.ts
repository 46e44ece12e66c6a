/**
 * Module dispatcher tests.
 *
 * Run: node --import tsx src/modules/registry.test.ts
 */

import { strict as assert } from "node:assert";
import { fileURLToPath } from "node:url";

import { dispatch, isModuleId, MODULE_IDS } from "./registry.js";
import { InvalidModeError, MalformedColumnSpecError, ModuleNotImplementedError } from "./errors.js";
import { Protein } from "../proteins/protein.js";
import { ProteinPool } from "../proteins/pool.js";
import { loadModuleDefinitionsFromDir } from "../schema/loader.js";
import type { ModuleDefinitions } from "../schema/schema.js";
import { createLogger } from "../logging/logger.js";
import type { ModuleSession, SelectedSettings } from "../types/module.js";

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

const MODULES_DIR = fileURLToPath(new URL("../../modules", import.meta.url));
const DATA_DIR = fileURLToPath(new URL("../../data", import.meta.url));
const DEFINITIONS = loadModuleDefinitionsFromDir(MODULES_DIR);

function makeProtein(accession: string, weight: number | null, abundance: number): Protein {
  return new Protein({ header: `sp|${accession}|TEST`, sequence: "", weight, abundance });
}

function makeSession(pool: ProteinPool): ModuleSession {
  return { pool, logger: createLogger({ console: false, file: false }), dataDir: DATA_DIR };
}

// ═══════════════════════════════════════════════════════════════════════════
// Tests
// ═══════════════════════════════════════════════════════════════════════════

test("implemented modules are the registered handlers", () => {
  assert.deepEqual(MODULE_IDS, ["fasta_input", "size_exclusion"]);
  assert.equal(isModuleId("size_exclusion"), true);
  assert.equal(isModuleId("western_blot"), false);
});

test("unregistered module fails with the implemented list", () => {
  assert.throws(
    () => dispatch("western_blot", {}, DEFINITIONS, makeSession(new ProteinPool())),
    (err: unknown) =>
      err instanceof ModuleNotImplementedError &&
      err.message === "Module: western_blot is not implemented. Implemented modules: [fasta_input, size_exclusion]"
  );
});

test("FASTA input replaces whatever the pool held", () => {
  const pool = new ProteinPool([makeProtein("OLD", 1, 1)]);
  const result = dispatch(
    "fasta_input",
    { "Select FASTA file": "Example mixture" },
    DEFINITIONS,
    makeSession(pool)
  );
  assert.equal(result.selectedLabel, null);
  assert.deepEqual(
    result.proteins.map((protein) => protein.accession),
    ["Q0TEST1", "Q0TEST2", "Q0TEST3", "Q0TEST4"]
  );
  assert.equal(pool.size, 4);
});

test("SEC simulate filters with the selected column", () => {
  const pool = new ProteinPool([makeProtein("P5", 5, 1), makeProtein("P50", 50, 1)]);
  const result = dispatch(
    "size_exclusion",
    { "SEC mode": "Simulate", "SEC column": "Superdex 30 Increase" },
    DEFINITIONS,
    makeSession(pool)
  );
  assert.equal(result.moduleId, "size_exclusion");
  assert.equal(result.selectedLabel, "Superdex 30 Increase");
  assert.deepEqual(result.proteins.map((protein) => protein.accession), ["P5"]);
  assert.deepEqual(result.proteins[0]?.modifications, ["SEC: Superdex 30 Increase"]);
});

test("SEC recommend applies the best column and writes it back", () => {
  const pool = new ProteinPool([makeProtein("P3", 3, 10), makeProtein("P20", 20, 5)]);
  const settings: SelectedSettings = {
    "SEC mode": "Recommend",
    "Target minimum MW (kDa)": "1",
    "Target maximum MW (kDa)": "5",
  };
  const result = dispatch("size_exclusion", settings, DEFINITIONS, makeSession(pool));

  assert.equal(result.selectedLabel, "Superdex 30 Increase");
  assert.equal(settings["SEC column"], "Superdex 30 Increase");
  assert.deepEqual(result.proteins.map((protein) => protein.accession), ["P3"]);
  assert.deepEqual(result.proteins[0]?.modifications, ["SEC: Superdex 30 Increase"]);
});

test("SEC recommend without a usable column keeps the selection as is", () => {
  const pool = new ProteinPool([makeProtein("P3", 3, 10)]);
  const settings: SelectedSettings = {
    "SEC mode": "Recommend",
    "SEC column": "Superose 6 Increase",
    "Target minimum MW (kDa)": "6000",
    "Target maximum MW (kDa)": "8000",
  };
  const result = dispatch("size_exclusion", settings, DEFINITIONS, makeSession(pool));

  assert.equal(result.selectedLabel, null);
  assert.equal(settings["SEC column"], "Superose 6 Increase");
  assert.deepEqual(result.proteins[0]?.modifications, [
    "SEC: no suitable column found for target window",
  ]);
});

const ODD_SCHEMA: ModuleDefinitions = {
  size_exclusion: {
    id: "size_exclusion",
    name: "SEC",
    settings: {
      "SEC mode": { kind: "choice", options: { Simulate: "simulate", Gradient: "gradient" } },
      "SEC column": { kind: "choice", options: { Broken: "not a range" } },
    },
  },
};

test("unknown SEC mode value fails", () => {
  assert.throws(
    () =>
      dispatch(
        "size_exclusion",
        { "SEC mode": "Gradient", "SEC column": "Broken" },
        ODD_SCHEMA,
        makeSession(new ProteinPool())
      ),
    InvalidModeError
  );
});

test("column without a numeric range fails", () => {
  assert.throws(
    () =>
      dispatch(
        "size_exclusion",
        { "SEC mode": "Simulate", "SEC column": "Broken" },
        ODD_SCHEMA,
        makeSession(new ProteinPool())
      ),
    (err: unknown) => err instanceof MalformedColumnSpecError && err.label === "Broken"
  );
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
