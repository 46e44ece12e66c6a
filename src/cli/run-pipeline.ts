#!/usr/bin/env node
/**
 * CLI command to run a pipeline file against the module definitions.
 *
 * Usage:
 *   npx tsx src/cli/run-pipeline.ts --pipeline pipelines/sec-recommend.json
 *   npm run run-pipeline -- --pipeline <path> [options]
 *
 * Options:
 *   --pipeline <path>   Pipeline run JSON (required)
 *   --modules <dir>     Module definitions directory (default: $MODULES_DIR or modules/)
 *   --data <dir>        Directory FASTA options are resolved against (default: $DATA_DIR or data/)
 *   --verbose           List the proteins left after each stage
 *   --json              Print the full report as JSON
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Pipeline completed
 *   1 - Invalid input or a stage failed
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { config, validateConfig } from "../config/index.js";
import { createLogger, initRunId } from "../logging/index.js";
import { loadModuleDefinitionsFromDir, ModuleSchemaError } from "../schema/index.js";
import {
  formatPipelineReport,
  loadPipelineRunFromFile,
  PipelineValidationError,
  runPipeline,
} from "../pipeline/index.js";

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      pipeline: { type: "string" },
      modules: { type: "string", default: config.modulesDir },
      data: { type: "string", default: config.dataDir },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return values;
}

function printHelp(): void {
  console.log(`
Usage: run-pipeline --pipeline <path> [options]

Options:
  --pipeline <path>   Pipeline run JSON (required)
  --modules <dir>     Module definitions directory (default: ${config.modulesDir})
  --data <dir>        Directory FASTA options are resolved against (default: ${config.dataDir})
  --verbose           List the proteins left after each stage
  --json              Print the full report as JSON
  -h, --help          Show this help message

Exit codes:
  0 - Pipeline completed
  1 - Invalid input or a stage failed
`);
}

// ============================================================
// Main
// ============================================================

function main(): void {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (!args.pipeline) {
    console.error("Error: --pipeline is required");
    console.error("  Usage: npm run run-pipeline -- --pipeline <path>");
    process.exit(1);
  }

  initRunId();
  const logger = createLogger({ level: validateConfig(), console: !args.json });

  const definitions = loadModuleDefinitionsFromDir(resolve(args.modules ?? config.modulesDir));
  const pipeline = loadPipelineRunFromFile(resolve(args.pipeline));
  const report = runPipeline(pipeline, definitions, {
    dataDir: resolve(args.data ?? config.dataDir),
    logger,
  });

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    console.log(formatPipelineReport(report, args.verbose));
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("run-pipeline.ts") ||
   process.argv[1].endsWith("run-pipeline.js"));

if (isDirectExecution) {
  try {
    main();
  } catch (err) {
    if (err instanceof ModuleSchemaError || err instanceof PipelineValidationError) {
      console.error(err.format());
    } else {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}
