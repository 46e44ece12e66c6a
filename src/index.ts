/**
 * Entry point: validate configuration and check that every module
 * definition on disk has a handler, and every handler a definition.
 */

import { resolve } from "node:path";
import { config, validateConfig, ConfigError } from "./config/index.js";
import { initRunId, createLogger } from "./logging/index.js";
import { loadModuleDefinitionsFromDir, ModuleSchemaError } from "./schema/index.js";
import { MODULE_IDS, isModuleId } from "./modules/index.js";

function main(): void {
  const runId = initRunId();

  let logger = createLogger({ console: true, file: false });

  try {
    const level = validateConfig();
    logger = createLogger({ level });

    logger.info("Application starting", { runId });
    logger.info("Configuration loaded", {
      env: config.env,
      debug: config.debug,
      logLevel: level,
      appName: config.appName,
      modulesDir: config.modulesDir,
      dataDir: config.dataDir,
    });

    const definitions = loadModuleDefinitionsFromDir(resolve(config.modulesDir));
    const defined = Object.keys(definitions);
    logger.info("Module definitions loaded", { modules: defined });

    for (const moduleId of defined) {
      if (!isModuleId(moduleId)) {
        logger.warn("Module is defined but has no handler", { moduleId });
      }
    }
    for (const moduleId of MODULE_IDS) {
      if (!defined.includes(moduleId)) {
        logger.warn("Module handler has no definition", { moduleId });
      }
    }

    logger.info("Application initialized successfully");
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error("Configuration error", { message: err.message });
      process.exit(1);
    }
    if (err instanceof ModuleSchemaError) {
      logger.error("Module definitions are invalid", { details: err.format() });
      process.exit(1);
    }
    throw err;
  }
}

main();
