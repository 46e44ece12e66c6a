/**
 * FASTA input module.
 *
 * Loads the selected sequence file and replaces the pool contents with one
 * protein record per entry. A load always starts from an empty pool.
 */

import { isAbsolute, resolve } from "node:path";
import { readFastaFile, proteinsFromFasta } from "../proteins/fasta.js";
import { resolveChoice } from "../settings/resolver.js";
import { TypeConversionError } from "../settings/errors.js";
import type { ModuleHandler } from "../types/module.js";

export const FASTA_INPUT_MODULE_ID = "fasta_input";

export const FASTA_FILE_SETTING = "Select FASTA file";

export const fastaInputModule: ModuleHandler<typeof FASTA_INPUT_MODULE_ID> = {
  id: FASTA_INPUT_MODULE_ID,
  name: "FASTA input",
  run({ moduleId, settings, schema, pool, logger, dataDir }) {
    const fileName = resolveChoice(FASTA_FILE_SETTING, moduleId, settings, schema);
    if (typeof fileName !== "string") {
      throw new TypeConversionError(moduleId, FASTA_FILE_SETTING, fileName, "a file path");
    }
    const filePath = isAbsolute(fileName) ? fileName : resolve(dataDir, fileName);

    const proteins = proteinsFromFasta(readFastaFile(filePath));
    pool.clearAll();
    pool.addAll(proteins);

    logger.info("FASTA loaded", { moduleId, file: filePath, proteins: proteins.length });
    return { selectedLabel: null };
  },
};
