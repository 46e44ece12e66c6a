/**
 * Processing modules and the dispatcher that runs them.
 */

export {
  MODULE_HANDLERS,
  MODULE_IDS,
  dispatch,
  getModuleHandler,
  isModuleId,
  type ModuleId,
} from "./registry.js";

export { fastaInputModule, FASTA_INPUT_MODULE_ID, FASTA_FILE_SETTING } from "./fasta-input.js";

export {
  sizeExclusionModule,
  SEC_MODULE_ID,
  SEC_SETTINGS,
  SEC_MODES,
  NO_SUITABLE_COLUMN_NOTE,
  abundanceInWindow,
  buildColumnCatalog,
  columnNote,
  normalizeWindow,
  orderWindow,
  readColumnWindow,
  recommendColumn,
  scoreColumn,
  scoreColumns,
  simulateSec,
  type ColumnCatalog,
  type ColumnScore,
  type RecommendOptions,
  type SecColumn,
  type SecMode,
  type SecRecommendation,
} from "./size-exclusion.js";

export {
  ModuleExecutionError,
  ModuleNotImplementedError,
  InvalidModeError,
  MalformedColumnSpecError,
  RunCancelledError,
} from "./errors.js";
