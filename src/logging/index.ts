/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogContext,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
