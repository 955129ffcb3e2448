/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId, runWithRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";
export { createMemoryLogger, type MemoryLogger, type MemoryLogEntry } from "./memory.js";
