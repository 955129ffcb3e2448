/**
 * In-memory logger.
 * Keeps every entry in an array; children share the parent's array.
 */

import type { LogContext, Logger, LogLevel } from "./logger.js";

export interface MemoryLogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
}

export interface MemoryLogger extends Logger {
  readonly entries: MemoryLogEntry[];
  /** Messages of entries whose context matches every given key */
  messages(filter?: LogContext): string[];
}

export function createMemoryLogger(
  bindings: LogContext = {},
  entries: MemoryLogEntry[] = []
): MemoryLogger {
  const push = (level: LogLevel, message: string, context?: LogContext): void => {
    entries.push({ level, message, context: { ...bindings, ...context } });
  };

  return {
    entries,
    debug: (message, context) => push("debug", message, context),
    info: (message, context) => push("info", message, context),
    warn: (message, context) => push("warn", message, context),
    error: (message, context) => push("error", message, context),
    child: (extra) => createMemoryLogger({ ...bindings, ...extra }, entries),
    messages(filter = {}) {
      return entries
        .filter((entry) =>
          Object.entries(filter).every(([key, value]) => entry.context[key] === value)
        )
        .map((entry) => entry.message);
    },
  };
}
