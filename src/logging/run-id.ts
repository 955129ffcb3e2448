/**
 * Run ID generation and management.
 *
 * Every flow run gets its own ID. The ID is carried through async calls
 * with AsyncLocalStorage, so entries logged by concurrently running steps
 * are tagged with the run they belong to. Outside a run scope the
 * process-wide ID (if initialized) is used.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

const scope = new AsyncLocalStorage<string>();

/** Process-wide run ID, used outside any run scope */
let processRunId: string | null = null;

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/**
 * Initialize the process-wide run ID.
 */
export function initRunId(): string {
  processRunId = generateRunId();
  return processRunId;
}

/**
 * Run a function with the given run ID in scope.
 */
export function runWithRunId<T>(runId: string, fn: () => T): T {
  return scope.run(runId, fn);
}

/**
 * Get the current run ID: the scoped one, else the process-wide one.
 * Returns null if neither is set.
 */
export function getRunId(): string | null {
  return scope.getStore() ?? processRunId;
}
