/**
 * Per-run metadata blackboard.
 *
 * Steps use the board to hand derived facts to later steps (e.g. "records
 * whose state changed this run") without widening step interfaces. Writes
 * overwrite. A new board is created for every flow run.
 *
 * Values are untyped on the way in; readers validate the shape they expect
 * with a zod schema and treat a mismatch as "absent".
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { Logger } from "../logging/index.js";

export class MetadataBoard {
  private readonly entries = new Map<string, unknown>();

  set(key: string, value: unknown): void {
    this.entries.set(key, value);
  }

  get(key: string): unknown {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Read a metadata entry and check its shape.
 * Returns undefined when the entry is absent, or present with the wrong
 * shape (logged as a warning).
 */
export function readMetadata<T>(
  board: MetadataBoard,
  key: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  logger: Logger
): T | undefined {
  if (!board.has(key)) {
    return undefined;
  }
  const result = schema.safeParse(board.get(key));
  if (!result.success) {
    logger.warn(`Ignoring metadata "${key}": unexpected shape`, {
      issues: result.error.issues.map((issue) => issue.message),
    });
    return undefined;
  }
  return result.data;
}
