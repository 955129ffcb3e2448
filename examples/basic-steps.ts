/**
 * Step types for the basic integer flow.
 *
 * Records are plain integers, stored one per line in a text file.
 */

import { existsSync, statSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import {
  ValidationError,
  configField,
  definePropagateStep,
  defineRecordStep,
  defineRecordStorage,
  defineUpdateStep,
  lockIdFor,
  withGLock,
  type GLockOptions,
} from "../src/index.js";

/**
 * Parse a records file. Blank lines are skipped.
 */
export function parseIntegers(text: string, source: string): number[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "")
    .map((line) => {
      if (!/^-?\d+$/.test(line)) {
        throw new Error(`${source} contains a line that isn't an integer: "${line}"`);
      }
      return Number.parseInt(line, 10);
    });
}

// ============================================================
// Storage
// ============================================================

/**
 * File-backed integer storage. Reads and writes are guarded by a global
 * lock on the file, so flows in separate processes may share it.
 */
export function integerFileStorage(lockOptions: GLockOptions = {}) {
  return defineRecordStorage<number>()({
    typeName: "IntegerFileStorage",
    description: "Stores integer records in a file, one per line",
    config: {
      filePath: configField.string("The path to a file to store records in"),
    },
    async validate(config, { stepName }) {
      if (!existsSync(config.filePath)) {
        await writeFile(config.filePath, "");
        return;
      }
      if (!statSync(config.filePath).isFile()) {
        throw new ValidationError(stepName, `${config.filePath} exists, but isn't a file`);
      }
      parseIntegers(await readFile(config.filePath, "utf8"), config.filePath);
    },
    create: (config) => {
      const lockId = lockIdFor(config.filePath);
      return {
        getRecords: (ctx) =>
          withGLock(
            lockId,
            "shared",
            async () => {
              const records = parseIntegers(
                await readFile(config.filePath, "utf8"),
                config.filePath
              );
              if (ctx.debug) {
                ctx.log(`DEBUG: Found ${records.length} records in ${config.filePath}`);
              }
              return records;
            },
            lockOptions
          ),
        setRecords: (records, ctx) =>
          withGLock(
            lockId,
            "exclusive",
            async () => {
              if (ctx.debug) {
                ctx.log(`DEBUG: Not writing ${records.length} records to ${config.filePath}`);
                return;
              }
              await writeFile(config.filePath, records.map(String).join("\n"));
            },
            lockOptions
          ),
      };
    },
  });
}

// ============================================================
// Steps
// ============================================================

export const AppendInteger = defineRecordStep<number>()({
  typeName: "AppendInteger",
  description: "Adds a new integer record",
  config: {
    value: configField.int("The integer to add"),
  },
  create: (config) => ({
    newRecords(records, ctx) {
      if (ctx.debug) {
        ctx.log(`DEBUG: Adding new record: ${config.value}`);
      }
      return [...records, config.value];
    },
  }),
});

export const Increment = defineUpdateStep<number>()({
  typeName: "Increment",
  description: "Increments every record",
  config: {
    increment: configField.int("The amount to increment by"),
  },
  validate(config) {
    if (config.increment < 0) {
      throw new Error("The increment must not be negative");
    }
  },
  create: (config) => ({
    async updateRecords(slots, ctx) {
      for (const slot of slots) {
        await slot.update((record) => {
          const next = record + config.increment;
          if (ctx.debug) {
            ctx.log(`DEBUG: Incrementing ${record} -> ${next}`);
          }
          return next;
        });
      }
    },
  }),
});

export const LogSum = definePropagateStep<number>()({
  typeName: "LogSum",
  description: "Logs the sum of all records",
  config: {},
  create: () => ({
    async propagateRecords(slots, ctx) {
      let sum = 0;
      for (const slot of slots) {
        const record = await slot.withLock((value) => value);
        if (ctx.debug) {
          ctx.log(`DEBUG: Adding ${record} to sum...`);
        }
        sum += record;
      }
      ctx.log(`Record sum: ${sum}`);
    },
  }),
});
