/**
 * Logger Tests
 *
 * Run with: npm test
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger, formatLogEntry } from "./logger.js";
import { createMemoryLogger } from "./memory.js";
import { generateRunId, getRunId, runWithRunId } from "./run-id.js";

const AT = new Date("2025-01-06T12:30:00.000Z");

describe("formatLogEntry", () => {
  test("includes timestamp, padded level and run ID", () => {
    const line = runWithRunId("20250106-abcdef", () => formatLogEntry("info", "Hello", {}, AT));
    assert.equal(line, "[2025-01-06T12:30:00.000Z] [INFO ] [20250106-abcdef] Hello");
  });

  test("appends context as JSON", () => {
    const line = runWithRunId("r1", () =>
      formatLogEntry("error", "Step failed", { step: "inc", worker: "worker-0" }, AT)
    );
    assert.equal(
      line,
      '[2025-01-06T12:30:00.000Z] [ERROR] [r1] Step failed {"step":"inc","worker":"worker-0"}'
    );
  });
});

describe("run IDs", () => {
  test("generateRunId uses the date and a random suffix", () => {
    assert.match(generateRunId(AT), /^20250106-[0-9a-f]{6}$/);
  });

  test("scoped run IDs follow async calls", async () => {
    const seen = await runWithRunId("scoped-1", async () => {
      await new Promise((resolve) => setImmediate(resolve));
      return getRunId();
    });
    assert.equal(seen, "scoped-1");
  });

  test("concurrent scopes don't leak into each other", async () => {
    const read = (id: string) =>
      runWithRunId(id, async () => {
        await new Promise((resolve) => setImmediate(resolve));
        return getRunId();
      });
    assert.deepEqual(await Promise.all([read("a"), read("b")]), ["a", "b"]);
  });
});

describe("createLogger", () => {
  test("appends entries at or above the level to every file", () => {
    const dir = mkdtempSync(join(tmpdir(), "batchflow-log-"));
    try {
      const first = join(dir, "nested", "first.log");
      const second = join(dir, "second.log");
      const logger = createLogger({ level: "info", console: false, files: [first, second] });

      runWithRunId("run-1", () => {
        logger.debug("hidden");
        logger.child({ flow: "basic-flow" }).warn("careful");
      });

      for (const file of [first, second]) {
        const lines = readFileSync(file, "utf8").trimEnd().split("\n");
        assert.equal(lines.length, 1);
        assert.match(lines[0] ?? "", /\[WARN \] \[run-1\] careful \{"flow":"basic-flow"\}$/);
      }
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("createMemoryLogger", () => {
  test("children share entries and merge bindings", () => {
    const logger = createMemoryLogger({ flow: "f" });
    logger.child({ step: "a" }).info("from a");
    logger.info("from flow");

    assert.equal(logger.entries.length, 2);
    assert.deepEqual(logger.entries[0]?.context, { flow: "f", step: "a" });
    assert.deepEqual(logger.messages({ step: "a" }), ["from a"]);
    assert.deepEqual(logger.messages(), ["from a", "from flow"]);
  });
});
