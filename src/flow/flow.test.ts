/**
 * Flow Tests
 *
 * Run with: npm test
 *
 * These tests verify:
 *   1. Registration rules (flat namespace, same-phase dependencies)
 *   2. Configuration documents are validated as a whole, once
 *   3. A run goes storage → record → update → propagate → storage
 *   4. Excluded steps are skipped and satisfy their dependents
 *   5. Steps touching different records don't wait on each other, and
 *      steps touching the same record don't lose updates
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { tmpdir } from "node:os";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { createMemoryLogger, type MemoryLogger } from "../logging/index.js";
import { createFlow, type Flow } from "./flow.js";
import {
  configField,
  definePropagateStep,
  defineRecordStep,
  defineRecordStorage,
  defineUpdateStep,
  type UpdateStep,
} from "./step.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function memoryStorage(initial: number[] = []) {
  const stored = { records: [...initial], writes: 0 };
  const type = defineRecordStorage<number>()({
    typeName: "MemoryStorage",
    description: "Keeps records in memory",
    config: {},
    create: () => ({
      getRecords: () => [...stored.records],
      setRecords: (records) => {
        stored.records = records;
        stored.writes++;
      },
    }),
  });
  return { type, stored };
}

const Append = defineRecordStep<number>()({
  typeName: "Append",
  description: "Appends a record",
  config: { value: configField.int("The record to append") },
  create: (config) => ({
    newRecords: (records) => [...records, config.value],
  }),
});

let addValidations = 0;

const Add = defineUpdateStep<number>()({
  typeName: "Add",
  description: "Adds to every record",
  config: { increment: configField.int("The amount to add") },
  validate() {
    addValidations++;
  },
  create: (config) => ({
    async updateRecords(slots) {
      for (const slot of slots) {
        await slot.update((record) => record + config.increment);
      }
    },
  }),
});

const Sum = definePropagateStep<number>()({
  typeName: "Sum",
  description: "Logs the sum of all records",
  config: {},
  create: () => ({
    propagateRecords(slots, ctx) {
      const sum = slots.reduce((total, slot) => total + slot.peek(), 0);
      ctx.log(`Record sum: ${sum}`);
    },
  }),
});

/** Update step type running an arbitrary function */
function customUpdate(run: UpdateStep<number>["updateRecords"]) {
  return defineUpdateStep<number>()({
    typeName: "Custom",
    description: "Runs a test function",
    config: {},
    create: () => ({ updateRecords: run }),
  });
}

function buildFlow(initial: number[] = []) {
  const logger = createMemoryLogger();
  const { type, stored } = memoryStorage(initial);
  const flow = createFlow({
    name: "test-flow",
    description: "A flow under test",
    storageName: "storage",
    storage: type,
    logger,
  })
    .addRecordStep("append", Append)
    .addUpdateStep("increment-2", Add)
    .addUpdateStep("increment-3", Add, ["increment-2"])
    .addPropagateStep("print-sum", Sum);
  return { flow, logger, stored };
}

function configDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    numThreads: 2,
    "storage-mode": "include",
    storage: {},
    "append-mode": "include",
    append: { value: 5 },
    "increment-2-mode": "include",
    "increment-2": { increment: 2 },
    "increment-3-mode": "include",
    "increment-3": { increment: 3 },
    "print-sum-mode": "include",
    "print-sum": {},
    ...overrides,
  };
}

function sums(logger: MemoryLogger): string[] {
  return logger.messages({ step: "print-sum" }).filter((m) => m.startsWith("Record sum"));
}

async function configErrorPaths(flow: Flow<number>, document: unknown): Promise<string[]> {
  try {
    await flow.config(document);
  } catch (err) {
    assert.ok(err instanceof ConfigError);
    return err.issues.map((issue) => issue.path.join("."));
  }
  throw new Error("expected a ConfigError");
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

describe("registration", () => {
  test("step names are unique across phases and the storage", () => {
    const { flow } = buildFlow();
    assert.throws(() => flow.addUpdateStep("append", Add), {
      name: "ConfigError",
      message: "append already exists as a step",
    });
    assert.throws(() => flow.addPropagateStep("storage", Sum), {
      message: "storage already exists as a step",
    });
  });

  test("dependencies must exist", () => {
    const { flow } = buildFlow();
    assert.throws(() => flow.addUpdateStep("x", Add, ["missing"]), {
      message: "x: dependency missing doesn't exist as a step",
    });
  });

  test("dependencies must be in the same phase", () => {
    const { flow } = buildFlow();
    assert.throws(() => flow.addUpdateStep("x", Add, ["append"]), {
      message: "x: dependency append isn't in the update phase",
    });
    assert.throws(() => flow.addPropagateStep("y", Sum, ["increment-2"]), {
      message: "y: dependency increment-2 isn't in the propagate phase",
    });
  });

  test("reserved names are rejected", () => {
    const { flow } = buildFlow();
    assert.throws(() => flow.addUpdateStep("numThreads", Add), ConfigError);
    assert.throws(() => flow.addUpdateStep("_hidden", Add), ConfigError);
    assert.throws(() => flow.addUpdateStep("x-mode", Add), ConfigError);
  });

  test("stepNames lists steps by phase in registration order", () => {
    const { flow } = buildFlow();
    assert.deepEqual(flow.stepNames(), ["append", "increment-2", "increment-3", "print-sum"]);
  });

  test("steps can't be added once configured", async () => {
    const { flow } = buildFlow();
    await flow.config(configDocument());
    assert.throws(() => flow.addUpdateStep("late", Add), {
      message: "Can't add late: flow test-flow is already configured",
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

describe("configuration", () => {
  test("describeConfig lists settings, modes and step fields", () => {
    const { flow } = buildFlow();
    const description = flow.describeConfig();
    assert.deepEqual(Object.keys(description), [
      "numThreads",
      "_description",
      "storage-mode",
      "append-mode",
      "increment-2-mode",
      "increment-3-mode",
      "print-sum-mode",
      "storage",
      "append",
      "increment-2",
      "increment-3",
      "print-sum",
    ]);
    assert.equal(description._description, "A flow under test");
    assert.deepEqual(description["increment-2"], {
      increment: "(int) The amount to add",
      _description: "Adds to every record",
    });
  });

  test("a valid document configures the flow once", async () => {
    const { flow } = buildFlow();
    const before = addValidations;
    await flow.config(configDocument());
    assert.equal(flow.configured, true);
    assert.equal(addValidations - before, 2);
    await assert.rejects(flow.config(configDocument()), {
      message: "Flow test-flow is already configured",
    });
  });

  test("top-level problems are reported together", async () => {
    const { flow } = buildFlow();
    const doc = configDocument({ numThreads: 0, "storage-mode": "exclude", surprise: true });
    delete doc["append-mode"];
    assert.deepEqual(await configErrorPaths(flow, doc), [
      "numThreads",
      "storage-mode",
      "append-mode",
      "surprise",
    ]);
    assert.equal(flow.configured, false);
  });

  test("step blocks are checked against their fields", async () => {
    const { flow } = buildFlow();
    const doc = configDocument({ "increment-3": { increment: "three" } });
    assert.deepEqual(await configErrorPaths(flow, doc), ["increment-3.increment"]);
  });

  test("a failed configuration can be retried", async () => {
    const { flow } = buildFlow();
    await assert.rejects(flow.config(configDocument({ numThreads: "many" })), ConfigError);
    await flow.config(configDocument());
    assert.equal(flow.configured, true);
  });

  test("excluded steps need no block and aren't validated", async () => {
    const { flow } = buildFlow();
    const doc = configDocument({ "increment-2-mode": "exclude" });
    delete doc["increment-2"];
    const before = addValidations;
    await flow.config(doc);
    assert.equal(addValidations - before, 1);
  });

  test("running before configuring fails", async () => {
    const { flow } = buildFlow();
    await assert.rejects(flow.run(), { message: "Flow test-flow isn't configured" });
  });

  test("logfile rejects paths that aren't files", () => {
    const { flow } = buildFlow();
    assert.throws(() => flow.logfile(tmpdir()), ConfigError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// RUNNING
// ═══════════════════════════════════════════════════════════════════════════

describe("run", () => {
  test("appends, increments and sums records", async () => {
    const { flow, logger, stored } = buildFlow();
    await flow.config(configDocument());
    const report = await flow.run();

    assert.deepEqual(report.records, [10]);
    assert.deepEqual(stored.records, [10]);
    assert.deepEqual(sums(logger), ["Record sum: 10"]);
    assert.deepEqual(report.update.outcomes.map((o) => o.name), ["increment-2", "increment-3"]);
    assert.deepEqual(report.propagate.outcomes.map((o) => o.status), ["success"]);
    assert.ok(report.finishedAt >= report.startedAt);
  });

  test("an excluded dependency is skipped without blocking its dependent", async () => {
    const { flow, logger, stored } = buildFlow();
    await flow.config(configDocument({ "increment-2-mode": "exclude" }));
    const report = await flow.run();

    assert.deepEqual(stored.records, [8]);
    assert.deepEqual(sums(logger), ["Record sum: 8"]);
    assert.deepEqual(report.update.excluded, ["increment-2"]);
  });

  test("each run starts from the stored records", async () => {
    const { flow, stored } = buildFlow([1]);
    await flow.config(configDocument());
    await flow.run();
    await flow.run();
    assert.deepEqual(stored.records, [11, 15, 10]);
    assert.equal(stored.writes, 2);
  });

  test("debug mode is passed to the step", async () => {
    const modes: boolean[] = [];
    const { flow } = buildFlow();
    flow.addUpdateStep(
      "probe",
      customUpdate((_slots, ctx) => {
        modes.push(ctx.debug);
      })
    );
    await flow.config(configDocument({ "probe-mode": "debug", probe: {} }));
    await flow.run();
    assert.deepEqual(modes, [true]);
  });

  test("a failing update step doesn't stop the run", async () => {
    const { flow, logger, stored } = buildFlow();
    flow.addUpdateStep(
      "broken",
      customUpdate(() => {
        throw new Error("service unavailable");
      })
    );
    await flow.config(configDocument({ "broken-mode": "include", broken: {} }));
    const report = await flow.run();

    const broken = report.update.outcomes.find((o) => o.name === "broken");
    assert.equal(broken?.status, "failed");
    assert.equal(broken?.error?.message, "Step broken failed: service unavailable");
    assert.deepEqual(stored.records, [10]);
    assert.ok(logger.messages({ outcome: "success" }).length === 1);
  });

  test("a failing record step aborts the run before storing", async () => {
    const { type, stored } = memoryStorage([1]);
    const Explode = defineRecordStep<number>()({
      typeName: "Explode",
      description: "Always fails",
      config: {},
      create: () => ({
        newRecords: () => {
          throw new Error("no records today");
        },
      }),
    });
    const flow = createFlow({
      name: "exploding",
      description: "Fails in the record phase",
      storageName: "storage",
      storage: type,
      logger: createMemoryLogger(),
    }).addRecordStep("explode", Explode);
    await flow.config({
      numThreads: 1,
      "storage-mode": "include",
      storage: {},
      "explode-mode": "include",
      explode: {},
    });

    await assert.rejects(flow.run(), { message: "no records today" });
    assert.equal(stored.writes, 0);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// METADATA
// ═══════════════════════════════════════════════════════════════════════════

describe("metadata", () => {
  test("steps share metadata within a run, and each run starts empty", async () => {
    const seen: (number[] | undefined)[] = [];
    const { flow } = buildFlow();
    flow
      .addUpdateStep(
        "mark",
        customUpdate((slots, ctx) => {
          seen.push(ctx.readMetadata("touched", z.array(z.number())));
          ctx.setMetadata("touched", slots.map((slot) => slot.index));
        })
      )
      .addUpdateStep(
        "read",
        customUpdate((_slots, ctx) => {
          seen.push(ctx.readMetadata("touched", z.array(z.number())));
        }),
        ["mark"]
      );
    await flow.config(
      configDocument({ "mark-mode": "include", mark: {}, "read-mode": "include", read: {} })
    );

    await flow.run();
    await flow.run();
    assert.deepEqual(seen, [undefined, [0], undefined, [0, 1]]);
    assert.deepEqual(flow.getMetadata("touched"), [0, 1]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// RECORD LOCKS
// ═══════════════════════════════════════════════════════════════════════════

describe("record locks", () => {
  test("steps holding different records run at the same time", async () => {
    let firstHeld: () => void = () => undefined;
    let secondHeld: () => void = () => undefined;
    const first = new Promise<void>((resolve) => (firstHeld = resolve));
    const second = new Promise<void>((resolve) => (secondHeld = resolve));

    const { flow, stored } = buildFlow([0, 0]);
    flow
      .addUpdateStep(
        "left",
        customUpdate(async (slots) => {
          await slots[0]?.withLock(async () => {
            firstHeld();
            await second;
          });
        })
      )
      .addUpdateStep(
        "right",
        customUpdate(async (slots) => {
          await slots[1]?.withLock(async () => {
            secondHeld();
            await first;
          });
        })
      );
    await flow.config(
      configDocument({
        numThreads: 4,
        "left-mode": "include",
        left: {},
        "right-mode": "include",
        right: {},
      })
    );

    const report = await flow.run();
    assert.deepEqual(stored.records, [5, 5, 10]);
    assert.equal(report.update.outcomes.filter((o) => o.status === "success").length, 4);
  });

  test("steps updating the same record don't lose updates", async () => {
    const bump = customUpdate(async (slots) => {
      for (let i = 0; i < 25; i++) {
        await slots[0]?.update(async (value) => {
          await tick();
          return value + 1;
        });
      }
    });

    const { flow, stored } = buildFlow([0]);
    flow.addUpdateStep("bump-a", bump).addUpdateStep("bump-b", bump);
    await flow.config(
      configDocument({
        numThreads: 4,
        "bump-a-mode": "include",
        "bump-a": {},
        "bump-b-mode": "include",
        "bump-b": {},
      })
    );

    await flow.run();
    assert.deepEqual(stored.records, [55, 10]);
  });
});
