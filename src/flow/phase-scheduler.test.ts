/**
 * Phase Scheduler Tests
 *
 * Run with: npm test
 *
 * These tests verify:
 *   1. Tasks start only after their dependencies have run
 *   2. Independent tasks run concurrently, never more than numWorkers at once
 *   3. Excluded tasks are skipped and satisfy their dependents
 *   4. A failing task is recorded and doesn't stop the phase
 *   5. Graphs that can never complete are rejected up front
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { ConfigError, SchedulingError, StepExecutionError } from "../errors.js";
import { createMemoryLogger } from "../logging/index.js";
import { findBlockedTasks, pruneExcluded, runPhase, type PhaseTask } from "./phase-scheduler.js";
import type { StepMode } from "./step.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function task(
  name: string,
  run: (worker: string) => void | Promise<void>,
  dependsOn: string[] = [],
  mode: StepMode = "include"
): PhaseTask {
  return { name, mode, dependsOn, run };
}

function phase(tasks: PhaseTask[], numWorkers = 2) {
  return runPhase({ phase: "update", tasks, numWorkers, logger: createMemoryLogger() });
}

// ═══════════════════════════════════════════════════════════════════════════
// ORDERING AND CONCURRENCY
// ═══════════════════════════════════════════════════════════════════════════

describe("runPhase ordering", () => {
  test("a task starts after its dependencies finish", async () => {
    const events: string[] = [];
    const step = (name: string) => async () => {
      events.push(`start ${name}`);
      await tick();
      events.push(`end ${name}`);
    };

    await phase(
      [task("c", step("c"), ["b"]), task("b", step("b"), ["a"]), task("a", step("a"))],
      3
    );

    assert.deepEqual(events, ["start a", "end a", "start b", "end b", "start c", "end c"]);
  });

  test("independent tasks run concurrently", async () => {
    const aStarted = deferred();
    const bStarted = deferred();

    const report = await phase([
      task("a", async () => {
        aStarted.resolve();
        await bStarted.promise;
      }),
      task("b", async () => {
        bStarted.resolve();
        await aStarted.promise;
      }),
    ]);

    assert.deepEqual(report.outcomes.map((o) => o.status), ["success", "success"]);
    assert.notEqual(report.outcomes[0]?.worker, report.outcomes[1]?.worker);
  });

  test("never runs more than numWorkers tasks at once", async () => {
    let running = 0;
    let peak = 0;
    const step = async () => {
      running++;
      peak = Math.max(peak, running);
      await tick();
      await tick();
      running--;
    };

    const report = await phase(
      ["a", "b", "c", "d", "e"].map((name) => task(name, step)),
      2
    );

    assert.equal(peak, 2);
    assert.equal(report.outcomes.length, 5);
  });

  test("runs tasks on named workers", async () => {
    const logger = createMemoryLogger();
    const report = await runPhase({
      phase: "propagate",
      tasks: [task("only", () => undefined)],
      numWorkers: 1,
      logger,
    });
    assert.equal(report.phase, "propagate");
    assert.equal(report.outcomes[0]?.worker, "worker-0");
    assert.deepEqual(logger.messages(), ["Running only on worker-0"]);
  });

  test("an empty phase completes", async () => {
    const report = await phase([]);
    assert.deepEqual(report, { phase: "update", outcomes: [], excluded: [] });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// EXCLUSION AND FAILURES
// ═══════════════════════════════════════════════════════════════════════════

describe("runPhase exclusion and failures", () => {
  test("excluded tasks don't run and satisfy their dependents", async () => {
    const ran: string[] = [];
    const report = await phase([
      task("a", () => void ran.push("a"), [], "exclude"),
      task("b", () => void ran.push("b"), ["a"]),
    ]);

    assert.deepEqual(ran, ["b"]);
    assert.deepEqual(report.excluded, ["a"]);
    assert.deepEqual(report.outcomes.map((o) => o.name), ["b"]);
  });

  test("a failing task is recorded and its dependents still run", async () => {
    const logger = createMemoryLogger();
    const ran: string[] = [];
    const report = await runPhase({
      phase: "update",
      tasks: [
        task("a", () => {
          throw new Error("boom");
        }),
        task("b", () => void ran.push("b"), ["a"]),
      ],
      numWorkers: 1,
      logger,
    });

    assert.deepEqual(ran, ["b"]);
    const [failed, succeeded] = report.outcomes;
    assert.equal(failed?.status, "failed");
    assert.ok(failed?.error instanceof StepExecutionError);
    assert.equal(failed?.error?.message, "Step a failed: boom");
    assert.equal(succeeded?.status, "success");
    assert.deepEqual(
      logger.entries.filter((e) => e.level === "error").map((e) => e.message),
      ["Step a failed: boom"]
    );
  });

  test("rejects fewer than one worker", async () => {
    await assert.rejects(phase([], 0), {
      name: "ConfigError",
      message: "Configuration 'numThreads' must be at least 1, got: 0",
    });
    await assert.rejects(phase([], 1.5), ConfigError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// GRAPH CHECKS
// ═══════════════════════════════════════════════════════════════════════════

describe("graph checks", () => {
  test("cycles are rejected before anything runs", async () => {
    const ran: string[] = [];
    await assert.rejects(
      phase([
        task("free", () => void ran.push("free")),
        task("a", () => void ran.push("a"), ["b"]),
        task("b", () => void ran.push("b"), ["a"]),
      ]),
      (err: unknown) => {
        assert.ok(err instanceof SchedulingError);
        assert.deepEqual(err.blocked, ["a", "b"]);
        return true;
      }
    );
    assert.deepEqual(ran, []);
  });

  test("excluding a task breaks a cycle through it", async () => {
    const report = await phase([
      task("a", () => undefined, ["b"]),
      task("b", () => undefined, ["a"], "exclude"),
    ]);
    assert.deepEqual(report.outcomes.map((o) => o.name), ["a"]);
  });

  test("pruneExcluded collapses duplicate dependencies", () => {
    const pending = pruneExcluded([task("a", () => undefined), task("b", () => undefined, ["a", "a"])]);
    assert.deepEqual(pending.map((p) => p.deps), [[], ["a"]]);
  });

  test("findBlockedTasks reports dependencies outside the phase", () => {
    assert.deepEqual(
      findBlockedTasks([
        { task: { name: "a" }, deps: ["missing"] },
        { task: { name: "b" }, deps: ["a"] },
        { task: { name: "c" }, deps: [] },
      ]),
      ["a", "b"]
    );
  });
});
