/**
 * Dependency-ordered concurrent phase scheduler.
 *
 * Runs the update phase and the propagate phase of a flow. Each phase is
 * a set of named tasks with dependencies on other tasks of the same phase.
 *
 * ALGORITHM:
 * 1. Excluded tasks are dropped, and their names are removed from every
 *    other task's dependencies (excluding a task satisfies its dependents).
 * 2. The remaining graph is checked to be completable (no cycles, no
 *    dependency on a task outside the phase).
 * 3. Exactly `numWorkers` workers drain a shared FIFO work queue.
 * 4. The dispatcher pushes every task whose dependencies have all
 *    completed, then sleeps until some worker reports a completion.
 * 5. When every task has been dispatched, one stop sentinel per worker is
 *    queued and the workers are joined.
 *
 * A dependency is satisfied once the task has *run*, whether or not it
 * succeeded. A task that throws is logged and recorded as failed; its
 * worker carries on with the next task.
 */

import { Signal, WorkQueue } from "../concurrency/work-queue.js";
import { ConfigError, SchedulingError, StepExecutionError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { ConcurrentPhase, StepMode } from "./step.js";

export interface PhaseTask {
  readonly name: string;
  readonly mode: StepMode;
  /** Names of tasks in the same phase that must run first */
  readonly dependsOn: readonly string[];
  run(worker: string): void | Promise<void>;
}

export interface PhaseOptions {
  phase: ConcurrentPhase;
  tasks: readonly PhaseTask[];
  numWorkers: number;
  logger: Logger;
}

export interface StepOutcome {
  name: string;
  worker: string;
  status: "success" | "failed";
  error?: StepExecutionError;
  startedAt: Date;
  finishedAt: Date;
}

export interface PhaseReport {
  phase: ConcurrentPhase;
  /** Outcomes in completion order */
  outcomes: StepOutcome[];
  /** Tasks skipped because their mode is "exclude" */
  excluded: string[];
}

interface PendingTask {
  task: PhaseTask;
  deps: string[];
}

const STOP = Symbol("stop");

/**
 * Drop excluded tasks and prune them from the remaining dependencies.
 */
export function pruneExcluded(tasks: readonly PhaseTask[]): PendingTask[] {
  const enabled = tasks.filter((task) => task.mode !== "exclude");
  const enabledNames = new Set(enabled.map((task) => task.name));
  return enabled.map((task) => ({
    task,
    deps: [...new Set(task.dependsOn)].filter((dep) => enabledNames.has(dep)),
  }));
}

/**
 * Names of tasks that can never become ready (Kahn's algorithm).
 */
export function findBlockedTasks(
  pending: readonly { task: { name: string }; deps: readonly string[] }[]
): string[] {
  const names = new Set(pending.map((entry) => entry.task.name));
  const done = new Set<string>();
  let progressed = true;

  while (progressed) {
    progressed = false;
    for (const entry of pending) {
      const name = entry.task.name;
      if (done.has(name)) continue;
      if (entry.deps.every((dep) => names.has(dep) && done.has(dep))) {
        done.add(name);
        progressed = true;
      }
    }
  }

  return pending.map((entry) => entry.task.name).filter((name) => !done.has(name));
}

export async function runPhase(options: PhaseOptions): Promise<PhaseReport> {
  const { phase, tasks, numWorkers, logger } = options;

  if (!Number.isInteger(numWorkers) || numWorkers < 1) {
    throw new ConfigError(`Configuration 'numThreads' must be at least 1, got: ${numWorkers}`);
  }

  let remaining = pruneExcluded(tasks);
  const excluded = tasks.filter((task) => task.mode === "exclude").map((task) => task.name);

  const blocked = findBlockedTasks(remaining);
  if (blocked.length > 0) {
    throw new SchedulingError(
      `The ${phase} phase can never complete; blocked steps: ${blocked.join(", ")}`,
      blocked
    );
  }

  const queue = new WorkQueue<PhaseTask | typeof STOP>();
  const completed = new Set<string>();
  const progress = new Signal();
  const outcomes: StepOutcome[] = [];

  async function worker(workerName: string): Promise<void> {
    for (;;) {
      const work = await queue.pop();
      if (work === STOP) return;

      const context = { phase, step: work.name, worker: workerName };
      const startedAt = new Date();
      logger.info(`Running ${work.name} on ${workerName}`, context);
      try {
        await work.run(workerName);
        outcomes.push({
          name: work.name,
          worker: workerName,
          status: "success",
          startedAt,
          finishedAt: new Date(),
        });
      } catch (err) {
        const error = new StepExecutionError(work.name, err);
        logger.error(error.message, context);
        outcomes.push({
          name: work.name,
          worker: workerName,
          status: "failed",
          error,
          startedAt,
          finishedAt: new Date(),
        });
      } finally {
        completed.add(work.name);
        progress.notify();
      }
    }
  }

  const workers = Array.from({ length: numWorkers }, (_, i) => worker(`worker-${i}`));

  while (remaining.length > 0) {
    const waiting: PendingTask[] = [];
    for (const entry of remaining) {
      if (entry.deps.every((dep) => completed.has(dep))) {
        queue.push(entry.task);
      } else {
        waiting.push(entry);
      }
    }
    remaining = waiting;
    if (remaining.length > 0) {
      await progress.wait();
    }
  }

  for (let i = 0; i < numWorkers; i++) {
    queue.push(STOP);
  }
  await Promise.all(workers);

  return { phase, outcomes, excluded };
}
