/**
 * Flows: one complete record pipeline.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * LIFECYCLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. DECLARE: create the flow with its record storage, then register steps.
 *    Step names share one namespace (storage included). Update and
 *    propagate steps may depend on already-registered steps of the same
 *    phase, so registration order is always a valid topological order.
 *
 * 2. CONFIGURE: config(document) binds a configuration document to every
 *    step, once. Nothing is kept if any part is invalid.
 *
 * 3. RUN: each run() is one pipeline cycle:
 *
 *      storage.getRecords
 *        → record steps, one at a time, in registration order
 *        → update steps, concurrently, in dependency order
 *        → propagate steps, concurrently, in dependency order
 *        → storage.setRecords
 *
 *    A failure in storage or a record step aborts the run; the next
 *    scheduled run starts over. Failures in update/propagate steps are
 *    logged and reported, and the phase carries on.
 */

import { existsSync, statSync } from "node:fs";
import type { ZodType, ZodTypeDef } from "zod";
import { config as appConfig } from "../config/index.js";
import { ConfigError, StepExecutionError } from "../errors.js";
import {
  createLogger,
  generateRunId,
  isLogLevel,
  runWithRunId,
  type Logger,
} from "../logging/index.js";
import { parseFlowConfig, FlowSettingsSchema, modeKey } from "./flow-config.js";
import { MetadataBoard, readMetadata } from "./metadata.js";
import { runPhase, type PhaseReport, type PhaseTask } from "./phase-scheduler.js";
import { collectRecords, createSlots } from "./record-slots.js";
import {
  STEP_MODES,
  toBlueprint,
  type ConcurrentPhase,
  type ConfigShape,
  type PropagateStep,
  type PropagateStepType,
  type RecordStep,
  type RecordStepType,
  type RecordStorage,
  type RecordStorageType,
  type StepBlueprint,
  type StepContext,
  type StepDescription,
  type StepKind,
  type StepMode,
  type StorageContext,
  type UpdateStep,
  type UpdateStepType,
} from "./step.js";

// ============================================================
// Types
// ============================================================

export interface FlowInit<R> {
  name: string;
  description: string;
  storageName: string;
  storage: StepBlueprint<RecordStorage<R>>;
  /** Log through this logger instead of one built from silent()/logfile() */
  logger?: Logger;
}

export interface CreateFlowOptions<R, S extends ConfigShape> {
  name: string;
  description: string;
  /** Name the storage is configured under */
  storageName: string;
  storage: RecordStorageType<R, S>;
  logger?: Logger;
}

interface RegisteredStep<T> {
  name: string;
  kind: StepKind;
  blueprint: StepBlueprint<T>;
  dependsOn: string[];
}

interface ConfiguredStep<T> {
  name: string;
  mode: StepMode;
  dependsOn: string[];
  /** Null when the step is excluded */
  instance: T | null;
}

interface ConfiguredFlow<R> {
  numThreads: number;
  storage: ConfiguredStep<RecordStorage<R>> & { instance: RecordStorage<R> };
  record: ConfiguredStep<RecordStep<R>>[];
  update: ConfiguredStep<UpdateStep<R>>[];
  propagate: ConfiguredStep<PropagateStep<R>>[];
}

export interface FlowRunReport<R> {
  runId: string;
  flow: string;
  /** Records as handed to storage at the end of the run */
  records: R[];
  update: PhaseReport;
  propagate: PhaseReport;
  startedAt: Date;
  finishedAt: Date;
}

/** Config template: flow settings, modes, and one description per step */
export type FlowDescription = Record<string, string | StepDescription>;

const RULE = "==================================================";
const SECTION = "--------------------------------------------------";

function formatMinute(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

// ============================================================
// Flow
// ============================================================

export class Flow<R> {
  readonly name: string;
  readonly description: string;
  readonly storageName: string;

  private readonly storage: StepBlueprint<RecordStorage<R>>;
  private readonly recordSteps: RegisteredStep<RecordStep<R>>[] = [];
  private readonly updateSteps: RegisteredStep<UpdateStep<R>>[] = [];
  private readonly propagateSteps: RegisteredStep<PropagateStep<R>>[] = [];

  private state: ConfiguredFlow<R> | null = null;
  private configuring = false;
  private metadata = new MetadataBoard();

  private readonly injectedLogger: Logger | undefined;
  private consoleOutput = true;
  private readonly logFiles: string[] = [];

  constructor(init: FlowInit<R>) {
    if (init.name.trim() === "") {
      throw new ConfigError("Flow name must not be empty");
    }
    if (init.storageName.trim() === "") {
      throw new ConfigError(`Flow ${init.name}: storage name must not be empty`);
    }
    if (init.storage.kind !== "storage") {
      throw new ConfigError(
        `Flow ${init.name}: ${init.storage.typeName} is a ${init.storage.kind} step, not a record storage`
      );
    }
    this.name = init.name;
    this.description = init.description;
    this.storageName = init.storageName;
    this.storage = init.storage;
    this.injectedLogger = init.logger;
  }

  get configured(): boolean {
    return this.state !== null;
  }

  // ------------------------------------------------------------
  // Logging
  // ------------------------------------------------------------

  /** Suppress console output */
  silent(): void {
    this.consoleOutput = false;
  }

  /** Re-enable console output */
  verbose(): void {
    this.consoleOutput = true;
  }

  /** Also append log output to the given file */
  logfile(path: string): void {
    if (existsSync(path) && !statSync(path).isFile()) {
      throw new ConfigError(`Logfile path ${path} already exists and isn't a file`);
    }
    if (!this.logFiles.includes(path)) {
      this.logFiles.push(path);
    }
  }

  private logger(): Logger {
    const base =
      this.injectedLogger ??
      createLogger({
        level: isLogLevel(appConfig.logLevel) ? appConfig.logLevel : "info",
        console: this.consoleOutput,
        files: this.logFiles,
      });
    return base.child({ flow: this.name });
  }

  // ------------------------------------------------------------
  // Metadata
  // ------------------------------------------------------------

  /** Set metadata on the blackboard of the current (or latest) run */
  setMetadata(key: string, value: unknown): void {
    this.metadata.set(key, value);
  }

  getMetadata(key: string): unknown {
    return this.metadata.get(key);
  }

  // ------------------------------------------------------------
  // Registration
  // ------------------------------------------------------------

  /** Names of all registered steps, in registration order per phase */
  stepNames(): string[] {
    return [
      ...this.recordSteps.map((step) => step.name),
      ...this.updateSteps.map((step) => step.name),
      ...this.propagateSteps.map((step) => step.name),
    ];
  }

  stepExists(name: string): boolean {
    return name === this.storageName || this.stepNames().includes(name);
  }

  addRecordStep<S extends ConfigShape>(name: string, type: RecordStepType<R, S>): this {
    this.checkNewStep(name, type.kind, "record");
    this.recordSteps.push({ name, kind: "record", blueprint: toBlueprint(type), dependsOn: [] });
    return this;
  }

  addUpdateStep<S extends ConfigShape>(
    name: string,
    type: UpdateStepType<R, S>,
    dependsOn: readonly string[] = []
  ): this {
    this.checkNewStep(name, type.kind, "update");
    const deps = this.checkDependencies(name, dependsOn, this.updateSteps, "update");
    this.updateSteps.push({ name, kind: "update", blueprint: toBlueprint(type), dependsOn: deps });
    return this;
  }

  addPropagateStep<S extends ConfigShape>(
    name: string,
    type: PropagateStepType<R, S>,
    dependsOn: readonly string[] = []
  ): this {
    this.checkNewStep(name, type.kind, "propagate");
    const deps = this.checkDependencies(name, dependsOn, this.propagateSteps, "propagate");
    this.propagateSteps.push({
      name,
      kind: "propagate",
      blueprint: toBlueprint(type),
      dependsOn: deps,
    });
    return this;
  }

  private checkNewStep(name: string, actual: StepKind, expected: StepKind): void {
    if (this.state !== null || this.configuring) {
      throw new ConfigError(`Can't add ${name}: flow ${this.name} is already configured`);
    }
    if (name.trim() === "") {
      throw new ConfigError(`Step names in flow ${this.name} must not be empty`);
    }
    if (name.startsWith("_") || name === "numThreads" || name.endsWith("-mode")) {
      throw new ConfigError(`${name} is reserved and can't name a step`);
    }
    if (this.stepExists(name)) {
      throw new ConfigError(`${name} already exists as a step`);
    }
    if (actual !== expected) {
      throw new ConfigError(`${name}: expected a ${expected} step type, got a ${actual} step type`);
    }
  }

  private checkDependencies(
    name: string,
    dependsOn: readonly string[],
    samePhase: readonly RegisteredStep<unknown>[],
    phase: ConcurrentPhase
  ): string[] {
    const phaseNames = new Set(samePhase.map((step) => step.name));
    for (const dependency of dependsOn) {
      if (!this.stepExists(dependency)) {
        throw new ConfigError(`${name}: dependency ${dependency} doesn't exist as a step`);
      }
      if (!phaseNames.has(dependency)) {
        throw new ConfigError(`${name}: dependency ${dependency} isn't in the ${phase} phase`);
      }
    }
    return [...new Set(dependsOn)];
  }

  // ------------------------------------------------------------
  // Configuration
  // ------------------------------------------------------------

  /**
   * Describe every configuration the flow expects, as a template.
   */
  describeConfig(): FlowDescription {
    const description: FlowDescription = {};
    for (const [key, field] of Object.entries(FlowSettingsSchema.shape)) {
      description[key] = `(int) ${field.description ?? ""}`.trimEnd();
    }
    description._description = this.description;

    description[modeKey(this.storageName)] =
      `(string) The mode to run ${this.storageName} in (either 'include' or 'debug')`;
    for (const name of this.stepNames()) {
      description[modeKey(name)] =
        `(string) The mode to run ${name} in (either ${STEP_MODES.map((m) => `'${m}'`).join(", ")})`;
    }

    description[this.storageName] = this.storage.describe();
    for (const step of [...this.recordSteps, ...this.updateSteps, ...this.propagateSteps]) {
      description[step.name] = step.blueprint.describe();
    }
    return description;
  }

  /**
   * Bind a configuration document to the flow and all its steps.
   * Can only succeed once per flow.
   */
  async config(document: unknown): Promise<void> {
    if (this.state !== null || this.configuring) {
      throw new ConfigError(`Flow ${this.name} is already configured`);
    }
    this.configuring = true;
    try {
      this.state = await this.bind(document);
    } finally {
      this.configuring = false;
    }
  }

  private async bind(document: unknown): Promise<ConfiguredFlow<R>> {
    const parsed = parseFlowConfig(document, {
      flowName: this.name,
      storageName: this.storageName,
      stepNames: this.stepNames(),
    });

    const modeOf = (name: string): StepMode => parsed.modes.get(name) ?? "include";

    const instantiate = async <T>(step: RegisteredStep<T>): Promise<ConfiguredStep<T>> => {
      const mode = modeOf(step.name);
      const instance =
        mode === "exclude"
          ? null
          : await step.blueprint.instantiate(step.name, parsed.blocks.get(step.name));
      return { name: step.name, mode, dependsOn: step.dependsOn, instance };
    };

    const storage = await this.storage.instantiate(
      this.storageName,
      parsed.blocks.get(this.storageName)
    );

    const record: ConfiguredStep<RecordStep<R>>[] = [];
    for (const step of this.recordSteps) record.push(await instantiate(step));
    const update: ConfiguredStep<UpdateStep<R>>[] = [];
    for (const step of this.updateSteps) update.push(await instantiate(step));
    const propagate: ConfiguredStep<PropagateStep<R>>[] = [];
    for (const step of this.propagateSteps) propagate.push(await instantiate(step));

    return {
      numThreads: parsed.settings.numThreads,
      storage: {
        name: this.storageName,
        mode: modeOf(this.storageName),
        dependsOn: [],
        instance: storage,
      },
      record,
      update,
      propagate,
    };
  }

  // ------------------------------------------------------------
  // Running
  // ------------------------------------------------------------

  /**
   * Run one pipeline cycle.
   */
  async run(): Promise<FlowRunReport<R>> {
    const state = this.state;
    if (state === null) {
      throw new ConfigError(`Flow ${this.name} isn't configured`);
    }
    const runId = generateRunId();
    return runWithRunId(runId, () => this.execute(state, runId));
  }

  private async execute(state: ConfiguredFlow<R>, runId: string): Promise<FlowRunReport<R>> {
    const logger = this.logger();
    const board = new MetadataBoard();
    this.metadata = board;
    const startedAt = new Date();

    logger.info(RULE);
    logger.info(this.name);
    logger.info(RULE);
    logger.info(`Date: ${formatMinute(startedAt)}`);
    logger.info(`Number of threads: ${state.numThreads}`);

    logger.info(`Getting records from ${this.storageName}`);
    const storageCtx = this.storageContext(state.storage.mode, logger);
    let records = await state.storage.instance.getRecords(storageCtx);

    this.section(logger, "Running record steps...");
    for (const step of state.record) {
      if (step.instance === null) continue;
      const next = await step.instance.newRecords(
        records,
        this.stepContext(step.name, step.mode, logger, board)
      );
      if (!Array.isArray(next)) {
        throw new StepExecutionError(step.name, new TypeError("newRecords didn't return a list"));
      }
      records = next;
    }

    const slots = createSlots(records);

    this.section(logger, "Running update steps...");
    const update = await runPhase({
      phase: "update",
      tasks: this.phaseTasks(state.update, logger, board, (instance, ctx) =>
        instance.updateRecords(slots, ctx)
      ),
      numWorkers: state.numThreads,
      logger,
    });

    this.section(logger, "Running propagate steps...");
    const propagate = await runPhase({
      phase: "propagate",
      tasks: this.phaseTasks(state.propagate, logger, board, (instance, ctx) =>
        instance.propagateRecords(slots, ctx)
      ),
      numWorkers: state.numThreads,
      logger,
    });

    records = collectRecords(slots);
    logger.info("");
    logger.info(`Storing records in ${this.storageName}`);
    await state.storage.instance.setRecords(records, storageCtx);

    const finishedAt = new Date();
    logger.info(`Flow finished successfully at ${formatMinute(finishedAt)}`, {
      outcome: "success",
    });

    return { runId, flow: this.name, records, update, propagate, startedAt, finishedAt };
  }

  private section(logger: Logger, title: string): void {
    logger.info("");
    logger.info(SECTION);
    logger.info(title);
    logger.info(SECTION);
  }

  private phaseTasks<T>(
    steps: readonly ConfiguredStep<T>[],
    logger: Logger,
    board: MetadataBoard,
    invoke: (instance: T, ctx: StepContext) => void | Promise<void>
  ): PhaseTask[] {
    return steps.map((step) => ({
      name: step.name,
      mode: step.mode,
      dependsOn: step.dependsOn,
      run: () => {
        if (step.instance === null) return;
        return invoke(step.instance, this.stepContext(step.name, step.mode, logger, board));
      },
    }));
  }

  private storageContext(mode: StepMode, logger: Logger): StorageContext {
    const stepLogger = logger.child({ step: this.storageName });
    return {
      flowName: this.name,
      stepName: this.storageName,
      debug: mode === "debug",
      logger: stepLogger,
      log: (message) => stepLogger.info(message),
    };
  }

  private stepContext(
    name: string,
    mode: StepMode,
    logger: Logger,
    board: MetadataBoard
  ): StepContext {
    const stepLogger = logger.child({ step: name });
    return {
      flowName: this.name,
      stepName: name,
      debug: mode === "debug",
      logger: stepLogger,
      log: (message) => stepLogger.info(message),
      getMetadata: (key) => board.get(key),
      setMetadata: (key, value) => board.set(key, value),
      readMetadata<V>(key: string, schema: ZodType<V, ZodTypeDef, unknown>): V | undefined {
        return readMetadata(board, key, schema, stepLogger);
      },
    };
  }
}

// ============================================================
// Factory
// ============================================================

/**
 * Create a flow around a record storage type.
 */
export function createFlow<R, S extends ConfigShape>(options: CreateFlowOptions<R, S>): Flow<R> {
  return new Flow<R>({
    name: options.name,
    description: options.description,
    storageName: options.storageName,
    storage: toBlueprint(options.storage),
    logger: options.logger,
  });
}

