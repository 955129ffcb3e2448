/**
 * Flow manager.
 *
 * Holds a set of configured flows, each with a schedule. Every call to
 * run() launches the flows whose schedule matches the current minute,
 * at most `processes` at a time when the launcher isolates each flow in
 * its own process, and one at a time otherwise. A failing flow is logged
 * and reported; it never stops the others.
 *
 * Typical deployment: a cron entry invokes the manager script once a
 * minute.
 *
 *   const manager = new FlowManager({
 *     processes: 2,
 *     launcher: new ChildProcessLauncher({ entry: fileURLToPath(import.meta.url) }),
 *   });
 *   await manager.addUnconfiguredFlow(flow, new Daily(3), { configPath: "flow.yaml" });
 *   process.exitCode = await manager.main();
 */

import { config as appConfig, loadConfigFile, validateConfig } from "../config/index.js";
import { ConfigError, describeError } from "../errors.js";
import { createLogger, initRunId, isLogLevel, type Logger } from "../logging/index.js";
import type { Schedule } from "../schedule/index.js";
import {
  FLOW_ENV_VAR,
  InProcessLauncher,
  type FlowLauncher,
  type ManagedFlow,
} from "./launcher.js";

export interface FlowManagerOptions {
  /** Maximum flows running at once (default: BATCHFLOW_PROCESSES) */
  processes?: number;
  launcher?: FlowLauncher;
  logger?: Logger;
}

export type UnconfiguredFlowOptions = ({ configPath: string } | { config: unknown }) & {
  /** Log files the flow appends to */
  logFiles?: readonly string[];
  /** Suppress the flow's console output (default: true) */
  silent?: boolean;
};

export interface ManagerRunReport {
  flow: string;
  status: "success" | "failed";
  error?: Error;
  startedAt: Date;
  finishedAt: Date;
}

interface ScheduledFlow {
  flow: ManagedFlow;
  schedule: Schedule;
}

export class FlowManager {
  readonly processes: number;

  private readonly flows = new Map<string, ScheduledFlow>();
  private readonly launcher: FlowLauncher;
  private readonly logger: Logger;

  constructor(options: FlowManagerOptions = {}) {
    const processes = options.processes ?? appConfig.processes;
    if (!Number.isInteger(processes) || processes < 1) {
      throw new ConfigError(`Number of processes must be at least 1, got: ${processes}`);
    }
    this.processes = processes;
    this.launcher = options.launcher ?? new InProcessLauncher();
    this.logger = (
      options.logger ??
      createLogger({ level: isLogLevel(appConfig.logLevel) ? appConfig.logLevel : "info" })
    ).child({ component: "manager" });
  }

  /** Names of managed flows, in the order they were added */
  flowNames(): string[] {
    return [...this.flows.keys()];
  }

  addConfiguredFlow(flow: ManagedFlow, schedule: Schedule): void {
    if (!flow.configured) {
      throw new ConfigError(`Flow ${flow.name} must be configured before it's added`);
    }
    this.register(flow, schedule);
  }

  /**
   * Configure a flow from a YAML file (or an already-loaded document) and
   * add it.
   */
  async addUnconfiguredFlow(
    flow: ManagedFlow,
    schedule: Schedule,
    options: UnconfiguredFlowOptions
  ): Promise<void> {
    if (flow.configured) {
      throw new ConfigError(`Flow ${flow.name} is already configured`);
    }
    if (this.flows.has(flow.name)) {
      throw new ConfigError(`Flow ${flow.name} already exists in the manager`);
    }

    const document = "configPath" in options ? loadConfigFile(options.configPath) : options.config;
    await flow.config(document);

    for (const path of options.logFiles ?? []) {
      flow.logfile(path);
    }
    if (options.silent ?? true) {
      flow.silent();
    }
    this.register(flow, schedule);
  }

  private register(flow: ManagedFlow, schedule: Schedule): void {
    if (this.flows.has(flow.name)) {
      throw new ConfigError(`Flow ${flow.name} already exists in the manager`);
    }
    this.flows.set(flow.name, { flow, schedule });
  }

  /** Flows whose schedule matches `now` */
  dueFlows(now: Date = new Date()): ManagedFlow[] {
    return [...this.flows.values()]
      .filter((entry) => entry.schedule.check(now))
      .map((entry) => entry.flow);
  }

  /**
   * Launch every due flow and wait for all. Isolated launches run at most
   * `processes` at once; in-process launches run sequentially. Reports are
   * in launch order.
   */
  async run(now: Date = new Date()): Promise<ManagerRunReport[]> {
    const due = this.dueFlows(now);
    this.logger.info(`${due.length} of ${this.flows.size} flow(s) due`, {
      flows: due.map((flow) => flow.name),
    });

    const reports: ManagerRunReport[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < due.length) {
        const flow = due[next++];
        if (flow === undefined) return;
        reports.push(await this.launchOne(flow));
      }
    };

    const slots = this.launcher.isolated ? this.processes : 1;
    const workers = Array.from({ length: Math.min(slots, due.length) }, () => worker());
    await Promise.all(workers);

    const order = due.map((flow) => flow.name);
    return reports.sort((a, b) => order.indexOf(a.flow) - order.indexOf(b.flow));
  }

  private async launchOne(flow: ManagedFlow): Promise<ManagerRunReport> {
    const startedAt = new Date();
    this.logger.info(`Launching ${flow.name}`, { flow: flow.name });
    try {
      await this.launcher.launch(flow);
      return { flow: flow.name, status: "success", startedAt, finishedAt: new Date() };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Flow ${flow.name} failed: ${describeError(err)}`, { flow: flow.name });
      return { flow: flow.name, status: "failed", error, startedAt, finishedAt: new Date() };
    }
  }

  /**
   * Entry point for manager scripts. In a child started by
   * ChildProcessLauncher, runs the flow it was started for; otherwise runs
   * every due flow. Resolves to the process exit code; rejects with a
   * ConfigError when the process environment is invalid.
   */
  async main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
    validateConfig();
    initRunId();
    const target = env[FLOW_ENV_VAR];
    if (target === undefined || target === "") {
      const reports = await this.run();
      return reports.every((report) => report.status === "success") ? 0 : 1;
    }

    const entry = this.flows.get(target);
    if (entry === undefined) {
      this.logger.error(`No flow named ${target} in this manager`);
      return 1;
    }
    try {
      await entry.flow.run();
      return 0;
    } catch (err) {
      this.logger.error(`Flow ${target} failed: ${describeError(err)}`, { flow: target });
      return 1;
    }
  }
}
