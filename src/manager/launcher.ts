/**
 * Flow launchers: how a flow manager starts one run of a flow.
 *
 * - InProcessLauncher runs the flow in the manager's own process. It
 *   isn't isolated, so a manager using it runs due flows one at a time.
 * - ChildProcessLauncher forks the manager's entry script with
 *   BATCHFLOW_FLOW set; the child rebuilds the same manager and its
 *   main() runs only the named flow, exiting 0 on success and 1 on
 *   failure. Flows then share no memory, locks or crashes.
 */

import { fork } from "node:child_process";

/** Environment variable naming the flow a launched child must run */
export const FLOW_ENV_VAR = "BATCHFLOW_FLOW";

/** What a manager needs from a flow */
export interface ManagedFlow {
  readonly name: string;
  readonly configured: boolean;
  config(document: unknown): Promise<void>;
  run(): Promise<unknown>;
  silent(): void;
  logfile(path: string): void;
}

export interface FlowLauncher {
  /** Whether each launch runs in its own process */
  readonly isolated: boolean;
  /** Resolves when the run succeeded, rejects when it failed */
  launch(flow: ManagedFlow): Promise<void>;
}

export class InProcessLauncher implements FlowLauncher {
  readonly isolated = false;

  async launch(flow: ManagedFlow): Promise<void> {
    await flow.run();
  }
}

export interface ChildProcessLauncherOptions {
  /** Script that builds the manager and calls main() */
  entry: string;
  /** Node flags for the child; defaults to this process's flags */
  execArgv?: string[];
  /** Extra environment for the child */
  env?: Record<string, string>;
}

export class ChildProcessLauncher implements FlowLauncher {
  readonly isolated = true;

  private readonly options: ChildProcessLauncherOptions;

  constructor(options: ChildProcessLauncherOptions) {
    this.options = options;
  }

  launch(flow: ManagedFlow): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = fork(this.options.entry, [], {
        execArgv: this.options.execArgv ?? process.execArgv,
        env: { ...process.env, ...this.options.env, [FLOW_ENV_VAR]: flow.name },
      });
      child.once("error", reject);
      child.once("exit", (code, signal) => {
        if (code === 0) {
          resolve();
        } else {
          const reason = signal === null ? `exit code ${code}` : `signal ${signal}`;
          reject(new Error(`Flow ${flow.name} process ended with ${reason}`));
        }
      });
    });
  }
}
