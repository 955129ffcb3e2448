/**
 * batchflow: batch record-processing pipelines.
 */

export * from "./errors.js";
export {
  config,
  validateConfig,
  loadConfigFile,
  parseConfigText,
  dumpConfigText,
  type AppConfig,
} from "./config/index.js";
export * from "./logging/index.js";
export * from "./schedule/index.js";
export * from "./flow/index.js";
export { Mutex, type Release } from "./concurrency/mutex.js";
export { Signal, WorkQueue } from "./concurrency/work-queue.js";
export {
  GLock,
  lockIdFor,
  withGLock,
  type GLockHandle,
  type GLockMode,
  type GLockOptions,
} from "./lock/glock.js";
export { RETRY_ATTEMPTS, retryCall, retryCallWith } from "./utils/retry.js";
export {
  FlowManager,
  type FlowManagerOptions,
  type ManagerRunReport,
  type UnconfiguredFlowOptions,
} from "./manager/flow-manager.js";
export {
  ChildProcessLauncher,
  FLOW_ENV_VAR,
  InProcessLauncher,
  type ChildProcessLauncherOptions,
  type FlowLauncher,
  type ManagedFlow,
} from "./manager/launcher.js";
export { runFlow, runFlowMain, type CliOutput } from "./cli/run-flow.js";
