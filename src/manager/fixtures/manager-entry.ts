/**
 * Manager entry script for the child-process launcher tests.
 *
 * Holds two flows: "ok" succeeds and "fails" throws.
 */

import { createMemoryLogger } from "../../logging/index.js";
import { Always } from "../../schedule/index.js";
import { FlowManager } from "../flow-manager.js";
import type { ManagedFlow } from "../launcher.js";

function stubFlow(name: string, run: () => Promise<void>): ManagedFlow {
  return {
    name,
    configured: true,
    config: async () => undefined,
    run,
    silent: () => undefined,
    logfile: () => undefined,
  };
}

const manager = new FlowManager({ processes: 1, logger: createMemoryLogger() });
manager.addConfiguredFlow(stubFlow("ok", async () => undefined), new Always());
manager.addConfiguredFlow(
  stubFlow("fails", async () => {
    throw new Error("flow failed");
  }),
  new Always()
);

process.exitCode = await manager.main();
