/**
 * A flow manager running the basic flow every minute, each run in its own
 * process.
 *
 *   tsx examples/basic-manager.ts
 */

import { fileURLToPath } from "node:url";
import { Always, ChildProcessLauncher, FlowManager } from "../src/index.js";
import { buildBasicFlow } from "./basic-flow.js";

const manager = new FlowManager({
  processes: 4,
  launcher: new ChildProcessLauncher({ entry: fileURLToPath(import.meta.url) }),
});

await manager.addUnconfiguredFlow(buildBasicFlow(), new Always(), {
  configPath: fileURLToPath(new URL("./configs/basic-flow.yaml", import.meta.url)),
  silent: false,
});

process.exitCode = await manager.main();
