/**
 * A basic flow over integer records.
 *
 *   tsx examples/basic-flow.ts --dump basic-flow.yaml
 *   tsx examples/basic-flow.ts --run examples/configs/basic-flow.yaml
 */

import { fileURLToPath } from "node:url";
import { createFlow, runFlowMain, type GLockOptions, type Logger } from "../src/index.js";
import { AppendInteger, Increment, LogSum, integerFileStorage } from "./basic-steps.js";

export interface BasicFlowOptions {
  logger?: Logger;
  lockOptions?: GLockOptions;
}

export function buildBasicFlow(options: BasicFlowOptions = {}) {
  return createFlow({
    name: "basic-flow",
    description: "A basic flow to access and manipulate integer records",
    storageName: "basic-storage",
    storage: integerFileStorage(options.lockOptions),
    logger: options.logger,
  })
    .addRecordStep("new-integer", AppendInteger)
    .addUpdateStep("increment-1", Increment)
    .addUpdateStep("increment-2", Increment)
    .addUpdateStep("increment-3", Increment, ["increment-2"])
    .addPropagateStep("print-sum", LogSum);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await runFlowMain(buildBasicFlow());
}
