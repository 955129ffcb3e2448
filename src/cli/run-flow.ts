/**
 * Command-line front end for a single flow.
 *
 * A flow script ends with `runFlowMain(flow)` and gains:
 *
 *   -d, --dump <yaml>       Write a configuration template for the flow
 *   -v, --validate <yaml>   Configure the flow from a file and stop
 *   -r, --run <yaml>        Configure the flow from a file and run it once
 *   -l, --logfile <path>    Also log to this file (repeatable)
 *   -s, --silent            No console log output
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Configuration, validation or run failure
 *   2 - Bad arguments
 */

import { writeFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { dumpConfigText, loadConfigFile } from "../config/index.js";
import { describeError } from "../errors.js";
import type { Flow } from "../flow/index.js";

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function usage(flowName: string): string {
  return `
Usage: ${flowName} (-d <yaml> | -v <yaml> | -r <yaml>) [options]

Commands:
  -d, --dump <yaml>       Write a configuration template for the flow
  -v, --validate <yaml>   Validate a configuration file against the flow
  -r, --run <yaml>        Configure the flow from a file and run it once

Options:
  -l, --logfile <path>    Also log to this file (repeatable)
  -s, --silent            Don't log to the console
  -h, --help              Show this help message
`;
}

function parseCliArgs(argv: readonly string[]) {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      dump: { type: "string", short: "d" },
      validate: { type: "string", short: "v" },
      run: { type: "string", short: "r" },
      logfile: { type: "string", short: "l", multiple: true },
      silent: { type: "boolean", short: "s", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return values;
}

type CliArgs = ReturnType<typeof parseCliArgs>;

/**
 * Run the CLI against a flow. Resolves to the exit code.
 */
export async function runFlow<R>(
  flow: Flow<R>,
  argv: readonly string[] = process.argv.slice(2),
  io: CliOutput = consoleOutput
): Promise<number> {
  let values: CliArgs;
  try {
    values = parseCliArgs(argv);
  } catch (err) {
    io.err(describeError(err));
    io.err(usage(flow.name));
    return 2;
  }

  if (values.help) {
    io.out(usage(flow.name));
    return 0;
  }

  const commands = [values.dump, values.validate, values.run].filter(
    (value) => value !== undefined
  );
  if (commands.length !== 1) {
    io.err("Exactly one of --dump, --validate or --run is required");
    io.err(usage(flow.name));
    return 2;
  }

  try {
    for (const path of values.logfile ?? []) {
      flow.logfile(path);
    }
    if (values.silent) {
      flow.silent();
    }

    if (values.dump !== undefined) {
      writeFileSync(values.dump, dumpConfigText(flow.describeConfig()));
      io.out(`Wrote configuration template to ${values.dump}`);
      return 0;
    }

    if (values.validate !== undefined) {
      await flow.config(loadConfigFile(values.validate));
      io.out(`Configuration ${values.validate} is valid for ${flow.name}`);
      return 0;
    }

    if (values.run !== undefined) {
      await flow.config(loadConfigFile(values.run));
      await flow.run();
    }
    return 0;
  } catch (err) {
    io.err(describeError(err));
    return 1;
  }
}

/**
 * Run the CLI with the process arguments and set the exit code.
 */
export async function runFlowMain<R>(flow: Flow<R>): Promise<void> {
  process.exitCode = await runFlow(flow);
}
