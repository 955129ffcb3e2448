/**
 * Flow configuration document validation.
 *
 * A flow configuration is a nested mapping:
 *
 *   numThreads: 4
 *   storage-mode: include
 *   storage:
 *     filePath: records.txt
 *   increment-2-mode: exclude
 *   increment-2:
 *     increment: 2
 *
 * Top-level keys starting with "_" are ignored (config templates carry
 * "_description" entries). Any other key that names nothing in the flow is
 * rejected. Every problem in the document is reported in one ConfigError.
 */

import { z } from "zod";
import { ConfigError, toConfigIssues, type ConfigIssue } from "../errors.js";
import { RESERVED_KEY_PREFIX, STEP_MODES, type StepMode } from "./step.js";

export const FlowSettingsSchema = z.object({
  numThreads: z
    .number()
    .int()
    .min(1)
    .describe("The number of workers used when running update and propagate steps"),
});

export type FlowSettings = z.infer<typeof FlowSettingsSchema>;

export const StepModeSchema = z.enum(STEP_MODES);

const StepBlockSchema = z.record(z.unknown());

export function modeKey(name: string): string {
  return `${name}-mode`;
}

export interface ParsedFlowConfig {
  settings: FlowSettings;
  /** Mode per step name, storage included */
  modes: Map<string, StepMode>;
  /** Raw config block per step name, storage included; absent for excluded steps */
  blocks: Map<string, Record<string, unknown>>;
}

export interface FlowConfigLayout {
  flowName: string;
  storageName: string;
  stepNames: readonly string[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate the top level of a flow configuration document.
 * Step blocks are only checked to be mappings here; binding them to step
 * config shapes happens when the steps are instantiated.
 */
export function parseFlowConfig(raw: unknown, layout: FlowConfigLayout): ParsedFlowConfig {
  if (!isPlainObject(raw)) {
    throw new ConfigError(`Configuration for flow "${layout.flowName}" must be a mapping`, [
      { path: [], message: "Expected a mapping", code: "invalid_type" },
    ]);
  }

  const doc = Object.fromEntries(
    Object.entries(raw).filter(([key]) => !key.startsWith(RESERVED_KEY_PREFIX))
  );
  const issues: ConfigIssue[] = [];

  const settings = FlowSettingsSchema.safeParse({ numThreads: doc.numThreads });
  if (!settings.success) {
    issues.push(...toConfigIssues(settings.error.issues));
  }

  const modes = new Map<string, StepMode>();
  const blocks = new Map<string, Record<string, unknown>>();
  const known = new Set<string>(["numThreads"]);

  for (const name of [layout.storageName, ...layout.stepNames]) {
    const isStorage = name === layout.storageName;
    known.add(name);
    known.add(modeKey(name));

    const mode = StepModeSchema.safeParse(doc[modeKey(name)]);
    if (!mode.success) {
      issues.push(...toConfigIssues(mode.error.issues, [modeKey(name)]));
      continue;
    }
    if (isStorage && mode.data === "exclude") {
      issues.push({
        path: [modeKey(name)],
        message: "Record storage can't be excluded",
        code: "invalid_enum_value",
      });
      continue;
    }
    modes.set(name, mode.data);

    if (mode.data === "exclude") continue;

    const block = StepBlockSchema.safeParse(doc[name]);
    if (!block.success) {
      issues.push(...toConfigIssues(block.error.issues, [name]));
      continue;
    }
    blocks.set(name, block.data);
  }

  for (const key of Object.keys(doc)) {
    if (!known.has(key)) {
      issues.push({ path: [key], message: "Unrecognized key", code: "unrecognized_keys" });
    }
  }

  if (issues.length > 0 || !settings.success) {
    throw new ConfigError(
      `Invalid configuration for flow "${layout.flowName}": ${issues.length} issue(s)`,
      issues
    );
  }

  return { settings: settings.data, modes, blocks };
}
