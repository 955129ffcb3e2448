/**
 * Flow configuration files.
 *
 * Flow configurations are nested YAML documents; the flow validates their
 * shape, so this module only reads and parses.
 */

import { readFileSync, existsSync } from "node:fs";
import yaml from "js-yaml";
import { ConfigError } from "../errors.js";

/**
 * Parse YAML text into a plain value.
 * An empty document parses to an empty object.
 */
export function parseConfigText(text: string, source = "(inline)"): unknown {
  try {
    const parsed: unknown = yaml.load(text);
    return parsed ?? {};
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not parse configuration ${source}: ${reason}`);
  }
}

/**
 * Read and parse a YAML configuration file.
 */
export function loadConfigFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new ConfigError(`Configuration file not found: ${path}`);
  }
  return parseConfigText(readFileSync(path, "utf8"), path);
}

/**
 * Serialize a value (typically a config description) as YAML.
 */
export function dumpConfigText(value: unknown): string {
  return yaml.dump(value, { sortKeys: false, lineWidth: 100 });
}
