/**
 * Step definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STEP KINDS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A flow is built from named steps of four kinds:
 *
 * - record:    newRecords(records) → records. Runs alone, in registration
 *              order, and is the only kind allowed to add or drop records.
 * - update:    updateRecords(slots). Changes records in place; runs
 *              concurrently with other update steps, ordered only by
 *              declared dependencies.
 * - propagate: propagateRecords(slots). Pushes record state to external
 *              systems; scheduled like update steps.
 * - storage:   getRecords() / setRecords(records). Fetches the records at
 *              the start of a run and stores them at the end.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STEP TYPES AND CONFIGURATION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A step type declares a description and a config shape built from
 * configField helpers. Configuring a flow binds the matching block of the
 * configuration document to that shape, runs the optional validate() hook
 * once, then calls create() with the typed config:
 *
 *   const Increment = defineUpdateStep<number>()({
 *     typeName: "Increment",
 *     description: "Increment every record",
 *     config: { increment: configField.int("The amount to increment by") },
 *     validate(config) {
 *       if (config.increment < 0) throw new Error("increment must be >= 0");
 *     },
 *     create: (config) => ({
 *       async updateRecords(slots) {
 *         for (const slot of slots) await slot.update((n) => n + config.increment);
 *       },
 *     }),
 *   });
 *
 * External clients are passed in by closing over them in a factory that
 * returns the step type.
 */

import { z, type ZodType, type ZodTypeDef } from "zod";
import {
  ConfigError,
  ValidationError,
  toConfigIssues,
  type ConfigIssue,
} from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { RecordSlot } from "./record-slots.js";

// ============================================================
// Modes and kinds
// ============================================================

export const STEP_MODES = ["include", "exclude", "debug"] as const;

/**
 * How a step runs: normally, not at all, or in debug mode (no external
 * side effects, may fabricate data).
 */
export type StepMode = (typeof STEP_MODES)[number];

export type StepKind = "record" | "update" | "propagate" | "storage";

/** Phases scheduled with dependencies */
export type ConcurrentPhase = "update" | "propagate";

// ============================================================
// Configuration fields
// ============================================================

/** Zod schemas allowed as config fields */
export type ConfigPrimitive = z.ZodNumber | z.ZodBoolean | z.ZodString | z.ZodDate;

/** Ordered mapping of config key → field schema */
export type ConfigShape = Record<string, ConfigPrimitive>;

/** Typed config object bound from a shape */
export type StepConfig<S extends ConfigShape> = z.objectOutputType<S, z.ZodTypeAny, "strip">;

export const configField = {
  int: (description: string) => z.number().int().describe(description),
  bool: (description: string) => z.boolean().describe(description),
  string: (description: string) => z.string().describe(description),
  date: (description: string) => z.date().describe(description),
};

/** Keys starting with this prefix are ignored when binding config */
export const RESERVED_KEY_PREFIX = "_";

// ============================================================
// Runtime contexts
// ============================================================

export interface StorageContext {
  readonly flowName: string;
  readonly stepName: string;
  /** No external state may be changed; dummy data may be injected */
  readonly debug: boolean;
  /** Logger bound to this step */
  readonly logger: Logger;
  /** Log an info message attributed to this step */
  log(message: string): void;
}

export interface StepContext extends StorageContext {
  getMetadata(key: string): unknown;
  setMetadata(key: string, value: unknown): void;
  /** Read metadata of an expected shape; undefined if absent or malformed */
  readMetadata<T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>): T | undefined;
}

// ============================================================
// Step instances
// ============================================================

export interface RecordStep<R> {
  newRecords(records: R[], ctx: StepContext): R[] | Promise<R[]>;
}

export interface UpdateStep<R> {
  updateRecords(records: readonly RecordSlot<R>[], ctx: StepContext): void | Promise<void>;
}

export interface PropagateStep<R> {
  propagateRecords(records: readonly RecordSlot<R>[], ctx: StepContext): void | Promise<void>;
}

export interface RecordStorage<R> {
  getRecords(ctx: StorageContext): R[] | Promise<R[]>;
  setRecords(records: R[], ctx: StorageContext): void | Promise<void>;
}

// ============================================================
// Step types
// ============================================================

export interface ValidateInfo {
  /** Name the step is registered under */
  readonly stepName: string;
}

export interface StepDefinition<S extends ConfigShape, T> {
  /** Type name used in error messages, e.g. "IncrementStep" */
  readonly typeName: string;
  /** High-level description of what the step does */
  readonly description: string;
  /** Config fields, in the order they are documented */
  readonly config: S;
  /**
   * Check the bound config, possibly against live external state.
   * Throw (ideally a ValidationError) to reject it.
   */
  validate?(config: StepConfig<S>, info: ValidateInfo): void | Promise<void>;
  create(config: StepConfig<S>): T;
}

export interface RecordStepType<R, S extends ConfigShape = ConfigShape>
  extends StepDefinition<S, RecordStep<R>> {
  readonly kind: "record";
}

export interface UpdateStepType<R, S extends ConfigShape = ConfigShape>
  extends StepDefinition<S, UpdateStep<R>> {
  readonly kind: "update";
}

export interface PropagateStepType<R, S extends ConfigShape = ConfigShape>
  extends StepDefinition<S, PropagateStep<R>> {
  readonly kind: "propagate";
}

export interface RecordStorageType<R, S extends ConfigShape = ConfigShape>
  extends StepDefinition<S, RecordStorage<R>> {
  readonly kind: "storage";
}

export function defineRecordStep<R>() {
  return <S extends ConfigShape>(
    def: StepDefinition<S, RecordStep<R>>
  ): RecordStepType<R, S> => ({ ...def, kind: "record" });
}

export function defineUpdateStep<R>() {
  return <S extends ConfigShape>(
    def: StepDefinition<S, UpdateStep<R>>
  ): UpdateStepType<R, S> => ({ ...def, kind: "update" });
}

export function definePropagateStep<R>() {
  return <S extends ConfigShape>(
    def: StepDefinition<S, PropagateStep<R>>
  ): PropagateStepType<R, S> => ({ ...def, kind: "propagate" });
}

export function defineRecordStorage<R>() {
  return <S extends ConfigShape>(
    def: StepDefinition<S, RecordStorage<R>>
  ): RecordStorageType<R, S> => ({ ...def, kind: "storage" });
}

// ============================================================
// Description
// ============================================================

/** `{ _description, <key>: "(type) help" }` */
export type StepDescription = Record<string, string>;

function fieldTypeLabel(field: ConfigPrimitive): string {
  if (field instanceof z.ZodNumber) return field.isInt ? "int" : "number";
  if (field instanceof z.ZodBoolean) return "bool";
  if (field instanceof z.ZodString) return "string";
  return "date";
}

export function describeStepType<S extends ConfigShape, T>(
  type: StepDefinition<S, T>
): StepDescription {
  const description: StepDescription = {};
  for (const [key, field] of Object.entries(type.config)) {
    description[key] = `(${fieldTypeLabel(field)}) ${field.description ?? ""}`.trimEnd();
  }
  description[`${RESERVED_KEY_PREFIX}description`] = type.description;
  return description;
}

// ============================================================
// Instantiation
// ============================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isConfigPrimitive(value: unknown): value is ConfigPrimitive {
  return (
    value instanceof z.ZodNumber ||
    value instanceof z.ZodBoolean ||
    value instanceof z.ZodString ||
    value instanceof z.ZodDate
  );
}

/**
 * Reject step types that never filled in their description or config.
 */
function assertDefined<S extends ConfigShape, T>(type: StepDefinition<S, T>, name: string): void {
  const label = type.typeName || `step "${name}"`;
  if (typeof type.description !== "string" || type.description.trim() === "") {
    throw new ConfigError(`${label} didn't set a description`);
  }
  if (!isPlainObject(type.config) || !Object.values(type.config).every(isConfigPrimitive)) {
    throw new ConfigError(`${label} didn't set configuration types`);
  }
}

/**
 * Bind a raw config block to the step type's shape.
 */
export function bindStepConfig<S extends ConfigShape, T>(
  type: StepDefinition<S, T>,
  name: string,
  raw: unknown
): StepConfig<S> {
  if (!isPlainObject(raw)) {
    throw new ConfigError(`Configuration '${name}' isn't a mapping`, [
      { path: [name], message: "Expected a mapping", code: "invalid_type" },
    ]);
  }

  const candidate: Record<string, unknown> = {};
  const unknownKeys: string[] = [];
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith(RESERVED_KEY_PREFIX)) continue;
    if (!(key in type.config)) {
      unknownKeys.push(key);
      continue;
    }
    candidate[key] = value;
  }

  const issues: ConfigIssue[] = unknownKeys.map((key) => ({
    path: [name, key],
    message: "Unrecognized key",
    code: "unrecognized_keys",
  }));

  const result = z.object(type.config).safeParse(candidate);
  if (!result.success) {
    issues.push(...toConfigIssues(result.error.issues, [name]));
  }

  if (issues.length > 0 || !result.success) {
    const summary = issues
      .map((issue) => `${issue.path.slice(1).join(".")} (${issue.message})`)
      .join("; ");
    throw new ConfigError(
      `Invalid configuration for ${type.typeName} step "${name}": ${summary}`,
      issues
    );
  }

  Object.freeze(result.data);
  return result.data;
}

/**
 * Build a configured step instance. All-or-nothing: either a ready instance
 * is returned, or a ConfigError / ValidationError is thrown.
 */
export async function instantiateStep<S extends ConfigShape, T>(
  type: StepDefinition<S, T>,
  name: string,
  raw: unknown
): Promise<T> {
  assertDefined(type, name);
  const config = bindStepConfig(type, name, raw);

  if (type.validate) {
    try {
      await type.validate(config, { stepName: name });
    } catch (err) {
      if (err instanceof ValidationError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationError(name, reason, { cause: err });
    }
  }

  return type.create(config);
}

// ============================================================
// Type-erased blueprints
// ============================================================

/**
 * A step type with its config shape erased, so flows can hold step types
 * with different shapes side by side.
 */
export interface StepBlueprint<T> {
  readonly kind: StepKind;
  readonly typeName: string;
  describe(): StepDescription;
  instantiate(name: string, raw: unknown): Promise<T>;
}

export function toBlueprint<S extends ConfigShape, T>(
  type: StepDefinition<S, T> & { readonly kind: StepKind }
): StepBlueprint<T> {
  return {
    kind: type.kind,
    typeName: type.typeName,
    describe: () => describeStepType(type),
    instantiate: (name, raw) => instantiateStep(type, name, raw),
  };
}
