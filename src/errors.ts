/**
 * Error taxonomy for flows.
 *
 * - ConfigError: registration or configuration is wrong. Always raised
 *   before any record is fetched.
 * - ValidationError: a step's validate() hook rejected its configuration.
 * - StepExecutionError: a step threw while running inside a phase.
 * - SchedulingError: a phase's dependency graph can never complete.
 * - LockError: a global lock could not be set up or acquired in time.
 */

import type { ZodIssue } from "zod";

/**
 * Individual configuration issue.
 */
export interface ConfigIssue {
  /** Path to the offending key */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Machine-readable code (zod issue code or a local one) */
  code: string;
}

export class ConfigError extends Error {
  public readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }

  /**
   * Format the error and its issues for display.
   */
  format(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    const lines = [this.message];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Convert zod issues to our structured format, optionally under a prefix.
 */
export function toConfigIssues(
  zodIssues: ZodIssue[],
  prefix: (string | number)[] = []
): ConfigIssue[] {
  return zodIssues.map((issue) => ({
    path: [
      ...prefix,
      ...issue.path.filter(
        (p): p is string | number => typeof p === "string" || typeof p === "number"
      ),
    ],
    message: issue.message,
    code: issue.code,
  }));
}

export class ValidationError extends Error {
  public readonly stepName: string;

  constructor(stepName: string, message: string, options?: { cause?: unknown }) {
    super(`${stepName}: ${message}`, options);
    this.name = "ValidationError";
    this.stepName = stepName;
  }
}

export class StepExecutionError extends Error {
  public readonly stepName: string;

  constructor(stepName: string, cause: unknown) {
    super(`Step ${stepName} failed: ${describeError(cause)}`, { cause });
    this.name = "StepExecutionError";
    this.stepName = stepName;
  }
}

export class SchedulingError extends Error {
  /** Steps that can never be dispatched */
  public readonly blocked: string[];

  constructor(message: string, blocked: string[]) {
    super(message);
    this.name = "SchedulingError";
    this.blocked = blocked;
  }
}

export class LockError extends Error {
  public readonly lockId: string;

  constructor(lockId: string, message: string, options?: { cause?: unknown }) {
    super(`Lock ${lockId}: ${message}`, options);
    this.name = "LockError";
    this.lockId = lockId;
  }
}

/**
 * Render any thrown value as a one-line message.
 */
export function describeError(err: unknown): string {
  if (err instanceof ConfigError) {
    return err.format();
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
