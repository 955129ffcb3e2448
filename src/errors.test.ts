/**
 * Error Tests
 *
 * Run with: npm test
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { z } from "zod";
import {
  ConfigError,
  LockError,
  SchedulingError,
  StepExecutionError,
  ValidationError,
  describeError,
  toConfigIssues,
} from "./errors.js";

describe("ConfigError", () => {
  test("format() without issues is the message", () => {
    assert.equal(new ConfigError("Flow x isn't configured").format(), "Flow x isn't configured");
  });

  test("format() lists every issue by path", () => {
    const err = new ConfigError("Invalid configuration", [
      { path: ["inc", "increment"], message: "Required", code: "invalid_type" },
      { path: [], message: "Expected a mapping", code: "invalid_type" },
    ]);
    assert.equal(
      err.format(),
      "Invalid configuration\n  - inc.increment: Required\n  - (root): Expected a mapping"
    );
  });
});

describe("toConfigIssues", () => {
  test("prefixes zod issue paths", () => {
    const result = z.object({ increment: z.number() }).safeParse({ increment: "two" });
    assert.equal(result.success, false);
    if (result.success) return;

    const issues = toConfigIssues(result.error.issues, ["increment-2"]);
    assert.equal(issues.length, 1);
    assert.deepEqual(issues[0]?.path, ["increment-2", "increment"]);
    assert.equal(issues[0]?.code, "invalid_type");
  });
});

describe("step and lock errors", () => {
  test("ValidationError prefixes the step name", () => {
    const err = new ValidationError("increment-2", "The increment must not be negative");
    assert.equal(err.message, "increment-2: The increment must not be negative");
    assert.equal(err.stepName, "increment-2");
    assert.equal(err.name, "ValidationError");
  });

  test("StepExecutionError keeps the cause", () => {
    const cause = new Error("boom");
    const err = new StepExecutionError("print-sum", cause);
    assert.equal(err.message, "Step print-sum failed: boom");
    assert.equal(err.cause, cause);
  });

  test("SchedulingError lists blocked steps", () => {
    const err = new SchedulingError("stuck", ["a", "b"]);
    assert.deepEqual(err.blocked, ["a", "b"]);
  });

  test("LockError names the lock", () => {
    assert.equal(new LockError("abc", "timed out").message, "Lock abc: timed out");
  });
});

describe("describeError", () => {
  test("renders non-errors as strings", () => {
    assert.equal(describeError("plain"), "plain");
    assert.equal(describeError(42), "42");
  });

  test("uses ConfigError.format()", () => {
    const err = new ConfigError("Bad", [{ path: ["a"], message: "Required", code: "x" }]);
    assert.equal(describeError(err), "Bad\n  - a: Required");
  });
});
