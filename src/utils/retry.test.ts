/**
 * Retry Tests
 *
 * Run with: npm test
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { ConfigError } from "../errors.js";
import { RETRY_ATTEMPTS, retryCall, retryCallWith } from "./retry.js";

function flaky(failures: number) {
  let calls = 0;
  const fn = async (value: string): Promise<string> => {
    calls++;
    if (calls <= failures) {
      throw new Error(`failure ${calls}`);
    }
    return value;
  };
  return { fn, calls: () => calls };
}

describe("retryCall", () => {
  test("returns the first success", async () => {
    const { fn, calls } = flaky(3);
    assert.equal(await retryCall(fn, "ok"), "ok");
    assert.equal(calls(), 4);
  });

  test("succeeds on the last attempt", async () => {
    const { fn, calls } = flaky(RETRY_ATTEMPTS - 1);
    assert.equal(await retryCall(fn, "ok"), "ok");
    assert.equal(calls(), RETRY_ATTEMPTS);
  });

  test("rethrows the last error after exactly 10 attempts", async () => {
    const { fn, calls } = flaky(Infinity);
    await assert.rejects(retryCall(fn, "never"), { message: "failure 10" });
    assert.equal(calls(), 10);
  });

  test("works with synchronous functions", async () => {
    assert.equal(await retryCall((a: number, b: number) => a + b, 2, 3), 5);
  });
});

describe("retryCallWith", () => {
  test("honours the attempt budget", async () => {
    const { fn, calls } = flaky(Infinity);
    await assert.rejects(retryCallWith(2, fn, "x"), { message: "failure 2" });
    assert.equal(calls(), 2);
  });

  test("rejects a budget below one", async () => {
    await assert.rejects(retryCallWith(0, () => 1), ConfigError);
  });
});
