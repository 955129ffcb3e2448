/**
 * Retrying flaky calls.
 *
 * Steps wrap calls to external services in retryCall(). The call is
 * repeated immediately on failure; once the attempt budget is spent the
 * last error is rethrown as-is.
 */

import { ConfigError } from "../errors.js";

/** Attempts made by retryCall() */
export const RETRY_ATTEMPTS = 10;

/**
 * Call `fn(...args)` up to `attempts` times, returning the first success.
 */
export async function retryCallWith<A extends unknown[], T>(
  attempts: number,
  fn: (...args: A) => T | Promise<T>,
  ...args: A
): Promise<T> {
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new ConfigError(`Retry attempts must be a positive integer, got: ${attempts}`);
  }

  let remaining = attempts;
  for (;;) {
    try {
      return await fn(...args);
    } catch (err) {
      remaining--;
      if (remaining === 0) {
        throw err;
      }
    }
  }
}

/**
 * Call `fn(...args)` up to RETRY_ATTEMPTS times, returning the first success.
 */
export function retryCall<A extends unknown[], T>(
  fn: (...args: A) => T | Promise<T>,
  ...args: A
): Promise<T> {
  return retryCallWith(RETRY_ATTEMPTS, fn, ...args);
}
