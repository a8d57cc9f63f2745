/**
 * Signals a test body throws to report how it ended.
 * The protected executor turns each one into a matching Outcome.
 */

import { inspect, isDeepStrictEqual } from "node:util";

/**
 * A check inside the test did not hold.
 */
export class CheckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CheckError";
  }
}

/**
 * The test gave up with a generic failure.
 */
export class Failure extends Error {
  constructor(message: string) {
    super(message);
    this.name = "Failure";
  }
}

/**
 * The test (or code it calls) was handed an argument it cannot use.
 */
export class InvalidArgument extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgument";
  }
}

/**
 * The test is deliberately not implemented yet.
 */
export class PendingSignal extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PendingSignal";
  }
}

export function fail(message: string): never {
  throw new Failure(message);
}

export function todo(message = "not implemented"): never {
  throw new PendingSignal(message);
}

/**
 * Throw a check failure unless `condition` holds.
 */
export function check(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new CheckError(message);
  }
}

/**
 * Compare two values by deep strict equality.
 */
export function checkEqual<T>(message: string, expected: T, actual: T): void {
  if (isDeepStrictEqual(expected, actual)) return;
  throw new CheckError(`${message}\nexpected: ${inspect(expected)}\n  actual: ${inspect(actual)}`);
}
