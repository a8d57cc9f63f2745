/**
 * Errors that invalidate a whole run.
 * Faults inside a test body never surface as these; they become Outcomes.
 */

export type HarnessErrorCode =
  | "DUPLICATE_TEST"
  | "INVALID_NAME"
  | "REGISTRATION"
  | "EMPTY_SELECTION"
  | "USAGE"
  | "OUTPUT_CAPTURE"
  | "CHANNEL_BUSY"
  | "TEST_FAILURES";

export abstract class HarnessError extends Error {
  abstract readonly code: HarnessErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Two registered paths share a file key.
 */
export class DuplicateTestError extends HarnessError {
  readonly code = "DUPLICATE_TEST";

  constructor(readonly testName: string) {
    super(`Duplicate test name: ${testName}`);
  }
}

/**
 * A group name contains characters outside the allowed set.
 */
export class InvalidNameError extends HarnessError {
  readonly code = "INVALID_NAME";

  constructor(
    readonly testName: string,
    readonly pattern: string
  ) {
    super(`Error: ${JSON.stringify(testName)} is not a valid test label (must match ${pattern}).`);
  }
}

/**
 * Every invalid group name found while registering, reported together.
 */
export class RegistrationError extends HarnessError {
  readonly code = "REGISTRATION";

  constructor(readonly errors: readonly InvalidNameError[]) {
    super(errors.map((e) => e.message).join("\n"));
  }
}

/**
 * A selection matched no registered test.
 */
export class EmptySelectionError extends HarnessError {
  readonly code = "EMPTY_SELECTION";

  constructor() {
    super("Invalid request (no tests to run, filter skipped everything)!");
  }
}

/**
 * Malformed command line or environment.
 */
export class UsageError extends HarnessError {
  readonly code = "USAGE";
}

/**
 * The run directory or an output file could not be set up.
 */
export class OutputCaptureError extends HarnessError {
  readonly code = "OUTPUT_CAPTURE";
}

/**
 * The output channel is already redirected by another test.
 */
export class ChannelBusyError extends HarnessError {
  readonly code = "CHANNEL_BUSY";

  constructor(readonly heldBy: string) {
    super(`Output channel is already redirected to ${heldBy}`);
  }
}

/**
 * Raised instead of exiting when tests failed and the caller asked not to exit.
 */
export class TestError extends HarnessError {
  readonly code = "TEST_FAILURES";

  constructor(readonly failures: number) {
    super(`${failures} test${failures === 1 ? "" : "s"} failed`);
  }
}
