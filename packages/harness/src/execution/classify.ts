import type { Outcome } from "../core/model.js";
import { CheckError, Failure, InvalidArgument, PendingSignal } from "../core/signals.js";

/**
 * Stack frames of an error, without the header line, prefixed by a newline.
 * Empty when the runtime recorded none.
 */
export function traceOf(error: unknown): string {
  if (!(error instanceof Error) || typeof error.stack !== "string") {
    return "";
  }
  const frames = error.stack
    .split("\n")
    .filter((line) => /^\s+at\s/.test(line));
  return frames.length > 0 ? `\n${frames.join("\n")}` : "";
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Classify anything a test body threw.
 */
export function classify(error: unknown): Outcome {
  if (error instanceof PendingSignal) {
    return { status: "pending", message: error.message };
  }
  if (error instanceof CheckError) {
    return { status: "check-failed", message: error.message + traceOf(error) };
  }
  if (error instanceof Failure) {
    return { status: "fault", kind: "failure", message: error.message + traceOf(error) };
  }
  if (error instanceof InvalidArgument) {
    return { status: "fault", kind: "invalid", message: error.message + traceOf(error) };
  }
  return { status: "fault", kind: "exception", message: describe(error) + traceOf(error) };
}

/**
 * One-line rendering of a failing outcome, or null for the others.
 */
export function failureLine(outcome: Outcome): string | null {
  switch (outcome.status) {
    case "check-failed":
      return `Test error: ${outcome.message}`;
    case "fault":
      return `[${outcome.kind}] ${outcome.message}`;
    default:
      return null;
  }
}

export function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}
