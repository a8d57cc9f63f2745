/**
 * Core domain types for the harness package.
 * Host-agnostic: nothing here knows whether tests run synchronously or not.
 */

/**
 * Identity of one test case: its group name and its position in the group.
 */
export interface TestPath {
  readonly name: string;
  readonly index: number;
}

/**
 * Speed tier of a test case.
 *
 * - quick: always runs
 * - slow: skipped when the run is restricted to quick tests
 */
export type SpeedLevel = "quick" | "slow";

/**
 * Category of an uncaught fault inside a test body.
 */
export type FaultKind = "failure" | "invalid" | "exception";

/**
 * Classified result of attempting one test.
 */
export type Outcome =
  | { status: "ok" }
  | { status: "check-failed"; message: string }
  | { status: "fault"; kind: FaultKind; message: string }
  | { status: "skipped" }
  | { status: "pending"; message: string };

export type OutcomeStatus = Outcome["status"];

/**
 * How the host runs test bodies.
 *
 * - immediate: bodies are synchronous, each call blocks until done
 * - deferred: bodies may return promises, each one is awaited before the next starts
 */
export type Effect = "immediate" | "deferred";

/** A value produced now (immediate) or later (deferred). */
export type Eventually<E extends Effect, T> = E extends "deferred" ? Promise<T> : T;

/** A user-supplied test body. */
export type TestBody<E extends Effect, A> = E extends "deferred"
  ? (args: A) => void | Promise<void>
  : (args: A) => void;

/** A test body wrapped so that it always yields an Outcome. */
export type ProtectedRun<E extends Effect, A> = (args: A) => Eventually<E, Outcome>;

/**
 * A test case as written by the user, before registration.
 */
export interface TestCase<E extends Effect, A> {
  readonly description: string;
  readonly speed: SpeedLevel;
  readonly body: TestBody<E, A>;
}

/**
 * A named group of test cases. Case N of the group gets the path (name, N).
 */
export interface TestGroup<E extends Effect, A> {
  readonly name: string;
  readonly cases: readonly TestCase<E, A>[];
}

/**
 * One registered entry, in registration order.
 */
export interface SuiteEntry<R> {
  readonly path: TestPath;
  readonly run: R;
}

/**
 * Counts for one run.
 */
export interface RunSummary {
  /** Tests that were actually attempted (ok, check-failed, fault) */
  ran: number;
  /** Tests that count as failing (check-failed, fault, pending) */
  failed: number;
  /** Wall time in seconds */
  time: number;
}

/**
 * Summary object printed in JSON mode.
 */
export interface MachineSummary {
  success: number;
  failures: number;
  time: number;
}

/**
 * Receives each test's start and result.
 */
export interface RunObserver {
  onStart(path: TestPath): void;
  onResult(path: TestPath, outcome: Outcome): void;
}

/**
 * Minimal writable target. process.stdout and process.stderr satisfy it.
 */
export interface Sink {
  write(chunk: string | Uint8Array, ...rest: unknown[]): boolean;
}

/**
 * Options resolved from flags and environment.
 */
export interface RunConfig {
  /** Base directory for run output */
  outputDir: string;
  /** Disable output capture and show everything live */
  verbose: boolean;
  /** One character per test result */
  compact: boolean;
  /** Print every error report, not just the most recent */
  showErrors: boolean;
  /** Skip slow tests */
  quickTests: boolean;
  /** Print only a machine-readable summary */
  json: boolean;
}

/**
 * Which tests to select in a `test` command.
 */
export interface FilterCriteria {
  readonly pattern?: RegExp;
  readonly cases?: CaseSelection;
}

/** Case indices to run; a ReadonlySet<number> qualifies. */
export interface CaseSelection {
  has(index: number): boolean;
}

export type FilterMode = "drop" | "substitute";

/**
 * A parsed command line.
 */
export type Command =
  | { kind: "run"; config: RunConfig }
  | { kind: "test"; config: RunConfig; criteria: FilterCriteria }
  | { kind: "list"; config: RunConfig }
  | { kind: "help" };
