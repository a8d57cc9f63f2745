import type {
  Effect,
  Eventually,
  Outcome,
  ProtectedRun,
  RunObserver,
  SuiteEntry,
  TestBody,
  TestPath,
} from "../model.js";

/**
 * A held redirection of the process output channel to one test's file.
 */
export interface Redirection {
  /** File the channel currently writes to */
  readonly file: string;

  /** Append text to the file, bypassing the redirected channel. */
  append(text: string): void;

  /** Restore the original channel. Safe to call more than once. */
  release(): void;
}

/**
 * Port for the per-test output capture used by the strategies.
 */
export interface CapturePort {
  /** False in verbose mode: tests write straight to the console. */
  readonly enabled: boolean;

  /**
   * Redirect the channel to the test's file now.
   * Throws ChannelBusyError if another test holds it.
   */
  open(path: TestPath): Redirection;

  /**
   * Redirect the channel to the test's file once the current holder releases it.
   */
  openQueued(path: TestPath): Promise<Redirection>;

  /**
   * Called while the redirection is still held, with the test's outcome.
   */
  record(redirection: Redirection, outcome: Outcome): void;

  /**
   * Called after the channel has been restored.
   */
  echo(outcome: Outcome): void;
}

/**
 * Port for running tests under one host execution model.
 *
 * Both implementations run entries strictly one at a time: an entry's
 * outcome, including any awaited work, is settled before the next starts.
 */
export interface ExecutionStrategy<E extends Effect> {
  readonly effect: E;

  /**
   * Wrap a test body so that every fault becomes an Outcome.
   */
  protect<A>(body: TestBody<E, A>): ProtectedRun<E, A>;

  /**
   * A run that ignores its input and yields `outcome`.
   */
  constant<A>(outcome: Outcome): ProtectedRun<E, A>;

  /**
   * Hold the output redirection for the duration of `run`.
   */
  capture<A>(port: CapturePort, path: TestPath, run: ProtectedRun<E, A>): ProtectedRun<E, A>;

  /**
   * Run every entry in order, reporting each start and result to `observer`.
   */
  sequence<A>(
    entries: readonly SuiteEntry<ProtectedRun<E, A>>[],
    args: A,
    observer: RunObserver
  ): Eventually<E, Outcome[]>;

  /** Lift a plain value. */
  done<T>(value: T): Eventually<E, T>;

  /** Continue with `fn` once `value` is settled. */
  after<T, U>(value: Eventually<E, T>, fn: (value: T) => U): Eventually<E, U>;

  /**
   * Call `fn`; if it throws or its result fails, settle with `onError` instead.
   */
  attempt<T>(fn: () => Eventually<E, T>, onError: (error: unknown) => T): Eventually<E, T>;

  /** View a result as a promise, whatever the host. */
  settle<T>(value: Eventually<E, T>): Promise<T>;
}
