import type {
  Outcome,
  RunObserver,
  SuiteEntry,
  TestPath,
} from "../core/model.js";
import type { CapturePort, ExecutionStrategy } from "../core/ports/ExecutionStrategy.js";
import { classify } from "./classify.js";

type Run<A> = (args: A) => Promise<Outcome>;

/**
 * Cooperative host: test bodies may return promises. Each test is awaited
 * in full, output capture included, before the next one starts, so the
 * only concurrency is inside a single test body.
 */
export class DeferredStrategy implements ExecutionStrategy<"deferred"> {
  readonly effect = "deferred";

  protect<A>(body: (args: A) => void | Promise<void>): Run<A> {
    return async (args) => {
      try {
        await body(args);
        return { status: "ok" };
      } catch (error) {
        return classify(error);
      }
    };
  }

  constant<A>(outcome: Outcome): Run<A> {
    return async () => outcome;
  }

  capture<A>(port: CapturePort, path: TestPath, run: Run<A>): Run<A> {
    if (!port.enabled) return run;

    return async (args) => {
      const redirection = await port.openQueued(path);
      let outcome: Outcome;
      try {
        outcome = await run(args);
        port.record(redirection, outcome);
      } finally {
        redirection.release();
      }
      port.echo(outcome);
      return outcome;
    };
  }

  async sequence<A>(
    entries: readonly SuiteEntry<Run<A>>[],
    args: A,
    observer: RunObserver
  ): Promise<Outcome[]> {
    const outcomes: Outcome[] = [];
    for (const { path, run } of entries) {
      observer.onStart(path);
      const outcome = await run(args);
      observer.onResult(path, outcome);
      outcomes.push(outcome);
    }
    return outcomes;
  }

  async done<T>(value: T): Promise<T> {
    return value;
  }

  after<T, U>(value: Promise<T>, fn: (value: T) => U): Promise<U> {
    return value.then(fn);
  }

  async attempt<T>(fn: () => Promise<T>, onError: (error: unknown) => T): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      return onError(error);
    }
  }

  settle<T>(value: Promise<T>): Promise<T> {
    return value;
  }
}
