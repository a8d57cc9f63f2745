import type {
  Outcome,
  RunObserver,
  SuiteEntry,
  TestPath,
} from "../core/model.js";
import type { CapturePort, ExecutionStrategy } from "../core/ports/ExecutionStrategy.js";
import { classify, isThenable } from "./classify.js";

type Run<A> = (args: A) => Outcome;

const RETURNED_PROMISE =
  "test body returned a promise; register it with the deferred harness";

/**
 * Synchronous host: every test body is a plain function and runs to
 * completion inside the call.
 */
export class ImmediateStrategy implements ExecutionStrategy<"immediate"> {
  readonly effect = "immediate";

  protect<A>(body: (args: A) => void): Run<A> {
    return (args) => {
      try {
        // Typed as returning void, but an async function still type-checks here.
        const returned: unknown = body(args);
        if (isThenable(returned)) {
          returned.then(undefined, () => undefined);
          return { status: "fault", kind: "exception", message: RETURNED_PROMISE };
        }
        return { status: "ok" };
      } catch (error) {
        return classify(error);
      }
    };
  }

  constant<A>(outcome: Outcome): Run<A> {
    return () => outcome;
  }

  capture<A>(port: CapturePort, path: TestPath, run: Run<A>): Run<A> {
    if (!port.enabled) return run;

    return (args) => {
      const redirection = port.open(path);
      let outcome: Outcome;
      try {
        outcome = run(args);
        port.record(redirection, outcome);
      } finally {
        redirection.release();
      }
      port.echo(outcome);
      return outcome;
    };
  }

  sequence<A>(entries: readonly SuiteEntry<Run<A>>[], args: A, observer: RunObserver): Outcome[] {
    const outcomes: Outcome[] = [];
    for (const { path, run } of entries) {
      observer.onStart(path);
      const outcome = run(args);
      observer.onResult(path, outcome);
      outcomes.push(outcome);
    }
    return outcomes;
  }

  done<T>(value: T): T {
    return value;
  }

  after<T, U>(value: T, fn: (value: T) => U): U {
    return fn(value);
  }

  attempt<T>(fn: () => T, onError: (error: unknown) => T): T {
    try {
      return fn();
    } catch (error) {
      return onError(error);
    }
  }

  async settle<T>(value: T): Promise<T> {
    return value;
  }
}
