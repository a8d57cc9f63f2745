import type { Effect, SpeedLevel, TestGroup, TestPath } from "./core/model.js";
import { RegistrationError } from "./core/errors.js";
import { comparePaths, display } from "./core/path.js";
import { registerAll } from "./core/registration.js";
import type { Harness, RunOptions, RunReport } from "./Harness.js";

export interface ListedTest {
  path: TestPath;
  /** Display identity, e.g. `math.001` */
  id: string;
  description: string;
  speed: SpeedLevel;
}

/**
 * A suite packaged for tools that load it from a module and drive it
 * without a command line of their own.
 */
export interface SuiteDefinition {
  readonly name: string;

  /** Every registered test, sorted by path. Throws on registration errors. */
  list(): ListedTest[];

  /** Run with the given options. Never exits the process. */
  execute(options: RunOptions): Promise<RunReport>;
}

export function defineSuite<E extends Effect, A>(
  harness: Harness<E>,
  name: string,
  groups: readonly TestGroup<E, A>[],
  args: A
): SuiteDefinition {
  return {
    name,
    list: () => {
      const registration = registerAll(harness.strategy, groups);
      if (!registration.ok) {
        throw new RegistrationError(registration.error);
      }
      const suite = registration.value;
      return suite
        .all()
        .map(({ path }) => ({
          path,
          id: display(path),
          description: suite.description(path),
          speed: suite.speed(path),
        }))
        .sort((a, b) => comparePaths(a.path, b.path));
    },
    execute: async (options) => harness.strategy.settle(harness.execute(name, args, groups, options)),
  };
}

/**
 * Whether a loaded module export looks like a SuiteDefinition.
 */
export function isSuiteDefinition(value: unknown): value is SuiteDefinition {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "list" in value &&
    typeof value.list === "function" &&
    "execute" in value &&
    typeof value.execute === "function"
  );
}
