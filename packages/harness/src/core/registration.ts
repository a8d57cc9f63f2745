import type { Result } from "@runcase/core";
import { Ok, Err } from "@runcase/core";

import type { Effect, ProtectedRun, TestCase, TestGroup } from "./model.js";
import type { ExecutionStrategy } from "./ports/ExecutionStrategy.js";
import { InvalidNameError } from "./errors.js";
import { pathOf } from "./path.js";
import { Suite } from "./Suite.js";

export const NAME_PATTERN = "^[a-zA-Z0-9_\\- ]+$";
const NAME_REGEX = new RegExp(NAME_PATTERN);

/**
 * Accumulated registration state: the suite so far, or every name error seen.
 */
export type Registration<E extends Effect, A> = Result<Suite<ProtectedRun<E, A>>, InvalidNameError[]>;

export function validateName(name: string): Result<string, InvalidNameError> {
  if (!NAME_REGEX.test(name)) {
    return Err(new InvalidNameError(name, NAME_PATTERN));
  }
  return Ok(name);
}

/**
 * Ensure a non-empty description ends with a period.
 */
export function normalizeDescription(description: string): string {
  if (description === "" || description.endsWith(".")) {
    return description;
  }
  return `${description}.`;
}

function addGroup<E extends Effect, A>(
  suite: Suite<ProtectedRun<E, A>>,
  strategy: ExecutionStrategy<E>,
  name: string,
  cases: readonly TestCase<E, A>[]
): Suite<ProtectedRun<E, A>> {
  cases.forEach((testCase, index) => {
    suite.add(
      pathOf(name, index),
      normalizeDescription(testCase.description),
      testCase.speed,
      strategy.protect<A>(testCase.body)
    );
  });
  return suite;
}

/**
 * Register one group on top of `state`.
 *
 * Invalid names accumulate instead of failing fast. Once an error has been
 * seen no more groups are added, but later names are still validated.
 * Duplicate paths throw DuplicateTestError.
 */
export function register<E extends Effect, A>(
  state: Registration<E, A>,
  strategy: ExecutionStrategy<E>,
  group: TestGroup<E, A>
): Registration<E, A> {
  const validated = validateName(group.name);

  if (!state.ok) {
    return validated.ok ? state : Err([...state.error, validated.error]);
  }
  if (!validated.ok) {
    return Err([validated.error]);
  }
  return Ok(addGroup(state.value, strategy, group.name, group.cases));
}

/**
 * Register every group in order.
 */
export function registerAll<E extends Effect, A>(
  strategy: ExecutionStrategy<E>,
  groups: readonly TestGroup<E, A>[]
): Registration<E, A> {
  return groups.reduce<Registration<E, A>>(
    (state, group) => register(state, strategy, group),
    Ok(new Suite<ProtectedRun<E, A>>())
  );
}
