import { constant, identity, NotFoundError } from "@funky/prelude";
import type { Trial } from "./trial.js";
import { matches } from "./matching.js";

/**
 * Extract the value or throw `NotFoundError`
 *
 * Only for call sites that have already established success. The thrown
 * error keeps the reasons of the failure, but it is a fault, not a reason:
 * catch it with `isNotFoundError`.
 *
 * @throws NotFoundError if the Trial is a failure
 *
 * @example
 * ```typescript
 * unwrap(success(42)); // 42
 * unwrap(failure("timeout")); // throws NotFoundError { reasons: ["timeout"] }
 * ```
 */
export function unwrap<A, R>(trial: Trial<A, R>): A {
  return matches(trial, identity, (reasons) => {
    throw new NotFoundError("Expected Success but the Trial failed", reasons);
  });
}

export function unwrapOr<A, R>(trial: Trial<A, R>, defaultValue: A): A {
  return matches(trial, identity, constant(defaultValue));
}

/**
 * Extract value or compute default from the reasons
 *
 * @example
 * ```typescript
 * unwrapOrElse(failures(["a", "b"]), (reasons) => reasons.length); // 2
 * ```
 */
export function unwrapOrElse<A, R>(
  trial: Trial<A, R>,
  fn: (reasons: readonly R[]) => A,
): A {
  return matches(trial, identity, fn);
}

/**
 * Get the value if Success, undefined otherwise
 */
export function getOrUndefined<A, R>(trial: Trial<A, R>): A | undefined {
  return matches(trial, identity, constant(undefined));
}

/**
 * Get the reasons of a failure; empty for a success
 */
export function getReasons<A, R>(trial: Trial<A, R>): readonly R[] {
  return matches(trial, constant([]), identity);
}
