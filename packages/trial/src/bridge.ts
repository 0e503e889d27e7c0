import { matches as matchesMaybe, some, none } from "@funky/maybe";
import type { Maybe } from "@funky/maybe";
import type { Trial } from "./trial.js";
import { success, failure } from "./constructors.js";
import { matches } from "./matching.js";

/**
 * Convert a Maybe into a Trial. An absent value carries no reason of its
 * own, so the caller supplies the one the failure should hold.
 *
 * @example
 * ```typescript
 * toTrial(some(42), "missing"); // Success { value: 42 }
 * toTrial(none(), "missing"); // Failure { reason: "missing" }
 * ```
 */
export function toTrial<A, R>(maybe: Maybe<A>, reason: R): Trial<A, R> {
  return matchesMaybe(maybe, success, () => failure(reason));
}

/**
 * Convert a Trial into a Maybe. Every failure becomes `None` and its reasons
 * are dropped.
 *
 * @example
 * ```typescript
 * toMaybe(success(42)); // Some { value: 42 }
 * toMaybe(failures(["a", "b"])); // None
 * ```
 */
export function toMaybe<A, R>(trial: Trial<A, R>): Maybe<A> {
  return matches(trial, some, none);
}
