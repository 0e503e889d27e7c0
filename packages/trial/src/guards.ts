import { constant } from "@funky/prelude";
import type { Trial, Success, Failure, Failures } from "./trial.js";
import { matches } from "./matching.js";

/**
 * Type guard for Success
 *
 * @example
 * ```typescript
 * const trial = success(42);
 * if (isSuccess(trial)) {
 *   console.log(trial.value); // 42
 * }
 * ```
 */
export function isSuccess<A, R>(trial: Trial<A, R>): trial is Success<A> {
  return matches(trial, constant(true), constant(false));
}

/**
 * Type guard for either failure form
 */
export function isFailure<A, R>(
  trial: Trial<A, R>,
): trial is Failure<R> | Failures<R> {
  return matches(trial, constant(false), constant(true));
}
