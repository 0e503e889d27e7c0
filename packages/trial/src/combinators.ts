import { constant } from "@funky/prelude";
import type { Trial } from "./trial.js";
import { success, failure } from "./constructors.js";
import { matches } from "./matching.js";
import { bind, map } from "./transformations.js";

/**
 * Combine several Trials: Success with every value in order, or the first
 * failure unchanged. Reasons of later failures are not collected.
 *
 * @example
 * ```typescript
 * all([success(1), success(2)]); // Success { value: [1, 2] }
 * all([success(1), failure("a"), failure("b")]); // Failure { reason: "a" }
 * ```
 */
export function all<A, R>(trials: readonly Trial<A, R>[]): Trial<A[], R> {
  return trials.reduce<Trial<A[], R>>(
    (accumulated, trial) =>
      bind(accumulated, (values) => map(trial, (value) => [...values, value])),
    success([]),
  );
}

/**
 * Run function for side effects (such as logging) on a success value
 *
 * @example
 * ```typescript
 * tap(loadConfig(), (config) => logger.info("config loaded", config.name));
 * ```
 */
export function tap<A, R>(
  trial: Trial<A, R>,
  fn: (value: A) => void,
): Trial<A, R> {
  matches(trial, fn, constant(undefined));
  return trial;
}

/**
 * Run function for side effects (such as logging) on the reasons of a failure
 *
 * @example
 * ```typescript
 * tapFailure(loadConfig(), (reasons) => logger.warn("config rejected", reasons));
 * ```
 */
export function tapFailure<A, R>(
  trial: Trial<A, R>,
  fn: (reasons: readonly R[]) => void,
): Trial<A, R> {
  matches(trial, constant(undefined), fn);
  return trial;
}

/**
 * Try a synchronous function and wrap the outcome in a Trial. A thrown value
 * becomes the single reason, as mapped by `onError`.
 *
 * @example
 * ```typescript
 * const parsed = tryCatch(
 *   () => JSON.parse(input) as unknown,
 *   (error) => (error instanceof Error ? error.message : String(error)),
 * );
 * ```
 */
export function tryCatch<A, R>(
  fn: () => A,
  onError: (error: unknown) => R,
): Trial<A, R> {
  try {
    return success(fn());
  } catch (error) {
    return failure(onError(error));
  }
}
