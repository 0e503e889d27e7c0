import { constant, NOT_FOUND } from "@funky/prelude";
import type { NotFound } from "@funky/prelude";
import type { Trial } from "./trial.js";
import { success, failure } from "./constructors.js";
import { failures } from "./normalize.js";
import { matches } from "./matching.js";

/**
 * Chain Trials (flatMap/bind)
 *
 * A failure is propagated with its reasons unchanged and `fn` is not called.
 *
 * @example
 * ```typescript
 * bind(success(42), (x) => success(x + 1)); // Success { value: 43 }
 * bind(success(42), () => failure("error2")); // Failure { reason: "error2" }
 * bind(failure("error1"), () => failure("error2")); // Failure { reason: "error1" }
 * ```
 */
export function bind<A, R, B, R2>(
  trial: Trial<A, R>,
  fn: (value: A) => Trial<B, R2>,
): Trial<B, R | R2> {
  return matches(trial, fn, failures);
}

/**
 * Transform the success value, wrapping the result in `Success`
 *
 * @example
 * ```typescript
 * map(success(42), (x) => x + 1); // Success { value: 43 }
 * map(failure("error1"), (x: number) => x + 1); // Failure { reason: "error1" }
 * ```
 */
export function map<A, R, B>(
  trial: Trial<A, R>,
  fn: (value: A) => B,
): Trial<B, R> {
  return matches(trial, (value) => success(fn(value)), failures);
}

/**
 * Transform every reason of a failure
 *
 * @example
 * ```typescript
 * mapReasons(failures(["a", "b"]), (r) => r.toUpperCase());
 * // Failures { reasons: ["A", "B"] }
 * ```
 */
export function mapReasons<A, R, R2>(
  trial: Trial<A, R>,
  fn: (reason: R) => R2,
): Trial<A, R2> {
  return matches(trial, success, (reasons) =>
    failures(reasons.map((reason) => fn(reason))),
  );
}

/**
 * Replace a failure with the Trial built from its reasons
 *
 * @example
 * ```typescript
 * recover(failure("missing"), () => success(0)); // Success { value: 0 }
 * ```
 */
export function recover<A, R, B, R2>(
  trial: Trial<A, R>,
  fn: (reasons: readonly R[]) => Trial<B, R2>,
): Trial<A | B, R2> {
  return matches(trial, success, fn);
}

/**
 * `true` when the Trial succeeded and its value satisfies `predicate`
 */
export function exists<A, R>(
  trial: Trial<A, R>,
  predicate: (value: A) => boolean,
): boolean {
  return matches(trial, predicate, constant(false));
}

/**
 * Keep a success only if its value satisfies `predicate`; otherwise fail with
 * `reason` (`NOT_FOUND` when omitted). Failures pass through.
 *
 * @example
 * ```typescript
 * filter(success(42), (x) => x > 100, "too-small"); // Failure { reason: "too-small" }
 * ```
 */
export function filter<A, R>(
  trial: Trial<A, R>,
  predicate: (value: A) => boolean,
): Trial<A, R | NotFound>;
export function filter<A, R, R2>(
  trial: Trial<A, R>,
  predicate: (value: A) => boolean,
  reason: R2,
): Trial<A, R | R2>;
export function filter<A, R>(
  trial: Trial<A, R>,
  predicate: (value: A) => boolean,
  ...rest: [] | [unknown]
): Trial<A, unknown> {
  const reason = rest.length === 0 ? NOT_FOUND : rest[0];
  return matches(
    trial,
    (value) => (predicate(value) ? trial : failure(reason)),
    failures,
  );
}

/**
 * `folder(initial, value)` for a success, `initial` for any failure
 */
export function fold<A, R, S>(
  trial: Trial<A, R>,
  folder: (accumulator: S, value: A) => S,
  initial: S,
): S {
  return matches(trial, (value) => folder(initial, value), constant(initial));
}

export function count<A, R>(trial: Trial<A, R>): 0 | 1 {
  return matches(trial, constant(1 as const), constant(0 as const));
}
