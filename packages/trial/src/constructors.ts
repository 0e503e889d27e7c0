import { NOT_FOUND } from "@funky/prelude";
import type { NotFound } from "@funky/prelude";
import type { Success, Failure, Failures } from "./trial.js";
import { TRIAL_BRAND, trialBrand } from "./trial.js";

/**
 * Create a success Trial
 *
 * @example
 * ```typescript
 * success(42);
 * // Success { value: 42 }
 * ```
 */
export function success<A>(value: A): Success<A> {
  return trialBrand.mark<Success<A>>({ _tag: "Success", value, [TRIAL_BRAND]: true });
}

/**
 * Create a failure Trial with a single reason. Without an argument the
 * reason is `NOT_FOUND`.
 *
 * @example
 * ```typescript
 * failure("Invalid arg");
 * // Failure { reason: "Invalid arg" }
 *
 * failure();
 * // Failure { reason: "NotFound" }
 * ```
 */
export function failure(): Failure<NotFound>;
export function failure<R>(reason: R): Failure<R>;
export function failure(...args: [] | [unknown]): Failure<unknown> {
  return trialBrand.mark<Failure<unknown>>({
    _tag: "Failure",
    reason: args.length === 0 ? NOT_FOUND : args[0],
    [TRIAL_BRAND]: true,
  });
}

/**
 * Builds a `Failures` as given, without normalization. Use `failures` instead.
 */
export function rawFailures<R>(reasons: readonly R[]): Failures<R> {
  return trialBrand.mark<Failures<R>>({
    _tag: "Failures",
    reasons: [...reasons],
    [TRIAL_BRAND]: true,
  });
}
