import { NOT_FOUND } from "@funky/prelude";
import type { NotFound } from "@funky/prelude";
import type { Trial, Failure } from "./trial.js";
import { trialBrand } from "./trial.js";
import { success, failure, rawFailures } from "./constructors.js";

/**
 * Whether `value` was built by this package
 *
 * Plain objects shaped like a Trial are not Trials: `normalize` treats them
 * as bare success values.
 */
export function isTrial(value: unknown): value is Trial<unknown, unknown> {
  return trialBrand.isMarked(value);
}

/**
 * Bring any accepted input into canonical form.
 *
 * | input                  | result                 |
 * | ---------------------- | ---------------------- |
 * | `null` / `undefined`   | `Failure(NOT_FOUND)`   |
 * | `Success(v)`           | unchanged              |
 * | `Failure(r)`           | unchanged              |
 * | `Failures([])`         | unchanged              |
 * | `Failures([r])`        | `Failure(r)`           |
 * | `Failures([r1, r2])`   | unchanged              |
 * | any other value `v`    | `Success(v)`           |
 *
 * Total and idempotent.
 */
export function normalize<A, R>(trial: Trial<A, R>): Trial<A, R>;
export function normalize(raw: null | undefined): Failure<NotFound>;
export function normalize<A, R>(
  raw: Trial<A, R> | null | undefined,
): Trial<A, R | NotFound>;
export function normalize<A>(raw: A | null | undefined): Trial<A, NotFound>;
export function normalize(raw: unknown): Trial<unknown, unknown> {
  if (raw === null || raw === undefined) {
    return failure(NOT_FOUND);
  }
  if (!isTrial(raw)) {
    return success(raw);
  }
  if (raw._tag === "Failures" && raw.reasons.length === 1) {
    return failure(raw.reasons[0]);
  }
  return raw;
}

/**
 * Create a failure Trial from a list of reasons. A single reason collapses
 * to the `Failure` form; an empty list is a failure without reasons.
 *
 * @example
 * ```typescript
 * failures(["Invalid arg", "Nil dereferenced"]);
 * // Failures { reasons: ["Invalid arg", "Nil dereferenced"] }
 *
 * failures(["Invalid arg"]);
 * // Failure { reason: "Invalid arg" }
 * ```
 */
export function failures<R>(reasons: readonly R[]): Trial<never, R> {
  return normalize<never, R>(rawFailures(reasons));
}
