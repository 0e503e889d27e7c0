import { createBrand } from "@funky/prelude";

/**
 * Key of the marker on every value built by the constructors
 */
export const TRIAL_BRAND: unique symbol = Symbol.for("@funky/trial/brand");

/**
 * Success case - contains the success value
 */
export interface Success<A> {
  readonly _tag: "Success";
  readonly value: A;
  readonly [TRIAL_BRAND]: true;
}

/**
 * Failure case with exactly one reason
 */
export interface Failure<R> {
  readonly _tag: "Failure";
  readonly reason: R;
  readonly [TRIAL_BRAND]: true;
}

/**
 * Failure case with any number of reasons, including none
 */
export interface Failures<R> {
  readonly _tag: "Failures";
  readonly reasons: readonly R[];
  readonly [TRIAL_BRAND]: true;
}

/**
 * Trial type - a success value, or a failure carrying reasons
 *
 * `Failure` and `Failures` are two spellings of the same outcome. Every
 * operation sees a failure as its list of reasons, so `Failure(r)` and
 * `Failures([r])` behave identically, and `normalize` turns the latter into
 * the former.
 *
 * @template A - The success value type
 * @template R - The reason type. Reasons are opaque: codes, messages, errors.
 *
 * @example
 * ```typescript
 * type ParsePortTrial = Trial<number, "missing" | "not-a-number">;
 *
 * const port: ParsePortTrial = bind(
 *   toTrial(fromNullable(env.PORT), "missing" as const),
 *   (raw) => (Number.isNaN(Number(raw)) ? failure("not-a-number" as const) : success(Number(raw))),
 * );
 * ```
 */
export type Trial<A, R = unknown> = Success<A> | Failure<R> | Failures<R>;

export const trialBrand = createBrand(TRIAL_BRAND);
