import { constant } from "@funky/prelude";
import type { Maybe, None, Some } from "./maybe.js";
import { maybeBrand } from "./maybe.js";
import { matches } from "./matching.js";

/**
 * Whether `value` was built by this package (`some`, `none`, or a combinator)
 *
 * @example
 * ```typescript
 * isMaybe(some(42)); // true
 * isMaybe(none()); // true
 * isMaybe(42); // false
 * isMaybe({ _tag: "Some", value: 42 }); // false
 * ```
 */
export function isMaybe(value: unknown): value is Maybe<unknown> {
  return maybeBrand.isMarked(value);
}

/**
 * Type guard for Some. `false` for anything that is not a Maybe.
 *
 * @example
 * ```typescript
 * isSome(some(42)); // true
 * isSome(none()); // false
 * isSome(null); // false
 * ```
 */
export function isSome(value: unknown): value is Some<unknown> {
  return isMaybe(value) && matches(value, constant(true), constant(false));
}

/**
 * Type guard for None. `false` for anything that is not a Maybe.
 */
export function isNone(value: unknown): value is None {
  return isMaybe(value) && matches(value, constant(false), constant(true));
}
