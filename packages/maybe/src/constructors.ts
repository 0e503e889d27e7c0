import type { Maybe, None, Some } from "./maybe.js";
import { MAYBE_BRAND, maybeBrand } from "./maybe.js";

const NONE: None = Object.freeze(
  maybeBrand.mark<None>({ _tag: "None", [MAYBE_BRAND]: true }),
);

/**
 * Create a present Maybe. `some` wraps whatever it is given, `null` and
 * `undefined` included; use {@link fromNullable} when absence is spelled
 * with them.
 *
 * @example
 * ```typescript
 * some(42);
 * // Some { value: 42 }
 * ```
 */
export function some<A>(value: A): Some<A> {
  return maybeBrand.mark<Some<A>>({ _tag: "Some", value, [MAYBE_BRAND]: true });
}

/**
 * The absent Maybe. Every call returns the same shared value.
 */
export function none(): None {
  return NONE;
}

/**
 * Create a Maybe from a nullable value: `null` and `undefined` become `None`
 *
 * @example
 * ```typescript
 * fromNullable(process.env.PORT);
 * // Some { value: "8080" } or None
 * ```
 */
export function fromNullable<A>(value: A | null | undefined): Maybe<A> {
  if (value === null || value === undefined) {
    return none();
  }
  return some(value);
}
