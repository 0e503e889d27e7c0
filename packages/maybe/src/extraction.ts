import { constant, identity, NotFoundError } from "@funky/prelude";
import type { Maybe } from "./maybe.js";
import { matches } from "./matching.js";

/**
 * Extract the value or throw `NotFoundError`
 *
 * Only for call sites that have already established presence. An absent
 * value here is a fault, not an outcome to branch on.
 *
 * @throws NotFoundError if the Maybe is None
 *
 * @example
 * ```typescript
 * unwrap(some(42)); // 42
 * unwrap(none()); // throws NotFoundError
 * ```
 */
export function unwrap<A>(maybe: Maybe<A>): A {
  return matches(maybe, identity, () => {
    throw new NotFoundError("Expected Some but the Maybe is None");
  });
}

export function unwrapOr<A>(maybe: Maybe<A>, defaultValue: A): A {
  return matches(maybe, identity, constant(defaultValue));
}

export function unwrapOrElse<A>(maybe: Maybe<A>, fn: () => A): A {
  return matches(maybe, identity, fn);
}

/**
 * Get the value if Some, undefined otherwise
 */
export function getOrUndefined<A>(maybe: Maybe<A>): A | undefined {
  return matches(maybe, identity, constant(undefined));
}
