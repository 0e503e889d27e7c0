import type { Maybe } from "./maybe.js";

/**
 * Evaluate `onSome` with the value of a present Maybe, or `onNone` for an
 * absent one. Exactly one handler runs.
 *
 * Every other operation in this package goes through `matches`; it is the
 * only place that reads `_tag`.
 *
 * @example
 * ```typescript
 * matches(some(42), (x) => x + 1, () => 0); // 43
 * matches(none(), (x: number) => x + 1, () => 0); // 0
 * ```
 */
export function matches<A, B, C = B>(
  maybe: Maybe<A>,
  onSome: (value: A) => B,
  onNone: () => C,
): B | C {
  switch (maybe._tag) {
    case "Some":
      return onSome(maybe.value);
    case "None":
      return onNone();
    default: {
      const _exhaustive: never = maybe;
      throw new TypeError("Unexpected Maybe variant", {
        cause: _exhaustive,
      });
    }
  }
}

/**
 * Pattern match on Maybe with a handler object
 *
 * @example
 * ```typescript
 * const label = match(listFirst(names), {
 *   some: (name) => `First: ${name}`,
 *   none: () => "Nobody",
 * });
 * ```
 */
export function match<A, B, C = B>(
  maybe: Maybe<A>,
  handlers: {
    some: (value: A) => B;
    none: () => C;
  },
): B | C {
  return matches(maybe, handlers.some, handlers.none);
}
