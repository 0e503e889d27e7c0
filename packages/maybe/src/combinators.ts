import type { Maybe } from "./maybe.js";
import { some } from "./constructors.js";
import { bind, map } from "./transformations.js";

/**
 * Combine several Maybes: Some with every value in order, or None as soon
 * as one of them is absent
 *
 * @example
 * ```typescript
 * all([some(1), some(2)]); // Some { value: [1, 2] }
 * all([some(1), none()]); // None
 * ```
 */
export function all<A>(maybes: readonly Maybe<A>[]): Maybe<A[]> {
  return maybes.reduce<Maybe<A[]>>(
    (accumulated, maybe) =>
      bind(accumulated, (values) => map(maybe, (value) => [...values, value])),
    some([]),
  );
}

/**
 * Run function for side effects (such as logging) on a present value
 *
 * @example
 * ```typescript
 * const user = tap(findUser(id), (u) => logger.debug("found user", u.id));
 * ```
 */
export function tap<A>(maybe: Maybe<A>, fn: (value: A) => void): Maybe<A> {
  return map(maybe, (value) => {
    fn(value);
    return value;
  });
}
