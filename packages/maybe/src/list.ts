import type { Maybe } from "./maybe.js";
import { some, none } from "./constructors.js";

/**
 * The first element of `list`, or None when it is empty
 *
 * @example
 * ```typescript
 * listFirst([]); // None
 * listFirst([1, 2]); // Some { value: 1 }
 * ```
 */
export function listFirst<A>(list: readonly A[]): Maybe<A> {
  if (list.length === 0) {
    return none();
  }
  return some(list[0]);
}

/**
 * The only element of `list`, or None when it has zero or several elements
 *
 * @example
 * ```typescript
 * listSingle([1]); // Some { value: 1 }
 * listSingle([1, 2]); // None
 * ```
 */
export function listSingle<A>(list: readonly A[]): Maybe<A> {
  if (list.length !== 1) {
    return none();
  }
  return some(list[0]);
}
