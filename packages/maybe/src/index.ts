// Core types
export type { Maybe, Some, None } from "./maybe.js";
export { MAYBE_BRAND } from "./maybe.js";

// Constructors
export { some, none, fromNullable } from "./constructors.js";

// Type guards
export { isMaybe, isSome, isNone } from "./guards.js";

// Pattern matching
export { matches, match } from "./matching.js";

// Transformations
export type { Innermost } from "./transformations.js";
export {
  bind,
  map,
  exists,
  filter,
  fold,
  count,
  flatten,
  flattenAll,
  orElse,
} from "./transformations.js";

// Extraction
export { unwrap, unwrapOr, unwrapOrElse, getOrUndefined } from "./extraction.js";

// Lists
export { listFirst, listSingle } from "./list.js";

// Combinators
export { all, tap } from "./combinators.js";
