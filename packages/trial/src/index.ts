// Core types
export type { Trial, Success, Failure, Failures } from "./trial.js";
export { TRIAL_BRAND } from "./trial.js";

// Constructors
export { success, failure } from "./constructors.js";
export { failures, normalize, isTrial } from "./normalize.js";

// Type guards
export { isSuccess, isFailure } from "./guards.js";

// Pattern matching
export { matches, match } from "./matching.js";

// Transformations
export {
  bind,
  map,
  mapReasons,
  recover,
  exists,
  filter,
  fold,
  count,
} from "./transformations.js";

// Extraction
export {
  unwrap,
  unwrapOr,
  unwrapOrElse,
  getOrUndefined,
  getReasons,
} from "./extraction.js";

// Combinators
export { all, tap, tapFailure, tryCatch } from "./combinators.js";

// Maybe bridge
export { toTrial, toMaybe } from "./bridge.js";

// Shared with the prelude
export type { NotFound } from "@funky/prelude";
export { NOT_FOUND, NotFoundError, isNotFoundError } from "@funky/prelude";
