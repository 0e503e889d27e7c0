import type { Trial } from "./trial.js";
import { normalize } from "./normalize.js";

/**
 * Evaluate `onSuccess` with the value of a success, or `onFailure` with the
 * reasons of a failure. Exactly one handler runs.
 *
 * The Trial is normalized first, so `onFailure` always receives a list:
 * one element for `Failure`, any number (possibly zero) for `Failures`.
 * Every other operation in this package goes through `matches`.
 *
 * @example
 * ```typescript
 * matches(success(42), (x) => x, (reasons) => reasons.length); // 42
 * matches(failure("timeout"), (x: number) => x, (reasons) => reasons); // ["timeout"]
 * matches(failures([]), (x: number) => x, (reasons) => reasons); // []
 * ```
 */
export function matches<A, R, B, C = B>(
  trial: Trial<A, R>,
  onSuccess: (value: A) => B,
  onFailure: (reasons: readonly R[]) => C,
): B | C {
  const canonical = normalize(trial);
  switch (canonical._tag) {
    case "Success":
      return onSuccess(canonical.value);
    case "Failure":
      return onFailure([canonical.reason]);
    case "Failures":
      return onFailure(canonical.reasons);
    default: {
      const _exhaustive: never = canonical;
      throw new TypeError("Unexpected Trial variant", {
        cause: _exhaustive,
      });
    }
  }
}

/**
 * Pattern match on Trial with a handler object
 *
 * @example
 * ```typescript
 * const status = match(loadUser(id), {
 *   success: () => 200,
 *   failure: (reasons) => (reasons.includes("missing") ? 404 : 500),
 * });
 * ```
 */
export function match<A, R, B, C = B>(
  trial: Trial<A, R>,
  handlers: {
    success: (value: A) => B;
    failure: (reasons: readonly R[]) => C;
  },
): B | C {
  return matches(trial, handlers.success, handlers.failure);
}
