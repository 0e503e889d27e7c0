import { constant } from "@funky/prelude";
import type { Maybe } from "./maybe.js";
import { some, none } from "./constructors.js";
import { isMaybe } from "./guards.js";
import { matches } from "./matching.js";

/**
 * Strips every directly nested Maybe from a type.
 */
export type Innermost<A> = [A] extends [Maybe<infer B>] ? Innermost<B> : A;

/**
 * Chain Maybes (flatMap/bind). The result of `fn` is returned as such,
 * so `fn` decides whether the outcome is present.
 *
 * @example
 * ```typescript
 * bind(some(42), (x) => some(x + 1)); // Some { value: 43 }
 * bind(some(42), () => none()); // None
 * bind(none(), (x: number) => some(x + 1)); // None
 * ```
 */
export function bind<A, B>(
  maybe: Maybe<A>,
  fn: (value: A) => Maybe<B>,
): Maybe<B> {
  return matches(maybe, fn, none);
}

/**
 * Transform the present value, wrapping the result in `Some`
 *
 * @example
 * ```typescript
 * map(some(42), (x) => x + 1); // Some { value: 43 }
 * ```
 */
export function map<A, B>(maybe: Maybe<A>, fn: (value: A) => B): Maybe<B> {
  return matches(maybe, (value) => some(fn(value)), none);
}

/**
 * `true` when the Maybe is present and its value satisfies `predicate`
 */
export function exists<A>(
  maybe: Maybe<A>,
  predicate: (value: A) => boolean,
): boolean {
  return matches(maybe, predicate, constant(false));
}

/**
 * Keep a present value only if it satisfies `predicate`
 *
 * @example
 * ```typescript
 * filter(some(42), (x) => x > 100); // None
 * filter(some(42), (x) => x > 0); // Some { value: 42 }
 * ```
 */
export function filter<A>(
  maybe: Maybe<A>,
  predicate: (value: A) => boolean,
): Maybe<A> {
  return matches(maybe, (value) => (predicate(value) ? maybe : none()), none);
}

/**
 * Fold the Maybe into an accumulator: `folder(initial, value)` when present,
 * `initial` otherwise
 *
 * @example
 * ```typescript
 * fold(some(32), (acc, x) => acc + x, 10); // 42
 * fold(none(), (acc, x: number) => acc + x, 10); // 10
 * ```
 */
export function fold<A, S>(
  maybe: Maybe<A>,
  folder: (accumulator: S, value: A) => S,
  initial: S,
): S {
  return matches(maybe, (value) => folder(initial, value), constant(initial));
}

export function count<A>(maybe: Maybe<A>): 0 | 1 {
  return matches(maybe, constant(1 as const), constant(0 as const));
}

/**
 * Remove one level of nesting.
 *
 * Only the outermost redundant layer goes: `Some(Some(Some(x)))` becomes
 * `Some(Some(x))`. A Maybe that is not nested is returned unchanged.
 * Use {@link flattenAll} to remove every level.
 *
 * @example
 * ```typescript
 * flatten(some(some(42))); // Some { value: 42 }
 * flatten(some(some(some(42)))); // Some { value: Some { value: 42 } }
 * flatten(some(none())); // None
 * ```
 */
export function flatten<A>(maybe: Maybe<Maybe<A>>): Maybe<A>;
export function flatten<A>(maybe: Maybe<A>): Maybe<A>;
export function flatten(maybe: Maybe<unknown>): Maybe<unknown> {
  return bind(maybe, (value) => (isMaybe(value) ? value : maybe));
}

/**
 * Remove every level of nesting, stopping at the first payload that is not
 * a Maybe. A `None` at any depth makes the whole result `None`.
 *
 * @example
 * ```typescript
 * flattenAll(some(some(some(42)))); // Some { value: 42 }
 * flattenAll(some(some(none()))); // None
 * ```
 */
export function flattenAll<A>(maybe: Maybe<A>): Maybe<Innermost<A>>;
export function flattenAll(maybe: Maybe<unknown>): Maybe<unknown> {
  return bind(maybe, (value) => (isMaybe(value) ? flattenAll(value) : maybe));
}

/**
 * Return the Maybe if present, otherwise the alternative built by `fn`
 */
export function orElse<A, B>(
  maybe: Maybe<A>,
  fn: () => Maybe<B>,
): Maybe<A | B> {
  return matches<A, Maybe<A | B>>(maybe, constant(maybe), fn);
}
