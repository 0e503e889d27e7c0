import { createBrand } from "@funky/prelude";

/**
 * Key of the marker on every value built by the constructors. Only `some`,
 * `none` and the operations built on them produce a Maybe; a caller's object
 * that merely has a `_tag` field is not one, for the compiler or at run time.
 */
export const MAYBE_BRAND: unique symbol = Symbol.for("@funky/maybe/brand");

/**
 * Present case - contains the value
 */
export interface Some<A> {
  readonly _tag: "Some";
  readonly value: A;
  readonly [MAYBE_BRAND]: true;
}

/**
 * Absent case - carries nothing
 */
export interface None {
  readonly _tag: "None";
  readonly [MAYBE_BRAND]: true;
}

/**
 * Maybe type - a discriminated union of a present value and its absence
 *
 * @template A - The value type
 *
 * @example
 * ```typescript
 * const user: Maybe<User> = listFirst(users);
 *
 * const greeting = matches(
 *   user,
 *   (u) => `Hello ${u.name}`,
 *   () => "Hello stranger",
 * );
 * ```
 */
export type Maybe<A> = Some<A> | None;

export const maybeBrand = createBrand(MAYBE_BRAND);
