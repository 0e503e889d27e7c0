/**
 * Returns its argument unchanged.
 *
 * @example
 * ```typescript
 * identity("Hello World!"); // "Hello World!"
 * ```
 */
export function identity<A>(value: A): A {
  return value;
}

/**
 * Returns a function that ignores its argument and returns `value`.
 * The argument is optional, so the result also fits zero-argument handlers.
 *
 * @example
 * ```typescript
 * const k = constant("Hello World!");
 * k(42); // "Hello World!"
 * ```
 */
export function constant<A>(value: A): (_?: unknown) => A {
  return () => value;
}

/**
 * Two-argument variant of {@link constant}.
 */
export function constant2<A>(value: A): (_a?: unknown, _b?: unknown) => A {
  return () => value;
}
