/**
 * An object carrying the marker `K`
 */
export type Branded<K extends symbol> = { readonly [P in K]: true };

export interface Brand<K extends symbol> {
  readonly key: K;
  mark<T extends Branded<K>>(value: T): T;
  isMarked(value: unknown): value is Branded<K>;
}

/**
 * Creates a marker on the symbol `key`.
 *
 * The key is part of the branded type, so an object literal only type-checks
 * as one when it spells the key out. `mark` then turns the key into a
 * non-enumerable, non-writable property: it is invisible to `JSON.stringify`,
 * object spread and structural equality, so marked values compare equal to
 * their plain-object twins while `isMarked` can still tell them apart.
 *
 * @example
 * ```typescript
 * const TOKEN: unique symbol = Symbol.for("app/token");
 * const token = createBrand(TOKEN);
 * const marked = token.mark({ id: 1, [TOKEN]: true });
 * token.isMarked(marked); // true
 * token.isMarked({ id: 1 }); // false
 * ```
 */
export function createBrand<K extends symbol>(key: K): Brand<K> {
  return {
    key,
    mark<T extends Branded<K>>(value: T): T {
      Object.defineProperty(value, key, {
        value: true,
        enumerable: false,
        configurable: false,
        writable: false,
      });
      return value;
    },
    isMarked(value: unknown): value is Branded<K> {
      return (
        typeof value === "object" &&
        value !== null &&
        Object.getOwnPropertyDescriptor(value, key)?.value === true
      );
    },
  };
}
