/**
 * Type helper to ensure a string is a literal type, not the wider `string` type.
 */
type StringLiteral<T> = string extends T ? never : T;

/**
 * Reason used when a failure is created without one, and when `null` or
 * `undefined` is normalized into a Trial.
 */
export const NOT_FOUND = "NotFound" as const;

export type NotFound = typeof NOT_FOUND;

/**
 * Base class for errors that automatically sets `name` from `_tag`.
 * The `_tag` property must be a const string literal (not just `string`).
 *
 * @example
 * ```typescript
 * class ConfigMissingError extends TaggedError {
 *   readonly _tag = "ConfigMissingError";
 *   constructor(public readonly key: string) {
 *     super(`Missing configuration key ${key}`);
 *   }
 * }
 * ```
 */
export abstract class TaggedError<Tag extends string = string> extends Error {
  abstract readonly _tag: [string] extends [Tag] ? string : StringLiteral<Tag>;

  declare name: string;

  constructor(message: string) {
    super(message);
    // name always mirrors _tag, which subclasses assign after this constructor runs
    Object.defineProperty(this, "name", {
      get: (): string => this._tag,
      enumerable: false,
      configurable: true,
    });
  }
}

/**
 * Thrown by `unwrap` when the caller asserted presence or success and the
 * container held neither.
 *
 * This is never used as a failure reason: `NOT_FOUND` is the reason value,
 * `NotFoundError` is the fault.
 */
export class NotFoundError extends TaggedError<"NotFoundError"> {
  readonly _tag = "NotFoundError" as const;

  constructor(
    message: string,
    /** Reasons of the failure that was unwrapped; empty for an absent Maybe */
    public readonly reasons: readonly unknown[] = [],
  ) {
    super(message);
  }
}

export function isNotFoundError(value: unknown): value is NotFoundError {
  return value instanceof NotFoundError;
}
