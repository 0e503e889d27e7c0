import type { z } from "zod";
import { success, failures } from "@funky/trial";
import type { Trial } from "@funky/trial";

/**
 * Validate `input` against `schema` without throwing.
 *
 * Each zod issue becomes one failure reason, so a single issue yields
 * `Failure(issue)` and several yield `Failures([...])`.
 *
 * @example
 * ```typescript
 * const port = parse(z.coerce.number().int().positive(), process.env.PORT);
 * // Success { value: 8080 } or Failure { reason: ZodIssue }
 * ```
 */
export function parse<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
): Trial<z.output<T>, z.ZodIssue> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return success(parsed.data);
  }
  return failures(parsed.error.issues);
}
