import { z } from "zod";
import { some, none } from "@funky/maybe";
import type { Maybe } from "@funky/maybe";
import { success, failure, failures } from "@funky/trial";
import type { Trial } from "@funky/trial";

const maybeShape = z.discriminatedUnion("_tag", [
  z.object({ _tag: z.literal("Some"), value: z.unknown() }),
  z.object({ _tag: z.literal("None") }),
]);

const trialShape = z.discriminatedUnion("_tag", [
  z.object({ _tag: z.literal("Success"), value: z.unknown() }),
  z.object({ _tag: z.literal("Failure"), reason: z.unknown() }),
  z.object({ _tag: z.literal("Failures"), reasons: z.array(z.unknown()) }),
]);

function forwardIssues(
  ctx: z.RefinementCtx,
  issues: readonly z.ZodIssue[],
  prefix: (string | number)[],
): void {
  for (const issue of issues) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: issue.message,
      path: [...prefix, ...issue.path],
    });
  }
}

/**
 * Schema for the JSON form of a Maybe (`{ "_tag": "Some", "value": ... }` or
 * `{ "_tag": "None" }`), producing a real Maybe.
 *
 * The payload is validated by `value`; its issues are reported under the
 * `value` path.
 *
 * @example
 * ```typescript
 * const schema = maybeSchema(z.number());
 * schema.parse(JSON.parse('{"_tag":"Some","value":42}')); // Some { value: 42 }
 * ```
 */
export function maybeSchema<T extends z.ZodTypeAny>(
  value: T,
): z.ZodType<Maybe<z.output<T>>, z.ZodTypeDef, unknown> {
  return maybeShape.transform((raw, ctx): Maybe<z.output<T>> => {
    if (raw._tag === "None") {
      return none();
    }
    const parsed = value.safeParse(raw.value);
    if (!parsed.success) {
      forwardIssues(ctx, parsed.error.issues, ["value"]);
      return z.NEVER;
    }
    return some(parsed.data);
  });
}

/**
 * Schema for the JSON form of a Trial, producing a normalized Trial.
 *
 * Success values are validated by `value`, every reason by `reason`.
 *
 * @example
 * ```typescript
 * const schema = trialSchema(z.number(), z.string());
 * schema.parse({ _tag: "Failures", reasons: ["timeout"] });
 * // Failure { reason: "timeout" }
 * ```
 */
export function trialSchema<T extends z.ZodTypeAny, U extends z.ZodTypeAny>(
  value: T,
  reason: U,
): z.ZodType<Trial<z.output<T>, z.output<U>>, z.ZodTypeDef, unknown> {
  return trialShape.transform((raw, ctx): Trial<z.output<T>, z.output<U>> => {
    switch (raw._tag) {
      case "Success": {
        const parsed = value.safeParse(raw.value);
        if (!parsed.success) {
          forwardIssues(ctx, parsed.error.issues, ["value"]);
          return z.NEVER;
        }
        return success(parsed.data);
      }
      case "Failure": {
        const parsed = reason.safeParse(raw.reason);
        if (!parsed.success) {
          forwardIssues(ctx, parsed.error.issues, ["reason"]);
          return z.NEVER;
        }
        return failure(parsed.data);
      }
      case "Failures": {
        const reasons: z.output<U>[] = [];
        raw.reasons.forEach((item, index) => {
          const parsed = reason.safeParse(item);
          if (parsed.success) {
            reasons.push(parsed.data);
          } else {
            forwardIssues(ctx, parsed.error.issues, ["reasons", index]);
          }
        });
        if (reasons.length !== raw.reasons.length) {
          return z.NEVER;
        }
        return failures(reasons);
      }
    }
  });
}
