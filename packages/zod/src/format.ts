import type { z } from "zod";

export interface StructuredLogReasons {
  type: "ValidationFailure";
  message: string;
  issueCount: number;
  issues: Array<{
    path: string;
    message: string;
    code: string;
  }>;
  input?: unknown;
}

function formatPath(issue: z.ZodIssue): string {
  return issue.path.join(".") || "(root)";
}

/**
 * Formats a single issue as `path: message`
 */
export function issueToString(issue: z.ZodIssue): string {
  return `${formatPath(issue)}: ${issue.message}`;
}

/**
 * Formats the reasons of a failed `parse` into a human-readable string
 */
export function reasonsToString(issues: readonly z.ZodIssue[]): string {
  return issues.map(issueToString).join("; ");
}

/**
 * Formats the reasons of a failed `parse` for structured logging systems
 * Includes optional input data for debugging
 */
export function reasonsToStructuredLog(
  issues: readonly z.ZodIssue[],
  input?: unknown,
): StructuredLogReasons {
  return {
    type: "ValidationFailure",
    message: reasonsToString(issues),
    issueCount: issues.length,
    issues: issues.map((issue) => ({
      path: formatPath(issue),
      message: issue.message,
      code: issue.code,
    })),
    ...(input !== undefined && { input }),
  };
}
