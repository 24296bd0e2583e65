import type { ZodIssue } from "zod";

/** One line per issue: "likelihood.rating: Number must be less than or equal to 5". */
export function formatZodIssues(issues: readonly ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}
