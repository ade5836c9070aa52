/**
 * Contextual Validation Utilities
 *
 * Zod validation wrappers that name what was being validated when they fail.
 *
 * @example
 * ```typescript
 * const options = validateWithSchema(DecodeOptionsSchema, input, "DecodeOptions");
 * ```
 */

import { type ZodError, type ZodType } from "zod";

import { ValidationError, type ValidationIssue } from "./index";

/**
 * Converts Zod issues to ValidationIssue format.
 */
export function zodIssuesToValidationIssues(
  error: ZodError,
): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validates a value, returning the parsed output.
 *
 * @param subject - Name used in the error message (e.g., "EncodeOptions")
 * @throws ValidationError listing every issue if validation fails
 */
export function validateWithSchema<T>(
  schema: ZodType<T>,
  value: unknown,
  subject: string,
): T {
  const result = schema.safeParse(value);

  if (result.success) {
    return result.data;
  }

  const issues = zodIssuesToValidationIssues(result.error);
  const summary = issues
    .map((issue) => `${issue.path || "(root)"}: ${issue.message}`)
    .join("; ");

  throw new ValidationError(
    `Invalid ${subject}: ${summary}`,
    { subject, issues },
    { cause: result.error },
  );
}
