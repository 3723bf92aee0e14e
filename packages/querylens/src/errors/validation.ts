/**
 * Contextual Validation Utilities
 *
 * Zod validation wrappers that turn schema failures into
 * ConfigurationErrors naming what was being configured.
 *
 * @example
 * ```typescript
 * const result = validateOptions(EngineOptionsSchema, input, "createQueryLens");
 * const options = unwrap(result);
 * ```
 */

import { type ZodError, type ZodType } from "zod";

import { err, ok, type Result } from "../utils/result";
import { ConfigurationError, type ValidationIssue } from "./index";

/**
 * Converts Zod issues to ValidationIssue format.
 */
function zodIssuesToValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map((segment) => String(segment)).join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validates options for one configuration subject.
 *
 * @param schema - Zod schema to validate against
 * @param input - Raw options as supplied by the host
 * @param subject - What is being configured, for error messages
 */
export function validateOptions<T>(
  schema: ZodType<T>,
  input: unknown,
  subject: string,
): Result<T, ConfigurationError> {
  const result = schema.safeParse(input);

  if (result.success) {
    return ok(result.data);
  }

  const issues = zodIssuesToValidationIssues(result.error);
  const fieldList = issues.map((issue) => issue.path || "(root)").join(", ");

  return err(
    new ConfigurationError(
      `Invalid options for ${subject}: ${fieldList}`,
      { subject, issues },
      {
        cause: result.error,
        suggestion: `Check the following options: ${fieldList}. See error.details.issues for specific validation failures.`,
      },
    ),
  );
}
