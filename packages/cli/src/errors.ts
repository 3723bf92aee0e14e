import { QueryLensError } from "querylens";

/**
 * Invalid command line or profile target. Printed to the user as is.
 */
export class CliError extends QueryLensError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CLI_ERROR", {
      details,
      category: "user",
      suggestion: options?.suggestion ?? "Run `querylens --help` for usage.",
      cause: options?.cause,
    });
    this.name = "CliError";
  }
}
