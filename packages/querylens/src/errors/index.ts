/**
 * QueryLens Error Hierarchy
 *
 * All errors extend QueryLensError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance
 * - `details`: Structured context about the error
 *
 * Only configuration problems are ever thrown at the host. Failures inside
 * the instrumentation hooks are built as `InstrumentationFailure` values and
 * handed to the logger instead.
 *
 * @example
 * ```typescript
 * try {
 *   createQueryLens({ internalPathPrefixes: [42] });
 * } catch (error) {
 *   if (isQueryLensError(error)) {
 *     console.error(error.toUserMessage());
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing input.
 * - `system`: Internal failure of the instrumentation itself.
 */
export type ErrorCategory = "user" | "system";

/**
 * Options for QueryLensError constructor.
 */
export type QueryLensErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (typeof cause === "symbol") {
    return cause.description ?? "Symbol";
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all QueryLens errors.
 */
export class QueryLensError extends Error {
  /** Machine-readable error code (e.g., "CONFIGURATION_ERROR") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: QueryLensErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "QueryLensError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod or custom validation.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid option (e.g., "internalPathPrefixes.0") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

/**
 * Thrown when the engine is constructed with invalid options, or when a host
 * integration is wired without the hooks it needs.
 *
 * This is the only error the engine raises at the host: without valid
 * configuration it cannot observe anything.
 *
 * @example
 * ```typescript
 * try {
 *   createQueryLens({ maxStackDepth: -1 });
 * } catch (error) {
 *   if (error instanceof ConfigurationError) {
 *     console.log(error.details.issues);
 *   }
 * }
 * ```
 */
export class ConfigurationError extends QueryLensError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ?? `Review the options passed to createQueryLens().`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Instrumentation Errors (category: "system")
// ============================================================

/**
 * Stage of the pipeline in which an instrumentation hook failed.
 */
export type InstrumentationStage =
  | "capture"
  | "correlation"
  | "grouping"
  | "tracking"
  | "aggregation";

/**
 * Describes a failure inside one of the instrumentation hooks.
 *
 * Never thrown at the host. The engine builds one, passes it to the logger,
 * and records the affected event with degraded or missing fields.
 */
export class InstrumentationFailure extends QueryLensError {
  declare readonly details: Readonly<{
    stage: InstrumentationStage;
    contextId?: string;
    [key: string]: unknown;
  }>;

  constructor(
    message: string,
    details: Readonly<{
      stage: InstrumentationStage;
      contextId?: string;
      [key: string]: unknown;
    }>,
    options?: { cause?: unknown },
  ) {
    super(message, "INSTRUMENTATION_FAILURE", {
      details,
      category: "system",
      suggestion: `The observed operation was not affected. Check the host integration that invokes the ${details.stage} hooks.`,
      cause: options?.cause,
    });
    this.name = "InstrumentationFailure";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Checks if an error is a QueryLensError.
 */
export function isQueryLensError(error: unknown): error is QueryLensError {
  return error instanceof QueryLensError;
}

/**
 * Gets the suggestion from an error if it's a QueryLensError.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  if (isQueryLensError(error)) {
    return error.suggestion;
  }
  return undefined;
}
