/**
 * OriginResolver - attributes a query to the application line that forced it.
 *
 * Walks the stack innermost-first and skips frames that belong to the
 * engine, the ORM or Node.js itself. What is left first is the origin.
 * Must run synchronously at the point of forcing: by the time a unit of
 * work ends, the stack that triggered the query is gone.
 */

import { fileURLToPath } from "node:url";

import { type Origin, UNATTRIBUTED } from "../core/types";
import { InstrumentationFailure } from "../errors";
import { type Logger } from "../utils/logger";
import {
  captureCurrentStack,
  parseStack,
  type StackFrame,
  type StackProvider,
} from "./stack";

// ============================================================
// Defaults
// ============================================================

/**
 * Root of the engine's own sources; every frame below it is internal.
 */
export const ENGINE_SOURCE_ROOT = fileURLToPath(new URL("..", import.meta.url));

export const DEFAULT_INTERNAL_PATH_PREFIXES: readonly string[] = [
  ENGINE_SOURCE_ROOT,
  "node:",
  "internal/",
];

export const DEFAULT_INTERNAL_PATH_SEGMENTS: readonly string[] = [
  "/node_modules/",
  "\\node_modules\\",
];

// ============================================================
// Types
// ============================================================

export type OriginResolverOptions = Readonly<{
  /** Frames whose path starts with one of these are skipped */
  internalPathPrefixes: readonly string[];
  /** Frames whose path contains one of these are skipped */
  internalPathSegments: readonly string[];
  maxStackDepth: number;
  logger: Logger;
  captureStack?: StackProvider;
}>;

// ============================================================
// OriginResolver
// ============================================================

export class OriginResolver {
  readonly #prefixes: readonly string[];
  readonly #segments: readonly string[];
  readonly #maxStackDepth: number;
  readonly #logger: Logger;
  readonly #captureStack: StackProvider;

  constructor(options: OriginResolverOptions) {
    this.#prefixes = Object.freeze([...options.internalPathPrefixes]);
    this.#segments = Object.freeze([...options.internalPathSegments]);
    this.#maxStackDepth = options.maxStackDepth;
    this.#logger = options.logger;
    this.#captureStack = options.captureStack ?? captureCurrentStack;
  }

  get internalPathPrefixes(): readonly string[] {
    return this.#prefixes;
  }

  /**
   * Resolves the origin of the code currently running.
   */
  resolveOrigin(): Origin {
    let stack: string | undefined;
    try {
      stack = this.#captureStack(this.#maxStackDepth);
    } catch (error) {
      this.#reportFailure("Failed to capture the call stack.", error);
      return UNATTRIBUTED;
    }

    if (stack === undefined) {
      return UNATTRIBUTED;
    }
    return this.resolveFromStack(stack);
  }

  /**
   * Resolves an origin from stack text captured earlier.
   */
  resolveFromStack(stack: string): Origin {
    let frames: readonly StackFrame[];
    try {
      frames = parseStack(stack);
    } catch (error) {
      this.#reportFailure("Failed to parse the call stack.", error);
      return UNATTRIBUTED;
    }

    const frame = frames.find((candidate) => !this.isInternal(candidate.file));
    if (!frame) {
      return UNATTRIBUTED;
    }

    return {
      kind: "resolved",
      file: frame.file,
      line: frame.line,
      column: frame.column,
      ...(frame.functionName !== undefined && {
        functionName: frame.functionName,
      }),
    };
  }

  isInternal(file: string): boolean {
    return (
      this.#prefixes.some((prefix) => file.startsWith(prefix)) ||
      this.#segments.some((segment) => file.includes(segment))
    );
  }

  #reportFailure(message: string, cause: unknown): void {
    const failure = new InstrumentationFailure(
      message,
      { stage: "correlation" },
      { cause },
    );
    this.#logger.warn(`[QueryLens] ${failure.message}`, failure);
  }
}

// ============================================================
// Formatting
// ============================================================

/**
 * Short label for an origin, used in group ids.
 *
 * @example
 * ```typescript
 * formatOrigin({ kind: "resolved", file: "/srv/app/users.ts", line: 12 })
 * // => "/srv/app/users.ts:12"
 * formatOrigin({ kind: "unattributed" })
 * // => "unattributed"
 * ```
 */
export function formatOrigin(origin: Origin): string {
  if (origin.kind === "unattributed") {
    return "unattributed";
  }
  return `${origin.file}:${origin.line}`;
}
