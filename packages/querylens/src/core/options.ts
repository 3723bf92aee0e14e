/**
 * Engine configuration.
 *
 * Options are validated once, when the engine is created, and are
 * read-only afterwards.
 */

import { z } from "zod";

import { type StackProvider } from "../correlator/stack";
import { type IdGenerator } from "../utils/id";
import { type Logger } from "../utils/logger";

// ============================================================
// Schemas
// ============================================================

const LoggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "warn" in value &&
    typeof value.warn === "function",
  { message: "Expected an object with a warn(message, details) function" },
);

function functionSchema<T>(description: string) {
  return z.custom<T>((value) => typeof value === "function", {
    message: `Expected ${description}`,
  });
}

export const EngineOptionsSchema = z
  .object({
    /**
     * Path prefixes of frames that never count as an origin, in addition to
     * the defaults (engine sources, `node:` and `internal/` frames).
     */
    internalPathPrefixes: z.array(z.string().min(1)).default([]),
    /**
     * Path segments of frames that never count as an origin, in addition to
     * the default `/node_modules/`.
     */
    internalPathSegments: z.array(z.string().min(1)).default([]),
    /** Drop the default internal prefixes and segments */
    replaceDefaultInternals: z.boolean().default(false),
    /** Number of frames captured when resolving an origin */
    maxStackDepth: z.number().int().positive().max(1000).default(64),
    /** Keep bound parameters on query events */
    captureParams: z.boolean().default(false),
    logger: LoggerSchema.optional(),
    /** Monotonic clock in milliseconds; defaults to `performance.now()` */
    clock: functionSchema<() => number>("a clock function").optional(),
    idGenerator: functionSchema<IdGenerator>("an id generator").optional(),
    captureStack: functionSchema<StackProvider>(
      "a stack provider function",
    ).optional(),
  })
  .strict();

// ============================================================
// Types
// ============================================================

/**
 * Options accepted by `createQueryLens`.
 */
export type EngineOptions = z.input<typeof EngineOptionsSchema>;

/**
 * Options after validation and defaults.
 */
export type ResolvedEngineOptions = z.output<typeof EngineOptionsSchema>;
