/**
 * QueryLens: query instrumentation and attribution for data-access layers.
 *
 * Captures every database round-trip of a unit of work, attributes it to
 * the application line that forced it, groups dependent queries with the
 * query that produced their source records, and reports which fetched
 * fields were never read.
 *
 * @example
 * ```typescript
 * import { createQueryLens } from "querylens";
 *
 * const lens = createQueryLens();
 *
 * const { report } = await lens.runUnitOfWork("req-1", async () => {
 *   const token = lens.onQueryStart("req-1", "SELECT id, name, bio FROM authors");
 *   const rows = await fetchAuthors();
 *   const event = lens.onQueryEnd(token, { columns: ["id", "name", "bio"] });
 *   return rows.map((row) =>
 *     lens.wrapRecord("req-1", event?.groupId ?? "", row, { shape: "authors" }),
 *   );
 * });
 *
 * for (const group of report.groups) {
 *   console.log(group.id, group.dependents.length);
 * }
 * ```
 */

// ============================================================
// Engine
// ============================================================

export {
  type BeginOptions,
  type CaptureOptions,
  type CaptureResult,
  createQueryLens,
  QueryLens,
  type RelationshipHandle,
  type UnitOfWorkOutcome,
} from "./engine/query-lens";
export { ExecutionContext } from "./engine/execution-context";
export { UnitOfWork, type UnitOfWorkState } from "./engine/unit-of-work";

// ============================================================
// Types
// ============================================================

export {
  type ContextId,
  type DuplicateStatement,
  type FieldUsage,
  type GroupReport,
  type Origin,
  type QueryEndOptions,
  type QueryEvent,
  type QueryRole,
  type QueryStartOptions,
  type QueryToken,
  type RecordIdentity,
  type RelationshipSource,
  type Report,
  type ReportSummary,
  type ScopeWarning,
  type ShapeUsage,
  UNATTRIBUTED,
} from "./core/types";
export { type EngineOptions, EngineOptionsSchema } from "./core/options";

// ============================================================
// Building Blocks
// ============================================================

export {
  DEFAULT_INTERNAL_PATH_PREFIXES,
  DEFAULT_INTERNAL_PATH_SEGMENTS,
  formatOrigin,
  OriginResolver,
  type OriginResolverOptions,
} from "./correlator/origin-resolver";
export { parseStack, type StackFrame, type StackProvider } from "./correlator/stack";
export { GroupingEngine, QueryGroup } from "./grouping/grouping-engine";
export {
  createTrackingProxy,
  FieldAccessTracker,
  UNKNOWN_SHAPE,
} from "./tracking/field-tracker";
export {
  finalize,
  findDuplicateStatements,
  normalizeStatement,
} from "./report/aggregator";

// ============================================================
// Integrations
// ============================================================

export {
  DeferredQuery,
  type DeferredQueryOptions,
} from "./integrations/deferred-query";
export {
  type QueryTrackingOptions,
  withQueryTracking,
} from "./integrations/track";

// ============================================================
// Errors
// ============================================================

export {
  ConfigurationError,
  type ErrorCategory,
  getErrorSuggestion,
  InstrumentationFailure,
  type InstrumentationStage,
  isQueryLensError,
  QueryLensError,
  type ValidationIssue,
} from "./errors";

// ============================================================
// Utilities
// ============================================================

export { type Logger, warnInDevelopment } from "./utils/logger";
export { generateId, type IdGenerator } from "./utils/id";
export { err, ok, type Result, unwrap } from "./utils/result";
