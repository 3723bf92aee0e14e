/**
 * QueryLens types.
 *
 * Data model shared by capture, correlation, grouping, field tracking and
 * report aggregation.
 */

// ============================================================
// Identity
// ============================================================

/**
 * Identity of one logical execution context (one request, one job).
 * Supplied by the host at every hook invocation.
 */
export type ContextId = string;

// ============================================================
// Origin
// ============================================================

/**
 * Source location of the application statement that forced a query.
 *
 * @example
 * ```typescript
 * { kind: "resolved", file: "/srv/app/routes/users.ts", line: 42, column: 17 }
 * { kind: "unattributed" }
 * ```
 */
export type Origin =
  | Readonly<{
      kind: "resolved";
      file: string;
      line: number;
      column?: number;
      functionName?: string;
    }>
  | Readonly<{ kind: "unattributed" }>;

export const UNATTRIBUTED: Origin = Object.freeze({ kind: "unattributed" });

// ============================================================
// Query Events
// ============================================================

export type QueryRole = "primary" | "dependent";

/**
 * One raw database round-trip. Immutable once recorded.
 */
export type QueryEvent = Readonly<{
  /** Sequence id, unique within the unit of work */
  id: number;
  /** Exact statement text handed to the driver */
  statement: string;
  /** Bound parameters, present only when `captureParams` is enabled */
  params?: readonly unknown[];
  /** Table or record shape the rows materialize as */
  shape?: string;
  /** Declared output columns; `undefined` when the integration could not tell */
  columns: readonly string[] | undefined;
  /** Monotonic offset from unit-of-work start; `undefined` when the clock failed */
  startedAtMs: number | undefined;
  /** Round-trip duration; `undefined` when timing was unavailable */
  durationMs: number | undefined;
  origin: Origin;
  groupId: string;
  role: QueryRole;
  rowCount?: number;
  /** The driver threw; the error went back to the host untouched */
  failed: boolean;
  /** False when the unit of work ended before `onQueryEnd` was reached */
  completed: boolean;
}>;

/**
 * Handle returned by `onQueryStart` and consumed by `onQueryEnd`.
 */
export type QueryToken = Readonly<{
  contextId: ContextId;
  unitOfWorkId: string;
  sequence: number;
}>;

export type QueryStartOptions = Readonly<{
  params?: readonly unknown[];
  shape?: string;
  columns?: readonly string[];
  /** Origin resolved earlier, at the point a deferred query was forced */
  origin?: Origin;
}>;

export type QueryEndOptions = Readonly<{
  columns?: readonly string[];
  rowCount?: number;
  failed?: boolean;
}>;

// ============================================================
// Records
// ============================================================

/**
 * Identity of a materialized record.
 *
 * When `key` is absent the record object itself is the identity.
 */
export type RecordIdentity = Readonly<{
  record: object;
  shape?: string;
  key?: string | number | bigint;
}>;

/**
 * Where the rows of a relationship being resolved came from.
 * Either the owning group id, or one of the records it produced.
 */
export type RelationshipSource =
  | Readonly<{ groupId: string; relation?: string }>
  | Readonly<{ record: object; relation?: string }>
  | Readonly<{ relation?: string }>;

// ============================================================
// Report
// ============================================================

export type FieldUsage =
  | Readonly<{
      status: "known";
      fetched: ReadonlySet<string>;
      consumed: ReadonlySet<string>;
      overFetched: ReadonlySet<string>;
    }>
  | Readonly<{
      status: "unknown";
      consumed: ReadonlySet<string>;
    }>;

export type ShapeUsage = Readonly<{
  shape: string;
  fields: FieldUsage;
  /** Number of records of this shape materialized by the group */
  records: number;
  /** Per-field read counts across those records */
  readCounts: ReadonlyMap<string, number>;
}>;

export type GroupReport = Readonly<{
  id: string;
  origin: Origin;
  primary: QueryEvent;
  dependents: readonly QueryEvent[];
  fields: FieldUsage;
  shapes: readonly ShapeUsage[];
}>;

export type ScopeWarning =
  | Readonly<{ kind: "nested-begin"; contextId: ContextId; message: string }>
  | Readonly<{ kind: "unmatched-end"; contextId: ContextId; message: string }>
  | Readonly<{ kind: "abandoned"; contextId: ContextId; message: string }>
  | Readonly<{
      kind: "incomplete-query";
      contextId: ContextId;
      message: string;
      statement: string;
    }>;

export type DuplicateStatement = Readonly<{
  /** Whitespace-normalized statement text */
  statement: string;
  count: number;
}>;

export type ReportSummary = Readonly<{
  totalQueries: number;
  totalDbTimeMs: number;
  totalExecutionTimeMs: number | undefined;
  duplicates: readonly DuplicateStatement[];
}>;

/**
 * Read-only projection of a completed unit of work.
 *
 * @example
 * ```typescript
 * const report = lens.endUnitOfWork("req-1");
 *
 * console.log(`Queries: ${report.summary.totalQueries}`);
 * for (const group of report.groups) {
 *   if (group.fields.status === "known") {
 *     console.log(group.id, [...group.fields.overFetched]);
 *   }
 * }
 * ```
 */
export type Report = Readonly<{
  unitOfWorkId: string;
  contextId: ContextId;
  startedAt: Date;
  endedAt: Date;
  groups: readonly GroupReport[];
  summary: ReportSummary;
  warnings: readonly ScopeWarning[];
}>;
