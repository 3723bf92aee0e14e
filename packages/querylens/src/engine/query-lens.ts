/**
 * QueryLens - the engine the host integration talks to.
 *
 * Keeps the registry of active units of work (one per execution context)
 * and exposes the hooks a database integration and a record layer call.
 * Every hook is synchronous and never throws at the host: instrumentation
 * failures are logged and the affected event is recorded with missing
 * fields instead.
 */

import { performance } from "node:perf_hooks";

import {
  EngineOptionsSchema,
  type EngineOptions,
  type ResolvedEngineOptions,
} from "../core/options";
import {
  type ContextId,
  type Origin,
  type QueryEndOptions,
  type QueryEvent,
  type QueryStartOptions,
  type QueryToken,
  type RecordIdentity,
  type RelationshipSource,
  type Report,
} from "../core/types";
import {
  DEFAULT_INTERNAL_PATH_PREFIXES,
  DEFAULT_INTERNAL_PATH_SEGMENTS,
  OriginResolver,
} from "../correlator/origin-resolver";
import { InstrumentationFailure, type InstrumentationStage } from "../errors";
import { validateOptions } from "../errors/validation";
import { type RelationshipScope } from "../grouping/grouping-engine";
import { finalize } from "../report/aggregator";
import { createTrackingProxy } from "../tracking/field-tracker";
import { generateId, type IdGenerator } from "../utils/id";
import { defaultLogger, type Logger } from "../utils/logger";
import { unwrap } from "../utils/result";
import { ExecutionContext } from "./execution-context";
import { UnitOfWork } from "./unit-of-work";

// ============================================================
// Types
// ============================================================

export type BeginOptions = Readonly<{
  /**
   * Aborting releases the unit of work, for operations that may never
   * reach their end hook.
   */
  signal?: AbortSignal;
  /** Receives the report of a unit of work released through `signal` */
  onAbandon?: (report: Report) => void;
}>;

export type CaptureOptions<T> = QueryStartOptions &
  Readonly<{
    /** Describes the driver result once it is available */
    describe?: (result: T) => QueryEndOptions;
  }>;

export type CaptureResult<T> = Readonly<{
  result: T;
  event: QueryEvent | undefined;
}>;

export type RelationshipHandle = Readonly<{
  contextId: ContextId;
  unitOfWorkId: string;
  scope: RelationshipScope;
}>;

export type UnitOfWorkOutcome<T> =
  | Readonly<{ status: "fulfilled"; value: T; report: Report }>
  | Readonly<{ status: "rejected"; reason: unknown; report: Report }>;

// ============================================================
// QueryLens
// ============================================================

/**
 * @example
 * ```typescript
 * const lens = createQueryLens();
 *
 * lens.beginUnitOfWork("req-1");
 * const token = lens.onQueryStart("req-1", "SELECT id, name FROM users");
 * const rows = runQuery();
 * const event = lens.onQueryEnd(token, { columns: ["id", "name"] });
 *
 * const users = rows.map((row) =>
 *   lens.wrapRecord("req-1", event.groupId, row, { shape: "users", key: row.id }),
 * );
 * render(users);
 *
 * const report = lens.endUnitOfWork("req-1");
 * ```
 */
export class QueryLens {
  /** Current context id for integrations that cannot pass one explicitly */
  readonly context = new ExecutionContext();
  readonly #registry = new Map<ContextId, UnitOfWork>();
  readonly #resolver: OriginResolver;
  readonly #logger: Logger;
  readonly #clock: () => number;
  readonly #generateId: IdGenerator;
  readonly #captureParams: boolean;

  constructor(options: ResolvedEngineOptions) {
    this.#logger = options.logger ?? defaultLogger;
    this.#clock = options.clock ?? (() => performance.now());
    this.#generateId = options.idGenerator ?? generateId;
    this.#captureParams = options.captureParams;

    const defaults = !options.replaceDefaultInternals;
    this.#resolver = new OriginResolver({
      internalPathPrefixes: [
        ...(defaults ? DEFAULT_INTERNAL_PATH_PREFIXES : []),
        ...options.internalPathPrefixes,
      ],
      internalPathSegments: [
        ...(defaults ? DEFAULT_INTERNAL_PATH_SEGMENTS : []),
        ...options.internalPathSegments,
      ],
      maxStackDepth: options.maxStackDepth,
      logger: this.#logger,
      ...(options.captureStack !== undefined && {
        captureStack: options.captureStack,
      }),
    });
  }

  /**
   * Number of units of work currently registered.
   */
  get activeCount(): number {
    return this.#registry.size;
  }

  get internalPathPrefixes(): readonly string[] {
    return this.#resolver.internalPathPrefixes;
  }

  getActiveUnitOfWork(contextId: ContextId): UnitOfWork | undefined {
    return this.#registry.get(contextId);
  }

  // ------------------------------------------------------------
  // Unit of work lifecycle
  // ------------------------------------------------------------

  /**
   * Starts instrumenting a context.
   *
   * A second begin for a context that is already active does not start a
   * new unit of work: the active one is returned and carries a
   * `nested-begin` warning.
   */
  beginUnitOfWork(contextId: ContextId, options: BeginOptions = {}): UnitOfWork {
    const active = this.#registry.get(contextId);
    if (active) {
      const message = `beginUnitOfWork("${contextId}") called while a unit of work is already active for this context.`;
      active.addWarning({ kind: "nested-begin", contextId, message });
      this.#logger.warn(`[QueryLens] ${message}`);
      return active;
    }

    const unitOfWork = new UnitOfWork(
      this.#generateId(),
      contextId,
      this.#now(contextId),
    );
    this.#registry.set(contextId, unitOfWork);

    const signal = options.signal;
    if (signal) {
      const abandon = (): void => {
        this.#abandon(unitOfWork, options.onAbandon);
      };
      if (signal.aborted) {
        abandon();
        return unitOfWork;
      }
      signal.addEventListener("abort", abandon, { once: true });
      unitOfWork.onClose(() => {
        signal.removeEventListener("abort", abandon);
      });
    }

    return unitOfWork;
  }

  /**
   * Finalizes and detaches the active unit of work of a context.
   *
   * Without an active unit of work the report is empty and carries an
   * `unmatched-end` warning.
   */
  endUnitOfWork(contextId: ContextId): Report {
    const unitOfWork = this.#registry.get(contextId);
    if (!unitOfWork) {
      const message = `endUnitOfWork("${contextId}") called without a matching beginUnitOfWork.`;
      this.#logger.warn(`[QueryLens] ${message}`);
      return this.#emptyReport(contextId, {
        kind: "unmatched-end",
        contextId,
        message,
      });
    }
    return this.#finish(unitOfWork);
  }

  /**
   * Runs `fn` inside its own unit of work and always releases it.
   *
   * Never rejects; a failure of `fn` is returned as the outcome together
   * with the report gathered up to that point.
   *
   * When the context already has an active unit of work, `fn` runs inside
   * it and the outcome carries a snapshot of it so far; only the caller that
   * began the unit of work finishes it.
   */
  async runUnitOfWork<T>(
    contextId: ContextId,
    fn: (unitOfWork: UnitOfWork) => T | Promise<T>,
    options: BeginOptions = {},
  ): Promise<UnitOfWorkOutcome<T>> {
    const owned = !this.#registry.has(contextId);
    const unitOfWork = this.beginUnitOfWork(contextId, options);
    const release = (): Report =>
      owned ? this.#finish(unitOfWork) : this.#snapshot(unitOfWork);
    try {
      const value = await this.context.run(contextId, () => fn(unitOfWork));
      return { status: "fulfilled", value, report: release() };
    } catch (error) {
      return { status: "rejected", reason: error, report: release() };
    }
  }

  // ------------------------------------------------------------
  // Query capture
  // ------------------------------------------------------------

  /**
   * Marks the start of a database round-trip.
   *
   * Resolves the origin from the current stack unless one is supplied, so
   * it must be called synchronously from the code that forces the query.
   * Returns undefined when the context has no active unit of work.
   */
  onQueryStart(
    contextId: ContextId,
    statement: string,
    options: QueryStartOptions = {},
  ): QueryToken | undefined {
    const unitOfWork = this.#registry.get(contextId);
    if (!unitOfWork) return undefined;

    try {
      const origin = options.origin ?? this.#resolver.resolveOrigin();
      const pending = unitOfWork.startQuery({
        statement,
        ...(this.#captureParams &&
          options.params !== undefined && { params: options.params }),
        ...(options.shape !== undefined && { shape: options.shape }),
        ...(options.columns !== undefined && { columns: options.columns }),
        origin,
        startClockMs: this.#now(contextId),
      });
      return {
        contextId,
        unitOfWorkId: unitOfWork.id,
        sequence: pending.sequence,
      };
    } catch (error) {
      this.#fail("capture", contextId, "Failed to record query start.", error);
      return undefined;
    }
  }

  /**
   * Marks the end of a round-trip and records its event.
   *
   * Returns undefined when there was no token, or when its unit of work
   * has already ended (the query was then recorded as incomplete).
   */
  onQueryEnd(
    token: QueryToken | undefined,
    options: QueryEndOptions = {},
  ): QueryEvent | undefined {
    if (!token) return undefined;
    const unitOfWork = this.#registry.get(token.contextId);
    if (!unitOfWork || unitOfWork.id !== token.unitOfWorkId) return undefined;

    try {
      return unitOfWork.completeQuery(token.sequence, {
        ...options,
        endClockMs: this.#now(token.contextId),
      });
    } catch (error) {
      this.#fail(
        "capture",
        token.contextId,
        "Failed to record query end.",
        error,
      );
      return undefined;
    }
  }

  /**
   * Wraps a synchronous driver call with start and end hooks.
   * Driver errors are re-thrown unchanged after the event is marked failed.
   */
  capture<T>(
    contextId: ContextId,
    statement: string,
    run: () => T,
    options: CaptureOptions<T> = {},
  ): CaptureResult<T> {
    const token = this.onQueryStart(contextId, statement, options);
    let result: T;
    try {
      result = run();
    } catch (error) {
      this.onQueryEnd(token, { failed: true });
      throw error;
    }
    const event = this.onQueryEnd(
      token,
      this.#describe(contextId, options.describe, result),
    );
    return { result, event };
  }

  /**
   * Asynchronous counterpart of `capture`.
   */
  async captureAsync<T>(
    contextId: ContextId,
    statement: string,
    run: () => Promise<T>,
    options: CaptureOptions<T> = {},
  ): Promise<CaptureResult<T>> {
    const token = this.onQueryStart(contextId, statement, options);
    let result: T;
    try {
      result = await run();
    } catch (error) {
      this.onQueryEnd(token, { failed: true });
      throw error;
    }
    const event = this.onQueryEnd(
      token,
      this.#describe(contextId, options.describe, result),
    );
    return { result, event };
  }

  /**
   * Origin of the code currently running.
   */
  resolveOrigin(): Origin {
    return this.#resolver.resolveOrigin();
  }

  // ------------------------------------------------------------
  // Relationship resolution
  // ------------------------------------------------------------

  /**
   * Announces that the record layer is about to resolve a relationship.
   * Queries started before the matching `endRelationship` are dependents.
   */
  beginRelationship(
    contextId: ContextId,
    source: RelationshipSource = {},
  ): RelationshipHandle | undefined {
    const unitOfWork = this.#registry.get(contextId);
    if (!unitOfWork) return undefined;

    try {
      let sourceGroupId: string | undefined;
      let anchored = false;
      if ("groupId" in source) {
        sourceGroupId = source.groupId;
        anchored = true;
      } else if ("record" in source) {
        sourceGroupId = unitOfWork.tracker.groupOf(source.record);
        anchored = true;
      }

      const scope = unitOfWork.grouping.openScope(sourceGroupId, {
        anchored,
        ...(source.relation !== undefined && { relation: source.relation }),
      });
      return { contextId, unitOfWorkId: unitOfWork.id, scope };
    } catch (error) {
      this.#fail(
        "grouping",
        contextId,
        "Failed to open a relationship scope.",
        error,
      );
      return undefined;
    }
  }

  endRelationship(handle: RelationshipHandle | undefined): void {
    if (!handle) return;
    const unitOfWork = this.#registry.get(handle.contextId);
    if (!unitOfWork || unitOfWork.id !== handle.unitOfWorkId) return;
    unitOfWork.grouping.closeScope(handle.scope);
  }

  /**
   * Runs `run` inside a relationship scope.
   */
  resolveRelationship<T>(
    contextId: ContextId,
    source: RelationshipSource,
    run: () => T,
  ): T {
    const handle = this.beginRelationship(contextId, source);
    try {
      return run();
    } finally {
      this.endRelationship(handle);
    }
  }

  async resolveRelationshipAsync<T>(
    contextId: ContextId,
    source: RelationshipSource,
    run: () => Promise<T>,
  ): Promise<T> {
    const handle = this.beginRelationship(contextId, source);
    try {
      return await run();
    } finally {
      this.endRelationship(handle);
    }
  }

  // ------------------------------------------------------------
  // Field access
  // ------------------------------------------------------------

  /**
   * Registers a materialized record as produced by a group.
   */
  trackRecord(
    contextId: ContextId,
    groupId: string,
    identity: RecordIdentity,
  ): void {
    const unitOfWork = this.#registry.get(contextId);
    if (!unitOfWork) return;
    if (!unitOfWork.trackRecord(groupId, identity)) {
      this.#fail(
        "tracking",
        contextId,
        `Record attributed to group "${groupId}", which has not recorded a query.`,
      );
    }
  }

  /**
   * Returns a view of `record` whose field reads are reported to the
   * unit of work active now. Outside a unit of work the record is
   * returned as is.
   */
  wrapRecord<T extends object>(
    contextId: ContextId,
    groupId: string,
    record: T,
    identity: Readonly<{ shape?: string; key?: string | number | bigint }> = {},
  ): T {
    const unitOfWork = this.#registry.get(contextId);
    if (!unitOfWork) return record;

    if (!unitOfWork.trackRecord(groupId, { record, ...identity })) {
      this.#fail(
        "tracking",
        contextId,
        `Record attributed to group "${groupId}", which has not recorded a query.`,
      );
      return record;
    }

    const proxy = createTrackingProxy(record, (field) => {
      // Reads after the unit of work ended are dropped.
      if (!unitOfWork.isActive) return;
      unitOfWork.tracker.record(record, field);
    });
    unitOfWork.tracker.alias(record, proxy);
    return proxy;
  }

  /**
   * Reports one field read on a record registered with `trackRecord`.
   */
  onFieldRead(contextId: ContextId, record: object, field: string): void {
    const unitOfWork = this.#registry.get(contextId);
    if (!unitOfWork) return;
    if (!unitOfWork.tracker.record(record, field)) {
      this.#fail(
        "tracking",
        contextId,
        `Read of "${field}" on a record no tracked query produced.`,
      );
    }
  }

  // ------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------

  #finish(unitOfWork: UnitOfWork): Report {
    if (this.#registry.get(unitOfWork.contextId) === unitOfWork) {
      this.#registry.delete(unitOfWork.contextId);
    }

    const cleanups = unitOfWork.close(this.#now(unitOfWork.contextId));
    for (const cleanup of cleanups) {
      try {
        cleanup();
      } catch (error) {
        this.#fail(
          "aggregation",
          unitOfWork.contextId,
          "A unit-of-work cleanup failed.",
          error,
        );
      }
    }

    return this.#report(
      unitOfWork,
      unitOfWork.endedAt ?? new Date(),
      unitOfWork.totalExecutionTimeMs,
    );
  }

  /**
   * Report of a unit of work that stays active. Queries still in flight are
   * left out.
   */
  #snapshot(unitOfWork: UnitOfWork): Report {
    const now = this.#now(unitOfWork.contextId);
    const elapsed =
      now === undefined || unitOfWork.startClockMs === undefined ?
        undefined
      : now - unitOfWork.startClockMs;
    return this.#report(unitOfWork, new Date(), elapsed);
  }

  #report(
    unitOfWork: UnitOfWork,
    endedAt: Date,
    totalExecutionTimeMs: number | undefined,
  ): Report {
    try {
      return finalize({
        unitOfWorkId: unitOfWork.id,
        contextId: unitOfWork.contextId,
        startedAt: unitOfWork.startedAt,
        endedAt,
        totalExecutionTimeMs,
        groups: unitOfWork.grouping.getGroups(),
        records: unitOfWork.tracker.getRecords(),
        warnings: unitOfWork.warnings,
      });
    } catch (error) {
      this.#fail(
        "aggregation",
        unitOfWork.contextId,
        "Failed to build the report.",
        error,
      );
      return this.#emptyReport(unitOfWork.contextId, undefined, unitOfWork.id);
    }
  }

  #abandon(
    unitOfWork: UnitOfWork,
    onAbandon: ((report: Report) => void) | undefined,
  ): void {
    if (!unitOfWork.isActive) return;
    const message = `Unit of work for "${unitOfWork.contextId}" was abandoned before its end hook ran.`;
    unitOfWork.addWarning({
      kind: "abandoned",
      contextId: unitOfWork.contextId,
      message,
    });
    const report = this.#finish(unitOfWork);
    if (!onAbandon) return;
    try {
      onAbandon(report);
    } catch (error) {
      this.#fail(
        "aggregation",
        unitOfWork.contextId,
        "The onAbandon callback failed.",
        error,
      );
    }
  }

  #emptyReport(
    contextId: ContextId,
    warning: Report["warnings"][number] | undefined,
    unitOfWorkId: string = this.#generateId(),
  ): Report {
    const now = new Date();
    return finalize({
      unitOfWorkId,
      contextId,
      startedAt: now,
      endedAt: now,
      totalExecutionTimeMs: undefined,
      groups: [],
      records: [],
      warnings: warning ? [warning] : [],
    });
  }

  #describe<T>(
    contextId: ContextId,
    describe: ((result: T) => QueryEndOptions) | undefined,
    result: T,
  ): QueryEndOptions {
    if (!describe) return {};
    try {
      return describe(result);
    } catch (error) {
      this.#fail(
        "capture",
        contextId,
        "Failed to describe a query result.",
        error,
      );
      return {};
    }
  }

  /**
   * Reads the monotonic clock. A failing clock degrades to no timing.
   */
  #now(contextId: ContextId): number | undefined {
    try {
      const value = this.#clock();
      if (Number.isFinite(value)) return value;
      this.#fail("capture", contextId, `Clock returned ${String(value)}.`);
      return undefined;
    } catch (error) {
      this.#fail("capture", contextId, "Clock is unavailable.", error);
      return undefined;
    }
  }

  #fail(
    stage: InstrumentationStage,
    contextId: ContextId,
    message: string,
    cause?: unknown,
  ): void {
    const failure = new InstrumentationFailure(
      message,
      { stage, contextId },
      cause === undefined ? undefined : { cause },
    );
    this.#logger.warn(`[QueryLens] ${failure.message}`, failure);
  }
}

// ============================================================
// Factory
// ============================================================

/**
 * Creates an engine.
 *
 * @throws ConfigurationError if the options are invalid
 */
export function createQueryLens(options: EngineOptions = {}): QueryLens {
  const resolved = unwrap(
    validateOptions<ResolvedEngineOptions>(
      EngineOptionsSchema,
      options,
      "createQueryLens",
    ),
  );
  return new QueryLens(resolved);
}
