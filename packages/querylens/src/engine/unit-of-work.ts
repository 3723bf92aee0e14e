/**
 * UnitOfWork - the instrumentation state of one bounded operation.
 *
 * Only ever touched from its own execution context, so it needs no
 * locking. Once closed it ignores everything.
 */

import {
  type ContextId,
  type Origin,
  type QueryEvent,
  type QueryRole,
  type RecordIdentity,
  type ScopeWarning,
} from "../core/types";
import { type QueryGroup, GroupingEngine } from "../grouping/grouping-engine";
import { FieldAccessTracker } from "../tracking/field-tracker";

// ============================================================
// Types
// ============================================================

export type UnitOfWorkState = "active" | "closed";

export type PendingQuery = Readonly<{
  sequence: number;
  statement: string;
  params?: readonly unknown[];
  shape?: string;
  columns?: readonly string[];
  origin: Origin;
  /** Raw clock reading at start; `undefined` when the clock failed */
  startClockMs: number | undefined;
  group: QueryGroup;
  role: QueryRole;
}>;

export type CompleteQuery = Readonly<{
  endClockMs: number | undefined;
  columns?: readonly string[];
  rowCount?: number;
  failed?: boolean;
}>;

// ============================================================
// UnitOfWork
// ============================================================

export class UnitOfWork {
  readonly id: string;
  readonly contextId: ContextId;
  readonly startedAt: Date;
  readonly startClockMs: number | undefined;
  readonly grouping = new GroupingEngine();
  readonly tracker = new FieldAccessTracker();
  readonly #pending = new Map<number, PendingQuery>();
  readonly #events: QueryEvent[] = [];
  readonly #warnings: ScopeWarning[] = [];
  readonly #cleanups: (() => void)[] = [];
  #state: UnitOfWorkState = "active";
  #endedAt: Date | undefined;
  #endClockMs: number | undefined;
  #nextSequence = 1;

  constructor(
    id: string,
    contextId: ContextId,
    startClockMs: number | undefined,
  ) {
    this.id = id;
    this.contextId = contextId;
    this.startedAt = new Date();
    this.startClockMs = startClockMs;
  }

  get state(): UnitOfWorkState {
    return this.#state;
  }

  get isActive(): boolean {
    return this.#state === "active";
  }

  get endedAt(): Date | undefined {
    return this.#endedAt;
  }

  get events(): readonly QueryEvent[] {
    return [...this.#events];
  }

  get warnings(): readonly ScopeWarning[] {
    return [...this.#warnings];
  }

  /**
   * Wall time between begin and close on the monotonic clock.
   */
  get totalExecutionTimeMs(): number | undefined {
    if (this.startClockMs === undefined || this.#endClockMs === undefined) {
      return undefined;
    }
    return this.#endClockMs - this.startClockMs;
  }

  /**
   * Registers a query that is about to run and decides its group.
   */
  startQuery(
    input: Readonly<{
      statement: string;
      params?: readonly unknown[];
      shape?: string;
      columns?: readonly string[];
      origin: Origin;
      startClockMs: number | undefined;
    }>,
  ): PendingQuery {
    const { group, role } = this.grouping.assignGroup(input.origin);
    const pending: PendingQuery = {
      ...input,
      sequence: this.#nextSequence++,
      group,
      role,
    };
    this.#pending.set(pending.sequence, pending);
    return pending;
  }

  /**
   * Turns a pending query into its immutable event.
   * Returns undefined when the query is unknown or already recorded.
   */
  completeQuery(sequence: number, end: CompleteQuery): QueryEvent | undefined {
    const pending = this.#pending.get(sequence);
    if (!pending) return undefined;
    this.#pending.delete(sequence);

    const event = this.#buildEvent(pending, end, true);
    this.#record(pending.group, event);
    return event;
  }

  /**
   * Attributes a record to a group. Only groups that have recorded at least
   * one query can own records.
   */
  trackRecord(groupId: string, identity: RecordIdentity): boolean {
    const group = this.grouping.getGroup(groupId);
    if (!group) return false;
    if (!group.hasEvents) return false;
    this.tracker.track(groupId, identity);
    return true;
  }

  addWarning(warning: ScopeWarning): void {
    this.#warnings.push(warning);
  }

  /**
   * Registers a cleanup to run exactly once when the unit of work closes.
   */
  onClose(cleanup: () => void): void {
    this.#cleanups.push(cleanup);
  }

  /**
   * Closes the unit of work. Queries still in flight are recorded as
   * incomplete, with whatever timing is available.
   */
  close(endClockMs: number | undefined): readonly (() => void)[] {
    if (this.#state === "closed") return [];

    for (const pending of this.#pending.values()) {
      const event = this.#buildEvent(pending, { endClockMs: undefined }, false);
      this.#record(pending.group, event);
      this.#warnings.push({
        kind: "incomplete-query",
        contextId: this.contextId,
        message: `Query ${pending.sequence} had not completed when the unit of work ended.`,
        statement: pending.statement,
      });
    }
    this.#pending.clear();

    this.grouping.closeAll();
    this.#state = "closed";
    this.#endedAt = new Date();
    this.#endClockMs = endClockMs;
    return this.#cleanups.splice(0);
  }

  #record(group: QueryGroup, event: QueryEvent): void {
    group.attach(event);
    this.#events.push(event);
  }

  #buildEvent(
    pending: PendingQuery,
    end: CompleteQuery,
    completed: boolean,
  ): QueryEvent {
    const startedAtMs =
      pending.startClockMs === undefined || this.startClockMs === undefined ?
        undefined
      : pending.startClockMs - this.startClockMs;
    const durationMs =
      pending.startClockMs === undefined || end.endClockMs === undefined ?
        undefined
      : end.endClockMs - pending.startClockMs;
    const columns = end.columns ?? pending.columns;

    return Object.freeze({
      id: pending.sequence,
      statement: pending.statement,
      ...(pending.params !== undefined && {
        params: Object.freeze([...pending.params]),
      }),
      ...(pending.shape !== undefined && { shape: pending.shape }),
      columns: columns === undefined ? undefined : Object.freeze([...columns]),
      startedAtMs,
      durationMs,
      origin: pending.origin,
      groupId: pending.group.id,
      role: pending.role,
      ...(end.rowCount !== undefined && { rowCount: end.rowCount }),
      failed: end.failed ?? false,
      completed,
    });
  }
}
