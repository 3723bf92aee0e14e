/**
 * Report Aggregation - turns a finished unit of work into its report.
 *
 * Fetched fields come from the declared output columns the integration
 * layer supplied for each query, never from the statement text. Consumed
 * fields come from the field access records. Everything in the report is a
 * copy, so nothing that happens after finalization can change it.
 */

import {
  type DuplicateStatement,
  type FieldUsage,
  type GroupReport,
  type QueryEvent,
  type Report,
  type ReportSummary,
  type ScopeWarning,
  type ShapeUsage,
} from "../core/types";
import { type QueryGroup } from "../grouping/grouping-engine";
import { type FieldAccessRecord, UNKNOWN_SHAPE } from "../tracking/field-tracker";

// ============================================================
// Types
// ============================================================

/**
 * Everything `finalize` reads from a closed unit of work.
 */
export type FinalizeInput = Readonly<{
  unitOfWorkId: string;
  contextId: string;
  startedAt: Date;
  endedAt: Date;
  totalExecutionTimeMs: number | undefined;
  groups: readonly QueryGroup[];
  records: readonly FieldAccessRecord[];
  warnings: readonly ScopeWarning[];
}>;

type MutableUsage = {
  fetched: Set<string>;
  fetchedKnown: boolean;
  consumed: Set<string>;
  records: number;
  readCounts: Map<string, number>;
};

// ============================================================
// Main Functions
// ============================================================

/**
 * Builds the report of a unit of work.
 */
export function finalize(input: FinalizeInput): Report {
  const recordsByGroup = groupRecords(input.records);
  const groups: GroupReport[] = [];
  const events: QueryEvent[] = [];

  for (const group of input.groups) {
    const primary = group.primary;
    // A group is only created for a query that started; the unit of work
    // turns unfinished queries into events before finalizing.
    if (!primary) continue;

    const dependents = group.dependents;
    events.push(primary, ...dependents);
    groups.push(
      buildGroupReport(
        group,
        primary,
        dependents,
        recordsByGroup.get(group.id) ?? [],
      ),
    );
  }

  const report: Report = {
    unitOfWorkId: input.unitOfWorkId,
    contextId: input.contextId,
    startedAt: new Date(input.startedAt.getTime()),
    endedAt: new Date(input.endedAt.getTime()),
    groups: Object.freeze(groups),
    summary: buildSummary(
      events.toSorted((a, b) => a.id - b.id),
      input.totalExecutionTimeMs,
    ),
    warnings: Object.freeze([...input.warnings]),
  };
  return Object.freeze(report);
}

/**
 * Normalizes whitespace in a statement so formatting variants compare equal.
 *
 * @example
 * ```typescript
 * normalizeStatement("SELECT *\n  FROM users") // => "SELECT * FROM users"
 * ```
 */
export function normalizeStatement(statement: string): string {
  return statement.split(/\s+/).filter(Boolean).join(" ");
}

/**
 * Statements issued more than once, in order of first appearance.
 */
export function findDuplicateStatements(
  events: readonly QueryEvent[],
): readonly DuplicateStatement[] {
  const counts = new Map<string, number>();
  for (const event of events) {
    const statement = normalizeStatement(event.statement);
    counts.set(statement, (counts.get(statement) ?? 0) + 1);
  }

  const duplicates: DuplicateStatement[] = [];
  for (const [statement, count] of counts) {
    if (count > 1) {
      duplicates.push({ statement, count });
    }
  }
  return duplicates;
}

// ============================================================
// Helper Functions
// ============================================================

function groupRecords(
  records: readonly FieldAccessRecord[],
): ReadonlyMap<string, FieldAccessRecord[]> {
  const byGroup = new Map<string, FieldAccessRecord[]>();
  for (const record of records) {
    const list = byGroup.get(record.groupId);
    if (list) {
      list.push(record);
    } else {
      byGroup.set(record.groupId, [record]);
    }
  }
  return byGroup;
}

function buildGroupReport(
  group: QueryGroup,
  primary: QueryEvent,
  dependents: readonly QueryEvent[],
  records: readonly FieldAccessRecord[],
): GroupReport {
  const total = emptyUsage();
  const byShape = new Map<string, MutableUsage>();

  const usageFor = (shape: string): MutableUsage => {
    let usage = byShape.get(shape);
    if (!usage) {
      usage = emptyUsage();
      byShape.set(shape, usage);
    }
    return usage;
  };

  for (const event of [primary, ...dependents]) {
    const usage = usageFor(event.shape ?? UNKNOWN_SHAPE);
    if (event.columns === undefined) {
      usage.fetchedKnown = false;
      total.fetchedKnown = false;
      continue;
    }
    for (const column of event.columns) {
      usage.fetched.add(column);
      total.fetched.add(column);
    }
  }

  for (const record of records) {
    const usage = usageFor(record.shape);
    usage.records++;
    total.records++;
    for (const [field, count] of record.readCounts) {
      usage.consumed.add(field);
      total.consumed.add(field);
      usage.readCounts.set(field, (usage.readCounts.get(field) ?? 0) + count);
    }
  }

  const shapes: ShapeUsage[] = [...byShape.entries()]
    .toSorted(([a], [b]) => a.localeCompare(b))
    .map(([shape, usage]) =>
      Object.freeze({
        shape,
        fields: toFieldUsage(usage),
        records: usage.records,
        readCounts: new Map(usage.readCounts),
      }),
    );

  return Object.freeze({
    id: group.id,
    origin: group.origin,
    primary,
    dependents: Object.freeze([...dependents]),
    fields: toFieldUsage(total),
    shapes: Object.freeze(shapes),
  });
}

function emptyUsage(): MutableUsage {
  return {
    fetched: new Set(),
    fetchedKnown: true,
    consumed: new Set(),
    records: 0,
    readCounts: new Map(),
  };
}

function toFieldUsage(usage: MutableUsage): FieldUsage {
  const consumed = new Set(usage.consumed);
  if (!usage.fetchedKnown) {
    return Object.freeze({ status: "unknown", consumed });
  }

  const fetched = new Set(usage.fetched);
  const overFetched = new Set(
    [...fetched].filter((field) => !consumed.has(field)),
  );
  return Object.freeze({ status: "known", fetched, consumed, overFetched });
}

function buildSummary(
  events: readonly QueryEvent[],
  totalExecutionTimeMs: number | undefined,
): ReportSummary {
  let totalDbTimeMs = 0;
  for (const event of events) {
    totalDbTimeMs += event.durationMs ?? 0;
  }

  return Object.freeze({
    totalQueries: events.length,
    totalDbTimeMs,
    totalExecutionTimeMs,
    duplicates: Object.freeze(
      findDuplicateStatements(events).map((entry) => Object.freeze(entry)),
    ),
  });
}
