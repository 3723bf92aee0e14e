import {
  type FieldUsage,
  type GroupReport,
  normalizeStatement,
  type QueryEvent,
  type Report,
  type ShapeUsage,
} from "querylens";

import { formatMs, formatOriginFrom, sortedList } from "./utils";

export type FormatOptions = Readonly<{
  /** Origins below this directory are printed relative to it */
  cwd?: string;
}>;

const MAX_STATEMENT_LENGTH = 80;

function truncate(statement: string): string {
  const normalized = normalizeStatement(statement);
  if (normalized.length <= MAX_STATEMENT_LENGTH) {
    return normalized;
  }
  return `${normalized.slice(0, MAX_STATEMENT_LENGTH - 3)}...`;
}

function formatEvent(event: QueryEvent): string {
  const facts = [formatMs(event.durationMs)];
  if (event.rowCount !== undefined) {
    facts.push(`${event.rowCount} ${event.rowCount === 1 ? "row" : "rows"}`);
  }
  if (event.failed) facts.push("failed");
  if (!event.completed) facts.push("incomplete");

  const role = event.role.padEnd(9);
  return `  ${role} #${event.id}  ${truncate(event.statement)}  (${facts.join(", ")})`;
}

function formatFields(fields: FieldUsage, indent: string): string[] {
  if (fields.status === "unknown") {
    return [
      `${indent}fetched:      unknown`,
      `${indent}consumed:     ${sortedList(fields.consumed)}`,
    ];
  }
  return [
    `${indent}fetched:      ${sortedList(fields.fetched)}`,
    `${indent}consumed:     ${sortedList(fields.consumed)}`,
    `${indent}over-fetched: ${sortedList(fields.overFetched)}`,
  ];
}

function formatShape(shape: ShapeUsage): string[] {
  const records = `${shape.records} ${shape.records === 1 ? "record" : "records"}`;
  return [`    ${shape.shape} (${records})`, ...formatFields(shape.fields, "      ")];
}

function formatGroup(
  group: GroupReport,
  index: number,
  options: FormatOptions,
): string[] {
  const count = 1 + group.dependents.length;
  const lines = [
    `Group ${index + 1} at ${formatOriginFrom(group.origin, options.cwd)} (${count} ${count === 1 ? "query" : "queries"})`,
    formatEvent(group.primary),
    ...group.dependents.map((event) => formatEvent(event)),
    ...formatFields(group.fields, "  "),
  ];
  if (group.shapes.length > 1) {
    lines.push("  by shape:");
    for (const shape of group.shapes) {
      lines.push(...formatShape(shape));
    }
  }
  return lines;
}

/**
 * Renders a report as plain text for a terminal.
 */
export function formatReport(report: Report, options: FormatOptions = {}): string {
  const { summary } = report;
  const lines = [
    `Unit of work ${report.unitOfWorkId} (context "${report.contextId}")`,
    `Queries: ${summary.totalQueries}  DB time: ${formatMs(summary.totalDbTimeMs)}  Total: ${formatMs(summary.totalExecutionTimeMs)}`,
  ];

  report.groups.forEach((group, index) => {
    lines.push("", ...formatGroup(group, index, options));
  });

  if (summary.duplicates.length > 0) {
    lines.push("", "Duplicate statements:");
    for (const duplicate of summary.duplicates) {
      lines.push(`  ${duplicate.count}x ${truncate(duplicate.statement)}`);
    }
  }

  if (report.warnings.length > 0) {
    lines.push("", "Warnings:");
    for (const warning of report.warnings) {
      lines.push(`  [${warning.kind}] ${warning.message}`);
    }
  }

  return lines.join("\n");
}

// ============================================================
// JSON
// ============================================================

function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Set) {
    return [...value].toSorted();
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return value;
}

/**
 * Serializes a report. Sets become sorted arrays, maps become objects.
 */
export function reportToJson(report: Report): string {
  return JSON.stringify(report, jsonReplacer, 2);
}
