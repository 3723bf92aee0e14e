/**
 * better-sqlite3 integration.
 *
 * Wraps a database handle so every statement execution is captured as a
 * query event. Output columns come from the driver's own statement
 * metadata (`stmt.columns()`), and rows returned in object mode are handed
 * back as tracked records.
 *
 * @example
 * ```typescript
 * import Database from "better-sqlite3";
 * import { createQueryLens } from "querylens";
 * import { instrumentSqlite } from "querylens/sqlite";
 *
 * const lens = createQueryLens();
 * const db = instrumentSqlite(new Database(":memory:"), lens);
 *
 * await lens.runUnitOfWork("req-1", () => {
 *   const users = db.prepare("SELECT id, name, email FROM users").all();
 *   return users.map((user) => user.name);
 * });
 * ```
 */

import type Database from "better-sqlite3";

import { type ContextId } from "../core/types";
import { type QueryLens } from "../engine/query-lens";
import { ConfigurationError } from "../errors";

// ============================================================
// Types
// ============================================================

export type ColumnDefinition = Database.ColumnDefinition;

export type SqliteInstrumentationOptions = Readonly<{
  /**
   * Context of the statement being executed. Defaults to the context the
   * lens is running (`lens.context.current()`). Statements executed
   * outside any context are passed through unobserved.
   */
  getContextId?: () => ContextId | undefined;
  /**
   * Shape name for the rows of a statement. Defaults to the source table
   * when every output column comes from the same one.
   */
  shapeOf?: (
    source: string,
    columns: readonly ColumnDefinition[],
  ) => string | undefined;
  /** Column whose value identifies a row (default "id") */
  keyColumn?: string;
}>;

type RowMode = "object" | "raw" | "pluck" | "expand";

type StatementMetadata = Readonly<{
  source: string;
  columns: readonly string[] | undefined;
  shape: string | undefined;
}>;

type Settings = Readonly<{
  lens: QueryLens;
  getContextId: () => ContextId | undefined;
  shapeOf: (
    source: string,
    columns: readonly ColumnDefinition[],
  ) => string | undefined;
  keyColumn: string;
}>;

// ============================================================
// Instrumentation
// ============================================================

/**
 * Returns an instrumented view of `db`. The original handle is untouched
 * and keeps working unobserved.
 *
 * @throws ConfigurationError if `db` is not a better-sqlite3 database
 */
export function instrumentSqlite(
  db: Database.Database,
  lens: QueryLens,
  options: SqliteInstrumentationOptions = {},
): Database.Database {
  if (!isDatabaseLike(db)) {
    throw new ConfigurationError(
      "instrumentSqlite() expects a better-sqlite3 Database.",
      { received: typeof db },
      {
        suggestion: `Pass the object returned by new Database(...) from "better-sqlite3".`,
      },
    );
  }

  const settings: Settings = {
    lens,
    getContextId: options.getContextId ?? (() => lens.context.current()),
    shapeOf: options.shapeOf ?? sourceTableOf,
    keyColumn: options.keyColumn ?? "id",
  };

  const proxy: Database.Database = new Proxy(db, {
    get(target, property) {
      if (property === "prepare") {
        return (source: string) =>
          instrumentStatement(target.prepare(source), settings);
      }
      if (property === "exec") {
        return (source: string) => {
          const contextId = settings.getContextId();
          if (contextId === undefined) {
            target.exec(source);
            return proxy;
          }
          lens.capture(contextId, source, () => target.exec(source), {
            columns: [],
          });
          return proxy;
        };
      }

      const value: unknown = Reflect.get(target, property, target);
      if (typeof value !== "function") return value;
      // Native methods require the real handle as `this`.
      return (...args: unknown[]) => {
        const result: unknown = Reflect.apply(value, target, args);
        return result === target ? proxy : result;
      };
    },
  });
  return proxy;
}

function instrumentStatement(
  statement: Database.Statement<unknown[]>,
  settings: Settings,
): Database.Statement<unknown[]> {
  const metadata = describeStatement(statement, settings);
  let mode: RowMode = "object";

  const toggle = (target: RowMode, enabled: unknown): void => {
    if (enabled === false) {
      if (mode === target) mode = "object";
      return;
    }
    mode = target;
  };

  const proxy: Database.Statement<unknown[]> = new Proxy(statement, {
    get(target, property) {
      switch (property) {
        case "all": {
          return (...params: unknown[]) =>
            observe(settings, metadata, params, () => target.all(...params), {
              rowCount: (rows) => rows.length,
              wrap: (rows, wrapRow) =>
                mode === "object" ? rows.map((row) => wrapRow(row)) : rows,
            });
        }
        case "get": {
          return (...params: unknown[]) =>
            observe(settings, metadata, params, () => target.get(...params), {
              rowCount: (row) => (row === undefined ? 0 : 1),
              wrap: (row, wrapRow) => (mode === "object" ? wrapRow(row) : row),
            });
        }
        case "run": {
          return (...params: unknown[]) =>
            observe(settings, metadata, params, () => target.run(...params), {});
        }
        case "iterate": {
          return (...params: unknown[]) => iterate(settings, metadata, target, params);
        }
        case "raw":
        case "pluck":
        case "expand": {
          return (enabled?: boolean) => {
            if (enabled === undefined) {
              target[property]();
            } else {
              target[property](enabled);
            }
            toggle(property, enabled);
            return proxy;
          };
        }
        default: {
          const value: unknown = Reflect.get(target, property, target);
          if (typeof value !== "function") return value;
          return (...args: unknown[]) => {
            const result: unknown = Reflect.apply(value, target, args);
            return result === target ? proxy : result;
          };
        }
      }
    },
  });
  return proxy;
}

// ============================================================
// Execution
// ============================================================

type Observation<T> = Readonly<{
  rowCount?: (result: T) => number;
  wrap?: (result: T, wrapRow: (row: unknown) => unknown) => T;
}>;

function observe<T>(
  settings: Settings,
  metadata: StatementMetadata,
  params: readonly unknown[],
  run: () => T,
  observation: Observation<T>,
): T {
  const contextId = settings.getContextId();
  if (contextId === undefined) return run();

  const { rowCount, wrap } = observation;
  const { result, event } = settings.lens.capture(contextId, metadata.source, run, {
    params,
    ...(metadata.shape !== undefined && { shape: metadata.shape }),
    ...(metadata.columns !== undefined && { columns: metadata.columns }),
    ...(rowCount !== undefined && {
      describe: (value: T) => ({ rowCount: rowCount(value) }),
    }),
  });

  if (!event || !wrap) return result;
  return wrap(result, (row) => {
    if (typeof row !== "object" || row === null) return row;
    return settings.lens.wrapRecord(contextId, event.groupId, row, {
      ...(metadata.shape !== undefined && { shape: metadata.shape }),
      ...rowKey(row, settings.keyColumn),
    });
  });
}

/**
 * Iteration is one round-trip that lasts until the iterator finishes or is
 * returned early. Rows are handed out unwrapped: the group only owns
 * records once its query has completed.
 */
function iterate(
  settings: Settings,
  metadata: StatementMetadata,
  statement: Database.Statement<unknown[]>,
  params: readonly unknown[],
): IterableIterator<unknown> {
  const contextId = settings.getContextId();
  if (contextId === undefined) return statement.iterate(...params);

  const lens = settings.lens;
  const token = lens.onQueryStart(contextId, metadata.source, {
    params,
    ...(metadata.shape !== undefined && { shape: metadata.shape }),
    ...(metadata.columns !== undefined && { columns: metadata.columns }),
  });

  let rows: IterableIterator<unknown>;
  try {
    rows = statement.iterate(...params);
  } catch (error) {
    lens.onQueryEnd(token, { failed: true });
    throw error;
  }

  function* observed(): Generator<unknown, void, undefined> {
    let rowCount = 0;
    let failed = false;
    try {
      for (const row of rows) {
        rowCount++;
        yield row;
      }
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      lens.onQueryEnd(token, failed ? { failed } : { rowCount });
    }
  }
  return observed();
}

// ============================================================
// Helpers
// ============================================================

function describeStatement(
  statement: Database.Statement<unknown[]>,
  settings: Settings,
): StatementMetadata {
  if (!statement.reader) {
    return { source: statement.source, columns: [], shape: undefined };
  }

  let definitions: ColumnDefinition[];
  try {
    definitions = statement.columns();
  } catch {
    // Statement metadata unavailable; fetched columns stay unknown.
    return { source: statement.source, columns: undefined, shape: undefined };
  }
  return {
    source: statement.source,
    columns: definitions.map((definition) => definition.name),
    shape: settings.shapeOf(statement.source, definitions),
  };
}

/**
 * Source table shared by every output column, if there is one.
 */
export function sourceTableOf(
  _source: string,
  columns: readonly ColumnDefinition[],
): string | undefined {
  const tables = new Set(columns.map((column) => column.table));
  if (tables.size !== 1) return undefined;
  const [table] = tables;
  return table ?? undefined;
}

function rowKey(
  row: object,
  keyColumn: string,
): { key?: string | number | bigint } {
  const key: unknown = Reflect.get(row, keyColumn);
  if (
    typeof key === "string" ||
    typeof key === "number" ||
    typeof key === "bigint"
  ) {
    return { key };
  }
  return {};
}

function isDatabaseLike(value: unknown): value is Database.Database {
  return (
    typeof value === "object" &&
    value !== null &&
    "prepare" in value &&
    typeof value.prepare === "function" &&
    "exec" in value &&
    typeof value.exec === "function"
  );
}
