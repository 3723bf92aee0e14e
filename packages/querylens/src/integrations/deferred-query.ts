/**
 * DeferredQuery - a lazily evaluated query description.
 *
 * Building one runs nothing. The database round-trip happens when the
 * query is forced with `execute()`, and the origin is resolved at that
 * call, so the event is attributed to the line that consumed the results
 * rather than the line that described them.
 */

import { type ContextId, type Origin } from "../core/types";
import { type QueryLens } from "../engine/query-lens";

export type DeferredQueryOptions<Row extends object> = Readonly<{
  contextId: ContextId;
  statement: string;
  params?: readonly unknown[];
  shape?: string;
  columns?: readonly string[];
  /** Field that identifies a row */
  keyField?: keyof Row & string;
  /** Performs the round-trip */
  run: () => Promise<readonly Row[]>;
}>;

/**
 * @example
 * ```typescript
 * const recent = new DeferredQuery(lens, {
 *   contextId,
 *   statement: "SELECT id, title FROM posts ORDER BY id DESC LIMIT 10",
 *   columns: ["id", "title"],
 *   shape: "posts",
 *   keyField: "id",
 *   run: () => fetchRecentPosts(),
 * });
 *
 * // Nothing has run yet.
 * const posts = await recent.execute(); // origin is this line
 * ```
 */
export class DeferredQuery<Row extends object> {
  readonly #lens: QueryLens;
  readonly #options: DeferredQueryOptions<Row>;
  #execution: Promise<Row[]> | undefined;

  constructor(lens: QueryLens, options: DeferredQueryOptions<Row>) {
    this.#lens = lens;
    this.#options = options;
  }

  /**
   * Whether the query has been forced.
   */
  get isForced(): boolean {
    return this.#execution !== undefined;
  }

  /**
   * Forces the query. Forcing twice reuses the first execution.
   */
  execute(): Promise<Row[]> {
    if (!this.#execution) {
      // Resolved now: once inside the async chain the forcing frame is gone.
      const origin = this.#lens.resolveOrigin();
      this.#execution = this.#run(origin);
    }
    return this.#execution;
  }

  async #run(origin: Origin): Promise<Row[]> {
    const { contextId, statement, params, shape, columns, keyField, run } =
      this.#options;
    const { result, event } = await this.#lens.captureAsync(
      contextId,
      statement,
      run,
      {
        origin,
        ...(params !== undefined && { params }),
        ...(shape !== undefined && { shape }),
        ...(columns !== undefined && { columns }),
        describe: (rows) => ({ rowCount: rows.length }),
      },
    );

    if (!event) return [...result];
    return result.map((row) =>
      this.#lens.wrapRecord(contextId, event.groupId, row, {
        ...(shape !== undefined && { shape }),
        ...keyOf(row, keyField),
      }),
    );
  }
}

function keyOf<Row extends object>(
  row: Row,
  keyField: (keyof Row & string) | undefined,
): { key?: string | number | bigint } {
  if (keyField === undefined) return {};
  const key: unknown = row[keyField];
  if (
    typeof key === "string" ||
    typeof key === "number" ||
    typeof key === "bigint"
  ) {
    return { key };
  }
  return {};
}
