import { type ContextId, type Report } from "../core/types";
import { type QueryLens } from "../engine/query-lens";
import { generateId } from "../utils/id";
import { defaultLogger, type Logger } from "../utils/logger";

export type QueryTrackingOptions<Args extends unknown[]> = Readonly<{
  /** Receives the report of every call, whether the handler succeeded or not */
  onReport: (report: Report, args: Args) => void;
  /** Context id for a call; a fresh id per call by default */
  contextId?: (...args: Args) => ContextId;
  logger?: Logger;
}>;

/**
 * Wraps a handler so each call runs in its own unit of work.
 *
 * The handler's result and errors pass through unchanged. A failing
 * `onReport` is logged and does not affect the call.
 *
 * @example
 * ```typescript
 * const listUsers = withQueryTracking(lens, async (teamId: number) => {
 *   return db.prepare("SELECT * FROM users WHERE team_id = ?").all(teamId);
 * }, {
 *   onReport: (report) => {
 *     if (report.summary.duplicates.length > 0) {
 *       console.warn("Duplicate queries", report.summary.duplicates);
 *     }
 *   },
 * });
 * ```
 */
export function withQueryTracking<Args extends unknown[], R>(
  lens: QueryLens,
  handler: (...args: Args) => R | Promise<R>,
  options: QueryTrackingOptions<Args>,
): (...args: Args) => Promise<R> {
  const logger = options.logger ?? defaultLogger;

  return async (...args: Args): Promise<R> => {
    const contextId = options.contextId?.(...args) ?? generateId();
    const outcome = await lens.runUnitOfWork(contextId, () => handler(...args));

    try {
      options.onReport(outcome.report, args);
    } catch (error) {
      logger.warn(`[QueryLens] onReport failed for context "${contextId}".`, error);
    }

    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
    return outcome.value;
  };
}
