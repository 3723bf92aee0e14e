import { isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";

import {
  type ContextId,
  err,
  ok,
  type QueryLens,
  type Report,
  type Result,
} from "querylens";

import { CliError } from "./errors";

// ============================================================
// Types
// ============================================================

export type ProfileContext = Readonly<{
  lens: QueryLens;
  contextId: ContextId;
}>;

export type ProfileTarget = (context: ProfileContext) => unknown;

export type TargetSpec = Readonly<{
  modulePath: string;
  exportName: string;
}>;

export type ProfileResult =
  | Readonly<{ status: "fulfilled"; report: Report }>
  | Readonly<{ status: "rejected"; report: Report; error: unknown }>;

// ============================================================
// Target Resolution
// ============================================================

/**
 * Splits `path/to/module.ts:exportName`. The export defaults to `default`.
 */
export function parseTargetSpec(spec: string): Result<TargetSpec, CliError> {
  const separator = spec.lastIndexOf(":");
  // A single-letter prefix is a Windows drive, not a module.
  const hasExport = separator > 1;
  const modulePath = hasExport ? spec.slice(0, separator) : spec;
  const exportName = hasExport ? spec.slice(separator + 1) : "default";

  if (modulePath.trim() === "" || exportName.trim() === "") {
    return err(
      new CliError(`Invalid profile target "${spec}".`, { spec }, {
        suggestion: "Use <module>[:<export>], e.g. ./src/jobs/report.ts:run",
      }),
    );
  }
  return ok({ modulePath, exportName });
}

function isProfileTarget(value: unknown): value is ProfileTarget {
  return typeof value === "function";
}

/**
 * Imports the module named by `spec` and returns the exported function.
 */
export async function loadTarget(
  spec: string,
  cwd: string,
): Promise<Result<ProfileTarget, CliError>> {
  const parsed = parseTargetSpec(spec);
  if (!parsed.success) return parsed;

  const { modulePath, exportName } = parsed.data;
  const absolutePath =
    isAbsolute(modulePath) ? modulePath : resolve(cwd, modulePath);

  let loaded: unknown;
  try {
    loaded = await import(pathToFileURL(absolutePath).href);
  } catch (error) {
    return err(
      new CliError(`Cannot import "${modulePath}".`, { path: absolutePath }, {
        cause: error,
        suggestion: "Check the module path; it is resolved from the current directory.",
      }),
    );
  }

  const value: unknown =
    typeof loaded === "object" && loaded !== null ?
      Reflect.get(loaded, exportName)
    : undefined;

  if (value === undefined) {
    return err(
      new CliError(`"${modulePath}" has no export named "${exportName}".`, {
        path: absolutePath,
        exportName,
      }),
    );
  }
  if (!isProfileTarget(value)) {
    return err(
      new CliError(`Export "${exportName}" of "${modulePath}" is not a function.`, {
        path: absolutePath,
        exportName,
        type: typeof value,
      }),
    );
  }
  return ok(value);
}

// ============================================================
// Profiling
// ============================================================

/**
 * Runs `target` in its own unit of work. Errors it throws are returned
 * with the report, not rethrown.
 */
export async function profileTarget(
  lens: QueryLens,
  target: ProfileTarget,
  contextId: ContextId,
): Promise<ProfileResult> {
  const outcome = await lens.runUnitOfWork(contextId, () =>
    target({ lens, contextId }),
  );
  if (outcome.status === "rejected") {
    return { status: "rejected", report: outcome.report, error: outcome.reason };
  }
  return { status: "fulfilled", report: outcome.report };
}
