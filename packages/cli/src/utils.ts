import { relative, sep } from "node:path";

import { formatOrigin, type Origin } from "querylens";

export function formatMs(value: number | undefined): string {
  if (value === undefined) {
    return "n/a";
  }
  return `${value.toFixed(1)}ms`;
}

/**
 * Origin with its file shown relative to `cwd` when it lies below it.
 */
export function formatOriginFrom(origin: Origin, cwd: string | undefined): string {
  if (origin.kind === "unattributed" || cwd === undefined) {
    return formatOrigin(origin);
  }
  const path = relative(cwd, origin.file);
  if (path === "" || path.startsWith("..") || path.startsWith(sep)) {
    return formatOrigin(origin);
  }
  return `${path}:${origin.line}`;
}

export function sortedList(values: Iterable<string>): string {
  const list = [...values].toSorted();
  return list.length === 0 ? "-" : list.join(", ");
}
