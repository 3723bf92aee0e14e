/**
 * V8 stack trace parsing.
 *
 * Turns the text of `Error.prototype.stack` into frames, innermost first.
 */

import { fileURLToPath } from "node:url";

export type StackFrame = Readonly<{
  file: string;
  line: number;
  column: number;
  functionName?: string;
}>;

export type StackProvider = (maxDepth: number) => string | undefined;

// "    at fn (/srv/app/x.ts:10:5)" or "    at /srv/app/x.ts:10:5"
const FRAME_PATTERN =
  /^\s*at (?:(?<fn>.+?) \()?(?<location>.+?):(?<line>\d+):(?<column>\d+)\)?$/;

/**
 * Captures the current stack with a temporary `Error.stackTraceLimit`.
 */
export const captureCurrentStack: StackProvider = (maxDepth) => {
  const previousLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = maxDepth;
  try {
    return new Error("origin").stack;
  } finally {
    Error.stackTraceLimit = previousLimit;
  }
};

/**
 * Normalizes a frame location to a filesystem path.
 * ESM frames carry `file://` URLs; everything else is returned as is.
 */
export function normalizeFrameLocation(location: string): string {
  if (!location.startsWith("file://")) {
    return location;
  }
  try {
    return fileURLToPath(location);
  } catch {
    return location;
  }
}

/**
 * Parses one stack line. Returns undefined for the message line and for
 * frames without a source location (native calls, eval, `<anonymous>`).
 */
export function parseStackLine(line: string): StackFrame | undefined {
  const match = FRAME_PATTERN.exec(line);
  const groups = match?.groups;
  if (!groups) return undefined;

  const location = groups.location;
  if (location === undefined || location.includes("<anonymous>")) {
    return undefined;
  }
  if (location.startsWith("eval at ")) {
    return undefined;
  }

  const lineNumber = Number(groups.line);
  const columnNumber = Number(groups.column);
  if (!Number.isFinite(lineNumber) || !Number.isFinite(columnNumber)) {
    return undefined;
  }

  const functionName = groups.fn?.replace(/^async /, "");
  return {
    file: normalizeFrameLocation(location),
    line: lineNumber,
    column: columnNumber,
    ...(functionName !== undefined && { functionName }),
  };
}

export function parseStack(stack: string): readonly StackFrame[] {
  const frames: StackFrame[] = [];
  for (const line of stack.split("\n")) {
    const frame = parseStackLine(line);
    if (frame) frames.push(frame);
  }
  return frames;
}
