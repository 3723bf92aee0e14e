/**
 * Internal logging.
 *
 * The engine never throws from its hooks; what goes wrong there is reported
 * through a Logger. The default only writes outside production.
 */

export type Logger = Readonly<{
  warn: (message: string, details?: unknown) => void;
}>;

function getNodeEnv(): string | undefined {
  if (typeof process === "undefined") {
    return undefined;
  }
  return process.env.NODE_ENV;
}

function isDevelopmentEnvironment(): boolean {
  return getNodeEnv() !== "production";
}

export function warnInDevelopment(message: string, details?: unknown): void {
  if (!isDevelopmentEnvironment()) {
    return;
  }
  if (details !== undefined) {
    console.warn(message, details);
    return;
  }
  console.warn(message);
}

export const defaultLogger: Logger = {
  warn: warnInDevelopment,
};
