import {
  createQueryLens,
  generateId,
  isQueryLensError,
  type QueryLens,
} from "querylens";

import { type CliCommand, parseCliOptions, USAGE } from "./cli";
import { formatReport, reportToJson } from "./format";
import { loadTarget, profileTarget } from "./profile";

export type CliIo = Readonly<{
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
}>;

export type RunOptions = Readonly<{
  /** Engine used for `profile`; a default one is created when absent */
  lens?: QueryLens;
  contextId?: string;
}>;

export const EXIT_OK = 0;
export const EXIT_DUPLICATES = 1;
export const EXIT_USAGE = 2;
export const EXIT_TARGET_FAILED = 3;

/**
 * Executes one command line and returns the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo,
  options: RunOptions = {},
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliOptions(argv);
  } catch (error) {
    if (isQueryLensError(error)) {
      io.stderr(error.toUserMessage());
      return EXIT_USAGE;
    }
    throw error;
  }

  switch (command.kind) {
    case "help": {
      io.stdout(USAGE);
      return EXIT_OK;
    }
    case "ping": {
      io.stdout("pong");
      return EXIT_OK;
    }
    case "profile": {
      const loaded = await loadTarget(command.target, io.cwd);
      if (!loaded.success) {
        io.stderr(loaded.error.toUserMessage());
        return EXIT_USAGE;
      }

      const lens = options.lens ?? createQueryLens();
      const contextId = options.contextId ?? `cli-${generateId()}`;
      const result = await profileTarget(lens, loaded.data, contextId);

      io.stdout(
        command.json ?
          reportToJson(result.report)
        : formatReport(result.report, { cwd: io.cwd }),
      );

      if (result.status === "rejected") {
        const reason =
          result.error instanceof Error ? result.error.message : String(result.error);
        io.stderr(`Target failed: ${reason}`);
        return EXIT_TARGET_FAILED;
      }
      if (command.failOnDuplicates && result.report.summary.duplicates.length > 0) {
        io.stderr(
          `${result.report.summary.duplicates.length} duplicate statement(s) found.`,
        );
        return EXIT_DUPLICATES;
      }
      return EXIT_OK;
    }
  }
}
