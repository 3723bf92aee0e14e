import { CliError } from "./errors";

export type CliCommand =
  | Readonly<{ kind: "help" }>
  | Readonly<{ kind: "ping" }>
  | Readonly<{
      kind: "profile";
      target: string;
      json: boolean;
      failOnDuplicates: boolean;
    }>;

export const USAGE = [
  "Usage:",
  "  querylens profile <module>[:<export>] [--json] [--fail-on-duplicates]",
  "  querylens ping",
  "",
  "profile  Runs the exported function inside a unit of work and prints its report.",
  "         The function receives { lens, contextId }; <export> defaults to `default`.",
  "ping     Checks that the engine loads.",
].join("\n");

const PROFILE_FLAGS = new Set(["--json", "--fail-on-duplicates"]);

export function parseCliOptions(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  if (command === undefined || command === "--help" || command === "-h") {
    return { kind: "help" };
  }

  if (command === "ping") {
    if (rest.length > 0) {
      throw new CliError(`ping takes no arguments, got "${rest.join(" ")}".`);
    }
    return { kind: "ping" };
  }

  if (command === "profile") {
    const positional = rest.filter((argument) => !argument.startsWith("--"));
    const unknown = rest.filter(
      (argument) => argument.startsWith("--") && !PROFILE_FLAGS.has(argument),
    );
    if (unknown.length > 0) {
      throw new CliError(`Unknown option: ${unknown.join(", ")}.`, {
        options: unknown,
      });
    }
    const [target, ...extra] = positional;
    if (target === undefined || extra.length > 0) {
      throw new CliError("profile expects exactly one <module>[:<export>].", {
        arguments: positional,
      });
    }
    return {
      kind: "profile",
      target,
      json: rest.includes("--json"),
      failOnDuplicates: rest.includes("--fail-on-duplicates"),
    };
  }

  throw new CliError(`Unknown command: "${command}".`, { command });
}
