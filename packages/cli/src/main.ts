import { runCli } from "./run";

async function main(argv: readonly string[]): Promise<void> {
  process.exitCode = await runCli(argv, {
    stdout: (text) => {
      console.log(text);
    },
    stderr: (text) => {
      console.error(text);
    },
    cwd: process.cwd(),
  });
}

await main(process.argv.slice(2));
