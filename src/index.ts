import { CommanderError, type Command } from "commander";

import { buildCli } from "./cli/index.js";
import type { CliDependencies, GlobalOptions } from "./cli/context.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "./core/error-format.js";

export { buildCli };

/** Runs the CLI and resolves to the process exit code; errors are printed to stderr. */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const program = buildCli(deps);
  installExitOverride(program);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Commander has already printed usage, help or version output.
    if (err instanceof CommanderError) return err.exitCode;
    printError(err, debugEnabled(program));
    return 1;
  }
}

export async function main(argv: string[] = process.argv): Promise<void> {
  process.exitCode = await runCli(argv);
}

function installExitOverride(command: Command): void {
  command.exitOverride();
  for (const child of command.commands) installExitOverride(child);
}

function debugEnabled(program: Command): boolean {
  return program.opts<GlobalOptions>().debug ?? false;
}

function printError(err: unknown, debug: boolean): void {
  const format = createAnsiFormatter(resolveColorEnabled());
  const lines = formatErrorLines(err, { mode: debug ? "debug" : "short" });
  for (const line of renderErrorLines(lines, format)) {
    console.error(line);
  }
}
