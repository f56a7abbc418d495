/**
 * CLI composition.
 * Purpose: register the prerelease, upload, release and plan commands and their shared flags.
 * Assumptions: global flags are read with optsWithGlobals so they work before or after the command name.
 * Usage: await buildCli(deps).parseAsync(process.argv).
 */

import { Command } from "commander";

import { resolveCliContext, TOKEN_ENV, type CliDependencies, type GlobalOptions } from "./context.js";
import { planCommand } from "./plan.js";
import { prereleaseCommand } from "./prerelease.js";
import { releaseCommand } from "./release.js";
import { uploadCommand } from "./upload.js";

// =============================================================================
// PROGRAM
// =============================================================================

export function buildCli(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name("shipwright")
    .description("Cut release candidates for TOML-manifest workspaces")
    .version("0.1.0")
    .option("--config <path>", "Path to the release config (default: .shipwright/config.yaml)")
    .option("--artifact-dir <path>", "Artifact root (default: target/shipwright under the repo)")
    .option("--token <token>", `GitHub token (default: $${TOKEN_ENV})`)
    .option("--local-assets", "Tag and package locally; never push or upload", false)
    .option("--dry-run", "Report the plan and change nothing", false)
    .option("--allow-dirty", "Skip the clean working tree check")
    .option("--debug", "Print error causes and stack traces", false);

  program
    .command("prerelease")
    .description("Plan, commit, tag, package and upload the next release candidate")
    .action(async (_opts: unknown, command: Command) => {
      await prereleaseCommand(resolveCliContext(command.optsWithGlobals<GlobalOptions>(), deps));
    });

  program
    .command("upload")
    .description("Resume uploading the artifacts of an existing candidate tag")
    .argument("<tag>", "Candidate tag, e.g. v1.3.0-rc.1")
    .action(async (tag: string, _opts: unknown, command: Command) => {
      await uploadCommand(resolveCliContext(command.optsWithGlobals<GlobalOptions>(), deps), tag);
    });

  program
    .command("release")
    .description("Promote the newest release candidate to a stable release")
    .action(async (_opts: unknown, command: Command) => {
      await releaseCommand(resolveCliContext(command.optsWithGlobals<GlobalOptions>(), deps));
    });

  program
    .command("plan")
    .description("Show the version plan without touching the repository")
    .action(async (_opts: unknown, command: Command) => {
      await planCommand(resolveCliContext(command.optsWithGlobals<GlobalOptions>(), deps));
    });

  return program;
}
