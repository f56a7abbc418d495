/**
 * CLI run context.
 * Purpose: turn global flags, the repo config file and the environment into a RunContext.
 * Assumptions: this is the only module that reads the release token from the environment.
 * Usage: const context = resolveCliContext(command.optsWithGlobals<GlobalOptions>(), deps).
 */

import type { PipelinePorts } from "../app/pipeline/ports.js";
import { buildRunContext, type RunContext } from "../app/pipeline/run-context.js";
import { findRepoRoot, resolveConfigPath } from "../core/config-discovery.js";
import { loadReleaseConfig } from "../core/config-loader.js";
import { GitError } from "../core/errors.js";

export const TOKEN_ENV = "SHIPWRIGHT_GITHUB_TOKEN";

export type GlobalOptions = {
  config?: string;
  artifactDir?: string;
  token?: string;
  localAssets?: boolean;
  dryRun?: boolean;
  allowDirty?: boolean;
  debug?: boolean;
};

export type CliDependencies = {
  cwd?: string;
  env?: Record<string, string | undefined>;
  ports?: Partial<PipelinePorts>;
  runId?: string;
};

export function resolveCliContext(opts: GlobalOptions, deps: CliDependencies = {}): RunContext {
  const cwd = deps.cwd ?? process.cwd();
  const repoRoot = findRepoRoot(cwd);
  if (!repoRoot) {
    throw new GitError(`${cwd} is not inside a git repository`);
  }

  const config = loadReleaseConfig(resolveConfigPath({ repoRoot, explicitPath: opts.config }));

  return buildRunContext({
    cwd,
    config,
    options: {
      dryRun: opts.dryRun ?? false,
      localOnly: opts.localAssets ?? false,
      artifactDir: opts.artifactDir,
      token: resolveToken(opts.token, deps.env ?? process.env),
      allowDirty: opts.allowDirty,
    },
    runId: deps.runId,
    ports: deps.ports,
  });
}

export function resolveToken(flag: string | undefined, env: Record<string, string | undefined>): string | null {
  const token = (flag ?? env[TOKEN_ENV] ?? "").trim();
  return token.length > 0 ? token : null;
}
