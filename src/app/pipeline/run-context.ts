/**
 * RunContext + composition root for release runs.
 * Purpose: centralize run-scoped config, options and injected ports to avoid globals.
 * Assumptions: the token arrives here explicitly; nothing below the CLI reads the environment.
 * Usage: buildRunContext({ cwd, config, options }) and pass to runPrerelease or runUpload.
 */

import type { ReleaseConfig } from "../../core/config.js";
import { JsonlLogger } from "../../core/logger.js";
import { defaultRunId } from "../../core/utils.js";
import { GitHubReleaseHost } from "../../release/github-host.js";
import { delay } from "../../release/retry.js";

import type { PipelinePorts } from "./ports.js";
import { createGitVcs } from "./vcs/git-vcs.js";

// =============================================================================
// TYPES
// =============================================================================

export const TOOL_NAME = "shipwright";

export type RunOptions = {
  dryRun: boolean;
  /** Tag and package locally; never push or talk to the release host. */
  localOnly: boolean;
  /** Overrides config.artifact_dir; relative paths resolve against the repo root. */
  artifactDir?: string;
  token: string | null;
  allowDirty?: boolean;
};

export type RunContext = {
  cwd: string;
  runId: string;
  config: ReleaseConfig;
  options: RunOptions;
  ports: PipelinePorts;
};

export type BuildRunContextInput = {
  cwd: string;
  config: ReleaseConfig;
  options: RunOptions;
  runId?: string;
  ports?: Partial<PipelinePorts>;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(): PipelinePorts {
  return {
    vcs: createGitVcs(),
    releaseHosts: {
      create: (target) => new GitHubReleaseHost(target),
    },
    logSink: {
      createRunLogger: (logPath, runId) => new JsonlLogger(logPath, { runId }),
    },
    clock: {
      now: () => new Date(),
    },
    sleep: delay,
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildRunContext(input: BuildRunContextInput): RunContext {
  const ports: PipelinePorts = {
    ...createDefaultPorts(),
    ...input.ports,
  };

  return {
    cwd: input.cwd,
    runId: input.runId ?? defaultRunId(ports.clock.now()),
    config: input.config,
    options: input.options,
    ports,
  };
}
