/**
 * Pipeline ports.
 * Purpose: name every side-effecting dependency of a release run so tests can swap them out.
 * Assumptions: adapters are stateless apart from the logger they create.
 * Usage: createDefaultPorts() in production; pass Partial<PipelinePorts> overrides to buildRunContext.
 */

import type { EventLogger } from "../../core/logger.js";
import type { ReleaseHost } from "../../release/host.js";

import type { Vcs } from "./vcs/vcs.js";

export type ReleaseHostTarget = {
  owner: string;
  repo: string;
  token: string;
};

export type PipelinePorts = {
  vcs: Vcs;
  releaseHosts: {
    create: (target: ReleaseHostTarget) => ReleaseHost;
  };
  logSink: {
    createRunLogger: (logPath: string, runId: string) => EventLogger;
  };
  clock: {
    now: () => Date;
  };
  sleep: (durationMs: number) => Promise<void>;
};
