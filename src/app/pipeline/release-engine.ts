/**
 * Release engine.
 * Purpose: promote the newest release candidate to a stable release: tag the candidate commit as
 * v<version>, push the tag, create the GitHub release and re-upload the candidate's assets to it.
 * Assumptions: the candidate was cut by an earlier prerelease run and its tag is present locally; the
 * working tree is never modified, only tags and the artifact root.
 * Usage: const report = await runRelease(buildRunContext({ cwd, config, options })).
 */

import path from "node:path";

import { resolveArtifactRoot, runLogPath } from "../../core/config-discovery.js";
import { ConfigError, PolicyError, ResolutionError } from "../../core/errors.js";
import { MemoryLogger, logEvent, type EventLogger } from "../../core/logger.js";
import { discoverWorkspace } from "../../discovery/workspace.js";
import { assertTagAbsent } from "../../release/candidate.js";
import {
  assertReleaseAbsent,
  downloadCandidateAssets,
  findLatestCandidate,
  tagStable,
} from "../../release/promote.js";
import { uploadRetryPolicy } from "../../release/retry.js";
import { uploadAssets, type UploadReport } from "../../release/upload.js";
import { planSummary } from "../../versioning/planner.js";

import { planRelease, type PlannedPackage } from "./prerelease-engine.js";
import { TOOL_NAME, type RunContext } from "./run-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReleaseRunReport = {
  dryRun: boolean;
  runId: string;
  repoRoot: string;
  primaryPackage: string;
  candidateTag: string;
  stableTag: string;
  commitSha: string;
  packages: PlannedPackage[];
  artifactDir: string | null;
  files: string[];
  upload: UploadReport | null;
  logPath: string | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runRelease(context: RunContext): Promise<ReleaseRunReport> {
  const { config, options, ports } = context;

  if (options.localOnly || options.token === null) {
    throw new ConfigError("Releasing needs a GitHub token and cannot run with --local-assets.");
  }

  const release = await discoverWorkspace({ cwd: context.cwd, config, vcs: ports.vcs, allowDirty: true });
  const buffer = new MemoryLogger();

  const plan = await planRelease(context, release, buffer);
  if (plan.size === 0) {
    throw new PolicyError(
      `No package has changed since ${release.lastStableTag ?? "the first commit"}; nothing to release.`,
    );
  }

  const host = ports.releaseHosts.create({ owner: release.owner, repo: release.repo, token: options.token });
  const candidate = findLatestCandidate(await host.listReleases());
  if (!candidate) {
    throw new ResolutionError(`No release-candidate release found for ${release.owner}/${release.repo}`);
  }

  const commitSha = await ports.vcs.resolveCommit(release.repoRoot, `refs/tags/${candidate.tag}`);
  if (!commitSha) {
    throw new ResolutionError(`Candidate tag ${candidate.tag} is not present locally; fetch tags first.`);
  }
  logEvent(buffer, "release.candidate", {
    candidate: candidate.tag,
    stable_tag: candidate.stableTag,
    commit: commitSha,
  });

  const report: ReleaseRunReport = {
    dryRun: options.dryRun,
    runId: context.runId,
    repoRoot: release.repoRoot,
    primaryPackage: release.primaryPackage,
    candidateTag: candidate.tag,
    stableTag: candidate.stableTag,
    commitSha,
    packages: planSummary(plan),
    artifactDir: null,
    files: [],
    upload: null,
    logPath: null,
  };
  if (options.dryRun) return report;

  await assertTagAbsent(ports.vcs, release.repoRoot, candidate.stableTag);
  await assertReleaseAbsent(host, candidate.stableTag);

  const artifactRoot = resolveArtifactRoot(release.repoRoot, options.artifactDir ?? config.artifact_dir);
  report.logPath = runLogPath(artifactRoot, context.runId);
  const logger: EventLogger = ports.logSink.createRunLogger(report.logPath, context.runId);
  buffer.drainTo(logger);

  // Assets are fetched and verified before anything is tagged or created.
  const outDir = path.join(artifactRoot, "release", candidate.stableTag);
  report.artifactDir = outDir;
  report.files = await downloadCandidateAssets(host, candidate.release, outDir, logger);

  await tagStable({
    vcs: ports.vcs,
    repoRoot: release.repoRoot,
    stableTag: candidate.stableTag,
    commitSha,
    remote: config.remote,
    toolName: TOOL_NAME,
    logger,
  });

  const stable = await host.createRelease(candidate.stableTag);
  logEvent(logger, "release.create", { tag: candidate.stableTag, release_id: stable.id });

  report.upload = await uploadAssets({
    host,
    release: stable,
    files: report.files,
    policy: uploadRetryPolicy(config.upload),
    logger,
    sleep: ports.sleep,
  });

  logEvent(logger, "release.complete", { tag: candidate.stableTag, files: report.files.length });
  return report;
}
