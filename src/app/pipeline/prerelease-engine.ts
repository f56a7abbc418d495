/**
 * Prerelease engine.
 * Purpose: run one release-candidate pass: discover, attribute, plan, apply, commit, tag, package,
 * validate, checksum and upload.
 * Assumptions: stages run strictly one after another; a failure stops the run where it happened and
 * nothing already committed or tagged is rolled back.
 * Usage: const report = await runPrerelease(buildRunContext({ cwd, config, options })).
 */

import { resolveArtifactRoot, runLogPath } from "../../core/config-discovery.js";
import { MemoryLogger, logEvent, type EventLogger } from "../../core/logger.js";
import { discoverWorkspace, type ReleaseContext } from "../../discovery/workspace.js";
import { candidateArtifactDir, packagePlannedPackages } from "../../release/archive.js";
import { cutCandidate, prepareCandidate, type CandidateTag } from "../../release/candidate.js";
import { uploadRetryPolicy } from "../../release/retry.js";
import { uploadAssets, writeChecksums, type UploadReport } from "../../release/upload.js";
import { validatePackaged } from "../../release/validate.js";
import { collectChanges } from "../../versioning/attribution.js";
import { writeChangelogs } from "../../versioning/changelog.js";
import { updateManifests } from "../../versioning/manifest.js";
import { assertPrimaryPlanned, computePlan, planSummary } from "../../versioning/planner.js";
import { commitRelease } from "../../versioning/release-commit.js";
import type { BumpLevel, Plan } from "../../versioning/types.js";

import { TOOL_NAME, type RunContext } from "./run-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunMode = "dry-run" | "local" | "publish";

export type SkipReason = "missing_token";

export type PlannedPackage = {
  name: string;
  from: string;
  to: string;
  bump: BumpLevel;
};

export type PrereleaseReport = {
  mode: RunMode;
  runId: string;
  repoRoot: string;
  baseTag: string | null;
  primaryPackage: string;
  packages: PlannedPackage[];
  commitSha: string | null;
  candidate: CandidateTag | null;
  artifactDir: string | null;
  files: string[];
  upload: UploadReport | null;
  skipped: SkipReason | null;
  logPath: string | null;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPrerelease(context: RunContext): Promise<PrereleaseReport> {
  const { config, options, ports } = context;
  const mode = runMode(context);

  const artifactDir = options.artifactDir ?? config.artifact_dir;
  const release = await discoverWorkspace({
    cwd: context.cwd,
    config,
    vcs: ports.vcs,
    allowDirty: options.allowDirty ?? mode === "dry-run",
    artifactDir,
  });

  const artifactRoot = resolveArtifactRoot(release.repoRoot, artifactDir);
  // Events stay in memory until the plan is accepted, so a refused run writes nothing.
  const buffer = new MemoryLogger();

  logEvent(buffer, "run.start", {
    mode,
    repo: `${release.owner}/${release.repo}`,
    primary_package: release.primaryPackage,
    base_tag: release.lastStableTag,
  });

  const plan = await planRelease(context, release, buffer);
  const primary = assertPrimaryPlanned(plan, release.primaryPackage);

  // A dry run leaves no file behind, its log included.
  const logPath = mode === "dry-run" ? null : runLogPath(artifactRoot, context.runId);
  const logger: EventLogger = logPath ? ports.logSink.createRunLogger(logPath, context.runId) : buffer;
  if (logger !== buffer) buffer.drainTo(logger);

  const report: PrereleaseReport = {
    mode,
    runId: context.runId,
    repoRoot: release.repoRoot,
    baseTag: release.lastStableTag,
    primaryPackage: release.primaryPackage,
    packages: planSummary(plan),
    commitSha: null,
    candidate: null,
    artifactDir: null,
    files: [],
    upload: null,
    skipped: null,
    logPath,
  };
  if (mode === "dry-run") return report;

  const tagPhase = options.localOnly || options.token !== null;
  const candidate = tagPhase ? await prepareCandidate(ports.vcs, release.repoRoot, primary.newVersion) : null;

  const manifestUpdates = await updateManifests({
    manifests: [
      ...release.packages.map((pkg) => ({ manifestPath: pkg.manifestPath, packageName: pkg.name })),
      { manifestPath: release.rootManifestPath, packageName: null },
    ],
    plan,
    logger,
  });
  const changelogs = await writeChangelogs({
    packages: release.packages,
    plan,
    now: ports.clock.now(),
    fileName: config.changelog_file,
    logger,
  });
  const commitSha = await commitRelease(
    ports.vcs,
    release.repoRoot,
    primary.newVersion,
    [...manifestUpdates.map((update) => update.manifestPath), ...changelogs],
    logger,
  );
  report.commitSha = commitSha;

  if (!candidate) {
    logEvent(logger, "rc.skip", { reason: "missing_token" });
    report.skipped = "missing_token";
    return report;
  }

  const host =
    !options.localOnly && options.token !== null
      ? ports.releaseHosts.create({ owner: release.owner, repo: release.repo, token: options.token })
      : null;

  const releaseInfo = await cutCandidate({
    vcs: ports.vcs,
    repoRoot: release.repoRoot,
    candidate,
    toolName: TOOL_NAME,
    publish: host ? { remote: config.remote, host } : null,
    logger,
  });
  report.candidate = candidate;

  const outDir = candidateArtifactDir(artifactRoot, candidate.tag);
  const packaged = await packagePlannedPackages({
    vcs: ports.vcs,
    repoRoot: release.repoRoot,
    commitSha,
    packages: release.packages,
    plan,
    naming: { prefix: config.artifact_prefix, repo: release.repo, primaryPackage: release.primaryPackage },
    candidateNumber: candidate.number,
    outDir,
    skipDirs: config.skip_dirs,
    logger,
  });
  validatePackaged(plan, packaged);
  report.artifactDir = outDir;
  report.files = await writeChecksums(packaged);

  if (host && releaseInfo) {
    report.upload = await uploadAssets({
      host,
      release: releaseInfo,
      files: report.files,
      policy: uploadRetryPolicy(config.upload),
      logger,
      sleep: ports.sleep,
    });
  }

  logEvent(logger, "run.complete", { tag: candidate.tag, files: report.files.length });
  return report;
}

export type PlanReport = {
  baseTag: string | null;
  primaryPackage: string;
  primaryPlanned: boolean;
  packages: PlannedPackage[];
};

/** Attribution and planning only; never mutates and tolerates a dirty tree. */
export async function runPlan(context: RunContext): Promise<PlanReport> {
  const release = await discoverWorkspace({
    cwd: context.cwd,
    config: context.config,
    vcs: context.ports.vcs,
    allowDirty: true,
  });
  const plan = await planRelease(context, release, new MemoryLogger());

  return {
    baseTag: release.lastStableTag,
    primaryPackage: release.primaryPackage,
    primaryPlanned: plan.has(release.primaryPackage),
    packages: planSummary(plan),
  };
}

export async function planRelease(
  context: RunContext,
  release: ReleaseContext,
  logger: EventLogger,
): Promise<Plan> {
  const changes = await collectChanges(context.ports.vcs, {
    repoRoot: release.repoRoot,
    packages: release.packages,
    baseTag: release.lastStableTag,
  });
  const plan = computePlan(release.packages, changes);
  logEvent(logger, "plan.computed", {
    base_tag: release.lastStableTag,
    packages: planSummary(plan),
  });
  return plan;
}

export function runMode(context: RunContext): RunMode {
  if (context.options.dryRun) return "dry-run";
  return context.options.localOnly ? "local" : "publish";
}
