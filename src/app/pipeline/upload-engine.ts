/**
 * Upload resume.
 * Purpose: re-run only the upload step for an existing candidate tag from the artifacts on disk.
 * Assumptions: the candidate was tagged and packaged by an earlier prerelease run; assets already on
 * the release with the same name and size are skipped.
 * Usage: await runUpload(context, "v1.3.0-rc.1").
 */

import path from "node:path";

import { resolveArtifactRoot, runLogPath } from "../../core/config-discovery.js";
import { ConfigError, ResolutionError, ValidationError } from "../../core/errors.js";
import { logEvent } from "../../core/logger.js";
import { discoverWorkspace } from "../../discovery/workspace.js";
import { candidateArtifactDir } from "../../release/archive.js";
import { ensurePrerelease, isCandidateTag } from "../../release/candidate.js";
import { CHECKSUM_EXTENSION, writeChecksumFile } from "../../release/checksum.js";
import { uploadRetryPolicy } from "../../release/retry.js";
import { listArtifactFiles, uploadAssets, type UploadReport } from "../../release/upload.js";

import type { RunContext } from "./run-context.js";

export type UploadRunReport = {
  tag: string;
  artifactDir: string;
  files: string[];
  upload: UploadReport;
  logPath: string;
};

const ARCHIVE_SUFFIXES = [".tar.gz", ".zip"];

export async function runUpload(context: RunContext, tag: string): Promise<UploadRunReport> {
  const { config, options, ports } = context;

  if (!isCandidateTag(tag)) {
    throw new ValidationError(`${tag} is not a release-candidate tag (expected v<major>.<minor>.<patch>-rc.<n>)`);
  }
  if (options.localOnly || options.token === null) {
    throw new ConfigError("Uploading needs a GitHub token and cannot run with --local-assets.");
  }

  const release = await discoverWorkspace({ cwd: context.cwd, config, vcs: ports.vcs, allowDirty: true });
  if (!(await ports.vcs.tagExists(release.repoRoot, tag))) {
    throw new ResolutionError(`Tag ${tag} does not exist in ${release.repoRoot}`);
  }

  const artifactRoot = resolveArtifactRoot(release.repoRoot, options.artifactDir ?? config.artifact_dir);
  const artifactDir = candidateArtifactDir(artifactRoot, tag);
  const files = await completeChecksums(await listArtifactFiles(artifactDir));
  if (!files.some(isArchive)) {
    throw new ValidationError(`No archives for ${tag} in ${artifactDir}`);
  }

  const logPath = runLogPath(artifactRoot, context.runId);
  const logger = ports.logSink.createRunLogger(logPath, context.runId);
  logEvent(logger, "upload.resume", { tag, files: files.length });

  const host = ports.releaseHosts.create({ owner: release.owner, repo: release.repo, token: options.token });
  const releaseInfo = await ensurePrerelease(host, tag);
  const upload = await uploadAssets({
    host,
    release: releaseInfo,
    files,
    policy: uploadRetryPolicy(config.upload),
    logger,
    sleep: ports.sleep,
  });

  return { tag, artifactDir, files, upload, logPath };
}

// A run interrupted between packaging and checksumming leaves archives without sidecars.
async function completeChecksums(files: readonly string[]): Promise<string[]> {
  const present = new Set(files);
  const complete = [...files];

  for (const file of files) {
    if (!isArchive(file) || present.has(`${file}${CHECKSUM_EXTENSION}`)) continue;
    complete.push(await writeChecksumFile(file));
  }
  return complete.sort();
}

function isArchive(file: string): boolean {
  const name = path.basename(file);
  return ARCHIVE_SUFFIXES.some((suffix) => name.endsWith(suffix));
}
