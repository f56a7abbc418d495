/**
 * Stable promotion.
 * Purpose: find the newest release candidate on the host, tag its commit as the stable release and
 * carry the candidate's verified assets over to it.
 * Assumptions: the candidate tag exists in the local clone; a stable tag or release is created once and
 * never overwritten.
 * Usage: const candidate = findLatestCandidate(await host.listReleases()); then tagStable(...) and
 * downloadCandidateAssets(...).
 */

import path from "node:path";

import fse from "fs-extra";

import type { Vcs } from "../app/pipeline/vcs/vcs.js";
import { IdempotencyError, ReleaseHostError, ValidationError } from "../core/errors.js";
import { logEvent, type EventLogger } from "../core/logger.js";

import { assertTagAbsent } from "./candidate.js";
import { CHECKSUM_EXTENSION, sha512File } from "./checksum.js";
import type { ListedRelease, ReleaseHost, ReleaseInfo } from "./host.js";

// =============================================================================
// TYPES
// =============================================================================

export type PromotionCandidate = {
  release: ListedRelease;
  tag: string;
  baseVersion: string;
  number: number;
  stableTag: string;
};

export type TagStableInput = {
  vcs: Vcs;
  repoRoot: string;
  stableTag: string;
  commitSha: string;
  remote: string;
  toolName: string;
  logger?: EventLogger;
};

const CANDIDATE_PARTS = /^v(\d+\.\d+\.\d+)-rc\.(\d+)$/;

// =============================================================================
// SELECTION
// =============================================================================

export function parseCandidateTag(tag: string): { baseVersion: string; number: number } | null {
  const match = CANDIDATE_PARTS.exec(tag);
  if (!match?.[1] || !match[2]) return null;
  return { baseVersion: match[1], number: Number.parseInt(match[2], 10) };
}

// First non-draft candidate in host order, which lists newest releases first.
export function findLatestCandidate(releases: readonly ListedRelease[]): PromotionCandidate | null {
  for (const release of releases) {
    if (release.draft) continue;
    const parts = parseCandidateTag(release.tagName);
    if (!parts) continue;
    return {
      release,
      tag: release.tagName,
      baseVersion: parts.baseVersion,
      number: parts.number,
      stableTag: `v${parts.baseVersion}`,
    };
  }
  return null;
}

// =============================================================================
// GUARDS
// =============================================================================

export async function assertReleaseAbsent(host: ReleaseHost, tag: string): Promise<void> {
  if (await host.getReleaseByTag(tag)) {
    throw new IdempotencyError(`A GitHub release already exists for ${tag}; refusing to re-create it.`);
  }
}

// =============================================================================
// TAG
// =============================================================================

export async function tagStable(input: TagStableInput): Promise<void> {
  const { vcs, repoRoot, stableTag, logger } = input;

  await assertTagAbsent(vcs, repoRoot, stableTag);
  await vcs.createAnnotatedTag(repoRoot, stableTag, `${input.toolName} release ${stableTag}`, input.commitSha);
  if (logger) logEvent(logger, "release.tag", { tag: stableTag, commit: input.commitSha });

  await vcs.push(repoRoot, input.remote, `refs/tags/${stableTag}`);
  if (logger) logEvent(logger, "release.push", { remote: input.remote, tag: stableTag });
}

// =============================================================================
// ASSETS
// =============================================================================

export async function downloadCandidateAssets(
  host: ReleaseHost,
  release: ReleaseInfo,
  outDir: string,
  logger?: EventLogger,
): Promise<string[]> {
  const assets = [...(await host.listAssets(release))].sort((a, b) => a.name.localeCompare(b.name));
  if (assets.length === 0) {
    throw new ValidationError(`Release ${release.tagName} has no assets to promote`);
  }

  await fse.ensureDir(outDir);
  const files: string[] = [];
  for (const asset of assets) {
    if (path.basename(asset.name) !== asset.name) {
      throw new ValidationError(`Refusing asset name with a path: ${asset.name}`);
    }

    const data = await host.downloadAsset(asset);
    if (data.length !== asset.size) {
      throw new ReleaseHostError(`Downloaded ${asset.name} is ${data.length} bytes; the release lists ${asset.size}`);
    }

    const filePath = path.join(outDir, asset.name);
    await fse.writeFile(filePath, data);
    files.push(filePath);
    if (logger) logEvent(logger, "release.download", { name: asset.name, size: data.length });
  }

  await verifyChecksums(files);
  return files;
}

// Every sidecar must match the archive beside it.
export async function verifyChecksums(files: readonly string[]): Promise<void> {
  const present = new Set(files);
  for (const file of files) {
    if (!file.endsWith(CHECKSUM_EXTENSION)) continue;

    const archive = file.slice(0, -CHECKSUM_EXTENSION.length);
    if (!present.has(archive)) {
      throw new ValidationError(`${path.basename(file)} has no archive beside it`);
    }
    const expected = (await fse.readFile(file, "utf8")).trim().split(/\s+/)[0] ?? "";
    if (expected !== (await sha512File(archive))) {
      throw new ValidationError(`Checksum mismatch for ${path.basename(archive)}`);
    }
  }
}
