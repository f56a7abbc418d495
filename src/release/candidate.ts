/**
 * Release-candidate tagging.
 * Purpose: pick the next rc number, refuse to cut a candidate twice, tag, push and make sure the host
 * has a prerelease for the tag.
 * Assumptions: tag listing is local; the guard is check-then-act and does not protect against a
 * concurrent run on another checkout.
 * Usage: prepareCandidate(...) before mutating the tree, cutCandidate(...) after the release commit.
 */

import type { Vcs } from "../app/pipeline/vcs/vcs.js";
import { IdempotencyError, ReleaseHostError } from "../core/errors.js";
import { logEvent, type EventLogger } from "../core/logger.js";
import { escapeRegExp } from "../core/utils.js";

import type { ReleaseHost, ReleaseInfo } from "./host.js";

// =============================================================================
// TYPES
// =============================================================================

export type CandidateTag = {
  tag: string;
  number: number;
  baseVersion: string;
};

export type CutCandidateInput = {
  vcs: Vcs;
  repoRoot: string;
  candidate: CandidateTag;
  toolName: string;
  /** Null keeps the tag local: no push and no release-host calls. */
  publish: { remote: string; host: ReleaseHost } | null;
  logger?: EventLogger;
};

const ANY_CANDIDATE = /^v\d+\.\d+\.\d+-rc\.\d+$/;

// =============================================================================
// NUMBERING
// =============================================================================

export function candidateTagName(baseVersion: string, candidateNumber: number): string {
  return `v${baseVersion}-rc.${candidateNumber}`;
}

export function nextCandidateNumber(tags: readonly string[], baseVersion: string): number {
  const pattern = new RegExp(`^v${escapeRegExp(baseVersion)}-rc\\.(\\d+)$`);
  let highest = 0;
  for (const tag of tags) {
    const match = pattern.exec(tag);
    if (!match?.[1]) continue;
    highest = Math.max(highest, Number.parseInt(match[1], 10));
  }
  return highest + 1;
}

export function isCandidateTag(tag: string): boolean {
  return ANY_CANDIDATE.test(tag);
}

// =============================================================================
// GUARD
// =============================================================================

export async function prepareCandidate(
  vcs: Vcs,
  repoRoot: string,
  baseVersion: string,
): Promise<CandidateTag> {
  const head = await vcs.headSha(repoRoot);
  const existingAtHead = (await vcs.tagsAt(repoRoot, head)).filter(isCandidateTag);
  if (existingAtHead.length > 0) {
    throw new IdempotencyError(
      `HEAD ${head.slice(0, 7)} is already release candidate ${existingAtHead.join(", ")}; commit new changes before cutting another.`,
    );
  }

  const number = nextCandidateNumber(await vcs.listTags(repoRoot), baseVersion);
  const candidate = { tag: candidateTagName(baseVersion, number), number, baseVersion };
  await assertTagAbsent(vcs, repoRoot, candidate.tag);
  return candidate;
}

export async function assertTagAbsent(vcs: Vcs, repoRoot: string, tag: string): Promise<void> {
  if (await vcs.tagExists(repoRoot, tag)) {
    throw new IdempotencyError(`Tag ${tag} already exists; refusing to re-create it.`);
  }
}

// =============================================================================
// TAG + PUBLISH
// =============================================================================

export async function cutCandidate(input: CutCandidateInput): Promise<ReleaseInfo | null> {
  const { vcs, repoRoot, candidate, logger } = input;

  await assertTagAbsent(vcs, repoRoot, candidate.tag);
  await vcs.createAnnotatedTag(repoRoot, candidate.tag, `${input.toolName} prerelease ${candidate.tag}`);
  if (logger) logEvent(logger, "rc.tag", { tag: candidate.tag, number: candidate.number });

  if (!input.publish) return null;

  const branch = await vcs.currentBranch(repoRoot);
  await vcs.push(repoRoot, input.publish.remote, branch);
  await vcs.push(repoRoot, input.publish.remote, `refs/tags/${candidate.tag}`);
  if (logger) logEvent(logger, "rc.push", { remote: input.publish.remote, branch, tag: candidate.tag });

  const release = await ensurePrerelease(input.publish.host, candidate.tag);
  if (logger) logEvent(logger, "rc.release", { tag: candidate.tag, release_id: release.id });
  return release;
}

export async function ensurePrerelease(host: ReleaseHost, tag: string): Promise<ReleaseInfo> {
  try {
    const existing = await host.getReleaseByTag(tag);
    return existing ?? (await host.createPrerelease(tag));
  } catch (err) {
    if (err instanceof ReleaseHostError) throw err;
    throw new ReleaseHostError(`Failed to ensure prerelease ${tag}: ${errorText(err)}`, err);
  }
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
