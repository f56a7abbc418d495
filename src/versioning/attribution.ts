/**
 * Commit attribution.
 * Purpose: walk history since the base tag and assign each classified commit to the packages it touches.
 * Assumptions: package roots are inside the repo root; paths from git are repo-relative with "/" separators.
 * Usage: collectChanges(vcs, { repoRoot, packages, baseTag }).
 */

import path from "node:path";

import type { Vcs } from "../app/pipeline/vcs/vcs.js";
import { AttributionError, ResolutionError } from "../core/errors.js";
import { toPosixPath } from "../core/utils.js";

import { classifyCommit } from "./commit-kind.js";
import type { ChangeEntry, PackageInfo } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type AttributionInput = {
  repoRoot: string;
  packages: readonly PackageInfo[];
  baseTag: string | null;
};

export type OwnershipIndex = {
  ownerOf(relativePath: string): string | null;
};

type OwnedRoot = {
  name: string;
  root: string;
};

// =============================================================================
// OWNERSHIP
// =============================================================================

export function buildOwnershipIndex(
  repoRoot: string,
  packages: readonly PackageInfo[],
): OwnershipIndex {
  const roots: OwnedRoot[] = packages
    .map((pkg) => ({ name: pkg.name, root: relativeRoot(repoRoot, pkg.packageRoot) }))
    .sort((a, b) => b.root.length - a.root.length || a.name.localeCompare(b.name));

  return {
    ownerOf(relativePath: string): string | null {
      const normalized = toPosixPath(relativePath).replace(/^\.\//, "");
      for (const entry of roots) {
        if (ownsPath(entry.root, normalized)) return entry.name;
      }
      return null;
    },
  };
}

export function ownsPath(root: string, relativePath: string): boolean {
  if (root === "") return true;
  return relativePath === root || relativePath.startsWith(`${root}/`);
}

function relativeRoot(repoRoot: string, packageRoot: string): string {
  const relative = toPosixPath(path.relative(repoRoot, packageRoot));
  if (relative.startsWith("..")) {
    throw new AttributionError(`Package root ${packageRoot} is outside ${repoRoot}`);
  }
  return relative === "." ? "" : relative.replace(/\/+$/, "");
}

// =============================================================================
// PUBLIC API
// =============================================================================

export async function resolveBaseCommit(
  vcs: Vcs,
  repoRoot: string,
  baseTag: string | null,
): Promise<string | null> {
  if (baseTag === null) return null;

  const sha = await vcs.resolveCommit(repoRoot, `refs/tags/${baseTag}`);
  if (!sha) {
    throw new ResolutionError(`Base tag ${baseTag} does not resolve to a commit`);
  }
  return sha;
}

export async function collectChanges(
  vcs: Vcs,
  input: AttributionInput,
): Promise<Map<string, ChangeEntry[]>> {
  const baseSha = await resolveBaseCommit(vcs, input.repoRoot, input.baseTag);
  const owners = buildOwnershipIndex(input.repoRoot, input.packages);
  const changes = new Map<string, ChangeEntry[]>();

  try {
    const commits = await vcs.listCommits(input.repoRoot, { baseSha });

    for (const commit of commits) {
      const { kind, breaking } = classifyCommit(commit.subject, commit.message);
      const touched = new Set<string>();

      for (const changedPath of await vcs.changedPaths(input.repoRoot, commit)) {
        const owner = owners.ownerOf(changedPath);
        if (owner !== null) touched.add(owner);
      }

      for (const name of touched) {
        const entries = changes.get(name) ?? [];
        entries.push({ kind, subject: commit.subject, shortSha: commit.sha.slice(0, 7), breaking });
        changes.set(name, entries);
      }
    }
  } catch (err) {
    if (err instanceof AttributionError) throw err;
    throw new AttributionError(`Failed to attribute commits: ${errorText(err)}`, err);
  }

  return changes;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
