/**
 * Version planning.
 * Purpose: turn attributed changes into per-package semver bumps.
 * Assumptions: package versions are valid semver; pre-release and build metadata are dropped on bump.
 * Usage: computePlan(packages, changes) then assertPrimaryPlanned(plan, primary) before mutating anything.
 */

import { parse as parseSemver, type SemVer } from "semver";

import { PolicyError } from "../core/errors.js";

import type { BumpLevel, ChangeEntry, PackageInfo, PackagePlan, Plan } from "./types.js";

// =============================================================================
// BUMP POLICY
// =============================================================================

export function decideBump(currentVersion: string, changes: readonly ChangeEntry[]): BumpLevel {
  const parsed = parseVersion(currentVersion);
  const hasBreaking = changes.some((change) => change.breaking);

  // Pre-1.0: breaking changes move the minor component, everything else is a patch.
  if (parsed.major === 0) {
    return hasBreaking ? "minor" : "patch";
  }

  if (hasBreaking) return "major";
  if (changes.some((change) => change.kind === "feature")) return "minor";
  return "patch";
}

export function nextVersion(currentVersion: string, bump: BumpLevel): string {
  const { major, minor, patch } = parseVersion(currentVersion);
  switch (bump) {
    case "major":
      return `${major + 1}.0.0`;
    case "minor":
      return `${major}.${minor + 1}.0`;
    case "patch":
      return `${major}.${minor}.${patch + 1}`;
  }
}

function parseVersion(version: string): SemVer {
  const parsed = parseSemver(version);
  if (!parsed) {
    throw new PolicyError(`"${version}" is not a semantic version`);
  }
  return parsed;
}

// =============================================================================
// PLAN
// =============================================================================

export function computePlan(
  packages: readonly PackageInfo[],
  changes: ReadonlyMap<string, readonly ChangeEntry[]>,
): Plan {
  const entries: Array<[string, PackagePlan]> = [];

  for (const pkg of packages) {
    const pkgChanges = changes.get(pkg.name) ?? [];
    if (pkgChanges.length === 0) continue;

    const bump = decideBump(pkg.version, pkgChanges);
    entries.push([
      pkg.name,
      Object.freeze({
        previousVersion: pkg.version,
        newVersion: nextVersion(pkg.version, bump),
        bump,
        changes: Object.freeze([...pkgChanges]),
      }),
    ]);
  }

  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return new Map(entries);
}

export function assertPrimaryPlanned(plan: Plan, primaryPackage: string): PackagePlan {
  const primary = plan.get(primaryPackage);
  if (!primary) {
    throw new PolicyError(
      `Primary package ${primaryPackage} has no changes since the last release; nothing to release.`,
    );
  }
  return primary;
}

export function planSummary(plan: Plan): Array<{ name: string; from: string; to: string; bump: BumpLevel }> {
  return [...plan].map(([name, pkgPlan]) => ({
    name,
    from: pkgPlan.previousVersion,
    to: pkgPlan.newVersion,
    bump: pkgPlan.bump,
  }));
}
