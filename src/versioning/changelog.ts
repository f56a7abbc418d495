/**
 * Changelog writer.
 * Purpose: prepend one dated section per planned package to its CHANGELOG.md.
 * Assumptions: existing content is kept byte-for-byte below the new section.
 * Usage: writeChangelogs({ packages, plan, now, fileName, logger }).
 */

import path from "node:path";

import fse from "fs-extra";

import { ManifestError } from "../core/errors.js";
import { logEvent, type EventLogger } from "../core/logger.js";
import { utcDate } from "../core/utils.js";

import type { CommitKind } from "./commit-kind.js";
import type { ChangeEntry, PackageInfo, Plan } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

type ChangelogGroup = {
  title: string;
  kinds: readonly CommitKind[];
};

export const CHANGELOG_GROUPS: readonly ChangelogGroup[] = [
  { title: "Breaking Changes", kinds: ["breaking"] },
  { title: "Features", kinds: ["feature"] },
  { title: "Fixes", kinds: ["fix"] },
  { title: "Refactor/Perf", kinds: ["refactor", "performance"] },
  { title: "Others", kinds: ["docs", "build", "chore", "other"] },
];

export type WriteChangelogsInput = {
  packages: readonly PackageInfo[];
  plan: Plan;
  now: Date;
  fileName: string;
  logger?: EventLogger;
};

// =============================================================================
// RENDERING
// =============================================================================

export function renderChangelogSection(
  packageName: string,
  version: string,
  date: string,
  changes: readonly ChangeEntry[],
): string {
  let out = `## ${packageName} v${version} - ${date}\n\n`;

  for (const group of CHANGELOG_GROUPS) {
    const entries = changes.filter((change) => group.kinds.includes(change.kind));
    if (entries.length === 0) continue;

    out += `### ${group.title}\n`;
    for (const entry of entries) {
      out += `- ${entry.subject} (${entry.shortSha})\n`;
    }
    out += "\n";
  }

  return `${out}\n`;
}

// =============================================================================
// FILES
// =============================================================================

export async function writeChangelogs(input: WriteChangelogsInput): Promise<string[]> {
  const date = utcDate(input.now);
  const written: string[] = [];

  for (const pkg of input.packages) {
    const pkgPlan = input.plan.get(pkg.name);
    if (!pkgPlan) continue;

    const filePath = path.join(pkg.packageRoot, input.fileName);
    const previous = await readExisting(filePath);
    const section = renderChangelogSection(pkg.name, pkgPlan.newVersion, date, pkgPlan.changes);

    try {
      await fse.writeFile(filePath, section + previous, "utf8");
    } catch (err) {
      throw new ManifestError(`Failed to write ${filePath}: ${errorText(err)}`, err);
    }

    written.push(filePath);
    if (input.logger) {
      logEvent(input.logger, "apply.changelog", {
        package: pkg.name,
        version: pkgPlan.newVersion,
        file: filePath,
        entries: pkgPlan.changes.length,
      });
    }
  }

  return written;
}

async function readExisting(filePath: string): Promise<string> {
  if (!(await fse.pathExists(filePath))) return "";
  try {
    return await fse.readFile(filePath, "utf8");
  } catch (err) {
    throw new ManifestError(`Failed to read ${filePath}: ${errorText(err)}`, err);
  }
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
