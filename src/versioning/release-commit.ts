import path from "node:path";

import type { Vcs } from "../app/pipeline/vcs/vcs.js";
import { CommitError } from "../core/errors.js";
import { logEvent, type EventLogger } from "../core/logger.js";
import { toPosixPath } from "../core/utils.js";

export function releaseCommitMessage(primaryVersion: string): string {
  return `chore(release): prepare v${primaryVersion}`;
}

// Records the files the apply step wrote, and only those, as one commit on the current branch.
export async function commitRelease(
  vcs: Vcs,
  repoRoot: string,
  primaryVersion: string,
  files: readonly string[],
  logger?: EventLogger,
): Promise<string> {
  const message = releaseCommitMessage(primaryVersion);
  const paths = [...new Set(files.map((file) => repoRelative(repoRoot, file)))].sort();
  if (paths.length === 0) {
    throw new CommitError("No release changes to commit: no manifest or changelog was written.");
  }

  let sha: string;
  try {
    sha = await vcs.commitPaths(repoRoot, paths, message);
  } catch (err) {
    throw new CommitError(`Failed to commit release changes: ${errorText(err)}`, err);
  }

  if (logger) {
    logEvent(logger, "git.commit", { sha, message, paths });
  }
  return sha;
}

function repoRelative(repoRoot: string, file: string): string {
  const relative = path.isAbsolute(file) ? path.relative(repoRoot, file) : file;
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new CommitError(`Refusing to commit ${file}: it is outside ${repoRoot}`);
  }
  return toPosixPath(relative);
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
