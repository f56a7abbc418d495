/**
 * VCS adapter interface for release runs.
 * Purpose: the minimal surface of history, tree, tag and commit operations the pipeline needs.
 * Assumptions: implementations operate on a local working copy; every call settles before the next stage starts.
 * Usage: inject into PipelinePorts and call from the versioning and release modules.
 */

import type { BlobContent, CommitRecord, TreeEntry } from "../../../git/git.js";

export type { BlobContent, CommitRecord, TreeEntry };

// =============================================================================
// TYPES
// =============================================================================

export interface Vcs {
  headSha(repoPath: string): Promise<string>;
  currentBranch(repoPath: string): Promise<string>;
  resolveCommit(repoPath: string, ref: string): Promise<string | null>;
  listCommits(repoPath: string, range: { baseSha: string | null }): Promise<CommitRecord[]>;
  changedPaths(repoPath: string, commit: CommitRecord): Promise<string[]>;
  commitTime(repoPath: string, sha: string): Promise<Date>;
  listTags(repoPath: string): Promise<string[]>;
  tagsAt(repoPath: string, sha: string): Promise<string[]>;
  tagExists(repoPath: string, tag: string): Promise<boolean>;
  /** Tags `target` (a commit sha), HEAD when omitted. */
  createAnnotatedTag(repoPath: string, tag: string, message: string, target?: string): Promise<void>;
  push(repoPath: string, remote: string, refspec: string): Promise<void>;
  listTrackedFiles(repoPath: string): Promise<string[]>;
  statusPorcelain(repoPath: string, exclude?: readonly string[]): Promise<string>;
  commitPaths(repoPath: string, paths: readonly string[], message: string): Promise<string>;
  listTree(repoPath: string, commitSha: string, subPath: string): Promise<TreeEntry[]>;
  /** Yields one blob at a time, in the order of `oids`. */
  readBlobs(repoPath: string, oids: readonly string[]): AsyncIterable<BlobContent>;
  remoteUrl(repoPath: string, remote: string): Promise<string | null>;
}
