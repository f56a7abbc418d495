/**
 * Git-backed VCS adapter.
 * Purpose: map Vcs interface calls to the git CLI helpers.
 * Assumptions: git is available and repo paths are local.
 * Usage: createGitVcs() and inject into PipelinePorts.
 */

import {
  changedPaths,
  commitPaths,
  commitTime,
  createAnnotatedTag,
  currentBranch,
  headSha,
  listCommits,
  listTags,
  listTrackedFiles,
  listTree,
  push,
  readBlobs,
  remoteUrl,
  resolveCommit,
  statusPorcelain,
  tagExists,
  tagsAt,
} from "../../../git/git.js";

import type { Vcs } from "./vcs.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function createGitVcs(): Vcs {
  return {
    headSha,
    currentBranch,
    resolveCommit,
    listCommits,
    changedPaths,
    commitTime,
    listTags,
    tagsAt,
    tagExists,
    createAnnotatedTag,
    push,
    listTrackedFiles,
    statusPorcelain,
    commitPaths,
    listTree,
    readBlobs,
    remoteUrl,
  };
}
