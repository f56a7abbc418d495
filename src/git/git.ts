// Git command helpers.
// Purpose: run git as a child process for history reads, tree reads, tagging and committing.
// Assumes git is on PATH and repoPath is a local checkout.

import { execa } from "execa";

import { GitError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitResult = {
  stdout: string;
  stderr: string;
};

export type CommitRecord = {
  sha: string;
  parents: string[];
  subject: string;
  message: string;
};

export type TreeEntry = {
  mode: string;
  type: "blob" | "tree" | "commit";
  oid: string;
  path: string;
};

const RECORD_SEPARATOR = "\x1e";
const FIELD_SEPARATOR = "\x1f";

// =============================================================================
// RUNNER
// =============================================================================

export async function git(repoPath: string, args: string[]): Promise<GitResult> {
  try {
    const res = await execa("git", args, { cwd: repoPath, stdio: "pipe" });
    return { stdout: res.stdout, stderr: res.stderr };
  } catch (err) {
    throw new GitError(`git ${args.join(" ")} failed: ${describeGitFailure(err)}`, err);
  }
}

async function gitSucceeds(repoPath: string, args: string[]): Promise<boolean> {
  const res = await execa("git", args, { cwd: repoPath, stdio: "pipe", reject: false });
  return res.exitCode === 0;
}

function describeGitFailure(err: unknown): string {
  if (err && typeof err === "object" && "stderr" in err && typeof err.stderr === "string") {
    const stderr = err.stderr.trim();
    if (stderr.length > 0) return stderr;
  }
  return err instanceof Error ? err.message : String(err);
}

// =============================================================================
// REFS
// =============================================================================

export async function headSha(repoPath: string): Promise<string> {
  const res = await git(repoPath, ["rev-parse", "HEAD"]);
  return res.stdout.trim();
}

export async function currentBranch(repoPath: string): Promise<string> {
  const res = await git(repoPath, ["rev-parse", "--abbrev-ref", "HEAD"]);
  const branch = res.stdout.trim();
  if (branch === "HEAD") {
    throw new GitError("HEAD is detached; check out the release branch first.");
  }
  return branch;
}

export async function resolveCommit(repoPath: string, ref: string): Promise<string | null> {
  const res = await execa("git", ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`], {
    cwd: repoPath,
    stdio: "pipe",
    reject: false,
  });
  if (res.exitCode !== 0) return null;
  const sha = res.stdout.trim();
  return sha.length > 0 ? sha : null;
}

export async function listTags(repoPath: string): Promise<string[]> {
  const res = await git(repoPath, ["tag", "--list"]);
  return splitLines(res.stdout);
}

export async function tagsAt(repoPath: string, sha: string): Promise<string[]> {
  const res = await git(repoPath, ["tag", "--points-at", sha]);
  return splitLines(res.stdout);
}

export function tagExists(repoPath: string, tag: string): Promise<boolean> {
  return gitSucceeds(repoPath, ["rev-parse", "--verify", "--quiet", `refs/tags/${tag}`]);
}

export async function createAnnotatedTag(
  repoPath: string,
  tag: string,
  message: string,
  target = "HEAD",
): Promise<void> {
  await git(repoPath, ["tag", "-a", tag, "-m", message, target]);
}

export async function push(repoPath: string, remote: string, refspec: string): Promise<void> {
  await git(repoPath, ["push", remote, refspec]);
}

export async function remoteUrl(repoPath: string, remote: string): Promise<string | null> {
  const res = await execa("git", ["remote", "get-url", remote], {
    cwd: repoPath,
    stdio: "pipe",
    reject: false,
  });
  if (res.exitCode !== 0) return null;
  const url = res.stdout.trim();
  return url.length > 0 ? url : null;
}

// =============================================================================
// WORKING TREE
// =============================================================================

export async function listTrackedFiles(repoPath: string): Promise<string[]> {
  const res = await git(repoPath, ["ls-files", "-z"]);
  return res.stdout.split("\0").filter((entry) => entry.length > 0);
}

// `exclude` holds repo-relative paths left out of the report (the artifact root, when it sits in the tree).
export async function statusPorcelain(repoPath: string, exclude: readonly string[] = []): Promise<string> {
  const args = ["status", "--porcelain"];
  if (exclude.length > 0) {
    // Untracked directories are listed file by file so the exclusion applies per path.
    args.push("--untracked-files=all", "--", ".", ...exclude.map((entry) => `:(exclude)${entry}`));
  }
  const res = await git(repoPath, args);
  return res.stdout;
}

// Commits exactly `paths` (repo-relative); anything else in the index or working tree stays out.
export async function commitPaths(
  repoPath: string,
  paths: readonly string[],
  message: string,
): Promise<string> {
  if (paths.length === 0) {
    throw new GitError("Nothing to commit: no paths given");
  }
  await git(repoPath, ["add", "--", ...paths]);
  await git(repoPath, ["commit", "-m", message, "--only", "--", ...paths]);
  return headSha(repoPath);
}

// =============================================================================
// HISTORY
// =============================================================================

export async function listCommits(
  repoPath: string,
  range: { baseSha: string | null },
): Promise<CommitRecord[]> {
  const args = [
    "log",
    "--topo-order",
    "--reverse",
    `--format=%H${FIELD_SEPARATOR}%P${FIELD_SEPARATOR}%B${RECORD_SEPARATOR}`,
    "HEAD",
  ];
  if (range.baseSha) {
    args.push(`^${range.baseSha}`);
  }

  const res = await git(repoPath, args);
  return parseCommitLog(res.stdout);
}

export function parseCommitLog(output: string): CommitRecord[] {
  const commits: CommitRecord[] = [];

  for (const rawRecord of output.split(RECORD_SEPARATOR)) {
    const record = rawRecord.replace(/^\n+/, "");
    if (record.trim().length === 0) continue;

    const [sha = "", parents = "", ...rest] = record.split(FIELD_SEPARATOR);
    const message = rest.join(FIELD_SEPARATOR).replace(/\s+$/, "");
    const subject = message.split("\n")[0]?.trim() ?? "";

    commits.push({
      sha: sha.trim(),
      parents: parents.trim().length > 0 ? parents.trim().split(/\s+/) : [],
      subject: subject.length > 0 ? subject : "<no subject>",
      message,
    });
  }

  return commits;
}

export async function changedPaths(repoPath: string, commit: CommitRecord): Promise<string[]> {
  const firstParent = commit.parents[0];
  const base = ["diff-tree", "-r", "--name-only", "--no-renames", "--no-commit-id", "-z"];
  const args = firstParent ? [...base, firstParent, commit.sha] : [...base, "--root", commit.sha];

  const res = await git(repoPath, args);
  return res.stdout.split("\0").filter((entry) => entry.length > 0);
}

export async function commitTime(repoPath: string, sha: string): Promise<Date> {
  const res = await git(repoPath, ["show", "-s", "--format=%ct", sha]);
  const seconds = Number.parseInt(res.stdout.trim(), 10);
  if (!Number.isFinite(seconds)) {
    throw new GitError(`Unexpected commit time for ${sha}: ${res.stdout.trim()}`);
  }
  return new Date(seconds * 1000);
}

// =============================================================================
// TREES
// =============================================================================

export async function listTree(
  repoPath: string,
  commitSha: string,
  subPath: string,
): Promise<TreeEntry[]> {
  const args = ["ls-tree", "-r", "-z", "--full-tree", commitSha];
  if (subPath.length > 0) {
    args.push("--", subPath);
  }
  const res = await git(repoPath, args);
  return parseTreeListing(res.stdout);
}

export function parseTreeListing(output: string): TreeEntry[] {
  const entries: TreeEntry[] = [];

  for (const line of output.split("\0")) {
    if (line.length === 0) continue;

    const tab = line.indexOf("\t");
    if (tab < 0) {
      throw new GitError(`Malformed ls-tree entry: ${line}`);
    }

    const [mode = "", type = "", oid = ""] = line.slice(0, tab).split(" ");
    if (type !== "blob" && type !== "tree" && type !== "commit") {
      throw new GitError(`Unexpected ls-tree object type "${type}" for ${line.slice(tab + 1)}`);
    }
    entries.push({ mode, type, oid, path: line.slice(tab + 1) });
  }

  return entries;
}

export type BlobContent = {
  oid: string;
  data: Buffer;
};

/**
 * Reads blobs through one `git cat-file --batch` process, yielding them in request order.
 * Only the blob being yielded is held in memory; stopping early ends the process.
 */
export async function* readBlobs(repoPath: string, oids: readonly string[]): AsyncGenerator<BlobContent> {
  if (oids.length === 0) return;

  const subprocess = execa("git", ["cat-file", "--batch"], {
    cwd: repoPath,
    input: oids.map((oid) => `${oid}\n`).join(""),
    stderr: "ignore",
    buffer: false,
    reject: false,
  });

  let finished = false;
  try {
    const reader = new BatchReader();
    let next = 0;
    for await (const chunk of subprocess.stdout) {
      const bytes: unknown = chunk;
      reader.push(Buffer.isBuffer(bytes) ? bytes : Buffer.from(String(bytes), "utf8"));
      for (let blob = reader.take(); blob; blob = reader.take()) {
        if (blob.oid !== oids[next]) {
          throw new GitError(`git cat-file returned ${blob.oid} where ${oids[next] ?? "nothing"} was expected`);
        }
        next += 1;
        yield blob;
      }
    }

    const result = await subprocess;
    finished = true;
    if (result.exitCode !== 0) {
      throw new GitError(`git cat-file --batch exited with code ${result.exitCode ?? "unknown"}`);
    }
    if (next !== oids.length) {
      throw new GitError(`git cat-file --batch returned ${next} of ${oids.length} objects`);
    }
  } finally {
    if (!finished) {
      subprocess.kill();
      await subprocess;
    }
  }
}

// Parses `<oid> <type> <size>\n<content>\n` records as stdout arrives.
class BatchReader {
  private pending = Buffer.alloc(0);

  push(chunk: Buffer): void {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
  }

  take(): BlobContent | null {
    const headerEnd = this.pending.indexOf(0x0a);
    if (headerEnd < 0) return null;

    const header = this.pending.subarray(0, headerEnd).toString("utf8");
    const [oid = "", type = "", size = ""] = header.split(" ");
    if (type === "missing") {
      throw new GitError(`git object ${oid} is missing`);
    }
    if (type !== "blob") {
      throw new GitError(`git object ${oid} is a ${type}, not a blob`);
    }

    const length = Number.parseInt(size, 10);
    const bodyStart = headerEnd + 1;
    if (this.pending.length < bodyStart + length + 1) return null;

    const data = Buffer.from(this.pending.subarray(bodyStart, bodyStart + length));
    this.pending = this.pending.subarray(bodyStart + length + 1);
    return { oid, data };
  }
}

function splitLines(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
