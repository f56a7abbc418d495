import fs from "node:fs";
import path from "node:path";

const REPO_CONFIG_DIR = ".shipwright";
const REPO_CONFIG_FILE = "config.yaml";

export function findRepoRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(current, ".git"))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function repoConfigPath(repoRoot: string): string {
  return path.join(repoRoot, REPO_CONFIG_DIR, REPO_CONFIG_FILE);
}

export function resolveConfigPath(args: { repoRoot: string; explicitPath?: string }): string {
  if (args.explicitPath) {
    return path.resolve(args.explicitPath);
  }
  return repoConfigPath(args.repoRoot);
}

export function resolveArtifactRoot(repoRoot: string, artifactDir: string): string {
  return path.isAbsolute(artifactDir) ? artifactDir : path.join(repoRoot, artifactDir);
}

export function runLogPath(artifactRoot: string, runId: string): string {
  return path.join(artifactRoot, "logs", `${runId}.jsonl`);
}
