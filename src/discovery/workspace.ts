/**
 * Workspace discovery.
 * Purpose: build the release context (repo identity, packages, primary package, base tag) from a checkout.
 * Assumptions: Cargo-style manifests; workspace members are tracked by git; the GitHub repository is
 * inferred from the configured remote unless the config names it.
 * Usage: await discoverWorkspace({ cwd, config, vcs }).
 */

import path from "node:path";

import fse from "fs-extra";
import { minimatch } from "minimatch";
import { compare as compareSemver, valid as validSemver } from "semver";

import type { Vcs } from "../app/pipeline/vcs/vcs.js";
import { findRepoRoot, resolveArtifactRoot } from "../core/config-discovery.js";
import type { ReleaseConfig } from "../core/config.js";
import { ConfigError, GitError, ManifestError } from "../core/errors.js";
import { toPosixPath } from "../core/utils.js";
import { DEPENDENCY_SECTIONS, parseManifest, type TomlDocument } from "../versioning/manifest.js";
import type { PackageInfo } from "../versioning/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReleaseContext = {
  repoRoot: string;
  owner: string;
  repo: string;
  packages: PackageInfo[];
  primaryPackage: string;
  lastStableTag: string | null;
  /** Workspace root manifest; may or may not be a package manifest itself. */
  rootManifestPath: string;
};

export type DiscoverOptions = {
  cwd: string;
  config: ReleaseConfig;
  vcs: Vcs;
  allowDirty?: boolean;
  /** Artifact root (absolute or repo-relative); its contents never count as uncommitted changes. */
  artifactDir?: string;
};

export type RepositoryIdentity = {
  owner: string;
  repo: string;
};

type ManifestRecord = {
  manifestPath: string;
  doc: TomlDocument;
};

type Table = Record<string, unknown>;

const MANIFEST_FILE = "Cargo.toml";
const STABLE_TAG = /^v\d+\.\d+\.\d+$/;
const GITHUB_SSH = /^git@github\.com:([^/]+)\/([^/]+?)(?:\.git)?$/;
const GITHUB_HTTPS = /^https?:\/\/github\.com\/([^/]+)\/([^/]+?)(?:\.git)?\/?$/;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function discoverWorkspace(options: DiscoverOptions): Promise<ReleaseContext> {
  const repoRoot = findRepoRoot(options.cwd);
  if (!repoRoot) {
    throw new GitError(`${options.cwd} is not inside a git repository`);
  }

  if (!options.allowDirty) {
    const status = await options.vcs.statusPorcelain(repoRoot, artifactExclusions(repoRoot, options.artifactDir));
    if (status.trim().length > 0) {
      throw new GitError("Working tree is not clean; commit or stash changes before releasing.");
    }
  }

  const identity = await resolveRepository(options.vcs, repoRoot, options.config);
  const rootManifestPath = path.join(repoRoot, MANIFEST_FILE);
  const manifests = await loadWorkspaceManifests(options.vcs, repoRoot, rootManifestPath);
  const packages = collectPackages(manifests);
  if (packages.length === 0) {
    throw new ManifestError(`No packages found in ${rootManifestPath}`);
  }

  const rootPackage = manifests.find(
    (record) => record.manifestPath === rootManifestPath && packageTable(record.doc) !== null,
  );

  return {
    repoRoot,
    owner: identity.owner,
    repo: identity.repo,
    packages,
    primaryPackage: selectPrimaryPackage({
      packages,
      configured: options.config.primary_package,
      rootPackageName: rootPackage ? packageName(rootPackage) : null,
      repo: identity.repo,
    }),
    lastStableTag: findLastStableTag(await options.vcs.listTags(repoRoot)),
    rootManifestPath,
  };
}

function artifactExclusions(repoRoot: string, artifactDir: string | undefined): string[] {
  if (artifactDir === undefined) return [];
  const relative = path.relative(repoRoot, resolveArtifactRoot(repoRoot, artifactDir));
  if (relative.length === 0 || relative.startsWith("..") || path.isAbsolute(relative)) return [];
  return [toPosixPath(relative)];
}

// =============================================================================
// REPOSITORY IDENTITY
// =============================================================================

export function parseGitHubRemote(url: string): RepositoryIdentity | null {
  const match = GITHUB_SSH.exec(url) ?? GITHUB_HTTPS.exec(url);
  if (!match?.[1] || !match[2]) return null;
  return { owner: match[1], repo: match[2] };
}

async function resolveRepository(
  vcs: Vcs,
  repoRoot: string,
  config: ReleaseConfig,
): Promise<RepositoryIdentity> {
  if (config.repository) {
    const [owner = "", repo = ""] = config.repository.split("/");
    return { owner, repo };
  }

  const url = await vcs.remoteUrl(repoRoot, config.remote);
  if (!url) {
    throw new ConfigError(
      `Remote "${config.remote}" is not configured; set repository: owner/name in the config.`,
    );
  }

  const identity = parseGitHubRemote(url);
  if (!identity) {
    throw new ConfigError(`Unsupported remote URL (expected GitHub): ${url}`);
  }
  return identity;
}

// =============================================================================
// TAGS
// =============================================================================

export function findLastStableTag(tags: readonly string[]): string | null {
  const stable = tags.filter((tag) => STABLE_TAG.test(tag) && validSemver(tag.slice(1)) !== null);
  stable.sort((a, b) => compareSemver(b.slice(1), a.slice(1)));
  return stable[0] ?? null;
}

// =============================================================================
// MANIFESTS
// =============================================================================

async function loadWorkspaceManifests(
  vcs: Vcs,
  repoRoot: string,
  rootManifestPath: string,
): Promise<ManifestRecord[]> {
  if (!(await fse.pathExists(rootManifestPath))) {
    throw new ManifestError(`Missing workspace manifest ${rootManifestPath}`);
  }

  const root = await readManifestRecord(rootManifestPath);
  const records = [root];

  const workspace = tableAt(root.doc, "workspace");
  if (!workspace) return records;

  const members = stringList(workspace.members);
  const excluded = stringList(workspace.exclude);
  const candidates = (await vcs.listTrackedFiles(repoRoot))
    .filter((file) => path.posix.basename(file) === MANIFEST_FILE && file !== MANIFEST_FILE)
    .map((file) => path.posix.dirname(file))
    .sort();

  for (const dir of selectMembers(candidates, members, excluded)) {
    records.push(await readManifestRecord(path.join(repoRoot, ...dir.split("/"), MANIFEST_FILE)));
  }
  return records;
}

export function selectMembers(
  candidateDirs: readonly string[],
  members: readonly string[],
  excluded: readonly string[],
): string[] {
  const normalize = (pattern: string): string => toPosixPath(pattern).replace(/^\.\//, "").replace(/\/+$/, "");
  const memberPatterns = members.map(normalize);
  const excludePatterns = excluded.map(normalize);

  return candidateDirs.filter(
    (dir) =>
      memberPatterns.some((pattern) => minimatch(dir, pattern)) &&
      !excludePatterns.some((pattern) => dir === pattern || minimatch(dir, pattern)),
  );
}

async function readManifestRecord(manifestPath: string): Promise<ManifestRecord> {
  let source: string;
  try {
    source = await fse.readFile(manifestPath, "utf8");
  } catch (err) {
    throw new ManifestError(`Failed to read ${manifestPath}`, err);
  }
  return { manifestPath, doc: parseManifest(manifestPath, source) };
}

function collectPackages(records: readonly ManifestRecord[]): PackageInfo[] {
  const withPackage = records.filter((record) => packageTable(record.doc) !== null);
  const names = new Set(withPackage.map(packageName));
  const dependents = new Map<string, number>();

  for (const record of withPackage) {
    for (const dependency of dependencyNames(record.doc)) {
      if (names.has(dependency) && dependency !== packageName(record)) {
        dependents.set(dependency, (dependents.get(dependency) ?? 0) + 1);
      }
    }
  }

  const seen = new Set<string>();
  const packages: PackageInfo[] = [];
  for (const record of withPackage) {
    const name = packageName(record);
    if (seen.has(name)) {
      throw new ManifestError(`Package ${name} is declared twice (again in ${record.manifestPath})`);
    }
    seen.add(name);

    packages.push({
      name,
      version: packageVersion(record),
      manifestPath: record.manifestPath,
      packageRoot: path.dirname(record.manifestPath),
      internalDependents: dependents.get(name) ?? 0,
    });
  }
  return packages;
}

// One name per dependency entry across every dependency section, honouring `package = "..."` renames.
export function dependencyNames(doc: TomlDocument): string[] {
  const tables: Table[] = [];
  const collect = (owner: Table | null): void => {
    if (!owner) return;
    for (const section of DEPENDENCY_SECTIONS) {
      const table = tableAt(owner, section);
      if (table) tables.push(table);
    }
  };

  collect(doc);
  const targets = tableAt(doc, "target");
  if (targets) {
    for (const key of Object.keys(targets)) collect(tableAt(targets, key));
  }

  const names: string[] = [];
  for (const table of tables) {
    for (const [key, spec] of Object.entries(table)) {
      const renamed = isTable(spec) && typeof spec.package === "string" ? spec.package : null;
      names.push(renamed ?? key);
    }
  }
  return names;
}

function packageTable(doc: TomlDocument): Table | null {
  return tableAt(doc, "package");
}

function packageName(record: ManifestRecord): string {
  const name = packageTable(record.doc)?.name;
  if (typeof name !== "string" || name.length === 0) {
    throw new ManifestError(`${record.manifestPath} has no [package].name`);
  }
  return name;
}

function packageVersion(record: ManifestRecord): string {
  const version = packageTable(record.doc)?.version;
  if (typeof version !== "string") {
    throw new ManifestError(`${record.manifestPath} must declare a literal [package].version`);
  }
  if (validSemver(version) === null) {
    throw new ManifestError(`${record.manifestPath} has a non-semver version "${version}"`);
  }
  return version;
}

// =============================================================================
// PRIMARY PACKAGE
// =============================================================================

export function selectPrimaryPackage(args: {
  packages: readonly PackageInfo[];
  configured?: string;
  rootPackageName: string | null;
  repo: string;
}): string {
  const names = new Set(args.packages.map((pkg) => pkg.name));

  if (args.configured) {
    if (!names.has(args.configured)) {
      throw new ConfigError(`primary_package ${args.configured} is not a workspace package`);
    }
    return args.configured;
  }

  if (args.rootPackageName && names.has(args.rootPackageName)) return args.rootPackageName;
  if (names.has(args.repo)) return args.repo;

  const ranked = [...args.packages].sort(
    (a, b) => b.internalDependents - a.internalDependents || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0),
  );
  const top = ranked[0];
  if (!top) {
    throw new ConfigError("Cannot choose a primary package in an empty workspace");
  }
  return top.name;
}

// =============================================================================
// HELPERS
// =============================================================================

function tableAt(owner: Table, key: string): Table | null {
  const value = owner[key];
  return isTable(value) ? value : null;
}

function isTable(value: unknown): value is Table {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}
