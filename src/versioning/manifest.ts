/**
 * Manifest mutation.
 * Purpose: write planned versions into package manifests and every dependency declaration that names a
 * planned package, touching only the version literals.
 * Assumptions: manifests are Cargo-style TOML; each file is read, edited and written within one call.
 * Usage: updateManifests({ manifests, plan, logger }) after the plan passes the primary check.
 */

import fse from "fs-extra";
import { parse as parseToml } from "smol-toml";

import { ManifestError } from "../core/errors.js";
import { logEvent, type EventLogger } from "../core/logger.js";

import {
  replaceStringLiterals,
  scanStringValues,
  type TomlLiteralEdit,
  type TomlStringSite,
} from "./toml-edit.js";
import type { Plan } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ManifestChange = {
  /** Key path of the rewritten value, e.g. ["dependencies", "core", "version"]. */
  path: string[];
  from: string;
  to: string;
};

export type ManifestRewrite = {
  text: string;
  changes: ManifestChange[];
};

export type RewriteOptions = {
  packageVersion: string | null;
  dependencyVersions: ReadonlyMap<string, string>;
};

export type ManifestUpdate = {
  manifestPath: string;
  changes: ManifestChange[];
};

export type UpdateManifestsInput = {
  /** Every manifest to scan; the first occurrence of a path wins. */
  manifests: ReadonlyArray<{ manifestPath: string; packageName: string | null }>;
  plan: Plan;
  logger?: EventLogger;
};

export type TomlDocument = ReturnType<typeof parseToml>;

export const DEPENDENCY_SECTIONS = ["dependencies", "dev-dependencies", "build-dependencies"] as const;

const DEPENDENCY_SECTION_SET: ReadonlySet<string> = new Set(DEPENDENCY_SECTIONS);

// =============================================================================
// PURE REWRITE
// =============================================================================

export function rewriteManifest(source: string, options: RewriteOptions): ManifestRewrite {
  const sites = scanStringValues(source);
  const edits: TomlLiteralEdit[] = [];
  const changes: ManifestChange[] = [];

  const record = (site: TomlStringSite, value: string): void => {
    if (site.literal.value === value) return;
    edits.push({ literal: site.literal, value });
    changes.push({ path: site.path, from: site.literal.value, to: value });
  };

  const renames = renamedDependencies(sites);

  for (const site of sites) {
    if (options.packageVersion !== null && isPackageVersion(site.path)) {
      record(site, options.packageVersion);
      continue;
    }

    const key = dependencyNameAt(site.path);
    const dependency = key === null ? null : (renames.get(tableKey(site.path)) ?? key);
    const planned = dependency === null ? undefined : options.dependencyVersions.get(dependency);
    if (planned !== undefined) {
      record(site, planned);
    }
  }

  return { text: replaceStringLiterals(source, edits), changes };
}

// `alias = { package = "real-name", version = "..." }` entries, keyed by the table holding them.
function renamedDependencies(sites: readonly TomlStringSite[]): Map<string, string> {
  const renames = new Map<string, string>();
  for (const site of sites) {
    if (site.path.at(-1) !== "package") continue;
    const table = site.path.slice(0, -1);
    if (dependencyNameAt(table) === null || dependencyNameAt([...table, "version"]) === null) continue;
    renames.set(tableKey(site.path), site.literal.value);
  }
  return renames;
}

function tableKey(path: readonly string[]): string {
  return JSON.stringify(path.slice(0, -1));
}

function isPackageVersion(path: readonly string[]): boolean {
  return path.length === 2 && path[0] === "package" && path[1] === "version";
}

/**
 * Name of the dependency whose version lives at `path`, or null when the path is not a dependency
 * version. Covers bare strings, inline tables, sub-tables, target-specific tables and
 * [workspace.dependencies].
 */
export function dependencyNameAt(path: readonly string[]): string | null {
  let rest = path;
  if (rest[0] === "target" && rest.length > 2) {
    rest = rest.slice(2);
  } else if (rest[0] === "workspace") {
    rest = rest.slice(1);
    if (rest[0] !== "dependencies") return null;
  }

  const [section, name, field] = rest;
  if (section === undefined || name === undefined || !DEPENDENCY_SECTION_SET.has(section)) {
    return null;
  }
  if (rest.length === 2) return name;
  if (rest.length === 3 && field === "version") return name;
  return null;
}

// =============================================================================
// FILE UPDATES
// =============================================================================

export async function updateManifests(input: UpdateManifestsInput): Promise<ManifestUpdate[]> {
  const dependencyVersions = new Map<string, string>();
  for (const [name, pkgPlan] of input.plan) {
    dependencyVersions.set(name, pkgPlan.newVersion);
  }

  const seen = new Set<string>();
  const updates: ManifestUpdate[] = [];

  for (const manifest of input.manifests) {
    if (seen.has(manifest.manifestPath)) continue;
    seen.add(manifest.manifestPath);

    const packageVersion =
      manifest.packageName === null ? null : (input.plan.get(manifest.packageName)?.newVersion ?? null);
    const update = await updateManifestFile(manifest.manifestPath, {
      packageVersion,
      dependencyVersions,
    });
    if (update.changes.length === 0) continue;

    updates.push(update);
    if (input.logger) {
      logEvent(input.logger, "apply.manifest", {
        manifest: update.manifestPath,
        changes: update.changes.map(describeChange),
      });
    }
  }

  return updates;
}

export async function updateManifestFile(
  manifestPath: string,
  options: RewriteOptions,
): Promise<ManifestUpdate> {
  const source = await readManifest(manifestPath);
  parseManifest(manifestPath, source);

  let rewrite: ManifestRewrite;
  try {
    rewrite = rewriteManifest(source, options);
  } catch (err) {
    throw new ManifestError(`Failed to scan ${manifestPath}: ${errorText(err)}`, err);
  }

  if (rewrite.changes.length > 0) {
    verifyRewrite(manifestPath, parseManifest(manifestPath, rewrite.text), rewrite.changes);
    try {
      await fse.writeFile(manifestPath, rewrite.text, "utf8");
    } catch (err) {
      throw new ManifestError(`Failed to write ${manifestPath}: ${errorText(err)}`, err);
    }
  }

  return { manifestPath, changes: rewrite.changes };
}

async function readManifest(manifestPath: string): Promise<string> {
  try {
    return await fse.readFile(manifestPath, "utf8");
  } catch (err) {
    throw new ManifestError(`Failed to read ${manifestPath}: ${errorText(err)}`, err);
  }
}

export function parseManifest(manifestPath: string, source: string): TomlDocument {
  try {
    return parseToml(source);
  } catch (err) {
    throw new ManifestError(`Failed to parse ${manifestPath}: ${errorText(err)}`, err);
  }
}

function verifyRewrite(manifestPath: string, doc: TomlDocument, changes: readonly ManifestChange[]): void {
  for (const change of changes) {
    if (valueAt(doc, change.path) !== change.to) {
      throw new ManifestError(
        `Rewriting ${manifestPath} did not produce ${change.path.join(".")} = "${change.to}"`,
      );
    }
  }
}

export function describeChange(change: ManifestChange): string {
  return `${change.path.join(".")}: ${change.from} -> ${change.to}`;
}

function valueAt(doc: TomlDocument, path: readonly string[]): unknown {
  let current: unknown = doc;
  for (const segment of path) {
    if (!isTable(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
