/**
 * Source archive builder.
 * Purpose: package each planned package from the tagged commit's tree into matching .tar.gz and .zip files.
 * Assumptions: content comes from git objects only, never the working tree; entries keep repo-relative
 * paths, mode 0644 and the tagged commit's timestamp.
 * Usage: packagePlannedPackages({ vcs, repoRoot, commitSha, packages, plan, naming, candidate, outDir, skipDirs }).
 */

import type { WriteStream } from "node:fs";
import path from "node:path";

import archiver from "archiver";
import fse from "fs-extra";

import type { TreeEntry, Vcs } from "../app/pipeline/vcs/vcs.js";
import { PackagingError } from "../core/errors.js";
import { logEvent, type EventLogger } from "../core/logger.js";
import { toPosixPath } from "../core/utils.js";
import { ownsPath } from "../versioning/attribution.js";
import type { PackageInfo, Plan } from "../versioning/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ArchiveNaming = {
  /** Optional leading segment, e.g. "apache"; empty for none. */
  prefix: string;
  repo: string;
  primaryPackage: string;
};

export type PackagedPackage = {
  packageName: string;
  version: string;
  baseName: string;
  /** Archive files; checksum sidecars are added by the upload stage. */
  files: string[];
  entryCount: number;
};

export type PackageArchivesInput = {
  vcs: Vcs;
  repoRoot: string;
  commitSha: string;
  /** Package root relative to the repo, "/"-separated; "" for the repo root. */
  packagePath: string;
  skipDirs: readonly string[];
  mtime: Date;
  outDir: string;
  baseName: string;
};

export type PackagePlannedInput = {
  vcs: Vcs;
  repoRoot: string;
  commitSha: string;
  packages: readonly PackageInfo[];
  plan: Plan;
  naming: ArchiveNaming;
  candidateNumber: number;
  outDir: string;
  skipDirs: readonly string[];
  logger?: EventLogger;
};

const FILE_MODE = 0o644;
const SYMLINK_MODE = "120000";

// =============================================================================
// NAMING
// =============================================================================

export function artifactBaseName(
  naming: ArchiveNaming,
  packageName: string,
  version: string,
  candidateNumber: number,
): string {
  const parts = [naming.prefix, naming.repo];
  if (packageName !== naming.primaryPackage) {
    parts.push(packageName);
  }
  parts.push(`${version}-rc${candidateNumber}-src`);
  return parts.filter((part) => part.length > 0).join("-");
}

export function candidateArtifactDir(artifactRoot: string, tag: string): string {
  return path.join(artifactRoot, tag.replaceAll("/", "_"));
}

export function isSkippedPath(relativePath: string, skipDirs: readonly string[]): boolean {
  return relativePath.split("/").some((segment) => skipDirs.includes(segment));
}

// =============================================================================
// PACKAGING
// =============================================================================

export async function packagePlannedPackages(input: PackagePlannedInput): Promise<PackagedPackage[]> {
  const mtime = await input.vcs.commitTime(input.repoRoot, input.commitSha);
  await fse.ensureDir(input.outDir);

  const packaged: PackagedPackage[] = [];
  for (const pkg of input.packages) {
    const pkgPlan = input.plan.get(pkg.name);
    if (!pkgPlan) continue;

    const baseName = artifactBaseName(input.naming, pkg.name, pkgPlan.newVersion, input.candidateNumber);
    const result = await buildPackageArchives({
      vcs: input.vcs,
      repoRoot: input.repoRoot,
      commitSha: input.commitSha,
      packagePath: relativePackagePath(input.repoRoot, pkg.packageRoot),
      skipDirs: input.skipDirs,
      mtime,
      outDir: input.outDir,
      baseName,
    });

    packaged.push({
      packageName: pkg.name,
      version: pkgPlan.newVersion,
      baseName,
      files: [result.tarGz, result.zip],
      entryCount: result.entries.length,
    });

    if (input.logger) {
      logEvent(input.logger, "archive.package", {
        package: pkg.name,
        base_name: baseName,
        entries: result.entries.length,
      });
    }
  }

  return packaged;
}

export async function buildPackageArchives(
  input: PackageArchivesInput,
): Promise<{ tarGz: string; zip: string; entries: string[] }> {
  const tarGz = path.join(input.outDir, `${input.baseName}.tar.gz`);
  const zip = path.join(input.outDir, `${input.baseName}.zip`);

  try {
    const entries = await selectEntries(input);
    await writeArchives(input, entries, [
      new ArchiveSink("tar", tarGz, input.mtime),
      new ArchiveSink("zip", zip, input.mtime),
    ]);
    return { tarGz, zip, entries: entries.map((entry) => entry.path) };
  } catch (err) {
    if (err instanceof PackagingError) throw err;
    throw new PackagingError(`Failed to package ${input.baseName}: ${errorText(err)}`, err);
  }
}

async function selectEntries(input: PackageArchivesInput): Promise<TreeEntry[]> {
  const tree = await input.vcs.listTree(input.repoRoot, input.commitSha, input.packagePath);

  // Submodules and symlinks have no file content to ship.
  return tree.filter(
    (item) =>
      item.type === "blob" &&
      item.mode !== SYMLINK_MODE &&
      ownsPath(input.packagePath, item.path) &&
      !isSkippedPath(item.path, input.skipDirs),
  );
}

// Each blob goes to both archives and is released before the next one is read.
async function writeArchives(
  input: PackageArchivesInput,
  entries: readonly TreeEntry[],
  sinks: readonly ArchiveSink[],
): Promise<void> {
  try {
    let index = 0;
    for await (const blob of input.vcs.readBlobs(input.repoRoot, entries.map((entry) => entry.oid))) {
      const entry = entries[index];
      index += 1;
      if (!entry) throw new PackagingError(`Unexpected blob ${blob.oid} while packaging ${input.baseName}`);
      await Promise.all(sinks.map((sink) => sink.add(entry.path, blob.data)));
    }
    await Promise.all(sinks.map((sink) => sink.finish()));
  } catch (err) {
    for (const sink of sinks) sink.abort();
    throw err;
  }
}

class ArchiveSink {
  private readonly archive: archiver.Archiver;
  private readonly output: WriteStream;
  private failure: Error | null = null;
  private waiter: { resolve: () => void; reject: (err: Error) => void } | null = null;

  constructor(
    format: "tar" | "zip",
    outPath: string,
    private readonly mtime: Date,
  ) {
    this.archive = format === "tar" ? archiver("tar", { gzip: true }) : archiver("zip", { zlib: { level: 9 } });
    this.output = fse.createWriteStream(outPath);

    this.archive.on("entry", () => this.settle());
    this.output.on("close", () => this.settle());
    this.archive.on("error", (err) => this.fail(err));
    this.archive.on("warning", (err) => this.fail(err));
    this.output.on("error", (err) => this.fail(err));

    this.archive.pipe(this.output);
  }

  /** Resolves once archiver has consumed the entry. */
  add(name: string, data: Buffer): Promise<void> {
    return this.wait(() => {
      this.archive.append(data, { name, mode: FILE_MODE, date: this.mtime });
    });
  }

  async finish(): Promise<void> {
    const closed = this.wait(() => undefined);
    await Promise.all([this.archive.finalize(), closed]);
  }

  abort(): void {
    this.archive.abort();
    this.output.destroy();
  }

  private wait(start: () => void): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    return new Promise<void>((resolve, reject) => {
      this.waiter = { resolve, reject };
      start();
    });
  }

  private settle(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.resolve();
  }

  private fail(err: Error): void {
    this.failure ??= err;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(err);
  }
}

function relativePackagePath(repoRoot: string, packageRoot: string): string {
  const relative = toPosixPath(path.relative(repoRoot, packageRoot));
  return relative === "." ? "" : relative;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
