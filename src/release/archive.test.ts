import path from "node:path";

import AdmZip from "adm-zip";
import fse from "fs-extra";
import { x as extractTar } from "tar";
import { afterEach, describe, expect, it } from "vitest";

import { cleanupTempDirs, createTempRepo, git, makeTempDir } from "../__tests__/git-repo.helpers.js";
import { FakeVcs } from "../app/pipeline/__tests__/fakes.js";
import { createGitVcs } from "../app/pipeline/vcs/git-vcs.js";
import { PackagingError } from "../core/errors.js";

import {
  artifactBaseName,
  buildPackageArchives,
  candidateArtifactDir,
  isSkippedPath,
} from "./archive.js";

const SKIP = [".git", ".github", "target"];

const FILES = {
  "Cargo.toml": '[workspace]\nmembers = ["crates/*"]\n',
  ".github/workflows/ci.yml": "on: push\n",
  "crates/core/Cargo.toml": '[package]\nname = "widgets-core"\nversion = "0.1.0"\n',
  "crates/core/src/lib.rs": "pub fn core() {}\n",
  "crates/core/.github/notes.md": "internal\n",
  "crates/core/target/debug/output.bin": "build output\n",
  "crates/core-extra/src/lib.rs": "pub fn extra() {}\n",
};

async function listFiles(root: string, dir = ""): Promise<string[]> {
  const out: string[] = [];
  for (const name of (await fse.readdir(path.join(root, dir))).sort()) {
    const relative = dir ? `${dir}/${name}` : name;
    if ((await fse.stat(path.join(root, relative))).isDirectory()) {
      out.push(...(await listFiles(root, relative)));
    } else {
      out.push(relative);
    }
  }
  return out;
}

describe("naming", () => {
  it("includes the package name only for secondary packages", () => {
    const naming = { prefix: "apache", repo: "widgets", primaryPackage: "widgets" };
    expect(artifactBaseName(naming, "widgets", "0.1.1", 2)).toBe("apache-widgets-0.1.1-rc2-src");
    expect(artifactBaseName(naming, "widgets-core", "0.3.0", 1)).toBe(
      "apache-widgets-widgets-core-0.3.0-rc1-src",
    );
    expect(artifactBaseName({ ...naming, prefix: "" }, "widgets", "1.0.0", 1)).toBe(
      "widgets-1.0.0-rc1-src",
    );
  });

  it("flattens tag names into one directory", () => {
    expect(candidateArtifactDir("/out", "release/v1.0.0-rc.1")).toBe(
      path.join("/out", "release_v1.0.0-rc.1"),
    );
  });

  it("skips any matching path segment", () => {
    expect(isSkippedPath("a/target/b.rs", SKIP)).toBe(true);
    expect(isSkippedPath("a/targets/b.rs", SKIP)).toBe(false);
  });
});

describe("buildPackageArchives", () => {
  afterEach(async () => {
    await cleanupTempDirs();
  });

  it("writes the same files with the same bytes into both formats", async () => {
    const repo = await createTempRepo(FILES);
    await fse.ensureSymlink("src/lib.rs", path.join(repo, "crates/core/lib-link.rs"));
    await git(repo, ["add", "-A"]);
    await git(repo, ["commit", "-m", "chore: add link"]);
    const sha = await git(repo, ["rev-parse", "HEAD"]);
    const outDir = await makeTempDir("out");

    const result = await buildPackageArchives({
      vcs: createGitVcs(),
      repoRoot: repo,
      commitSha: sha,
      packagePath: "crates/core",
      skipDirs: SKIP,
      mtime: new Date("2024-05-01T12:00:00Z"),
      outDir,
      baseName: "widgets-widgets-core-0.1.1-rc1-src",
    });

    expect(result.entries).toEqual(["crates/core/Cargo.toml", "crates/core/src/lib.rs"]);
    expect(path.basename(result.tarGz)).toBe("widgets-widgets-core-0.1.1-rc1-src.tar.gz");

    const extracted = await makeTempDir("extract");
    await extractTar({ file: result.tarGz, cwd: extracted });
    expect(await listFiles(extracted)).toEqual(result.entries);

    const zipEntries = new AdmZip(result.zip).getEntries().filter((entry) => !entry.isDirectory);
    expect(zipEntries.map((entry) => entry.entryName)).toEqual(result.entries);

    for (const entry of zipEntries) {
      const fromTar = await fse.readFile(path.join(extracted, entry.entryName));
      expect(entry.getData().equals(fromTar)).toBe(true);
      expect((entry.header.attr >>> 16) & 0o777).toBe(0o644);
    }
    expect((await fse.stat(path.join(extracted, "crates/core/src/lib.rs"))).mode & 0o777).toBe(0o644);
  });

  it("packages the whole repository for a root package, minus skipped directories", async () => {
    const repo = await createTempRepo(FILES);
    const sha = await git(repo, ["rev-parse", "HEAD"]);
    const outDir = await makeTempDir("out");

    const result = await buildPackageArchives({
      vcs: createGitVcs(),
      repoRoot: repo,
      commitSha: sha,
      packagePath: "",
      skipDirs: SKIP,
      mtime: new Date("2024-05-01T12:00:00Z"),
      outDir,
      baseName: "widgets-0.1.1-rc1-src",
    });

    expect(result.entries).toEqual([
      "Cargo.toml",
      "crates/core-extra/src/lib.rs",
      "crates/core/Cargo.toml",
      "crates/core/src/lib.rs",
    ]);
  });

  it("reads every blob of a package in one batch, in tree order", async () => {
    const vcs = new FakeVcs();
    vcs.trees.set("abc", [
      { mode: "100644", type: "blob", oid: "oid-manifest", path: "Cargo.toml" },
      { mode: "100644", type: "blob", oid: "oid-build", path: "target/debug/out.bin" },
      { mode: "100644", type: "blob", oid: "oid-lib", path: "src/lib.rs" },
    ]);
    vcs.blobs.set("oid-manifest", Buffer.from('[package]\nname = "widgets"\n'));
    vcs.blobs.set("oid-lib", Buffer.from("pub fn widgets() {}\n"));
    const outDir = await makeTempDir("out");

    const result = await buildPackageArchives({
      vcs,
      repoRoot: "/repo",
      commitSha: "abc",
      packagePath: "",
      skipDirs: SKIP,
      mtime: new Date(0),
      outDir,
      baseName: "widgets-0.1.1-rc1-src",
    });

    expect(vcs.blobReads).toEqual([["oid-manifest", "oid-lib"]]);
    const zipEntries = new AdmZip(result.zip).getEntries();
    expect(zipEntries.map((entry) => entry.entryName)).toEqual(["Cargo.toml", "src/lib.rs"]);
    expect(zipEntries[1]?.getData().toString("utf8")).toBe("pub fn widgets() {}\n");
  });

  it("surfaces the first blob read failure as a packaging error", async () => {
    const vcs = new FakeVcs();
    vcs.trees.set("abc", [{ mode: "100644", type: "blob", oid: "missing", path: "src/lib.rs" }]);
    const outDir = await makeTempDir("out");

    const err = await buildPackageArchives({
      vcs,
      repoRoot: "/repo",
      commitSha: "abc",
      packagePath: "",
      skipDirs: SKIP,
      mtime: new Date(0),
      outDir,
      baseName: "broken",
    }).catch((error: unknown) => error);

    expect(err).toBeInstanceOf(PackagingError);
    expect(err).toHaveProperty("message", "Failed to package broken: missing blob missing");
  });
});
