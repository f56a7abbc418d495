import path from "node:path";

import fse from "fs-extra";
import { parse as parseToml } from "smol-toml";
import { afterEach, describe, expect, it } from "vitest";

import {
  cleanupTempDirs,
  commitFiles,
  createTempRepo,
  git,
} from "../__tests__/git-repo.helpers.js";
import { createGitVcs } from "../app/pipeline/vcs/git-vcs.js";
import { ReleaseConfigSchema, defaultReleaseConfig } from "../core/config.js";
import { ConfigError, GitError, ManifestError } from "../core/errors.js";

import {
  dependencyNames,
  discoverWorkspace,
  findLastStableTag,
  parseGitHubRemote,
  selectMembers,
  selectPrimaryPackage,
} from "./workspace.js";

const WORKSPACE_FILES = {
  "Cargo.toml": '[workspace]\nmembers = ["crates/*"]\nexclude = ["crates/legacy"]\n',
  "crates/core/Cargo.toml": '[package]\nname = "widgets-core"\nversion = "0.4.0"\n',
  "crates/core/src/lib.rs": "pub fn core() {}\n",
  "crates/cli/Cargo.toml":
    '[package]\nname = "widgets-cli"\nversion = "0.2.1"\n\n[dependencies]\nwidgets-core = { path = "../core", version = "0.4.0" }\n',
  "crates/legacy/Cargo.toml": '[package]\nname = "widgets-legacy"\nversion = "0.0.1"\n',
};

afterEach(async () => {
  await cleanupTempDirs();
});

describe("discoverWorkspace", () => {
  it("collects members, dependents, the primary package and the last stable tag", async () => {
    const repoRoot = await createTempRepo(WORKSPACE_FILES);
    await git(repoRoot, ["remote", "add", "origin", "git@github.com:acme/widgets.git"]);
    for (const tag of ["v0.1.0", "v0.10.0", "v0.9.0", "v1.0.0-rc.1"]) {
      await git(repoRoot, ["tag", tag]);
    }

    const context = await discoverWorkspace({
      cwd: path.join(repoRoot, "crates", "cli"),
      config: defaultReleaseConfig(),
      vcs: createGitVcs(),
    });

    expect(context.repoRoot).toBe(repoRoot);
    expect(context.owner).toBe("acme");
    expect(context.repo).toBe("widgets");
    expect(context.rootManifestPath).toBe(path.join(repoRoot, "Cargo.toml"));
    expect(context.packages).toEqual([
      {
        name: "widgets-cli",
        version: "0.2.1",
        manifestPath: path.join(repoRoot, "crates", "cli", "Cargo.toml"),
        packageRoot: path.join(repoRoot, "crates", "cli"),
        internalDependents: 0,
      },
      {
        name: "widgets-core",
        version: "0.4.0",
        manifestPath: path.join(repoRoot, "crates", "core", "Cargo.toml"),
        packageRoot: path.join(repoRoot, "crates", "core"),
        internalDependents: 1,
      },
    ]);
    expect(context.primaryPackage).toBe("widgets-core");
    expect(context.lastStableTag).toBe("v0.10.0");
  });

  it("treats a root package as primary and honours the repository override", async () => {
    const repoRoot = await createTempRepo({
      "Cargo.toml": '[package]\nname = "gadget"\nversion = "1.2.3"\n',
      "src/lib.rs": "pub fn gadget() {}\n",
    });

    const context = await discoverWorkspace({
      cwd: repoRoot,
      config: ReleaseConfigSchema.parse({ repository: "acme/gadgets" }),
      vcs: createGitVcs(),
    });

    expect(context.owner).toBe("acme");
    expect(context.repo).toBe("gadgets");
    expect(context.packages.map((pkg) => pkg.name)).toEqual(["gadget"]);
    expect(context.primaryPackage).toBe("gadget");
    expect(context.lastStableTag).toBeNull();
  });

  it("refuses a dirty working tree unless allowed", async () => {
    const repoRoot = await createTempRepo(WORKSPACE_FILES);
    await git(repoRoot, ["remote", "add", "origin", "https://github.com/acme/widgets.git"]);
    await fse.outputFile(path.join(repoRoot, "notes.txt"), "scratch\n");

    const vcs = createGitVcs();
    const config = defaultReleaseConfig();
    await expect(discoverWorkspace({ cwd: repoRoot, config, vcs })).rejects.toBeInstanceOf(GitError);

    const context = await discoverWorkspace({ cwd: repoRoot, config, vcs, allowDirty: true });
    expect(context.owner).toBe("acme");
  });

  it("ignores leftovers under the artifact root when checking for a clean tree", async () => {
    const repoRoot = await createTempRepo(WORKSPACE_FILES);
    await git(repoRoot, ["remote", "add", "origin", "https://github.com/acme/widgets.git"]);
    await fse.outputFile(path.join(repoRoot, "target/shipwright/logs/earlier.jsonl"), "{}\n");

    const vcs = createGitVcs();
    const config = defaultReleaseConfig();
    const context = await discoverWorkspace({ cwd: repoRoot, config, vcs, artifactDir: "target/shipwright" });
    expect(context.repo).toBe("widgets");

    await fse.outputFile(path.join(repoRoot, "target/debug/build.log"), "cargo\n");
    await expect(
      discoverWorkspace({ cwd: repoRoot, config, vcs, artifactDir: "target/shipwright" }),
    ).rejects.toThrow("Working tree is not clean; commit or stash changes before releasing.");
  });

  it("rejects remotes that are not GitHub", async () => {
    const repoRoot = await createTempRepo(WORKSPACE_FILES);
    await git(repoRoot, ["remote", "add", "origin", "https://git.example.test/acme/widgets.git"]);

    await expect(
      discoverWorkspace({ cwd: repoRoot, config: defaultReleaseConfig(), vcs: createGitVcs() }),
    ).rejects.toThrow("Unsupported remote URL (expected GitHub): https://git.example.test/acme/widgets.git");
  });

  it("rejects versions inherited from the workspace", async () => {
    const repoRoot = await createTempRepo({
      "Cargo.toml": '[workspace]\nmembers = ["app"]\n\n[workspace.package]\nversion = "0.3.0"\n',
      "app/Cargo.toml": '[package]\nname = "app"\nversion.workspace = true\n',
    });
    await git(repoRoot, ["remote", "add", "origin", "git@github.com:acme/widgets.git"]);

    await expect(
      discoverWorkspace({ cwd: repoRoot, config: defaultReleaseConfig(), vcs: createGitVcs() }),
    ).rejects.toBeInstanceOf(ManifestError);
  });

  it("only discovers member manifests that are committed", async () => {
    const repoRoot = await createTempRepo(WORKSPACE_FILES);
    await git(repoRoot, ["remote", "add", "origin", "git@github.com:acme/widgets.git"]);
    await commitFiles(
      repoRoot,
      { "crates/extra/Cargo.toml": '[package]\nname = "widgets-extra"\nversion = "0.1.0"\n' },
      "feat: add extra",
    );
    await fse.outputFile(
      path.join(repoRoot, "crates", "scratch", "Cargo.toml"),
      '[package]\nname = "widgets-scratch"\nversion = "0.1.0"\n',
    );

    const context = await discoverWorkspace({
      cwd: repoRoot,
      config: defaultReleaseConfig(),
      vcs: createGitVcs(),
      allowDirty: true,
    });

    expect(context.packages.map((pkg) => pkg.name)).toEqual(["widgets-cli", "widgets-core", "widgets-extra"]);
  });
});

describe("parseGitHubRemote", () => {
  it("parses ssh and https remotes", () => {
    expect(parseGitHubRemote("git@github.com:acme/widgets.git")).toEqual({ owner: "acme", repo: "widgets" });
    expect(parseGitHubRemote("git@github.com:acme/widgets")).toEqual({ owner: "acme", repo: "widgets" });
    expect(parseGitHubRemote("https://github.com/acme/widgets.git")).toEqual({
      owner: "acme",
      repo: "widgets",
    });
    expect(parseGitHubRemote("http://github.com/acme/widgets")).toEqual({ owner: "acme", repo: "widgets" });
  });

  it("returns null for other hosts", () => {
    expect(parseGitHubRemote("https://gitlab.com/acme/widgets.git")).toBeNull();
    expect(parseGitHubRemote("/tmp/widgets.git")).toBeNull();
  });
});

describe("findLastStableTag", () => {
  it("picks the highest plain release tag", () => {
    expect(findLastStableTag(["v1.2.0", "v1.10.0", "v2.0.0-rc.1", "release-3", "v1.9.9"])).toBe("v1.10.0");
  });

  it("returns null without release tags", () => {
    expect(findLastStableTag(["v0.1.0-rc.1", "nightly"])).toBeNull();
  });
});

describe("selectMembers", () => {
  it("matches globs and literal paths, minus excludes", () => {
    const dirs = ["crates/a", "crates/b", "crates/nested/c", "tools/gen"];
    expect(selectMembers(dirs, ["crates/*", "./tools/gen/"], ["crates/b"])).toEqual([
      "crates/a",
      "tools/gen",
    ]);
  });
});

describe("dependencyNames", () => {
  it("lists one name per dependency entry, resolving renames", () => {
    const doc = parseToml(
      [
        "[dependencies]",
        'alpha = "1.0.0"',
        'short = { package = "beta", version = "0.2.0" }',
        "",
        "[dev-dependencies]",
        'alpha = "1.0.0"',
        "",
        "[target.'cfg(unix)'.build-dependencies]",
        'gamma = "0.1.0"',
        "",
      ].join("\n"),
    );

    expect(dependencyNames(doc)).toEqual(["alpha", "beta", "alpha", "gamma"]);
  });
});

describe("selectPrimaryPackage", () => {
  const packages = [
    { name: "b-lib", version: "1.0.0", manifestPath: "", packageRoot: "", internalDependents: 2 },
    { name: "a-lib", version: "1.0.0", manifestPath: "", packageRoot: "", internalDependents: 2 },
    { name: "tool", version: "1.0.0", manifestPath: "", packageRoot: "", internalDependents: 0 },
  ];

  it("breaks dependent ties by name", () => {
    expect(selectPrimaryPackage({ packages, rootPackageName: null, repo: "widgets" })).toBe("a-lib");
  });

  it("prefers the package named like the repository", () => {
    expect(selectPrimaryPackage({ packages, rootPackageName: null, repo: "tool" })).toBe("tool");
  });

  it("rejects an unknown configured package", () => {
    expect(() =>
      selectPrimaryPackage({ packages, configured: "missing", rootPackageName: null, repo: "widgets" }),
    ).toThrow(ConfigError);
  });
});
