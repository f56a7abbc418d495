import { describe, expect, it } from "vitest";

import { FakeVcs } from "../app/pipeline/__tests__/fakes.js";
import { AttributionError, ResolutionError } from "../core/errors.js";

import { buildOwnershipIndex, collectChanges, ownsPath } from "./attribution.js";
import type { PackageInfo } from "./types.js";

const REPO = "/work/widgets";

function pkg(name: string, root: string): PackageInfo {
  const packageRoot = root === "" ? REPO : `${REPO}/${root}`;
  return {
    name,
    version: "0.1.0",
    manifestPath: `${packageRoot}/Cargo.toml`,
    packageRoot,
    internalDependents: 0,
  };
}

const PACKAGES = [pkg("widgets", ""), pkg("widgets-a", "pkg/a"), pkg("widgets-ab", "pkg/ab")];

describe("ownership", () => {
  it("matches whole path segments", () => {
    expect(ownsPath("pkg/a", "pkg/a/src/lib.rs")).toBe(true);
    expect(ownsPath("pkg/a", "pkg/a")).toBe(true);
    expect(ownsPath("pkg/a", "pkg/ab/src/lib.rs")).toBe(false);
    expect(ownsPath("", "anything/at/all")).toBe(true);
  });

  it("prefers the deepest package root and falls back to the root package", () => {
    const index = buildOwnershipIndex(REPO, PACKAGES);
    expect(index.ownerOf("pkg/a/src/lib.rs")).toBe("widgets-a");
    expect(index.ownerOf("pkg/ab/Cargo.toml")).toBe("widgets-ab");
    expect(index.ownerOf("README.md")).toBe("widgets");
  });

  it("returns null when no package owns the path", () => {
    const index = buildOwnershipIndex(REPO, [pkg("widgets-a", "pkg/a")]);
    expect(index.ownerOf("docs/guide.md")).toBeNull();
  });
});

describe("collectChanges", () => {
  it("attributes each commit once per owning package, oldest first", async () => {
    const vcs = new FakeVcs();
    vcs.addCommit("1111111aaaa", "feat: add new module", ["pkg/a/src/lib.rs", "pkg/a/src/mod.rs"]);
    vcs.addCommit("2222222bbbb", "fix: shared bug", ["pkg/a/src/lib.rs", "pkg/ab/src/lib.rs"]);

    const changes = await collectChanges(vcs, { repoRoot: REPO, packages: PACKAGES, baseTag: null });

    expect(changes.get("widgets-a")).toEqual([
      { kind: "feature", subject: "feat: add new module", shortSha: "1111111", breaking: false },
      { kind: "fix", subject: "fix: shared bug", shortSha: "2222222", breaking: false },
    ]);
    expect(changes.get("widgets-ab")).toEqual([
      { kind: "fix", subject: "fix: shared bug", shortSha: "2222222", breaking: false },
    ]);
    expect(changes.has("widgets")).toBe(false);
  });

  it("walks only commits after the base tag", async () => {
    const vcs = new FakeVcs();
    vcs.addCommit("aaaaaaa0000", "chore: initial", ["README.md"]);
    vcs.addCommit("bbbbbbb0000", "refactor!: breaking change", ["src/lib.rs"]);
    vcs.tags.set("v0.1.0", "aaaaaaa0000");

    const changes = await collectChanges(vcs, {
      repoRoot: REPO,
      packages: PACKAGES,
      baseTag: "v0.1.0",
    });

    expect(vcs.listCommitsCalls).toEqual([{ baseSha: "aaaaaaa0000" }]);
    expect(changes.get("widgets")).toEqual([
      { kind: "breaking", subject: "refactor!: breaking change", shortSha: "bbbbbbb", breaking: true },
    ]);
  });

  it("fails with a resolution error when the base tag is unknown", async () => {
    const vcs = new FakeVcs();
    await expect(
      collectChanges(vcs, { repoRoot: REPO, packages: PACKAGES, baseTag: "v9.9.9" }),
    ).rejects.toBeInstanceOf(ResolutionError);
  });

  it("wraps history failures in an attribution error", async () => {
    const vcs = new FakeVcs();
    vcs.failListCommits = new Error("bad object HEAD");

    const err = await collectChanges(vcs, { repoRoot: REPO, packages: PACKAGES, baseTag: null }).catch(
      (error: unknown) => error,
    );
    expect(err).toBeInstanceOf(AttributionError);
    expect(err).toHaveProperty("message", "Failed to attribute commits: bad object HEAD");
  });
});
