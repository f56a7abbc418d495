import { describe, expect, it } from "vitest";

import { FakeVcs } from "../app/pipeline/__tests__/fakes.js";
import { CommitError } from "../core/errors.js";
import { MemoryLogger } from "../core/logger.js";

import { commitRelease, releaseCommitMessage } from "./release-commit.js";

describe("commitRelease", () => {
  it("commits the written files with the primary version in the message", async () => {
    const vcs = new FakeVcs();
    const logger = new MemoryLogger();

    const sha = await commitRelease(
      vcs,
      "/repo",
      "0.1.1",
      ["/repo/crates/core/Cargo.toml", "/repo/Cargo.toml", "/repo/crates/core/CHANGELOG.md", "/repo/Cargo.toml"],
      logger,
    );

    expect(sha).toBe("commit-1");
    expect(vcs.commitMessages).toEqual(["chore(release): prepare v0.1.1"]);
    expect(vcs.committedPaths).toEqual([["Cargo.toml", "crates/core/CHANGELOG.md", "crates/core/Cargo.toml"]]);
    expect(logger.events).toEqual([
      {
        type: "git.commit",
        payload: {
          sha: "commit-1",
          message: "chore(release): prepare v0.1.1",
          paths: ["Cargo.toml", "crates/core/CHANGELOG.md", "crates/core/Cargo.toml"],
        },
      },
    ]);
  });

  it("refuses files outside the repository", async () => {
    const vcs = new FakeVcs();

    await expect(commitRelease(vcs, "/repo", "0.1.1", ["/elsewhere/Cargo.toml"])).rejects.toBeInstanceOf(
      CommitError,
    );
    expect(vcs.commitMessages).toEqual([]);
  });

  it("refuses an empty commit", async () => {
    await expect(commitRelease(new FakeVcs(), "/repo", "0.1.1", [])).rejects.toThrow(
      "No release changes to commit: no manifest or changelog was written.",
    );
  });

  it("wraps commit failures", async () => {
    const vcs = new FakeVcs();
    vcs.commitPaths = async () => {
      throw new Error("nothing to commit");
    };

    await expect(commitRelease(vcs, "/repo", "1.0.0", ["/repo/Cargo.toml"])).rejects.toBeInstanceOf(CommitError);
    expect(releaseCommitMessage("1.0.0")).toBe("chore(release): prepare v1.0.0");
  });
});
