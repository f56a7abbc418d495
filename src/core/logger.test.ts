import path from "node:path";

import fse from "fs-extra";
import { afterEach, describe, expect, it } from "vitest";

import { cleanupTempDirs, makeTempDir } from "../__tests__/git-repo.helpers.js";

import { JsonlLogger, MemoryLogger, logEvent } from "./logger.js";
import { defaultRunId, utcDate } from "./utils.js";

afterEach(async () => {
  await cleanupTempDirs();
});

describe("JsonlLogger", () => {
  it("appends one JSON object per event and creates the directory", async () => {
    const logPath = path.join(await makeTempDir("logs"), "nested", "run.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-1" });

    logEvent(logger, "rc.tag", { tag: "v0.1.1-rc.1", number: 1 });
    logEvent(logger, "run.complete");

    const lines = (await fse.readFile(logPath, "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);

    const first: unknown = JSON.parse(lines[0] ?? "");
    expect(first).toMatchObject({ run_id: "run-1", type: "rc.tag", payload: { tag: "v0.1.1-rc.1", number: 1 } });
    const second: unknown = JSON.parse(lines[1] ?? "");
    expect(second).not.toHaveProperty("payload");
  });
});

describe("MemoryLogger", () => {
  it("records event types in order", () => {
    const logger = new MemoryLogger();
    logEvent(logger, "plan.computed", { packages: [] });
    logEvent(logger, "git.commit");

    expect(logger.types()).toEqual(["plan.computed", "git.commit"]);
    expect(logger.events[0]).toEqual({ type: "plan.computed", payload: { packages: [] } });
  });
});

describe("utils", () => {
  it("formats run ids and UTC dates", () => {
    const now = new Date("2024-05-01T23:30:15.123Z");
    expect(defaultRunId(now)).toBe("20240501-233015");
    expect(utcDate(now)).toBe("2024-05-01");
  });
});
