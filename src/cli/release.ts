import path from "node:path";

import { runRelease, type ReleaseRunReport } from "../app/pipeline/release-engine.js";
import type { RunContext } from "../app/pipeline/run-context.js";

import { formatPlannedPackages } from "./prerelease.js";

export async function releaseCommand(context: RunContext): Promise<ReleaseRunReport> {
  const report = await runRelease(context);
  for (const line of formatReleaseReport(report)) {
    console.log(line);
  }
  return report;
}

export function formatReleaseReport(report: ReleaseRunReport): string[] {
  const lines = [
    `Candidate: ${report.candidateTag} (${report.commitSha.slice(0, 7)})`,
    `Stable tag: ${report.stableTag}`,
    ...formatPlannedPackages(report.packages, report.primaryPackage),
  ];

  if (report.dryRun) {
    lines.push("Dry run: nothing was changed.");
    return lines;
  }

  if (report.upload) {
    const { uploaded, skipped, replaced } = report.upload;
    lines.push(`Uploaded ${uploaded.length} asset(s), skipped ${skipped.length}, replaced ${replaced.length}.`);
  }
  if (report.logPath) {
    lines.push(`Log: ${path.relative(report.repoRoot, report.logPath)}`);
  }
  return lines;
}
