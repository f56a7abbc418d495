import path from "node:path";

import type { PlannedPackage, PrereleaseReport } from "../app/pipeline/prerelease-engine.js";
import { runPrerelease } from "../app/pipeline/prerelease-engine.js";
import type { RunContext } from "../app/pipeline/run-context.js";

import { TOKEN_ENV } from "./context.js";

export async function prereleaseCommand(context: RunContext): Promise<PrereleaseReport> {
  const report = await runPrerelease(context);
  for (const line of formatPrereleaseReport(report)) {
    console.log(line);
  }
  if (report.skipped === "missing_token") {
    console.warn(
      `Warning: no GitHub token (set ${TOKEN_ENV} or pass --token); skipped tagging, packaging and upload.`,
    );
  }
  return report;
}

export function formatPrereleaseReport(report: PrereleaseReport): string[] {
  const lines = [
    `Base tag: ${report.baseTag ?? "none (full history)"}`,
    ...formatPlannedPackages(report.packages, report.primaryPackage),
  ];

  if (report.mode === "dry-run") {
    lines.push("Dry run: nothing was changed.");
    return lines;
  }

  if (report.commitSha) {
    lines.push(`Release commit: ${report.commitSha.slice(0, 7)}`);
  }
  if (report.candidate) {
    lines.push(`Candidate: ${report.candidate.tag}`);
  }
  if (report.artifactDir) {
    lines.push(`Artifacts: ${report.artifactDir} (${report.files.length} files)`);
  }
  if (report.upload) {
    const { uploaded, skipped, replaced } = report.upload;
    lines.push(`Uploaded ${uploaded.length} asset(s), skipped ${skipped.length}, replaced ${replaced.length}.`);
  } else if (report.mode === "local") {
    lines.push("Local assets only: nothing was pushed or uploaded.");
  }
  if (report.logPath) {
    lines.push(`Log: ${path.relative(report.repoRoot, report.logPath)}`);
  }
  return lines;
}

export function formatPlannedPackages(packages: readonly PlannedPackage[], primaryPackage: string): string[] {
  if (packages.length === 0) {
    return ["No package has changes since the base tag."];
  }
  return packages.map((pkg) => {
    const marker = pkg.name === primaryPackage ? " [primary]" : "";
    return `- ${pkg.name} ${pkg.from} -> ${pkg.to} (${pkg.bump})${marker}`;
  });
}
