import { runPlan, type PlanReport } from "../app/pipeline/prerelease-engine.js";
import type { RunContext } from "../app/pipeline/run-context.js";

import { formatPlannedPackages } from "./prerelease.js";

export async function planCommand(context: RunContext): Promise<PlanReport> {
  const report = await runPlan(context);

  console.log(`Base tag: ${report.baseTag ?? "none (full history)"}`);
  for (const line of formatPlannedPackages(report.packages, report.primaryPackage)) {
    console.log(line);
  }
  if (!report.primaryPlanned) {
    console.log(`Primary package ${report.primaryPackage} has no changes; prerelease would stop here.`);
  }
  return report;
}
