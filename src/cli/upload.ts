import type { RunContext } from "../app/pipeline/run-context.js";
import { runUpload, type UploadRunReport } from "../app/pipeline/upload-engine.js";

export async function uploadCommand(context: RunContext, tag: string): Promise<UploadRunReport> {
  const report = await runUpload(context, tag);
  const { uploaded, skipped, replaced } = report.upload;

  console.log(`Candidate: ${report.tag}`);
  console.log(`Artifacts: ${report.artifactDir} (${report.files.length} files)`);
  for (const name of skipped) {
    console.log(`- ${name} already uploaded`);
  }
  for (const name of uploaded) {
    console.log(`- ${name} ${replaced.includes(name) ? "replaced" : "uploaded"}`);
  }
  console.log(`Log: ${report.logPath}`);
  return report;
}
