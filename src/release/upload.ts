/**
 * Checksum + upload stage.
 * Purpose: write sha512 sidecars for packaged archives and push every artifact to the candidate's release.
 * Assumptions: uploads run one file at a time in path order; an asset already on the release with the
 * same name and size is treated as uploaded.
 * Usage: const files = await writeChecksums(packaged); await uploadAssets({ host, release, files, policy }).
 */

import path from "node:path";

import fse from "fs-extra";

import { UploadError } from "../core/errors.js";
import { logEvent, type EventLogger } from "../core/logger.js";

import type { PackagedPackage } from "./archive.js";
import { CHECKSUM_EXTENSION, writeChecksumFile } from "./checksum.js";
import type { ReleaseAsset, ReleaseHost, ReleaseInfo } from "./host.js";
import { RetryExhaustedError, runWithRetries, type RetryPolicy } from "./retry.js";

// =============================================================================
// TYPES
// =============================================================================

export type UploadInput = {
  host: ReleaseHost;
  release: ReleaseInfo;
  files: readonly string[];
  policy: RetryPolicy;
  logger?: EventLogger;
  sleep?: (durationMs: number) => Promise<void>;
};

export type UploadReport = {
  uploaded: string[];
  skipped: string[];
  replaced: string[];
};

const CONTENT_TYPES: Record<string, string> = {
  ".gz": "application/gzip",
  ".zip": "application/zip",
  [CHECKSUM_EXTENSION]: "text/plain",
};

// =============================================================================
// CHECKSUMS
// =============================================================================

export async function writeChecksums(packaged: readonly PackagedPackage[]): Promise<string[]> {
  const files: string[] = [];
  for (const entry of packaged) {
    for (const archive of entry.files) {
      files.push(archive, await writeChecksumFile(archive));
    }
  }
  return files;
}

// Archives and sidecars already on disk for a candidate, for resuming an upload.
export async function listArtifactFiles(candidateDir: string): Promise<string[]> {
  if (!(await fse.pathExists(candidateDir))) return [];

  const files: string[] = [];
  for (const name of await fse.readdir(candidateDir)) {
    const filePath = path.join(candidateDir, name);
    if ((await fse.stat(filePath)).isFile()) files.push(filePath);
  }
  return files.sort();
}

export function contentTypeFor(fileName: string): string {
  return CONTENT_TYPES[path.extname(fileName)] ?? "application/octet-stream";
}

// =============================================================================
// UPLOAD
// =============================================================================

export async function uploadAssets(input: UploadInput): Promise<UploadReport> {
  const { host, release, logger } = input;
  const report: UploadReport = { uploaded: [], skipped: [], replaced: [] };

  const existing = new Map<string, ReleaseAsset>();
  for (const asset of await host.listAssets(release)) {
    existing.set(asset.name, asset);
  }

  for (const filePath of [...input.files].sort()) {
    const name = path.basename(filePath);
    const size = (await fse.stat(filePath)).size;
    const present = existing.get(name);

    if (present && present.size === size) {
      report.skipped.push(name);
      if (logger) logEvent(logger, "upload.skip", { name, size });
      continue;
    }
    if (present) {
      await host.deleteAsset(release, present.id);
      report.replaced.push(name);
    }

    await uploadOne(input, filePath, name);
    report.uploaded.push(name);
  }

  return report;
}

async function uploadOne(input: UploadInput, filePath: string, name: string): Promise<void> {
  const { host, release, logger } = input;
  const contentType = contentTypeFor(name);

  try {
    await runWithRetries(
      input.policy,
      async (attempt) => {
        if (logger) logEvent(logger, "upload.attempt", { name, attempt, content_type: contentType });
        const data = await fse.readFile(filePath);
        return host.uploadAsset(release, { name, contentType, data });
      },
      {
        sleep: input.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          if (logger) {
            logEvent(logger, "upload.retry", { name, attempt, delay_ms: delayMs, error: errorText(error) });
          }
        },
      },
    );
  } catch (err) {
    if (err instanceof RetryExhaustedError) {
      throw new UploadError(
        `Upload of ${name} failed after ${err.attempts} attempt(s): ${errorText(err.lastError)}`,
        err.lastError,
        err.attempts,
      );
    }
    throw err;
  }
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
