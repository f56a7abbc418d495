import { createHash } from "node:crypto";

import fse from "fs-extra";

const CHUNK_SIZE = 8 * 1024;

export const CHECKSUM_EXTENSION = ".sha512";

export async function sha512File(filePath: string): Promise<string> {
  const hash = createHash("sha512");
  const stream = fse.createReadStream(filePath, { highWaterMark: CHUNK_SIZE });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

// Writes "<hex>\n" beside the archive and returns the sidecar path.
export async function writeChecksumFile(archivePath: string): Promise<string> {
  const digest = await sha512File(archivePath);
  const sidecar = `${archivePath}${CHECKSUM_EXTENSION}`;
  await fse.writeFile(sidecar, `${digest}\n`, "utf8");
  return sidecar;
}
