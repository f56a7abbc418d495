import { createHash } from "node:crypto";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, describe, expect, it } from "vitest";

import { sha512File, writeChecksumFile } from "./checksum.js";

describe("checksums", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    await Promise.all(dirs.splice(0).map((dir) => fse.remove(dir)));
  });

  it("hashes files larger than one chunk", async () => {
    const dir = await fse.mkdtemp(path.join(os.tmpdir(), "shipwright-sum-"));
    dirs.push(dir);
    const data = Buffer.alloc(20_000, "ab");
    const filePath = path.join(dir, "pkg.tar.gz");
    await fse.writeFile(filePath, data);

    expect(await sha512File(filePath)).toBe(createHash("sha512").update(data).digest("hex"));
  });

  it("writes a newline-terminated sidecar", async () => {
    const dir = await fse.mkdtemp(path.join(os.tmpdir(), "shipwright-sum-"));
    dirs.push(dir);
    const filePath = path.join(dir, "pkg.zip");
    await fse.writeFile(filePath, "");

    const sidecar = await writeChecksumFile(filePath);

    expect(sidecar).toBe(`${filePath}.sha512`);
    expect(await fse.readFile(sidecar, "utf8")).toBe(
      "cf83e1357eefb8bdf1542850d66d8007d620e4050b5715dc83f4a921d36ce9ce47d0d13c5d85f2b0ff8318d2877eec2f63b931bd47417a81a538327af927da3e\n",
    );
  });
});
