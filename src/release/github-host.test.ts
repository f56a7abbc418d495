import { describe, expect, it } from "vitest";

import { ReleaseHostError } from "../core/errors.js";

import { GitHubReleaseHost, assetUploadUrl } from "./github-host.js";

type RecordedRequest = {
  method: string;
  url: string;
  contentType: string | null;
  body: unknown;
};

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8" },
  });
}

function fakeGitHub(responses: Response[]): { fetch: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    requests.push({
      method: init?.method ?? "GET",
      url,
      contentType: new Headers(init?.headers).get("content-type"),
      body: init?.body,
    });
    const next = responses.shift();
    if (!next) throw new Error(`unexpected request ${url}`);
    return next;
  };
  return { fetch: fetchImpl, requests };
}

const RELEASE = {
  id: 42,
  tag_name: "v0.1.1-rc.1",
  upload_url: "https://uploads.github.com/repos/example/widgets/releases/42/assets{?name,label}",
};

function host(fetchImpl: typeof fetch): GitHubReleaseHost {
  return new GitHubReleaseHost({ owner: "example", repo: "widgets", token: "test-secret", fetch: fetchImpl });
}

describe("assetUploadUrl", () => {
  it("drops the URI template and encodes the name", () => {
    expect(assetUploadUrl(RELEASE.upload_url, "a b+c.zip")).toBe(
      "https://uploads.github.com/repos/example/widgets/releases/42/assets?name=a%20b%2Bc.zip",
    );
  });
});

describe("GitHubReleaseHost", () => {
  it("maps a missing release to null", async () => {
    const github = fakeGitHub([jsonResponse(404, { message: "Not Found" })]);

    expect(await host(github.fetch).getReleaseByTag("v0.1.1-rc.1")).toBeNull();
    expect(github.requests[0]?.url).toBe(
      "https://api.github.com/repos/example/widgets/releases/tags/v0.1.1-rc.1",
    );
  });

  it("creates a prerelease named after the tag", async () => {
    const github = fakeGitHub([jsonResponse(201, RELEASE)]);

    const release = await host(github.fetch).createPrerelease("v0.1.1-rc.1");

    expect(release).toEqual({ id: 42, tagName: "v0.1.1-rc.1", uploadUrl: RELEASE.upload_url });
    expect(github.requests[0]?.method).toBe("POST");
    expect(JSON.parse(String(github.requests[0]?.body))).toEqual({
      tag_name: "v0.1.1-rc.1",
      name: "v0.1.1-rc.1",
      prerelease: true,
      draft: false,
    });
  });

  it("creates a stable release for promotion", async () => {
    const github = fakeGitHub([jsonResponse(201, { ...RELEASE, id: 43, tag_name: "v0.1.1" })]);

    const release = await host(github.fetch).createRelease("v0.1.1");

    expect(release).toEqual({ id: 43, tagName: "v0.1.1", uploadUrl: RELEASE.upload_url });
    expect(JSON.parse(String(github.requests[0]?.body))).toEqual({
      tag_name: "v0.1.1",
      name: "v0.1.1",
      prerelease: false,
      draft: false,
    });
  });

  it("lists releases with their draft flag", async () => {
    const github = fakeGitHub([
      jsonResponse(200, [
        { ...RELEASE, id: 44, tag_name: "v0.1.2-rc.1", draft: true },
        { ...RELEASE, draft: false },
      ]),
    ]);

    const releases = await host(github.fetch).listReleases();

    expect(releases).toEqual([
      { id: 44, tagName: "v0.1.2-rc.1", uploadUrl: RELEASE.upload_url, draft: true },
      { id: 42, tagName: "v0.1.1-rc.1", uploadUrl: RELEASE.upload_url, draft: false },
    ]);
    expect(github.requests[0]?.url).toBe("https://api.github.com/repos/example/widgets/releases?per_page=100");
  });

  it("downloads asset bytes", async () => {
    const github = fakeGitHub([
      new Response("zip", {
        status: 200,
        headers: { "content-type": "application/octet-stream" },
      }),
    ]);

    const data = await host(github.fetch).downloadAsset({ id: 7, name: "w.zip", size: 3 });

    expect(data.toString("utf8")).toBe("zip");
    expect(github.requests[0]?.url).toBe("https://api.github.com/repos/example/widgets/releases/assets/7");
  });

  it("posts the raw bytes to the upload URL", async () => {
    const github = fakeGitHub([jsonResponse(201, { id: 7, name: "w.zip", size: 3 })]);
    const release = { id: 42, tagName: "v0.1.1-rc.1", uploadUrl: RELEASE.upload_url };

    const asset = await host(github.fetch).uploadAsset(release, {
      name: "w.zip",
      contentType: "application/zip",
      data: Buffer.from("zip"),
    });

    expect(asset).toEqual({ id: 7, name: "w.zip", size: 3 });
    expect(github.requests[0]).toMatchObject({
      method: "POST",
      url: "https://uploads.github.com/repos/example/widgets/releases/42/assets?name=w.zip",
      contentType: "application/zip",
    });
  });

  it("surfaces other failures with their status", async () => {
    const github = fakeGitHub([jsonResponse(500, { message: "boom" })]);

    const err = await host(github.fetch)
      .getReleaseByTag("v0.1.1-rc.1")
      .catch((error: unknown) => error);

    expect(err).toBeInstanceOf(ReleaseHostError);
    expect(err).toHaveProperty("status", 500);
  });
});
