/**
 * GitHub release host.
 * Purpose: implement ReleaseHost over the GitHub REST API.
 * Assumptions: the token can read and write releases of owner/repo; binary uploads go to the release's
 * upload_url, not the API base URL.
 * Usage: new GitHubReleaseHost({ owner, repo, token }) and pass as the pipeline's releaseHost.
 */

import { Octokit } from "@octokit/rest";
import { z } from "zod";

import { ReleaseHostError } from "../core/errors.js";

import type { AssetUpload, ListedRelease, ReleaseAsset, ReleaseHost, ReleaseInfo } from "./host.js";

// =============================================================================
// TYPES
// =============================================================================

export type GitHubReleaseHostOptions = {
  owner: string;
  repo: string;
  token: string;
  baseUrl?: string;
  fetch?: typeof fetch;
};

const ReleaseSchema = z.object({
  id: z.number(),
  tag_name: z.string(),
  upload_url: z.string(),
});

const ListedReleaseSchema = ReleaseSchema.extend({
  draft: z.boolean(),
});

const AssetSchema = z.object({
  id: z.number(),
  name: z.string(),
  size: z.number(),
});

// =============================================================================
// HOST
// =============================================================================

export class GitHubReleaseHost implements ReleaseHost {
  private readonly octokit: Octokit;
  private readonly owner: string;
  private readonly repo: string;

  constructor(options: GitHubReleaseHostOptions) {
    this.owner = options.owner;
    this.repo = options.repo;
    this.octokit = new Octokit({
      auth: options.token,
      baseUrl: options.baseUrl,
      userAgent: "shipwright",
      request: options.fetch ? { fetch: options.fetch } : undefined,
    });
  }

  async getReleaseByTag(tag: string): Promise<ReleaseInfo | null> {
    try {
      const res = await this.octokit.rest.repos.getReleaseByTag({
        owner: this.owner,
        repo: this.repo,
        tag,
      });
      return toReleaseInfo(res.data);
    } catch (err) {
      if (statusOf(err) === 404) return null;
      throw hostError(`Failed to look up release ${tag}`, err);
    }
  }

  async listReleases(): Promise<ListedRelease[]> {
    try {
      const releases = await this.octokit.paginate(this.octokit.rest.repos.listReleases, {
        owner: this.owner,
        repo: this.repo,
        per_page: 100,
      });
      return releases.map((release) => {
        const parsed = ListedReleaseSchema.parse(release);
        return { ...toReleaseInfo(parsed), draft: parsed.draft };
      });
    } catch (err) {
      throw hostError(`Failed to list releases of ${this.owner}/${this.repo}`, err);
    }
  }

  createPrerelease(tag: string): Promise<ReleaseInfo> {
    return this.create(tag, true);
  }

  createRelease(tag: string): Promise<ReleaseInfo> {
    return this.create(tag, false);
  }

  private async create(tag: string, prerelease: boolean): Promise<ReleaseInfo> {
    try {
      const res = await this.octokit.rest.repos.createRelease({
        owner: this.owner,
        repo: this.repo,
        tag_name: tag,
        name: tag,
        prerelease,
        draft: false,
      });
      return toReleaseInfo(res.data);
    } catch (err) {
      throw hostError(`Failed to create ${prerelease ? "prerelease" : "release"} ${tag}`, err);
    }
  }

  async listAssets(release: ReleaseInfo): Promise<ReleaseAsset[]> {
    try {
      const assets = await this.octokit.paginate(this.octokit.rest.repos.listReleaseAssets, {
        owner: this.owner,
        repo: this.repo,
        release_id: release.id,
        per_page: 100,
      });
      return assets.map((asset) => AssetSchema.parse(asset));
    } catch (err) {
      throw hostError(`Failed to list assets of ${release.tagName}`, err);
    }
  }

  async deleteAsset(release: ReleaseInfo, assetId: number): Promise<void> {
    try {
      await this.octokit.rest.repos.deleteReleaseAsset({
        owner: this.owner,
        repo: this.repo,
        asset_id: assetId,
      });
    } catch (err) {
      throw hostError(`Failed to delete asset ${assetId} of ${release.tagName}`, err);
    }
  }

  async downloadAsset(asset: ReleaseAsset): Promise<Buffer> {
    let data: unknown;
    try {
      const res = await this.octokit.rest.repos.getReleaseAsset({
        owner: this.owner,
        repo: this.repo,
        asset_id: asset.id,
        headers: { accept: "application/octet-stream" },
      });
      data = res.data;
    } catch (err) {
      throw hostError(`Failed to download ${asset.name}`, err);
    }
    return toBuffer(asset.name, data);
  }

  async uploadAsset(release: ReleaseInfo, asset: AssetUpload): Promise<ReleaseAsset> {
    try {
      const res = await this.octokit.request({
        method: "POST",
        url: assetUploadUrl(release.uploadUrl, asset.name),
        headers: { "content-type": asset.contentType },
        data: asset.data,
      });
      return AssetSchema.parse(res.data);
    } catch (err) {
      throw hostError(`Failed to upload ${asset.name}`, err);
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

// upload_url is a URI template such as ".../assets{?name,label}".
export function assetUploadUrl(uploadUrlTemplate: string, name: string): string {
  return `${uploadUrlTemplate.replace(/\{[^}]*\}/g, "")}?name=${encodeURIComponent(name)}`;
}

function toReleaseInfo(data: unknown): ReleaseInfo {
  const parsed = ReleaseSchema.parse(data);
  return { id: parsed.id, tagName: parsed.tag_name, uploadUrl: parsed.upload_url };
}

// Binary bodies come back as an ArrayBuffer; text-typed ones as a string.
function toBuffer(name: string, data: unknown): Buffer {
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (data instanceof Uint8Array) return Buffer.from(data);
  if (typeof data === "string") return Buffer.from(data, "utf8");
  throw new ReleaseHostError(`Unexpected response body while downloading ${name}`);
}

function statusOf(err: unknown): number | undefined {
  if (err && typeof err === "object" && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

function hostError(context: string, err: unknown): ReleaseHostError {
  if (err instanceof ReleaseHostError) return err;
  const status = statusOf(err);
  const detail = err instanceof Error ? err.message : String(err);
  const suffix = status === undefined ? "" : ` (status ${status})`;
  return new ReleaseHostError(`${context}${suffix}: ${detail}`, err, status);
}
