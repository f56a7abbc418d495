/**
 * Release host port.
 * Purpose: the release-page operations the candidate, upload and promotion stages depend on.
 * Assumptions: one host instance is bound to a single owner/repository.
 * Usage: GitHubReleaseHost in production, FakeReleaseHost in tests.
 */

export type ReleaseInfo = {
  id: number;
  tagName: string;
  uploadUrl: string;
};

export type ListedRelease = ReleaseInfo & {
  draft: boolean;
};

export type ReleaseAsset = {
  id: number;
  name: string;
  size: number;
};

export type AssetUpload = {
  name: string;
  contentType: string;
  data: Buffer;
};

export interface ReleaseHost {
  /** Resolves null when the host has no release for the tag. */
  getReleaseByTag(tag: string): Promise<ReleaseInfo | null>;
  /** Newest first, drafts included. */
  listReleases(): Promise<ListedRelease[]>;
  createPrerelease(tag: string): Promise<ReleaseInfo>;
  createRelease(tag: string): Promise<ReleaseInfo>;
  listAssets(release: ReleaseInfo): Promise<ReleaseAsset[]>;
  downloadAsset(asset: ReleaseAsset): Promise<Buffer>;
  deleteAsset(release: ReleaseInfo, assetId: number): Promise<void>;
  uploadAsset(release: ReleaseInfo, asset: AssetUpload): Promise<ReleaseAsset>;
}
