import type { CommitKind } from "./commit-kind.js";

export type PackageInfo = {
  name: string;
  version: string;
  manifestPath: string;
  packageRoot: string;
  internalDependents: number;
};

export type ChangeEntry = {
  kind: CommitKind;
  subject: string;
  shortSha: string;
  breaking: boolean;
};

export type BumpLevel = "major" | "minor" | "patch";

export type PackagePlan = {
  readonly previousVersion: string;
  readonly newVersion: string;
  readonly bump: BumpLevel;
  readonly changes: readonly ChangeEntry[];
};

// Keys iterate in lexicographic order; see createPlan.
export type Plan = ReadonlyMap<string, PackagePlan>;
