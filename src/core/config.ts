import { z, type ZodIssue } from "zod";

export const DEFAULT_SKIP_DIRS = [".git", ".github", "target"];

export const UploadConfigSchema = z
  .object({
    max_attempts: z.number().int().min(1).max(10).default(3),
    backoff_ms: z.number().int().nonnegative().default(200),
  })
  .strict();

export const ReleaseConfigSchema = z
  .object({
    primary_package: z.string().min(1).optional(),
    repository: z
      .string()
      .regex(/^[^/\s]+\/[^/\s]+$/, "Expected owner/name")
      .optional(),
    remote: z.string().min(1).default("origin"),
    artifact_dir: z.string().min(1).default("target/shipwright"),
    artifact_prefix: z.string().default(""),
    changelog_file: z.string().min(1).default("CHANGELOG.md"),
    skip_dirs: z.array(z.string().min(1)).default(DEFAULT_SKIP_DIRS),
    upload: UploadConfigSchema.default({}),
  })
  .strict();

export type ReleaseConfig = z.infer<typeof ReleaseConfigSchema>;

export function defaultReleaseConfig(): ReleaseConfig {
  return ReleaseConfigSchema.parse({});
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
