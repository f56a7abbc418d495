import fs from "node:fs";

import { parse as parseYaml } from "yaml";

import { ReleaseConfigSchema, formatConfigIssues, type ReleaseConfig } from "./config.js";
import { ConfigError } from "./errors.js";

export function loadReleaseConfig(configPath: string): ReleaseConfig {
  if (!fs.existsSync(configPath)) {
    return ReleaseConfigSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${configPath}: ${errorText(err)}`, err);
  }

  const parsed = ReleaseConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = formatConfigIssues(parsed.error.issues);
    throw new ConfigError(`Invalid config ${configPath}:\n${issues.join("\n")}`, parsed.error);
  }

  return parsed.data;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
