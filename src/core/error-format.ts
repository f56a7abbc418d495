/*
Purpose: map release errors to user-facing errors and render them as printable lines.
Assumptions: debug mode may include stack traces; non-TTY output should disable color.
Usage: formatErrorLines(toUserFacingError(err), { mode: "debug" }); createAnsiFormatter(resolveColorEnabled()).
*/

import {
  AttributionError,
  CommitError,
  ConfigError,
  GitError,
  IdempotencyError,
  ManifestError,
  PackagingError,
  PolicyError,
  ReleaseHostError,
  ResolutionError,
  UploadError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  ValidationError,
  type UserFacingErrorCode,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind = "title" | "message" | "hint" | "next" | "code" | "name" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

type ErrorKindMapping = {
  code: UserFacingErrorCode;
  title: string;
  hint?: string;
  next?: string;
};

// =============================================================================
// ERROR MAPPING
// =============================================================================

const ERROR_KIND_MAPPINGS: Array<[new (...args: never[]) => Error, ErrorKindMapping]> = [
  [
    ConfigError,
    {
      code: USER_FACING_ERROR_CODES.config,
      title: "Release config invalid.",
      hint: "Check .shipwright/config.yaml.",
    },
  ],
  [
    ResolutionError,
    {
      code: USER_FACING_ERROR_CODES.resolution,
      title: "Base tag could not be resolved.",
      hint: "Fetch tags (git fetch --tags) and make sure the last stable tag points to a commit.",
    },
  ],
  [
    AttributionError,
    {
      code: USER_FACING_ERROR_CODES.attribution,
      title: "Commit history could not be attributed.",
    },
  ],
  [
    PolicyError,
    {
      code: USER_FACING_ERROR_CODES.policy,
      title: "Nothing to release.",
      hint: "The primary package has no commits since the last stable tag.",
    },
  ],
  [
    ManifestError,
    {
      code: USER_FACING_ERROR_CODES.manifest,
      title: "Manifest update failed.",
      hint: "Fix the manifest and rerun; nothing was tagged.",
    },
  ],
  [
    CommitError,
    {
      code: USER_FACING_ERROR_CODES.commit,
      title: "Release commit failed.",
      hint: "Manifests and changelogs are modified but uncommitted. Inspect with git status.",
    },
  ],
  [
    IdempotencyError,
    {
      code: USER_FACING_ERROR_CODES.idempotency,
      title: "Candidate tag already exists.",
      hint: "A previous run already cut this candidate.",
      next: "Resume an interrupted upload with: shipwright upload <tag>",
    },
  ],
  [
    PackagingError,
    {
      code: USER_FACING_ERROR_CODES.packaging,
      title: "Packaging failed.",
      hint: "The candidate tag stays in place; remove it manually before rerunning.",
    },
  ],
  [
    ValidationError,
    {
      code: USER_FACING_ERROR_CODES.validation,
      title: "Packaged artifacts do not match the release plan.",
      hint: "Nothing was uploaded.",
    },
  ],
  [
    ReleaseHostError,
    {
      code: USER_FACING_ERROR_CODES.releaseHost,
      title: "GitHub release request failed.",
      hint: "Check SHIPWRIGHT_GITHUB_TOKEN and its repository permissions.",
    },
  ],
  [
    UploadError,
    {
      code: USER_FACING_ERROR_CODES.upload,
      title: "Asset upload failed.",
      next: "Resume with: shipwright upload <tag>",
    },
  ],
  [
    GitError,
    {
      code: USER_FACING_ERROR_CODES.git,
      title: "Git command failed.",
    },
  ],
];

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof Error) {
    const match = ERROR_KIND_MAPPINGS.find(([ctor]) => error instanceof ctor);
    if (match) {
      const mapping = match[1];
      return new UserFacingError({ ...mapping, message: formatErrorMessage(error), cause: error });
    }
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "Unexpected error",
    message: formatErrorMessage(error),
    cause: error,
  });
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const userError = toUserFacingError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: userError.title }];

  const message = userError.message.trim();
  if (message.length > 0 && message !== userError.title.trim()) {
    lines.push({ kind: "message", text: message });
  }
  if (userError.hint) lines.push({ kind: "hint", text: userError.hint });
  if (userError.next) lines.push({ kind: "next", text: userError.next });

  if (mode === "debug") {
    lines.push({ kind: "code", text: userError.code });

    const origin = userError.cause instanceof Error ? userError.cause : userError;
    lines.push({ kind: "name", text: origin.name });

    const nested = origin instanceof Error && "cause" in origin ? origin.cause : undefined;
    if (nested !== undefined && nested !== null) {
      const causeText = formatErrorMessage(nested);
      if (causeText !== message) {
        lines.push({ kind: "cause", text: causeText });
      }
    }

    if (origin.stack) {
      lines.push({ kind: "stack", text: origin.stack });
    }
  }

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    return message.length > 0 ? message : error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  if (error && typeof error === "object" && "message" in error) {
    const value = error.message;
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
  }

  return String(error);
}

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

const LINE_STYLES: Record<ErrorFormatLineKind, AnsiStyle[]> = {
  title: ["bold", "red"],
  message: [],
  hint: ["yellow"],
  next: ["cyan"],
  code: ["dim"],
  name: ["dim"],
  cause: ["dim"],
  stack: ["dim"],
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(
  options: { stream?: { isTTY?: boolean }; useColor?: boolean } = {},
): boolean {
  const isTty = Boolean((options.stream ?? process.stderr).isTTY);
  return options.useColor === undefined ? isTty : options.useColor && isTty;
}

export function renderErrorLines(lines: ErrorFormatLine[], format: AnsiFormatter): string[] {
  return lines.map((line) => {
    const label = line.kind === "hint" ? "Hint: " : line.kind === "next" ? "Next: " : "";
    return format(`${label}${line.text}`, LINE_STYLES[line.kind]);
  });
}
