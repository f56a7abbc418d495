/*
Purpose: error types for every fatal condition of a release run, plus the user-facing wrapper the CLI prints.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new PolicyError("..."); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class ReleaseError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ReleaseError";
  }
}

export class ConfigError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class ResolutionError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ResolutionError";
  }
}

export class AttributionError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "AttributionError";
  }
}

export class PolicyError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "PolicyError";
  }
}

export class ManifestError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ManifestError";
  }
}

export class CommitError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "CommitError";
  }
}

export class IdempotencyError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "IdempotencyError";
  }
}

export class PackagingError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "PackagingError";
  }
}

export class ValidationError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ValidationError";
  }
}

export class ReleaseHostError extends ReleaseError {
  constructor(
    message: string,
    cause?: unknown,
    public readonly status?: number,
  ) {
    super(message, cause);
    this.name = "ReleaseHostError";
  }
}

export class UploadError extends ReleaseError {
  constructor(
    message: string,
    cause?: unknown,
    public readonly attempts?: number,
  ) {
    super(message, cause);
    this.name = "UploadError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  resolution: "RESOLUTION_ERROR",
  attribution: "ATTRIBUTION_ERROR",
  policy: "POLICY_ERROR",
  manifest: "MANIFEST_ERROR",
  commit: "COMMIT_ERROR",
  idempotency: "IDEMPOTENCY_ERROR",
  packaging: "PACKAGING_ERROR",
  validation: "VALIDATION_ERROR",
  releaseHost: "RELEASE_HOST_ERROR",
  upload: "UPLOAD_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
