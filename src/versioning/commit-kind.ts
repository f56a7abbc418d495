/**
 * Commit classification.
 * Purpose: map a conventional-commit subject and body onto a closed set of change kinds.
 * Assumptions: subjects follow "type(scope)!: text" loosely; anything unrecognized is "other".
 * Usage: classifyCommit(subject, message) from the attribution stage.
 */

// =============================================================================
// TYPES
// =============================================================================

export const COMMIT_KINDS = [
  "breaking",
  "feature",
  "fix",
  "performance",
  "refactor",
  "docs",
  "build",
  "chore",
  "other",
] as const;

export type CommitKind = (typeof COMMIT_KINDS)[number];

export type CommitClassification = {
  kind: CommitKind;
  breaking: boolean;
};

// Checked in order; the first prefix the lower-cased type starts with wins.
const TYPE_PREFIXES: ReadonlyArray<readonly [string, CommitKind]> = [
  ["feat", "feature"],
  ["fix", "fix"],
  ["perf", "performance"],
  ["refactor", "refactor"],
  ["docs", "docs"],
  ["build", "build"],
  ["chore", "chore"],
];

const BREAKING_FOOTER = "BREAKING CHANGE:";

// =============================================================================
// PUBLIC API
// =============================================================================

export function classifyCommit(subject: string, message: string): CommitClassification {
  if (isBreaking(subject, message)) {
    return { kind: "breaking", breaking: true };
  }
  return { kind: kindFromType(commitType(subject)), breaking: false };
}

export function isBreaking(subject: string, message: string): boolean {
  if (subject.includes("!:") || subject.includes("(!):")) {
    return true;
  }

  if (/^[A-Za-z]/.test(subject)) {
    if (commitType(subject).endsWith("!")) {
      return true;
    }
  }

  return message.toUpperCase().includes(BREAKING_FOOTER);
}

export function kindFromType(type: string): CommitKind {
  const normalized = type.trim().toLowerCase();
  for (const [prefix, kind] of TYPE_PREFIXES) {
    if (normalized.startsWith(prefix)) return kind;
  }
  return "other";
}

// Text before the first ":"; the whole subject when there is none.
export function commitType(subject: string): string {
  const colon = subject.indexOf(":");
  return colon >= 0 ? subject.slice(0, colon) : subject;
}
