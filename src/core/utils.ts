export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\..+$/, "");
  return stamp.replace("T", "-");
}

export function utcDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

export function toPosixPath(value: string): string {
  return value.split("\\").join("/");
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
