// Release run event logging.
// Purpose: append structured events for one run to a JSONL file under the artifact root.
// Assumes a single writer per log file; events are flushed synchronously so a crash keeps the trail.

import path from "node:path";

import fse from "fs-extra";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

export type LoggedEvent = LogEvent & {
  ts: string;
  run_id: string;
};

export interface EventLogger {
  log(event: LogEvent): void;
}

// =============================================================================
// JSONL LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  readonly filePath: string;
  private readonly runId: string;

  constructor(filePath: string, opts: { runId: string }) {
    this.filePath = filePath;
    this.runId = opts.runId;
    fse.ensureDirSync(path.dirname(filePath));
  }

  log(event: LogEvent): void {
    const entry: LoggedEvent = { ts: isoNow(), run_id: this.runId, ...event };
    fse.appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`, "utf8");
  }
}

// =============================================================================
// IN-MEMORY LOGGER
// =============================================================================

export class MemoryLogger implements EventLogger {
  readonly events: LogEvent[] = [];

  log(event: LogEvent): void {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }

  // Hands buffered events to `target` in order and empties the buffer.
  drainTo(target: EventLogger): void {
    for (const event of this.events.splice(0)) {
      target.log(event);
    }
  }
}

export function logEvent(logger: EventLogger, type: string, payload?: JsonObject): void {
  logger.log(payload ? { type, payload } : { type });
}
