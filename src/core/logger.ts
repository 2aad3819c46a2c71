import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEventInput = {
  type: string;
  payload?: JsonObject;
};

export type LogEvent = {
  ts: string;
  type: string;
  session_id?: string;
  payload?: JsonObject;
};

/** Minimal sink the station and parameter modules write events to. */
export type EventLogger = {
  log(event: LogEventInput): void;
};

// =============================================================================
// JSONL LOGGER
// =============================================================================

/**
 * Appends one JSON event per line. The directory is created on first write so
 * constructing a logger never touches the filesystem.
 */
export class JsonlLogger implements EventLogger {
  private ensuredDir = false;

  constructor(
    readonly filePath: string,
    private readonly context: { sessionId?: string } = {},
  ) {}

  log(event: LogEventInput): void {
    const record: LogEvent = { ts: isoNow(), type: event.type };
    if (this.context.sessionId) record.session_id = this.context.sessionId;
    if (event.payload) record.payload = event.payload;

    if (!this.ensuredDir) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.ensuredDir = true;
    }
    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}

/** Keeps events in memory; used by tests and by callers that never persist logs. */
export class MemoryLogger implements EventLogger {
  readonly events: LogEventInput[] = [];

  log(event: LogEventInput): void {
    this.events.push(event);
  }

  ofType(type: string): LogEventInput[] {
    return this.events.filter((event) => event.type === type);
  }
}

export function logSessionEvent(
  logger: EventLogger | undefined,
  type: string,
  payload?: JsonObject,
): void {
  logger?.log(payload ? { type, payload } : { type });
}

export function toJsonValue(value: unknown): JsonValue {
  if (value === undefined) return null;
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item));
  }
  if (typeof value === "object") {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = toJsonValue(item);
    }
    return out;
  }
  return String(value);
}
