import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogLevel = "debug" | "info" | "warn";

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  level: LogLevel;
  session_id?: string;
  job_id?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  level?: LogLevel;
  sessionId?: string;
  jobId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  sessionId?: string;
  jobId?: string;
};

export interface EventLogger {
  log(event: LogEventInput): void;
}

// =============================================================================
// LOGGERS
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(`Warning: failed to close log file ${this.filePath}: ${formatErrorMessage(err)}`);
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(
        `Warning: failed to write log event to ${this.filePath}: ${formatErrorMessage(err)}`,
      );
    }
  }
}

// Writes warnings (and, when verbose, everything else) to stderr as JSON lines.
export class ConsoleLogger implements EventLogger {
  constructor(
    private readonly opts: { verbose?: boolean } & EventDefaults = {},
  ) {}

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.opts);
    if (normalized.level !== "warn" && !this.opts.verbose) return;
    console.warn(JSON.stringify(normalized));
  }
}

export const silentLogger: EventLogger = {
  log: () => undefined,
};

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { sessionId, jobId, payload, ts, type, level } = event;

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ts: normalizedTs,
    type,
    level: level ?? "info",
  };

  const resolvedSessionId = sessionId ?? defaults.sessionId;
  const resolvedJobId = jobId ?? defaults.jobId;
  if (resolvedSessionId) {
    result.session_id = resolvedSessionId;
  }
  if (resolvedJobId) {
    result.job_id = resolvedJobId;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logSessionEvent(
  logger: EventLogger,
  type: string,
  fields: JsonObject & { jobId?: string; level?: LogLevel } = {},
): void {
  const { jobId, level, ...payload } = fields;
  const event: LogEventInput = { type, payload };

  if (jobId !== undefined) {
    event.jobId = jobId;
  }
  if (level !== undefined) {
    event.level = level;
  }

  logger.log(event);
}

export function logSessionWarning(
  logger: EventLogger,
  type: string,
  fields: JsonObject & { jobId?: string } = {},
): void {
  logSessionEvent(logger, type, { ...fields, level: "warn" });
}
