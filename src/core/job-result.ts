import path from "node:path";
import { gunzipSync, gzipSync } from "node:zlib";

import fse from "fs-extra";
import { z } from "zod";

import { SessionStateError } from "./errors.js";

// =============================================================================
// ENUMS
// =============================================================================

export const JobOutcomeSchema = z.enum([
  "pass",
  "fail",
  "crash",
  "skip",
  "undecided",
  "not-implemented",
  "not-supported",
]);
export type JobOutcome = z.infer<typeof JobOutcomeSchema>;

export const IOStreamSchema = z.enum(["stdout", "stderr"]);
export type IOStream = z.infer<typeof IOStreamSchema>;

// =============================================================================
// RESULT SHAPES
// =============================================================================

export type IOLogRecord = {
  readonly delay: number;
  readonly stream: IOStream;
  readonly data: Buffer;
};

type JobResultFields = {
  /** `null` means the job did not run. */
  readonly outcome: JobOutcome | null;
  readonly comments: string | null;
  readonly returnCode: number | null;
  readonly executionDuration: number | null;
};

export type MemoryJobResult = JobResultFields & {
  readonly kind: "memory";
  readonly ioLog: readonly IOLogRecord[];
};

export type DiskJobResult = JobResultFields & {
  readonly kind: "disk";
  readonly ioLogFilename: string;
};

export type JobResult = MemoryJobResult | DiskJobResult;

export type JobResultInput = Partial<JobResultFields>;

export function createMemoryResult(
  fields: JobResultInput & { ioLog?: readonly IOLogRecord[] } = {},
): MemoryJobResult {
  return Object.freeze({
    kind: "memory",
    outcome: fields.outcome ?? null,
    comments: fields.comments ?? null,
    returnCode: fields.returnCode ?? null,
    executionDuration: fields.executionDuration ?? null,
    ioLog: Object.freeze([...(fields.ioLog ?? [])]),
  });
}

export function createDiskResult(
  fields: JobResultInput & { ioLogFilename: string },
): DiskJobResult {
  return Object.freeze({
    kind: "disk",
    outcome: fields.outcome ?? null,
    comments: fields.comments ?? null,
    returnCode: fields.returnCode ?? null,
    executionDuration: fields.executionDuration ?? null,
    ioLogFilename: fields.ioLogFilename,
  });
}

export function ioLogFromText(text: string, stream: IOStream = "stdout", delay = 0): IOLogRecord[] {
  return [{ delay, stream, data: Buffer.from(text, "utf8") }];
}

export function hasRun(result: JobResult | null): result is JobResult {
  return result !== null && result.outcome !== null;
}

// =============================================================================
// IO LOGS
// =============================================================================

export function readResultIOLog(result: JobResult): readonly IOLogRecord[] {
  switch (result.kind) {
    case "memory":
      return result.ioLog;
    case "disk":
      return readIOLogFile(result.ioLogFilename);
  }
}

export function stdoutText(records: readonly IOLogRecord[]): string {
  return records
    .filter((record) => record.stream === "stdout")
    .map((record) => record.data.toString("utf8"))
    .join("");
}

const IOLogLineSchema = z.tuple([z.number().nonnegative(), IOStreamSchema, z.string()]);

/** Disk logs are gzip-compressed JSON lines of `[delay, stream, base64]`. */
export function readIOLogFile(filePath: string): IOLogRecord[] {
  const raw = gunzipSync(fse.readFileSync(filePath)).toString("utf8");
  return raw
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line, index) => {
      const parsed = IOLogLineSchema.safeParse(parseJsonLine(line, filePath, index + 1));
      if (!parsed.success) {
        throw new SessionStateError(
          `Invalid IO log record at ${filePath}:${index + 1}`,
          parsed.error,
        );
      }
      const [delay, stream, data] = parsed.data;
      return { delay, stream, data: Buffer.from(data, "base64") };
    });
}

function parseJsonLine(line: string, filePath: string, lineno: number): unknown {
  try {
    return JSON.parse(line);
  } catch (err) {
    throw new SessionStateError(`Invalid IO log record at ${filePath}:${lineno}`, err);
  }
}

export async function writeIOLogFile(
  filePath: string,
  records: readonly IOLogRecord[],
): Promise<void> {
  const lines = records
    .map((record) => JSON.stringify([record.delay, record.stream, record.data.toString("base64")]))
    .join("\n");
  await fse.ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, gzipSync(Buffer.from(lines, "utf8")));
}
