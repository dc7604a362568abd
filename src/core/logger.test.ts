import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  ConsoleLogger,
  JsonlLogger,
  eventWithTs,
  logSessionEvent,
  logSessionWarning,
} from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function makeLogPath(name = "events.jsonl"): string {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
  return path.join(tmpDir, name);
}

function readEvents(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));
}

describe("JsonlLogger", () => {
  it("writes events with session and job metadata", () => {
    const logPath = path.join(path.dirname(makeLogPath()), "nested", "events.jsonl");
    const logger = new JsonlLogger(logPath, { sessionId: "session-1", jobId: "audio/playback" });

    logger.log({ type: "job.started", payload: { message: "hello" } });
    logger.close();

    const events = readEvents(logPath);
    expect(events).toHaveLength(1);
    expect(events[0].type).toBe("job.started");
    expect(events[0].level).toBe("info");
    expect(events[0].session_id).toBe("session-1");
    expect(events[0].job_id).toBe("audio/playback");
    expect(events[0].payload).toEqual({ message: "hello" });
    expect(new Date(String(events[0].ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const logPath = makeLogPath();
    const logger = new JsonlLogger(logPath, { sessionId: "session-2" });

    logger.log({ type: "first", payload: { order: 1 } });
    logger.log({ type: "second", payload: { order: 2 } });
    logger.close();

    const events = readEvents(logPath);
    expect(events.map((e) => e.type)).toEqual(["first", "second"]);
    expect(events.map((e) => e.payload)).toEqual([{ order: 1 }, { order: 2 }]);
  });

  it("logs session helpers with the job id hoisted", () => {
    const logPath = makeLogPath();
    const logger = new JsonlLogger(logPath, { sessionId: "session-3" });

    logSessionEvent(logger, "job.added", { jobId: "gen/one", via: "gen" });
    logSessionWarning(logger, "resume.checksum_drift", { jobId: "a", stored_checksum: "abc" });
    logger.close();

    const [added, drift] = readEvents(logPath);
    expect(added).toMatchObject({
      type: "job.added",
      level: "info",
      session_id: "session-3",
      job_id: "gen/one",
      payload: { via: "gen" },
    });
    expect(drift).toMatchObject({
      type: "resume.checksum_drift",
      level: "warn",
      job_id: "a",
      payload: { stored_checksum: "abc" },
    });
  });

  it("warns on write failures with formatted messages", () => {
    const logPath = makeLogPath();
    const logger = new JsonlLogger(logPath, { sessionId: "session-4" });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "job.started" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
  });

  it("ignores events after close", () => {
    const logPath = makeLogPath();
    const logger = new JsonlLogger(logPath);

    logger.log({ type: "kept" });
    logger.close();
    logger.log({ type: "dropped" });
    logger.close();

    expect(readEvents(logPath).map((e) => e.type)).toEqual(["kept"]);
  });
});

describe("ConsoleLogger", () => {
  it("prints only warnings unless verbose", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ sessionId: "s" });

    logger.log({ type: "job.added", ts: "2026-01-01T00:00:00.000Z" });
    logger.log({ type: "local.job_discarded", level: "warn", ts: "2026-01-01T00:00:00.000Z" });

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      '{"ts":"2026-01-01T00:00:00.000Z","type":"local.job_discarded","level":"warn","session_id":"s"}',
    );
  });

  it("prints everything when verbose", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ verbose: true });

    logger.log({ type: "job.added" });

    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});

describe("eventWithTs", () => {
  it("merges defaults and payload", () => {
    const event = eventWithTs(
      { type: "sample", payload: { key: "value" }, jobId: "j-1" },
      { sessionId: "session-x" },
    );

    expect(event.session_id).toBe("session-x");
    expect(event.job_id).toBe("j-1");
    expect(event.type).toBe("sample");
    expect(event.payload).toEqual({ key: "value" });
  });

  it("normalizes dates and omits empty payloads", () => {
    const event = eventWithTs({ type: "sample", payload: {}, ts: new Date(0) });

    expect(event).toEqual({ ts: "1970-01-01T00:00:00.000Z", type: "sample", level: "info" });
  });
});
