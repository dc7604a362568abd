import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { CertrunError } from "./errors.js";
import type { Job } from "./job.js";
import { writeIOLogFile, type IOLogRecord } from "./job-result.js";
import { JsonlLogger, logSessionEvent, silentLogger, type EventLogger } from "./logger.js";
import {
  SESSION_FILE,
  sessionDir,
  sessionEventLogPath,
  sessionFilePath,
  sessionIOLogsDir,
} from "./paths.js";
import {
  SessionResumeHelper,
  type EarlyResumeCallback,
  type ResumeOptions,
  type SessionPeek,
} from "./session-resume.js";
import type { SessionState } from "./session-state.js";
import { SessionSuspendHelper } from "./session-suspend.js";
import { defaultSessionId } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type StoredSessionSummary =
  | {
      status: "ok";
      id: string;
      location: string;
      modifiedAt: string;
      version: number;
      title: string | null;
      flags: string[];
      runningJobName: string | null;
      appId: string | null;
    }
  | {
      status: "unreadable";
      id: string;
      location: string;
      modifiedAt: string;
      error: string;
    };

export type StoreResumeOptions = Omit<ResumeOptions, "location" | "logger">;

const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

// =============================================================================
// STORE
// =============================================================================

/**
 * Keeps each session in `<root>/<id>/`: the envelope in `session` and disk
 * IO logs in `io-logs/`.
 */
export class SessionStore {
  private readonly suspendHelper = new SessionSuspendHelper();
  private readonly logger: EventLogger;

  constructor(
    public readonly root: string,
    opts: { logger?: EventLogger } = {},
  ) {
    this.logger = opts.logger ?? silentLogger;
  }

  location(sessionId: string): string {
    assertSessionId(sessionId);
    return sessionDir(this.root, sessionId);
  }

  async exists(sessionId: string): Promise<boolean> {
    return fse.pathExists(sessionFilePath(this.root, checkedId(sessionId)));
  }

  /** Creates an empty session directory and returns its id. */
  async create(sessionId: string = defaultSessionId()): Promise<string> {
    const location = this.location(sessionId);
    if (await fse.pathExists(location)) {
      throw new CertrunError(`Session ${sessionId} already exists at ${location}`);
    }
    await fse.ensureDir(sessionIOLogsDir(this.root, sessionId));
    logSessionEvent(this.logger, "session.created", { session: sessionId, location });
    return sessionId;
  }

  async save(sessionId: string, session: SessionState): Promise<void> {
    const location = this.location(sessionId);
    const data = this.suspendHelper.suspend(session, { location });
    await writeFileAtomic(sessionFilePath(this.root, sessionId), data);
    logSessionEvent(this.logger, "session.saved", { session: sessionId, bytes: data.length });
  }

  async read(sessionId: string): Promise<Buffer> {
    const filePath = sessionFilePath(this.root, checkedId(sessionId));
    if (!(await fse.pathExists(filePath))) {
      throw new CertrunError(`Session ${sessionId} not found under ${this.root}`);
    }
    return fse.readFile(filePath);
  }

  async resume(
    sessionId: string,
    jobs: readonly Job[],
    opts: StoreResumeOptions = {},
    earlyCallback?: EarlyResumeCallback,
  ): Promise<SessionState> {
    const data = await this.read(sessionId);
    const helper = new SessionResumeHelper(jobs, {
      ...opts,
      location: this.location(sessionId),
      logger: this.logger,
    });
    return helper.resume(data, earlyCallback);
  }

  async peek(sessionId: string): Promise<SessionPeek> {
    const data = await this.read(sessionId);
    return new SessionResumeHelper([]).peek(data);
  }

  /**
   * Writes a job's IO log under the session and returns its path. The file
   * name is the percent-encoded job id, so distinct ids never share a file.
   */
  async writeIOLog(
    sessionId: string,
    jobId: string,
    records: readonly IOLogRecord[],
  ): Promise<string> {
    const filePath = path.join(
      sessionIOLogsDir(this.root, checkedId(sessionId)),
      `${encodeURIComponent(jobId)}.record.gz`,
    );
    await writeIOLogFile(filePath, records);
    return filePath;
  }

  /** Append-only JSONL log kept next to the session; the caller closes it. */
  openEventLog(sessionId: string): JsonlLogger {
    return new JsonlLogger(sessionEventLogPath(this.root, checkedId(sessionId)), { sessionId });
  }

  async list(): Promise<StoredSessionSummary[]> {
    if (!(await fse.pathExists(this.root))) return [];

    const entries = await fs.readdir(this.root, { withFileTypes: true });
    const summaries: StoredSessionSummary[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory() || !SESSION_ID_PATTERN.test(entry.name)) continue;

      const location = path.join(this.root, entry.name);
      const filePath = path.join(location, SESSION_FILE);
      if (!(await fse.pathExists(filePath))) continue;

      const stat = await fse.stat(filePath);
      const modifiedAt = stat.mtime.toISOString();
      try {
        const { version, metadata } = new SessionResumeHelper([]).peek(
          await fse.readFile(filePath),
        );
        summaries.push({
          status: "ok",
          id: entry.name,
          location,
          modifiedAt,
          version,
          title: metadata.title,
          flags: [...metadata.flags].sort(),
          runningJobName: metadata.runningJobName,
          appId: metadata.appId,
        });
      } catch (err) {
        summaries.push({
          status: "unreadable",
          id: entry.name,
          location,
          modifiedAt,
          error: formatErrorMessage(err),
        });
      }
    }

    summaries.sort((a, b) => b.modifiedAt.localeCompare(a.modifiedAt) || a.id.localeCompare(b.id));
    return summaries;
  }

  /** Returns false when there was nothing to remove. */
  async remove(sessionId: string): Promise<boolean> {
    const location = this.location(sessionId);
    if (!(await fse.pathExists(location))) return false;
    await fse.remove(location);
    logSessionEvent(this.logger, "session.removed", { session: sessionId });
    return true;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function assertSessionId(sessionId: string): void {
  if (!SESSION_ID_PATTERN.test(sessionId)) {
    throw new CertrunError(`Invalid session id: ${JSON.stringify(sessionId)}`);
  }
}

function checkedId(sessionId: string): string {
  assertSessionId(sessionId);
  return sessionId;
}

async function writeFileAtomic(filePath: string, data: Buffer): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));

  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(data);
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw err;
  }
}
