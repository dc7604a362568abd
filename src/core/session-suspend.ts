import path from "node:path";

import { encodeEnvelope } from "./envelope.js";
import type { JobResult } from "./job-result.js";
import type { SessionMetadata } from "./session-metadata.js";
import { CURRENT_SESSION_VERSION } from "./session-resume.js";
import type { SessionState } from "./session-state.js";

// =============================================================================
// TYPES
// =============================================================================

type ResultDocument = {
  outcome: string | null;
  comments: string | null;
  return_code: number | null;
  execution_duration: number | null;
  io_log?: Array<[number, string, string]>;
  io_log_filename?: string;
};

type MetadataDocument = {
  title: string | null;
  flags: string[];
  running_job_name: string | null;
  app_blob: string | null;
  app_id: string | null;
};

export type SessionDocument = {
  version: number;
  session: {
    jobs: Record<string, string>;
    results: Record<string, ResultDocument[]>;
    desired_job_list: string[];
    mandatory_job_list: string[];
    metadata: MetadataDocument;
  };
};

export type SuspendOptions = {
  /** Disk logs stored below this directory are recorded relative to it. */
  location?: string;
};

// =============================================================================
// SUSPEND HELPER
// =============================================================================

/** Writes sessions in the newest envelope format. */
export class SessionSuspendHelper {
  suspend(session: SessionState, opts: SuspendOptions = {}): Buffer {
    return encodeEnvelope(this.represent(session, opts));
  }

  represent(session: SessionState, opts: SuspendOptions = {}): SessionDocument {
    const selected = new Set(
      [...session.runList, ...session.desiredJobList, ...session.mandatoryJobList].map(
        (job) => job.id,
      ),
    );

    const jobs: Record<string, string> = {};
    const results: Record<string, ResultDocument[]> = {};
    for (const state of session.jobStateMap.values()) {
      if (state.result !== null) {
        results[state.job.id] = [representResult(state.result, opts.location)];
      } else if (!selected.has(state.job.id)) {
        continue;
      }
      jobs[state.job.id] = state.job.checksum;
    }

    return {
      version: CURRENT_SESSION_VERSION,
      session: {
        jobs,
        results,
        desired_job_list: session.desiredJobList.map((job) => job.id),
        mandatory_job_list: session.mandatoryJobList.map((job) => job.id),
        metadata: representMetadata(session.metadata),
      },
    };
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function representResult(result: JobResult, location: string | undefined): ResultDocument {
  const base = {
    outcome: result.outcome,
    comments: result.comments,
    return_code: result.returnCode,
    execution_duration: result.executionDuration,
  };

  switch (result.kind) {
    case "memory":
      return {
        ...base,
        io_log: result.ioLog.map((record): [number, string, string] => [
          record.delay,
          record.stream,
          record.data.toString("base64"),
        ]),
      };
    case "disk":
      return { ...base, io_log_filename: storedLogPath(result.ioLogFilename, location) };
  }
}

function storedLogPath(filePath: string, location: string | undefined): string {
  if (location === undefined) {
    return filePath;
  }
  const relative = path.relative(location, filePath);
  if (relative.length === 0 || relative.startsWith("..") || path.isAbsolute(relative)) {
    return filePath;
  }
  return relative;
}

function representMetadata(metadata: SessionMetadata): MetadataDocument {
  return {
    title: metadata.title,
    flags: [...metadata.flags].sort(),
    running_job_name: metadata.runningJobName,
    app_blob: metadata.appBlob === null ? null : metadata.appBlob.toString("base64"),
    app_id: metadata.appId,
  };
}
