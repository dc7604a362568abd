import path from "node:path";

import fse from "fs-extra";

import {
  DependencyProblemError,
  describeDependencyProblem,
  type DependencyResolver,
} from "./dependency-solver.js";
import { decodeEnvelope } from "./envelope.js";
import {
  BrokenReferenceToExternalFileError,
  CorruptedSessionError,
  IncompatibleJobError,
  IncompatibleSessionError,
  SessionResumeError,
} from "./errors.js";
import type { Job } from "./job.js";
import { createDiskResult, createMemoryResult, type JobResult } from "./job-result.js";
import { logSessionWarning, silentLogger, type EventLogger } from "./logger.js";
import type { ResourceParser } from "./resource.js";
import {
  SessionDocumentSchemas,
  validateDocument,
  type MetadataRepr,
  type ResultRepr,
  type SessionRepr,
} from "./session-format.js";
import { SessionMetadata } from "./session-metadata.js";
import { SessionState } from "./session-state.js";

// =============================================================================
// TYPES
// =============================================================================

export type ResumeOptions = {
  /** Directory the session is stored in; relative and rewritten log paths resolve against it. */
  location?: string;
  checkReferences?: boolean;
  /** Implies `checkReferences`. */
  rewriteLegacyPaths?: boolean;
  ignoreChecksum?: boolean;
  logger?: EventLogger;
  resolver?: DependencyResolver;
  resourceParser?: ResourceParser;
};

/**
 * Runs after the fresh session is built and before any result is replayed.
 * Returning a session replaces the one being restored.
 */
export type EarlyResumeCallback = (session: SessionState) => SessionState | void;

export type SessionPeek = {
  version: number;
  metadata: SessionMetadata;
};

type ResumeContext = {
  location: string | null;
  checkReferences: boolean;
  rewriteLegacyPaths: boolean;
  ignoreChecksum: boolean;
  logger: EventLogger;
};

type LogPathResolver = (stored: string, ctx: ResumeContext) => string;

/** One per format version; later versions delegate to earlier ones. */
interface SessionDecoder {
  readonly version: number;
  validate(document: unknown): SessionRepr;
  restoreMetadata(metadata: SessionMetadata, repr: SessionRepr): void;
  restoreJobsAndResults(session: SessionState, repr: SessionRepr, ctx: ResumeContext): void;
  restoreJobList(session: SessionState, repr: SessionRepr): void;
}

export const CURRENT_SESSION_VERSION = 6;

// =============================================================================
// DECODERS
// =============================================================================

const v1Decoder: SessionDecoder = {
  version: 1,
  validate: (document) => validateDocument(SessionDocumentSchemas[1], document).session,
  restoreMetadata: restoreBaseMetadata,
  restoreJobsAndResults: (session, repr, ctx) =>
    restoreJobsAndResults(session, repr, ctx, storedLogPath),
  restoreJobList: (session, repr) => restoreDesiredJobList(session, repr),
};

const v2Decoder: SessionDecoder = {
  ...v1Decoder,
  version: 2,
  validate: (document) => validateDocument(SessionDocumentSchemas[2], document).session,
  restoreMetadata(metadata, repr) {
    v1Decoder.restoreMetadata(metadata, repr);
    const blob = repr.metadata.app_blob ?? null;
    metadata.appBlob = blob === null ? null : Buffer.from(blob, "base64");
  },
};

const v3Decoder: SessionDecoder = {
  ...v2Decoder,
  version: 3,
  validate: (document) => validateDocument(SessionDocumentSchemas[3], document).session,
  restoreMetadata(metadata, repr) {
    v2Decoder.restoreMetadata(metadata, repr);
    metadata.appId = repr.metadata.app_id ?? null;
  },
};

const v4Decoder: SessionDecoder = {
  ...v3Decoder,
  version: 4,
  validate: (document) => validateDocument(SessionDocumentSchemas[4], document).session,
};

const v5Decoder: SessionDecoder = {
  ...v4Decoder,
  version: 5,
  validate: (document) => validateDocument(SessionDocumentSchemas[5], document).session,
  restoreJobsAndResults: (session, repr, ctx) =>
    restoreJobsAndResults(session, repr, ctx, locationRelativeLogPath),
};

const v6Decoder: SessionDecoder = {
  ...v5Decoder,
  version: 6,
  validate: (document) => validateDocument(SessionDocumentSchemas[6], document).session,
  restoreJobList(session, repr) {
    const mandatory = (repr.mandatory_job_list ?? []).map((id) =>
      lookupJob(session, id, "mandatory_job_list"),
    );
    session.updateMandatoryJobList(mandatory);
    v5Decoder.restoreJobList(session, repr);
  },
};

const DECODERS: ReadonlyMap<number, SessionDecoder> = new Map(
  [v1Decoder, v2Decoder, v3Decoder, v4Decoder, v5Decoder, v6Decoder].map((decoder) => [
    decoder.version,
    decoder,
  ]),
);

export const SUPPORTED_SESSION_VERSIONS: readonly number[] = [...DECODERS.keys()];

// =============================================================================
// RESUME HELPER
// =============================================================================

/**
 * Rebuilds sessions from envelopes against the current job catalog.
 *
 * Persisted data never defines jobs; it only selects them and carries their
 * results. Any validation failure aborts the whole resume.
 */
export class SessionResumeHelper {
  constructor(
    private readonly jobs: readonly Job[],
    private readonly options: ResumeOptions = {},
  ) {}

  resume(data: Uint8Array, earlyCallback?: EarlyResumeCallback): SessionState {
    const document = decodeEnvelope(data);
    const decoder = selectDecoder(document);
    const repr = decoder.validate(document);
    const ctx = this.context();

    let session = new SessionState(this.jobs, {
      logger: ctx.logger,
      resolver: this.options.resolver,
      resourceParser: this.options.resourceParser,
    });
    const replacement = earlyCallback?.(session);
    if (replacement) {
      session = replacement;
    }

    decoder.restoreJobsAndResults(session, repr, ctx);
    decoder.restoreMetadata(session.metadata, repr);
    decoder.restoreJobList(session, repr);
    trimUnreferencedJobs(session, repr);
    return session;
  }

  /** Reads the version and metadata without rebuilding the session. */
  peek(data: Uint8Array): SessionPeek {
    const document = decodeEnvelope(data);
    const decoder = selectDecoder(document);
    const repr = decoder.validate(document);
    const metadata = new SessionMetadata();
    decoder.restoreMetadata(metadata, repr);
    return { version: decoder.version, metadata };
  }

  private context(): ResumeContext {
    const rewriteLegacyPaths = this.options.rewriteLegacyPaths ?? false;
    return {
      location: this.options.location ?? null,
      checkReferences: rewriteLegacyPaths || (this.options.checkReferences ?? false),
      rewriteLegacyPaths,
      ignoreChecksum: this.options.ignoreChecksum ?? false,
      logger: this.options.logger ?? silentLogger,
    };
  }
}

// =============================================================================
// VERSION DISPATCH
// =============================================================================

function selectDecoder(document: unknown): SessionDecoder {
  if (typeof document !== "object" || document === null || Array.isArray(document)) {
    throw new CorruptedSessionError("Session document is not an object");
  }
  if (!("version" in document) || document.version === undefined) {
    throw new CorruptedSessionError('Missing value for key "version"', "version");
  }

  const { version } = document;
  if (typeof version !== "number" || !Number.isInteger(version)) {
    throw new CorruptedSessionError(
      `Value of key "version" is of incorrect type ${version === null ? "null" : typeof version}`,
      "version",
    );
  }

  const decoder = DECODERS.get(version);
  if (!decoder) {
    throw new IncompatibleSessionError(`Unsupported session format version ${version}`, version);
  }
  return decoder;
}

// =============================================================================
// JOBS AND RESULTS
// =============================================================================

function restoreJobsAndResults(
  session: SessionState,
  repr: SessionRepr,
  ctx: ResumeContext,
  resolveLogPath: LogPathResolver,
): void {
  const ids = [...new Set([...Object.keys(repr.jobs), ...Object.keys(repr.results)])].sort();

  // Ids that are not in the session yet may belong to jobs a local job
  // produces while an earlier id is replayed; retry them until a round
  // makes no progress.
  let leftover = ids.filter((id) => !restoreJob(session, repr, id, ctx, resolveLogPath));
  while (leftover.length > 0) {
    const remaining = leftover.filter((id) => !restoreJob(session, repr, id, ctx, resolveLogPath));
    if (remaining.length === leftover.length) {
      throw new CorruptedSessionError(`Unknown jobs remaining: ${remaining.join(", ")}`);
    }
    leftover = remaining;
  }
}

/** Returns false when the job is not (yet) part of the session. */
function restoreJob(
  session: SessionState,
  repr: SessionRepr,
  jobId: string,
  ctx: ResumeContext,
  resolveLogPath: LogPathResolver,
): boolean {
  if (!Object.hasOwn(repr.jobs, jobId)) {
    const field = `session.jobs.${jobId}`;
    throw new CorruptedSessionError(`Missing value for key ${JSON.stringify(field)}`, field);
  }
  const checksum = repr.jobs[jobId];

  const job = session.findJob(jobId);
  if (!job) {
    return false;
  }

  if (job.checksum !== checksum) {
    if (!ctx.ignoreChecksum) {
      throw new IncompatibleJobError(`Definition of job ${JSON.stringify(jobId)} has changed`, jobId);
    }
    logSessionWarning(ctx.logger, "resume.checksum_drift", {
      jobId,
      stored_checksum: checksum,
      current_checksum: job.checksum,
    });
  }

  const results = Object.hasOwn(repr.results, jobId) ? repr.results[jobId] : [];
  for (const resultRepr of results) {
    session.updateJobResult(job, buildResult(resultRepr, ctx, resolveLogPath));
  }
  return true;
}

function buildResult(repr: ResultRepr, ctx: ResumeContext, resolveLogPath: LogPathResolver): JobResult {
  const fields = {
    outcome: repr.outcome,
    comments: repr.comments,
    returnCode: repr.return_code,
    executionDuration: repr.execution_duration,
  };

  if (repr.io_log_filename !== undefined) {
    const resolved = resolveLogPath(repr.io_log_filename, ctx);
    return createDiskResult({ ...fields, ioLogFilename: checkReference(resolved, ctx) });
  }

  return createMemoryResult({
    ...fields,
    ioLog: (repr.io_log ?? []).map(([delay, stream, data]) => ({
      delay,
      stream,
      data: Buffer.from(data, "base64"),
    })),
  });
}

// =============================================================================
// LOG PATHS
// =============================================================================

function storedLogPath(stored: string): string {
  return stored;
}

function locationRelativeLogPath(stored: string, ctx: ResumeContext): string {
  if (path.isAbsolute(stored)) {
    return stored;
  }
  if (ctx.location === null) {
    throw new SessionResumeError(
      `Cannot resolve relative IO log path ${JSON.stringify(stored)} without a session location`,
    );
  }
  return path.resolve(ctx.location, stored);
}

function checkReference(filePath: string, ctx: ResumeContext): string {
  if (!ctx.checkReferences || fse.pathExistsSync(filePath)) {
    return filePath;
  }

  if (ctx.rewriteLegacyPaths && ctx.location !== null) {
    const rewritten = rewriteLegacyPath(filePath, ctx.location);
    if (rewritten !== null && fse.pathExistsSync(rewritten)) {
      logSessionWarning(ctx.logger, "resume.path_rewritten", { from: filePath, to: rewritten });
      return rewritten;
    }
  }

  throw new BrokenReferenceToExternalFileError(
    `Session refers to missing IO log ${JSON.stringify(filePath)}`,
    filePath,
  );
}

const IO_LOGS_SEGMENT = "io-logs/";

/** Moves a log path recorded under an older session directory into `location`. */
export function rewriteLegacyPath(stored: string, location: string): string | null {
  const normalized = stored.split(path.sep).join("/");
  const index = normalized.lastIndexOf(IO_LOGS_SEGMENT);
  if (index < 0 || (index > 0 && normalized[index - 1] !== "/")) {
    return null;
  }
  return path.join(location, "io-logs", normalized.slice(index + IO_LOGS_SEGMENT.length));
}

// =============================================================================
// METADATA AND JOB LISTS
// =============================================================================

function restoreBaseMetadata(metadata: SessionMetadata, repr: SessionRepr): void {
  const fields: MetadataRepr = repr.metadata;
  metadata.title = fields.title;
  metadata.flags = new Set(fields.flags);
  metadata.runningJobName = fields.running_job_name;
}

function restoreDesiredJobList(session: SessionState, repr: SessionRepr): void {
  const desired = repr.desired_job_list.map((id) => lookupJob(session, id, "desired_job_list"));
  const problems = session.updateDesiredJobList(desired);
  const [problem] = problems;
  if (problem) {
    throw new CorruptedSessionError(
      `Stored job selection cannot be resolved: ${describeDependencyProblem(problem)}`,
      "session.desired_job_list",
      new DependencyProblemError(problem),
    );
  }
}

function lookupJob(session: SessionState, jobId: string, listName: string): Job {
  const job = session.findJob(jobId);
  if (!job) {
    throw new CorruptedSessionError(
      `'${listName}' refers to unknown job ${JSON.stringify(jobId)}`,
      `session.${listName}`,
    );
  }
  return job;
}

function trimUnreferencedJobs(session: SessionState, repr: SessionRepr): void {
  const referenced = new Set([...Object.keys(repr.jobs), ...Object.keys(repr.results)]);
  const onRunList = new Set(session.runList.map((job) => job.id));
  session.trimJobList((job) => !referenced.has(job.id) && !onRunList.has(job.id));
}
