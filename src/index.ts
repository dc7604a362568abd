export { loadJobCatalog, type CatalogIssue, type CatalogLoadResult } from "./core/catalog-loader.js";
export { CertrunConfigSchema, type CertrunConfig } from "./core/config.js";
export { loadCertrunConfig, loadConfigForCli, resolveConfigPath } from "./core/config-loader.js";
export {
  DependencyProblemError,
  depthFirstSolver,
  describeDependencyProblem,
  type DependencyProblem,
  type DependencyResolver,
  type ResolveOutcome,
} from "./core/dependency-solver.js";
export { decodeEnvelope, encodeEnvelope } from "./core/envelope.js";
export {
  BrokenReferenceToExternalFileError,
  CatalogError,
  CertrunError,
  ConfigError,
  CorruptedSessionError,
  IncompatibleJobError,
  IncompatibleSessionError,
  ResourceProgramError,
  SessionResumeError,
  SessionStateError,
} from "./core/errors.js";
export {
  createChildJob,
  createJob,
  isAutomatedPlugin,
  isSameJob,
  type Job,
  type JobDefinition,
  type PluginKind,
} from "./core/job.js";
export {
  createDiskResult,
  createMemoryResult,
  ioLogFromText,
  readIOLogFile,
  writeIOLogFile,
  type IOLogRecord,
  type JobOutcome,
  type JobResult,
} from "./core/job-result.js";
export { JobState, describeInhibitor, type ReadinessInhibitor } from "./core/job-state.js";
export { ConsoleLogger, JsonlLogger, silentLogger, type EventLogger } from "./core/logger.js";
export {
  parseResourceText,
  rfc822ResourceParser,
  type ResourceMap,
  type ResourceParser,
  type ResourceRecord,
} from "./core/resource.js";
export { ResourceExpression, ResourceProgram } from "./core/resource-program.js";
export type { JobResultChange, RunListChange } from "./core/session-events.js";
export { SESSION_FLAGS, SessionMetadata } from "./core/session-metadata.js";
export {
  CURRENT_SESSION_VERSION,
  SUPPORTED_SESSION_VERSIONS,
  SessionResumeHelper,
  type EarlyResumeCallback,
  type ResumeOptions,
  type SessionPeek,
} from "./core/session-resume.js";
export {
  SessionState,
  type EstimatedDuration,
  type SessionStateOptions,
} from "./core/session-state.js";
export { SessionStore, type StoredSessionSummary } from "./core/session-store.js";
export { SessionSuspendHelper, type SessionDocument } from "./core/session-suspend.js";
