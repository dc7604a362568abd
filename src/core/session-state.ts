import {
  DependencyProblemError,
  depthFirstSolver,
  type DependencyProblem,
  type DependencyResolver,
} from "./dependency-solver.js";
import { formatErrorMessage } from "./error-format.js";
import { SessionStateError } from "./errors.js";
import { createChildJob, isAutomatedPlugin, isSameJob, type Job } from "./job.js";
import { readResultIOLog, stdoutText, type IOLogRecord, type JobResult } from "./job-result.js";
import { JobState } from "./job-state.js";
import { logSessionEvent, logSessionWarning, silentLogger, type EventLogger } from "./logger.js";
import { recomputeReadiness } from "./readiness.js";
import {
  rfc822ResourceParser,
  type ResourceMap,
  type ResourceParser,
  type ResourceRecord,
} from "./resource.js";
import { SessionEvents, type Listener, type JobResultChange, type RunListChange } from "./session-events.js";
import { SessionMetadata } from "./session-metadata.js";

// =============================================================================
// TYPES
// =============================================================================

export type SessionStateOptions = {
  resolver?: DependencyResolver;
  resourceParser?: ResourceParser;
  logger?: EventLogger;
};

export type DurationEstimate = number | "unknown";

export type EstimatedDuration = {
  automated: DurationEstimate;
  manual: DurationEstimate;
};

export const DEFAULT_MANUAL_OVERHEAD_SECONDS = 30;

// =============================================================================
// SESSION STATE
// =============================================================================

/**
 * The mutable state of one testing session: which jobs exist, which the
 * operator wants to run, in what order they can run and what they produced.
 *
 * Every public method runs to completion synchronously and notifies listeners
 * before returning.
 */
export class SessionState {
  readonly metadata = new SessionMetadata();

  private readonly events = new SessionEvents();
  private readonly resolver: DependencyResolver;
  private readonly resourceParser: ResourceParser;
  private readonly logger: EventLogger;

  private readonly jobs: Job[] = [];
  private readonly jobStates = new Map<string, JobState>();
  private readonly resources = new Map<string, readonly ResourceRecord[]>();
  private desired: Job[] = [];
  private mandatory: Job[] = [];
  private runListJobs: Job[] = [];

  constructor(jobs: readonly Job[], options: SessionStateOptions = {}) {
    this.resolver = options.resolver ?? depthFirstSolver;
    this.resourceParser = options.resourceParser ?? rfc822ResourceParser;
    this.logger = options.logger ?? silentLogger;

    for (const job of jobs) {
      const existing = this.jobStates.get(job.id);
      if (existing) {
        if (!isSameJob(existing.job, job)) {
          throw new DependencyProblemError({
            kind: "duplicate",
            affectedJob: existing.job,
            root: existing.job,
            duplicateJob: job,
          });
        }
        continue;
      }
      this.storeJob(job);
    }
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  get jobList(): readonly Job[] {
    return this.jobs;
  }

  get jobStateMap(): ReadonlyMap<string, JobState> {
    return this.jobStates;
  }

  get desiredJobList(): readonly Job[] {
    return this.desired;
  }

  get mandatoryJobList(): readonly Job[] {
    return this.mandatory;
  }

  get runList(): readonly Job[] {
    return this.runListJobs;
  }

  get resourceMap(): ResourceMap {
    return this.resources;
  }

  findJob(jobId: string): Job | undefined {
    return this.jobStates.get(jobId)?.job;
  }

  getJobState(jobId: string): JobState {
    const state = this.jobStates.get(jobId);
    if (!state) {
      throw new SessionStateError(`Unknown job: ${jobId}`);
    }
    return state;
  }

  // ---------------------------------------------------------------------------
  // Listeners
  // ---------------------------------------------------------------------------

  onStateChanged(listener: Listener<void>): () => void {
    return this.events.stateChanged.subscribe(listener);
  }

  onJobAdded(listener: Listener<Job>): () => void {
    return this.events.jobAdded.subscribe(listener);
  }

  onJobRemoved(listener: Listener<Job>): () => void {
    return this.events.jobRemoved.subscribe(listener);
  }

  onJobResultChanged(listener: Listener<JobResultChange>): () => void {
    return this.events.jobResultChanged.subscribe(listener);
  }

  onRunListChanged(listener: Listener<RunListChange>): () => void {
    return this.events.runListChanged.subscribe(listener);
  }

  // ---------------------------------------------------------------------------
  // Selection
  // ---------------------------------------------------------------------------

  /** Takes effect on the next `updateDesiredJobList` call. */
  updateMandatoryJobList(jobs: readonly Job[]): void {
    this.mandatory = dedupeById(jobs.map((job) => this.findJob(job.id) ?? job));
  }

  /**
   * Replaces the desired job list and recomputes the run list.
   *
   * Jobs that cannot be resolved are dropped one at a time until the rest
   * resolves; every problem met on the way is returned.
   */
  updateDesiredJobList(desired: readonly Job[]): DependencyProblem[] {
    const problems: DependencyProblem[] = [];
    let visitList: Job[] = [];

    for (const job of dedupeById([...this.mandatory, ...desired])) {
      const live = this.findJob(job.id);
      if (live) {
        visitList.push(live);
      } else {
        problems.push({ kind: "unknown", affectedJob: job, root: job });
      }
    }

    let runList: Job[] = [];
    for (;;) {
      const outcome = this.resolver.resolve(this.jobs, visitList);
      if (outcome.ok) {
        runList = outcome.runList;
        break;
      }
      const { problem } = outcome;
      problems.push(problem);

      const dropId = visitList.some((job) => job.id === problem.affectedJob.id)
        ? problem.affectedJob.id
        : problem.root.id;
      if (!visitList.some((job) => job.id === dropId)) {
        // The resolver blamed something outside the request; nothing left to drop.
        visitList = [];
        break;
      }
      visitList = visitList.filter((job) => job.id !== dropId);
    }

    const kept = new Set(visitList.map((job) => job.id));
    this.desired = dedupeById(desired)
      .filter((job) => kept.has(job.id))
      .map((job) => this.getJobState(job.id).job);
    this.mandatory = this.mandatory.filter((job) => kept.has(job.id));

    const previous = this.runListJobs;
    this.runListJobs = runList;
    this.recomputeReadiness();

    this.events.stateChanged.emit();
    if (!sameIds(previous, runList)) {
      this.events.runListChanged.emit({ previous, runList });
    }
    return problems;
  }

  // ---------------------------------------------------------------------------
  // Results
  // ---------------------------------------------------------------------------

  updateJobResult(job: Job, result: JobResult): void {
    const state = this.getJobState(job.id);
    const previous = state.result;
    state.result = result;

    let added: Job[] = [];
    switch (state.job.plugin) {
      case "resource":
        this.processResourceResult(state.job, result);
        break;
      case "local":
        added = this.processLocalResult(state.job, result);
        break;
      case "shell":
      case "manual":
      case "user-interact":
      case "user-verify":
      case "user-interact-verify":
      case "attachment":
        break;
    }

    this.recomputeReadiness();

    this.events.stateChanged.emit();
    this.events.jobResultChanged.emit({ job: state.job, previous, result });
    for (const newJob of added) {
      this.events.jobAdded.emit(newJob);
    }
  }

  /** Replaces the records of a resource without touching any job result. */
  setResourceList(resourceId: string, records: readonly ResourceRecord[]): void {
    this.resources.set(resourceId, [...records]);
    this.recomputeReadiness();
    this.events.stateChanged.emit();
  }

  // ---------------------------------------------------------------------------
  // Catalog mutation
  // ---------------------------------------------------------------------------

  /**
   * Adds a job to the session, undesired. An identical job already present is
   * returned instead; a different job with the same id is a duplicate problem.
   */
  addUnit(job: Job): Job {
    const existing = this.jobStates.get(job.id);
    if (existing) {
      if (!isSameJob(existing.job, job)) {
        throw new DependencyProblemError({
          kind: "duplicate",
          affectedJob: existing.job,
          root: existing.job,
          duplicateJob: job,
        });
      }
      return existing.job;
    }

    this.storeJob(job);
    this.recomputeReadiness();
    this.events.stateChanged.emit();
    this.events.jobAdded.emit(job);
    return job;
  }

  removeUnit(job: Job): void {
    const state = this.getJobState(job.id);
    if (this.runListJobs.some((entry) => entry.id === job.id)) {
      throw new SessionStateError(`Cannot remove job ${job.id}: it is on the run list`);
    }
    this.forgetJob(state.job);
    this.recomputeReadiness();
    this.events.stateChanged.emit();
    this.events.jobRemoved.emit(state.job);
  }

  /** Removes every matching job; nothing is removed if any match is on the run list. */
  trimJobList(predicate: (job: Job) => boolean): Job[] {
    const matched = this.jobs.filter(predicate);
    const blocked = matched.filter((job) =>
      this.runListJobs.some((entry) => entry.id === job.id),
    );
    if (blocked.length > 0) {
      throw new SessionStateError(
        `Cannot remove jobs on the run list: ${blocked.map((job) => job.id).join(", ")}`,
      );
    }
    if (matched.length === 0) {
      return [];
    }

    for (const job of matched) {
      this.forgetJob(job);
    }
    this.recomputeReadiness();
    this.events.stateChanged.emit();
    for (const job of matched) {
      this.events.jobRemoved.emit(job);
    }
    return matched;
  }

  // ---------------------------------------------------------------------------
  // Estimates
  // ---------------------------------------------------------------------------

  /** Seconds the run list is expected to take, split by who does the work. */
  estimatedDuration(manualOverhead = DEFAULT_MANUAL_OVERHEAD_SECONDS): EstimatedDuration {
    let automated: DurationEstimate = 0;
    let manual: DurationEstimate = 0;

    for (const job of this.runListJobs) {
      if (isAutomatedPlugin(job.plugin)) {
        if (job.estimatedDuration !== null) {
          automated = addEstimate(automated, job.estimatedDuration);
        } else if (job.plugin !== "local") {
          automated = "unknown";
        }
      } else if (job.estimatedDuration !== null) {
        manual = addEstimate(manual, manualOverhead + job.estimatedDuration);
      } else {
        manual = "unknown";
      }
    }

    return { automated, manual };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private storeJob(job: Job): void {
    this.jobStates.set(job.id, new JobState(job));
    this.jobs.push(job);
  }

  private forgetJob(job: Job): void {
    this.jobStates.delete(job.id);
    this.resources.delete(job.id);
    const index = this.jobs.findIndex((entry) => entry.id === job.id);
    if (index >= 0) this.jobs.splice(index, 1);
    this.desired = this.desired.filter((entry) => entry.id !== job.id);
    this.mandatory = this.mandatory.filter((entry) => entry.id !== job.id);
  }

  private recomputeReadiness(): void {
    recomputeReadiness(this.runListJobs, this.jobStates, this.resources);
  }

  private processResourceResult(job: Job, result: JobResult): void {
    const records = this.parseRecords(job, result);
    this.resources.set(job.id, records);
  }

  private processLocalResult(job: Job, result: JobResult): Job[] {
    const added: Job[] = [];
    for (const record of this.parseRecords(job, result)) {
      let child: Job;
      try {
        child = createChildJob(job, record);
      } catch (err) {
        logSessionWarning(this.logger, "local.job_discarded", {
          jobId: job.id,
          reason: "invalid",
          message: formatErrorMessage(err),
        });
        continue;
      }

      const existing = this.jobStates.get(child.id);
      if (existing) {
        if (!isSameJob(existing.job, child)) {
          logSessionWarning(this.logger, "local.job_discarded", {
            jobId: job.id,
            reason: "clash",
            discarded_job_id: child.id,
          });
        }
        continue;
      }

      this.storeJob(child);
      added.push(child);
      logSessionEvent(this.logger, "job.added", { jobId: child.id, via: job.id });
    }
    return added;
  }

  private parseRecords(job: Job, result: JobResult): ResourceRecord[] {
    let ioLog: readonly IOLogRecord[];
    try {
      ioLog = readResultIOLog(result);
    } catch (err) {
      logSessionWarning(this.logger, "resource.record_dropped", {
        jobId: job.id,
        reason: "io_log_unreadable",
        message: formatErrorMessage(err),
      });
      return [];
    }

    const parsed = this.resourceParser.parse(stdoutText(ioLog));
    for (const issue of parsed.issues) {
      logSessionWarning(this.logger, "resource.record_dropped", {
        jobId: job.id,
        line: issue.line,
        message: issue.message,
      });
    }
    return parsed.records;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function dedupeById(jobs: readonly Job[]): Job[] {
  const seen = new Set<string>();
  const unique: Job[] = [];
  for (const job of jobs) {
    if (seen.has(job.id)) continue;
    seen.add(job.id);
    unique.push(job);
  }
  return unique;
}

function sameIds(a: readonly Job[], b: readonly Job[]): boolean {
  return a.length === b.length && a.every((job, index) => job.id === b[index].id);
}

function addEstimate(total: DurationEstimate, seconds: number): DurationEstimate {
  return total === "unknown" ? total : total + seconds;
}
