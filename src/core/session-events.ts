import type { Job } from "./job.js";
import type { JobResult } from "./job-result.js";

// =============================================================================
// EVENT PAYLOADS
// =============================================================================

export type JobResultChange = {
  job: Job;
  previous: JobResult | null;
  result: JobResult;
};

export type RunListChange = {
  previous: readonly Job[];
  runList: readonly Job[];
};

export type Listener<T> = (event: T) => void;

// =============================================================================
// CHANNEL
// =============================================================================

/** Synchronous fan-out in registration order. */
export class EventChannel<T> {
  private readonly listeners = new Set<Listener<T>>();

  subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: T): void {
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }
}

export class SessionEvents {
  readonly stateChanged = new EventChannel<void>();
  readonly jobAdded = new EventChannel<Job>();
  readonly jobRemoved = new EventChannel<Job>();
  readonly jobResultChanged = new EventChannel<JobResultChange>();
  readonly runListChanged = new EventChannel<RunListChange>();
}
