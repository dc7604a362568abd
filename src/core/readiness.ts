import { SessionStateError } from "./errors.js";
import type { Job } from "./job.js";
import { hasRun } from "./job-result.js";
import { UNDESIRED_INHIBITOR, type JobState, type ReadinessInhibitor } from "./job-state.js";
import type { ResourceMap } from "./resource.js";

/**
 * Recomputes the inhibitor list of every job state.
 *
 * Everything starts out UNDESIRED; jobs on the run list lose that inhibitor and
 * gain one per unmet resource requirement or dependency. The run list is
 * already topologically sorted, so a single pass is enough.
 */
export function recomputeReadiness(
  runList: readonly Job[],
  jobStates: ReadonlyMap<string, JobState>,
  resourceMap: ResourceMap,
): void {
  for (const state of jobStates.values()) {
    state.readinessInhibitors = [UNDESIRED_INHIBITOR];
  }

  for (const job of runList) {
    const state = requireState(jobStates, job.id);
    const inhibitors: ReadinessInhibitor[] = [];

    if (job.resourceProgram) {
      const evaluation = job.resourceProgram.evaluate(resourceMap);
      if (evaluation.status !== "satisfied") {
        const relatedJob = requireState(jobStates, evaluation.expression.resourceId).job;
        inhibitors.push({
          cause: evaluation.status === "pending" ? "PENDING_RESOURCE" : "FAILED_RESOURCE",
          relatedJob,
          relatedExpression: evaluation.expression,
        });
      }
    }

    for (const dependencyId of [...job.dependencies].sort()) {
      const dependency = requireState(jobStates, dependencyId);
      if (!hasRun(dependency.result)) {
        inhibitors.push({ cause: "PENDING_DEP", relatedJob: dependency.job });
      } else if (dependency.result.outcome !== "pass") {
        inhibitors.push({ cause: "FAILED_DEP", relatedJob: dependency.job });
      }
    }

    state.readinessInhibitors = inhibitors;
  }
}

function requireState(jobStates: ReadonlyMap<string, JobState>, jobId: string): JobState {
  const state = jobStates.get(jobId);
  if (!state) {
    throw new SessionStateError(`Run list refers to job ${jobId} which is not in the session`);
  }
  return state;
}
