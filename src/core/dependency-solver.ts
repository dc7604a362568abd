import { CertrunError } from "./errors.js";
import { getResourceDependencies, type Job } from "./job.js";

// =============================================================================
// TYPES
// =============================================================================

export type DependencyType = "direct" | "resource";

/**
 * A reason why a job cannot be placed on the run list.
 *
 * `affectedJob` is the job that cannot run; `root` is the requested job whose
 * resolution surfaced the problem (the same job when it was requested itself).
 */
export type DependencyProblem =
  | { kind: "cycle"; affectedJob: Job; root: Job; cycle: Job[] }
  | {
      kind: "missing";
      affectedJob: Job;
      root: Job;
      missingJobId: string;
      dependencyType: DependencyType;
    }
  | { kind: "duplicate"; affectedJob: Job; root: Job; duplicateJob: Job }
  | { kind: "unknown"; affectedJob: Job; root: Job };

export type ResolveOutcome =
  | { ok: true; runList: Job[] }
  | { ok: false; problem: DependencyProblem };

/**
 * Produces a topologically sorted run list containing `visitList` and
 * everything it depends on, or the first problem that prevents one.
 */
export interface DependencyResolver {
  resolve(jobs: readonly Job[], visitList?: readonly Job[]): ResolveOutcome;
}

/** Raised where a dependency problem means the job data itself is inconsistent. */
export class DependencyProblemError extends CertrunError {
  constructor(readonly problem: DependencyProblem) {
    super(describeDependencyProblem(problem));
    this.name = "DependencyProblemError";
  }
}

// =============================================================================
// DEPTH-FIRST SOLVER
// =============================================================================

type Color = "white" | "gray" | "black";

class ProblemFound extends Error {
  constructor(readonly problem: DependencyProblem) {
    super(problem.kind);
  }
}

export const depthFirstSolver: DependencyResolver = {
  resolve(jobs: readonly Job[], visitList?: readonly Job[]): ResolveOutcome {
    const jobMap = new Map<string, Job>();
    for (const job of jobs) {
      const existing = jobMap.get(job.id);
      if (existing) {
        return {
          ok: false,
          problem: { kind: "duplicate", affectedJob: existing, root: existing, duplicateJob: job },
        };
      }
      jobMap.set(job.id, job);
    }

    const colors = new Map<string, Color>();
    const solution: Job[] = [];

    const visit = (job: Job, root: Job, trail: Job[]): void => {
      const color = colors.get(job.id) ?? "white";
      if (color === "black") return;
      if (color === "gray") {
        const start = trail.findIndex((entry) => entry.id === job.id);
        const cycle = [...trail.slice(start), job];
        throw new ProblemFound({ kind: "cycle", affectedJob: job, root, cycle });
      }

      colors.set(job.id, "gray");
      trail.push(job);
      for (const [dependencyType, dependencyId] of dependencySet(job)) {
        const next = jobMap.get(dependencyId);
        if (!next) {
          throw new ProblemFound({
            kind: "missing",
            affectedJob: job,
            root,
            missingJobId: dependencyId,
            dependencyType,
          });
        }
        visit(next, root, trail);
      }
      trail.pop();
      colors.set(job.id, "black");
      solution.push(job);
    };

    try {
      for (const job of visitList ?? jobs) {
        if (!jobMap.has(job.id)) {
          return { ok: false, problem: { kind: "unknown", affectedJob: job, root: job } };
        }
        visit(job, job, []);
      }
    } catch (err) {
      if (err instanceof ProblemFound) return { ok: false, problem: err.problem };
      throw err;
    }

    return { ok: true, runList: solution };
  },
};

// =============================================================================
// DESCRIPTIONS
// =============================================================================

export function describeDependencyProblem(problem: DependencyProblem): string {
  switch (problem.kind) {
    case "cycle":
      return `dependency cycle detected: ${problem.cycle.map((job) => job.id).join(" -> ")}`;
    case "missing":
      return `missing dependency: ${JSON.stringify(problem.missingJobId)} (${problem.dependencyType}) of job ${JSON.stringify(problem.affectedJob.id)}`;
    case "unknown":
      return `job ${JSON.stringify(problem.affectedJob.id)} is not part of the session`;
    case "duplicate":
      return `duplicate job id: ${JSON.stringify(problem.affectedJob.id)} (checksums ${problem.affectedJob.checksum.slice(0, 12)} and ${problem.duplicateJob.checksum.slice(0, 12)})`;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function dependencySet(job: Job): Array<[DependencyType, string]> {
  return [
    ...job.dependencies.map((id): [DependencyType, string] => ["direct", id]),
    ...getResourceDependencies(job).map((id): [DependencyType, string] => ["resource", id]),
  ];
}
