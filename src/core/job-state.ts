import type { CertificationStatus, Job } from "./job.js";
import type { JobResult } from "./job-result.js";
import type { ResourceExpression } from "./resource-program.js";

// =============================================================================
// READINESS INHIBITORS
// =============================================================================

export type InhibitorCause =
  | "UNDESIRED"
  | "PENDING_DEP"
  | "FAILED_DEP"
  | "PENDING_RESOURCE"
  | "FAILED_RESOURCE";

export type ReadinessInhibitor =
  | { readonly cause: "UNDESIRED" }
  | { readonly cause: "PENDING_DEP" | "FAILED_DEP"; readonly relatedJob: Job }
  | {
      readonly cause: "PENDING_RESOURCE" | "FAILED_RESOURCE";
      readonly relatedJob: Job;
      readonly relatedExpression: ResourceExpression;
    };

export const UNDESIRED_INHIBITOR: ReadinessInhibitor = Object.freeze({ cause: "UNDESIRED" });

export function describeInhibitor(inhibitor: ReadinessInhibitor): string {
  switch (inhibitor.cause) {
    case "UNDESIRED":
      return "undesired";
    case "PENDING_DEP":
      return `required dependency ${JSON.stringify(inhibitor.relatedJob.id)} did not run yet`;
    case "FAILED_DEP":
      return `required dependency ${JSON.stringify(inhibitor.relatedJob.id)} has failed`;
    case "PENDING_RESOURCE":
      return `resource expression ${JSON.stringify(inhibitor.relatedExpression.text)} could not be evaluated because the resource it depends on did not run yet`;
    case "FAILED_RESOURCE":
      return `resource expression ${JSON.stringify(inhibitor.relatedExpression.text)} evaluates to false`;
  }
}

// =============================================================================
// JOB STATE
// =============================================================================

export class JobState {
  result: JobResult | null = null;
  readinessInhibitors: ReadinessInhibitor[] = [UNDESIRED_INHIBITOR];
  certificationStatus: CertificationStatus;

  constructor(readonly job: Job) {
    this.certificationStatus = job.certificationStatus;
  }

  canStart(): boolean {
    return this.readinessInhibitors.length === 0;
  }

  describeReadiness(): string {
    if (this.readinessInhibitors.length === 0) {
      return "job can be started";
    }
    return `job cannot be started: ${this.readinessInhibitors.map(describeInhibitor).join(", ")}`;
  }
}
