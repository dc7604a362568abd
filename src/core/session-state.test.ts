import { describe, expect, it, vi } from "vitest";

import { DependencyProblemError } from "./dependency-solver.js";
import { SessionStateError } from "./errors.js";
import { createJob, type Job } from "./job.js";
import { createMemoryResult, ioLogFromText, type JobOutcome } from "./job-result.js";
import type { EventLogger } from "./logger.js";
import { SessionState } from "./session-state.js";

function job(id: string, extra: Record<string, string | number> = {}): Job {
  return createJob({ id, plugin: "shell", ...extra });
}

function ids(jobs: readonly Job[]): string[] {
  return jobs.map((entry) => entry.id);
}

function ran(outcome: JobOutcome, stdout = "") {
  return createMemoryResult({ outcome, ioLog: ioLogFromText(stdout) });
}

function causes(session: SessionState, jobId: string): string[] {
  return session.getJobState(jobId).readinessInhibitors.map((inhibitor) => inhibitor.cause);
}

function recordingLogger() {
  return { log: vi.fn<EventLogger["log"]>() };
}

describe("SessionState construction", () => {
  it("starts with every job undesired and an empty run list", () => {
    const session = new SessionState([job("a"), job("b")]);

    expect(session.runList).toEqual([]);
    expect(causes(session, "a")).toEqual(["UNDESIRED"]);
    expect(session.getJobState("b").describeReadiness()).toBe("job cannot be started: undesired");
  });

  it("collapses identical duplicates and rejects clashing ones", () => {
    const session = new SessionState([job("a"), job("a")]);
    expect(ids(session.jobList)).toEqual(["a"]);

    expect(() => new SessionState([job("a", { command: "one" }), job("a", { command: "two" })])).toThrow(
      DependencyProblemError,
    );
  });

  it("throws on unknown job lookups", () => {
    const session = new SessionState([job("a")]);

    expect(session.findJob("nope")).toBeUndefined();
    expect(() => session.getJobState("nope")).toThrow("Unknown job: nope");
  });
});

describe("SessionState.updateDesiredJobList", () => {
  it("adds dependencies to the run list and marks them pending", () => {
    const a = job("a", { depends: "b" });
    const b = job("b");
    const c = job("c");
    const session = new SessionState([a, b, c]);

    const problems = session.updateDesiredJobList([a]);

    expect(problems).toEqual([]);
    expect(ids(session.runList)).toEqual(["b", "a"]);
    expect(ids(session.desiredJobList)).toEqual(["a"]);
    expect(causes(session, "a")).toEqual(["PENDING_DEP"]);
    expect(session.getJobState("a").describeReadiness()).toBe(
      'job cannot be started: required dependency "b" did not run yet',
    );
    expect(session.getJobState("b").canStart()).toBe(true);
    expect(causes(session, "c")).toEqual(["UNDESIRED"]);
  });

  it("drops both jobs of a cycle and reports two problems", () => {
    const a = job("a", { depends: "b" });
    const b = job("b", { depends: "a" });
    const session = new SessionState([a, b]);

    const problems = session.updateDesiredJobList([a, b]);

    expect(problems.map((problem) => problem.kind)).toEqual(["cycle", "cycle"]);
    expect(session.runList).toEqual([]);
    expect(session.desiredJobList).toEqual([]);
  });

  it("drops the requested job whose dependency is missing and keeps the rest", () => {
    const a = job("a", { depends: "b" });
    const b = job("b", { depends: "ghost" });
    const c = job("c");
    const session = new SessionState([a, b, c]);

    const problems = session.updateDesiredJobList([a, c]);

    expect(problems).toHaveLength(1);
    expect(problems[0].kind).toBe("missing");
    expect(problems[0].affectedJob.id).toBe("b");
    expect(ids(session.runList)).toEqual(["c"]);
    expect(ids(session.desiredJobList)).toEqual(["c"]);
  });

  it("reports jobs that are not part of the session", () => {
    const session = new SessionState([job("a")]);

    const problems = session.updateDesiredJobList([job("stray"), job("a")]);

    expect(problems.map((problem) => problem.kind)).toEqual(["unknown"]);
    expect(ids(session.runList)).toEqual(["a"]);
  });

  it("places mandatory jobs ahead of desired ones", () => {
    const a = job("a");
    const m = job("m");
    const session = new SessionState([a, m]);

    session.updateMandatoryJobList([m]);
    session.updateDesiredJobList([a]);

    expect(ids(session.runList)).toEqual(["m", "a"]);
    expect(ids(session.mandatoryJobList)).toEqual(["m"]);
    expect(ids(session.desiredJobList)).toEqual(["a"]);
  });

  it("notifies run list listeners only when the run list changes", () => {
    const a = job("a");
    const session = new SessionState([a]);
    const events: string[] = [];
    session.onStateChanged(() => events.push("state"));
    session.onRunListChanged((change) =>
      events.push(`run-list ${ids(change.previous).join(",")} -> ${ids(change.runList).join(",")}`),
    );

    session.updateDesiredJobList([a]);
    session.updateDesiredJobList([a]);

    expect(events).toEqual(["state", "run-list  -> a", "state"]);
  });
});

describe("SessionState readiness and call order", () => {
  function catalog() {
    const res = createJob({ id: "res", plugin: "resource" });
    const b = job("b");
    const a = job("a", { depends: "b", requires: 'res.k == "v"' });
    return { res, b, a };
  }

  it("uses results recorded before the job was selected", () => {
    const { res, b, a } = catalog();
    const session = new SessionState([res, b, a]);

    session.updateJobResult(b, ran("pass"));
    session.updateJobResult(res, ran("pass", "k: v\n"));
    expect(causes(session, "a")).toEqual(["UNDESIRED"]);

    session.updateDesiredJobList([a]);

    expect(session.getJobState("a").canStart()).toBe(true);
  });

  it("reaches the same readiness whichever comes first", () => {
    const first = catalog();
    const selectedFirst = new SessionState([first.res, first.b, first.a]);
    selectedFirst.updateDesiredJobList([first.a]);
    selectedFirst.updateJobResult(first.b, ran("fail"));
    selectedFirst.updateJobResult(first.res, ran("pass", "k: v\n"));

    const second = catalog();
    const resultsFirst = new SessionState([second.res, second.b, second.a]);
    resultsFirst.updateJobResult(second.res, ran("pass", "k: v\n"));
    resultsFirst.updateJobResult(second.b, ran("fail"));
    resultsFirst.updateDesiredJobList([second.a]);

    expect(causes(selectedFirst, "a")).toEqual(["FAILED_DEP"]);
    expect(causes(resultsFirst, "a")).toEqual(["FAILED_DEP"]);
  });

  it("restores readiness after deselecting and selecting again", () => {
    const { res, b, a } = catalog();
    const session = new SessionState([res, b, a]);
    session.updateDesiredJobList([a]);
    session.updateJobResult(b, ran("pass"));

    session.updateDesiredJobList([]);
    expect(session.runList).toEqual([]);
    expect(causes(session, "a")).toEqual(["UNDESIRED"]);
    expect(causes(session, "b")).toEqual(["UNDESIRED"]);

    session.updateDesiredJobList([a]);
    expect(causes(session, "a")).toEqual(["PENDING_RESOURCE"]);

    session.updateJobResult(res, ran("pass", "k: v\n"));
    expect(session.getJobState("a").canStart()).toBe(true);
  });
});

describe("SessionState.updateJobResult", () => {
  it("unblocks dependents of a passing job and blocks them on failure", () => {
    const a = job("a", { depends: "b" });
    const b = job("b");
    const session = new SessionState([a, b]);
    session.updateDesiredJobList([a]);

    session.updateJobResult(b, ran("pass"));
    expect(session.getJobState("a").canStart()).toBe(true);
    expect(session.getJobState("a").describeReadiness()).toBe("job can be started");

    session.updateJobResult(b, ran("fail"));
    expect(causes(session, "a")).toEqual(["FAILED_DEP"]);
    expect(session.getJobState("a").describeReadiness()).toBe(
      'job cannot be started: required dependency "b" has failed',
    );
  });

  it("treats a result without an outcome as not run", () => {
    const a = job("a", { depends: "b" });
    const b = job("b");
    const session = new SessionState([a, b]);
    session.updateDesiredJobList([a]);

    session.updateJobResult(b, createMemoryResult());

    expect(causes(session, "a")).toEqual(["PENDING_DEP"]);
  });

  it("gates jobs on resource data and replaces it on every result", () => {
    const res = createJob({ id: "res", plugin: "resource" });
    const a = job("a", { requires: 'res.k == "v"' });
    const session = new SessionState([res, a]);
    session.updateDesiredJobList([a]);

    expect(ids(session.runList)).toEqual(["res", "a"]);
    expect(causes(session, "a")).toEqual(["PENDING_RESOURCE"]);

    session.updateJobResult(res, ran("pass", "k: v\n"));
    expect(session.resourceMap.get("res")).toEqual([{ k: "v" }]);
    expect(session.getJobState("a").canStart()).toBe(true);

    session.updateJobResult(res, ran("pass", "k: w\n"));
    expect(session.resourceMap.get("res")).toEqual([{ k: "w" }]);
    expect(causes(session, "a")).toEqual(["FAILED_RESOURCE"]);

    const [inhibitor] = session.getJobState("a").readinessInhibitors;
    expect(inhibitor.cause === "FAILED_RESOURCE" && inhibitor.relatedJob.id).toBe("res");
  });

  it("logs resource records that cannot be parsed", () => {
    const res = createJob({ id: "res", plugin: "resource" });
    const logger = recordingLogger();
    const session = new SessionState([res], { logger });

    session.updateJobResult(res, ran("pass", "k: v\nk: w\n\nk: x\n"));

    expect(session.resourceMap.get("res")).toEqual([{ k: "x" }]);
    expect(logger.log).toHaveBeenCalledWith({
      type: "resource.record_dropped",
      level: "warn",
      jobId: "res",
      payload: { line: 2, message: 'Duplicate key "k"' },
    });
  });

  it("adds jobs generated by a local job and notifies after the result", () => {
    const gen = createJob({ id: "gen", plugin: "local" });
    const session = new SessionState([gen]);
    const events: string[] = [];
    session.onStateChanged(() => events.push("state"));
    session.onJobResultChanged((change) => events.push(`result ${change.job.id}`));
    session.onJobAdded((added) => events.push(`added ${added.id}`));

    session.updateJobResult(
      gen,
      ran("pass", "id: gen/one\nplugin: shell\n\nid: gen/two\nplugin: manual\n"),
    );

    expect(events).toEqual(["state", "result gen", "added gen/one", "added gen/two"]);
    expect(ids(session.jobList)).toEqual(["gen", "gen/one", "gen/two"]);
    expect(session.findJob("gen/two")?.via).toBe("gen");
    expect(causes(session, "gen/one")).toEqual(["UNDESIRED"]);
  });

  it("discards generated jobs that are invalid or clash with existing ones", () => {
    const gen = createJob({ id: "gen", plugin: "local" });
    const existing = job("taken", { command: "original" });
    const logger = recordingLogger();
    const session = new SessionState([gen, existing], { logger });

    session.updateJobResult(
      gen,
      ran("pass", "id: taken\nplugin: shell\ncommand: other\n\nid: broken\nplugin: robot\n"),
    );

    expect(ids(session.jobList)).toEqual(["gen", "taken"]);
    expect(session.findJob("taken")).toBe(existing);
    expect(logger.log).toHaveBeenCalledWith({
      type: "local.job_discarded",
      level: "warn",
      jobId: "gen",
      payload: { reason: "clash", discarded_job_id: "taken" },
    });
    expect(logger.log).toHaveBeenCalledWith(
      expect.objectContaining({
        type: "local.job_discarded",
        payload: expect.objectContaining({ reason: "invalid" }),
      }),
    );
  });

  it("skips generated jobs identical to existing ones", () => {
    const gen = createJob({ id: "gen", plugin: "local" });
    const session = new SessionState([gen]);
    const output = "id: gen/one\nplugin: shell\n";
    session.updateJobResult(gen, ran("pass", output));
    const added = vi.fn();
    session.onJobAdded(added);

    session.updateJobResult(gen, ran("pass", output));

    expect(added).not.toHaveBeenCalled();
    expect(ids(session.jobList)).toEqual(["gen", "gen/one"]);
  });

  it("passes the previous result to listeners", () => {
    const a = job("a");
    const session = new SessionState([a]);
    const first = ran("fail");
    const second = ran("pass");
    const previous: unknown[] = [];
    session.onJobResultChanged((change) => previous.push(change.previous));

    session.updateJobResult(a, first);
    session.updateJobResult(a, second);

    expect(previous).toEqual([null, first]);
  });
});

describe("SessionState.setResourceList", () => {
  it("replaces resource records directly", () => {
    const res = createJob({ id: "res", plugin: "resource" });
    const a = job("a", { requires: 'res.k == "v"' });
    const session = new SessionState([res, a]);
    session.updateDesiredJobList([a]);

    session.setResourceList("res", [{ k: "v" }]);

    expect(session.getJobState("a").canStart()).toBe(true);
    expect(session.getJobState("res").result).toBeNull();
  });
});

describe("SessionState job list mutation", () => {
  it("returns the existing job when adding an identical one", () => {
    const a = job("a");
    const session = new SessionState([a]);
    const added = vi.fn();
    session.onJobAdded(added);

    expect(session.addUnit(job("a"))).toBe(a);
    expect(added).not.toHaveBeenCalled();
    expect(() => session.addUnit(job("a", { command: "changed" }))).toThrow(DependencyProblemError);
  });

  it("adds new jobs undesired", () => {
    const session = new SessionState([job("a")]);
    const added = vi.fn();
    session.onJobAdded(added);

    const b = session.addUnit(job("b"));

    expect(added).toHaveBeenCalledWith(b);
    expect(causes(session, "b")).toEqual(["UNDESIRED"]);
  });

  it("refuses to remove a job on the run list", () => {
    const a = job("a");
    const session = new SessionState([a]);
    session.updateDesiredJobList([a]);

    expect(() => session.removeUnit(a)).toThrow("Cannot remove job a: it is on the run list");
  });

  it("removes jobs that are not on the run list", () => {
    const a = job("a");
    const b = job("b");
    const session = new SessionState([a, b]);
    const removed = vi.fn();
    session.onJobRemoved(removed);

    session.removeUnit(b);

    expect(ids(session.jobList)).toEqual(["a"]);
    expect(removed).toHaveBeenCalledWith(b);
  });

  it("leaves the session untouched when trimming would remove a run list job", () => {
    const a = job("a");
    const b = job("b");
    const session = new SessionState([a, b]);
    session.updateDesiredJobList([a]);

    expect(() => session.trimJobList(() => true)).toThrow(SessionStateError);
    expect(() => session.trimJobList(() => true)).toThrow("Cannot remove jobs on the run list: a");
    expect(ids(session.jobList)).toEqual(["a", "b"]);
    expect(session.getJobState("b").job).toBe(b);
  });

  it("trims matching jobs and notifies for each", () => {
    const session = new SessionState([job("a"), job("gen/one"), job("gen/two")]);
    const removed: string[] = [];
    session.onJobRemoved((entry) => removed.push(entry.id));

    const trimmed = session.trimJobList((entry) => entry.id.startsWith("gen/"));

    expect(ids(trimmed)).toEqual(["gen/one", "gen/two"]);
    expect(removed).toEqual(["gen/one", "gen/two"]);
    expect(ids(session.jobList)).toEqual(["a"]);
    expect(session.trimJobList(() => false)).toEqual([]);
  });

  it("stops notifying after unsubscribe", () => {
    const session = new SessionState([job("a")]);
    const listener = vi.fn();
    const unsubscribe = session.onStateChanged(listener);

    unsubscribe();
    session.addUnit(job("b"));

    expect(listener).not.toHaveBeenCalled();
  });
});

describe("SessionState.estimatedDuration", () => {
  it("sums automated and manual jobs on the run list", () => {
    const shell = job("shell", { estimated_duration: 10 });
    const manual = createJob({ id: "manual", plugin: "manual", estimated_duration: 20 });
    const idle = job("idle", { estimated_duration: 999 });
    const session = new SessionState([shell, manual, idle]);
    session.updateDesiredJobList([shell, manual]);

    expect(session.estimatedDuration()).toEqual({ automated: 10, manual: 50 });
    expect(session.estimatedDuration(0)).toEqual({ automated: 10, manual: 20 });
  });

  it("reports unknown when a job has no estimate", () => {
    const shell = job("shell");
    const manual = createJob({ id: "manual", plugin: "user-verify" });
    const gen = createJob({ id: "gen", plugin: "local" });
    const session = new SessionState([shell, manual, gen]);

    session.updateDesiredJobList([gen]);
    expect(session.estimatedDuration()).toEqual({ automated: 0, manual: 0 });

    session.updateDesiredJobList([shell, manual]);
    expect(session.estimatedDuration()).toEqual({ automated: "unknown", manual: "unknown" });
  });
});
