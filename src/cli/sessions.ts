import type { Command } from "commander";

import { loadJobCatalog } from "../core/catalog-loader.js";
import type { CertrunConfig } from "../core/config.js";
import { ConsoleLogger } from "../core/logger.js";
import type { SessionPeek } from "../core/session-resume.js";
import type { EstimatedDuration, SessionState } from "../core/session-state.js";
import { SessionStore, type StoredSessionSummary } from "../core/session-store.js";

import { loadCliContext, type GlobalCliOptions } from "./context.js";

// =============================================================================
// TYPES
// =============================================================================

export type SessionsListOptions = { json?: boolean };

export type SessionsShowOptions = {
  json?: boolean;
  ignoreChecksum?: boolean;
  checkReferences?: boolean;
  rewritePaths?: boolean;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerSessionsCommand(program: Command): void {
  const sessions = program.command("sessions").description("Inspect and discard stored sessions");

  sessions
    .command("list")
    .description("List stored sessions, newest first")
    .option("--json", "Emit JSON output", false)
    .action(async (opts: { json?: boolean }, command: Command) => {
      const { config, verbose } = loadCliContext(command.optsWithGlobals<GlobalCliOptions>());
      await sessionsListCommand(config, { json: opts.json }, verbose);
    });

  sessions
    .command("show")
    .description("Show a stored session; resumes it when a job catalog is configured")
    .argument("<id>", "Session id")
    .option("--json", "Emit JSON output", false)
    .option("--ignore-checksum", "Resume even if job definitions changed", false)
    .option("--check-references", "Fail when a stored IO log file is missing", false)
    .option("--rewrite-paths", "Relocate IO log paths of a moved session (implies --check-references)", false)
    .action(async (id: string, opts: SessionsShowOptions, command: Command) => {
      const { config, verbose } = loadCliContext(command.optsWithGlobals<GlobalCliOptions>());
      await sessionsShowCommand(config, id, opts, verbose);
    });

  sessions
    .command("remove")
    .description("Delete a stored session and its IO logs")
    .argument("<id>", "Session id")
    .action(async (id: string, _opts: unknown, command: Command) => {
      const { config, verbose } = loadCliContext(command.optsWithGlobals<GlobalCliOptions>());
      await sessionsRemoveCommand(config, id, verbose);
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function sessionsListCommand(
  config: CertrunConfig,
  opts: SessionsListOptions = {},
  verbose = false,
): Promise<void> {
  const store = new SessionStore(config.session_root, { logger: new ConsoleLogger({ verbose }) });
  const summaries = await store.list();

  if (opts.json) {
    console.log(JSON.stringify(summaries, null, 2));
    return;
  }

  if (summaries.length === 0) {
    console.log(`No sessions found under ${config.session_root}.`);
    return;
  }

  printSessionList(summaries);
}

export async function sessionsShowCommand(
  config: CertrunConfig,
  sessionId: string,
  opts: SessionsShowOptions = {},
  verbose = false,
): Promise<void> {
  const logger = new ConsoleLogger({ verbose, sessionId });
  const store = new SessionStore(config.session_root, { logger });
  const peek = await store.peek(sessionId);

  if (config.catalog.length === 0) {
    printShow(sessionId, peek, null, opts.json ?? false);
    return;
  }

  const catalog = await loadJobCatalog(config.catalog, config.base_dir);
  const session = await store.resume(sessionId, catalog.jobs, {
    ignoreChecksum: opts.ignoreChecksum || config.resume.ignore_checksum,
    checkReferences: opts.checkReferences || config.resume.check_references,
    rewriteLegacyPaths: opts.rewritePaths || config.resume.rewrite_legacy_paths,
  });
  printShow(sessionId, peek, describeSession(session, config), opts.json ?? false);
}

export async function sessionsRemoveCommand(
  config: CertrunConfig,
  sessionId: string,
  verbose = false,
): Promise<void> {
  const store = new SessionStore(config.session_root, { logger: new ConsoleLogger({ verbose }) });
  const removed = await store.remove(sessionId);
  console.log(removed ? `Removed session ${sessionId}.` : `No session ${sessionId} to remove.`);
}

// =============================================================================
// SESSION DETAILS
// =============================================================================

type RunListRow = {
  id: string;
  outcome: string;
  ready: boolean;
  readiness: string;
};

type SessionDetails = {
  runList: RunListRow[];
  desired: string[];
  mandatory: string[];
  estimatedDuration: EstimatedDuration;
};

function describeSession(session: SessionState, config: CertrunConfig): SessionDetails {
  return {
    runList: session.runList.map((job) => {
      const state = session.getJobState(job.id);
      return {
        id: job.id,
        outcome: state.result?.outcome ?? "not-run",
        ready: state.canStart(),
        readiness: state.describeReadiness(),
      };
    }),
    desired: session.desiredJobList.map((job) => job.id),
    mandatory: session.mandatoryJobList.map((job) => job.id),
    estimatedDuration: session.estimatedDuration(config.manual_overhead_seconds),
  };
}

// =============================================================================
// OUTPUT
// =============================================================================

function printShow(
  sessionId: string,
  peek: SessionPeek,
  details: SessionDetails | null,
  json: boolean,
): void {
  const metadata = {
    title: peek.metadata.title,
    flags: [...peek.metadata.flags].sort(),
    runningJobName: peek.metadata.runningJobName,
    appId: peek.metadata.appId,
    appBlobBytes: peek.metadata.appBlob?.length ?? 0,
  };

  if (json) {
    console.log(JSON.stringify({ id: sessionId, version: peek.version, metadata, ...details }, null, 2));
    return;
  }

  console.log(`Session ${sessionId} (format v${peek.version})`);
  console.log(`  Title:       ${metadata.title ?? "-"}`);
  console.log(`  Flags:       ${metadata.flags.length > 0 ? metadata.flags.join(", ") : "-"}`);
  console.log(`  Running job: ${metadata.runningJobName ?? "-"}`);
  console.log(`  App id:      ${metadata.appId ?? "-"}`);

  if (!details) {
    console.log("No job catalog configured; run list not shown.");
    return;
  }

  const { automated, manual } = details.estimatedDuration;
  console.log(`  Estimate:    automated ${formatDuration(automated)}, manual ${formatDuration(manual)}`);
  console.log("Run list:");
  if (details.runList.length === 0) {
    console.log("  (empty)");
  }
  for (const row of details.runList) {
    const marker = row.ready ? "*" : " ";
    console.log(`  ${marker} ${pad(row.id, 40)} ${pad(row.outcome, 16)} ${row.readiness}`);
  }
}

function printSessionList(summaries: StoredSessionSummary[]): void {
  const rows = summaries.map((summary) => ({
    id: summary.id,
    updated: formatTimestamp(summary.modifiedAt),
    version: summary.status === "ok" ? `v${summary.version}` : "?",
    title: summary.status === "ok" ? summary.title ?? "-" : `unreadable: ${summary.error}`,
  }));

  const headers = { id: "Session", updated: "Updated", version: "Format", title: "Title" };
  const widths = {
    id: columnWidth(
      rows.map((row) => row.id),
      headers.id,
    ),
    updated: columnWidth(
      rows.map((row) => row.updated),
      headers.updated,
    ),
    version: columnWidth(
      rows.map((row) => row.version),
      headers.version,
    ),
  };

  console.log(
    `${pad(headers.id, widths.id)}  ${pad(headers.updated, widths.updated)}  ${pad(
      headers.version,
      widths.version,
    )}  ${headers.title}`,
  );
  for (const row of rows) {
    console.log(
      `${pad(row.id, widths.id)}  ${pad(row.updated, widths.updated)}  ${pad(
        row.version,
        widths.version,
      )}  ${row.title}`,
    );
  }
}

// =============================================================================
// UTILITIES
// =============================================================================

export function formatDuration(value: number | "unknown"): string {
  if (value === "unknown") return "unknown";
  const total = Math.round(value);
  const minutes = Math.floor(total / 60);
  const seconds = total % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

function columnWidth(values: string[], header: string): number {
  const lengths = values.map((value) => value.length);
  return Math.max(header.length, ...lengths, 4);
}

function pad(value: string, width: number): string {
  return value.padEnd(width);
}

function formatTimestamp(ts: string): string {
  const parsed = new Date(ts);
  if (Number.isNaN(parsed.getTime())) return ts;
  return parsed
    .toISOString()
    .replace("T", " ")
    .replace(/\.\d+Z$/, "Z");
}
