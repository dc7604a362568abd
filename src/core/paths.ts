import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  certrunHome: string;
};

export type ResolveCertrunHomeOptions = {
  certrunHome?: string;
};

export const REPO_CONFIG_DIR = ".certrun";
export const CONFIG_FILE = "config.yaml";
export const SESSION_FILE = "session";
export const IO_LOGS_DIR = "io-logs";

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveCertrunHome(opts: ResolveCertrunHomeOptions = {}): string {
  if (opts.certrunHome) {
    return path.resolve(opts.certrunHome);
  }

  if (process.env.CERTRUN_HOME) {
    return path.resolve(process.env.CERTRUN_HOME);
  }

  return path.join(os.homedir(), ".certrun");
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function defaultSessionRoot(paths?: PathsContext): string {
  return path.join(resolveCertrunHome({ certrunHome: paths?.certrunHome }), "sessions");
}

export function homeConfigPath(paths?: PathsContext): string {
  return path.join(resolveCertrunHome({ certrunHome: paths?.certrunHome }), CONFIG_FILE);
}

export function repoConfigPath(repoRoot: string): string {
  return path.join(repoRoot, REPO_CONFIG_DIR, CONFIG_FILE);
}

export function sessionDir(sessionRoot: string, sessionId: string): string {
  return path.join(sessionRoot, sessionId);
}

export function sessionFilePath(sessionRoot: string, sessionId: string): string {
  return path.join(sessionDir(sessionRoot, sessionId), SESSION_FILE);
}

export function sessionIOLogsDir(sessionRoot: string, sessionId: string): string {
  return path.join(sessionDir(sessionRoot, sessionId), IO_LOGS_DIR);
}

export function sessionEventLogPath(sessionRoot: string, sessionId: string): string {
  return path.join(sessionDir(sessionRoot, sessionId), "events.jsonl");
}
