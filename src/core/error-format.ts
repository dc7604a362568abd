/*
Purpose: turn engine errors into structured lines for CLI output and log payloads.
Usage: formatErrorLines(err, { mode: "debug" }), formatErrorMessage(err).
*/

import {
  BrokenReferenceToExternalFileError,
  CertrunError,
  ConfigError,
  CorruptedSessionError,
  IncompatibleJobError,
  IncompatibleSessionError,
  ResourceProgramError,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

/** Facts an error carries about what it refers to: a field path, a job, a file. */
export type ErrorDetailLabel = "field" | "job" | "version" | "file" | "expression";

export type ErrorDebugLabel = "name" | "cause" | "stack";

export type ErrorFormatLine =
  | { kind: "title"; text: string }
  | { kind: "message"; text: string }
  | { kind: "detail"; label: ErrorDetailLabel; text: string }
  | { kind: "hint"; text: string }
  | { kind: "debug"; label: ErrorDebugLabel; text: string };

export type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";
export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  opts: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const mode = opts.mode ?? "short";
  const lines: ErrorFormatLine[] = [
    { kind: "title", text: resolveTitle(error) },
    { kind: "message", text: formatErrorMessage(error) },
  ];

  lines.push(...resolveDetails(error));

  const hint = resolveHint(error);
  if (hint) {
    lines.push({ kind: "hint", text: hint });
  }

  if (mode !== "debug") {
    return lines;
  }

  if (error instanceof Error) {
    lines.push({ kind: "debug", label: "name", text: error.name });
  }

  for (const cause of collectCauses(error)) {
    lines.push({ kind: "debug", label: "cause", text: formatErrorMessage(cause) });
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "debug", label: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(opts: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!opts.stream?.isTTY) return false;
  if (opts.useColor !== undefined) return opts.useColor;
  return process.env.NO_COLOR === undefined;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveTitle(error: unknown): string {
  if (error instanceof CorruptedSessionError) return "Session data is corrupted.";
  if (error instanceof IncompatibleSessionError) return "Session format is not supported.";
  if (error instanceof IncompatibleJobError) return "Job definition changed since suspend.";
  if (error instanceof BrokenReferenceToExternalFileError) return "Session log file is missing.";
  if (error instanceof ConfigError) return "Configuration invalid.";
  if (error instanceof CertrunError) return "Session operation failed.";
  return "Unexpected error.";
}

function resolveDetails(error: unknown): ErrorFormatLine[] {
  const detail = (label: ErrorDetailLabel, text: string): ErrorFormatLine => ({
    kind: "detail",
    label,
    text,
  });

  if (error instanceof CorruptedSessionError) {
    return error.field === undefined ? [] : [detail("field", error.field)];
  }
  if (error instanceof IncompatibleSessionError) {
    return error.version === undefined ? [] : [detail("version", JSON.stringify(error.version))];
  }
  if (error instanceof IncompatibleJobError) return [detail("job", error.jobId)];
  if (error instanceof BrokenReferenceToExternalFileError) return [detail("file", error.path)];
  if (error instanceof ResourceProgramError) return [detail("expression", error.text)];
  return [];
}

function resolveHint(error: unknown): string | undefined {
  if (error instanceof IncompatibleJobError) {
    return "Rerun with --ignore-checksum to resume anyway, or remove the session.";
  }
  if (error instanceof BrokenReferenceToExternalFileError) {
    return "Rerun with --rewrite-paths if the session directory was moved.";
  }
  if (error instanceof CorruptedSessionError || error instanceof IncompatibleSessionError) {
    return "Remove the session with `certrun sessions remove <id>`.";
  }
  return undefined;
}

function collectCauses(error: unknown): unknown[] {
  const causes: unknown[] = [];
  let current: unknown = error instanceof Error ? error.cause : undefined;
  while (current !== undefined && causes.length < 5) {
    causes.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return causes;
}
