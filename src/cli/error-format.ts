import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

/**
 * Renders an error as a headline, the message, then the facts the error
 * carries (field path, job id, format version, file) in an aligned block:
 *
 *   Error: Session data is corrupted.
 *   Missing value for key "session.results"
 *     field  session.results
 *   Hint: Remove the session with `certrun sessions remove <id>`.
 *
 * With `debug`, the error name, cause chain and stack follow under `Debug:`.
 */
export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  const labelWidth = Math.max(
    0,
    ...lines.map((line) => (line.kind === "detail" ? line.label.length : 0)),
  );

  const output: string[] = [];
  let inDebug = false;
  for (const line of lines) {
    if (line.kind === "debug" && !inDebug) {
      output.push(format("Debug:", ["dim"]));
      inDebug = true;
    }
    output.push(renderLine(line, format, labelWidth));
  }
  return output.join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter, labelWidth: number): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "detail":
      return `  ${format(line.label.padEnd(labelWidth), ["cyan"])}  ${line.text}`;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "debug":
      if (line.label === "stack") {
        return format(indent(line.text, "    "), ["dim"]);
      }
      return format(`  ${line.label}: ${line.text}`, ["dim"]);
  }
}

function indent(text: string, prefix: string): string {
  return text
    .split("\n")
    .map((row) => `${prefix}${row}`)
    .join("\n");
}
