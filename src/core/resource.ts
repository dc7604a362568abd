// =============================================================================
// TYPES
// =============================================================================

export type ResourceRecord = Readonly<Record<string, string>>;

export type ResourceMap = ReadonlyMap<string, readonly ResourceRecord[]>;

export type ResourceParseIssue = {
  line: number;
  message: string;
};

export type ResourceParseResult = {
  records: ResourceRecord[];
  issues: ResourceParseIssue[];
};

/**
 * Turns the text output of a resource (or local) job into key/value records.
 *
 * Implementations must not throw on malformed input: a bad record is reported
 * in `issues` and parsing resumes at the next record.
 */
export interface ResourceParser {
  parse(text: string): ResourceParseResult;
}

// =============================================================================
// RFC822-STYLE PARSER
// =============================================================================

type RecordBuilder = {
  data: Map<string, string>;
  key: string | null;
  values: string[];
  broken: boolean;
};

/**
 * Records are blocks of `key: value` lines separated by blank lines. A line
 * starting with a space continues the previous value; ` .` stands for an empty
 * continuation line.
 */
export const rfc822ResourceParser: ResourceParser = {
  parse(text: string): ResourceParseResult {
    const records: ResourceRecord[] = [];
    const issues: ResourceParseIssue[] = [];
    let builder = newRecordBuilder();

    const fail = (lineno: number, message: string): void => {
      if (!builder.broken) {
        issues.push({ line: lineno, message });
      }
      builder.broken = true;
    };

    const finishRecord = (): void => {
      commitValue(builder);
      if (!builder.broken && builder.data.size > 0) {
        records.push(Object.fromEntries(builder.data));
      }
      builder = newRecordBuilder();
    };

    const lines = text.replace(/\r\n/g, "\n").split("\n");
    lines.forEach((line, index) => {
      const lineno = index + 1;

      if (line.trim() === "") {
        finishRecord();
        return;
      }
      if (builder.broken) return;

      if (line.startsWith(" ") || line.startsWith("\t")) {
        if (builder.key === null) {
          fail(lineno, "Unexpected multi-line value");
          return;
        }
        builder.values.push(continuationValue(line));
        return;
      }

      const colon = line.indexOf(":");
      if (colon === -1) {
        fail(lineno, `Unexpected non-empty line: ${JSON.stringify(line)}`);
        return;
      }

      commitValue(builder);
      const key = line.slice(0, colon).trim();
      const value = line.slice(colon + 1).trim();
      if (key.length === 0) {
        fail(lineno, "Empty key");
        return;
      }
      if (builder.data.has(key)) {
        fail(lineno, `Duplicate key ${JSON.stringify(key)}`);
        return;
      }
      builder.key = key;
      builder.values = [value];
    });

    finishRecord();
    return { records, issues };
  },
};

export function parseResourceText(
  text: string,
  parser: ResourceParser = rfc822ResourceParser,
): ResourceParseResult {
  return parser.parse(text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function newRecordBuilder(): RecordBuilder {
  return { data: new Map(), key: null, values: [], broken: false };
}

function continuationValue(line: string): string {
  const trimmed = line.trimEnd();
  if (trimmed === " .") return "";
  if (trimmed === " ..") return ".";
  return trimmed;
}

function commitValue(builder: RecordBuilder): void {
  if (builder.key === null) return;
  builder.data.set(builder.key, dedentValue(builder.values));
  builder.key = null;
  builder.values = [];
}

function dedentValue(values: string[]): string {
  const [first, ...rest] = values;
  const indents = rest
    .filter((value) => value.trim().length > 0)
    .map((value) => value.length - value.trimStart().length);
  const indent = indents.length > 0 ? Math.min(...indents) : 0;
  const lines = [first ?? "", ...rest.map((value) => value.slice(indent))];

  while (lines.length > 1 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.join("\n");
}
