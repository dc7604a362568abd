import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";
import yaml from "js-yaml";
import { z } from "zod";

import { formatErrorMessage } from "./error-format.js";
import { CatalogError } from "./errors.js";
import { createJob, type Job } from "./job.js";

// =============================================================================
// TYPES
// =============================================================================

export type CatalogIssue = {
  file: string;
  /** Position of the definition in its file, when the issue concerns one. */
  index?: number;
  message: string;
};

export type CatalogLoaderOptions = {
  /** Throw on the first file with issues instead of collecting them. */
  strict?: boolean;
};

export type CatalogLoadResult = {
  jobs: Job[];
  files: string[];
  issues: CatalogIssue[];
};

// A catalog file is either a bare list of definitions or `{ jobs: [...] }`.
const CatalogFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ jobs: z.array(z.unknown()) }),
]);

// =============================================================================
// PUBLIC API
// =============================================================================

export async function loadJobCatalog(
  patterns: readonly string[],
  baseDir: string,
  opts: CatalogLoaderOptions = {},
): Promise<CatalogLoadResult> {
  const strict = opts.strict ?? true;
  const files = (await fg([...patterns], { cwd: baseDir, absolute: true, onlyFiles: true })).sort();

  const jobs: Job[] = [];
  const issues: CatalogIssue[] = [];

  for (const file of files) {
    const fileIssues: CatalogIssue[] = [];
    for (const [index, definition] of (await readDefinitions(file, fileIssues)).entries()) {
      try {
        jobs.push(createJob(definition));
      } catch (err) {
        fileIssues.push({ file, index, message: formatErrorMessage(err) });
      }
    }

    if (strict && fileIssues.length > 0) {
      throw new CatalogError(describeIssues(fileIssues));
    }
    issues.push(...fileIssues);
  }

  return { jobs, files, issues };
}

export function describeIssues(issues: readonly CatalogIssue[]): string {
  return issues
    .map((issue) => {
      const where = issue.index === undefined ? issue.file : `${issue.file}[${issue.index}]`;
      return `${where}: ${issue.message}`;
    })
    .join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readDefinitions(file: string, issues: CatalogIssue[]): Promise<unknown[]> {
  let doc: unknown;
  try {
    const raw = await fse.readFile(file, "utf8");
    doc = path.extname(file) === ".json" ? JSON.parse(raw) : yaml.load(raw);
  } catch (err) {
    issues.push({ file, message: `Failed to parse catalog file: ${formatErrorMessage(err)}` });
    return [];
  }

  if (doc === undefined || doc === null) {
    return [];
  }

  const parsed = CatalogFileSchema.safeParse(doc);
  if (!parsed.success) {
    issues.push({ file, message: "Catalog file must be a list of job definitions" });
    return [];
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.jobs;
}
