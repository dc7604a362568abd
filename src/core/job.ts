import { createHash } from "node:crypto";

import { z } from "zod";

import { CatalogError, ResourceProgramError } from "./errors.js";
import type { ResourceRecord } from "./resource.js";
import { ResourceProgram } from "./resource-program.js";
import { stableStringify } from "./utils.js";

// =============================================================================
// ENUMS
// =============================================================================

export const PluginKindSchema = z.enum([
  "shell",
  "resource",
  "local",
  "manual",
  "user-interact",
  "user-verify",
  "user-interact-verify",
  "attachment",
]);
export type PluginKind = z.infer<typeof PluginKindSchema>;

export const CertificationStatusSchema = z.enum([
  "unspecified",
  "not-part-of-certification",
  "non-blocker",
  "blocker",
]);
export type CertificationStatus = z.infer<typeof CertificationStatusSchema>;

// =============================================================================
// DEFINITIONS
// =============================================================================

const StringListSchema = z.union([z.string(), z.array(z.string())]);

// Local jobs produce definitions as text records, so every field also accepts its string form.
export const JobDefinitionSchema = z
  .object({
    id: z.string().min(1),
    plugin: PluginKindSchema,
    summary: z.string().optional(),
    command: z.string().optional(),
    depends: StringListSchema.optional(),
    requires: StringListSchema.optional(),
    flags: StringListSchema.optional(),
    estimated_duration: z
      .union([z.number().nonnegative(), z.string().regex(/^\d+(\.\d+)?$/)])
      .optional(),
    certification_status: CertificationStatusSchema.optional(),
  })
  .passthrough();
export type JobDefinition = z.infer<typeof JobDefinitionSchema>;

export interface Job {
  readonly id: string;
  readonly plugin: PluginKind;
  readonly summary: string;
  /** SHA-256 of the canonical JSON form of the definition. */
  readonly checksum: string;
  readonly dependencies: readonly string[];
  readonly resourceProgram: ResourceProgram | null;
  readonly flags: ReadonlySet<string>;
  /** Seconds, when the definition declares it. */
  readonly estimatedDuration: number | null;
  readonly certificationStatus: CertificationStatus;
  /** Id of the local job whose output defined this job. */
  readonly via: string | null;
  readonly definition: Readonly<JobDefinition>;
}

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function createJob(input: unknown, opts: { via?: string } = {}): Job {
  const parsed = JobDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    const id = describeDefinitionId(input);
    throw new CatalogError(`Invalid job definition${id}: ${parsed.error.toString()}`);
  }

  const definition = parsed.data;
  let resourceProgram: ResourceProgram | null = null;
  const requires = joinLines(definition.requires);
  if (requires.trim().length > 0) {
    try {
      resourceProgram = new ResourceProgram(requires);
    } catch (err) {
      if (err instanceof ResourceProgramError) {
        throw new CatalogError(`Job ${definition.id} has an invalid requires: ${err.message}`, err);
      }
      throw err;
    }
  }

  return {
    id: definition.id,
    plugin: definition.plugin,
    summary: definition.summary ?? definition.id,
    checksum: computeJobChecksum(definition),
    dependencies: splitList(definition.depends, /[\s,]+/),
    resourceProgram,
    flags: new Set(splitList(definition.flags, /\s+/)),
    estimatedDuration:
      definition.estimated_duration === undefined ? null : Number(definition.estimated_duration),
    certificationStatus: definition.certification_status ?? "unspecified",
    via: opts.via ?? null,
    definition,
  };
}

export function createChildJob(parent: Job, record: ResourceRecord): Job {
  return createJob(record, { via: parent.id });
}

export function computeJobChecksum(definition: JobDefinition): string {
  return createHash("sha256").update(stableStringify(definition), "utf8").digest("hex");
}

// =============================================================================
// QUERIES
// =============================================================================

export function isSameJob(a: Job, b: Job): boolean {
  return a.id === b.id && a.checksum === b.checksum;
}

export function getResourceDependencies(job: Job): string[] {
  return job.resourceProgram?.requiredResources ?? [];
}

export function isAutomatedPlugin(plugin: PluginKind): boolean {
  switch (plugin) {
    case "shell":
    case "resource":
    case "local":
    case "attachment":
      return true;
    case "manual":
    case "user-interact":
    case "user-verify":
    case "user-interact-verify":
      return false;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function splitList(value: string | string[] | undefined, separator: RegExp): string[] {
  if (value === undefined) return [];
  const items = Array.isArray(value) ? value : value.split(separator);
  const seen = new Set<string>();
  for (const item of items) {
    const trimmed = item.trim();
    if (trimmed.length > 0) seen.add(trimmed);
  }
  return [...seen];
}

function joinLines(value: string | string[] | undefined): string {
  if (value === undefined) return "";
  return Array.isArray(value) ? value.join("\n") : value;
}

function describeDefinitionId(input: unknown): string {
  if (input && typeof input === "object" && "id" in input) {
    const { id } = input;
    if (typeof id === "string") return ` ${id}`;
  }
  return "";
}
