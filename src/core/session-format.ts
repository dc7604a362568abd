import path from "node:path";

import { z } from "zod";

import { CorruptedSessionError } from "./errors.js";
import { IOStreamSchema, JobOutcomeSchema } from "./job-result.js";

// =============================================================================
// SHARED PIECES
// =============================================================================

const Base64Schema = z
  .string()
  .regex(/^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/, "is not valid base64");

const IOLogEntrySchema = z.tuple([z.number().nonnegative(), IOStreamSchema, Base64Schema]);

const JobIdListSchema = z.array(z.string());

function resultSchema<F extends z.ZodTypeAny>(filenameSchema: F) {
  return z
    .object({
      outcome: JobOutcomeSchema.nullable(),
      comments: z.string().nullable(),
      return_code: z.number().int().nullable(),
      execution_duration: z.number().nullable(),
      io_log: z.array(IOLogEntrySchema).optional(),
      io_log_filename: filenameSchema.optional(),
    })
    .superRefine((value, ctx) => {
      const hasLog = value.io_log !== undefined;
      const hasFilename = value.io_log_filename !== undefined;
      if (hasLog === hasFilename) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "must have exactly one of io_log and io_log_filename",
        });
      }
    });
}

const AbsoluteFilenameSchema = z
  .string()
  .refine((value) => path.isAbsolute(value), "must be an absolute path");

const V1MetadataSchema = z.object({
  title: z.string().nullable(),
  flags: z.array(z.string()),
  running_job_name: z.string().nullable(),
});
const V2MetadataSchema = V1MetadataSchema.extend({ app_blob: Base64Schema.nullable() });
const V3MetadataSchema = V2MetadataSchema.extend({ app_id: z.string().nullable() });

function sessionSchema<M extends z.ZodTypeAny, R extends z.ZodTypeAny>(metadata: M, result: R) {
  return z.object({
    jobs: z.record(z.string()),
    results: z.record(z.array(result)),
    desired_job_list: JobIdListSchema,
    metadata,
  });
}

const AbsoluteResultSchema = resultSchema(AbsoluteFilenameSchema);
const RelativeResultSchema = resultSchema(z.string().min(1, "cannot be empty"));

const V1SessionSchema = sessionSchema(V1MetadataSchema, AbsoluteResultSchema);
const V2SessionSchema = sessionSchema(V2MetadataSchema, AbsoluteResultSchema);
const V3SessionSchema = sessionSchema(V3MetadataSchema, AbsoluteResultSchema);
const V5SessionSchema = sessionSchema(V3MetadataSchema, RelativeResultSchema);
const V6SessionSchema = V5SessionSchema.extend({ mandatory_job_list: JobIdListSchema });

function documentSchema<S extends z.ZodTypeAny>(session: S) {
  return z.object({ version: z.number().int(), session });
}

export const SessionDocumentSchemas = {
  1: documentSchema(V1SessionSchema),
  2: documentSchema(V2SessionSchema),
  3: documentSchema(V3SessionSchema),
  // Version 4 only changed how results were written, not their layout.
  4: documentSchema(V3SessionSchema),
  5: documentSchema(V5SessionSchema),
  6: documentSchema(V6SessionSchema),
} as const;

// =============================================================================
// NORMALIZED SHAPE
// =============================================================================

export type IOLogEntryRepr = z.infer<typeof IOLogEntrySchema>;
export type ResultRepr = z.infer<typeof RelativeResultSchema>;

export type MetadataRepr = z.infer<typeof V1MetadataSchema> & {
  app_blob?: string | null;
  app_id?: string | null;
};

/** Every version decodes into this shape; fields a version lacks are absent. */
export type SessionRepr = {
  jobs: Record<string, string>;
  results: Record<string, ResultRepr[]>;
  desired_job_list: string[];
  mandatory_job_list?: string[];
  metadata: MetadataRepr;
};

// =============================================================================
// VALIDATION
// =============================================================================

export function validateDocument<S extends z.ZodTypeAny>(schema: S, document: unknown): z.infer<S> {
  const parsed = schema.safeParse(document);
  if (!parsed.success) {
    throw corruptionFromIssue(parsed.error.issues[0]);
  }
  return parsed.data;
}

function formatFieldPath(segments: ReadonlyArray<string | number>): string {
  return segments.map(String).join(".");
}

function corruptionFromIssue(issue: z.ZodIssue | undefined): CorruptedSessionError {
  if (!issue) {
    return new CorruptedSessionError("Session data is invalid");
  }

  const field = formatFieldPath(issue.path);
  const subject = field.length > 0 ? `key ${JSON.stringify(field)}` : "session document";
  if (issue.code === z.ZodIssueCode.invalid_type) {
    if (issue.received === z.ZodParsedType.undefined) {
      return new CorruptedSessionError(`Missing value for ${subject}`, field);
    }
    if (issue.received === z.ZodParsedType.null) {
      return new CorruptedSessionError(`Value of ${subject} cannot be null`, field);
    }
    return new CorruptedSessionError(
      `Value of ${subject} is of incorrect type ${issue.received} (expected ${issue.expected})`,
      field,
    );
  }
  return new CorruptedSessionError(`Value of ${subject} ${issueMessage(issue)}`, field);
}

function issueMessage(issue: z.ZodIssue): string {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_enum_value:
      return `is not one of ${issue.options.map((option) => JSON.stringify(option)).join(", ")}`;
    case z.ZodIssueCode.too_small:
      return issue.type === "number" ? "cannot be negative" : issue.message;
    case z.ZodIssueCode.too_big:
      return "has too many items";
    default:
      return issue.message;
  }
}
