import { z } from "zod";

import { DEFAULT_MANUAL_OVERHEAD_SECONDS } from "./session-state.js";

const ResumeConfigSchema = z
  .object({
    check_references: z.boolean().default(false),
    // Implies check_references.
    rewrite_legacy_paths: z.boolean().default(false),
    ignore_checksum: z.boolean().default(false),
  })
  .strict();

export const CertrunConfigSchema = z
  .object({
    // Defaults to $CERTRUN_HOME/sessions.
    session_root: z.string().min(1).optional(),

    // Glob patterns of YAML/JSON job catalog files, relative to the config file.
    catalog: z.array(z.string().min(1)).default([]),

    manual_overhead_seconds: z.number().nonnegative().default(DEFAULT_MANUAL_OVERHEAD_SECONDS),

    resume: ResumeConfigSchema.default({}),
  })
  .strict();

export type CertrunConfigInput = z.input<typeof CertrunConfigSchema>;

/** Config with defaults applied and paths made absolute. */
export type CertrunConfig = Omit<z.infer<typeof CertrunConfigSchema>, "session_root"> & {
  session_root: string;
  /** Directory that relative catalog patterns resolve against. */
  base_dir: string;
};
