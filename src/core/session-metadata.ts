export const SESSION_FLAGS = {
  incomplete: "incomplete",
  submitted: "submitted",
  bootstrapping: "bootstrapping",
} as const;

export type KnownSessionFlag = (typeof SESSION_FLAGS)[keyof typeof SESSION_FLAGS];

/** Application-level annotations stored alongside the session. */
export class SessionMetadata {
  title: string | null = null;
  flags = new Set<string>();
  runningJobName: string | null = null;
  /** Opaque bytes owned by the application driving the session. */
  appBlob: Buffer | null = null;
  appId: string | null = null;

  isIncomplete(): boolean {
    return this.flags.has(SESSION_FLAGS.incomplete);
  }
}
