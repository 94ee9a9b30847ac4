/** Live run state of a job inside the engine. */
export type JobState = "scheduled" | "paused";

export interface LastRun {
  startedAt: string; // ISO
  finishedAt: string | null; // ISO; null while running
  ok: boolean | null; // null while running
  error: string | null;
}

/** Snapshot of a job as the engine sees it. */
export interface JobDescriptor {
  id: string;
  name: string;
  intervalMinutes: number;
  state: JobState;
  nextRunAt: string | null; // ISO; null when paused
  running: boolean;
  lastRun: LastRun | null;
  /** Firings dropped because the previous firing of this job was still running. */
  skippedFirings: number;
}

/** Durable mirror of a job's configuration. */
export interface JobMetadata {
  job_id: string;
  time_interval_minutes: number;
  enabled: boolean;
}

export interface FiringContext {
  jobId: string;
  jobName: string;
  firedAt: Date;
}

/** What a job does when it fires. May reject; the schedule continues either way. */
export type JobBody = (ctx: FiringContext) => Promise<void>;

export interface JobRegistration {
  id: string;
  name: string;
  intervalMinutes: number;
  /** Catalog default; a persisted metadata row overrides it. */
  enabled: boolean;
  body: JobBody;
}

export type CommandStatus =
  | "ok"
  | "not_found"
  | "invalid_interval"
  | "partial_failure";

/** Outcome of a control command. `success` is true only for status "ok". */
export interface CommandResult {
  success: boolean;
  status: CommandStatus;
  message: string;
}

/**
 * "missing": no metadata row for a live job.
 * "unavailable": the row could not be read for this job.
 */
export type MetadataStatus = "ok" | "missing" | "unavailable";

export interface JobListing {
  id: string;
  name: string;
  /** null when metadata is missing or unavailable */
  time_interval_minutes: number | null;
  /** null when metadata is missing or unavailable */
  enabled: boolean | null;
  state: JobState;
  next_run_at: string | null;
  last_run: LastRun | null;
  metadata: MetadataStatus;
}
