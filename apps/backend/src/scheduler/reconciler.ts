/**
 * The only write path for the control surface. Every mutation hits the engine first
 * (it decides what actually runs), then mirrors the result into the job store.
 * Mutations on one job id are serialized; listing runs alongside them.
 */
import createDebug from "debug";
import {
  InvalidIntervalError,
  StoreUnavailableError,
  assertValidInterval,
} from "../errors.js";
import type { JobStore } from "../data/job-store.js";
import type {
  CommandResult,
  JobDescriptor,
  JobListing,
  JobMetadata,
  JobRegistration,
} from "../types.js";
import type { SchedulerEngine } from "./engine.js";
import { KeyedLock } from "./keyed-lock.js";

const debug = createDebug("cadence:reconciler");

/** What each command did to the engine; a partial failure reports this before the stale mirror. */
const ACTIONS = {
  started: "Job started",
  paused: "Job paused",
  updated: "Job updated",
  deleted: "Job deleted",
  registered: "Job registered",
} as const;

type Action = keyof typeof ACTIONS;

export const MESSAGES = {
  started: "Job started successfully",
  paused: "Job paused successfully",
  updated: "Job updated successfully",
  deleted: "Job deleted successfully",
  registered: "Job registered successfully",
  notFound: "Job not found",
  invalidInterval: "Time interval must be a positive whole number of minutes",
  storeStale: "persisted job metadata could not be updated and is stale",
} as const;

function ok(message: string): CommandResult {
  return { success: true, status: "ok", message };
}

function notFound(): CommandResult {
  return { success: false, status: "not_found", message: MESSAGES.notFound };
}

function partialFailure(done: string, err: StoreUnavailableError): CommandResult {
  return {
    success: false,
    status: "partial_failure",
    message: `${done}, but ${MESSAGES.storeStale} (${err.message})`,
  };
}

function metadataFor(job: JobDescriptor): JobMetadata {
  return {
    job_id: job.id,
    time_interval_minutes: job.intervalMinutes,
    enabled: job.state === "scheduled",
  };
}

function toListing(
  job: JobDescriptor,
  row: JobMetadata | null,
  metadata: JobListing["metadata"],
): JobListing {
  return {
    id: job.id,
    name: job.name,
    time_interval_minutes: row ? row.time_interval_minutes : null,
    enabled: row ? row.enabled : null,
    state: job.state,
    next_run_at: job.nextRunAt,
    last_run: job.lastRun,
    metadata,
  };
}

export class Reconciler {
  private engine: SchedulerEngine;
  private store: JobStore;
  private locks = new KeyedLock();

  constructor(engine: SchedulerEngine, store: JobStore) {
    this.engine = engine;
    this.store = store;
  }

  /**
   * Adds a job to the engine and seeds its metadata. A persisted row from an earlier
   * run wins over the registration's interval and enabled flag.
   */
  registerJob(reg: JobRegistration): Promise<CommandResult> {
    return this.locks.run(reg.id, async () => {
      let stored: JobMetadata | null = null;
      let lookupError: StoreUnavailableError | null = null;
      try {
        stored = await this.store.get(reg.id);
      } catch (err) {
        if (!(err instanceof StoreUnavailableError)) throw err;
        lookupError = err;
      }

      const interval = stored?.time_interval_minutes ?? reg.intervalMinutes;
      const enabled = stored?.enabled ?? reg.enabled;
      let job = this.engine.register(reg.id, reg.name, interval, reg.body);
      if (!enabled) job = this.engine.pause(reg.id);

      if (lookupError) {
        debug("Registered %s from defaults; store lookup failed", reg.id);
        return partialFailure(ACTIONS.registered, lookupError);
      }
      if (stored) {
        debug("Registered %s from stored metadata (%d min, enabled=%s)", reg.id, interval, enabled);
        return ok(MESSAGES.registered);
      }
      return this.mirror("registered", () => this.store.upsert(metadataFor(job)));
    });
  }

  startJob(jobId: string): Promise<CommandResult> {
    return this.locks.run(jobId, async () => {
      if (!this.engine.has(jobId)) {
        debug("Job %s not found for starting", jobId);
        return notFound();
      }
      const job = this.engine.resume(jobId);
      return this.mirror("started", () => this.writeEnabled(job));
    });
  }

  pauseJob(jobId: string): Promise<CommandResult> {
    return this.locks.run(jobId, async () => {
      if (!this.engine.has(jobId)) {
        debug("Job %s not found for pausing", jobId);
        return notFound();
      }
      const job = this.engine.pause(jobId);
      return this.mirror("paused", () => this.writeEnabled(job));
    });
  }

  updateInterval(jobId: string, minutes: number): Promise<CommandResult> {
    try {
      assertValidInterval(minutes);
    } catch (err) {
      if (!(err instanceof InvalidIntervalError)) throw err;
      debug("Rejected interval %s for %s", String(minutes), jobId);
      const rejected: CommandResult = {
        success: false,
        status: "invalid_interval",
        message: MESSAGES.invalidInterval,
      };
      return Promise.resolve(rejected);
    }
    return this.locks.run(jobId, async () => {
      if (!this.engine.has(jobId)) {
        debug("Job %s not found for updating", jobId);
        return notFound();
      }
      const job = this.engine.reschedule(jobId, minutes);
      return this.mirror("updated", async () => {
        const updated = await this.store.setInterval(jobId, job.intervalMinutes);
        if (!updated) await this.store.upsert(metadataFor(job));
      });
    });
  }

  /** Idempotent: an id unknown to both engine and store still reports success. */
  deleteJob(jobId: string): Promise<CommandResult> {
    return this.locks.run(jobId, async () => {
      const removed = this.engine.remove(jobId);
      if (!removed) debug("Job %s not in engine; deleting metadata only", jobId);
      return this.mirror("deleted", async () => {
        await this.store.delete(jobId);
      });
    });
  }

  /**
   * Live jobs enriched with their metadata. A missing or unreadable row marks that
   * entry with null interval/enabled instead of failing the listing; only an
   * unreachable store fails it as a whole.
   */
  async listJobs(): Promise<JobListing[]> {
    await this.store.ping();
    const jobs = this.engine.list();
    const rows = await Promise.allSettled(jobs.map((job) => this.store.get(job.id)));
    return jobs.map((job, i) => {
      const result = rows[i];
      if (result.status === "rejected") {
        debug("Metadata lookup for %s failed: %o", job.id, result.reason);
        return toListing(job, null, "unavailable");
      }
      if (!result.value) return toListing(job, null, "missing");
      return toListing(job, result.value, "ok");
    });
  }

  async getJob(jobId: string): Promise<JobListing | null> {
    const job = this.engine.find(jobId);
    if (!job) return null;
    try {
      const row = await this.store.get(jobId);
      return toListing(job, row, row ? "ok" : "missing");
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      debug("Metadata lookup for %s failed: %s", jobId, err.message);
      return toListing(job, null, "unavailable");
    }
  }

  /** Deletes metadata rows whose job is not registered in the engine. Returns the pruned ids. */
  async pruneOrphans(): Promise<string[]> {
    const rows = await this.store.list();
    const pruned: string[] = [];
    for (const row of rows) {
      const removed = await this.locks.run(row.job_id, async () => {
        if (this.engine.has(row.job_id)) return false;
        return this.store.delete(row.job_id);
      });
      if (removed) pruned.push(row.job_id);
    }
    if (pruned.length > 0) debug("Pruned orphan metadata: %o", pruned);
    return pruned;
  }

  private async writeEnabled(job: JobDescriptor): Promise<void> {
    const updated = await this.store.setEnabled(job.id, job.state === "scheduled");
    if (!updated) await this.store.upsert(metadataFor(job));
  }

  private async mirror(action: Action, write: () => Promise<void>): Promise<CommandResult> {
    try {
      await write();
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      debug("%s; store mirror failed: %s", ACTIONS[action], err.message);
      return partialFailure(ACTIONS[action], err);
    }
    debug(MESSAGES[action]);
    return ok(MESSAGES[action]);
  }
}
