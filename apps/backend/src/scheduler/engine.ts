/**
 * Scheduler engine: owns the live interval jobs of this process. Each scheduled job
 * holds one pending node-schedule trigger at now + interval; when it fires, the next
 * trigger is armed before the body starts, so a slow body never delays any schedule.
 * A job whose previous firing is still running skips the new firing instead of overlapping.
 */
import createDebug from "debug";
import schedule from "node-schedule";
import {
  DuplicateIdError,
  InvalidIntervalError,
  NotFoundError,
  assertValidInterval,
} from "../errors.js";
import type {
  FiringContext,
  JobBody,
  JobDescriptor,
  JobState,
  LastRun,
} from "../types.js";

const debug = createDebug("cadence:engine");

const MINUTE_MS = 60_000;

type Trigger = ReturnType<typeof schedule.scheduleJob>;

interface EngineJob {
  id: string;
  name: string;
  intervalMinutes: number;
  state: JobState;
  body: JobBody;
  trigger: Trigger | null;
  nextRunAt: Date | null;
  running: Promise<void> | null;
  lastRun: LastRun | null;
  skippedFirings: number;
}

export type FiringErrorHandler = (jobId: string, error: unknown) => void;

export interface SchedulerEngineOptions {
  /** Called with every error a job body throws. Never affects the schedule. */
  onFiringError?: FiringErrorHandler;
}

export interface ShutdownReport {
  finished: number;
  abandoned: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class SchedulerEngine {
  private jobs = new Map<string, EngineJob>();
  private inFlight = new Set<Promise<void>>();
  private onFiringError?: FiringErrorHandler;
  private closed = false;

  constructor(options: SchedulerEngineOptions = {}) {
    this.onFiringError = options.onFiringError;
  }

  register(id: string, name: string, intervalMinutes: number, body: JobBody): JobDescriptor {
    if (this.closed) throw new Error("Scheduler engine is shut down");
    if (this.jobs.has(id)) throw new DuplicateIdError(id);
    assertValidInterval(intervalMinutes);
    const job: EngineJob = {
      id,
      name,
      intervalMinutes,
      state: "scheduled",
      body,
      trigger: null,
      nextRunAt: null,
      running: null,
      lastRun: null,
      skippedFirings: 0,
    };
    this.arm(job);
    this.jobs.set(id, job);
    debug("Registered %s (%s) every %d min", id, name, intervalMinutes);
    return this.describe(job);
  }

  list(): JobDescriptor[] {
    return [...this.jobs.values()].map((job) => this.describe(job));
  }

  find(id: string): JobDescriptor | null {
    const job = this.jobs.get(id);
    return job ? this.describe(job) : null;
  }

  has(id: string): boolean {
    return this.jobs.has(id);
  }

  pause(id: string): JobDescriptor {
    const job = this.require(id);
    if (job.state === "paused") return this.describe(job);
    job.state = "paused";
    this.disarm(job);
    debug("Paused %s", id);
    return this.describe(job);
  }

  resume(id: string): JobDescriptor {
    const job = this.require(id);
    if (job.state === "scheduled") return this.describe(job);
    job.state = "scheduled";
    this.arm(job);
    debug("Resumed %s; next run %s", id, job.nextRunAt?.toISOString());
    return this.describe(job);
  }

  /** Replaces the interval. A scheduled job's next firing moves to now + the new interval. */
  reschedule(id: string, intervalMinutes: number): JobDescriptor {
    assertValidInterval(intervalMinutes);
    const job = this.require(id);
    if (job.state === "scheduled") this.arm(job, intervalMinutes);
    job.intervalMinutes = intervalMinutes;
    debug("Rescheduled %s to every %d min", id, intervalMinutes);
    return this.describe(job);
  }

  /** Returns false when the id was never registered (nothing to remove). */
  remove(id: string): boolean {
    const job = this.jobs.get(id);
    if (!job) return false;
    this.disarm(job);
    this.jobs.delete(id);
    debug("Removed %s", id);
    return true;
  }

  /**
   * Cancels every pending trigger and waits up to graceMs for running firings.
   * Firings still running after that are abandoned.
   */
  async shutdown(graceMs: number): Promise<ShutdownReport> {
    this.closed = true;
    for (const job of this.jobs.values()) this.disarm(job);
    const pending = [...this.inFlight];
    if (pending.length === 0) return { finished: 0, abandoned: 0 };

    let finished = 0;
    const tracked = pending.map((p) =>
      p.then(() => {
        finished += 1;
      }),
    );
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, graceMs);
    });
    await Promise.race([Promise.all(tracked).then(() => undefined), timeout]);
    clearTimeout(timer);
    const report = { finished, abandoned: pending.length - finished };
    debug("Shutdown: %d firing(s) finished, %d abandoned", report.finished, report.abandoned);
    return report;
  }

  private require(id: string): EngineJob {
    const job = this.jobs.get(id);
    if (!job) throw new NotFoundError(id);
    return job;
  }

  /** Replaces the pending trigger. Throws, leaving the job untouched, when no trigger can be set. */
  private arm(job: EngineJob, intervalMinutes: number = job.intervalMinutes): void {
    if (this.closed) {
      this.disarm(job);
      return;
    }
    const at = new Date(Date.now() + intervalMinutes * MINUTE_MS);
    if (Number.isNaN(at.getTime())) throw new InvalidIntervalError(intervalMinutes);
    const trigger = schedule.scheduleJob(at, () => {
      this.onDue(job);
    });
    if (!trigger) throw new InvalidIntervalError(intervalMinutes);
    this.disarm(job);
    job.trigger = trigger;
    job.nextRunAt = at;
  }

  private disarm(job: EngineJob): void {
    if (job.trigger) {
      job.trigger.cancel();
      job.trigger = null;
    }
    job.nextRunAt = null;
  }

  private onDue(job: EngineJob): void {
    job.trigger = null;
    // removed or paused between arming and firing
    if (this.jobs.get(job.id) !== job || job.state !== "scheduled") return;
    this.arm(job);
    if (job.running) {
      job.skippedFirings += 1;
      debug("Skipping firing of %s: previous firing still running", job.id);
      return;
    }
    this.fire(job, new Date());
  }

  private fire(job: EngineJob, firedAt: Date): void {
    const ctx: FiringContext = { jobId: job.id, jobName: job.name, firedAt };
    const lastRun: LastRun = {
      startedAt: firedAt.toISOString(),
      finishedAt: null,
      ok: null,
      error: null,
    };
    job.lastRun = lastRun;
    debug("Firing %s", job.id);

    const run = (async () => {
      try {
        await job.body(ctx);
        lastRun.ok = true;
      } catch (err) {
        lastRun.ok = false;
        lastRun.error = errorMessage(err);
        debug("Firing of %s failed: %o", job.id, err);
        this.reportFiringError(job.id, err);
      } finally {
        lastRun.finishedAt = new Date().toISOString();
        job.running = null;
      }
    })();
    job.running = run;
    this.inFlight.add(run);
    void run.finally(() => this.inFlight.delete(run));
  }

  private reportFiringError(jobId: string, err: unknown): void {
    if (!this.onFiringError) return;
    try {
      this.onFiringError(jobId, err);
    } catch (hookErr) {
      debug("onFiringError hook threw for %s: %o", jobId, hookErr);
    }
  }

  private describe(job: EngineJob): JobDescriptor {
    return {
      id: job.id,
      name: job.name,
      intervalMinutes: job.intervalMinutes,
      state: job.state,
      nextRunAt: job.nextRunAt ? job.nextRunAt.toISOString() : null,
      running: job.running !== null,
      lastRun: job.lastRun ? { ...job.lastRun } : null,
      skippedFirings: job.skippedFirings,
    };
  }
}
