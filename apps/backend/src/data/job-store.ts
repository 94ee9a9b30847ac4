import createDebug from "debug";
import {
  StoreUnavailableError,
  assertValidInterval,
  isSchedulerError,
  isValidInterval,
} from "../errors.js";
import type { JobMetadata } from "../types.js";

const debug = createDebug("cadence:store");

/**
 * Durable job metadata keyed by job id. Field updates go through the closed set
 * setInterval / setEnabled; both return false when no row exists and never create one.
 * Backend failures surface as StoreUnavailableError.
 */
export interface JobStore {
  ping(): Promise<void>;
  get(jobId: string): Promise<JobMetadata | null>;
  list(): Promise<JobMetadata[]>;
  upsert(metadata: JobMetadata): Promise<void>;
  setInterval(jobId: string, minutes: number): Promise<boolean>;
  setEnabled(jobId: string, enabled: boolean): Promise<boolean>;
  /** Returns whether a row was removed. */
  delete(jobId: string): Promise<boolean>;
}

function assertEnabled(enabled: unknown): asserts enabled is boolean {
  if (typeof enabled !== "boolean") {
    throw new TypeError(`enabled must be a boolean, got ${typeof enabled}`);
  }
}

function validateMetadata(metadata: JobMetadata): void {
  if (!metadata.job_id) throw new TypeError("job_id must be a non-empty string");
  assertValidInterval(metadata.time_interval_minutes);
  assertEnabled(metadata.enabled);
}

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isSchedulerError(err)) throw err;
    debug("%s failed: %o", operation, err);
    throw new StoreUnavailableError(operation, err);
  }
}

/** In-process store. Used when no Redis URL is configured, and in tests. */
export function createMemoryJobStore(seed: JobMetadata[] = []): JobStore {
  const rows = new Map<string, JobMetadata>();
  for (const row of seed) rows.set(row.job_id, { ...row });

  return {
    async ping(): Promise<void> {},

    async get(jobId: string): Promise<JobMetadata | null> {
      const row = rows.get(jobId);
      return row ? { ...row } : null;
    },

    async list(): Promise<JobMetadata[]> {
      return [...rows.values()].map((r) => ({ ...r }));
    },

    async upsert(metadata: JobMetadata): Promise<void> {
      validateMetadata(metadata);
      rows.set(metadata.job_id, { ...metadata });
    },

    async setInterval(jobId: string, minutes: number): Promise<boolean> {
      assertValidInterval(minutes);
      const row = rows.get(jobId);
      if (!row) return false;
      row.time_interval_minutes = minutes;
      return true;
    },

    async setEnabled(jobId: string, enabled: boolean): Promise<boolean> {
      assertEnabled(enabled);
      const row = rows.get(jobId);
      if (!row) return false;
      row.enabled = enabled;
      return true;
    },

    async delete(jobId: string): Promise<boolean> {
      return rows.delete(jobId);
    },
  };
}

/** A MULTI block: commands are queued and sent together on exec. */
export interface RedisTransaction {
  hset(key: string, data: Record<string, string>): RedisTransaction;
  del(...keys: string[]): RedisTransaction;
  sadd(key: string, ...members: string[]): RedisTransaction;
  srem(key: string, ...members: string[]): RedisTransaction;
  exec(): Promise<Array<[Error | null, unknown]> | null>;
}

/** The subset of ioredis commands the Redis store uses. */
export interface RedisHashClient {
  ping(): Promise<string>;
  exists(...keys: string[]): Promise<number>;
  hgetall(key: string): Promise<Record<string, string>>;
  hset(key: string, data: Record<string, string>): Promise<number>;
  smembers(key: string): Promise<string[]>;
  multi(): RedisTransaction;
}

/** Runs a transaction and returns each command's reply, throwing the first command error. */
async function execAll(tx: RedisTransaction): Promise<unknown[]> {
  const results = await tx.exec();
  if (!results) throw new Error("transaction aborted");
  return results.map(([err, reply]) => {
    if (err) throw err;
    return reply;
  });
}

function parseRow(jobId: string, hash: Record<string, string>): JobMetadata | null {
  const minutes = Number(hash.time_interval_minutes);
  const enabled = hash.enabled;
  if (!isValidInterval(minutes)) return null;
  if (enabled !== "1" && enabled !== "0") return null;
  return { job_id: jobId, time_interval_minutes: minutes, enabled: enabled === "1" };
}

/**
 * Redis layout: one hash per job at `<prefix><jobId>` (time_interval_minutes,
 * enabled as "1"/"0", updated_at) and a set `<prefix>index` of known ids. A row and
 * its index entry are written and removed in the same MULTI.
 */
export function createRedisJobStore(redis: RedisHashClient, prefix: string): JobStore {
  const indexKey = `${prefix}index`;
  const rowKey = (jobId: string) => `${prefix}${jobId}`;
  const now = () => new Date().toISOString();

  async function read(jobId: string): Promise<JobMetadata | null> {
    const hash = await redis.hgetall(rowKey(jobId));
    if (Object.keys(hash).length === 0) return null;
    const row = parseRow(jobId, hash);
    if (!row) debug("Ignoring malformed metadata row for %s: %o", jobId, hash);
    return row;
  }

  return {
    async ping(): Promise<void> {
      await guard("ping", () => redis.ping());
    },

    get(jobId: string): Promise<JobMetadata | null> {
      return guard("get", () => read(jobId));
    },

    list(): Promise<JobMetadata[]> {
      return guard("list", async () => {
        const ids = await redis.smembers(indexKey);
        ids.sort();
        const rows: JobMetadata[] = [];
        for (const id of ids) {
          const row = await read(id);
          if (row) rows.push(row);
        }
        return rows;
      });
    },

    async upsert(metadata: JobMetadata): Promise<void> {
      validateMetadata(metadata);
      await guard("upsert", () =>
        execAll(
          redis
            .multi()
            .hset(rowKey(metadata.job_id), {
              time_interval_minutes: String(metadata.time_interval_minutes),
              enabled: metadata.enabled ? "1" : "0",
              updated_at: now(),
            })
            .sadd(indexKey, metadata.job_id),
        ),
      );
    },

    async setInterval(jobId: string, minutes: number): Promise<boolean> {
      assertValidInterval(minutes);
      return guard("setInterval", async () => {
        if ((await redis.exists(rowKey(jobId))) === 0) return false;
        await redis.hset(rowKey(jobId), {
          time_interval_minutes: String(minutes),
          updated_at: now(),
        });
        return true;
      });
    },

    async setEnabled(jobId: string, enabled: boolean): Promise<boolean> {
      assertEnabled(enabled);
      return guard("setEnabled", async () => {
        if ((await redis.exists(rowKey(jobId))) === 0) return false;
        await redis.hset(rowKey(jobId), {
          enabled: enabled ? "1" : "0",
          updated_at: now(),
        });
        return true;
      });
    },

    delete(jobId: string): Promise<boolean> {
      return guard("delete", async () => {
        const [removed] = await execAll(redis.multi().del(rowKey(jobId)).srem(indexKey, jobId));
        return typeof removed === "number" && removed > 0;
      });
    },
  };
}
