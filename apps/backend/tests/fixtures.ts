import { StoreUnavailableError } from "../src/errors.js";
import type { JobStore, RedisHashClient, RedisTransaction } from "../src/data/job-store.js";
import type { JobMetadata } from "../src/types.js";

export const MINUTE = 60_000;

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

type StoreOperation = keyof JobStore;

/**
 * Wraps a store and fails chosen operations (or gets for chosen ids) with
 * StoreUnavailableError, the way an unreachable backend would.
 */
export class FlakyJobStore implements JobStore {
  readonly failing = new Set<StoreOperation>();
  readonly failingGets = new Set<string>();
  readonly calls: string[] = [];

  constructor(private readonly inner: JobStore) {}

  private check(op: StoreOperation): void {
    this.calls.push(op);
    if (this.failing.has(op)) {
      throw new StoreUnavailableError(op, new Error("connection refused"));
    }
  }

  async ping(): Promise<void> {
    this.check("ping");
    return this.inner.ping();
  }

  async get(jobId: string): Promise<JobMetadata | null> {
    this.check("get");
    if (this.failingGets.has(jobId)) {
      throw new StoreUnavailableError("get", new Error("read timed out"));
    }
    return this.inner.get(jobId);
  }

  async list(): Promise<JobMetadata[]> {
    this.check("list");
    return this.inner.list();
  }

  async upsert(metadata: JobMetadata): Promise<void> {
    this.check("upsert");
    return this.inner.upsert(metadata);
  }

  async setInterval(jobId: string, minutes: number): Promise<boolean> {
    this.check("setInterval");
    return this.inner.setInterval(jobId, minutes);
  }

  async setEnabled(jobId: string, enabled: boolean): Promise<boolean> {
    this.check("setEnabled");
    return this.inner.setEnabled(jobId, enabled);
  }

  async delete(jobId: string): Promise<boolean> {
    this.check("delete");
    return this.inner.delete(jobId);
  }
}

type Reply = [Error | null, unknown];

/** Queues commands and applies them together on exec, or not at all when the connection is down. */
class FakeTransaction implements RedisTransaction {
  private queued: Array<[string, () => Promise<unknown>]> = [];

  constructor(private readonly redis: FakeRedis) {}

  hset(key: string, data: Record<string, string>): RedisTransaction {
    this.queued.push(["hset", () => this.redis.hset(key, data)]);
    return this;
  }

  del(...keys: string[]): RedisTransaction {
    this.queued.push(["del", () => this.redis.del(...keys)]);
    return this;
  }

  sadd(key: string, ...members: string[]): RedisTransaction {
    this.queued.push(["sadd", () => this.redis.sadd(key, ...members)]);
    return this;
  }

  srem(key: string, ...members: string[]): RedisTransaction {
    this.queued.push(["srem", () => this.redis.srem(key, ...members)]);
    return this;
  }

  async exec(): Promise<Reply[] | null> {
    this.redis.transactions += 1;
    this.redis.up();
    const replies: Reply[] = [];
    for (const [name, run] of this.queued) {
      if (this.redis.failingCommands.has(name)) {
        replies.push([new Error(`ERR ${name} failed`), null]);
      } else {
        replies.push([null, await run()]);
      }
    }
    return replies;
  }
}

/** In-process stand-in for the Redis commands the Redis job store issues. */
export class FakeRedis implements RedisHashClient {
  readonly hashes = new Map<string, Map<string, string>>();
  readonly sets = new Map<string, Set<string>>();
  /** Commands that reply with an error when run inside a transaction. */
  readonly failingCommands = new Set<string>();
  transactions = 0;
  down = false;

  up(): void {
    if (this.down) throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
  }

  multi(): RedisTransaction {
    return new FakeTransaction(this);
  }

  async ping(): Promise<string> {
    this.up();
    return "PONG";
  }

  async exists(...keys: string[]): Promise<number> {
    this.up();
    return keys.filter((k) => this.hashes.has(k) || this.sets.has(k)).length;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    this.up();
    return Object.fromEntries(this.hashes.get(key) ?? new Map<string, string>());
  }

  async hset(key: string, data: Record<string, string>): Promise<number> {
    this.up();
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    let added = 0;
    for (const [field, value] of Object.entries(data)) {
      if (!hash.has(field)) added += 1;
      hash.set(field, value);
    }
    this.hashes.set(key, hash);
    return added;
  }

  async del(...keys: string[]): Promise<number> {
    this.up();
    let removed = 0;
    for (const key of keys) {
      if (this.hashes.delete(key) || this.sets.delete(key)) removed += 1;
    }
    return removed;
  }

  async sadd(key: string, ...members: string[]): Promise<number> {
    this.up();
    const set = this.sets.get(key) ?? new Set<string>();
    const before = set.size;
    for (const m of members) set.add(m);
    this.sets.set(key, set);
    return set.size - before;
  }

  async srem(key: string, ...members: string[]): Promise<number> {
    this.up();
    const set = this.sets.get(key);
    if (!set) return 0;
    let removed = 0;
    for (const m of members) if (set.delete(m)) removed += 1;
    if (set.size === 0) this.sets.delete(key);
    return removed;
  }

  async smembers(key: string): Promise<string[]> {
    this.up();
    return [...(this.sets.get(key) ?? [])];
  }
}
