/**
 * Shared Redis client for the job metadata store. Call initRedis(redisUrl) once at
 * process startup, then getRedis() wherever the connection is needed.
 */
import createDebug from "debug";
import { Redis } from "ioredis";

const debug = createDebug("cadence:redis");

let client: Redis | null = null;
let currentUrl = "";

export interface RedisOptions {
  /** Commands that get no reply within this window reject instead of queueing forever. */
  commandTimeoutMs: number;
}

/**
 * Initialize the shared Redis client. Idempotent: same URL is a no-op; different URL replaces the client.
 */
export function initRedis(redisUrl: string, options: RedisOptions): void {
  const url = redisUrl?.trim() ?? "";
  if (url === currentUrl && client) return;
  if (client) {
    client.disconnect();
    client = null;
  }
  currentUrl = url;
  if (!url) return;
  client = new Redis(url, {
    maxRetriesPerRequest: 1,
    commandTimeout: options.commandTimeoutMs,
  });
  client.on("error", (err: Error) => {
    // reconnects on its own; store calls surface the failure to callers
    debug("Redis connection error: %s", err.message);
  });
}

/**
 * Return the shared Redis client, or null if not initialized or URL was empty.
 */
export function getRedis(): Redis | null {
  return client;
}

/**
 * Close the shared client. Call on process shutdown.
 */
export async function closeRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
  }
  currentUrl = "";
}
