/**
 * cadence: one process hosting the interval scheduler, the reconciler that keeps
 * job metadata in step with it, and the HTTP control surface.
 */
import createDebug from "debug";
import http from "http";
import { createApp } from "./app.js";
import { loadJobCatalog } from "./config.js";
import { createMemoryJobStore, createRedisJobStore } from "./data/job-store.js";
import type { JobStore } from "./data/job-store.js";
import { closeRedis, getRedis, initRedis } from "./data/redis.js";
import { env } from "./env.js";
import { toRegistrations } from "./jobs/catalog.js";
import { createCollectorClient } from "./jobs/collector-client.js";
import { bootstrapJobs } from "./scheduler/bootstrap.js";
import { SchedulerEngine } from "./scheduler/engine.js";
import { Reconciler } from "./scheduler/reconciler.js";

const debug = createDebug("cadence:api");

function createJobStore(): JobStore {
  initRedis(env.REDIS_URL, { commandTimeoutMs: env.REDIS_COMMAND_TIMEOUT_MS });
  const redis = getRedis();
  if (redis) {
    debug("Job metadata: Redis (prefix %s)", env.REDIS_KEY_PREFIX);
    return createRedisJobStore(redis, env.REDIS_KEY_PREFIX);
  }
  debug("No Redis: job metadata kept in memory and lost on restart");
  return createMemoryJobStore();
}

async function main() {
  const store = createJobStore();
  const engine = new SchedulerEngine({
    onFiringError: (jobId, err) => {
      debug("Job %s firing failed: %o", jobId, err);
    },
  });
  const reconciler = new Reconciler(engine, store);

  const catalog = await loadJobCatalog();
  const collector = createCollectorClient({
    baseUrl: env.COLLECTOR_BASE_URL,
    secret: env.COLLECTOR_SECRET || undefined,
  });
  await bootstrapJobs(reconciler, toRegistrations(catalog, collector));

  const app = createApp({ reconciler });
  const server = http.createServer(app);
  server.listen(env.PORT, () => {
    debug("cadence listening on http://localhost:%s", env.PORT);
  });

  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await engine.shutdown(env.SHUTDOWN_GRACE_MS);
    await closeRedis();
    debug("cadence stopped.");
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      debug("Shutdown failed: %o", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  debug("cadence failed to start: %o", err);
  process.exit(1);
});
