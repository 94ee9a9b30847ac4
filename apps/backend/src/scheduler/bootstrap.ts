import createDebug from "debug";
import { DuplicateIdError, StoreUnavailableError } from "../errors.js";
import type { JobRegistration } from "../types.js";
import type { Reconciler } from "./reconciler.js";

const debug = createDebug("cadence:bootstrap");

export interface BootstrapSummary {
  registered: string[];
  /** Registered, but metadata could not be read or seeded. */
  stale: string[];
  duplicates: string[];
  pruned: string[];
}

/**
 * Register every known job, then drop metadata rows left behind by jobs that
 * are no longer registered. A store outage degrades to catalog defaults.
 */
export async function bootstrapJobs(
  reconciler: Reconciler,
  registrations: JobRegistration[],
): Promise<BootstrapSummary> {
  const summary: BootstrapSummary = {
    registered: [],
    stale: [],
    duplicates: [],
    pruned: [],
  };

  for (const reg of registrations) {
    try {
      const result = await reconciler.registerJob(reg);
      summary.registered.push(reg.id);
      if (result.status === "partial_failure") {
        summary.stale.push(reg.id);
        debug("%s: %s", reg.id, result.message);
      }
    } catch (err) {
      if (!(err instanceof DuplicateIdError)) throw err;
      summary.duplicates.push(reg.id);
      debug("Skipping duplicate registration %s", reg.id);
    }
  }

  try {
    summary.pruned = await reconciler.pruneOrphans();
  } catch (err) {
    if (!(err instanceof StoreUnavailableError)) throw err;
    debug("Orphan metadata not pruned: %s", err.message);
  }

  debug(
    "Bootstrap: %d registered, %d stale, %d duplicate, %d pruned",
    summary.registered.length,
    summary.stale.length,
    summary.duplicates.length,
    summary.pruned.length,
  );
  return summary;
}
