import type { CatalogEntry, JobCatalog } from "../config.js";
import type { JobBody, JobRegistration } from "../types.js";
import type { CollectorClient } from "./collector-client.js";

export function createJobBody(entry: CatalogEntry, client: CollectorClient): JobBody {
  const { path, payload } = entry.action;
  return (ctx) =>
    client.collect(path, {
      job_id: ctx.jobId,
      job_name: ctx.jobName,
      fired_at: ctx.firedAt.toISOString(),
      payload,
    });
}

/** Turn catalog entries into engine registrations, in catalog order. */
export function toRegistrations(catalog: JobCatalog, client: CollectorClient): JobRegistration[] {
  return catalog.jobs.map((entry) => ({
    id: entry.id,
    name: entry.name,
    intervalMinutes: entry.time_interval_minutes,
    enabled: entry.enabled,
    body: createJobBody(entry, client),
  }));
}
