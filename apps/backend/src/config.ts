import createDebug from "debug";
import { readFile } from "fs/promises";
import { z } from "zod";
import { env, getDefaultCatalogPath } from "./env.js";
import { MAX_INTERVAL_MINUTES } from "./errors.js";

const debug = createDebug("cadence:config");

const collectActionSchema = z.object({
  type: z.literal("collect"),
  /** Path under COLLECTOR_BASE_URL that the job posts to. */
  path: z.string().trim().min(1).startsWith("/"),
  payload: z.record(z.unknown()).default({}),
});

const catalogEntrySchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  time_interval_minutes: z.number().int().positive().max(MAX_INTERVAL_MINUTES),
  enabled: z.boolean().default(true),
  action: collectActionSchema,
});

export const jobCatalogSchema = z
  .object({ jobs: z.array(catalogEntrySchema) })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.jobs.forEach((job, i) => {
      if (seen.has(job.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["jobs", i, "id"],
          message: `Duplicate job id "${job.id}"`,
        });
      }
      seen.add(job.id);
    });
  });

export type CatalogEntry = z.infer<typeof catalogEntrySchema>;
export type JobCatalog = z.infer<typeof jobCatalogSchema>;

export class CatalogError extends Error {
  constructor(path: string, detail: string) {
    super(`Invalid job catalog ${path}: ${detail}`);
    this.name = "CatalogError";
  }
}

export function parseJobCatalog(raw: unknown, source: string): JobCatalog {
  const result = jobCatalogSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new CatalogError(source, detail);
  }
  return result.data;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readCatalogFile(path: string): Promise<JobCatalog> {
  const text = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new CatalogError(path, err instanceof Error ? err.message : String(err));
  }
  return parseJobCatalog(raw, path);
}

/**
 * Load the job catalog from JOBS_CONFIG_PATH, falling back to the bundled
 * jobs.default.json when that file does not exist.
 */
export async function loadJobCatalog(path: string = env.JOBS_CONFIG_PATH): Promise<JobCatalog> {
  try {
    const catalog = await readCatalogFile(path);
    debug("Loaded %d job(s) from %s", catalog.jobs.length, path);
    return catalog;
  } catch (err) {
    if (!isMissingFile(err)) throw err;
  }
  const fallback = getDefaultCatalogPath();
  const catalog = await readCatalogFile(fallback);
  debug("%s not found; loaded %d default job(s) from %s", path, catalog.jobs.length, fallback);
  return catalog;
}
