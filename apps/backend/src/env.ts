import dotenv from "dotenv";
import { basename, join, dirname, resolve } from "path";
import { fileURLToPath } from "url";

/**
 * The repo root for a backend directory, whether it is `apps/backend` in the source
 * tree or the compiled `dist/apps/backend`.
 */
export function resolveProjectRoot(backendRoot: string): string {
  const root = resolve(backendRoot, "..", "..");
  return basename(root) === "dist" ? dirname(root) : root;
}

const __dirname = dirname(fileURLToPath(import.meta.url));
const BACKEND_ROOT = resolve(join(__dirname, ".."));
const PROJECT_ROOT = resolveProjectRoot(BACKEND_ROOT);
const WORKSPACE_ROOT = join(PROJECT_ROOT, "workspace");

// Load .env from project root so it works regardless of the cwd we were started from
dotenv.config({ path: join(PROJECT_ROOT, ".env") });

function str(name: string, defaultValue: string): string {
  const v = process.env[name];
  return (typeof v === "string" && v.trim()) || defaultValue;
}
function num(name: string, defaultValue: number): number {
  const v = process.env[name];
  if (v === undefined || v === "") return defaultValue;
  const n = Number(v);
  return Number.isFinite(n) ? n : defaultValue;
}

/** Loaded once at startup. Use this instead of process.env everywhere. */
export const env = {
  PORT: num("PORT", 3000),
  /** Empty means job metadata lives in process memory only. */
  REDIS_URL: str("REDIS_URL", ""),
  REDIS_KEY_PREFIX: str("REDIS_KEY_PREFIX", "cadence:jobs:"),
  /** A metadata command slower than this counts as the store being unavailable. */
  REDIS_COMMAND_TIMEOUT_MS: num("REDIS_COMMAND_TIMEOUT_MS", 2000),
  JOBS_CONFIG_PATH: str("JOBS_CONFIG_PATH", join(WORKSPACE_ROOT, "jobs.json")),
  COLLECTOR_BASE_URL: str("COLLECTOR_BASE_URL", "http://localhost:5000"),
  /** Optional secret sent as X-Internal-Secret on every collect request. */
  COLLECTOR_SECRET: str("COLLECTOR_SECRET", ""),
  /** How long shutdown waits for in-flight firings before abandoning them. */
  SHUTDOWN_GRACE_MS: num("SHUTDOWN_GRACE_MS", 30_000),
} as const;

export function getDefaultCatalogPath(): string {
  return join(BACKEND_ROOT, "jobs.default.json");
}
