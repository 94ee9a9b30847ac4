/**
 * HTTP client job bodies use to trigger a collection run on the collector service.
 * Each firing POSTs one JSON request; a non-2xx answer fails the firing.
 */
import createDebug from "debug";

const debug = createDebug("cadence:collector");

const DEFAULT_HEADERS = { "Content-Type": "application/json" };

export interface CollectorClientOptions {
  baseUrl: string;
  /** Optional secret sent as X-Internal-Secret; must match the collector's own setting. */
  secret?: string;
}

export interface CollectRequest {
  job_id: string;
  job_name: string;
  fired_at: string; // ISO
  payload: Record<string, unknown>;
}

export interface CollectorClient {
  collect: (path: string, request: CollectRequest) => Promise<void>;
}

export function createCollectorClient(options: CollectorClientOptions): CollectorClient {
  const { baseUrl, secret } = options;
  const root = baseUrl.replace(/\/$/, "");
  const headers: Record<string, string> = { ...DEFAULT_HEADERS };
  if (secret) headers["X-Internal-Secret"] = secret;

  return {
    async collect(path: string, request: CollectRequest): Promise<void> {
      const url = `${root}${path}`;
      const res = await fetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify(request),
      });
      if (!res.ok) {
        const text = await res.text();
        throw new Error(`collect failed: ${res.status} ${text}`);
      }
      debug("%s collected via %s (%d)", request.job_id, path, res.status);
    },
  };
}
