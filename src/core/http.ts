import { AdapterError } from "./errors";
import { isTransientError, withRetry } from "./retry";

/** An HTTP status worth retrying: throttling or a server-side failure. */
class RetryableStatusError extends Error {
  constructor(readonly status: number, url: string) {
    super(`HTTP ${status} from ${url}`);
    this.name = "RetryableStatusError";
  }
}

function shouldRetry(error: unknown): boolean {
  return error instanceof RetryableStatusError || isTransientError(error);
}

function redact(url: string): string {
  return url.replace(/([?&](?:key|api_key|password)=)[^&]*/gi, "$1***");
}

export interface FetchJsonOptions {
  headers?: Record<string, string>;
  retries?: number;
  baseDelayMs?: number;
}

/**
 * GET a JSON document for an adapter. Network failures, 429 and 5xx responses
 * are retried with backoff; any other failure becomes an `AdapterError`.
 * Credentials in the query string are masked in error messages.
 */
export async function fetchJson(adapterId: string, url: string, options: FetchJsonOptions = {}): Promise<unknown> {
  const safeUrl = redact(url);
  try {
    return await withRetry(
      async () => {
        const res = await fetch(url, { headers: { Accept: "application/json", ...options.headers } });
        if (res.status === 429 || res.status >= 500) {
          throw new RetryableStatusError(res.status, safeUrl);
        }
        if (!res.ok) {
          throw new AdapterError(adapterId, `HTTP ${res.status} from ${safeUrl}`);
        }
        const body: unknown = await res.json();
        return body;
      },
      `${adapterId} GET ${safeUrl}`,
      { retries: options.retries, baseDelayMs: options.baseDelayMs, isTransient: shouldRetry },
    );
  } catch (err) {
    if (err instanceof AdapterError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new AdapterError(adapterId, `Request failed: ${message}`);
  }
}
