// ---------------------------------------------------------------------------
// Retry helper
// ---------------------------------------------------------------------------

export const MAX_RETRIES = 3;
export const BASE_DELAY_MS = 200;

/** Errors that look transient: a locked database, a dropped connection, a throttled upstream. */
export function isTransientError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return (
    message.includes("SQLITE_BUSY") ||
    message.includes("database is locked") ||
    message.includes("network") ||
    message.includes("fetch failed") ||
    message.includes("ECONNRESET") ||
    message.includes("ETIMEDOUT") ||
    message.includes("Too many requests")
  );
}

export interface RetryOptions {
  retries?: number;
  baseDelayMs?: number;
  isTransient?: (error: unknown) => boolean;
}

/**
 * Retry a function with exponential backoff.
 * Only retries on errors that `isTransient` accepts; anything else is rethrown at once.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  options: RetryOptions = {},
): Promise<T> {
  const retries = options.retries ?? MAX_RETRIES;
  const baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
  const isTransient = options.isTransient ?? isTransientError;

  let lastError: unknown;
  for (let attempt = 0; attempt < retries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;
      if (!isTransient(error) || attempt === retries - 1) throw error;
      const delay = baseDelayMs * 2 ** attempt;
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[retry] ${label} attempt ${attempt + 1} failed, retrying in ${delay}ms:`, message);
      await new Promise((r) => setTimeout(r, delay));
    }
  }
  throw lastError;
}
