import type { Context, Next } from "hono";

/**
 * Cache-Control header middleware.
 *
 * Sets `Cache-Control` and `Vary` on successful responses.
 *
 * Use `staleWhileRevalidate` to allow serving stale content while
 * revalidating in the background.
 */
export function cacheControl(maxAge: number, staleWhileRevalidate?: number) {
  return async (c: Context, next: Next) => {
    await next();
    if (c.res.ok) {
      const swr = staleWhileRevalidate
        ? `, stale-while-revalidate=${staleWhileRevalidate}`
        : "";
      c.res.headers.set("Cache-Control", `public, max-age=${maxAge}${swr}`);
      c.res.headers.set("Vary", "Accept");
    }
  };
}
