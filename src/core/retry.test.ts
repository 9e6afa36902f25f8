import { beforeEach, describe, expect, it, vi } from "vitest";
import { isTransientError, withRetry } from "./retry";

describe("isTransientError", () => {
  it("recognises busy databases and dropped connections", () => {
    expect(isTransientError(new Error("SQLITE_BUSY: database is locked"))).toBe(true);
    expect(isTransientError(new TypeError("fetch failed"))).toBe(true);
    expect(isTransientError("read ECONNRESET")).toBe(true);
  });

  it("rejects everything else", () => {
    expect(isTransientError(new Error("UNIQUE constraint failed"))).toBe(false);
  });
});

describe("withRetry", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("returns the first successful result", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("fetch failed")).mockResolvedValueOnce("ok");
    await expect(withRetry(fn, "test", { baseDelayMs: 0 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("rethrows a permanent error at once", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("syntax error"));
    await expect(withRetry(fn, "test", { baseDelayMs: 0 })).rejects.toThrow("syntax error");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up after the configured attempts", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("database is locked"));
    await expect(withRetry(fn, "test", { retries: 2, baseDelayMs: 0 })).rejects.toThrow("database is locked");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("accepts a custom transient check", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("odd")).mockResolvedValueOnce(1);
    await expect(withRetry(fn, "test", { baseDelayMs: 0, isTransient: () => true })).resolves.toBe(1);
  });
});
