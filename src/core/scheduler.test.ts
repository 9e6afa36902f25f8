import { describe, expect, it, vi } from "vitest";
import { openDb } from "../db/client";
import { ingestLog, sources } from "../db/schema";
import { loadSettings } from "../config/settings";
import { loadBreakpointRegistry } from "../pipeline/breakpoints";
import type { AdapterDefinition } from "./adapter";
import { AdapterError } from "./errors";
import { DAILY, HOURLY, MINUTELY, dueCrons, runAdapter, shouldRun } from "./scheduler";

describe("shouldRun", () => {
  it("maps frequencies onto their cron bucket", () => {
    expect(shouldRun("every_minute", MINUTELY, 7, 3, 2)).toBe(true);
    expect(shouldRun("every_5_minutes", MINUTELY, 10, 3, 2)).toBe(true);
    expect(shouldRun("every_5_minutes", MINUTELY, 11, 3, 2)).toBe(false);
    expect(shouldRun("hourly", HOURLY, 0, 5, 2)).toBe(true);
    expect(shouldRun("hourly", MINUTELY, 0, 5, 2)).toBe(false);
    expect(shouldRun("every_6_hours", HOURLY, 0, 12, 2)).toBe(true);
    expect(shouldRun("every_6_hours", HOURLY, 0, 13, 2)).toBe(false);
    expect(shouldRun("daily", DAILY, 0, 0, 2)).toBe(true);
    expect(shouldRun("weekly", DAILY, 0, 0, 2)).toBe(false);
    expect(shouldRun("weekly", DAILY, 0, 0, 0)).toBe(true);
  });
});

describe("dueCrons", () => {
  it("adds the hourly bucket on the hour and the daily bucket at midnight UTC", () => {
    expect(dueCrons(new Date("2024-06-01T10:15:00Z"))).toEqual([MINUTELY]);
    expect(dueCrons(new Date("2024-06-01T10:00:00Z"))).toEqual([MINUTELY, HOURLY]);
    expect(dueCrons(new Date("2024-06-01T00:00:00Z"))).toEqual([MINUTELY, HOURLY, DAILY]);
  });
});

describe("runAdapter", () => {
  function setup() {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const env = { DB: openDb(":memory:"), settings: loadSettings({}), breakpoints: loadBreakpointRegistry() };
    env.DB.insert(sources)
      .values({ id: "fake", name: "Fake", role: "SECONDARY", createdAt: new Date() })
      .run();
    return env;
  }

  function fakeAdapter(handler: AdapterDefinition["schedules"][number]["handler"]): AdapterDefinition {
    return {
      id: "fake",
      name: "Fake",
      description: "test adapter",
      sourceUrl: "https://example.test",
      role: "SECONDARY",
      schedules: [{ frequency: "hourly", handler, description: "fake run" }],
    };
  }

  it("logs a successful run with its row count", async () => {
    const env = setup();
    const adapter = fakeAdapter(async (ctx) => {
      await ctx.ingestObservations([
        {
          location: { stateCode: "37", countyCode: "063", siteNumber: "0015" },
          pollutantCode: "88101",
          date: "2024-06-01",
          hourLocal: 3,
          value: 4.2,
        },
      ]);
    });

    await runAdapter(adapter, adapter.schedules[0], env, new Date("2024-06-01T04:00:00Z"));

    const [log] = await env.DB.select().from(ingestLog);
    expect(log).toMatchObject({ adapterId: "fake", status: "success", recordsCount: 1 });
    const [source] = await env.DB.select().from(sources);
    expect(source.lastFetchedAt).toBeInstanceOf(Date);
  });

  it("logs a failed run without throwing", async () => {
    const env = setup();
    const adapter = fakeAdapter(async () => {
      throw new AdapterError("fake", "upstream down");
    });

    await expect(runAdapter(adapter, adapter.schedules[0], env)).resolves.toBeUndefined();

    const [log] = await env.DB.select().from(ingestLog);
    expect(log).toMatchObject({ status: "error", error: "[fake] upstream down" });
    const [source] = await env.DB.select().from(sources);
    expect(source.lastFetchedAt).toBeNull();
  });
});
