import { beforeEach, describe, expect, it, vi } from "vitest";
import { openDb, type Db } from "../db/client";
import { ingestLog, sites } from "../db/schema";
import type { ObservationInput } from "./adapter";
import {
  createAdapterContext,
  createPipelineStore,
  ingestObservations,
  loadObservations,
  logIngestError,
  logIngestStart,
  logIngestSuccess,
  registerSite,
} from "./storage";
import { loadSettings } from "../config/settings";
import { loadBreakpointRegistry } from "../pipeline/breakpoints";

const SITE = { stateCode: "37", countyCode: "063", siteNumber: "0015" };
const SCOPE = { pollutantCode: "88101", year: 2024 };

function row(hourLocal: number, value: number | null, extra: Partial<ObservationInput> = {}): ObservationInput {
  return { location: SITE, pollutantCode: "88101", date: "2024-03-01", hourLocal, value, ...extra };
}

describe("storage", () => {
  let db: Db;

  beforeEach(() => {
    db = openDb(":memory:");
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  describe("ingestObservations", () => {
    it("writes valid rows and counts malformed ones", async () => {
      const result = await ingestObservations(db, "aqs", "PRIMARY", [
        row(0, 1.5),
        row(1, null),
        row(24, 3),
        row(2, 4, { date: "2024-13-01" }),
        row(3, 5, { poc: 1.5 }),
      ]);

      expect(result).toEqual({ written: 2, skipped: 3 });
      const stored = await loadObservations(db, SCOPE, "PRIMARY");
      expect(stored.map((o) => [o.hourLocal, o.value])).toEqual([
        [0, 1.5],
        [1, null],
      ]);
    });

    it("replaces a re-fetched row instead of duplicating it", async () => {
      await ingestObservations(db, "aqs", "PRIMARY", [row(0, 1)]);
      await ingestObservations(db, "aqs", "PRIMARY", [row(0, 2)]);

      const stored = await loadObservations(db, SCOPE, "PRIMARY");
      expect(stored).toHaveLength(1);
      expect(stored[0].value).toBe(2);
    });

    it("keeps the two sources apart", async () => {
      await ingestObservations(db, "aqs", "PRIMARY", [row(0, 1)]);
      await ingestObservations(db, "envista", "SECONDARY", [row(0, 9)]);

      expect((await loadObservations(db, SCOPE, "PRIMARY")).map((o) => o.value)).toEqual([1]);
      expect((await loadObservations(db, SCOPE, "SECONDARY")).map((o) => [o.value, o.source])).toEqual([
        [9, "SECONDARY"],
      ]);
    });

    it("returns the lowest POC first", async () => {
      await ingestObservations(db, "aqs", "PRIMARY", [row(0, 20, { poc: 3 }), row(0, 10, { poc: 1 })]);
      const stored = await loadObservations(db, SCOPE, "PRIMARY");
      expect(stored.map((o) => o.value)).toEqual([10, 20]);
    });

    it("stores a non-finite value as missing", async () => {
      await ingestObservations(db, "aqs", "PRIMARY", [row(0, Number.NaN)]);
      expect((await loadObservations(db, SCOPE, "PRIMARY"))[0].value).toBeNull();
    });

    it("writes more rows than one insert chunk holds", async () => {
      const rows: ObservationInput[] = [];
      for (let day = 1; day <= 30; day++) {
        for (let h = 0; h < 24; h++) {
          rows.push(row(h, day, { date: `2024-04-${String(day).padStart(2, "0")}` }));
        }
      }
      const result = await ingestObservations(db, "aqs", "PRIMARY", rows);
      expect(result.written).toBe(720);
      expect(await loadObservations(db, SCOPE, "PRIMARY")).toHaveLength(720);
    });
  });

  describe("pipeline store", () => {
    it("replaces a scope's daily rows and reads them back by mode", async () => {
      const store = createPipelineStore(db);
      const record = {
        location: SITE,
        pollutantCode: "88101",
        date: "2024-03-01",
        concAvg: 10,
        aqi: 42,
        dataSource: "PRIMARY" as const,
        hours: 24,
      };

      await store.replaceDaily(SCOPE, "current", "current", [record, { ...record, date: "2024-03-02", aqi: null }]);
      await store.replaceDaily(SCOPE, "current", "current", [record]);
      await store.replaceDaily(SCOPE, "legacy", "legacy", [{ ...record, aqi: 40 }]);

      expect(await store.loadDaily(2024, "current")).toEqual([record]);
      expect((await store.loadDaily(2024, "legacy")).map((r) => r.aqi)).toEqual([40]);
      expect(await store.loadDaily(2023, "current")).toEqual([]);
    });

    it("clears one mode of a daily scope", async () => {
      const store = createPipelineStore(db);
      const record = {
        location: SITE,
        pollutantCode: "88101",
        date: "2024-03-01",
        concAvg: 10,
        aqi: 42,
        dataSource: "PRIMARY" as const,
        hours: 24,
      };
      await store.replaceDaily(SCOPE, "current", "current", [record]);
      await store.replaceDaily(SCOPE, "legacy", "legacy", [record]);

      await store.clearDaily(SCOPE, "current");

      expect(await store.loadDaily(2024, "current")).toEqual([]);
      expect(await store.loadDaily(2024, "legacy")).toEqual([record]);
    });

    it("replaces reconciled hourly rows per scope", async () => {
      const store = createPipelineStore(db);
      const hourly = { location: SITE, pollutantCode: "88101", date: "2024-03-01", hourLocal: 0, value: 1, source: "PRIMARY" as const };

      await store.replaceHourly(SCOPE, [hourly, { ...hourly, hourLocal: 1 }]);
      await store.replaceHourly(SCOPE, [{ ...hourly, value: 5 }]);

      const rows = await db.query.hourlyReconciled.findMany();
      expect(rows.map((r) => [r.hourLocal, r.value, r.dataSource, r.year])).toEqual([[0, 5, "PRIMARY", 2024]]);
    });

    it("replaces a year's category summary", async () => {
      const store = createPipelineStore(db);
      const summary = {
        pollutantCode: "88101",
        category: "Good",
        stateCode: "37",
        countyCode: "063",
        siteNumber: "0015",
        year: 2024,
        days: 3,
      };
      await store.replaceCategories(2024, "auto", [summary]);
      await store.replaceCategories(2024, "auto", [{ ...summary, days: 4 }]);

      const rows = await db.query.aqiCategory.findMany();
      expect(rows).toEqual([{ mode: "auto", ...summary, days: 4 }]);
    });
  });

  describe("sites and ingest log", () => {
    it("upserts a site by its identifier", async () => {
      await registerSite(db, "aqs", { location: SITE, name: "Armory" });
      await registerSite(db, "envista", { location: SITE, name: "Armory (new)", metadata: { envistaStationId: "7" } });

      const rows = await db.select().from(sites);
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        id: "37-063-0015",
        name: "Armory (new)",
        adapterId: "envista",
        metadata: '{"envistaStationId":"7"}',
      });
    });

    it("records an ingest run from start to finish", async () => {
      const ok = await logIngestStart(db, "aqs");
      await logIngestSuccess(db, ok, 12);
      const failed = await logIngestStart(db, "aqs");
      await logIngestError(db, failed, "boom");

      const rows = await db.select().from(ingestLog);
      expect(rows.map((r) => [r.status, r.recordsCount, r.error])).toEqual([
        ["success", 12, null],
        ["error", 0, "boom"],
      ]);
    });
  });

  describe("createAdapterContext", () => {
    it("ingests for the adapter's role and tracks the count", async () => {
      const env = { DB: db, settings: loadSettings({}), breakpoints: loadBreakpointRegistry() };
      const ctx = createAdapterContext(env, { id: "envista", role: "SECONDARY" });

      expect(await ctx.ingestObservations([row(0, 1), row(1, 2), row(99, 3)])).toBe(2);
      expect(ctx.ingested).toBe(2);
      expect(await loadObservations(db, SCOPE, "SECONDARY")).toHaveLength(2);
    });
  });
});
