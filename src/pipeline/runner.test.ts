import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadBreakpointRegistry, type TableMode, type TableVersion } from "./breakpoints";
import type {
  CategorySummaryRecord,
  DailyAqiRecord,
  DataSource,
  ObservationRecord,
  ReconciledHourlyRecord,
  Scope,
} from "./observation";
import { runPipeline, type FactPublisher, type PipelineStore, type PublishedArtifact } from "./runner";

const registry = loadBreakpointRegistry();
const NOW = new Date("2025-01-15T00:00:00Z");
const SITE = { stateCode: "37", countyCode: "063", siteNumber: "0015" };

function obs(pollutantCode: string, hourLocal: number, value: number | null, source: DataSource): ObservationRecord {
  return { location: SITE, pollutantCode, date: "2024-03-01", hourLocal, value, source };
}

/** In-memory store keyed the way the SQLite tables are. */
class MemoryStore implements PipelineStore {
  observations: ObservationRecord[] = [];
  hourly = new Map<string, ReconciledHourlyRecord[]>();
  daily = new Map<string, { version: TableVersion; records: DailyAqiRecord[] }>();
  categories = new Map<string, CategorySummaryRecord[]>();

  async loadObservations(scope: Scope, source: DataSource) {
    return this.observations.filter(
      (o) => o.pollutantCode === scope.pollutantCode && o.source === source && o.date.startsWith(String(scope.year)),
    );
  }

  async replaceHourly(scope: Scope, records: readonly ReconciledHourlyRecord[]) {
    this.hourly.set(`${scope.pollutantCode}/${scope.year}`, [...records]);
  }

  async replaceDaily(scope: Scope, mode: TableMode, version: TableVersion, records: readonly DailyAqiRecord[]) {
    this.daily.set(`${mode}/${scope.pollutantCode}/${scope.year}`, { version, records: [...records] });
  }

  async clearDaily(scope: Scope, mode: TableMode) {
    this.daily.delete(`${mode}/${scope.pollutantCode}/${scope.year}`);
  }

  async loadDaily(year: number, mode: TableMode) {
    const out: DailyAqiRecord[] = [];
    for (const [key, entry] of this.daily) {
      if (key.startsWith(`${mode}/`) && key.endsWith(`/${year}`)) out.push(...entry.records);
    }
    return out;
  }

  async replaceCategories(year: number, mode: TableMode, records: readonly CategorySummaryRecord[]) {
    this.categories.set(`${mode}/${year}`, [...records]);
  }
}

function recordingPublisher(): FactPublisher & { published: string[] } {
  const published: string[] = [];
  const artifact = (table: string, stem: string, rows: number): PublishedArtifact => {
    published.push(`${table}-${stem}`);
    return { id: `${table}-${stem}`, table, path: `${table}/${stem}.csv.zip`, rows };
  };
  return {
    published,
    publishHourly: async (scope, records) => artifact("fctHourly", `${scope.pollutantCode}_${scope.year}`, records.length),
    publishDaily: async (scope, _mode, records) =>
      artifact("fctAQIDaily", `${scope.pollutantCode}_${scope.year}`, records.length),
    publishCategories: async (year, _mode, records) => artifact("fctAQICategory", String(year), records.length),
  };
}

describe("runPipeline", () => {
  let store: MemoryStore;
  const log = vi.fn();

  beforeEach(() => {
    store = new MemoryStore();
    log.mockClear();
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reconciles, derives and aggregates one scope", async () => {
    store.observations = [
      ...Array.from({ length: 24 }, (_, h) => h)
        .filter((h) => h !== 5)
        .map((h) => obs("88101", h, 10, "PRIMARY")),
      obs("88101", 5, 10, "SECONDARY"),
    ];

    const report = await runPipeline(
      { store, registry, log },
      { pollutants: ["88101"], year: 2024, mode: "auto", now: NOW },
    );

    expect(report.scopes).toEqual([
      {
        scope: { pollutantCode: "88101", year: 2024 },
        status: "succeeded",
        tableVersion: "current",
        hourly: { total: 24, primary: 23, secondary: 1 },
        dailyRecords: 2,
      },
    ]);
    expect(report.categories).toEqual({ status: "succeeded", records: 1 });
    expect(store.categories.get("auto/2024")).toEqual([
      { pollutantCode: "88101", category: "Good", stateCode: "37", countyCode: "063", siteNumber: "0015", year: 2024, days: 2 },
    ]);
    expect(report.artifacts).toEqual([]);
  });

  it("isolates failing scopes from succeeding ones", async () => {
    store.observations = [obs("88101", 0, 10, "PRIMARY"), obs("99999", 0, 10, "PRIMARY")];

    const report = await runPipeline(
      { store, registry, log },
      { pollutants: ["88101", "81102", "99999"], year: 2024, mode: "current", now: NOW },
    );

    expect(report.scopes.map((s) => [s.scope.pollutantCode, s.status])).toEqual([
      ["88101", "succeeded"],
      ["81102", "failed"],
      ["99999", "failed"],
    ]);
    expect(report.scopes[1]).toMatchObject({ stage: "derive", code: "NO_DATA" });
    expect(report.scopes[2]).toMatchObject({ stage: "derive", code: "BREAKPOINT_TABLE" });
    expect(store.daily.has("current/88101/2024")).toBe(true);
    expect(report.categories).toEqual({ status: "succeeded", records: 1 });
  });

  it("drops stale daily rows when a scope loses all its hours", async () => {
    const request = { pollutants: ["88101"], year: 2024, mode: "current" as const, now: NOW };
    store.observations = [obs("88101", 0, 10, "PRIMARY")];
    await runPipeline({ store, registry, log }, request);
    expect(store.categories.get("current/2024")).toHaveLength(1);

    store.observations = [obs("88101", 0, null, "PRIMARY")];
    const report = await runPipeline({ store, registry, log }, request);

    expect(report.scopes[0]).toMatchObject({ status: "failed", stage: "derive", code: "NO_DATA" });
    expect(store.hourly.get("88101/2024")).toEqual([]);
    expect(store.daily.has("current/88101/2024")).toBe(false);
    expect(store.categories.get("current/2024")).toEqual([]);
    expect(report.categories).toEqual({ status: "succeeded", records: 0 });
  });

  it("captures unexpected store errors with their stage", async () => {
    store.loadObservations = async () => {
      throw new Error("disk on fire");
    };

    const report = await runPipeline(
      { store, registry, log },
      { pollutants: ["88101"], year: 2024, mode: "current", now: NOW },
    );

    expect(report.scopes[0]).toEqual({
      scope: { pollutantCode: "88101", year: 2024 },
      status: "failed",
      stage: "reconcile",
      code: "INTERNAL_ERROR",
      message: "disk on fire",
    });
  });

  it("reports a failed category rebuild separately", async () => {
    store.observations = [obs("88101", 0, 10, "PRIMARY")];
    store.replaceCategories = async () => {
      throw new Error("locked");
    };

    const report = await runPipeline(
      { store, registry, log },
      { pollutants: ["88101"], year: 2024, mode: "current", now: NOW },
    );

    expect(report.scopes[0].status).toBe("succeeded");
    expect(report.categories).toEqual({
      status: "failed",
      stage: "aggregate",
      code: "INTERNAL_ERROR",
      message: "locked",
    });
  });

  it("publishes every fact table when a publisher is given", async () => {
    store.observations = [obs("88101", 0, 10, "PRIMARY")];
    const publisher = recordingPublisher();

    const report = await runPipeline(
      { store, registry, publisher, log },
      { pollutants: ["88101", "88101"], year: 2024, mode: "current", now: NOW },
    );

    expect(publisher.published).toEqual(["fctHourly-88101_2024", "fctAQIDaily-88101_2024", "fctAQICategory-2024"]);
    expect(report.artifacts.map((a) => a.rows)).toEqual([1, 1, 1]);
  });

  it("marks a publish failure at the publish stage", async () => {
    store.observations = [obs("88101", 0, 10, "PRIMARY")];
    const publisher = recordingPublisher();
    publisher.publishDaily = async () => {
      throw new Error("read-only file system");
    };

    const report = await runPipeline(
      { store, registry, publisher, log },
      { pollutants: ["88101"], year: 2024, mode: "current", now: NOW },
    );

    expect(report.scopes[0]).toMatchObject({ status: "failed", stage: "publish" });
    expect(store.daily.has("current/88101/2024")).toBe(true);
  });
});
