import { describe, expect, it } from "vitest";
import { BreakpointTableError, NoDataError } from "../core/errors";
import { createBreakpointRegistry, loadBreakpointRegistry } from "./breakpoints";
import { deriveDailyAqi } from "./daily-aqi";
import type { DataSource, LocationKey, ReconciledHourlyRecord } from "./observation";

const registry = loadBreakpointRegistry();
const AFTER_CUTOVER = new Date("2025-01-15T12:00:00Z");
const SITE_A: LocationKey = { stateCode: "37", countyCode: "063", siteNumber: "0015" };
const SITE_B: LocationKey = { stateCode: "37", countyCode: "001", siteNumber: "0002" };

function hourly(
  hourLocal: number,
  value: number,
  source: DataSource = "PRIMARY",
  location: LocationKey = SITE_A,
  date = "2024-03-01",
): ReconciledHourlyRecord {
  return { location, pollutantCode: "88101", date, hourLocal, value, source };
}

const options = { pollutantCode: "88101", year: 2024, registry, mode: "auto" as const, now: AFTER_CUTOVER };

describe("deriveDailyAqi", () => {
  it("averages a full day and maps it through the current table", () => {
    const day = Array.from({ length: 24 }, (_, h) => hourly(h, h % 2 === 0 ? 9 : 11));

    const result = deriveDailyAqi(day, options);

    expect(result.version).toBe("current");
    expect(result.records).toEqual([
      {
        location: SITE_A,
        pollutantCode: "88101",
        date: "2024-03-01",
        concAvg: 10,
        aqi: 42,
        dataSource: "PRIMARY",
        hours: 24,
      },
    ]);
  });

  it("splits a day fed by both sources into two partial-day records", () => {
    const day = [
      ...Array.from({ length: 12 }, (_, h) => hourly(h, 10, "PRIMARY")),
      ...Array.from({ length: 12 }, (_, h) => hourly(h + 12, 20, "SECONDARY")),
    ];

    const { records } = deriveDailyAqi(day, options);

    expect(records.map((r) => [r.dataSource, r.concAvg, r.aqi, r.hours])).toEqual([
      ["PRIMARY", 10, 42, 12],
      ["SECONDARY", 20, 68, 12],
    ]);
  });

  it("averages a sparse day without imputing hours", () => {
    const { records } = deriveDailyAqi([hourly(7, 30.5)], options);
    expect(records[0]).toMatchObject({ concAvg: 30.5, hours: 1 });
  });

  it("keeps the out-of-range sentinel rather than dropping the day", () => {
    const { records } = deriveDailyAqi([hourly(0, 9000)], options);
    expect(records[0].aqi).toBeNull();
  });

  it("orders records by site then date", () => {
    const { records } = deriveDailyAqi(
      [
        hourly(0, 1, "PRIMARY", SITE_A, "2024-03-02"),
        hourly(0, 1, "PRIMARY", SITE_A, "2024-03-01"),
        hourly(0, 1, "PRIMARY", SITE_B, "2024-03-05"),
      ],
      options,
    );
    expect(records.map((r) => `${r.location.countyCode}/${r.date}`)).toEqual([
      "001/2024-03-05",
      "063/2024-03-01",
      "063/2024-03-02",
    ]);
  });

  it("uses the legacy table when auto runs before the cutover", () => {
    const result = deriveDailyAqi([hourly(0, 100)], { ...options, now: new Date("2024-01-01T00:00:00Z") });
    expect(result.version).toBe("legacy");
    expect(result.records[0].aqi).toBe(174);
  });

  it("gives the same result when re-run with the same input and table", () => {
    const day = [hourly(0, 3.3), hourly(1, 4.4), hourly(2, 5.5)];
    expect(deriveDailyAqi(day, options)).toEqual(deriveDailyAqi(day, options));
  });

  it("throws NoDataError for an empty scope", () => {
    expect(() => deriveDailyAqi([], options)).toThrow(NoDataError);
  });

  it("throws BreakpointTableError for a pollutant without tables", () => {
    const empty = createBreakpointRegistry({});
    expect(() => deriveDailyAqi([hourly(0, 1)], { ...options, registry: empty })).toThrow(BreakpointTableError);
  });
});
