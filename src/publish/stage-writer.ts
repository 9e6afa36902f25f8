import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { csvFormat } from "d3-dsv";
import JSZip from "jszip";
import type { Db } from "../db/client";
import { artifacts } from "../db/schema";
import type { TableMode } from "../pipeline/breakpoints";
import {
  formatHour,
  type CategorySummaryRecord,
  type DailyAqiRecord,
  type ReconciledHourlyRecord,
  type Scope,
} from "../pipeline/observation";
import type { FactPublisher, PublishedArtifact } from "../pipeline/runner";

// ---------------------------------------------------------------------------
// Fact table layouts
// ---------------------------------------------------------------------------

export const FACT_TABLES = {
  hourly: "fctHourly",
  daily: "fctAQIDaily",
  category: "fctAQICategory",
} as const;

export const HOURLY_COLUMNS = [
  "state_code",
  "county_code",
  "site_number",
  "parameter_code",
  "date_local",
  "time_local",
  "sample_measurement",
  "data_source",
] as const;

export const DAILY_COLUMNS = [
  "state_code",
  "county_code",
  "site_number",
  "date",
  "aqi",
  "conc_avg",
  "data_source",
] as const;

export const CATEGORY_COLUMNS = [
  "pollutant",
  "aqi_category",
  "state_code",
  "county_code",
  "site_number",
  "year",
  "days",
] as const;

type Row<C extends readonly string[]> = Record<C[number], string | number | null>;

export function hourlyRows(records: readonly ReconciledHourlyRecord[]): Row<typeof HOURLY_COLUMNS>[] {
  return records.map((r) => ({
    state_code: r.location.stateCode,
    county_code: r.location.countyCode,
    site_number: r.location.siteNumber,
    parameter_code: r.pollutantCode,
    date_local: r.date,
    time_local: formatHour(r.hourLocal),
    sample_measurement: r.value,
    data_source: r.source,
  }));
}

export function dailyRows(records: readonly DailyAqiRecord[]): Row<typeof DAILY_COLUMNS>[] {
  return records.map((r) => ({
    state_code: r.location.stateCode,
    county_code: r.location.countyCode,
    site_number: r.location.siteNumber,
    date: r.date,
    aqi: r.aqi,
    conc_avg: r.concAvg,
    data_source: r.dataSource,
  }));
}

export function categoryRows(records: readonly CategorySummaryRecord[]): Row<typeof CATEGORY_COLUMNS>[] {
  return records.map((r) => ({
    pollutant: r.pollutantCode,
    aqi_category: r.category,
    state_code: r.stateCode,
    county_code: r.countyCode,
    site_number: r.siteNumber,
    year: r.year,
    days: r.days,
  }));
}

// ---------------------------------------------------------------------------
// Writer
// ---------------------------------------------------------------------------

export const ZIP_CONTENT_TYPE = "application/zip";

interface WriteRequest {
  table: string;
  /** File name without extensions, e.g. "88101_2024". */
  stem: string;
  columns: readonly string[];
  rows: Record<string, string | number | null>[];
  year: number;
  pollutantCode: string | null;
  /** Table mode the rows were derived with; `null` for mode-independent tables. */
  mode: TableMode | null;
}

/**
 * Writes fact tables as a single CSV inside a zip, at
 * `{stageDir}/{table}/{stem}.csv.zip`, and records each file in `artifacts`.
 * Publishing the same table again overwrites the file and its row.
 */
export function createStageWriter(db: Db, stageDir: string): FactPublisher {
  async function write(req: WriteRequest): Promise<PublishedArtifact> {
    const relativePath = `${req.table}/${req.stem}.csv.zip`;
    const absolutePath = join(stageDir, relativePath);

    // Empty cells for null, so an out-of-range AQI is blank rather than "null".
    const csv = csvFormat(req.rows, req.columns);
    const zip = new JSZip();
    zip.file(`${req.stem}.csv`, csv);
    const content = await zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });

    await mkdir(dirname(absolutePath), { recursive: true });
    await writeFile(absolutePath, content);

    const id = `${req.table}-${req.stem}`;
    const values = {
      tableName: req.table,
      path: relativePath,
      contentType: ZIP_CONTENT_TYPE,
      sizeBytes: content.byteLength,
      rowCount: req.rows.length,
      pollutantCode: req.pollutantCode,
      year: req.year,
      mode: req.mode,
      createdAt: new Date(),
    };
    await db
      .insert(artifacts)
      .values({ id, ...values })
      .onConflictDoUpdate({ target: artifacts.id, set: values });

    console.log(`[publish] ${relativePath} → ${req.rows.length} rows`);
    return { id, table: req.table, path: relativePath, rows: req.rows.length };
  }

  return {
    publishHourly: (scope: Scope, records) =>
      write({
        table: FACT_TABLES.hourly,
        stem: `${scope.pollutantCode}_${scope.year}`,
        columns: HOURLY_COLUMNS,
        rows: hourlyRows(records),
        year: scope.year,
        pollutantCode: scope.pollutantCode,
        mode: null,
      }),
    publishDaily: (scope, mode, records) =>
      write({
        table: FACT_TABLES.daily,
        stem: `${scope.pollutantCode}_${scope.year}`,
        columns: DAILY_COLUMNS,
        rows: dailyRows(records),
        year: scope.year,
        pollutantCode: scope.pollutantCode,
        mode,
      }),
    publishCategories: (year, mode, records) =>
      write({
        table: FACT_TABLES.category,
        stem: String(year),
        columns: CATEGORY_COLUMNS,
        rows: categoryRows(records),
        year,
        pollutantCode: null,
        mode,
      }),
  };
}
