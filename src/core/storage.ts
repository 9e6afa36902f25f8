import { and, asc, eq, sql } from "drizzle-orm";
import type { Db } from "../db/client";
import {
  aqiCategory,
  dailyAqi,
  hourlyReconciled,
  ingestLog,
  observations,
  sites,
} from "../db/schema";
import type { TableMode, TableVersion } from "../pipeline/breakpoints";
import { classifyAqi } from "../pipeline/categories";
import {
  isDataSource,
  locationId,
  yearOf,
  type CategorySummaryRecord,
  type DailyAqiRecord,
  type DataSource,
  type ObservationRecord,
  type ReconciledHourlyRecord,
  type Scope,
} from "../pipeline/observation";
import { mergeKey } from "../pipeline/reconcile";
import type { PipelineStore } from "../pipeline/runner";
import type { AdapterContext, AdapterDefinition, ObservationInput, SiteInput } from "./adapter";
import type { Env } from "./env";
import { withRetry } from "./retry";

/**
 * Rows per INSERT statement. Observations have 13 bound columns, so 500 rows
 * stays well under SQLite's 32766 variable limit.
 */
const BATCH_CHUNK_SIZE = 500;

function chunk<T>(rows: readonly T[], size = BATCH_CHUNK_SIZE): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < rows.length; i += size) out.push(rows.slice(i, i + size));
  return out;
}

function asDataSource(value: string): DataSource {
  if (!isDataSource(value)) throw new Error(`Unexpected data source '${value}' in storage`);
  return value;
}

// ---------------------------------------------------------------------------
// Site registration
// ---------------------------------------------------------------------------

/** Upsert a site into the shared sites table. */
export async function registerSite(db: Db, adapterId: string, site: SiteInput): Promise<void> {
  const values = {
    stateCode: site.location.stateCode,
    countyCode: site.location.countyCode,
    siteNumber: site.location.siteNumber,
    name: site.name ?? null,
    latitude: site.latitude ?? null,
    longitude: site.longitude ?? null,
    adapterId,
    metadata: site.metadata ? JSON.stringify(site.metadata) : null,
    updatedAt: new Date(),
  };
  await withRetry(
    async () =>
      db
        .insert(sites)
        .values({ id: locationId(site.location), ...values })
        .onConflictDoUpdate({ target: sites.id, set: values })
        .run(),
    "registerSite",
  );
}

// ---------------------------------------------------------------------------
// Observation ingest
// ---------------------------------------------------------------------------

export interface IngestResult {
  written: number;
  skipped: number;
}

/**
 * Upsert raw rows for one source. Rows are keyed by
 * (source, site, pollutant, date, hour, POC); a re-fetched row replaces the
 * stored value. Malformed rows are skipped and counted.
 */
export async function ingestObservations(
  db: Db,
  adapterId: string,
  source: DataSource,
  rows: readonly ObservationInput[],
): Promise<IngestResult> {
  const now = new Date();
  let skipped = 0;
  const values: (typeof observations.$inferInsert)[] = [];

  for (const row of rows) {
    const poc = row.poc ?? 1;
    if (mergeKey({ ...row, source }) === null || !Number.isInteger(poc)) {
      skipped++;
      continue;
    }
    values.push({
      adapterId,
      source,
      stateCode: row.location.stateCode,
      countyCode: row.location.countyCode,
      siteNumber: row.location.siteNumber,
      pollutantCode: row.pollutantCode,
      date: row.date,
      year: yearOf(row.date),
      hourLocal: row.hourLocal,
      poc,
      value: row.value !== null && Number.isFinite(row.value) ? row.value : null,
      units: row.units ?? null,
      ingestedAt: now,
    });
  }

  if (values.length > 0) {
    await withRetry(async () => {
      db.transaction((tx) => {
        for (const batch of chunk(values)) {
          tx.insert(observations)
            .values(batch)
            .onConflictDoUpdate({
              target: [
                observations.source,
                observations.stateCode,
                observations.countyCode,
                observations.siteNumber,
                observations.pollutantCode,
                observations.date,
                observations.hourLocal,
                observations.poc,
              ],
              set: {
                adapterId: sql`excluded.adapter_id`,
                value: sql`excluded.value`,
                units: sql`excluded.units`,
                ingestedAt: sql`excluded.ingested_at`,
              },
            })
            .run();
        }
      });
    }, "ingestObservations");
  }

  if (skipped > 0) {
    console.warn(`[storage] ${adapterId}: skipped ${skipped} malformed rows`);
  }
  return { written: values.length, skipped };
}

// ---------------------------------------------------------------------------
// Pipeline store
// ---------------------------------------------------------------------------

/** Raw rows for one scope and side, ordered by POC so the lowest instrument is seen first. */
export async function loadObservations(db: Db, scope: Scope, source: DataSource): Promise<ObservationRecord[]> {
  const rows = await db
    .select()
    .from(observations)
    .where(
      and(
        eq(observations.pollutantCode, scope.pollutantCode),
        eq(observations.year, scope.year),
        eq(observations.source, source),
      ),
    )
    .orderBy(asc(observations.poc), asc(observations.id));

  return rows.map((row) => ({
    location: { stateCode: row.stateCode, countyCode: row.countyCode, siteNumber: row.siteNumber },
    pollutantCode: row.pollutantCode,
    date: row.date,
    hourLocal: row.hourLocal,
    value: row.value,
    source,
  }));
}

export async function replaceHourly(
  db: Db,
  scope: Scope,
  records: readonly ReconciledHourlyRecord[],
): Promise<void> {
  const values = records.map((r) => ({
    pollutantCode: r.pollutantCode,
    year: yearOf(r.date),
    stateCode: r.location.stateCode,
    countyCode: r.location.countyCode,
    siteNumber: r.location.siteNumber,
    date: r.date,
    hourLocal: r.hourLocal,
    value: r.value,
    dataSource: r.source,
  }));

  await withRetry(async () => {
    db.transaction((tx) => {
      tx.delete(hourlyReconciled)
        .where(
          and(
            eq(hourlyReconciled.pollutantCode, scope.pollutantCode),
            eq(hourlyReconciled.year, scope.year),
          ),
        )
        .run();
      for (const batch of chunk(values)) {
        tx.insert(hourlyReconciled).values(batch).run();
      }
    });
  }, "replaceHourly");
}

export async function replaceDaily(
  db: Db,
  scope: Scope,
  mode: TableMode,
  version: TableVersion,
  records: readonly DailyAqiRecord[],
): Promise<void> {
  const values = records.map((r) => ({
    mode,
    tableVersion: version,
    pollutantCode: r.pollutantCode,
    year: yearOf(r.date),
    stateCode: r.location.stateCode,
    countyCode: r.location.countyCode,
    siteNumber: r.location.siteNumber,
    date: r.date,
    dataSource: r.dataSource,
    concAvg: r.concAvg,
    aqi: r.aqi,
    category: classifyAqi(r.aqi),
    hours: r.hours,
  }));

  await withRetry(async () => {
    db.transaction((tx) => {
      tx.delete(dailyAqi).where(dailyScope(scope, mode)).run();
      for (const batch of chunk(values)) {
        tx.insert(dailyAqi).values(batch).run();
      }
    });
  }, "replaceDaily");
}

export async function clearDaily(db: Db, scope: Scope, mode: TableMode): Promise<void> {
  await withRetry(async () => {
    db.delete(dailyAqi).where(dailyScope(scope, mode)).run();
  }, "clearDaily");
}

function dailyScope(scope: Scope, mode: TableMode) {
  return and(
    eq(dailyAqi.mode, mode),
    eq(dailyAqi.pollutantCode, scope.pollutantCode),
    eq(dailyAqi.year, scope.year),
  );
}

export async function loadDaily(db: Db, year: number, mode: TableMode): Promise<DailyAqiRecord[]> {
  const rows = await db
    .select()
    .from(dailyAqi)
    .where(and(eq(dailyAqi.year, year), eq(dailyAqi.mode, mode)))
    .orderBy(
      asc(dailyAqi.pollutantCode),
      asc(dailyAqi.stateCode),
      asc(dailyAqi.countyCode),
      asc(dailyAqi.siteNumber),
      asc(dailyAqi.date),
      asc(dailyAqi.dataSource),
    );

  return rows.map((row) => ({
    location: { stateCode: row.stateCode, countyCode: row.countyCode, siteNumber: row.siteNumber },
    pollutantCode: row.pollutantCode,
    date: row.date,
    concAvg: row.concAvg,
    aqi: row.aqi,
    dataSource: asDataSource(row.dataSource),
    hours: row.hours,
  }));
}

export async function replaceCategories(
  db: Db,
  year: number,
  mode: TableMode,
  records: readonly CategorySummaryRecord[],
): Promise<void> {
  const values = records.map((r) => ({ mode, ...r }));

  await withRetry(async () => {
    db.transaction((tx) => {
      tx.delete(aqiCategory)
        .where(and(eq(aqiCategory.year, year), eq(aqiCategory.mode, mode)))
        .run();
      for (const batch of chunk(values)) {
        tx.insert(aqiCategory).values(batch).run();
      }
    });
  }, "replaceCategories");
}

/** The SQLite-backed store the pipeline runner reads from and writes to. */
export function createPipelineStore(db: Db): PipelineStore {
  return {
    loadObservations: (scope, source) => loadObservations(db, scope, source),
    replaceHourly: (scope, records) => replaceHourly(db, scope, records),
    replaceDaily: (scope, mode, version, records) => replaceDaily(db, scope, mode, version, records),
    clearDaily: (scope, mode) => clearDaily(db, scope, mode),
    loadDaily: (year, mode) => loadDaily(db, year, mode),
    replaceCategories: (year, mode, records) => replaceCategories(db, year, mode, records),
  };
}

// ---------------------------------------------------------------------------
// Ingest log helpers
// ---------------------------------------------------------------------------

export async function logIngestStart(db: Db, adapterId: string): Promise<number> {
  const result = await db
    .insert(ingestLog)
    .values({
      adapterId,
      status: "running",
      recordsCount: 0,
      startedAt: new Date(),
    })
    .returning({ id: ingestLog.id });

  return result[0].id;
}

export async function logIngestSuccess(db: Db, logId: number, recordsCount: number): Promise<void> {
  await db
    .update(ingestLog)
    .set({
      status: "success",
      recordsCount,
      finishedAt: new Date(),
    })
    .where(eq(ingestLog.id, logId));
}

export async function logIngestError(db: Db, logId: number, error: string): Promise<void> {
  await db
    .update(ingestLog)
    .set({
      status: "error",
      error,
      finishedAt: new Date(),
    })
    .where(eq(ingestLog.id, logId));
}

// ---------------------------------------------------------------------------
// Context factory
// ---------------------------------------------------------------------------

/** Build an AdapterContext for one scheduled run of `adapter`. */
export function createAdapterContext(
  env: Env,
  adapter: Pick<AdapterDefinition, "id" | "role">,
  now: Date = new Date(),
): AdapterContext {
  const db = env.DB;
  let ingested = 0;

  return {
    env,
    db,
    now,
    log: (...args: unknown[]) => console.log(`[${adapter.id}]`, ...args),

    ingestObservations: async (rows) => {
      const result = await ingestObservations(db, adapter.id, adapter.role, rows);
      ingested += result.written;
      return result.written;
    },

    registerSite: (site) => registerSite(db, adapter.id, site),

    get ingested() {
      return ingested;
    },
  };
}
