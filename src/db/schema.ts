import {
  sqliteTable,
  integer,
  text,
  real,
  primaryKey,
  index,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";

// ---------------------------------------------------------------------------
// Sources  (one row per registered adapter)
// ---------------------------------------------------------------------------

export const sources = sqliteTable("sources", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  description: text("description"),
  sourceUrl: text("source_url"),
  role: text("role").notNull(), // "PRIMARY" | "SECONDARY"
  status: text("status").notNull().default("active"),
  lastFetchedAt: integer("last_fetched_at", { mode: "timestamp" }),
  createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
});

// ---------------------------------------------------------------------------
// Sites  (monitoring sites, shared by every adapter)
// ---------------------------------------------------------------------------

export const sites = sqliteTable(
  "sites",
  {
    id: text("id").primaryKey(), // "37-063-0015"
    stateCode: text("state_code").notNull(),
    countyCode: text("county_code").notNull(),
    siteNumber: text("site_number").notNull(),
    name: text("name"),
    latitude: real("latitude"),
    longitude: real("longitude"),
    adapterId: text("adapter_id").notNull(), // adapter that last registered it
    metadata: text("metadata"), // JSON
    updatedAt: integer("updated_at", { mode: "timestamp" }).notNull(),
  },
  (table) => [index("site_state_county_idx").on(table.stateCode, table.countyCode)],
);

// ---------------------------------------------------------------------------
// Observations  (raw hourly rows per source, upserted on ingest)
// ---------------------------------------------------------------------------

export const observations = sqliteTable(
  "observations",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    adapterId: text("adapter_id").notNull(),
    source: text("source").notNull(), // "PRIMARY" | "SECONDARY"
    stateCode: text("state_code").notNull(),
    countyCode: text("county_code").notNull(),
    siteNumber: text("site_number").notNull(),
    pollutantCode: text("pollutant_code").notNull(),
    date: text("date").notNull(), // YYYY-MM-DD, local
    year: integer("year").notNull(),
    hourLocal: integer("hour_local").notNull(),
    poc: integer("poc").notNull().default(1),
    value: real("value"), // null = reported without a measurement
    units: text("units"),
    ingestedAt: integer("ingested_at", { mode: "timestamp" }).notNull(),
  },
  (table) => [
    uniqueIndex("obs_natural_key_idx").on(
      table.source,
      table.stateCode,
      table.countyCode,
      table.siteNumber,
      table.pollutantCode,
      table.date,
      table.hourLocal,
      table.poc,
    ),
    index("obs_scope_idx").on(table.pollutantCode, table.year, table.source),
  ],
);

// ---------------------------------------------------------------------------
// Reconciled hourly  (one authoritative value per site-hour)
// ---------------------------------------------------------------------------

export const hourlyReconciled = sqliteTable(
  "hourly_reconciled",
  {
    pollutantCode: text("pollutant_code").notNull(),
    year: integer("year").notNull(),
    stateCode: text("state_code").notNull(),
    countyCode: text("county_code").notNull(),
    siteNumber: text("site_number").notNull(),
    date: text("date").notNull(),
    hourLocal: integer("hour_local").notNull(),
    value: real("value").notNull(),
    dataSource: text("data_source").notNull(),
  },
  (table) => [
    primaryKey({
      columns: [
        table.pollutantCode,
        table.stateCode,
        table.countyCode,
        table.siteNumber,
        table.date,
        table.hourLocal,
      ],
    }),
    index("hourly_scope_idx").on(table.pollutantCode, table.year),
  ],
);

// ---------------------------------------------------------------------------
// Daily AQI  (kept separately per table mode)
// ---------------------------------------------------------------------------

export const dailyAqi = sqliteTable(
  "daily_aqi",
  {
    mode: text("mode").notNull(), // requested mode: "legacy" | "current" | "auto"
    tableVersion: text("table_version").notNull(), // effective table
    pollutantCode: text("pollutant_code").notNull(),
    year: integer("year").notNull(),
    stateCode: text("state_code").notNull(),
    countyCode: text("county_code").notNull(),
    siteNumber: text("site_number").notNull(),
    date: text("date").notNull(),
    dataSource: text("data_source").notNull(),
    concAvg: real("conc_avg").notNull(),
    aqi: integer("aqi"), // null = outside every breakpoint band
    category: text("category").notNull(),
    hours: integer("hours").notNull(),
  },
  (table) => [
    primaryKey({
      columns: [
        table.mode,
        table.pollutantCode,
        table.stateCode,
        table.countyCode,
        table.siteNumber,
        table.date,
        table.dataSource,
      ],
    }),
    index("daily_scope_idx").on(table.mode, table.pollutantCode, table.year),
  ],
);

// ---------------------------------------------------------------------------
// AQI category summary  (rebuilt wholesale per year and mode)
// ---------------------------------------------------------------------------

export const aqiCategory = sqliteTable(
  "aqi_category",
  {
    mode: text("mode").notNull(),
    year: integer("year").notNull(),
    pollutantCode: text("pollutant_code").notNull(),
    category: text("category").notNull(),
    stateCode: text("state_code").notNull(),
    countyCode: text("county_code").notNull(),
    siteNumber: text("site_number").notNull(),
    days: integer("days").notNull(),
  },
  (table) => [
    primaryKey({
      columns: [
        table.mode,
        table.year,
        table.pollutantCode,
        table.category,
        table.stateCode,
        table.countyCode,
        table.siteNumber,
      ],
    }),
  ],
);

// ---------------------------------------------------------------------------
// Artifacts  (published fact files on disk)
// ---------------------------------------------------------------------------

export const artifacts = sqliteTable(
  "artifacts",
  {
    id: text("id").primaryKey(), // "fctAQIDaily-88101_2024"
    tableName: text("table_name").notNull(),
    path: text("path").notNull(), // relative to STAGE_DIR
    contentType: text("content_type").notNull(),
    sizeBytes: integer("size_bytes").notNull(),
    rowCount: integer("row_count").notNull(),
    pollutantCode: text("pollutant_code"),
    year: integer("year").notNull(),
    mode: text("mode"),
    createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
  },
  (table) => [index("artifact_table_year_idx").on(table.tableName, table.year)],
);

// ---------------------------------------------------------------------------
// Ingest log  (audit trail for scheduled runs)
// ---------------------------------------------------------------------------

export const ingestLog = sqliteTable(
  "ingest_log",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    adapterId: text("adapter_id").notNull(),
    status: text("status").notNull(), // "running" | "success" | "error"
    recordsCount: integer("records_count").default(0),
    error: text("error"),
    startedAt: integer("started_at", { mode: "timestamp" }).notNull(),
    finishedAt: integer("finished_at", { mode: "timestamp" }),
  },
  (table) => [
    index("log_adapter_status_idx").on(table.adapterId, table.status),
  ],
);

// ---------------------------------------------------------------------------
// Schema export  (for Drizzle client)
// ---------------------------------------------------------------------------

export const dbSchema = {
  sources,
  sites,
  observations,
  hourlyReconciled,
  dailyAqi,
  aqiCategory,
  artifacts,
  ingestLog,
};
