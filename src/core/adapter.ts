import type { OpenAPIHono } from "@hono/zod-openapi";
import type { Db } from "../db/client";
import type { DataSource, LocationKey } from "../pipeline/observation";
import type { AppEnv, Env } from "./env";

// ---------------------------------------------------------------------------
// Schedule Types
// ---------------------------------------------------------------------------

/**
 * Predefined cron frequencies.
 * The scheduler maps these to three cron buckets:
 *   - `* * * * *`   -> every_minute, every_5_minutes, every_15_minutes
 *   - `0 * * * *`   -> hourly, every_6_hours
 *   - `0 0 * * *`   -> daily, weekly
 */
export type CronFrequency =
  | "every_minute"
  | "every_5_minutes"
  | "every_15_minutes"
  | "hourly"
  | "every_6_hours"
  | "daily"
  | "weekly";

// ---------------------------------------------------------------------------
// Storage Input Types
// ---------------------------------------------------------------------------

/** One raw hourly row to ingest. `value: null` is stored as-is, distinct from 0. */
export interface ObservationInput {
  location: LocationKey;
  pollutantCode: string;
  date: string;
  hourLocal: number;
  value: number | null;
  /** Parameter occurrence code; several instruments can report at one site. Default 1. */
  poc?: number;
  units?: string;
}

/** A monitoring site to register in the shared sites table. */
export interface SiteInput {
  location: LocationKey;
  name?: string;
  latitude?: number;
  longitude?: number;
  metadata?: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Adapter Context  (passed to schedule handlers)
// ---------------------------------------------------------------------------

/**
 * Everything an adapter needs to do its job.
 * Created fresh for each schedule invocation by the scheduler.
 */
export interface AdapterContext {
  env: Env;
  db: Db;
  /** Scheduled time of the run. */
  now: Date;
  log: (...args: unknown[]) => void;

  /** Upsert raw rows for this adapter's source. Returns the number of rows written. */
  ingestObservations(rows: ObservationInput[]): Promise<number>;

  /** Upsert a site into the shared sites table. */
  registerSite(site: SiteInput): Promise<void>;

  /** Rows ingested through this context so far. */
  readonly ingested: number;
}

// ---------------------------------------------------------------------------
// Adapter Schedule
// ---------------------------------------------------------------------------

export interface AdapterSchedule {
  /** How often this job runs. */
  frequency: CronFrequency;
  /** The actual work to perform. */
  handler: (ctx: AdapterContext) => Promise<void>;
  /** Human-readable description shown in logs and docs. */
  description: string;
}

// ---------------------------------------------------------------------------
// Adapter Definition  (what every adapter must export)
// ---------------------------------------------------------------------------

export interface AdapterDefinition {
  /** Unique slug, e.g. "aqs". Used in URLs and DB. */
  id: string;
  /** Display name, e.g. "EPA AQS". */
  name: string;
  /** What this adapter does. */
  description: string;
  /** URL of the upstream data source. */
  sourceUrl: string;
  /** Which side of reconciliation this adapter feeds. */
  role: DataSource;
  /** Cron schedules for data fetching. */
  schedules: AdapterSchedule[];
  /** Optional short tag for OpenAPI docs. Defaults to `name`. */
  openApiTag?: string;
  /**
   * Optional OpenAPIHono sub-app with adapter-specific routes.
   * Auto-mounted at `/v1/{adapter.id}/...`.
   */
  routes?: OpenAPIHono<AppEnv>;
}
