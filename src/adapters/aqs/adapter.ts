import type { AdapterContext, AdapterDefinition, ObservationInput, SiteInput } from "../../core/adapter";
import { AdapterError } from "../../core/errors";
import { fetchJson } from "../../core/http";
import { registry } from "../../core/registry";
import type { AqsSettings } from "../../config/settings";
import { isIsoDate, locationId, parseHour } from "../../pipeline/observation";
import { createObservationRoutes } from "../observation-routes";
import { AqsResponseSchema, AqsSampleSchema } from "./types";

const ADAPTER_ID = "aqs";

// ---------------------------------------------------------------------------
// Request building
// ---------------------------------------------------------------------------

export interface DateRange {
  /** Inclusive, YYYY-MM-DD. */
  start: string;
  end: string;
}

function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/** The `lookbackDays` whole UTC days that end yesterday. */
export function lookbackRange(now: Date, lookbackDays: number): DateRange {
  const today = now.toISOString().slice(0, 10);
  return { start: addDays(today, -lookbackDays), end: addDays(today, -1) };
}

/** AQS rejects ranges that cross a calendar year, so split at each January 1st. */
export function splitByYear(range: DateRange): DateRange[] {
  const out: DateRange[] = [];
  let start = range.start;
  while (start <= range.end) {
    const yearEnd = `${start.slice(0, 4)}-12-31`;
    const end = yearEnd < range.end ? yearEnd : range.end;
    out.push({ start, end });
    start = addDays(end, 1);
  }
  return out;
}

export function buildSampleUrl(
  settings: AqsSettings,
  pollutantCode: string,
  range: DateRange,
  stateCode: string,
): string {
  if (!settings.email || !settings.key) {
    throw new AdapterError(ADAPTER_ID, "AQS_API_EMAIL and AQS_API_KEY must be set");
  }
  const params = new URLSearchParams({
    email: settings.email,
    key: settings.key,
    param: pollutantCode,
    bdate: range.start.replaceAll("-", ""),
    edate: range.end.replaceAll("-", ""),
    state: stateCode.padStart(2, "0"),
  });
  return `${settings.baseUrl}/sampleData/byState?${params.toString()}`;
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

export interface NormalizedSamples {
  rows: ObservationInput[];
  sites: SiteInput[];
  skipped: number;
}

/** Turn AQS `Data` rows into observation inputs; rows that do not parse are skipped and counted. */
export function normalizeSamples(data: readonly unknown[]): NormalizedSamples {
  const rows: ObservationInput[] = [];
  const sites = new Map<string, SiteInput>();
  let skipped = 0;

  for (const item of data) {
    const parsed = AqsSampleSchema.safeParse(item);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    const sample = parsed.data;
    const hourLocal = parseHour(sample.time_local);
    if (hourLocal === null || !isIsoDate(sample.date_local)) {
      skipped++;
      continue;
    }

    const location = {
      stateCode: sample.state_code,
      countyCode: sample.county_code,
      siteNumber: sample.site_number,
    };
    rows.push({
      location,
      pollutantCode: sample.parameter_code,
      date: sample.date_local,
      hourLocal,
      value: sample.sample_measurement,
      poc: sample.poc,
      units: sample.units_of_measure ?? undefined,
    });

    const id = locationId(location);
    if (!sites.has(id)) {
      sites.set(id, {
        location,
        name: sample.local_site_name ?? undefined,
        latitude: sample.latitude ?? undefined,
        longitude: sample.longitude ?? undefined,
        metadata: { county: sample.county, state: sample.state },
      });
    }
  }

  return { rows, sites: Array.from(sites.values()), skipped };
}

/** Fetch one pollutant / state / range request and normalize it. */
export async function fetchSamples(
  settings: AqsSettings,
  pollutantCode: string,
  range: DateRange,
  stateCode: string,
): Promise<NormalizedSamples> {
  const raw = await fetchJson(ADAPTER_ID, buildSampleUrl(settings, pollutantCode, range, stateCode));
  const parsed = AqsResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AdapterError(ADAPTER_ID, `Unexpected response shape: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }

  const header = parsed.data.Header[0];
  if (header.status.startsWith("Failed")) {
    throw new AdapterError(ADAPTER_ID, `AQS request failed: ${(header.error ?? []).join("; ") || header.status}`);
  }
  return normalizeSamples(parsed.data.Data);
}

// ---------------------------------------------------------------------------
// Schedule handler
// ---------------------------------------------------------------------------

async function fetchDailySamples(ctx: AdapterContext): Promise<void> {
  const { aqs, pollutants } = ctx.env.settings;
  const ranges = splitByYear(lookbackRange(ctx.now, aqs.lookbackDays));

  for (const pollutantCode of pollutants) {
    for (const stateCode of aqs.states) {
      for (const range of ranges) {
        ctx.log(`GET sampleData/byState param=${pollutantCode} state=${stateCode} ${range.start}..${range.end}`);
        const { rows, sites, skipped } = await fetchSamples(aqs, pollutantCode, range, stateCode);

        for (const site of sites) {
          await ctx.registerSite(site);
        }
        const count = await ctx.ingestObservations(rows);
        ctx.log(`Ingested ${count} rows for ${pollutantCode} in state ${stateCode} (${skipped} malformed skipped).`);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Adapter definition
// ---------------------------------------------------------------------------

const adapter: AdapterDefinition = {
  id: ADAPTER_ID,
  name: "EPA AQS",
  openApiTag: "AQS (primary)",
  description:
    "Hourly sample data from the EPA Air Quality System, pulled per state. Authoritative whenever it reports a value; lags real time by weeks to months.",
  sourceUrl: "https://aqs.epa.gov/data/api",
  role: "PRIMARY",
  schedules: [
    {
      frequency: "daily",
      handler: fetchDailySamples,
      description: "Fetch the lookback window of hourly samples for every configured pollutant and state",
    },
  ],
};

adapter.routes = createObservationRoutes(adapter);
registry.register(adapter);

export default adapter;
