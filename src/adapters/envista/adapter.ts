import type { AdapterContext, AdapterDefinition, ObservationInput } from "../../core/adapter";
import { AdapterError } from "../../core/errors";
import { fetchJson } from "../../core/http";
import { registry } from "../../core/registry";
import type { EnvistaSettings } from "../../config/settings";
import type { LocationKey } from "../../pipeline/observation";
import { createObservationRoutes } from "../observation-routes";
import {
  EnvistaReadingSchema,
  EnvistaStationListSchema,
  EnvistaStationMetadataSchema,
  toAqsParameterCode,
  type EnvistaStation,
  type EnvistaStationMetadata,
} from "./types";

const ADAPTER_ID = "envista";

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

/** Bearer API key when set, else basic auth, else no credentials. */
export function authHeaders(settings: EnvistaSettings): Record<string, string> {
  if (settings.apiKey) return { Authorization: `Bearer ${settings.apiKey}` };
  if (settings.username && settings.password) {
    const token = Buffer.from(`${settings.username}:${settings.password}`).toString("base64");
    return { Authorization: `Basic ${token}` };
  }
  return {};
}

export interface EnvistaClient {
  stations(): Promise<EnvistaStation[]>;
  station(stationId: string): Promise<EnvistaStationMetadata>;
  readings(stationId: string, channelId: string, from: string, to: string): Promise<unknown[]>;
}

export function createEnvistaClient(settings: EnvistaSettings): EnvistaClient {
  const baseUrl = settings.baseUrl;
  if (!baseUrl) {
    throw new AdapterError(ADAPTER_ID, "ENVISTA_BASE_URL must be set");
  }
  const headers = authHeaders(settings);
  const get = (path: string) => fetchJson(ADAPTER_ID, `${baseUrl}${path}`, { headers });

  return {
    async stations() {
      const parsed = EnvistaStationListSchema.safeParse(await get("/v1/envista/stations"));
      if (!parsed.success) throw new AdapterError(ADAPTER_ID, "Unexpected station list shape");
      return parsed.data;
    },
    async station(stationId) {
      const parsed = EnvistaStationMetadataSchema.safeParse(
        await get(`/v1/envista/stations/${encodeURIComponent(stationId)}`),
      );
      if (!parsed.success) throw new AdapterError(ADAPTER_ID, `Unexpected metadata shape for station ${stationId}`);
      return parsed.data;
    },
    async readings(stationId, channelId, from, to) {
      const params = new URLSearchParams({ from, to, timebase: "60" });
      const raw = await get(
        `/v1/envista/stations/${encodeURIComponent(stationId)}/data/${encodeURIComponent(channelId)}?${params.toString()}`,
      );
      if (!Array.isArray(raw)) throw new AdapterError(ADAPTER_ID, `Unexpected data shape for station ${stationId}`);
      return raw;
    },
  };
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/** AQS site identity of a station, or `null` when its metadata lacks one. */
export function stationLocation(meta: EnvistaStationMetadata): LocationKey | null {
  if (!meta.state_code || !meta.county_code || !meta.site_number) return null;
  return { stateCode: meta.state_code, countyCode: meta.county_code, siteNumber: meta.site_number };
}

const DATETIME_RE = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}):\d{2}/;

function readingValue(value: number | string | null | undefined, valid: boolean | undefined): number | null {
  if (valid === false || value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

/**
 * Turn readings of one station channel into observation inputs. The local
 * date and hour are read from the timestamp text as-is; no time zone is applied.
 */
export function normalizeReadings(
  readings: readonly unknown[],
  location: LocationKey,
  pollutantCode: string,
  units?: string,
): { rows: ObservationInput[]; skipped: number } {
  const rows: ObservationInput[] = [];
  let skipped = 0;

  for (const item of readings) {
    const parsed = EnvistaReadingSchema.safeParse(item);
    const match = parsed.success ? DATETIME_RE.exec(parsed.data.datetime) : null;
    if (!parsed.success || !match) {
      skipped++;
      continue;
    }
    const hourLocal = Number(match[2]);
    if (hourLocal > 23) {
      skipped++;
      continue;
    }
    rows.push({
      location,
      pollutantCode,
      date: match[1],
      hourLocal,
      value: readingValue(parsed.data.value, parsed.data.valid),
      units: parsed.data.units_of_measure ?? units,
    });
  }
  return { rows, skipped };
}

// ---------------------------------------------------------------------------
// Schedule handler
// ---------------------------------------------------------------------------

async function fetchRecentReadings(ctx: AdapterContext): Promise<void> {
  const { envista, pollutants } = ctx.env.settings;
  const client = createEnvistaClient(envista);

  const to = ctx.now.toISOString().slice(0, 10);
  const from = new Date(ctx.now.getTime() - 24 * 60 * 60 * 1000).toISOString().slice(0, 10);

  const stations = await client.stations();
  ctx.log(`Found ${stations.length} stations.`);

  let failures = 0;
  for (const { station_id: stationId } of stations) {
    try {
      const meta = await client.station(stationId);
      const location = stationLocation(meta);
      if (!location) {
        ctx.log(`Station ${stationId} has no AQS site codes, skipping.`);
        continue;
      }
      await ctx.registerSite({
        location,
        name: meta.name,
        latitude: meta.latitude ?? undefined,
        longitude: meta.longitude ?? undefined,
        metadata: { envistaStationId: stationId },
      });

      for (const channel of meta.channels) {
        const pollutantCode = toAqsParameterCode(channel.parameter);
        if (!pollutants.includes(pollutantCode)) continue;

        const readings = await client.readings(stationId, channel.channel_id, from, to);
        const { rows, skipped } = normalizeReadings(readings, location, pollutantCode, channel.units);
        const count = await ctx.ingestObservations(rows);
        ctx.log(`Station ${stationId} channel ${channel.channel_id}: ${count} rows (${skipped} malformed skipped).`);
      }
    } catch (err) {
      if (!(err instanceof AdapterError)) throw err;
      failures++;
      console.warn(`[${ADAPTER_ID}] Station ${stationId} failed:`, err.message);
    }
  }

  if (stations.length > 0 && failures === stations.length) {
    throw new AdapterError(ADAPTER_ID, `All ${failures} stations failed`);
  }
}

// ---------------------------------------------------------------------------
// Adapter definition
// ---------------------------------------------------------------------------

const adapter: AdapterDefinition = {
  id: ADAPTER_ID,
  name: "Envista",
  openApiTag: "Envista (secondary)",
  description:
    "Near-real-time hourly readings from Envista monitoring stations. Fills hours the primary source has not reported yet.",
  sourceUrl: "https://api.envista.com/",
  role: "SECONDARY",
  schedules: [
    {
      frequency: "hourly",
      handler: fetchRecentReadings,
      description: "Fetch yesterday's and today's hourly readings for configured pollutants",
    },
  ],
};

adapter.routes = createObservationRoutes(adapter);
registry.register(adapter);

export default adapter;
