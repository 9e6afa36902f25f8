import { z } from "@hono/zod-openapi";

/**
 * Envista station API responses.
 *
 *   GET /v1/envista/stations                              -> station list
 *   GET /v1/envista/stations/{stationId}                  -> metadata + channels
 *   GET /v1/envista/stations/{stationId}/data/{channelId} -> readings (timebase=60 for hourly)
 *
 * Station metadata carries the AQS state / county / site codes the station
 * reports under; stations without them cannot be reconciled and are skipped.
 */

const code = z.union([z.string().min(1), z.number().int()]).transform(String);

export const EnvistaStationSchema = z.object({
  station_id: code,
  name: z.string().optional(),
});

export const EnvistaStationListSchema = z.array(EnvistaStationSchema);

export const EnvistaChannelSchema = z.object({
  channel_id: code,
  parameter: z.string().default(""),
  units: z.string().optional(),
});

export const EnvistaStationMetadataSchema = z.object({
  station_id: code,
  name: z.string().optional(),
  state_code: code.optional(),
  county_code: code.optional(),
  site_number: code.optional(),
  latitude: z.number().nullable().optional(),
  longitude: z.number().nullable().optional(),
  channels: z.array(EnvistaChannelSchema).default([]),
});

/** One reading. `value` may arrive as a number, a numeric string or nothing. */
export const EnvistaReadingSchema = z.object({
  datetime: z.string(),
  value: z.union([z.number(), z.string(), z.null()]).optional(),
  valid: z.boolean().optional(),
  units_of_measure: z.string().optional(),
});

export type EnvistaStation = z.infer<typeof EnvistaStationSchema>;
export type EnvistaChannel = z.infer<typeof EnvistaChannelSchema>;
export type EnvistaStationMetadata = z.infer<typeof EnvistaStationMetadataSchema>;
export type EnvistaReading = z.infer<typeof EnvistaReadingSchema>;

/**
 * Envista parameter names → AQS parameter codes. Matched case-insensitively
 * as substrings, first entry wins.
 */
export const ENVISTA_PARAMETER_CODES: ReadonlyArray<readonly [name: string, code: string]> = [
  ["PM2.5", "88101"],
  ["PM10", "81102"],
  ["Ozone", "44201"],
  ["Carbon Monoxide", "42101"],
  ["Sulfur Dioxide", "42401"],
  ["Nitrogen Dioxide", "42602"],
  ["Black Carbon", "88305"],
  ["Elemental Carbon", "88306"],
  ["Organic Carbon", "88307"],
];

/** AQS code for an Envista parameter name; unmapped names pass through unchanged. */
export function toAqsParameterCode(parameter: string): string {
  const lower = parameter.toLowerCase();
  for (const [name, aqsCode] of ENVISTA_PARAMETER_CODES) {
    if (lower.includes(name.toLowerCase())) return aqsCode;
  }
  return parameter;
}
