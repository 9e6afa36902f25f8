import { z } from "@hono/zod-openapi";

/**
 * EPA AQS `sampleData/byState` response.
 * Source: https://aqs.epa.gov/aqsweb/documents/data_api.html#sample
 *
 * `Header[0].status` is "Success", "No data matched your selection" or
 * "Failed"; on failure `Header[0].error` carries the reasons. `Data` rows are
 * validated one by one so a single odd row does not sink the request.
 */
export const AqsHeaderSchema = z.object({
  status: z.string(),
  request_time: z.string().optional(),
  url: z.string().optional(),
  rows: z.number().optional(),
  error: z.array(z.string()).optional(),
});

export const AqsResponseSchema = z.object({
  Header: z.array(AqsHeaderSchema).min(1),
  Data: z.array(z.unknown()).default([]),
});

export const AqsSampleSchema = z.object({
  state_code: z.string().min(1),
  county_code: z.string().min(1),
  site_number: z.string().min(1),
  parameter_code: z.union([z.string().min(1), z.number().int()]).transform(String),
  poc: z.coerce.number().int().default(1),
  latitude: z.number().nullable().optional(),
  longitude: z.number().nullable().optional(),
  parameter: z.string().optional(),
  date_local: z.string(),
  time_local: z.string(),
  sample_measurement: z.number().nullable(),
  units_of_measure: z.string().nullable().optional(),
  local_site_name: z.string().nullable().optional(),
  county: z.string().optional(),
  state: z.string().optional(),
});

export type AqsHeader = z.infer<typeof AqsHeaderSchema>;
export type AqsSample = z.infer<typeof AqsSampleSchema>;
