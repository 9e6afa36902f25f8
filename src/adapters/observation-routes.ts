import { OpenAPIHono, createRoute, z } from "@hono/zod-openapi";
import { and, asc, count, eq, gte, lte, type SQL } from "drizzle-orm";
import { observations } from "../db/schema";
import { cacheControl } from "../core/cache";
import type { AdapterDefinition } from "../core/adapter";
import type { AppEnv } from "../core/env";
import { locationId, parseLocationId } from "../pipeline/observation";
import {
  DataSourceSchema,
  PaginationSchema,
  SiteKeySchema,
  fromDateParam,
  limitParam,
  offsetParam,
  paginate,
  pollutantParam,
  siteParam,
  toDateParam,
} from "../api/schemas";

// ---------------------------------------------------------------------------
// Zod models
// ---------------------------------------------------------------------------

const RawObservationSchema = z
  .object({
    site: SiteKeySchema,
    pollutantCode: z.string().openapi({ example: "88101" }),
    date: z.string().openapi({ description: "Local date (YYYY-MM-DD)", example: "2024-06-01" }),
    hourLocal: z.number().int().openapi({ description: "Local hour, 0-23", example: 13 }),
    poc: z.number().int().openapi({ description: "Parameter occurrence code", example: 1 }),
    value: z.number().nullable().openapi({
      description: "Reported measurement; null when the source reported the hour without a value",
      example: 8.4,
    }),
    units: z.string().nullable().openapi({ example: "Micrograms/cubic meter (LC)" }),
    source: DataSourceSchema,
    ingestedAt: z.string().openapi({ description: "Ingestion time (ISO 8601)" }),
  })
  .openapi("RawObservation");

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

/** `GET /observations`: raw rows an adapter has stored, in date and hour order. */
export function createObservationRoutes(adapter: AdapterDefinition): OpenAPIHono<AppEnv> {
  const tag = adapter.openApiTag ?? adapter.name;
  const adapterId = adapter.id;

  const observationsRoute = createRoute({
    method: "get",
    path: "/observations",
    tags: [tag],
    summary: `Raw ${adapter.name} observations`,
    description:
      "Hourly rows exactly as ingested from this source, before reconciliation. Rows reported without a value are listed with `value: null`.",
    request: {
      query: z.object({
        pollutant: pollutantParam,
        site: siteParam,
        from: fromDateParam,
        to: toDateParam,
        limit: limitParam,
        offset: offsetParam,
      }),
    },
    responses: {
      200: {
        content: {
          "application/json": {
            schema: z.object({
              data: z.array(RawObservationSchema),
              pagination: PaginationSchema,
            }),
          },
        },
        description: "Raw observations with pagination",
      },
    },
  });

  const app = new OpenAPIHono<AppEnv>();

  app.use("/observations", cacheControl(60));

  app.openapi(observationsRoute, async (c) => {
    const { pollutant, site, from, to, limit, offset } = c.req.valid("query");
    const db = c.env.DB;

    const conditions: SQL[] = [eq(observations.adapterId, adapterId)];
    if (pollutant) conditions.push(eq(observations.pollutantCode, pollutant));
    const key = site ? parseLocationId(site) : null;
    if (key) {
      conditions.push(
        eq(observations.stateCode, key.stateCode),
        eq(observations.countyCode, key.countyCode),
        eq(observations.siteNumber, key.siteNumber),
      );
    }
    if (from) conditions.push(gte(observations.date, from));
    if (to) conditions.push(lte(observations.date, to));

    const whereClause = and(...conditions);

    const [{ total }] = await db.select({ total: count() }).from(observations).where(whereClause);

    const rows = await db
      .select()
      .from(observations)
      .where(whereClause)
      .orderBy(
        asc(observations.date),
        asc(observations.hourLocal),
        asc(observations.stateCode),
        asc(observations.countyCode),
        asc(observations.siteNumber),
        asc(observations.poc),
      )
      .limit(limit)
      .offset(offset);

    const data = rows.map((r) => {
      const location = { stateCode: r.stateCode, countyCode: r.countyCode, siteNumber: r.siteNumber };
      return {
        site: { id: locationId(location), ...location },
        pollutantCode: r.pollutantCode,
        date: r.date,
        hourLocal: r.hourLocal,
        poc: r.poc,
        value: r.value,
        units: r.units,
        source: adapter.role,
        ingestedAt: r.ingestedAt.toISOString(),
      };
    });

    return c.json({ data, pagination: paginate(total, limit, offset, data.length) }, 200);
  });

  return app;
}
