import { OpenAPIHono, createRoute, z } from "@hono/zod-openapi";
import { and, asc, count, eq, gte, lte, type SQL } from "drizzle-orm";
import { cacheControl } from "../../core/cache";
import type { AppEnv } from "../../core/env";
import { hourlyReconciled } from "../../db/schema";
import { formatHour, locationId, parseLocationId } from "../../pipeline/observation";
import {
  DataSourceSchema,
  PaginationSchema,
  SiteKeySchema,
  fromDateParam,
  limitParam,
  offsetParam,
  paginate,
  siteParam,
  toDateParam,
  yearParam,
} from "../schemas";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const HourlySchema = z
  .object({
    site: SiteKeySchema,
    pollutantCode: z.string().openapi({ example: "88101" }),
    date: z.string().openapi({ description: "Local date (YYYY-MM-DD)", example: "2024-06-01" }),
    hourLocal: z.number().int().openapi({ description: "Local hour, 0-23", example: 5 }),
    timeLocal: z.string().openapi({ description: "Local time (HH:00)", example: "05:00" }),
    value: z.number().openapi({ description: "Authoritative hourly value", example: 9.2 }),
    dataSource: DataSourceSchema,
  })
  .openapi("HourlyObservation");

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

const listHourly = createRoute({
  method: "get",
  path: "/v1/hourly",
  tags: ["Hourly"],
  summary: "Reconciled hourly observations",
  description:
    "One value per site-hour after reconciliation: the primary source wherever it reported a value, the secondary source otherwise. `dataSource` tells which.",
  request: {
    query: z.object({
      pollutant: z.string().min(1).openapi({
        param: { name: "pollutant", in: "query" },
        description: "AQS parameter code",
        example: "88101",
      }),
      year: yearParam,
      site: siteParam,
      from: fromDateParam,
      to: toDateParam,
      source: DataSourceSchema.optional().openapi({
        param: { name: "source", in: "query" },
        description: "Only rows supplied by this source",
      }),
      limit: limitParam,
      offset: offsetParam,
    }),
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.object({ data: z.array(HourlySchema), pagination: PaginationSchema }),
        },
      },
      description: "Reconciled hourly rows with pagination",
    },
  },
});

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

const app = new OpenAPIHono<AppEnv>();

app.use("/v1/hourly", cacheControl(300, 60));

app.openapi(listHourly, async (c) => {
  const { pollutant, year, site, from, to, source, limit, offset } = c.req.valid("query");
  const db = c.env.DB;

  const conditions: SQL[] = [
    eq(hourlyReconciled.pollutantCode, pollutant),
    eq(hourlyReconciled.year, year),
  ];
  const key = site ? parseLocationId(site) : null;
  if (key) {
    conditions.push(
      eq(hourlyReconciled.stateCode, key.stateCode),
      eq(hourlyReconciled.countyCode, key.countyCode),
      eq(hourlyReconciled.siteNumber, key.siteNumber),
    );
  }
  if (from) conditions.push(gte(hourlyReconciled.date, from));
  if (to) conditions.push(lte(hourlyReconciled.date, to));
  if (source) conditions.push(eq(hourlyReconciled.dataSource, source));

  const whereClause = and(...conditions);

  const [{ total }] = await db.select({ total: count() }).from(hourlyReconciled).where(whereClause);
  const rows = await db
    .select()
    .from(hourlyReconciled)
    .where(whereClause)
    .orderBy(
      asc(hourlyReconciled.stateCode),
      asc(hourlyReconciled.countyCode),
      asc(hourlyReconciled.siteNumber),
      asc(hourlyReconciled.date),
      asc(hourlyReconciled.hourLocal),
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
      timeLocal: formatHour(r.hourLocal),
      value: r.value,
      dataSource: DataSourceSchema.parse(r.dataSource),
    };
  });

  return c.json({ data, pagination: paginate(total, limit, offset, data.length) }, 200);
});

export default app;
