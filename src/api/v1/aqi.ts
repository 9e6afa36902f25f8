import { OpenAPIHono, createRoute, z } from "@hono/zod-openapi";
import { and, asc, count, eq, gte, lte, type SQL } from "drizzle-orm";
import { cacheControl } from "../../core/cache";
import type { AppEnv } from "../../core/env";
import { aqiCategory, dailyAqi } from "../../db/schema";
import { resolveTableVersion, type PollutantBreakpoints } from "../../pipeline/breakpoints";
import { AQI_CATEGORIES, UNKNOWN_CATEGORY } from "../../pipeline/categories";
import { locationId, parseLocationId } from "../../pipeline/observation";
import {
  DataSourceSchema,
  ErrorSchema,
  PaginationSchema,
  SiteKeySchema,
  TableModeSchema,
  fromDateParam,
  limitParam,
  offsetParam,
  paginate,
  pollutantParam,
  siteParam,
  toDateParam,
  yearParam,
} from "../schemas";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const CATEGORY_NAMES = [...AQI_CATEGORIES.map((c) => c.name), UNKNOWN_CATEGORY];

const DailyAqiSchema = z
  .object({
    site: SiteKeySchema,
    pollutantCode: z.string().openapi({ example: "88101" }),
    date: z.string().openapi({ description: "Local date (YYYY-MM-DD)", example: "2024-06-01" }),
    concAvg: z.number().openapi({ description: "Mean of the day's hourly values", example: 10 }),
    aqi: z.number().int().nullable().openapi({
      description: "Daily index; null when the mean lies outside every breakpoint band",
      example: 42,
    }),
    category: z.string().openapi({ description: `One of: ${CATEGORY_NAMES.join(", ")}`, example: "Good" }),
    dataSource: DataSourceSchema,
    hours: z.number().int().openapi({ description: "Hourly rows averaged", example: 24 }),
    tableVersion: z.enum(["legacy", "current"]).openapi({ description: "Breakpoint table used" }),
  })
  .openapi("DailyAqi");

const CategorySummarySchema = z
  .object({
    pollutantCode: z.string().openapi({ example: "88101" }),
    category: z.string().openapi({ example: "Moderate" }),
    stateCode: z.string().openapi({ example: "37" }),
    countyCode: z.string().openapi({ example: "063" }),
    siteNumber: z.string().openapi({ example: "0015" }),
    year: z.number().int().openapi({ example: 2024 }),
    days: z.number().int().openapi({ description: "Daily records in this category", example: 41 }),
  })
  .openapi("CategorySummary");

const BandSchema = z
  .object({
    concLow: z.number(),
    concHigh: z.number(),
    indexLow: z.number().int(),
    indexHigh: z.number().int(),
  })
  .openapi("BreakpointBand");

const BreakpointSetSchema = z
  .object({
    pollutantCode: z.string().openapi({ example: "88101" }),
    name: z.string().openapi({ example: "PM2.5 - Local Conditions" }),
    units: z.string().openapi({ example: "ug/m3" }),
    concentrationDecimals: z.number().int().openapi({
      description: "Concentrations are truncated to this many decimals before lookup",
      example: 1,
    }),
    cutover: z.string().nullable().openapi({
      description: "First date on which 'auto' resolves to the current table",
      example: "2024-05-06",
    }),
    autoResolvesTo: z.enum(["legacy", "current"]).openapi({ description: "Table 'auto' picks today" }),
    versions: z.object({
      legacy: z.array(BandSchema).nullable(),
      current: z.array(BandSchema),
    }),
  })
  .openapi("BreakpointSet");

function toBreakpointSet(entry: PollutantBreakpoints, now: Date) {
  return {
    pollutantCode: entry.pollutantCode,
    name: entry.name,
    units: entry.units,
    concentrationDecimals: entry.concentrationDecimals,
    cutover: entry.cutover,
    autoResolvesTo: resolveTableVersion(entry, "auto", now),
    versions: {
      legacy: entry.versions.legacy ? entry.versions.legacy.map((b) => ({ ...b })) : null,
      current: entry.versions.current.map((b) => ({ ...b })),
    },
  };
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

const listDaily = createRoute({
  method: "get",
  path: "/v1/aqi/daily",
  tags: ["AQI"],
  summary: "Daily AQI records",
  description:
    "Daily mean concentration and index per site, date and source. A day fed by both sources appears as two partial-day records.",
  request: {
    query: z.object({
      year: yearParam,
      pollutant: pollutantParam,
      mode: TableModeSchema.default("auto").openapi({
        param: { name: "mode", in: "query" },
        description: "Table mode the records were derived with",
      }),
      site: siteParam,
      category: z.string().optional().openapi({
        param: { name: "category", in: "query" },
        description: "Filter by AQI category",
        example: "Moderate",
      }),
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
          schema: z.object({ data: z.array(DailyAqiSchema), pagination: PaginationSchema }),
        },
      },
      description: "Daily AQI records with pagination",
    },
  },
});

const listCategories = createRoute({
  method: "get",
  path: "/v1/aqi/categories",
  tags: ["AQI"],
  summary: "AQI category summary",
  description: "Number of daily records per pollutant, site and AQI category for one year.",
  request: {
    query: z.object({
      year: yearParam,
      mode: TableModeSchema.default("auto").openapi({
        param: { name: "mode", in: "query" },
        description: "Table mode the summary was built with",
      }),
      pollutant: pollutantParam,
    }),
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.object({ data: z.array(CategorySummarySchema), total: z.number() }),
        },
      },
      description: "Category day counts",
    },
  },
});

const listBreakpoints = createRoute({
  method: "get",
  path: "/v1/aqi/breakpoints",
  tags: ["AQI"],
  summary: "Configured breakpoint tables",
  description: "Every pollutant's breakpoint tables and the version 'auto' resolves to today.",
  responses: {
    200: {
      content: { "application/json": { schema: z.object({ data: z.array(BreakpointSetSchema) }) } },
      description: "Breakpoint tables",
    },
  },
});

const getBreakpoints = createRoute({
  method: "get",
  path: "/v1/aqi/breakpoints/{pollutantCode}",
  tags: ["AQI"],
  summary: "Breakpoint tables for one pollutant",
  request: {
    params: z.object({
      pollutantCode: z.string().openapi({
        param: { name: "pollutantCode", in: "path" },
        description: "AQS parameter code",
        example: "88101",
      }),
    }),
  },
  responses: {
    200: {
      content: { "application/json": { schema: z.object({ data: BreakpointSetSchema }) } },
      description: "Breakpoint tables",
    },
    404: {
      content: { "application/json": { schema: ErrorSchema } },
      description: "No table configured for the pollutant",
    },
  },
});

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

const app = new OpenAPIHono<AppEnv>();

app.use("/v1/aqi/*", cacheControl(300, 60));

app.openapi(listDaily, async (c) => {
  const { year, pollutant, mode, site, category, from, to, limit, offset } = c.req.valid("query");
  const db = c.env.DB;

  const conditions: SQL[] = [eq(dailyAqi.year, year), eq(dailyAqi.mode, mode)];
  if (pollutant) conditions.push(eq(dailyAqi.pollutantCode, pollutant));
  const key = site ? parseLocationId(site) : null;
  if (key) {
    conditions.push(
      eq(dailyAqi.stateCode, key.stateCode),
      eq(dailyAqi.countyCode, key.countyCode),
      eq(dailyAqi.siteNumber, key.siteNumber),
    );
  }
  if (category) conditions.push(eq(dailyAqi.category, category));
  if (from) conditions.push(gte(dailyAqi.date, from));
  if (to) conditions.push(lte(dailyAqi.date, to));

  const whereClause = and(...conditions);

  const [{ total }] = await db.select({ total: count() }).from(dailyAqi).where(whereClause);
  const rows = await db
    .select()
    .from(dailyAqi)
    .where(whereClause)
    .orderBy(
      asc(dailyAqi.pollutantCode),
      asc(dailyAqi.stateCode),
      asc(dailyAqi.countyCode),
      asc(dailyAqi.siteNumber),
      asc(dailyAqi.date),
      asc(dailyAqi.dataSource),
    )
    .limit(limit)
    .offset(offset);

  const data = rows.map((r) => {
    const location = { stateCode: r.stateCode, countyCode: r.countyCode, siteNumber: r.siteNumber };
    return {
      site: { id: locationId(location), ...location },
      pollutantCode: r.pollutantCode,
      date: r.date,
      concAvg: r.concAvg,
      aqi: r.aqi,
      category: r.category,
      dataSource: DataSourceSchema.parse(r.dataSource),
      hours: r.hours,
      tableVersion: r.tableVersion === "legacy" ? ("legacy" as const) : ("current" as const),
    };
  });

  return c.json({ data, pagination: paginate(total, limit, offset, data.length) }, 200);
});

app.openapi(listCategories, async (c) => {
  const { year, mode, pollutant } = c.req.valid("query");
  const db = c.env.DB;

  const conditions: SQL[] = [eq(aqiCategory.year, year), eq(aqiCategory.mode, mode)];
  if (pollutant) conditions.push(eq(aqiCategory.pollutantCode, pollutant));

  const rows = await db
    .select()
    .from(aqiCategory)
    .where(and(...conditions))
    .orderBy(
      asc(aqiCategory.pollutantCode),
      asc(aqiCategory.stateCode),
      asc(aqiCategory.countyCode),
      asc(aqiCategory.siteNumber),
      asc(aqiCategory.category),
    );

  const data = rows.map((r) => ({
    pollutantCode: r.pollutantCode,
    category: r.category,
    stateCode: r.stateCode,
    countyCode: r.countyCode,
    siteNumber: r.siteNumber,
    year: r.year,
    days: r.days,
  }));

  return c.json({ data, total: data.length }, 200);
});

app.openapi(listBreakpoints, (c) => {
  const now = new Date();
  const data = Array.from(c.env.breakpoints.values()).map((entry) => toBreakpointSet(entry, now));
  return c.json({ data }, 200);
});

app.openapi(getBreakpoints, (c) => {
  const { pollutantCode } = c.req.valid("param");
  const entry = c.env.breakpoints.get(pollutantCode);
  if (!entry) {
    return c.json(
      {
        error: "Breakpoints not found",
        code: "NOT_FOUND",
        details: `No breakpoint table configured for pollutant '${pollutantCode}'`,
      },
      404,
    );
  }
  return c.json({ data: toBreakpointSet(entry, new Date()) }, 200);
});

export default app;
