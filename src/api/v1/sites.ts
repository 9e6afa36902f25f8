import { OpenAPIHono, createRoute, z } from "@hono/zod-openapi";
import { and, asc, count, eq, like, max, min, type SQL } from "drizzle-orm";
import { cacheControl } from "../../core/cache";
import type { AppEnv } from "../../core/env";
import { observations, sites } from "../../db/schema";
import { parseLocationId } from "../../pipeline/observation";
import {
  DataSourceSchema,
  ErrorSchema,
  PaginationSchema,
  limitParam,
  offsetParam,
  paginate,
} from "../schemas";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const SiteSchema = z
  .object({
    id: z.string().openapi({ description: "State-county-site identifier", example: "37-063-0015" }),
    stateCode: z.string().openapi({ example: "37" }),
    countyCode: z.string().openapi({ example: "063" }),
    siteNumber: z.string().openapi({ example: "0015" }),
    name: z.string().nullable().openapi({ description: "Site name", example: "Durham Armory" }),
    latitude: z.number().nullable().openapi({ description: "Latitude" }),
    longitude: z.number().nullable().openapi({ description: "Longitude" }),
    registeredBy: z.string().openapi({ description: "Adapter that last registered the site", example: "aqs" }),
    metadata: z.record(z.string(), z.unknown()).nullable().openapi({ description: "Additional JSON metadata" }),
  })
  .openapi("Site");

const SiteCoverageSchema = z
  .object({
    pollutantCode: z.string().openapi({ example: "88101" }),
    source: DataSourceSchema,
    observations: z.number().openapi({ description: "Raw rows stored" }),
    firstDate: z.string().nullable().openapi({ description: "Earliest local date observed" }),
    lastDate: z.string().nullable().openapi({ description: "Latest local date observed" }),
  })
  .openapi("SiteCoverage");

type SiteRow = typeof sites.$inferSelect;

function toSite(r: SiteRow) {
  return {
    id: r.id,
    stateCode: r.stateCode,
    countyCode: r.countyCode,
    siteNumber: r.siteNumber,
    name: r.name,
    latitude: r.latitude,
    longitude: r.longitude,
    registeredBy: r.adapterId,
    metadata: parseMetadata(r.metadata),
  };
}

function parseMetadata(raw: string | null): Record<string, unknown> | null {
  if (!raw) return null;
  const parsed: unknown = JSON.parse(raw);
  return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : null;
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

const listSites = createRoute({
  method: "get",
  path: "/v1/sites",
  tags: ["Sites"],
  summary: "List monitoring sites",
  description: "Returns every monitoring site registered by an adapter, filterable by state, county or name.",
  request: {
    query: z.object({
      state: z.string().optional().openapi({
        param: { name: "state", in: "query" },
        description: "Filter by state code",
        example: "37",
      }),
      county: z.string().optional().openapi({
        param: { name: "county", in: "query" },
        description: "Filter by county code",
        example: "063",
      }),
      q: z.string().optional().openapi({
        param: { name: "q", in: "query" },
        description: "Search by site name",
        example: "armory",
      }),
      limit: limitParam,
      offset: offsetParam,
    }),
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.object({ data: z.array(SiteSchema), pagination: PaginationSchema }),
        },
      },
      description: "List of sites",
    },
  },
});

const getSite = createRoute({
  method: "get",
  path: "/v1/sites/{siteId}",
  tags: ["Sites"],
  summary: "Site details",
  description: "Returns one site with the pollutants and sources that have reported for it.",
  request: {
    params: z.object({
      siteId: z.string().openapi({
        param: { name: "siteId", in: "path" },
        description: "State-county-site identifier",
        example: "37-063-0015",
      }),
    }),
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.object({ data: SiteSchema.extend({ coverage: z.array(SiteCoverageSchema) }) }),
        },
      },
      description: "Site details",
    },
    404: {
      content: { "application/json": { schema: ErrorSchema } },
      description: "Site not found",
    },
  },
});

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

const app = new OpenAPIHono<AppEnv>();

app.use("/v1/sites", cacheControl(300, 60));

app.openapi(listSites, async (c) => {
  const { state, county, q, limit, offset } = c.req.valid("query");
  const db = c.env.DB;

  const conditions: SQL[] = [];
  if (state) conditions.push(eq(sites.stateCode, state));
  if (county) conditions.push(eq(sites.countyCode, county));
  if (q) conditions.push(like(sites.name, `%${q}%`));
  const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

  const [{ total }] = await db.select({ total: count() }).from(sites).where(whereClause);
  const rows = await db
    .select()
    .from(sites)
    .where(whereClause)
    .orderBy(asc(sites.stateCode), asc(sites.countyCode), asc(sites.siteNumber))
    .limit(limit)
    .offset(offset);

  const data = rows.map(toSite);
  return c.json({ data, pagination: paginate(total, limit, offset, data.length) }, 200);
});

app.openapi(getSite, async (c) => {
  const { siteId } = c.req.valid("param");
  const db = c.env.DB;

  const [row] = await db.select().from(sites).where(eq(sites.id, siteId)).limit(1);
  const key = parseLocationId(siteId);
  if (!row || !key) {
    return c.json({ error: "Site not found", code: "NOT_FOUND", details: `No site '${siteId}'` }, 404);
  }

  const coverage = await db
    .select({
      pollutantCode: observations.pollutantCode,
      source: observations.source,
      observations: count(),
      firstDate: min(observations.date),
      lastDate: max(observations.date),
    })
    .from(observations)
    .where(
      and(
        eq(observations.stateCode, key.stateCode),
        eq(observations.countyCode, key.countyCode),
        eq(observations.siteNumber, key.siteNumber),
      ),
    )
    .groupBy(observations.pollutantCode, observations.source)
    .orderBy(asc(observations.pollutantCode), asc(observations.source));

  const data = {
    ...toSite(row),
    coverage: coverage.map((r) => ({
      pollutantCode: r.pollutantCode,
      source: DataSourceSchema.parse(r.source),
      observations: r.observations,
      firstDate: r.firstDate,
      lastDate: r.lastDate,
    })),
  };

  return c.json({ data }, 200);
});

export default app;
