import { OpenAPIHono, createRoute, z } from "@hono/zod-openapi";
import { count, desc, eq } from "drizzle-orm";
import { registry } from "../../core/registry";
import type { AppEnv } from "../../core/env";
import { ingestLog, observations, sources } from "../../db/schema";
import { DataSourceSchema, ErrorSchema } from "../schemas";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const SourceSchema = z
  .object({
    id: z.string().openapi({ description: "Unique adapter identifier", example: "aqs" }),
    name: z.string().openapi({ description: "Data source name" }),
    description: z.string().nullable().openapi({ description: "Data source description" }),
    sourceUrl: z.string().nullable().openapi({ description: "Upstream data source URL" }),
    role: DataSourceSchema,
    state: z.string().openapi({ description: "Current source state", example: "active" }),
    lastCollectedAt: z.string().nullable().openapi({ description: "Last data collection time (ISO 8601)" }),
    observationCount: z.number().openapi({ description: "Raw rows stored for this source" }),
    hasCustomRoutes: z.boolean().openapi({ description: "Whether the adapter defines custom routes" }),
  })
  .openapi("Source");

const SourceDetailSchema = SourceSchema.extend({
  schedules: z.array(
    z.object({
      frequency: z.string().openapi({ description: "Schedule frequency (e.g. hourly, daily)" }),
      description: z.string().openapi({ description: "Scheduled job description" }),
    }),
  ).openapi({ description: "Configured schedules" }),
  recentIngestions: z.array(
    z.object({
      id: z.number(),
      state: z.string().openapi({ description: "Ingestion state (running, success, error)" }),
      recordCount: z.number().nullable().openapi({ description: "Number of rows ingested" }),
      error: z.string().nullable().openapi({ description: "Error message if applicable" }),
      startedAt: z.string().openapi({ description: "Start time (ISO 8601)" }),
      finishedAt: z.string().nullable().openapi({ description: "Finish time (ISO 8601)" }),
    }),
  ).openapi({ description: "Recent ingestion runs" }),
}).openapi("SourceDetail");

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

const listSources = createRoute({
  method: "get",
  path: "/v1/sources",
  tags: ["Sources"],
  summary: "List all data sources",
  description:
    "Returns every registered adapter, the side of reconciliation it feeds and when it last collected data.",
  responses: {
    200: {
      content: { "application/json": { schema: z.object({ data: z.array(SourceSchema) }) } },
      description: "List of all data sources",
    },
  },
});

const getSource = createRoute({
  method: "get",
  path: "/v1/sources/{sourceId}",
  tags: ["Sources"],
  summary: "Get data source details",
  description: "Returns one data source with its schedules and recent ingestion history.",
  request: {
    params: z.object({
      sourceId: z.string().openapi({
        param: { name: "sourceId", in: "path" },
        description: "Adapter identifier",
        example: "aqs",
      }),
    }),
  },
  responses: {
    200: {
      content: { "application/json": { schema: z.object({ data: SourceDetailSchema }) } },
      description: "Data source details",
    },
    404: {
      content: { "application/json": { schema: ErrorSchema } },
      description: "Source not found",
    },
  },
});

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

const app = new OpenAPIHono<AppEnv>();

app.openapi(listSources, async (c) => {
  const db = c.env.DB;

  const sourceRows = await db.select().from(sources);
  const fetchedMap = new Map(sourceRows.map((r) => [r.id, r.lastFetchedAt]));
  const statusMap = new Map(sourceRows.map((r) => [r.id, r.status]));

  const counts = await db
    .select({ adapterId: observations.adapterId, total: count() })
    .from(observations)
    .groupBy(observations.adapterId);
  const countMap = new Map(counts.map((r) => [r.adapterId, r.total]));

  const data = registry.getAll().map((a) => ({
    id: a.id,
    name: a.name,
    description: a.description,
    sourceUrl: a.sourceUrl,
    role: a.role,
    state: statusMap.get(a.id) ?? "active",
    lastCollectedAt: fetchedMap.get(a.id)?.toISOString() ?? null,
    observationCount: countMap.get(a.id) ?? 0,
    hasCustomRoutes: !!a.routes,
  }));

  return c.json({ data }, 200);
});

app.openapi(getSource, async (c) => {
  const { sourceId } = c.req.valid("param");
  const adapter = registry.get(sourceId);

  if (!adapter) {
    return c.json(
      { error: "Source not found", code: "NOT_FOUND", details: `No adapter with id '${sourceId}'` },
      404,
    );
  }

  const db = c.env.DB;
  const [sourceRow] = await db.select().from(sources).where(eq(sources.id, sourceId)).limit(1);
  const [{ total }] = await db
    .select({ total: count() })
    .from(observations)
    .where(eq(observations.adapterId, sourceId));
  const recentLogs = await db
    .select()
    .from(ingestLog)
    .where(eq(ingestLog.adapterId, sourceId))
    .orderBy(desc(ingestLog.startedAt), desc(ingestLog.id))
    .limit(20);

  const data = {
    id: adapter.id,
    name: adapter.name,
    description: adapter.description,
    sourceUrl: adapter.sourceUrl,
    role: adapter.role,
    state: sourceRow?.status ?? "active",
    lastCollectedAt: sourceRow?.lastFetchedAt?.toISOString() ?? null,
    observationCount: total,
    hasCustomRoutes: !!adapter.routes,
    schedules: adapter.schedules.map((s) => ({
      frequency: s.frequency,
      description: s.description,
    })),
    recentIngestions: recentLogs.map((l) => ({
      id: l.id,
      state: l.status,
      recordCount: l.recordsCount ?? null,
      error: l.error ?? null,
      startedAt: l.startedAt.toISOString(),
      finishedAt: l.finishedAt?.toISOString() ?? null,
    })),
  };

  return c.json({ data }, 200);
});

export default app;
