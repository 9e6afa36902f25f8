import { OpenAPIHono, createRoute, z } from "@hono/zod-openapi";
import type { AppEnv } from "../../core/env";
import { runStoredPipeline } from "../../core/pipeline";
import { TableModeSchema } from "../schemas";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const RunRequestSchema = z
  .object({
    year: z.number().int().min(1980).max(2100).openapi({ example: 2024 }),
    pollutants: z.array(z.string().min(1)).optional().openapi({
      description: "AQS parameter codes; defaults to the configured pollutants",
      example: ["88101"],
    }),
    mode: TableModeSchema.optional().openapi({ description: "Defaults to the configured table mode" }),
    publish: z.boolean().default(true).openapi({ description: "Write fact files to the stage directory" }),
  })
  .openapi("PipelineRunRequest");

const StageSchema = z.enum(["reconcile", "derive", "aggregate", "publish"]);

const ScopeResultSchema = z
  .object({
    scope: z.object({ pollutantCode: z.string(), year: z.number() }),
    status: z.enum(["succeeded", "failed"]),
    tableVersion: z.enum(["legacy", "current"]).optional(),
    hourly: z
      .object({ total: z.number(), primary: z.number(), secondary: z.number() })
      .optional()
      .openapi({ description: "Reconciled hourly rows by supplying source" }),
    dailyRecords: z.number().optional(),
    stage: StageSchema.optional().openapi({ description: "Stage that failed" }),
    code: z.string().optional().openapi({ example: "NO_DATA" }),
    message: z.string().optional(),
  })
  .openapi("PipelineScopeResult");

const PipelineReportSchema = z
  .object({
    year: z.number(),
    mode: TableModeSchema,
    startedAt: z.string(),
    finishedAt: z.string(),
    scopes: z.array(ScopeResultSchema),
    categories: z.object({
      status: z.enum(["succeeded", "failed"]),
      records: z.number().optional(),
      stage: StageSchema.optional(),
      code: z.string().optional(),
      message: z.string().optional(),
    }),
    artifacts: z.array(
      z.object({ id: z.string(), table: z.string(), path: z.string(), rows: z.number() }),
    ),
  })
  .openapi("PipelineReport");

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

const createRun = createRoute({
  method: "post",
  path: "/v1/pipeline/runs",
  tags: ["Pipeline"],
  summary: "Run the pipeline",
  description:
    "Reconciles stored observations, derives daily AQI and rebuilds the category summary for one year. Each pollutant succeeds or fails on its own; failures are listed in the report.",
  request: {
    body: {
      content: { "application/json": { schema: RunRequestSchema } },
      required: true,
    },
  },
  responses: {
    200: {
      content: { "application/json": { schema: z.object({ data: PipelineReportSchema }) } },
      description: "Run report",
    },
  },
});

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

const app = new OpenAPIHono<AppEnv>();

app.openapi(createRun, async (c) => {
  const { year, pollutants, mode, publish } = c.req.valid("json");
  const report = await runStoredPipeline(c.env, { year, pollutants, mode, publish });
  return c.json({ data: report }, 200);
});

export default app;
