import { readFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { OpenAPIHono, createRoute, z } from "@hono/zod-openapi";
import { and, asc, eq, type SQL } from "drizzle-orm";
import type { AppEnv } from "../../core/env";
import { artifacts } from "../../db/schema";
import { ErrorSchema, TableModeSchema, pollutantParam } from "../schemas";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const ArtifactSchema = z
  .object({
    id: z.string().openapi({ description: "Artifact identifier", example: "fctAQIDaily-88101_2024" }),
    table: z.string().openapi({ description: "Fact table", example: "fctAQIDaily" }),
    path: z.string().openapi({ description: "Path under the stage directory", example: "fctAQIDaily/88101_2024.csv.zip" }),
    contentType: z.string().openapi({ example: "application/zip" }),
    sizeBytes: z.number().openapi({ description: "Compressed size" }),
    rowCount: z.number().openapi({ description: "CSV data rows" }),
    pollutantCode: z.string().nullable().openapi({ example: "88101" }),
    year: z.number().openapi({ example: 2024 }),
    mode: TableModeSchema.nullable().openapi({ description: "Table mode of the last publish; null for hourly files" }),
    createdAt: z.string().openapi({ description: "Publish time (ISO 8601)" }),
    downloadUrl: z.string().openapi({ description: "URL to download the file" }),
  })
  .openapi("Artifact");

const artifactIdParam = z.object({
  artifactId: z.string().openapi({
    param: { name: "artifactId", in: "path" },
    description: "Artifact identifier",
    example: "fctAQIDaily-88101_2024",
  }),
});

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

const listArtifacts = createRoute({
  method: "get",
  path: "/v1/artifacts",
  tags: ["Artifacts"],
  summary: "List published fact files",
  description: "Zipped CSV fact tables written by pipeline runs, ordered by table and identifier.",
  request: {
    query: z.object({
      table: z.string().optional().openapi({
        param: { name: "table", in: "query" },
        description: "Filter by fact table",
        example: "fctHourly",
      }),
      year: z.coerce.number().int().optional().openapi({
        param: { name: "year", in: "query" },
        description: "Filter by year",
        example: 2024,
      }),
      pollutant: pollutantParam,
    }),
  },
  responses: {
    200: {
      content: { "application/json": { schema: z.object({ data: z.array(ArtifactSchema) }) } },
      description: "List of artifacts",
    },
  },
});

const downloadArtifact = createRoute({
  method: "get",
  path: "/v1/artifacts/{artifactId}/download",
  tags: ["Artifacts"],
  summary: "Download a fact file",
  description: "Returns the zipped CSV as stored in the stage directory.",
  request: { params: artifactIdParam },
  responses: {
    200: {
      description: "Zip archive holding one CSV",
    },
    404: {
      content: { "application/json": { schema: ErrorSchema } },
      description: "Artifact not found",
    },
  },
});

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

const app = new OpenAPIHono<AppEnv>();

app.openapi(listArtifacts, async (c) => {
  const { table, year, pollutant } = c.req.valid("query");
  const db = c.env.DB;

  const conditions: SQL[] = [];
  if (table) conditions.push(eq(artifacts.tableName, table));
  if (year !== undefined) conditions.push(eq(artifacts.year, year));
  if (pollutant) conditions.push(eq(artifacts.pollutantCode, pollutant));

  const rows = await db
    .select()
    .from(artifacts)
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(asc(artifacts.tableName), asc(artifacts.id));

  const data = rows.map((r) => ({
    id: r.id,
    table: r.tableName,
    path: r.path,
    contentType: r.contentType,
    sizeBytes: r.sizeBytes,
    rowCount: r.rowCount,
    pollutantCode: r.pollutantCode,
    year: r.year,
    mode: r.mode === null ? null : TableModeSchema.parse(r.mode),
    createdAt: r.createdAt.toISOString(),
    downloadUrl: `/v1/artifacts/${r.id}/download`,
  }));

  return c.json({ data }, 200);
});

app.openapi(downloadArtifact, async (c) => {
  const { artifactId } = c.req.valid("param");
  const db = c.env.DB;

  const [artifact] = await db.select().from(artifacts).where(eq(artifacts.id, artifactId)).limit(1);
  if (!artifact) {
    return c.json(
      { error: "Artifact not found", code: "NOT_FOUND", details: `No artifact '${artifactId}'` },
      404,
    );
  }

  let content: Buffer;
  try {
    content = await readFile(join(c.env.settings.stageDir, artifact.path));
  } catch (err) {
    if (!isMissingFile(err)) throw err;
    return c.json(
      { error: "File missing from storage", code: "NOT_FOUND", details: artifact.path },
      404,
    );
  }

  c.header("Content-Type", artifact.contentType);
  c.header("Content-Disposition", `attachment; filename="${basename(artifact.path)}"`);
  c.header("Content-Length", String(content.byteLength));

  return c.body(new Uint8Array(content));
});

export default app;
