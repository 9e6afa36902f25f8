import type { OpenAPIHono } from "@hono/zod-openapi";
import { Scalar } from "@scalar/hono-api-reference";
import type { AppEnv } from "../core/env";
import { registry } from "../core/registry";

/**
 * Mounts the OpenAPI JSON document and Scalar UI on the Hono app.
 *
 * Usage:
 *   import { mountDocs } from "./api/openapi";
 *   mountDocs(app, { port: 8787 });
 */
export function mountDocs(app: OpenAPIHono<AppEnv>, opts: { port: number }) {
  const coreTags = [
    { name: "Sources", description: "Registered adapters and their ingest history" },
    { name: "Sites", description: "Monitoring sites and the pollutants they report" },
    { name: "Hourly", description: "Reconciled hourly observations" },
    { name: "AQI", description: "Daily AQI, category summaries and breakpoint tables" },
    { name: "Pipeline", description: "On-demand pipeline runs" },
    { name: "Artifacts", description: "Published fact table files" },
  ];

  const adapterTags = registry.getAll().map((a) => ({
    name: a.openApiTag ?? a.name,
    description: a.description,
  }));

  app.doc("/doc", {
    openapi: "3.1.0",
    info: {
      title: "Air Quality Pipeline API",
      description:
        "Collects hourly air-quality samples from a primary regulatory feed and a secondary near-real-time feed, reconciles them per site-hour, derives daily AQI against versioned breakpoint tables and publishes fact tables for reporting.",
      version: "1.0.0",
      license: {
        name: "MIT",
      },
    },
    servers: [{ url: `http://localhost:${opts.port}`, description: "Local" }],
    tags: [...coreTags, ...adapterTags],
  });

  app.get(
    "/reference",
    Scalar({
      url: "/doc",
      theme: "kepler",
      pageTitle: "Air Quality Pipeline API Reference",
    }),
  );
}
