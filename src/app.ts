import { OpenAPIHono } from "@hono/zod-openapi";
import { HTTPException } from "hono/http-exception";
import { cors } from "hono/cors";
import { logger } from "hono/logger";

// Import adapters (registers them in the global registry)
import "./adapters/index";

// API route modules
import aqiApp from "./api/v1/aqi";
import artifactsApp from "./api/v1/artifacts";
import hourlyApp from "./api/v1/hourly";
import pipelineApp from "./api/v1/pipeline";
import sitesApp from "./api/v1/sites";
import sourcesApp from "./api/v1/sources";
import { mountDocs } from "./api/openapi";

// Core
import type { AppEnv } from "./core/env";
import { AirQualityError } from "./core/errors";
import { registry } from "./core/registry";

export interface AppOptions {
  port?: number;
  /** Per-request access log; off in tests. */
  requestLog?: boolean;
}

export function createApp(opts: AppOptions = {}): OpenAPIHono<AppEnv> {
  const app = new OpenAPIHono<AppEnv>();

  // Security headers
  app.use("*", async (c, next) => {
    await next();
    c.res.headers.set("X-Content-Type-Options", "nosniff");
    c.res.headers.set("X-Frame-Options", "DENY");
  });

  // Global middleware
  app.use("*", cors());
  if (opts.requestLog ?? true) app.use("*", logger());

  // Mount core API routes
  app.route("/", sourcesApp);
  app.route("/", sitesApp);
  app.route("/", hourlyApp);
  app.route("/", aqiApp);
  app.route("/", pipelineApp);
  app.route("/", artifactsApp);

  // Mount custom adapter routes (each adapter's OpenAPIHono sub-app)
  for (const adapter of registry.getAll()) {
    if (adapter.routes) {
      app.route(`/v1/${adapter.id}`, adapter.routes);
    }
  }

  // Mount OpenAPI docs + Scalar UI
  mountDocs(app, { port: opts.port ?? 8787 });

  // Health check
  app.get("/health", (c) => {
    return c.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      version: "1.0.0",
      adapterCount: registry.size,
      breakpointPollutants: c.env.breakpoints.size,
    });
  });

  // Root / discovery
  app.get("/", (c) => {
    return c.json({
      name: "Air Quality Pipeline API",
      description:
        "Reconciled hourly air-quality observations, daily AQI and published fact tables.",
      version: "1.0.0",
      adapters: registry.getAll().map((a) => ({
        id: a.id,
        name: a.name,
        role: a.role,
        hasCustomRoutes: !!a.routes,
      })),
      endpoints: {
        sources: "/v1/sources",
        sites: "/v1/sites",
        hourly: "/v1/hourly",
        dailyAqi: "/v1/aqi/daily",
        categories: "/v1/aqi/categories",
        breakpoints: "/v1/aqi/breakpoints",
        pipelineRuns: "/v1/pipeline/runs",
        artifacts: "/v1/artifacts",
        documentation: "/doc",
        reference: "/reference",
        health: "/health",
      },
    });
  });

  app.notFound((c) => c.json({ error: "Not found", code: "NOT_FOUND", details: c.req.path }, 404));

  app.onError((err, c) => {
    if (err instanceof AirQualityError) {
      return c.json({ error: err.message, code: err.code }, err.statusCode);
    }
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    console.error(`[api] ✗ ${c.req.method} ${c.req.path}:`, err);
    return c.json({ error: "Internal server error", code: "INTERNAL_ERROR" }, 500);
  });

  return app;
}
