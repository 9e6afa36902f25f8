import "dotenv/config";
import { serve } from "@hono/node-server";
import { seedSources } from "./adapters/seed";
import { createApp } from "./app";
import { loadSettings } from "./config/settings";
import type { Env } from "./core/env";
import { startScheduler } from "./core/scheduler";
import { openDb } from "./db/client";
import { loadBreakpointRegistry } from "./pipeline/breakpoints";

// ---------------------------------------------------------------------------
// Bootstrap
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const settings = loadSettings();
  const env: Env = {
    DB: openDb(settings.databasePath),
    settings,
    breakpoints: loadBreakpointRegistry(settings.breakpointsPath),
  };

  await seedSources(env.DB);

  const app = createApp({ port: settings.port });
  const server = serve({ fetch: (req) => app.fetch(req, env), port: settings.port }, (info) => {
    console.log(`[server] Listening on http://localhost:${info.port}`);
  });

  const scheduler = settings.schedulerEnabled ? startScheduler(env) : undefined;

  const shutdown = () => {
    console.log("[server] Shutting down");
    scheduler?.stop();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("[server] ✗ Failed to start:", err);
  process.exit(1);
});
