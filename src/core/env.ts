import type { Settings } from "../config/settings";
import type { Db } from "../db/client";
import type { BreakpointRegistry } from "../pipeline/breakpoints";

/**
 * Process-wide bindings handed to every request (as `c.env`), scheduled run
 * and adapter context.
 */
export interface Env {
  DB: Db;
  settings: Settings;
  breakpoints: BreakpointRegistry;
}

export type AppEnv = { Bindings: Env };
