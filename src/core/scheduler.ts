import { eq } from "drizzle-orm";
import { sources } from "../db/schema";
import type { AdapterDefinition, AdapterSchedule, CronFrequency } from "./adapter";
import type { Env } from "./env";
import { runStoredPipeline } from "./pipeline";
import { registry } from "./registry";
import {
  createAdapterContext,
  logIngestError,
  logIngestStart,
  logIngestSuccess,
} from "./storage";

// ---------------------------------------------------------------------------
// Cron → frequency mapping
// ---------------------------------------------------------------------------

export const MINUTELY = "* * * * *";
export const HOURLY = "0 * * * *";
export const DAILY = "0 0 * * *";

/**
 * Three cron buckets:
 *   `* * * * *`   → minutely bucket  (every_minute, every_5_minutes, every_15_minutes)
 *   `0 * * * *`   → hourly bucket    (hourly, every_6_hours)
 *   `0 0 * * *`   → daily bucket     (daily, weekly)
 */
export function shouldRun(
  frequency: CronFrequency,
  cron: string,
  minute: number,
  hour: number,
  dayOfWeek: number,
): boolean {
  switch (frequency) {
    // Minutely bucket
    case "every_minute":
      return cron === MINUTELY;
    case "every_5_minutes":
      return cron === MINUTELY && minute % 5 === 0;
    case "every_15_minutes":
      return cron === MINUTELY && minute % 15 === 0;

    // Hourly bucket
    case "hourly":
      return cron === HOURLY;
    case "every_6_hours":
      return cron === HOURLY && hour % 6 === 0;

    // Daily bucket
    case "daily":
      return cron === DAILY;
    case "weekly":
      return cron === DAILY && dayOfWeek === 0; // Sunday

    default:
      return false;
  }
}

/** Buckets that fire at a given UTC minute. */
export function dueCrons(time: Date): string[] {
  const crons = [MINUTELY];
  if (time.getUTCMinutes() === 0) {
    crons.push(HOURLY);
    if (time.getUTCHours() === 0) crons.push(DAILY);
  }
  return crons;
}

// ---------------------------------------------------------------------------
// Scheduled handler
// ---------------------------------------------------------------------------

/**
 * Run every adapter schedule due for `cron` at `scheduledTime`. The daily
 * bucket then runs the pipeline for the current year over what was ingested.
 */
export async function handleScheduled(cron: string, scheduledTime: Date, env: Env): Promise<void> {
  const minute = scheduledTime.getUTCMinutes();
  const hour = scheduledTime.getUTCHours();
  const dayOfWeek = scheduledTime.getUTCDay();

  const runs: Promise<void>[] = [];
  for (const adapter of registry.getAll()) {
    for (const schedule of adapter.schedules) {
      if (shouldRun(schedule.frequency, cron, minute, hour, dayOfWeek)) {
        runs.push(runAdapter(adapter, schedule, env, scheduledTime));
      }
    }
  }
  await Promise.all(runs);

  if (cron === DAILY) {
    const year = scheduledTime.getUTCFullYear();
    console.log(`[scheduler] Running daily pipeline for ${year}`);
    const report = await runStoredPipeline(env, { year, now: scheduledTime });
    const failed = report.scopes.filter((s) => s.status === "failed");
    for (const scope of failed) {
      console.error(`[scheduler] ✗ pipeline ${scope.scope.pollutantCode}/${year}: ${scope.code}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Run a single adapter schedule with logging
// ---------------------------------------------------------------------------

export async function runAdapter(
  adapter: AdapterDefinition,
  schedule: AdapterSchedule,
  env: Env,
  now: Date = new Date(),
): Promise<void> {
  const db = env.DB;
  const adapterCtx = createAdapterContext(env, adapter, now);
  const logId = await logIngestStart(db, adapter.id);

  console.log(`[scheduler] Running "${adapter.id}" – ${schedule.description}`);

  try {
    await schedule.handler(adapterCtx);
    await logIngestSuccess(db, logId, adapterCtx.ingested);
    await db.update(sources).set({ lastFetchedAt: new Date() }).where(eq(sources.id, adapter.id));
    console.log(`[scheduler] ✓ "${adapter.id}" completed (${adapterCtx.ingested} rows)`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    await logIngestError(db, logId, message);
    console.error(`[scheduler] ✗ "${adapter.id}" failed:`, message);
  }
}

// ---------------------------------------------------------------------------
// Minute ticker
// ---------------------------------------------------------------------------

export interface SchedulerHandle {
  stop(): void;
}

/** Fire the due buckets at the top of every minute until stopped. */
export function startScheduler(env: Env): SchedulerHandle {
  let interval: NodeJS.Timeout | undefined;

  const tick = () => {
    const now = new Date();
    now.setUTCSeconds(0, 0);
    for (const cron of dueCrons(now)) {
      handleScheduled(cron, now, env).catch((err: unknown) => {
        console.error(`[scheduler] "${cron}" run failed:`, err);
      });
    }
  };

  const msToNextMinute = 60_000 - (Date.now() % 60_000);
  const timeout = setTimeout(() => {
    tick();
    interval = setInterval(tick, 60_000);
  }, msToNextMinute);

  console.log(`[scheduler] Started; first tick in ${Math.round(msToNextMinute / 1000)}s`);

  return {
    stop() {
      clearTimeout(timeout);
      if (interval) clearInterval(interval);
    },
  };
}
