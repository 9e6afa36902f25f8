import { z } from "zod";
import { ValidationError } from "../core/errors";
import { DEFAULT_BREAKPOINTS_PATH, TABLE_MODES, type TableMode } from "../pipeline/breakpoints";

// ---------------------------------------------------------------------------
// Environment schema
// ---------------------------------------------------------------------------

/** Blank values in a .env file mean "not set". */
const optionalString = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.string().trim().optional(),
);

const list = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((s) =>
      Array.from(new Set(s.split(",").map((part) => part.trim()).filter((part) => part.length > 0))),
    );

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default(fallback)
    .transform((v) => v === "true" || v === "1" || v === "yes");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  DATABASE_PATH: z.string().min(1).default("data/airquality.db"),
  STAGE_DIR: z.string().min(1).default("data/stage"),
  BREAKPOINTS_PATH: z.string().min(1).default(DEFAULT_BREAKPOINTS_PATH),
  POLLUTANTS: list("88101").pipe(z.array(z.string()).min(1, "at least one pollutant code is required")),
  AQI_TABLE_MODE: z.enum(TABLE_MODES).default("auto"),
  SCHEDULER_ENABLED: flag("true"),

  AQS_BASE_URL: z.string().url().default("https://aqs.epa.gov/data/api"),
  AQS_API_EMAIL: optionalString,
  AQS_API_KEY: optionalString,
  AQS_STATES: list("37").pipe(z.array(z.string().regex(/^\d{2}$/, "state codes are two digits"))),
  AQS_LOOKBACK_DAYS: z.coerce.number().int().min(1).max(366).default(1),

  ENVISTA_BASE_URL: z.preprocess(
    (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
    z.string().url().optional(),
  ),
  ENVISTA_API_KEY: optionalString,
  ENVISTA_USERNAME: optionalString,
  ENVISTA_PASSWORD: optionalString,
});

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export interface AqsSettings {
  baseUrl: string;
  email?: string;
  key?: string;
  states: string[];
  lookbackDays: number;
}

export interface EnvistaSettings {
  baseUrl?: string;
  apiKey?: string;
  username?: string;
  password?: string;
}

export interface Settings {
  port: number;
  databasePath: string;
  stageDir: string;
  breakpointsPath: string;
  pollutants: string[];
  tableMode: TableMode;
  schedulerEnabled: boolean;
  aqs: AqsSettings;
  envista: EnvistaSettings;
}

/**
 * Read settings from environment variables. Call after `dotenv/config` has
 * populated `process.env`; tests pass their own record.
 */
export function loadSettings(source: Record<string, string | undefined> = process.env): Settings {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ValidationError(`Invalid configuration: ${issues}`);
  }

  const env = parsed.data;
  return {
    port: env.PORT,
    databasePath: env.DATABASE_PATH,
    stageDir: env.STAGE_DIR,
    breakpointsPath: env.BREAKPOINTS_PATH,
    pollutants: env.POLLUTANTS,
    tableMode: env.AQI_TABLE_MODE,
    schedulerEnabled: env.SCHEDULER_ENABLED,
    aqs: {
      baseUrl: env.AQS_BASE_URL.replace(/\/+$/, ""),
      email: env.AQS_API_EMAIL,
      key: env.AQS_API_KEY,
      states: env.AQS_STATES,
      lookbackDays: env.AQS_LOOKBACK_DAYS,
    },
    envista: {
      baseUrl: env.ENVISTA_BASE_URL?.replace(/\/+$/, ""),
      apiKey: env.ENVISTA_API_KEY,
      username: env.ENVISTA_USERNAME,
      password: env.ENVISTA_PASSWORD,
    },
  };
}
