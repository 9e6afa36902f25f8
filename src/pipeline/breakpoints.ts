import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { BreakpointTableError } from "../core/errors";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A concentration interval mapped linearly onto an index interval. Both ends inclusive. */
export interface BreakpointBand {
  concLow: number;
  concHigh: number;
  indexLow: number;
  indexHigh: number;
}

export type BreakpointTable = readonly BreakpointBand[];

export type TableVersion = "legacy" | "current";

/** How the caller wants the table chosen. "auto" picks by today's date against the cutover. */
export type TableMode = TableVersion | "auto";

export const TABLE_MODES = ["legacy", "current", "auto"] as const satisfies readonly TableMode[];

export interface PollutantBreakpoints {
  pollutantCode: string;
  name: string;
  units: string;
  /** Reporting precision; concentrations are truncated to it before lookup. */
  concentrationDecimals: number;
  /** First day (YYYY-MM-DD) on which "auto" resolves to the current table. */
  cutover: string | null;
  versions: {
    legacy: BreakpointTable | null;
    current: BreakpointTable;
  };
}

export type BreakpointRegistry = ReadonlyMap<string, PollutantBreakpoints>;

export interface SelectedTable {
  pollutantCode: string;
  version: TableVersion;
  table: BreakpointTable;
  concentrationDecimals: number;
}

// ---------------------------------------------------------------------------
// Configuration schema
// ---------------------------------------------------------------------------

const BandSchema = z
  .object({
    concLow: z.number(),
    concHigh: z.number(),
    indexLow: z.number().int(),
    indexHigh: z.number().int(),
  })
  .refine((b) => b.concLow < b.concHigh, { message: "concLow must be below concHigh" })
  .refine((b) => b.indexLow <= b.indexHigh, { message: "indexLow must not exceed indexHigh" });

const TableSchema = z
  .array(BandSchema)
  .min(1)
  .refine(
    (bands) => bands.every((band, i) => i === 0 || band.concLow > bands[i - 1].concHigh),
    { message: "bands must be ascending and non-overlapping" },
  );

const PollutantSchema = z
  .object({
    name: z.string().min(1),
    units: z.string().default(""),
    concentrationDecimals: z.number().int().min(0).max(6).default(1),
    cutover: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
    versions: z.object({
      legacy: TableSchema.optional(),
      current: TableSchema,
    }),
  })
  .refine((p) => !p.versions.legacy || p.cutover !== undefined, {
    message: "a cutover date is required when a legacy table is configured",
  });

export const BreakpointConfigSchema = z.record(z.string().min(1), PollutantSchema);

export type BreakpointConfig = z.input<typeof BreakpointConfigSchema>;

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

function freezeTable(bands: BreakpointBand[]): BreakpointTable {
  return Object.freeze(bands.map((b) => Object.freeze({ ...b })));
}

/** Validate a breakpoint configuration and freeze it into an immutable registry. */
export function createBreakpointRegistry(raw: unknown): BreakpointRegistry {
  const parsed = BreakpointConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new BreakpointTableError(`Invalid breakpoint configuration: ${issues}`);
  }

  const registry = new Map<string, PollutantBreakpoints>();
  for (const [pollutantCode, entry] of Object.entries(parsed.data)) {
    registry.set(
      pollutantCode,
      Object.freeze({
        pollutantCode,
        name: entry.name,
        units: entry.units,
        concentrationDecimals: entry.concentrationDecimals,
        cutover: entry.cutover ?? null,
        versions: Object.freeze({
          legacy: entry.versions.legacy ? freezeTable(entry.versions.legacy) : null,
          current: freezeTable(entry.versions.current),
        }),
      }),
    );
  }
  return registry;
}

export const DEFAULT_BREAKPOINTS_PATH = fileURLToPath(
  new URL("../../config/breakpoints.json", import.meta.url),
);

/** Read and validate a breakpoint configuration file. */
export function loadBreakpointRegistry(path: string = DEFAULT_BREAKPOINTS_PATH): BreakpointRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new BreakpointTableError(`Cannot read breakpoint configuration at ${path}: ${message}`);
  }
  return createBreakpointRegistry(raw);
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

/**
 * Resolve a mode to a concrete table version. "auto" compares the UTC date of
 * `now` (the time of computation, not the observation date) with the cutover,
 * so re-running after the cutover recomputes history with the current table.
 */
export function resolveTableVersion(
  entry: PollutantBreakpoints,
  mode: TableMode,
  now: Date,
): TableVersion {
  if (!entry.versions.legacy) return "current";
  if (mode !== "auto") return mode;
  const today = now.toISOString().slice(0, 10);
  return entry.cutover !== null && today >= entry.cutover ? "current" : "legacy";
}

export function selectTable(
  registry: BreakpointRegistry,
  pollutantCode: string,
  mode: TableMode,
  now: Date = new Date(),
): SelectedTable {
  const entry = registry.get(pollutantCode);
  if (!entry) {
    throw new BreakpointTableError(`No breakpoint table configured for pollutant '${pollutantCode}'`);
  }
  const version = resolveTableVersion(entry, mode, now);
  const table = version === "legacy" && entry.versions.legacy ? entry.versions.legacy : entry.versions.current;
  return {
    pollutantCode,
    version,
    table,
    concentrationDecimals: entry.concentrationDecimals,
  };
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

/**
 * Map a concentration to an index through the first band containing it
 * (inclusive on both ends). Rounds half up. Returns `null` when no band
 * contains `c`.
 */
export function lookupIndex(table: BreakpointTable, c: number): number | null {
  if (!Number.isFinite(c)) return null;
  for (const band of table) {
    if (band.concLow <= c && c <= band.concHigh) {
      const slope = (band.indexHigh - band.indexLow) / (band.concHigh - band.concLow);
      return Math.round(slope * (c - band.concLow) + band.indexLow);
    }
  }
  return null;
}

/**
 * Truncate (toward zero) to `decimals` places. After scaling, a value within
 * 1e-9 of the next whole step counts as that step, so `0.7` stays `0.7`
 * while `12.09999999` still truncates to `12.0`.
 */
export function truncateConcentration(c: number, decimals: number): number {
  if (!Number.isFinite(c)) return c;
  const factor = 10 ** decimals;
  const scaled = Number((c * factor).toFixed(9));
  return Math.trunc(scaled) / factor;
}

/**
 * Concentration → index for a selected table, applying the pollutant's
 * reporting precision. Negative concentrations are out of range even when
 * truncation would bring them to zero.
 */
export function concentrationToAqi(selected: SelectedTable, c: number): number | null {
  if (c < 0) return null;
  return lookupIndex(selected.table, truncateConcentration(c, selected.concentrationDecimals));
}
