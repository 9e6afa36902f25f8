// ---------------------------------------------------------------------------
// Observation model shared by every pipeline stage
// ---------------------------------------------------------------------------

/** Which upstream feed supplied a value. */
export type DataSource = "PRIMARY" | "SECONDARY";

export const DATA_SOURCES: readonly DataSource[] = ["PRIMARY", "SECONDARY"];

export function isDataSource(value: string): value is DataSource {
  return value === "PRIMARY" || value === "SECONDARY";
}

/** State / county / site identifiers of a monitoring site, e.g. 37 / 063 / 0015. */
export interface LocationKey {
  stateCode: string;
  countyCode: string;
  siteNumber: string;
}

/** One hourly pollutant reading as delivered by a source adapter. */
export interface ObservationRecord {
  location: LocationKey;
  /** AQS parameter code ("88101"). Any string is accepted. */
  pollutantCode: string;
  /** Local calendar date, YYYY-MM-DD. */
  date: string;
  /** Local hour of day, 0–23. */
  hourLocal: number;
  value: number | null;
  source: DataSource;
}

/** An hourly reading that survived reconciliation; `value` is always a finite number. */
export interface ReconciledHourlyRecord extends ObservationRecord {
  value: number;
}

export interface DailyAqiRecord {
  location: LocationKey;
  pollutantCode: string;
  date: string;
  /** Mean of the contributing hourly values. */
  concAvg: number;
  /** Index value, or `null` when the concentration lies outside every breakpoint band. */
  aqi: number | null;
  dataSource: DataSource;
  /** Number of hourly rows that contributed to `concAvg`. */
  hours: number;
}

export interface CategorySummaryRecord {
  pollutantCode: string;
  category: string;
  stateCode: string;
  countyCode: string;
  siteNumber: string;
  year: number;
  days: number;
}

/** A unit of independent processing. */
export interface Scope {
  pollutantCode: string;
  year: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  if (!DATE_RE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/** Stable string form of a location, "37-063-0015". */
export function locationId(location: LocationKey): string {
  return `${location.stateCode}-${location.countyCode}-${location.siteNumber}`;
}

/** Parse "37-063-0015" back into a LocationKey. */
export function parseLocationId(id: string): LocationKey | null {
  const parts = id.split("-");
  if (parts.length !== 3 || parts.some((p) => p.length === 0)) return null;
  const [stateCode, countyCode, siteNumber] = parts;
  return { stateCode, countyCode, siteNumber };
}

/** Code-unit comparison, independent of the process locale. */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function yearOf(date: string): number {
  return Number(date.slice(0, 4));
}

/** Parse an "HH:MM" local time into its hour, or `null` when malformed. */
export function parseHour(time: string): number | null {
  const match = /^(\d{1,2}):(\d{2})(?::\d{2})?$/.exec(time.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  return hour >= 0 && hour <= 23 ? hour : null;
}

export function formatHour(hour: number): string {
  return `${String(hour).padStart(2, "0")}:00`;
}
