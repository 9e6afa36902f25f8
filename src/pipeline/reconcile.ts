import {
  isIsoDate,
  type DataSource,
  type ObservationRecord,
  type ReconciledHourlyRecord,
} from "./observation";

// ---------------------------------------------------------------------------
// Keyed pairing
// ---------------------------------------------------------------------------

/** An observation carrying a finite value. */
export type UsableRecord = ObservationRecord & { value: number };

/**
 * What the two sides hold for one merge key. A side only "has" a key when it
 * carries a usable (non-null, finite) value for it.
 */
export type KeyedPair =
  | { kind: "both"; key: string; primary: UsableRecord; secondary: UsableRecord }
  | { kind: "primary-only"; key: string; primary: UsableRecord }
  | { kind: "secondary-only"; key: string; secondary: UsableRecord }
  | { kind: "neither"; key: string };

/**
 * Merge key over (state, county, site, pollutant, date, hour), or `null` when
 * any part is missing or malformed. Exact match only.
 */
export function mergeKey(record: ObservationRecord): string | null {
  const { location, pollutantCode, date, hourLocal } = record;
  if (!location) return null;
  const parts = [location.stateCode, location.countyCode, location.siteNumber, pollutantCode];
  if (parts.some((p) => typeof p !== "string" || p.trim().length === 0)) return null;
  if (typeof date !== "string" || !isIsoDate(date)) return null;
  if (!Number.isInteger(hourLocal) || hourLocal < 0 || hourLocal > 23) return null;
  return [...parts, date, String(hourLocal)].join("|");
}

function hasValue(record: ObservationRecord): record is UsableRecord {
  return typeof record.value === "number" && Number.isFinite(record.value);
}

/**
 * Index one side by merge key. Keys seen only with unusable values are kept
 * (mapped to `null`) so they still show up as "neither" in the pairing.
 * The first usable row for a key wins.
 */
function indexSide(records: readonly ObservationRecord[]): Map<string, UsableRecord | null> {
  const index = new Map<string, UsableRecord | null>();
  for (const record of records) {
    const key = mergeKey(record);
    if (key === null) continue;
    const existing = index.get(key);
    if (existing) continue;
    index.set(key, hasValue(record) ? record : null);
  }
  return index;
}

/** Outer-join both sides on the merge key. Keys appear in first-seen order, primary side first. */
export function classify(
  primary: readonly ObservationRecord[],
  secondary: readonly ObservationRecord[],
): KeyedPair[] {
  const primaryIndex = indexSide(primary);
  const secondaryIndex = indexSide(secondary);

  const keys = new Set<string>(primaryIndex.keys());
  for (const key of secondaryIndex.keys()) keys.add(key);

  const pairs: KeyedPair[] = [];
  for (const key of keys) {
    const p = primaryIndex.get(key) ?? null;
    const s = secondaryIndex.get(key) ?? null;
    if (p && s) pairs.push({ kind: "both", key, primary: p, secondary: s });
    else if (p) pairs.push({ kind: "primary-only", key, primary: p });
    else if (s) pairs.push({ kind: "secondary-only", key, secondary: s });
    else pairs.push({ kind: "neither", key });
  }
  return pairs;
}

// ---------------------------------------------------------------------------
// Projection
// ---------------------------------------------------------------------------

function tag(record: UsableRecord, source: DataSource): ReconciledHourlyRecord {
  return {
    location: { ...record.location },
    pollutantCode: record.pollutantCode,
    date: record.date,
    hourLocal: record.hourLocal,
    value: record.value,
    source,
  };
}

/** Primary wins whenever it holds a value; otherwise the secondary side fills in. */
export function project(pair: KeyedPair): ReconciledHourlyRecord | null {
  switch (pair.kind) {
    case "both":
    case "primary-only":
      return tag(pair.primary, "PRIMARY");
    case "secondary-only":
      return tag(pair.secondary, "SECONDARY");
    case "neither":
      return null;
  }
}

/**
 * Merge primary and secondary observations into one authoritative hourly
 * record per key. Pure; never throws on malformed rows.
 */
export function reconcile(
  primary: readonly ObservationRecord[],
  secondary: readonly ObservationRecord[],
): ReconciledHourlyRecord[] {
  const out: ReconciledHourlyRecord[] = [];
  for (const pair of classify(primary, secondary)) {
    const record = project(pair);
    if (record) out.push(record);
  }
  return out;
}

export interface ReconciliationSummary {
  total: number;
  primary: number;
  secondary: number;
}

export function summarizeReconciliation(records: readonly ReconciledHourlyRecord[]): ReconciliationSummary {
  let primary = 0;
  for (const r of records) if (r.source === "PRIMARY") primary++;
  return { total: records.length, primary, secondary: records.length - primary };
}
