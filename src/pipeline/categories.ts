import {
  compareStrings,
  yearOf,
  type CategorySummaryRecord,
  type DailyAqiRecord,
} from "./observation";

export interface AqiCategory {
  name: string;
  low: number;
  high: number;
}

/** Standard AQI categories, inclusive integer bands in ascending order. */
export const AQI_CATEGORIES: readonly AqiCategory[] = Object.freeze([
  { name: "Good", low: 0, high: 50 },
  { name: "Moderate", low: 51, high: 100 },
  { name: "Unhealthy for Sensitive Groups", low: 101, high: 150 },
  { name: "Unhealthy", low: 151, high: 200 },
  { name: "Very Unhealthy", low: 201, high: 300 },
  { name: "Hazardous", low: 301, high: 500 },
]);

export const UNKNOWN_CATEGORY = "Unknown";

/** Category for an index value. Out-of-range values, including the `null` sentinel, are "Unknown". */
export function classifyAqi(aqi: number | null): string {
  if (aqi === null) return UNKNOWN_CATEGORY;
  for (const category of AQI_CATEGORIES) {
    if (category.low <= aqi && aqi <= category.high) return category.name;
  }
  return UNKNOWN_CATEGORY;
}

function categoryRank(name: string): number {
  const i = AQI_CATEGORIES.findIndex((c) => c.name === name);
  return i === -1 ? AQI_CATEGORIES.length : i;
}

function compareSummary(a: CategorySummaryRecord, b: CategorySummaryRecord): number {
  return (
    compareStrings(a.pollutantCode, b.pollutantCode) ||
    a.year - b.year ||
    compareStrings(a.stateCode, b.stateCode) ||
    compareStrings(a.countyCode, b.countyCode) ||
    compareStrings(a.siteNumber, b.siteNumber) ||
    categoryRank(a.category) - categoryRank(b.category)
  );
}

/**
 * Count days per (pollutant, category, site, year). The result depends only
 * on the set of input records, never on their order.
 */
export function aggregateCategories(records: readonly DailyAqiRecord[]): CategorySummaryRecord[] {
  const counts = new Map<string, CategorySummaryRecord>();

  for (const record of records) {
    const category = classifyAqi(record.aqi);
    const year = yearOf(record.date);
    const { stateCode, countyCode, siteNumber } = record.location;
    const key = [record.pollutantCode, category, stateCode, countyCode, siteNumber, year].join("|");

    const existing = counts.get(key);
    if (existing) {
      existing.days += 1;
    } else {
      counts.set(key, {
        pollutantCode: record.pollutantCode,
        category,
        stateCode,
        countyCode,
        siteNumber,
        year,
        days: 1,
      });
    }
  }

  return Array.from(counts.values()).sort(compareSummary);
}
