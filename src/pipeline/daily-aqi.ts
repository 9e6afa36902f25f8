import { NoDataError } from "../core/errors";
import {
  concentrationToAqi,
  selectTable,
  type BreakpointRegistry,
  type TableMode,
  type TableVersion,
} from "./breakpoints";
import {
  compareStrings,
  locationId,
  type DailyAqiRecord,
  type DataSource,
  type LocationKey,
  type ReconciledHourlyRecord,
} from "./observation";

export interface DeriveOptions {
  pollutantCode: string;
  year: number;
  registry: BreakpointRegistry;
  mode: TableMode;
  /** Time of computation; decides which table "auto" picks. */
  now?: Date;
}

export interface DeriveResult {
  version: TableVersion;
  records: DailyAqiRecord[];
}

interface DayGroup {
  location: LocationKey;
  date: string;
  source: DataSource;
  sum: number;
  count: number;
}

/** Ordering shared by daily records and their group keys. */
export function compareDaily(
  a: { location: LocationKey; date: string; dataSource: DataSource },
  b: { location: LocationKey; date: string; dataSource: DataSource },
): number {
  return (
    compareStrings(a.location.stateCode, b.location.stateCode) ||
    compareStrings(a.location.countyCode, b.location.countyCode) ||
    compareStrings(a.location.siteNumber, b.location.siteNumber) ||
    compareStrings(a.date, b.date) ||
    compareStrings(a.dataSource, b.dataSource)
  );
}

/**
 * Average one pollutant-year of reconciled hourly rows into daily AQI records.
 *
 * Rows are grouped by (site, date, source): a day fed by both sources yields
 * two partial-day records. No hours are imputed.
 */
export function deriveDailyAqi(
  records: readonly ReconciledHourlyRecord[],
  options: DeriveOptions,
): DeriveResult {
  if (records.length === 0) {
    throw new NoDataError(options.pollutantCode, options.year);
  }

  const selected = selectTable(options.registry, options.pollutantCode, options.mode, options.now);

  const groups = new Map<string, DayGroup>();
  for (const record of records) {
    const key = `${locationId(record.location)}|${record.date}|${record.source}`;
    const group = groups.get(key);
    if (group) {
      group.sum += record.value;
      group.count += 1;
    } else {
      groups.set(key, {
        location: { ...record.location },
        date: record.date,
        source: record.source,
        sum: record.value,
        count: 1,
      });
    }
  }

  const daily: DailyAqiRecord[] = [];
  for (const group of groups.values()) {
    const concAvg = group.sum / group.count;
    daily.push({
      location: group.location,
      pollutantCode: options.pollutantCode,
      date: group.date,
      concAvg,
      aqi: concentrationToAqi(selected, concAvg),
      dataSource: group.source,
      hours: group.count,
    });
  }
  daily.sort(compareDaily);

  return { version: selected.version, records: daily };
}
