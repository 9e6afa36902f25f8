import { AirQualityError, NoDataError } from "../core/errors";
import type { BreakpointRegistry, TableMode, TableVersion } from "./breakpoints";
import { aggregateCategories } from "./categories";
import { deriveDailyAqi, type DeriveResult } from "./daily-aqi";
import type {
  CategorySummaryRecord,
  DailyAqiRecord,
  DataSource,
  ObservationRecord,
  ReconciledHourlyRecord,
  Scope,
} from "./observation";
import { reconcile, summarizeReconciliation, type ReconciliationSummary } from "./reconcile";

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/** Where the runner reads raw observations from and writes each derived layer to. */
export interface PipelineStore {
  loadObservations(scope: Scope, source: DataSource): Promise<ObservationRecord[]>;
  replaceHourly(scope: Scope, records: readonly ReconciledHourlyRecord[]): Promise<void>;
  replaceDaily(
    scope: Scope,
    mode: TableMode,
    version: TableVersion,
    records: readonly DailyAqiRecord[],
  ): Promise<void>;
  /** Drop a scope's daily rows for one mode. */
  clearDaily(scope: Scope, mode: TableMode): Promise<void>;
  loadDaily(year: number, mode: TableMode): Promise<DailyAqiRecord[]>;
  replaceCategories(year: number, mode: TableMode, records: readonly CategorySummaryRecord[]): Promise<void>;
}

export interface PublishedArtifact {
  id: string;
  table: string;
  path: string;
  rows: number;
}

/** Writes fact tables for downstream reporting. */
export interface FactPublisher {
  publishHourly(scope: Scope, records: readonly ReconciledHourlyRecord[]): Promise<PublishedArtifact>;
  publishDaily(scope: Scope, mode: TableMode, records: readonly DailyAqiRecord[]): Promise<PublishedArtifact>;
  publishCategories(year: number, mode: TableMode, records: readonly CategorySummaryRecord[]): Promise<PublishedArtifact>;
}

export interface PipelineDeps {
  store: PipelineStore;
  registry: BreakpointRegistry;
  publisher?: FactPublisher;
  log?: (...args: unknown[]) => void;
}

export interface PipelineRequest {
  pollutants: string[];
  year: number;
  mode: TableMode;
  /** Time of computation. Defaults to the current time. */
  now?: Date;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type PipelineStage = "reconcile" | "derive" | "aggregate" | "publish";

export interface FailedStep {
  status: "failed";
  stage: PipelineStage;
  code: string;
  message: string;
}

export type ScopeResult =
  | {
      scope: Scope;
      status: "succeeded";
      tableVersion: TableVersion;
      hourly: ReconciliationSummary;
      dailyRecords: number;
    }
  | ({ scope: Scope } & FailedStep);

export type CategoryResult = { status: "succeeded"; records: number } | FailedStep;

export interface PipelineReport {
  year: number;
  mode: TableMode;
  startedAt: string;
  finishedAt: string;
  scopes: ScopeResult[];
  categories: CategoryResult;
  artifacts: PublishedArtifact[];
}

function toFailure(stage: PipelineStage, err: unknown): FailedStep {
  if (err instanceof AirQualityError) {
    return { status: "failed", stage, code: err.code, message: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { status: "failed", stage, code: "INTERNAL_ERROR", message };
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

async function runScope(
  deps: PipelineDeps,
  scope: Scope,
  mode: TableMode,
  now: Date,
  artifacts: PublishedArtifact[],
): Promise<ScopeResult> {
  const log = deps.log ?? console.log;
  let stage: PipelineStage = "reconcile";

  try {
    const [primary, secondary] = await Promise.all([
      deps.store.loadObservations(scope, "PRIMARY"),
      deps.store.loadObservations(scope, "SECONDARY"),
    ]);
    const hourly = reconcile(primary, secondary);
    const summary = summarizeReconciliation(hourly);
    await deps.store.replaceHourly(scope, hourly);
    log(
      `[pipeline] ${scope.pollutantCode}/${scope.year} reconciled ${summary.total} hourly rows ` +
        `(${summary.primary} primary, ${summary.secondary} secondary)`,
    );

    stage = "derive";
    let derived: DeriveResult;
    try {
      derived = deriveDailyAqi(hourly, {
        pollutantCode: scope.pollutantCode,
        year: scope.year,
        registry: deps.registry,
        mode,
        now,
      });
    } catch (err) {
      // An emptied scope must not leave the previous run's days behind.
      if (err instanceof NoDataError) await deps.store.clearDaily(scope, mode);
      throw err;
    }
    await deps.store.replaceDaily(scope, mode, derived.version, derived.records);
    log(
      `[pipeline] ${scope.pollutantCode}/${scope.year} derived ${derived.records.length} daily rows ` +
        `with the ${derived.version} table`,
    );

    if (deps.publisher) {
      stage = "publish";
      artifacts.push(await deps.publisher.publishHourly(scope, hourly));
      artifacts.push(await deps.publisher.publishDaily(scope, mode, derived.records));
    }

    return {
      scope,
      status: "succeeded",
      tableVersion: derived.version,
      hourly: summary,
      dailyRecords: derived.records.length,
    };
  } catch (err) {
    const failure = toFailure(stage, err);
    console.error(`[pipeline] ✗ ${scope.pollutantCode}/${scope.year} failed at ${stage}:`, failure.message);
    return { scope, ...failure };
  }
}

async function rebuildCategories(
  deps: PipelineDeps,
  year: number,
  mode: TableMode,
  artifacts: PublishedArtifact[],
): Promise<CategoryResult> {
  let stage: PipelineStage = "aggregate";
  try {
    const daily = await deps.store.loadDaily(year, mode);
    const summary = aggregateCategories(daily);
    await deps.store.replaceCategories(year, mode, summary);

    if (deps.publisher) {
      stage = "publish";
      artifacts.push(await deps.publisher.publishCategories(year, mode, summary));
    }
    return { status: "succeeded", records: summary.length };
  } catch (err) {
    const failure = toFailure(stage, err);
    console.error(`[pipeline] ✗ categories for ${year} failed at ${stage}:`, failure.message);
    return failure;
  }
}

/**
 * Run reconcile → derive for every pollutant of the year, then rebuild the
 * year's category summary. Scopes are independent and run concurrently;
 * each one's outcome is reported separately.
 */
export async function runPipeline(deps: PipelineDeps, request: PipelineRequest): Promise<PipelineReport> {
  const log = deps.log ?? console.log;
  const now = request.now ?? new Date();
  const startedAt = new Date().toISOString();
  const artifacts: PublishedArtifact[] = [];
  const pollutants = Array.from(new Set(request.pollutants));

  log(`[pipeline] Running ${pollutants.join(",")} for ${request.year} (mode ${request.mode})`);

  const scopes = await Promise.all(
    pollutants.map((pollutantCode) =>
      runScope(deps, { pollutantCode, year: request.year }, request.mode, now, artifacts),
    ),
  );
  const categories = await rebuildCategories(deps, request.year, request.mode, artifacts);

  const failed = scopes.filter((s) => s.status === "failed").length;
  log(`[pipeline] Finished ${request.year}: ${scopes.length - failed} scopes succeeded, ${failed} failed`);

  return {
    year: request.year,
    mode: request.mode,
    startedAt,
    finishedAt: new Date().toISOString(),
    scopes,
    categories,
    artifacts,
  };
}
