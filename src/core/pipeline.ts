import type { TableMode } from "../pipeline/breakpoints";
import { runPipeline, type PipelineReport } from "../pipeline/runner";
import { createStageWriter } from "../publish/stage-writer";
import type { Env } from "./env";
import { createPipelineStore } from "./storage";

export interface PipelineRunOptions {
  year: number;
  /** Defaults to the configured pollutants. */
  pollutants?: string[];
  /** Defaults to the configured table mode. */
  mode?: TableMode;
  /** Skip writing fact files. */
  publish?: boolean;
  now?: Date;
}

/** Run the pipeline against the stored observations, writing results back to the database and stage directory. */
export function runStoredPipeline(env: Env, options: PipelineRunOptions): Promise<PipelineReport> {
  const { settings } = env;
  const pollutants = options.pollutants && options.pollutants.length > 0 ? options.pollutants : settings.pollutants;

  return runPipeline(
    {
      store: createPipelineStore(env.DB),
      registry: env.breakpoints,
      publisher: options.publish === false ? undefined : createStageWriter(env.DB, settings.stageDir),
    },
    {
      pollutants,
      year: options.year,
      mode: options.mode ?? settings.tableMode,
      now: options.now,
    },
  );
}
