/**
 * County census collection as a recorded pipeline run
 */

import type { CensusConfig } from '../config/index.js';
import { SourceHttpClient } from '../http/client.js';
import type { CountyPoultryStats, RunResult, RunStats, Storage } from '../types.js';
import { logger, errorMessage } from '../util/logger.js';
import { NassCensusClient } from './nass.js';

export const CENSUS_SOURCE_ID = 'nass_census';

export interface CensusRun {
  result: RunResult;
  counties: CountyPoultryStats[];
}

export interface CensusRunOptions {
  year?: number;
  client?: NassCensusClient;
}

/**
 * Collect, persist and record one census year. Failures are recorded on the
 * run and reported in the result.
 */
export async function runCensus(
  storage: Storage,
  census: CensusConfig,
  options: CensusRunOptions = {}
): Promise<CensusRun> {
  const year = options.year ?? census.year;
  const client = options.client ?? new NassCensusClient(new SourceHttpClient(), census);
  const startedAt = new Date().toISOString();
  const stats: RunStats = { found: 0, new: 0, updated: 0, unchanged: 0, failed: 0 };
  let counties: CountyPoultryStats[] = [];
  let runId: number | null = null;
  let failure: string | undefined;

  try {
    runId = await storage.startRun(CENSUS_SOURCE_ID, { year });
    const collected = await client.collect(year);
    await storage.upsertCountyStats(year, collected);
    counties = collected;
    stats.found = collected.length;
    stats.updated = collected.length;
  } catch (error) {
    failure = errorMessage(error);
    logger.error('Census collection failed', { year, runId, error });
  }

  if (runId !== null) {
    try {
      await storage.completeRun(runId, stats, failure);
    } catch (error) {
      failure ??= errorMessage(error);
      logger.error('Failed to record run completion', { sourceId: CENSUS_SOURCE_ID, runId, error });
    }
  }

  logger.info('Census run completed', { year, runId, counties: counties.length, status: failure ? 'failed' : 'success' });

  return {
    result: {
      run_id: runId,
      source_id: CENSUS_SOURCE_ID,
      status: failure === undefined ? 'success' : 'failed',
      stats,
      error: failure,
      started_at: startedAt,
      completed_at: new Date().toISOString(),
    },
    counties,
  };
}
