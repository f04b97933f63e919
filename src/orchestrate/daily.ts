#!/usr/bin/env node

/**
 * Daily pipeline orchestration runner: every enabled source and the county
 * census, then a full rescore
 */

import { config } from 'dotenv';
import { parseArgs } from 'util';
import { logger } from '../util/logger.js';
import { loadPipelineConfig, getDataSourceSeeds, type PipelineConfig } from '../config/index.js';
import { createStorage } from '../storage/index.js';
import { createAdapter, type SourceAdapter } from '../adapters/index.js';
import { ingestDepsFromConfig, runSources } from '../ingest/orchestrator.js';
import { rescoreAll } from '../score/rescore.js';
import { hasApiKey, type NassCensusClient } from '../census/nass.js';
import { CENSUS_SOURCE_ID, runCensus } from '../census/collect.js';
import type { RunResult, Storage } from '../types.js';
import { CLI_CONFIGS, exitOnHelp, installProcessHandlers, parsePositiveInt } from '../util/cli.js';

// Load environment variables
config();

/**
 * Adapters for every enabled source that has one configured
 */
export function scheduledAdapters(pipelineConfig: PipelineConfig): SourceAdapter[] {
  return Object.entries(pipelineConfig.sources)
    .filter(([, source]) => source.enabled && source.adapter !== undefined)
    .map(([sourceId, source]) => createAdapter(sourceId, source));
}

export interface DailyOptions {
  adapters?: SourceAdapter[];
  concurrency?: number;
  /** Census client override; by default one is built from the census config */
  censusClient?: NassCensusClient;
}

/**
 * Census collection runs when configured, its source is enabled and a key is set
 */
export function censusScheduled(pipelineConfig: PipelineConfig): boolean {
  const census = pipelineConfig.census;
  if (!census || pipelineConfig.sources[CENSUS_SOURCE_ID]?.enabled === false) {
    return false;
  }
  if (!hasApiKey(census)) {
    logger.warn('Skipping census collection: NASS_API_KEY is not set');
    return false;
  }
  return true;
}

/**
 * Run all scheduled sources concurrently, collect census statistics and
 * rescore afterwards
 */
export async function runDaily(
  pipelineConfig: PipelineConfig,
  storage: Storage,
  options: DailyOptions = {}
): Promise<RunResult[]> {
  const adapters = options.adapters ?? scheduledAdapters(pipelineConfig);
  const concurrency = options.concurrency ?? pipelineConfig.daily.concurrency;
  const startTime = Date.now();
  logger.info('Starting daily pipeline', { sources: adapters.map(a => a.sourceId), concurrency });

  await storage.syncDataSources(getDataSourceSeeds(pipelineConfig));
  const results = await runSources(adapters, ingestDepsFromConfig(pipelineConfig, storage), { concurrency });

  if (pipelineConfig.census && censusScheduled(pipelineConfig)) {
    const census = await runCensus(storage, pipelineConfig.census, { client: options.censusClient });
    results.push(census.result);
  }

  // Recency points decay even for farms no source touched today
  await rescoreAll(storage);

  const failed = results.filter(r => r.status === 'failed');
  logger.info('Daily pipeline completed', {
    durationMs: Date.now() - startTime,
    successful: results.length - failed.length,
    failed: failed.length,
    failedSources: failed.map(r => ({ source: r.source_id, error: r.error })),
  });

  return results;
}

async function main() {
  const { values } = parseArgs({ args: process.argv.slice(2), options: CLI_CONFIGS.daily.options });
  exitOnHelp(values.help, CLI_CONFIGS.daily);

  const storage = await createStorage();
  try {
    const pipelineConfig = loadPipelineConfig();
    const concurrency = parsePositiveInt(values.concurrency, 'concurrency', pipelineConfig.daily.concurrency);
    const results = await runDaily(pipelineConfig, storage, { concurrency });
    process.exitCode = results.some(r => r.status === 'failed') ? 1 : 0;
  } catch (error) {
    logger.error('Daily pipeline orchestration failed', { error });
    process.exitCode = 1;
  } finally {
    await storage.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  installProcessHandlers();
  void main();
}
