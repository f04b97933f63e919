/**
 * Ingestion orchestrator: runs one source through normalize, match, merge and score
 */

import pLimit from 'p-limit';
import {
  ConcurrentWriteConflict,
  ConfigError,
  RecordNormalizationFailure,
  StorageError,
  type CanonicalFarm,
  type NormalizedAttributes,
  type RawRecord,
  type RunResult,
  type RunStats,
  type SourcePriorityTable,
  type Storage,
} from '../types.js';
import type { SourceAdapter, Clock } from '../adapters/types.js';
import { normalize, type NormalizeOptions } from '../normalize/normalizer.js';
import { match, type MatchOptions } from '../match/matcher.js';
import { createFarm, mergeFarm, policyFor, type MergeContext } from '../merge/engine.js';
import { scoreFarm } from '../score/rules.js';
import { getSourcePriorities, type PipelineConfig } from '../config/index.js';
import { parseDate } from '../util/dates.js';
import { logger, errorMessage } from '../util/logger.js';

// One write plus one retry after a lost compare-and-set
export const MAX_WRITE_ATTEMPTS = 2;

export interface IngestDeps {
  storage: Storage;
  priorities: SourcePriorityTable;
  normalizeOptions?: NormalizeOptions;
  matchOptions?: MatchOptions;
  /** Clock used for scoring recency */
  now?: Clock;
}

export type RecordOutcome = 'new' | 'updated' | 'unchanged';

export interface ProcessedRecord {
  farmId: number;
  outcome: RecordOutcome;
  score: number;
}

/**
 * Dependencies for a run, taken from the pipeline configuration
 */
export function ingestDepsFromConfig(config: PipelineConfig, storage: Storage): IngestDeps {
  return {
    storage,
    priorities: getSourcePriorities(config),
    normalizeOptions: {
      defaultState: config.jurisdiction.state,
      stateName: config.jurisdiction.state_name,
    },
    matchOptions: { threshold: config.matching.fuzzy_threshold },
  };
}

function emptyStats(): RunStats {
  return { found: 0, new: 0, updated: 0, unchanged: 0, failed: 0 };
}

/**
 * Run one source to completion. Adapter and run bookkeeping failures are
 * recorded on the run where possible and reported in the result; this
 * function does not throw for them.
 */
export async function runSource(adapter: SourceAdapter, deps: IngestDeps): Promise<RunResult> {
  const { storage } = deps;
  const sourceId = adapter.sourceId;
  const startedAt = new Date().toISOString();
  const stats = emptyStats();
  let runId: number | null = null;
  let failure: string | undefined;

  try {
    const description = adapter.describe();
    runId = await storage.startRun(sourceId, description);
    logger.info('Source run started', { sourceId, runId, ...description });
    await ingestRecords(adapter, runId, deps, stats);
  } catch (error) {
    failure = errorMessage(error);
    logger.error('Source run failed', { sourceId, runId, error });
  }

  if (runId !== null) {
    try {
      await storage.completeRun(runId, stats, failure);
    } catch (error) {
      failure ??= errorMessage(error);
      logger.error('Failed to record run completion', { sourceId, runId, error });
    }
  }
  const completedAt = new Date().toISOString();

  logger.info('Source run completed', { sourceId, runId, status: failure ? 'failed' : 'success', ...stats });

  return {
    run_id: runId,
    source_id: sourceId,
    status: failure === undefined ? 'success' : 'failed',
    stats,
    error: failure,
    started_at: startedAt,
    completed_at: completedAt,
  };
}

async function ingestRecords(
  adapter: SourceAdapter,
  runId: number,
  deps: IngestDeps,
  stats: RunStats
): Promise<void> {
  const sourceId = adapter.sourceId;
  policyFor(deps.priorities, sourceId);

  for await (const record of adapter.fetch()) {
    stats.found++;
    try {
      const processed = await processRecord(record, runId, deps);
      stats[processed.outcome]++;
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      stats.failed++;
      logger.warn('Record failed', {
        sourceId,
        externalId: record.source_external_id,
        error,
      });
    }
  }
}

/**
 * Run several sources concurrently; records within a source stay sequential
 */
export async function runSources(
  adapters: readonly SourceAdapter[],
  deps: IngestDeps,
  options: { concurrency?: number } = {}
): Promise<RunResult[]> {
  const limit = pLimit(Math.max(1, options.concurrency ?? 2));
  return Promise.all(adapters.map(adapter => limit(() => runSource(adapter, deps))));
}

/**
 * Normalize, resolve, persist, link and score a single record
 */
export async function processRecord(
  raw: RawRecord,
  runId: number,
  deps: IngestDeps
): Promise<ProcessedRecord> {
  const { storage } = deps;

  const observed = parseDate(raw.observed_at);
  if (!observed) {
    throw new RecordNormalizationFailure(
      `Invalid observed_at '${raw.observed_at}'`,
      raw.source_id,
      raw.source_external_id
    );
  }
  // Stored timestamps are compared as text, so every one is written as UTC ISO
  const record: RawRecord = { ...raw, observed_at: observed.toISOString() };

  const attributes = normalize(record.field_map, deps.normalizeOptions);
  if (attributes.name.kind === 'unknown') {
    throw new RecordNormalizationFailure('Record has no usable name', record.source_id, record.source_external_id);
  }

  const linked = record.source_external_id
    ? await storage.findFarmBySourceKey(record.source_id, record.source_external_id)
    : undefined;
  const farms = attributes.county.kind === 'known' && !linked
    ? await storage.getFarmsByCounty(attributes.county.value)
    : [];

  const result = match(attributes, { linked, farms }, deps.matchOptions);
  const context: MergeContext = {
    sourceId: record.source_id,
    observedAt: record.observed_at,
    priorities: deps.priorities,
  };

  let farm: CanonicalFarm;
  let outcome: RecordOutcome;

  if (result.kind === 'none') {
    const farmId = await storage.insertFarm(createFarm(attributes, context));
    farm = await requireFarm(storage, farmId);
    outcome = 'new';
  } else {
    const merged = await mergeWithRetry(storage, result.farmId, attributes, context);
    farm = merged.farm;
    outcome = merged.changed ? 'updated' : 'unchanged';
    logger.debug('Record matched', {
      sourceId: record.source_id,
      farmId: result.farmId,
      rule: result.rule,
      similarity: result.similarity,
      changed: merged.changed,
    });
  }

  await storage.recordProvenance({ farm_id: farm.farm_id, run_id: runId, record });

  const score = await scoreLatest(storage, farm, (deps.now ?? (() => new Date()))());

  return { farmId: farm.farm_id, outcome, score };
}

/**
 * Score the farm and write the score against the version it was computed
 * from; after a concurrent merge, re-read and score again
 */
async function scoreLatest(storage: Storage, farm: CanonicalFarm, now: Date): Promise<number> {
  let current = farm;
  for (let attempt = 1; ; attempt++) {
    const score = scoreFarm(current, now);
    if ((await storage.setScore(current.farm_id, score, current.version)) || attempt >= MAX_WRITE_ATTEMPTS) {
      return score;
    }
    logger.debug('Farm changed before scoring', { farmId: current.farm_id, attempt });
    current = await requireFarm(storage, current.farm_id);
  }
}

/**
 * Re-read, merge and compare-and-set; retry once after a lost race
 */
export async function mergeWithRetry(
  storage: Storage,
  farmId: number,
  attributes: NormalizedAttributes,
  context: MergeContext
): Promise<{ farm: CanonicalFarm; changed: boolean }> {
  for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
    const existing = await requireFarm(storage, farmId);
    const outcome = mergeFarm(existing, attributes, context);

    if (!outcome.changed) {
      return { farm: existing, changed: false };
    }

    if (await storage.updateFarm(outcome.farm, existing.version)) {
      return { farm: { ...outcome.farm, version: existing.version + 1 }, changed: true };
    }

    logger.warn('Concurrent write detected', { farmId, attempt, sourceId: context.sourceId });
  }

  throw new ConcurrentWriteConflict(farmId, MAX_WRITE_ATTEMPTS);
}

async function requireFarm(storage: Storage, farmId: number): Promise<CanonicalFarm> {
  const farm = await storage.getFarm(farmId);
  if (!farm) {
    throw new StorageError(`Farm ${farmId} not found`);
  }
  return farm;
}
