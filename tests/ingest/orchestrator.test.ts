import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  mergeWithRetry,
  processRecord,
  runSource,
  runSources,
  type IngestDeps,
} from '../../src/ingest/orchestrator.js';
import { SqliteStorage } from '../../src/storage/sqlite.js';
import {
  AdapterFailure,
  StorageError,
  type CanonicalFarm,
  type ProvenanceWrite,
  type RawRecord,
  type RunStats,
  type SourcePriorityTable,
} from '../../src/types.js';
import type { SourceAdapter } from '../../src/adapters/types.js';
import { known } from '../../src/util/field.js';
import { normalize } from '../../src/normalize/normalizer.js';
import { scoreFarm } from '../../src/score/rules.js';
import { getSourcePriorities, loadPipelineConfig } from '../../src/config/index.js';
import { arrayAdapter, rawRecord } from '../helpers/farms.js';

const NOW = new Date('2024-06-15T00:00:00.000Z');
const JUNE_1 = '2024-06-01T00:00:00.000Z';
const JUNE_10 = '2024-06-10T00:00:00.000Z';

// Equal confidences isolate score changes to the fields themselves; with the
// confidences in configs/pipeline.yaml a merge also moves data_confidence
const priorities: SourcePriorityTable = {
  manual_research: { priority: 40, confidence: 0.5 },
  property_records: { priority: 30, confidence: 0.5 },
  dep_cafo: { priority: 20, confidence: 0.5 },
};

const ZOOK_PERMIT = rawRecord(
  'dep_cafo',
  JUNE_1,
  { name: 'ZOOK POULTRY FARM', county: 'LANCASTER', animal_equivalent_units: '650' },
  'PA001'
);

const MILLER_PERMIT = rawRecord(
  'dep_cafo',
  JUNE_1,
  { name: 'MILLER TURKEY FARM', county: 'Lebanon', animal_equivalent_units: '400', operation_type: 'Turkeys' },
  'PA002'
);

const depRecords: RawRecord[] = [ZOOK_PERMIT, MILLER_PERMIT];

const manualRecords: RawRecord[] = [
  rawRecord(
    'manual_research',
    JUNE_10,
    { name: 'Zook Poultry Farms', county: 'Lancaster', phone: '717-555-0142' },
    'manual-zook'
  ),
];

/**
 * Storage whose first compare-and-set loses to a competing writer
 */
class RacingStorage extends SqliteStorage {
  races = 1;

  async updateFarm(farm: CanonicalFarm, expectedVersion: number): Promise<boolean> {
    if (this.races > 0) {
      this.races--;
      const current = await this.getFarm(farm.farm_id);
      if (current) {
        await super.updateFarm(
          { ...current, attributes: { ...current.attributes, email: known('office@zookfarm.com') } },
          current.version
        );
      }
    }
    return super.updateFarm(farm, expectedVersion);
  }
}

/**
 * Storage on which every compare-and-set loses
 */
class ContendedStorage extends SqliteStorage {
  async updateFarm(): Promise<boolean> {
    return false;
  }
}

/**
 * Storage that cannot record the completion of run 1
 */
class FailingCompletionStorage extends SqliteStorage {
  async completeRun(runId: number, stats: RunStats, error?: string): Promise<void> {
    if (runId === 1) {
      throw new StorageError('Failed to complete run: disk full');
    }
    return super.completeRun(runId, stats, error);
  }
}

/**
 * Storage that cannot open a run for dep_cafo
 */
class FailingStartStorage extends SqliteStorage {
  async startRun(sourceId: string, metadata?: Record<string, unknown>): Promise<number> {
    if (sourceId === 'dep_cafo') {
      throw new StorageError('Failed to start run: database is locked');
    }
    return super.startRun(sourceId, metadata);
  }
}

/**
 * Storage that runs another writer's step right after the next provenance write
 */
class InterleavedStorage extends SqliteStorage {
  interleave: (() => Promise<unknown>) | undefined;

  async recordProvenance(write: ProvenanceWrite): Promise<void> {
    await super.recordProvenance(write);
    const step = this.interleave;
    this.interleave = undefined;
    if (step) {
      await step();
    }
  }
}

async function openStorage<T extends SqliteStorage>(storage: T): Promise<T> {
  await storage.runMigrations();
  return storage;
}

function depsFor(storage: SqliteStorage): IngestDeps {
  return { storage, priorities, now: () => NOW };
}

async function ingestAll(deps: IngestDeps): Promise<void> {
  await runSource(arrayAdapter('dep_cafo', depRecords), deps);
  await runSource(arrayAdapter('manual_research', manualRecords), deps);
}

describe('Orchestrator', () => {
  let storage: SqliteStorage;
  let deps: IngestDeps;

  beforeEach(async () => {
    storage = await openStorage(new SqliteStorage(':memory:'));
    deps = depsFor(storage);
  });

  afterEach(async () => {
    await storage.close();
  });

  describe('runSource', () => {
    it('should create farms and report run statistics', async () => {
      const result = await runSource(arrayAdapter('dep_cafo', depRecords), deps);

      expect(result.status).toBe('success');
      expect(result.stats).toEqual({ found: 2, new: 2, updated: 0, unchanged: 0, failed: 0 });
      expect(result.error).toBeUndefined();

      const runs = await storage.getRecentRuns(1);
      expect(runs[0]?.run_id).toBe(result.run_id);
      expect(runs[0]?.status).toBe('success');
      expect(runs[0]?.stats).toEqual(result.stats);
    });

    it('should resolve records from different sources to one farm', async () => {
      await ingestAll(deps);

      const farms = await storage.listFarms();
      expect(farms).toHaveLength(2);

      const zook = farms[0];
      expect(zook?.attributes.name).toEqual(known('Zook Poultry Farms'));
      expect(zook?.attributes.phone).toEqual(known('7175550142'));
      expect(zook?.attributes.animal_equivalent_units).toEqual(known(650));
      expect(zook?.field_sources.name?.source_id).toBe('manual_research');
      expect(zook?.field_sources.animal_equivalent_units?.source_id).toBe('dep_cafo');
    });

    it('should link every contributing source once', async () => {
      await ingestAll(deps);
      await ingestAll(deps);

      const links = await storage.getProvenance(1);
      expect(links.map(link => [link.source_id, link.external_id])).toEqual([
        ['dep_cafo', 'PA001'],
        ['manual_research', 'manual-zook'],
      ]);
    });

    it('should be idempotent when the same batch is ingested twice', async () => {
      await ingestAll(deps);
      const before = await storage.listFarms();

      const rerun = await runSource(arrayAdapter('dep_cafo', depRecords), deps);
      const manualRerun = await runSource(arrayAdapter('manual_research', manualRecords), deps);

      expect(rerun.stats).toEqual({ found: 2, new: 0, updated: 0, unchanged: 2, failed: 0 });
      expect(manualRerun.stats).toEqual({ found: 1, new: 0, updated: 0, unchanged: 1, failed: 0 });
      expect(await storage.listFarms()).toEqual(before);
    });

    it('should produce the same farms for the same input', async () => {
      const other = await openStorage(new SqliteStorage(':memory:'));
      try {
        await ingestAll(deps);
        await ingestAll(depsFor(other));

        const summarize = (farms: CanonicalFarm[]) =>
          farms.map(farm => ({
            farm_id: farm.farm_id,
            attributes: farm.attributes,
            field_sources: farm.field_sources,
            data_confidence: farm.data_confidence,
            lead_score: farm.lead_score,
          }));

        expect(summarize(await other.listFarms())).toEqual(summarize(await storage.listFarms()));
      } finally {
        await other.close();
      }
    });

    it('should raise the score by 15 when a phone is added', async () => {
      await runSource(arrayAdapter('dep_cafo', [ZOOK_PERMIT]), deps);
      // 20 (size) + 10 (verified) + 5 (confidence)
      expect((await storage.getFarm(1))?.lead_score).toBe(35);

      const result = await runSource(
        arrayAdapter('manual_research', [
          rawRecord('manual_research', JUNE_10, { name: 'Zook Poultry Farm', county: 'Lancaster', phone: '7175550142' }),
        ]),
        deps
      );

      expect(result.stats.updated).toBe(1);
      expect((await storage.getFarm(1))?.lead_score).toBe(50);
    });

    it('should also raise data confidence under the configured source table', async () => {
      const configured: IngestDeps = {
        storage,
        priorities: getSourcePriorities(loadPipelineConfig('configs/pipeline.yaml')),
        now: () => NOW,
      };
      await runSource(arrayAdapter('dep_cafo', [ZOOK_PERMIT]), configured);
      expect((await storage.getFarm(1))?.lead_score).toBe(35);

      await runSource(
        arrayAdapter('manual_research', [
          rawRecord('manual_research', JUNE_10, { name: 'Zook Poultry Farm', county: 'Lancaster', phone: '7175550142' }),
        ]),
        configured
      );

      // manual_research (40, 0.8) outweighs dep_cafo (20, 0.6): confidence 0.67 adds 2 points
      const farm = await storage.getFarm(1);
      expect(farm?.data_confidence).toBeCloseTo(0.6674, 4);
      expect(farm?.lead_score).toBe(52);
    });

    it('should store observation times as UTC ISO timestamps', async () => {
      const result = await runSource(
        arrayAdapter('dep_cafo', [
          rawRecord('dep_cafo', '06/01/2024', { name: 'Valley View Farm', county: 'York' }, 'P1'),
          rawRecord('dep_cafo', '2024-05-01T00:00:00.000Z', { name: 'Valley View Farm', county: 'York' }, 'P1'),
        ]),
        deps
      );

      expect(result.stats).toEqual({ found: 2, new: 1, updated: 0, unchanged: 1, failed: 0 });
      const [link] = await storage.getProvenance(1);
      expect(link?.first_seen).toBe('2024-05-01T00:00:00.000Z');
      expect(link?.last_seen).toBe('2024-06-01T00:00:00.000Z');
      expect((await storage.getFarm(1))?.last_verified).toBe('2024-06-01T00:00:00.000Z');
    });

    it('should follow the source key when a farm is renamed', async () => {
      await runSource(arrayAdapter('dep_cafo', [ZOOK_PERMIT]), deps);

      const result = await runSource(
        arrayAdapter('dep_cafo', [
          rawRecord('dep_cafo', JUNE_10, { name: 'ZOOK FAMILY POULTRY', county: 'LANCASTER' }, 'PA001'),
        ]),
        deps
      );

      expect(result.stats).toEqual({ found: 1, new: 0, updated: 1, unchanged: 0, failed: 0 });
      const farms = await storage.listFarms();
      expect(farms).toHaveLength(1);
      expect(farms[0]?.attributes.name).toEqual(known('Zook Family Poultry'));
    });

    it('should count records that cannot be normalized as failed', async () => {
      const result = await runSource(
        arrayAdapter('dep_cafo', [
          rawRecord('dep_cafo', JUNE_1, { county: 'Lancaster' }, 'PA010'),
          rawRecord('dep_cafo', 'not-a-date', { name: 'Valley View Farm', county: 'York' }, 'PA011'),
          ZOOK_PERMIT,
        ]),
        deps
      );

      expect(result.status).toBe('success');
      expect(result.stats).toEqual({ found: 3, new: 1, updated: 0, unchanged: 0, failed: 2 });
    });

    it('should mark the run failed when the adapter fails mid-stream', async () => {
      const adapter: SourceAdapter = {
        sourceId: 'dep_cafo',
        describe: () => ({ adapter: 'flaky' }),
        async *fetch() {
          yield ZOOK_PERMIT;
          throw new AdapterFailure('DEP endpoint returned 503', 'dep_cafo');
        },
      };

      const result = await runSource(adapter, deps);

      expect(result.status).toBe('failed');
      expect(result.error).toBe('DEP endpoint returned 503');
      expect(result.stats).toEqual({ found: 1, new: 1, updated: 0, unchanged: 0, failed: 0 });

      const runs = await storage.getRecentRuns(1);
      expect(runs[0]?.status).toBe('failed');
      expect(runs[0]?.error_message).toBe('DEP endpoint returned 503');
    });

    it('should fail the run for a source missing from the priority table', async () => {
      const result = await runSource(arrayAdapter('mystery', depRecords), deps);

      expect(result.status).toBe('failed');
      expect(result.error).toBe("Source 'mystery' has no entry in the source priority table");
      expect(result.stats.found).toBe(0);
      expect(await storage.listFarms()).toEqual([]);
    });
  });

  describe('concurrent writes', () => {
    it('should retry once after losing a compare-and-set', async () => {
      const racing = await openStorage(new RacingStorage(':memory:'));
      try {
        const racingDeps = depsFor(racing);
        await runSource(arrayAdapter('dep_cafo', [ZOOK_PERMIT]), racingDeps);
        const result = await runSource(arrayAdapter('manual_research', manualRecords), racingDeps);

        expect(result.stats.updated).toBe(1);
        const farm = await racing.getFarm(1);
        expect(farm?.attributes.phone).toEqual(known('7175550142'));
        expect(farm?.attributes.email).toEqual(known('office@zookfarm.com'));
        expect(farm?.version).toBe(3);
      } finally {
        await racing.close();
      }
    });

    it('should count the record as failed after a second lost race', async () => {
      const contended = await openStorage(new ContendedStorage(':memory:'));
      try {
        const contendedDeps = depsFor(contended);
        await runSource(arrayAdapter('dep_cafo', [ZOOK_PERMIT]), contendedDeps);
        const result = await runSource(arrayAdapter('manual_research', manualRecords), contendedDeps);

        expect(result.status).toBe('success');
        expect(result.stats).toEqual({ found: 1, new: 0, updated: 0, unchanged: 0, failed: 1 });
        expect((await contended.getFarm(1))?.attributes.phone.kind).toBe('unknown');
      } finally {
        await contended.close();
      }
    });
  });

  describe('run bookkeeping failures', () => {
    it('should report a run whose completion cannot be recorded as failed', async () => {
      const failing = await openStorage(new FailingCompletionStorage(':memory:'));
      try {
        const results = await runSources(
          [arrayAdapter('dep_cafo', depRecords), arrayAdapter('property_records', [])],
          depsFor(failing),
          { concurrency: 1 }
        );

        expect(results.map(result => [result.source_id, result.status, result.error])).toEqual([
          ['dep_cafo', 'failed', 'Failed to complete run: disk full'],
          ['property_records', 'success', undefined],
        ]);
        expect(results[0]?.stats.new).toBe(2);
      } finally {
        await failing.close();
      }
    });

    it('should report a run that cannot be opened as failed', async () => {
      const failing = await openStorage(new FailingStartStorage(':memory:'));
      try {
        const results = await runSources(
          [arrayAdapter('dep_cafo', depRecords), arrayAdapter('manual_research', manualRecords)],
          depsFor(failing),
          { concurrency: 1 }
        );

        expect(results.map(result => [result.source_id, result.status, result.run_id])).toEqual([
          ['dep_cafo', 'failed', null],
          ['manual_research', 'success', 1],
        ]);
        expect(results[0]?.error).toBe('Failed to start run: database is locked');
        expect(results[0]?.stats.found).toBe(0);
      } finally {
        await failing.close();
      }
    });
  });

  describe('scoring after concurrent merges', () => {
    it('should score the farm as stored when another writer merged it first', async () => {
      const interleaved = await openStorage(new InterleavedStorage(':memory:'));
      try {
        const interleavedDeps = depsFor(interleaved);
        await runSource(arrayAdapter('dep_cafo', [ZOOK_PERMIT]), interleavedDeps);

        interleaved.interleave = () =>
          mergeWithRetry(
            interleaved,
            1,
            normalize({ name: 'Zook Poultry Farm', county: 'Lancaster', phone: '7175550142', email: 'office@zookfarm.com' }),
            { sourceId: 'manual_research', observedAt: JUNE_10, priorities }
          );
        await runSource(
          arrayAdapter('dep_cafo', [
            rawRecord('dep_cafo', JUNE_10, { name: 'ZOOK POULTRY FARM', county: 'LANCASTER', animal_equivalent_units: '1200' }, 'PA001'),
          ]),
          interleavedDeps
        );

        const farm = await interleaved.getFarm(1);
        expect(farm?.version).toBe(3);
        expect(farm?.attributes.email).toEqual(known('office@zookfarm.com'));
        // 30 (size) + 15 (phone) + 15 (email) + 10 (verified) + 5 (confidence)
        expect(farm?.lead_score).toBe(75);
        expect(farm && scoreFarm(farm, NOW)).toBe(75);
      } finally {
        await interleaved.close();
      }
    });
  });

  describe('processRecord', () => {
    it('should report the outcome and score of one record', async () => {
      const runId = await storage.startRun('dep_cafo');
      const first = await processRecord(MILLER_PERMIT, runId, deps);

      // 10 (size) + 10 (verified) + 5 (confidence)
      expect(first).toEqual({ farmId: 1, outcome: 'new', score: 25 });

      const again = await processRecord(MILLER_PERMIT, runId, deps);
      expect(again).toEqual({ farmId: 1, outcome: 'unchanged', score: 25 });
    });
  });

  describe('runSources', () => {
    it('should run every adapter and return results in order', async () => {
      const results = await runSources(
        [arrayAdapter('dep_cafo', depRecords), arrayAdapter('property_records', [])],
        deps,
        { concurrency: 2 }
      );

      expect(results.map(result => [result.source_id, result.status, result.stats.found])).toEqual([
        ['dep_cafo', 'success', 2],
        ['property_records', 'success', 0],
      ]);
    });
  });
});
