/**
 * PostgreSQL storage implementation
 */

import pg from 'pg';
import { readFileSync, readdirSync } from 'fs';
import { logger } from '../util/logger.js';
import { FARM_FIELDS } from '../util/field.js';
import { StorageError } from '../types.js';
import type {
  CanonicalFarm,
  CountyPoultryStats,
  DataRun,
  DataSourceSeed,
  NewFarm,
  PipelineStats,
  ProvenanceLink,
  ProvenanceWrite,
  RunStats,
  Storage,
} from '../types.js';
import {
  attributeParams,
  countsToRecord,
  rowToCountyStats,
  rowToFarm,
  rowToProvenance,
  rowToRun,
  type CountRow,
  type CountyStatsRow,
  type FarmRow,
  type ProvenanceRow,
  type RunRow,
} from './rows.js';

const MIGRATIONS_DIR = new URL('./migrations/postgres/', import.meta.url);

const ATTRIBUTE_COLUMNS = FARM_FIELDS.join(', ');

/**
 * "$start, $start+1, ..." for positional parameters
 */
function placeholders(start: number, count: number): string {
  return Array.from({ length: count }, (_, i) => `$${start + i}`).join(', ');
}

/**
 * PostgreSQL storage implementation
 */
export class PostgresStorage implements Storage {
  private pool: pg.Pool;

  constructor(connectionString: string) {
    this.pool = new pg.Pool({ connectionString });
  }

  // Farm operations
  async getFarm(farmId: number): Promise<CanonicalFarm | undefined> {
    const res = await this.query<FarmRow>('get farm', 'SELECT * FROM farms WHERE farm_id = $1', [farmId]);
    const row = res.rows[0];
    return row ? rowToFarm(row) : undefined;
  }

  async getFarmsByCounty(county: string): Promise<CanonicalFarm[]> {
    const res = await this.query<FarmRow>(
      'get farms by county',
      'SELECT * FROM farms WHERE county = $1 ORDER BY farm_id',
      [county]
    );
    return res.rows.map(rowToFarm);
  }

  async findFarmBySourceKey(sourceId: string, externalId: string): Promise<CanonicalFarm | undefined> {
    const res = await this.query<FarmRow>(
      'find farm by source key',
      `SELECT f.* FROM source_keys k
       JOIN farms f ON f.farm_id = k.farm_id
       WHERE k.source_id = $1 AND k.external_id = $2`,
      [sourceId, externalId]
    );
    const row = res.rows[0];
    return row ? rowToFarm(row) : undefined;
  }

  async insertFarm(farm: NewFarm): Promise<number> {
    const now = new Date().toISOString();
    const n = FARM_FIELDS.length;
    const res = await this.query<{ farm_id: number }>(
      'insert farm',
      `INSERT INTO farms (
         ${ATTRIBUTE_COLUMNS}, field_sources, data_confidence, last_verified,
         lead_score, lead_status, is_active, version, updated_seq, created_at, updated_at
       ) VALUES (
         ${placeholders(1, n)}, ${placeholders(n + 1, 6)}, 1, nextval('farm_update_seq'), $${n + 7}, $${n + 7}
       )
       RETURNING farm_id`,
      [
        ...attributeParams(farm.attributes),
        JSON.stringify(farm.field_sources),
        farm.data_confidence,
        farm.last_verified,
        farm.lead_score,
        farm.lead_status,
        farm.is_active,
        now,
      ]
    );
    const row = res.rows[0];
    if (!row) {
      throw new StorageError('Failed to insert farm: no id returned');
    }
    return row.farm_id;
  }

  async updateFarm(farm: CanonicalFarm, expectedVersion: number): Promise<boolean> {
    const n = FARM_FIELDS.length;
    const assignments = FARM_FIELDS.map((field, i) => `${field} = $${i + 1}`).join(', ');
    const res = await this.query(
      'update farm',
      `UPDATE farms SET
         ${assignments},
         field_sources = $${n + 1},
         data_confidence = $${n + 2},
         last_verified = $${n + 3},
         version = version + 1,
         updated_seq = nextval('farm_update_seq'),
         updated_at = $${n + 4}
       WHERE farm_id = $${n + 5} AND version = $${n + 6}`,
      [
        ...attributeParams(farm.attributes),
        JSON.stringify(farm.field_sources),
        farm.data_confidence,
        farm.last_verified,
        new Date().toISOString(),
        farm.farm_id,
        expectedVersion,
      ]
    );
    return res.rowCount === 1;
  }

  async setScore(farmId: number, score: number, expectedVersion?: number): Promise<boolean> {
    const res = expectedVersion === undefined
      ? await this.query('set score', 'UPDATE farms SET lead_score = $1 WHERE farm_id = $2', [score, farmId])
      : await this.query(
          'set score',
          'UPDATE farms SET lead_score = $1 WHERE farm_id = $2 AND version = $3',
          [score, farmId, expectedVersion]
        );
    return res.rowCount === 1;
  }

  async listFarms(): Promise<CanonicalFarm[]> {
    const res = await this.query<FarmRow>('list farms', 'SELECT * FROM farms ORDER BY farm_id');
    return res.rows.map(rowToFarm);
  }

  async getTopFarms(limit: number): Promise<CanonicalFarm[]> {
    const res = await this.query<FarmRow>(
      'get top farms',
      `SELECT * FROM farms
       WHERE is_active
       ORDER BY lead_score DESC, farm_id ASC
       LIMIT $1`,
      [limit]
    );
    return res.rows.map(rowToFarm);
  }

  // Provenance operations
  async recordProvenance({ farm_id, run_id, record }: ProvenanceWrite): Promise<void> {
    const externalId = record.source_external_id ?? null;
    const rawData = JSON.stringify(record.field_map);
    const now = new Date().toISOString();

    await this.transaction('record provenance', async client => {
      await client.query(
        `INSERT INTO farm_sources (farm_id, source_id, external_id, first_seen, last_seen, raw_data)
         VALUES ($1, $2, $3, $4, $4, $5)
         ON CONFLICT (farm_id, source_id) DO UPDATE SET
           external_id = COALESCE(EXCLUDED.external_id, farm_sources.external_id),
           first_seen = LEAST(farm_sources.first_seen, EXCLUDED.first_seen),
           last_seen = GREATEST(farm_sources.last_seen, EXCLUDED.last_seen),
           raw_data = CASE WHEN EXCLUDED.last_seen >= farm_sources.last_seen
             THEN EXCLUDED.raw_data ELSE farm_sources.raw_data END`,
        [farm_id, record.source_id, externalId, record.observed_at, rawData]
      );

      if (externalId !== null) {
        await client.query(
          `INSERT INTO source_keys (source_id, external_id, farm_id, created_at)
           VALUES ($1, $2, $3, $4)
           ON CONFLICT (source_id, external_id) DO NOTHING`,
          [record.source_id, externalId, farm_id, now]
        );
      }

      await client.query(
        `INSERT INTO raw_records (run_id, source_id, external_id, farm_id, observed_at, field_map, inserted_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [run_id, record.source_id, externalId, farm_id, record.observed_at, rawData, now]
      );
    });
  }

  async getProvenance(farmId: number): Promise<ProvenanceLink[]> {
    const res = await this.query<ProvenanceRow>(
      'get provenance',
      'SELECT * FROM farm_sources WHERE farm_id = $1 ORDER BY source_id',
      [farmId]
    );
    return res.rows.map(rowToProvenance);
  }

  // Run operations
  async syncDataSources(sources: DataSourceSeed[]): Promise<void> {
    const now = new Date().toISOString();
    await this.transaction('sync data sources', async client => {
      for (const source of sources) {
        await client.query(
          `INSERT INTO data_sources (source_id, name, source_type, priority, created_at)
           VALUES ($1, $2, $3, $4, $5)
           ON CONFLICT (source_id) DO UPDATE SET
             name = EXCLUDED.name,
             source_type = EXCLUDED.source_type,
             priority = EXCLUDED.priority`,
          [source.source_id, source.name, source.source_type, source.priority, now]
        );
      }
    });
  }

  async startRun(sourceId: string, metadata?: Record<string, unknown>): Promise<number> {
    const res = await this.query<{ run_id: number }>(
      'start run',
      `INSERT INTO data_runs (source_id, status, started_at, metadata)
       VALUES ($1, 'running', $2, $3)
       RETURNING run_id`,
      [sourceId, new Date().toISOString(), metadata ? JSON.stringify(metadata) : null]
    );
    const row = res.rows[0];
    if (!row) {
      throw new StorageError('Failed to start run: no id returned');
    }
    return row.run_id;
  }

  async completeRun(runId: number, stats: RunStats, error?: string): Promise<void> {
    const now = new Date().toISOString();
    await this.transaction('complete run', async client => {
      await client.query(
        `UPDATE data_runs SET
           status = $1,
           completed_at = $2,
           records_found = $3,
           records_new = $4,
           records_updated = $5,
           records_unchanged = $6,
           records_failed = $7,
           error_message = $8
         WHERE run_id = $9`,
        [
          error === undefined ? 'success' : 'failed',
          now,
          stats.found,
          stats.new,
          stats.updated,
          stats.unchanged,
          stats.failed,
          error ?? null,
          runId,
        ]
      );
      await client.query(
        `UPDATE data_sources SET last_run_at = $1
         WHERE source_id = (SELECT source_id FROM data_runs WHERE run_id = $2)`,
        [now, runId]
      );
    });
  }

  async getRecentRuns(limit: number): Promise<DataRun[]> {
    const res = await this.query<RunRow>(
      'get recent runs',
      'SELECT * FROM data_runs ORDER BY run_id DESC LIMIT $1',
      [limit]
    );
    return res.rows.map(rowToRun);
  }

  // Census operations
  async upsertCountyStats(year: number, stats: CountyPoultryStats[]): Promise<void> {
    const now = new Date().toISOString();
    await this.transaction('upsert county stats', async client => {
      for (const county of stats) {
        await client.query(
          `INSERT INTO county_stats (
             year, county, total_birds, broilers, layers, turkeys, other_poultry,
             num_operations, rank, is_target, updated_at
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
           ON CONFLICT (year, county) DO UPDATE SET
             total_birds = EXCLUDED.total_birds,
             broilers = EXCLUDED.broilers,
             layers = EXCLUDED.layers,
             turkeys = EXCLUDED.turkeys,
             other_poultry = EXCLUDED.other_poultry,
             num_operations = EXCLUDED.num_operations,
             rank = EXCLUDED.rank,
             is_target = EXCLUDED.is_target,
             updated_at = EXCLUDED.updated_at`,
          [
            year,
            county.county,
            county.total_birds,
            county.broilers,
            county.layers,
            county.turkeys,
            county.other_poultry,
            county.num_operations,
            county.rank,
            county.is_target,
            now,
          ]
        );
      }
    });
  }

  async getCountyStats(year: number): Promise<CountyPoultryStats[]> {
    const res = await this.query<CountyStatsRow>(
      'get county stats',
      'SELECT * FROM county_stats WHERE year = $1 ORDER BY rank',
      [year]
    );
    return res.rows.map(rowToCountyStats);
  }

  async getStats(): Promise<PipelineStats> {
    const totals = await this.query<{ total: number; scored: number; average: number | null }>(
      'get stats',
      `SELECT
         COUNT(*)::int AS total,
         COUNT(*) FILTER (WHERE lead_score > 0)::int AS scored,
         AVG(lead_score)::float8 AS average
       FROM farms`
    );
    const byStatus = await this.query<CountRow>(
      'get stats',
      'SELECT lead_status AS key, COUNT(*)::int AS count FROM farms GROUP BY lead_status'
    );
    const byCounty = await this.query<CountRow>(
      'get stats',
      'SELECT county AS key, COUNT(*)::int AS count FROM farms GROUP BY county ORDER BY count DESC'
    );
    const row = totals.rows[0];

    return {
      total_farms: row?.total ?? 0,
      by_status: countsToRecord(byStatus.rows),
      by_county: countsToRecord(byCounty.rows),
      scored_farms: row?.scored ?? 0,
      average_score: Math.round((row?.average ?? 0) * 10) / 10,
    };
  }

  async runMigrations(): Promise<void> {
    const files = readdirSync(MIGRATIONS_DIR)
      .filter(file => file.endsWith('.sql'))
      .sort();

    await this.transaction('run migrations', async client => {
      for (const file of files) {
        await client.query(readFileSync(new URL(file, MIGRATIONS_DIR), 'utf-8'));
      }
    });

    logger.info('PostgreSQL migrations completed', { files });
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.error('PostgreSQL connection test failed', { error });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('PostgreSQL pool closed');
  }

  private async query<R extends pg.QueryResultRow = pg.QueryResultRow>(
    operation: string,
    sql: string,
    params: unknown[] = []
  ): Promise<pg.QueryResult<R>> {
    try {
      return await this.pool.query<R>(sql, params);
    } catch (error) {
      throw new StorageError(`Failed to ${operation}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async transaction(operation: string, work: (client: pg.PoolClient) => Promise<void>): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await work(client);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw new StorageError(`Failed to ${operation}: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      client.release();
    }
  }
}
