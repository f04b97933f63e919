/**
 * SQLite storage implementation using better-sqlite3
 */

import Database from 'better-sqlite3';
import { mkdirSync, readFileSync, readdirSync } from 'fs';
import { dirname } from 'path';
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

const MIGRATIONS_DIR = new URL('./migrations/sqlite/', import.meta.url);

const ATTRIBUTE_COLUMNS = FARM_FIELDS.join(', ');
const ATTRIBUTE_ASSIGNMENTS = FARM_FIELDS.map(field => `${field} = ?`).join(', ');
const NEXT_UPDATED_SEQ = '(SELECT COALESCE(MAX(updated_seq), 0) + 1 FROM farms)';

/**
 * SQLite storage implementation
 */
export class SqliteStorage implements Storage {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    logger.info('SQLite database initialized', { path: dbPath });
  }

  // Farm operations
  async getFarm(farmId: number): Promise<CanonicalFarm | undefined> {
    try {
      const row = this.db
        .prepare<unknown[], FarmRow>('SELECT * FROM farms WHERE farm_id = ?')
        .get(farmId);
      return row ? rowToFarm(row) : undefined;
    } catch (error) {
      throw wrap('get farm', error);
    }
  }

  async getFarmsByCounty(county: string): Promise<CanonicalFarm[]> {
    try {
      const rows = this.db
        .prepare<unknown[], FarmRow>('SELECT * FROM farms WHERE county = ? ORDER BY farm_id')
        .all(county);
      return rows.map(rowToFarm);
    } catch (error) {
      throw wrap('get farms by county', error);
    }
  }

  async findFarmBySourceKey(sourceId: string, externalId: string): Promise<CanonicalFarm | undefined> {
    try {
      const row = this.db
        .prepare<unknown[], FarmRow>(`
          SELECT f.* FROM source_keys k
          JOIN farms f ON f.farm_id = k.farm_id
          WHERE k.source_id = ? AND k.external_id = ?
        `)
        .get(sourceId, externalId);
      return row ? rowToFarm(row) : undefined;
    } catch (error) {
      throw wrap('find farm by source key', error);
    }
  }

  async insertFarm(farm: NewFarm): Promise<number> {
    try {
      const now = new Date().toISOString();
      const placeholders = FARM_FIELDS.map(() => '?').join(', ');
      const info = this.db
        .prepare(`
          INSERT INTO farms (
            ${ATTRIBUTE_COLUMNS}, field_sources, data_confidence, last_verified,
            lead_score, lead_status, is_active, version, updated_seq, created_at, updated_at
          ) VALUES (${placeholders}, ?, ?, ?, ?, ?, ?, 1, ${NEXT_UPDATED_SEQ}, ?, ?)
        `)
        .run(
          ...attributeParams(farm.attributes),
          JSON.stringify(farm.field_sources),
          farm.data_confidence,
          farm.last_verified,
          farm.lead_score,
          farm.lead_status,
          farm.is_active ? 1 : 0,
          now,
          now
        );
      return Number(info.lastInsertRowid);
    } catch (error) {
      throw wrap('insert farm', error);
    }
  }

  async updateFarm(farm: CanonicalFarm, expectedVersion: number): Promise<boolean> {
    try {
      const info = this.db
        .prepare(`
          UPDATE farms SET
            ${ATTRIBUTE_ASSIGNMENTS},
            field_sources = ?,
            data_confidence = ?,
            last_verified = ?,
            version = version + 1,
            updated_seq = ${NEXT_UPDATED_SEQ},
            updated_at = ?
          WHERE farm_id = ? AND version = ?
        `)
        .run(
          ...attributeParams(farm.attributes),
          JSON.stringify(farm.field_sources),
          farm.data_confidence,
          farm.last_verified,
          new Date().toISOString(),
          farm.farm_id,
          expectedVersion
        );
      return info.changes === 1;
    } catch (error) {
      throw wrap('update farm', error);
    }
  }

  async setScore(farmId: number, score: number, expectedVersion?: number): Promise<boolean> {
    try {
      const info = expectedVersion === undefined
        ? this.db.prepare('UPDATE farms SET lead_score = ? WHERE farm_id = ?').run(score, farmId)
        : this.db
            .prepare('UPDATE farms SET lead_score = ? WHERE farm_id = ? AND version = ?')
            .run(score, farmId, expectedVersion);
      return info.changes === 1;
    } catch (error) {
      throw wrap('set score', error);
    }
  }

  async listFarms(): Promise<CanonicalFarm[]> {
    try {
      return this.db
        .prepare<unknown[], FarmRow>('SELECT * FROM farms ORDER BY farm_id')
        .all()
        .map(rowToFarm);
    } catch (error) {
      throw wrap('list farms', error);
    }
  }

  async getTopFarms(limit: number): Promise<CanonicalFarm[]> {
    try {
      return this.db
        .prepare<unknown[], FarmRow>(`
          SELECT * FROM farms
          WHERE is_active = 1
          ORDER BY lead_score DESC, farm_id ASC
          LIMIT ?
        `)
        .all(limit)
        .map(rowToFarm);
    } catch (error) {
      throw wrap('get top farms', error);
    }
  }

  // Provenance operations
  async recordProvenance({ farm_id, run_id, record }: ProvenanceWrite): Promise<void> {
    const externalId = record.source_external_id ?? null;
    const rawData = JSON.stringify(record.field_map);
    const now = new Date().toISOString();

    try {
      this.db.transaction(() => {
        this.db
          .prepare(`
            INSERT INTO farm_sources (farm_id, source_id, external_id, first_seen, last_seen, raw_data)
            VALUES (?, ?, ?, ?, ?, ?)
            ON CONFLICT (farm_id, source_id) DO UPDATE SET
              external_id = COALESCE(excluded.external_id, farm_sources.external_id),
              first_seen = MIN(farm_sources.first_seen, excluded.first_seen),
              last_seen = MAX(farm_sources.last_seen, excluded.last_seen),
              raw_data = CASE WHEN excluded.last_seen >= farm_sources.last_seen
                THEN excluded.raw_data ELSE farm_sources.raw_data END
          `)
          .run(farm_id, record.source_id, externalId, record.observed_at, record.observed_at, rawData);

        if (externalId !== null) {
          this.db
            .prepare(`
              INSERT INTO source_keys (source_id, external_id, farm_id, created_at)
              VALUES (?, ?, ?, ?)
              ON CONFLICT (source_id, external_id) DO NOTHING
            `)
            .run(record.source_id, externalId, farm_id, now);
        }

        this.db
          .prepare(`
            INSERT INTO raw_records (run_id, source_id, external_id, farm_id, observed_at, field_map, inserted_at)
            VALUES (?, ?, ?, ?, ?, ?, ?)
          `)
          .run(run_id, record.source_id, externalId, farm_id, record.observed_at, rawData, now);
      })();
    } catch (error) {
      throw wrap('record provenance', error);
    }
  }

  async getProvenance(farmId: number): Promise<ProvenanceLink[]> {
    try {
      return this.db
        .prepare<unknown[], ProvenanceRow>('SELECT * FROM farm_sources WHERE farm_id = ? ORDER BY source_id')
        .all(farmId)
        .map(rowToProvenance);
    } catch (error) {
      throw wrap('get provenance', error);
    }
  }

  // Run operations
  async syncDataSources(sources: DataSourceSeed[]): Promise<void> {
    const now = new Date().toISOString();
    try {
      const stmt = this.db.prepare(`
        INSERT INTO data_sources (source_id, name, source_type, priority, created_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT (source_id) DO UPDATE SET
          name = excluded.name,
          source_type = excluded.source_type,
          priority = excluded.priority
      `);
      this.db.transaction(() => {
        for (const source of sources) {
          stmt.run(source.source_id, source.name, source.source_type, source.priority, now);
        }
      })();
    } catch (error) {
      throw wrap('sync data sources', error);
    }
  }

  async startRun(sourceId: string, metadata?: Record<string, unknown>): Promise<number> {
    try {
      const info = this.db
        .prepare(`
          INSERT INTO data_runs (source_id, status, started_at, metadata)
          VALUES (?, 'running', ?, ?)
        `)
        .run(sourceId, new Date().toISOString(), metadata ? JSON.stringify(metadata) : null);
      return Number(info.lastInsertRowid);
    } catch (error) {
      throw wrap('start run', error);
    }
  }

  async completeRun(runId: number, stats: RunStats, error?: string): Promise<void> {
    const now = new Date().toISOString();
    try {
      this.db.transaction(() => {
        this.db
          .prepare(`
            UPDATE data_runs SET
              status = ?,
              completed_at = ?,
              records_found = ?,
              records_new = ?,
              records_updated = ?,
              records_unchanged = ?,
              records_failed = ?,
              error_message = ?
            WHERE run_id = ?
          `)
          .run(
            error === undefined ? 'success' : 'failed',
            now,
            stats.found,
            stats.new,
            stats.updated,
            stats.unchanged,
            stats.failed,
            error ?? null,
            runId
          );
        this.db
          .prepare(`
            UPDATE data_sources SET last_run_at = ?
            WHERE source_id = (SELECT source_id FROM data_runs WHERE run_id = ?)
          `)
          .run(now, runId);
      })();
    } catch (cause) {
      throw wrap('complete run', cause);
    }
  }

  async getRecentRuns(limit: number): Promise<DataRun[]> {
    try {
      return this.db
        .prepare<unknown[], RunRow>('SELECT * FROM data_runs ORDER BY run_id DESC LIMIT ?')
        .all(limit)
        .map(rowToRun);
    } catch (error) {
      throw wrap('get recent runs', error);
    }
  }

  // Census operations
  async upsertCountyStats(year: number, stats: CountyPoultryStats[]): Promise<void> {
    const now = new Date().toISOString();
    try {
      const stmt = this.db.prepare(`
        INSERT INTO county_stats (
          year, county, total_birds, broilers, layers, turkeys, other_poultry,
          num_operations, rank, is_target, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT (year, county) DO UPDATE SET
          total_birds = excluded.total_birds,
          broilers = excluded.broilers,
          layers = excluded.layers,
          turkeys = excluded.turkeys,
          other_poultry = excluded.other_poultry,
          num_operations = excluded.num_operations,
          rank = excluded.rank,
          is_target = excluded.is_target,
          updated_at = excluded.updated_at
      `);
      this.db.transaction(() => {
        for (const county of stats) {
          stmt.run(
            year,
            county.county,
            county.total_birds,
            county.broilers,
            county.layers,
            county.turkeys,
            county.other_poultry,
            county.num_operations,
            county.rank,
            county.is_target ? 1 : 0,
            now
          );
        }
      })();
    } catch (error) {
      throw wrap('upsert county stats', error);
    }
  }

  async getCountyStats(year: number): Promise<CountyPoultryStats[]> {
    try {
      return this.db
        .prepare<unknown[], CountyStatsRow>('SELECT * FROM county_stats WHERE year = ? ORDER BY rank')
        .all(year)
        .map(rowToCountyStats);
    } catch (error) {
      throw wrap('get county stats', error);
    }
  }

  /**
   * Aggregate farm statistics for reports
   */
  async getStats(): Promise<PipelineStats> {
    try {
      const totals = this.db
        .prepare<unknown[], { total: number; scored: number; average: number | null }>(`
          SELECT
            COUNT(*) AS total,
            SUM(CASE WHEN lead_score > 0 THEN 1 ELSE 0 END) AS scored,
            AVG(lead_score) AS average
          FROM farms
        `)
        .get();
      const byStatus = this.db
        .prepare<unknown[], CountRow>('SELECT lead_status AS key, COUNT(*) AS count FROM farms GROUP BY lead_status')
        .all();
      const byCounty = this.db
        .prepare<unknown[], CountRow>('SELECT county AS key, COUNT(*) AS count FROM farms GROUP BY county ORDER BY count DESC')
        .all();

      return {
        total_farms: totals?.total ?? 0,
        by_status: countsToRecord(byStatus),
        by_county: countsToRecord(byCounty),
        scored_farms: totals?.scored ?? 0,
        average_score: Math.round((totals?.average ?? 0) * 10) / 10,
      };
    } catch (error) {
      throw wrap('get stats', error);
    }
  }

  /**
   * Apply every .sql file in the migrations directory, in name order
   */
  async runMigrations(): Promise<void> {
    try {
      const files = readdirSync(MIGRATIONS_DIR)
        .filter(file => file.endsWith('.sql'))
        .sort();

      this.db.transaction(() => {
        for (const file of files) {
          this.db.exec(readFileSync(new URL(file, MIGRATIONS_DIR), 'utf-8'));
        }
      })();

      logger.info('SQLite migrations completed', { files });
    } catch (error) {
      throw wrap('run migrations', error);
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      logger.error('SQLite connection test failed', { error });
      return false;
    }
  }

  async close(): Promise<void> {
    try {
      this.db.close();
      logger.info('SQLite database connection closed');
    } catch (error) {
      throw wrap('close database', error);
    }
  }
}

function wrap(operation: string, error: unknown): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  return new StorageError(`Failed to ${operation}: ${error instanceof Error ? error.message : String(error)}`);
}
