/**
 * Core type definitions for the poultry-leads pipeline
 */

// Raw values as they arrive from a source, before normalization
export type RawValue = string | number | boolean | null | undefined;

// One observation from one source at one point in time
export interface RawRecord {
  readonly source_id: string;
  readonly source_external_id?: string;
  readonly observed_at: string;
  readonly field_map: Readonly<Record<string, RawValue>>;
}

// Tagged optional value: 'unknown' is never conflated with '' / 0 / false
export type FieldValue<T> =
  | { readonly kind: 'known'; readonly value: T }
  | { readonly kind: 'unknown' };

export type OperationType = 'broiler' | 'layer' | 'turkey' | 'mixed';

export type LeadStatus =
  | 'new'
  | 'researching'
  | 'contacted'
  | 'qualified'
  | 'proposal'
  | 'won'
  | 'lost'
  | 'not_interested';

// Canonical attribute schema of a farm
export interface FarmAttributes {
  name: string;
  address: string;
  city: string;
  county: string;
  state: string;
  zip: string;
  operation_type: OperationType;
  animal_count: number;
  animal_equivalent_units: number;
  estimated_houses: number;
  estimated_roof_sqft: number;
  owner_name: string;
  phone: string;
  email: string;
  integrator: string;
}

export type FarmField = keyof FarmAttributes;

export type NormalizedAttributes = {
  readonly [K in FarmField]: FieldValue<FarmAttributes[K]>;
};

// The contribution that last set a field on a canonical farm
export interface FieldSource {
  source_id: string;
  observed_at: string;
}

export type FieldSources = Partial<Record<FarmField, FieldSource>>;

// Resolved real-world farm
export interface CanonicalFarm {
  farm_id: number;
  attributes: NormalizedAttributes;
  field_sources: FieldSources;
  data_confidence: number;
  last_verified: string | null;
  lead_score: number;
  lead_status: LeadStatus;
  is_active: boolean;
  version: number;
  updated_seq: number;
  created_at: string;
  updated_at: string;
}

// Farm as written on first creation (storage assigns id, version and timestamps)
export type NewFarm = Omit<CanonicalFarm, 'farm_id' | 'version' | 'updated_seq' | 'created_at' | 'updated_at'>;

// Link between a farm and a contributing source
export interface ProvenanceLink {
  farm_id: number;
  source_id: string;
  external_id: string | null;
  first_seen: string;
  last_seen: string;
  raw_data: Record<string, RawValue>;
}

export interface ProvenanceWrite {
  farm_id: number;
  run_id: number;
  record: RawRecord;
}

// Per-source precedence and trust used by the merge engine
export interface SourcePolicy {
  priority: number;
  confidence: number;
}

export type SourcePriorityTable = Readonly<Record<string, SourcePolicy>>;

// Run bookkeeping
export interface RunStats {
  found: number;
  new: number;
  updated: number;
  unchanged: number;
  failed: number;
}

export type RunStatus = 'running' | 'success' | 'failed';

export interface RunResult {
  /** null when the run row itself could not be created */
  run_id: number | null;
  source_id: string;
  status: Exclude<RunStatus, 'running'>;
  stats: RunStats;
  error?: string;
  started_at: string;
  completed_at: string;
}

export interface DataRun {
  run_id: number;
  source_id: string;
  status: RunStatus;
  started_at: string;
  completed_at: string | null;
  stats: RunStats;
  error_message: string | null;
  metadata: Record<string, unknown> | null;
}

// County-level census statistics
export interface CountyPoultryStats {
  county: string;
  total_birds: number;
  broilers: number;
  layers: number;
  turkeys: number;
  other_poultry: number;
  num_operations: number;
  rank: number;
  is_target: boolean;
}

export interface PipelineStats {
  total_farms: number;
  by_status: Record<string, number>;
  by_county: Record<string, number>;
  scored_farms: number;
  average_score: number;
}

export interface DataSourceSeed {
  source_id: string;
  name: string;
  source_type: string;
  priority: number;
}

// Storage interface
export interface Storage {
  // Farm operations
  getFarm(farmId: number): Promise<CanonicalFarm | undefined>;
  getFarmsByCounty(county: string): Promise<CanonicalFarm[]>;
  findFarmBySourceKey(sourceId: string, externalId: string): Promise<CanonicalFarm | undefined>;
  insertFarm(farm: NewFarm): Promise<number>;
  /** Compare-and-set write; resolves false when the stored version moved on */
  updateFarm(farm: CanonicalFarm, expectedVersion: number): Promise<boolean>;
  /** With expectedVersion the write only lands on that version; resolves whether it landed */
  setScore(farmId: number, score: number, expectedVersion?: number): Promise<boolean>;
  listFarms(): Promise<CanonicalFarm[]>;
  getTopFarms(limit: number): Promise<CanonicalFarm[]>;

  // Provenance operations
  recordProvenance(write: ProvenanceWrite): Promise<void>;
  getProvenance(farmId: number): Promise<ProvenanceLink[]>;

  // Run operations
  syncDataSources(sources: DataSourceSeed[]): Promise<void>;
  startRun(sourceId: string, metadata?: Record<string, unknown>): Promise<number>;
  completeRun(runId: number, stats: RunStats, error?: string): Promise<void>;
  getRecentRuns(limit: number): Promise<DataRun[]>;

  // Census operations
  upsertCountyStats(year: number, stats: CountyPoultryStats[]): Promise<void>;
  getCountyStats(year: number): Promise<CountyPoultryStats[]>;

  getStats(): Promise<PipelineStats>;
  runMigrations(): Promise<void>;
  testConnection(): Promise<boolean>;
  close(): Promise<void>;
}

// Utility types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

// Error types
export class AdapterFailure extends Error {
  constructor(
    message: string,
    public sourceId: string
  ) {
    super(message);
    this.name = 'AdapterFailure';
  }
}

export class RecordNormalizationFailure extends Error {
  constructor(
    message: string,
    public sourceId: string,
    public externalId?: string
  ) {
    super(message);
    this.name = 'RecordNormalizationFailure';
  }
}

export class ConcurrentWriteConflict extends Error {
  constructor(public farmId: number, public attempts: number) {
    super(`Farm ${farmId} was modified concurrently; gave up after ${attempts} attempts`);
    this.name = 'ConcurrentWriteConflict';
  }
}

export class SourceHttpError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public retryAfter?: number
  ) {
    super(message);
    this.name = 'SourceHttpError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class StorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StorageError';
  }
}
