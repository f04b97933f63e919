/**
 * Row shapes shared by the SQL storage backends and their mapping to domain types
 */

import { z } from 'zod';
import {
  StorageError,
  type CanonicalFarm,
  type CountyPoultryStats,
  type DataRun,
  type FieldSources,
  type LeadStatus,
  type NormalizedAttributes,
  type OperationType,
  type ProvenanceLink,
  type RawValue,
  type RunStatus,
} from '../types.js';
import { FARM_FIELDS, UNKNOWN, fromNullable, known } from '../util/field.js';

// Object type aliases (not interfaces) so pg's QueryResultRow constraint accepts them
export type FarmRow = {
  farm_id: number;
  name: string | null;
  address: string | null;
  city: string | null;
  county: string | null;
  state: string | null;
  zip: string | null;
  operation_type: string | null;
  animal_count: number | null;
  animal_equivalent_units: number | null;
  estimated_houses: number | null;
  estimated_roof_sqft: number | null;
  owner_name: string | null;
  phone: string | null;
  email: string | null;
  integrator: string | null;
  field_sources: unknown;
  data_confidence: number;
  last_verified: string | null;
  lead_score: number;
  lead_status: string;
  is_active: number | boolean;
  version: number;
  updated_seq: number;
  created_at: string;
  updated_at: string;
};

export type ProvenanceRow = {
  farm_id: number;
  source_id: string;
  external_id: string | null;
  first_seen: string;
  last_seen: string;
  raw_data: unknown;
};

export type RunRow = {
  run_id: number;
  source_id: string;
  status: string;
  started_at: string;
  completed_at: string | null;
  records_found: number;
  records_new: number;
  records_updated: number;
  records_unchanged: number;
  records_failed: number;
  error_message: string | null;
  metadata: unknown;
};

export type CountyStatsRow = {
  county: string;
  total_birds: number;
  broilers: number;
  layers: number;
  turkeys: number;
  other_poultry: number;
  num_operations: number;
  rank: number;
  is_target: number | boolean;
};

export type CountRow = { key: string | null; count: number };

const OPERATION_TYPES: readonly OperationType[] = ['broiler', 'layer', 'turkey', 'mixed'];

const LEAD_STATUSES: readonly LeadStatus[] = [
  'new',
  'researching',
  'contacted',
  'qualified',
  'proposal',
  'won',
  'lost',
  'not_interested',
];

const RUN_STATUSES: readonly RunStatus[] = ['running', 'success', 'failed'];

const FieldSourcesSchema = z.record(
  z.object({ source_id: z.string(), observed_at: z.string() })
);

const RawDataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

const MetadataSchema = z.record(z.unknown());

function isOperationType(value: string | null): value is OperationType {
  return OPERATION_TYPES.some(type => type === value);
}

function isLeadStatus(value: string): value is LeadStatus {
  return LEAD_STATUSES.some(status => status === value);
}

function isRunStatus(value: string): value is RunStatus {
  return RUN_STATUSES.some(status => status === value);
}

/**
 * SQLite returns JSON columns as text, PostgreSQL as parsed JSONB
 */
function parseJsonColumn(value: unknown): unknown {
  return typeof value === 'string' ? JSON.parse(value) : value;
}

function parseFieldSources(value: unknown): FieldSources {
  const parsed = FieldSourcesSchema.safeParse(parseJsonColumn(value));
  if (!parsed.success) {
    throw new StorageError(`Malformed field_sources column: ${parsed.error.message}`);
  }
  const sources: FieldSources = {};
  for (const field of FARM_FIELDS) {
    const source = parsed.data[field];
    if (source) {
      sources[field] = source;
    }
  }
  return sources;
}

function parseRawData(value: unknown): Record<string, RawValue> {
  const parsed = RawDataSchema.safeParse(parseJsonColumn(value));
  if (!parsed.success) {
    throw new StorageError(`Malformed raw data column: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function rowToFarm(row: FarmRow): CanonicalFarm {
  if (!isLeadStatus(row.lead_status)) {
    throw new StorageError(`Farm ${row.farm_id} has unknown lead status '${row.lead_status}'`);
  }

  const attributes: NormalizedAttributes = {
    name: fromNullable(row.name),
    address: fromNullable(row.address),
    city: fromNullable(row.city),
    county: fromNullable(row.county),
    state: fromNullable(row.state),
    zip: fromNullable(row.zip),
    operation_type: isOperationType(row.operation_type) ? known(row.operation_type) : UNKNOWN,
    animal_count: fromNullable(row.animal_count),
    animal_equivalent_units: fromNullable(row.animal_equivalent_units),
    estimated_houses: fromNullable(row.estimated_houses),
    estimated_roof_sqft: fromNullable(row.estimated_roof_sqft),
    owner_name: fromNullable(row.owner_name),
    phone: fromNullable(row.phone),
    email: fromNullable(row.email),
    integrator: fromNullable(row.integrator),
  };

  return {
    farm_id: row.farm_id,
    attributes,
    field_sources: parseFieldSources(row.field_sources),
    data_confidence: row.data_confidence,
    last_verified: row.last_verified,
    lead_score: row.lead_score,
    lead_status: row.lead_status,
    is_active: row.is_active === true || row.is_active === 1,
    version: row.version,
    updated_seq: row.updated_seq,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/**
 * Attribute column values in FARM_FIELDS order; unknown maps to NULL
 */
export function attributeParams(attributes: NormalizedAttributes): Array<string | number | null> {
  return FARM_FIELDS.map(field => {
    const value = attributes[field];
    return value.kind === 'known' ? value.value : null;
  });
}

export function rowToProvenance(row: ProvenanceRow): ProvenanceLink {
  return {
    farm_id: row.farm_id,
    source_id: row.source_id,
    external_id: row.external_id,
    first_seen: row.first_seen,
    last_seen: row.last_seen,
    raw_data: parseRawData(row.raw_data),
  };
}

export function rowToRun(row: RunRow): DataRun {
  if (!isRunStatus(row.status)) {
    throw new StorageError(`Run ${row.run_id} has unknown status '${row.status}'`);
  }

  const metadata = row.metadata === null ? null : MetadataSchema.safeParse(parseJsonColumn(row.metadata));

  return {
    run_id: row.run_id,
    source_id: row.source_id,
    status: row.status,
    started_at: row.started_at,
    completed_at: row.completed_at,
    stats: {
      found: row.records_found,
      new: row.records_new,
      updated: row.records_updated,
      unchanged: row.records_unchanged,
      failed: row.records_failed,
    },
    error_message: row.error_message,
    metadata: metadata?.success ? metadata.data : null,
  };
}

export function rowToCountyStats(row: CountyStatsRow): CountyPoultryStats {
  return {
    county: row.county,
    total_birds: row.total_birds,
    broilers: row.broilers,
    layers: row.layers,
    turkeys: row.turkeys,
    other_poultry: row.other_poultry,
    num_operations: row.num_operations,
    rank: row.rank,
    is_target: row.is_target === true || row.is_target === 1,
  };
}

/**
 * Fold GROUP BY rows into a record; NULL groups are reported as 'Unknown'
 */
export function countsToRecord(rows: CountRow[]): Record<string, number> {
  const result: Record<string, number> = {};
  for (const row of rows) {
    result[row.key ?? 'Unknown'] = row.count;
  }
  return result;
}
