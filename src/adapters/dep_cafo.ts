/**
 * PA DEP Concentrated Animal Feeding Operation (CAFO) permit report adapter.
 * Downloads the report's CSV export and keeps poultry operations.
 */

import { logger } from '../util/logger.js';
import { AdapterFailure, type OperationType, type RawRecord } from '../types.js';
import { normalizeOperationType, parseLocaleNumber } from '../normalize/normalizer.js';
import type { SourceHttpClient } from '../http/client.js';
import { compact, parseCsvRows, pick, type CsvRow } from './csv.js';
import type { Clock, SourceAdapter } from './types.js';

const POULTRY_KEYWORDS = ['poultry', 'chicken', 'layer', 'broiler', 'turkey', 'pullet'];

export interface DepCafoAdapterOptions {
  url: string;
  client: SourceHttpClient;
  now?: Clock;
}

/**
 * Estimate total roof area from animal equivalent units (1 AEU = 1,000 lb live weight).
 * Layers: 250 birds/AEU, 100,000 birds and 36,000 sqft per house.
 * Broilers and unspecified poultry: 167 birds/AEU, 25,000 birds and 20,000 sqft per house.
 * Turkeys: one 25,000 sqft house per 200 AEU.
 */
export function estimateRoofSqft(aeu: number, operationType: OperationType | undefined): number {
  switch (operationType) {
    case 'layer':
      return Math.round(((aeu * 250) / 100000) * 36000);
    case 'turkey':
      return Math.round((aeu / 200) * 25000);
    case 'mixed':
      return Math.round(aeu * 50);
    default:
      return Math.round(((aeu * 167) / 25000) * 20000);
  }
}

export function isPoultry(animalType: string): boolean {
  const text = animalType.toLowerCase();
  return POULTRY_KEYWORDS.some(keyword => text.includes(keyword));
}

/**
 * Map one report row to a raw record; non-poultry rows map to undefined
 */
export function cafoRowToRecord(row: CsvRow, sourceId: string, observedAt: string): RawRecord | undefined {
  const animalType = pick(row, 'Animal Type') ?? '';
  if (!isPoultry(animalType)) {
    return undefined;
  }

  const aeuText = pick(row, 'AEU');
  const aeu = parseLocaleNumber(aeuText);
  const operationType = normalizeOperationType(animalType);

  return {
    source_id: sourceId,
    source_external_id: pick(row, 'PERMIT NO'),
    observed_at: observedAt,
    field_map: compact({
      name: pick(row, 'PRIMARY FACILITY NAME'),
      owner_name: pick(row, 'CLIENT NAME'),
      county: pick(row, 'COUNTY'),
      city: pick(row, 'MUNICIPALITY'),
      animal_equivalent_units: aeuText,
      operation_type: animalType,
      estimated_roof_sqft: aeu !== undefined && aeu > 0
        ? estimateRoofSqft(aeu, operationType.kind === 'known' ? operationType.value : undefined)
        : undefined,
    }),
  };
}

export class DepCafoAdapter implements SourceAdapter {
  readonly sourceId: string;
  private url: string;
  private client: SourceHttpClient;
  private now: Clock;

  constructor(sourceId: string, options: DepCafoAdapterOptions) {
    this.sourceId = sourceId;
    this.url = options.url;
    this.client = options.client;
    this.now = options.now ?? (() => new Date());
  }

  describe(): Record<string, unknown> {
    return { adapter: 'dep_cafo_csv', url: this.url };
  }

  async *fetch(): AsyncIterable<RawRecord> {
    const observedAt = this.now().toISOString();

    let rows: CsvRow[];
    try {
      const csvText = await this.client.getText(this.url, { accept: 'text/csv' });
      rows = parseCsvRows(csvText);
    } catch (error) {
      throw new AdapterFailure(
        `CAFO report download failed: ${error instanceof Error ? error.message : String(error)}`,
        this.sourceId
      );
    }

    let poultryRows = 0;
    for (const row of rows) {
      const record = cafoRowToRecord(row, this.sourceId, observedAt);
      if (record) {
        poultryRows++;
        yield record;
      }
    }

    logger.info('CAFO report parsed', { sourceId: this.sourceId, rows: rows.length, poultryRows });
  }
}
