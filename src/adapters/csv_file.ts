/**
 * Adapters for CSV files kept on disk: manual research sheets and county parcel exports
 */

import { readFile } from 'fs/promises';
import { logger } from '../util/logger.js';
import { parseDate } from '../util/dates.js';
import { AdapterFailure, type RawRecord } from '../types.js';
import { parseLocaleNumber } from '../normalize/normalizer.js';
import { compact, parseCsvRows, pick, slugify, type CsvRow } from './csv.js';
import type { Clock, SourceAdapter } from './types.js';

// Roof area assumed per poultry house when a research sheet gives only a house count
export const SQFT_PER_HOUSE = 25000;

export type CsvRowMapper = (row: CsvRow) => {
  externalId?: string;
  fields: RawRecord['field_map'];
};

/**
 * Manual research sheet: name, county, owner_name/owner, phone, email,
 * address, city, zip, operation_type, integrator, aeu, houses
 */
export const manualResearchRow: CsvRowMapper = row => {
  const name = pick(row, 'name');
  const county = pick(row, 'county');
  const houses = parseLocaleNumber(pick(row, 'houses', 'estimated_houses'));
  const roof = pick(row, 'roof_sqft', 'estimated_roof_sqft');

  return {
    externalId: name ? `manual-${slugify(name)}-${slugify(county ?? 'unknown')}` : undefined,
    fields: compact({
      name,
      county,
      state: pick(row, 'state'),
      owner_name: pick(row, 'owner_name', 'owner'),
      phone: pick(row, 'phone'),
      email: pick(row, 'email'),
      address: pick(row, 'address', 'address_line1'),
      city: pick(row, 'city'),
      zip: pick(row, 'zip', 'zip_code'),
      operation_type: pick(row, 'operation_type', 'type'),
      integrator: pick(row, 'integrator'),
      animal_equivalent_units: pick(row, 'aeu', 'animal_equivalent_units'),
      animal_count: pick(row, 'animal_count', 'birds'),
      estimated_houses: houses,
      estimated_roof_sqft: roof ?? (houses !== undefined && houses > 0 ? Math.round(houses) * SQFT_PER_HOUSE : undefined),
    }),
  };
};

/**
 * County assessor parcel export: parcel_id, name, county, owner_name,
 * parcel_address, roof_sqft or building_sqft
 */
export const propertyRecordRow: CsvRowMapper = row => ({
  externalId: pick(row, 'parcel_id'),
  fields: compact({
    name: pick(row, 'name', 'farm_name'),
    county: pick(row, 'county'),
    owner_name: pick(row, 'owner_name', 'owner'),
    address: pick(row, 'parcel_address', 'address'),
    city: pick(row, 'municipality', 'city'),
    zip: pick(row, 'zip'),
    estimated_roof_sqft: pick(row, 'roof_sqft', 'building_sqft'),
  }),
});

export interface CsvFileAdapterOptions {
  path: string;
  kind: 'manual_csv' | 'property_csv';
  now?: Clock;
}

export class CsvFileAdapter implements SourceAdapter {
  readonly sourceId: string;
  private path: string;
  private kind: CsvFileAdapterOptions['kind'];
  private now: Clock;

  constructor(sourceId: string, options: CsvFileAdapterOptions) {
    this.sourceId = sourceId;
    this.path = options.path;
    this.kind = options.kind;
    this.now = options.now ?? (() => new Date());
  }

  describe(): Record<string, unknown> {
    return { adapter: this.kind, path: this.path };
  }

  async *fetch(): AsyncIterable<RawRecord> {
    let rows: CsvRow[];
    try {
      rows = parseCsvRows(await readFile(this.path, 'utf-8'));
    } catch (error) {
      throw new AdapterFailure(
        `Cannot read ${this.path}: ${error instanceof Error ? error.message : String(error)}`,
        this.sourceId
      );
    }

    const mapRow = this.kind === 'manual_csv' ? manualResearchRow : propertyRecordRow;
    const defaultObservedAt = this.now();

    for (const row of rows) {
      const { externalId, fields } = mapRow(row);
      // A row may carry its own research date
      const observedAt = parseDate(pick(row, 'observed_at', 'researched_at')) ?? defaultObservedAt;

      yield {
        source_id: this.sourceId,
        source_external_id: externalId,
        observed_at: observedAt.toISOString(),
        field_map: fields,
      };
    }

    logger.info('CSV file read', { sourceId: this.sourceId, path: this.path, rows: rows.length });
  }
}
