import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  CsvFileAdapter,
  SQFT_PER_HOUSE,
  manualResearchRow,
  propertyRecordRow,
} from '../../src/adapters/csv_file.js';
import { createAdapter } from '../../src/adapters/index.js';
import { DepCafoAdapter } from '../../src/adapters/dep_cafo.js';
import { compact, pick, slugify } from '../../src/adapters/csv.js';
import { AdapterFailure, ConfigError } from '../../src/types.js';
import { collect } from '../helpers/farms.js';

const NOW = () => new Date('2024-06-01T00:00:00.000Z');

describe('CSV file adapters', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'poultry-leads-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeCsv(name: string, lines: string[]): string {
    const path = join(dir, name);
    writeFileSync(path, lines.join('\n'));
    return path;
  }

  describe('csv helpers', () => {
    it('should pick the first non-empty column', () => {
      expect(pick({ owner_name: ' ', owner: 'Amos Zook' }, 'owner_name', 'owner')).toBe('Amos Zook');
      expect(pick({}, 'owner')).toBeUndefined();
    });

    it('should drop empty entries', () => {
      expect(compact({ a: 'x', b: '', c: undefined, d: null, e: 0 })).toEqual({ a: 'x', e: 0 });
    });

    it('should slugify names', () => {
      expect(slugify("Zook's Poultry  Farm, LLC")).toBe('zook-s-poultry-farm-llc');
    });
  });

  describe('manualResearchRow', () => {
    it('should derive a stable key and a roof estimate from the house count', () => {
      const mapped = manualResearchRow({
        name: 'Zook Poultry Farm',
        county: 'Lancaster',
        owner: 'Amos Zook',
        phone: '717-555-0142',
        houses: '4',
      });

      expect(mapped).toEqual({
        externalId: 'manual-zook-poultry-farm-lancaster',
        fields: {
          name: 'Zook Poultry Farm',
          county: 'Lancaster',
          owner_name: 'Amos Zook',
          phone: '717-555-0142',
          estimated_houses: 4,
          estimated_roof_sqft: 4 * SQFT_PER_HOUSE,
        },
      });
    });

    it('should prefer a researched roof area', () => {
      const mapped = manualResearchRow({ name: 'Hillside Acres', houses: '2', roof_sqft: '48000' });

      expect(mapped.externalId).toBe('manual-hillside-acres-unknown');
      expect(mapped.fields.estimated_roof_sqft).toBe('48000');
    });

    it('should leave rows without a name unkeyed', () => {
      expect(manualResearchRow({ county: 'York' }).externalId).toBeUndefined();
    });
  });

  describe('propertyRecordRow', () => {
    it('should key parcels by parcel id', () => {
      expect(
        propertyRecordRow({
          parcel_id: '30-12345-0-0000',
          owner: 'Amos Zook',
          county: 'Lancaster',
          parcel_address: '123 Mill Road',
          building_sqft: '52000',
        })
      ).toEqual({
        externalId: '30-12345-0-0000',
        fields: {
          owner_name: 'Amos Zook',
          county: 'Lancaster',
          address: '123 Mill Road',
          estimated_roof_sqft: '52000',
        },
      });
    });
  });

  describe('CsvFileAdapter', () => {
    it('should yield one record per row', async () => {
      const path = writeCsv('manual.csv', [
        'name,county,phone,researched_at',
        'Zook Poultry Farm,Lancaster,717-555-0142,2024-05-20T12:00:00Z',
        'Hillside Acres,York,,',
      ]);
      const adapter = new CsvFileAdapter('manual_research', { path, kind: 'manual_csv', now: NOW });

      const records = await collect(adapter.fetch());

      expect(records).toEqual([
        {
          source_id: 'manual_research',
          source_external_id: 'manual-zook-poultry-farm-lancaster',
          observed_at: '2024-05-20T12:00:00.000Z',
          field_map: { name: 'Zook Poultry Farm', county: 'Lancaster', phone: '717-555-0142' },
        },
        {
          source_id: 'manual_research',
          source_external_id: 'manual-hillside-acres-york',
          observed_at: '2024-06-01T00:00:00.000Z',
          field_map: { name: 'Hillside Acres', county: 'York' },
        },
      ]);
    });

    it('should raise AdapterFailure for a missing file', async () => {
      const adapter = new CsvFileAdapter('manual_research', {
        path: join(dir, 'missing.csv'),
        kind: 'manual_csv',
      });

      await expect(collect(adapter.fetch())).rejects.toBeInstanceOf(AdapterFailure);
    });
  });

  describe('createAdapter', () => {
    it('should build the configured adapter kind', () => {
      const dep = createAdapter('dep_cafo', {
        name: 'PA DEP CAFO Permits',
        type: 'scrape',
        priority: 20,
        confidence: 0.6,
        enabled: true,
        adapter: { kind: 'dep_cafo_csv', url: 'https://example.com/cafo.csv', timeout_ms: 1000 },
      });
      expect(dep).toBeInstanceOf(DepCafoAdapter);

      const manual = createAdapter(
        'manual_research',
        {
          name: 'Manual Research',
          type: 'manual',
          priority: 40,
          confidence: 0.8,
          enabled: true,
          adapter: { kind: 'manual_csv', path: 'data/manual/farms.csv' },
        },
        { file: 'override.csv' }
      );
      expect(manual.describe()).toEqual({ adapter: 'manual_csv', path: 'override.csv' });
    });

    it('should reject sources without an adapter', () => {
      expect(() =>
        createAdapter('nass_census', { name: 'USDA NASS Census', type: 'api', priority: 10, confidence: 0.4, enabled: true })
      ).toThrow(ConfigError);
    });
  });
});
