/**
 * USDA NASS Quick Stats client for county-level poultry census statistics
 */

import { z } from 'zod';
import type { SourceHttpClient } from '../http/client.js';
import type { CensusConfig } from '../config/index.js';
import type { CountyPoultryStats } from '../types.js';
import { normalizeCounty, parseLocaleNumber } from '../normalize/normalizer.js';
import { logger } from '../util/logger.js';

const NassResponseSchema = z.object({
  data: z.array(
    z.object({
      county_name: z.string(),
      commodity_desc: z.string(),
      Value: z.string(),
    }).passthrough()
  ),
});

export type NassRecord = z.infer<typeof NassResponseSchema>['data'][number];

type CommodityBucket = 'broilers' | 'layers' | 'turkeys' | 'other_poultry';

export type UnrankedCountyStats = Omit<CountyPoultryStats, 'rank' | 'is_target'>;

function bucketFor(commodity: string): CommodityBucket {
  const text = commodity.toLowerCase();
  if (text.includes('broiler')) return 'broilers';
  if (text.includes('layer') || text.includes('egg')) return 'layers';
  if (text.includes('turkey')) return 'turkeys';
  return 'other_poultry';
}

/**
 * Census values such as "(D)" are withheld to avoid disclosing individual operations
 */
function censusValue(value: string): number | undefined {
  const parsed = parseLocaleNumber(value);
  return parsed !== undefined && Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

/**
 * Sum inventory by county and commodity, and operations by county
 */
export function aggregateCountyStats(
  inventory: readonly NassRecord[],
  operations: readonly NassRecord[]
): UnrankedCountyStats[] {
  const byCounty = new Map<string, UnrankedCountyStats>();

  for (const record of inventory) {
    const county = normalizeCounty(record.county_name);
    const count = censusValue(record.Value);
    if (county.kind === 'unknown' || count === undefined) continue;

    const stats = byCounty.get(county.value) ?? {
      county: county.value,
      total_birds: 0,
      broilers: 0,
      layers: 0,
      turkeys: 0,
      other_poultry: 0,
      num_operations: 0,
    };
    stats[bucketFor(record.commodity_desc)] += count;
    stats.total_birds += count;
    byCounty.set(county.value, stats);
  }

  for (const record of operations) {
    const county = normalizeCounty(record.county_name);
    const count = censusValue(record.Value);
    if (county.kind === 'unknown' || count === undefined) continue;

    const stats = byCounty.get(county.value);
    if (stats) {
      stats.num_operations += count;
    }
  }

  return [...byCounty.values()];
}

/**
 * Rank counties by total birds (ties by name) and flag target counties
 */
export function rankCounties(stats: readonly UnrankedCountyStats[], minTargetBirds: number): CountyPoultryStats[] {
  return [...stats]
    .sort((a, b) => b.total_birds - a.total_birds || a.county.localeCompare(b.county))
    .map((county, index) => ({
      ...county,
      rank: index + 1,
      is_target: county.total_birds >= minTargetBirds,
    }));
}

/**
 * False while the key is absent or still an unsubstituted ${NASS_API_KEY}
 */
export function hasApiKey(census: CensusConfig): boolean {
  return Boolean(census.api_key) && !census.api_key?.startsWith('${');
}

export class NassCensusClient {
  private client: SourceHttpClient;
  private census: CensusConfig;

  constructor(client: SourceHttpClient, census: CensusConfig) {
    this.client = client;
    this.census = census;
  }

  private async query(apiKey: string, year: number, statisticCategory: string): Promise<NassRecord[]> {
    const body = await this.client.getJson(this.census.base_url, {
      params: {
        key: apiKey,
        source_desc: 'CENSUS',
        sector_desc: 'ANIMALS & PRODUCTS',
        group_desc: 'POULTRY',
        state_alpha: this.census.state_alpha,
        agg_level_desc: 'COUNTY',
        year,
        statisticcat_desc: statisticCategory,
        format: 'JSON',
      },
    });
    const parsed = NassResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Unexpected NASS response for ${statisticCategory}: ${parsed.error.message}`);
    }
    return parsed.data.data;
  }

  /**
   * Fetch inventory and operation counts and return ranked county statistics
   */
  async collect(year: number = this.census.year): Promise<CountyPoultryStats[]> {
    const apiKey = this.census.api_key;
    if (!apiKey || !hasApiKey(this.census)) {
      throw new Error('NASS_API_KEY is not set');
    }

    const inventory = await this.query(apiKey, year, 'INVENTORY');
    const operations = await this.query(apiKey, year, 'OPERATIONS');
    logger.info('NASS records fetched', { year, inventory: inventory.length, operations: operations.length });

    return rankCounties(aggregateCountyStats(inventory, operations), this.census.min_target_birds);
  }
}
