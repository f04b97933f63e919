#!/usr/bin/env node

/**
 * Farm export runner: all farms ordered by lead score, as CSV
 */

import { config } from 'dotenv';
import { parseArgs } from 'util';
import { writeFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { createStorage } from '../storage/index.js';
import { logger } from '../util/logger.js';
import { farmsToCSV } from '../util/csv.js';
import type { CanonicalFarm, Storage } from '../types.js';
import { CLI_CONFIGS, exitOnHelp, installProcessHandlers, requireOption } from '../util/cli.js';

// Load environment variables
config();

/**
 * Highest score first; ties by farm_id
 */
export function sortByScore(farms: CanonicalFarm[]): CanonicalFarm[] {
  return [...farms].sort((a, b) => b.lead_score - a.lead_score || a.farm_id - b.farm_id);
}

export async function exportFarms(storage: Storage, outPath: string): Promise<number> {
  const farms = sortByScore(await storage.listFarms());
  const csv = await farmsToCSV(farms);

  const absolutePath = resolve(process.cwd(), outPath);
  mkdirSync(dirname(absolutePath), { recursive: true });
  writeFileSync(absolutePath, csv, 'utf-8');

  logger.info('Farms exported', { count: farms.length, path: absolutePath });
  return farms.length;
}

async function main() {
  const { values } = parseArgs({ args: process.argv.slice(2), options: CLI_CONFIGS.export.options });
  exitOnHelp(values.help, CLI_CONFIGS.export);
  const out = requireOption(values.out, 'out', CLI_CONFIGS.export);

  const storage = await createStorage();
  try {
    const count = await exportFarms(storage, out);
    console.log(`Exported ${count} farms to ${out}`);
  } catch (error) {
    logger.error('Export failed', { error });
    process.exitCode = 1;
  } finally {
    await storage.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  installProcessHandlers();
  void main();
}
