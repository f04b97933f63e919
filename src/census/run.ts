#!/usr/bin/env node

/**
 * County census statistics runner
 */

import { config } from 'dotenv';
import { parseArgs } from 'util';
import { loadPipelineConfig, getDataSourceSeeds } from '../config/index.js';
import { createStorage } from '../storage/index.js';
import { logger } from '../util/logger.js';
import { runCensus } from './collect.js';
import { CLI_CONFIGS, exitOnHelp, installProcessHandlers, parsePositiveInt } from '../util/cli.js';

// Load environment variables
config();

async function main() {
  const { values } = parseArgs({ args: process.argv.slice(2), options: CLI_CONFIGS.census.options });
  exitOnHelp(values.help, CLI_CONFIGS.census);

  const pipelineConfig = loadPipelineConfig();
  const census = pipelineConfig.census;
  if (!census) {
    logger.error('No census section in pipeline configuration');
    process.exit(1);
  }
  const year = parsePositiveInt(values.year, 'year', census.year);

  const storage = await createStorage();
  try {
    await storage.syncDataSources(getDataSourceSeeds(pipelineConfig));
    const { result, counties } = await runCensus(storage, census, { year });
    if (result.status === 'failed') {
      process.exitCode = 1;
      return;
    }

    console.log(`\nPA poultry by county (${year}):`);
    for (const county of counties.slice(0, 15)) {
      const marker = county.is_target ? '*' : ' ';
      console.log(`${marker} ${String(county.rank).padStart(2)}. ${county.county.padEnd(16)} ${county.total_birds.toLocaleString('en-US')} birds, ${county.num_operations} operations`);
    }
    console.log(`\nTarget counties: ${counties.filter(c => c.is_target).map(c => c.county).join(', ') || 'none'}`);
  } catch (error) {
    logger.error('Census collection failed', { error });
    process.exitCode = 1;
  } finally {
    await storage.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  installProcessHandlers();
  void main();
}
