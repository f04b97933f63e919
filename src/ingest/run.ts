#!/usr/bin/env node

/**
 * Single-source ingestion runner
 */

import { config } from 'dotenv';
import { parseArgs } from 'util';
import { loadPipelineConfig, getSourceConfig, getDataSourceSeeds } from '../config/index.js';
import { createStorage } from '../storage/index.js';
import { createAdapter } from '../adapters/index.js';
import { ingestDepsFromConfig, runSource } from './orchestrator.js';
import { logger } from '../util/logger.js';
import { CLI_CONFIGS, exitOnHelp, installProcessHandlers, requireOption } from '../util/cli.js';

// Load environment variables
config();

async function main() {
  const { values } = parseArgs({ args: process.argv.slice(2), options: CLI_CONFIGS.ingest.options });
  exitOnHelp(values.help, CLI_CONFIGS.ingest);
  const sourceId = requireOption(values.source, 'source', CLI_CONFIGS.ingest);

  const storage = await createStorage();
  try {
    const pipelineConfig = loadPipelineConfig();
    const adapter = createAdapter(sourceId, getSourceConfig(pipelineConfig, sourceId), { file: values.file });

    await storage.syncDataSources(getDataSourceSeeds(pipelineConfig));
    const result = await runSource(adapter, ingestDepsFromConfig(pipelineConfig, storage));

    console.log(`\n${sourceId}: ${result.status}`);
    console.log(`  Found:     ${result.stats.found}`);
    console.log(`  New:       ${result.stats.new}`);
    console.log(`  Updated:   ${result.stats.updated}`);
    console.log(`  Unchanged: ${result.stats.unchanged}`);
    console.log(`  Failed:    ${result.stats.failed}`);
    if (result.error) {
      console.log(`  Error:     ${result.error}`);
    }

    process.exitCode = result.status === 'success' ? 0 : 1;
  } catch (error) {
    logger.error('Ingestion failed', { sourceId, error });
    process.exitCode = 1;
  } finally {
    await storage.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  installProcessHandlers();
  void main();
}
