#!/usr/bin/env node

/**
 * Lead scoring runner: recompute every farm's score
 */

import { config } from 'dotenv';
import { parseArgs } from 'util';
import { createStorage } from '../storage/index.js';
import { logger } from '../util/logger.js';
import { rescoreAll } from './rescore.js';
import { CLI_CONFIGS, exitOnHelp, installProcessHandlers } from '../util/cli.js';

// Load environment variables
config();

async function main() {
  const { values } = parseArgs({ args: process.argv.slice(2), options: CLI_CONFIGS.score.options });
  exitOnHelp(values.help, CLI_CONFIGS.score);

  const storage = await createStorage();
  const done = logger.timer('Rescoring');
  try {
    const result = await rescoreAll(storage);
    done();
    console.log(`Scored ${result.scored} farms (${result.changed} changed)`);
  } catch (error) {
    logger.error('Scoring failed', { error });
    process.exitCode = 1;
  } finally {
    await storage.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  installProcessHandlers();
  void main();
}
