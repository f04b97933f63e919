#!/usr/bin/env node

/**
 * Pipeline report runner: aggregate statistics or the top farms by score
 */

import { config } from 'dotenv';
import { parseArgs } from 'util';
import { createStorage } from '../storage/index.js';
import { logger } from '../util/logger.js';
import { valueOf } from '../util/field.js';
import type { CanonicalFarm, DataRun, PipelineStats } from '../types.js';
import { CLI_CONFIGS, exitOnHelp, installProcessHandlers, parsePositiveInt } from '../util/cli.js';

// Load environment variables
config();

const DEFAULT_RECENT_RUNS = 10;

export function formatStats(stats: PipelineStats, runs: DataRun[]): string {
  const lines = [
    'Pipeline statistics',
    `  Total farms:   ${stats.total_farms}`,
    `  Scored farms:  ${stats.scored_farms}`,
    `  Average score: ${stats.average_score}`,
    '',
    'By status:',
    ...Object.entries(stats.by_status)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([status, count]) => `  ${status.padEnd(16)} ${count}`),
    '',
    'By county:',
    ...Object.entries(stats.by_county).map(([county, count]) => `  ${county.padEnd(16)} ${count}`),
  ];

  if (runs.length > 0) {
    lines.push('', 'Recent runs:');
    for (const run of runs) {
      const { found, new: created, updated, failed } = run.stats;
      lines.push(
        `  #${run.run_id} ${run.source_id} ${run.status} ${run.started_at}` +
          ` found=${found} new=${created} updated=${updated} failed=${failed}` +
          (run.error_message ? ` error="${run.error_message}"` : '')
      );
    }
  }

  return lines.join('\n');
}

export function formatTopFarms(farms: CanonicalFarm[]): string {
  if (farms.length === 0) {
    return 'No farms found';
  }

  return farms
    .map((farm, index) => {
      const name = valueOf(farm.attributes.name) ?? '(unnamed)';
      const county = valueOf(farm.attributes.county) ?? 'Unknown';
      const aeu = valueOf(farm.attributes.animal_equivalent_units);
      const phone = valueOf(farm.attributes.phone);
      return [
        `${String(index + 1).padStart(3)}. [${farm.lead_score}] ${name} (${county})`,
        aeu !== undefined ? `AEU ${aeu}` : undefined,
        phone !== undefined ? `phone ${phone}` : undefined,
      ]
        .filter(part => part !== undefined)
        .join(' | ');
    })
    .join('\n');
}

async function main() {
  const { values } = parseArgs({ args: process.argv.slice(2), options: CLI_CONFIGS.report.options });
  exitOnHelp(values.help, CLI_CONFIGS.report);

  const storage = await createStorage();
  try {
    if (values.top !== undefined) {
      const limit = parsePositiveInt(values.top, 'top', 20);
      console.log(formatTopFarms(await storage.getTopFarms(limit)));
    } else {
      const runsLimit = parsePositiveInt(values.runs, 'runs', DEFAULT_RECENT_RUNS);
      const [stats, runs] = await Promise.all([storage.getStats(), storage.getRecentRuns(runsLimit)]);
      console.log(formatStats(stats, runs));
    }
  } catch (error) {
    logger.error('Report failed', { error });
    process.exitCode = 1;
  } finally {
    await storage.close();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  installProcessHandlers();
  void main();
}
