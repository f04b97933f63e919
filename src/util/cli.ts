/**
 * Shared CLI argument configurations and helpers
 */

import { logger } from './logger.js';

export interface CliCommand {
  help: string;
}

/**
 * Option tables and help text per command, passed to util.parseArgs
 */
export const CLI_CONFIGS = {
  ingest: {
    options: {
      source: { type: 'string', short: 's' },
      file: { type: 'string', short: 'f' },
      help: { type: 'boolean', short: 'h' },
    },
    help: `
Usage: npm run ingest -- --source <source_id> [--file <csv>]

Options:
  -s, --source <id>    Source id from configs/pipeline.yaml (required)
  -f, --file <csv>     CSV file to import instead of the configured path
  -h, --help           Show this help message

Examples:
  npm run ingest -- --source dep_cafo
  npm run ingest -- --source manual_research --file data/manual/lancaster.csv
    `,
  },

  daily: {
    options: {
      concurrency: { type: 'string', short: 'c' },
      help: { type: 'boolean', short: 'h' },
    },
    help: `
Usage: npm run daily -- [--concurrency <n>]

Runs every enabled source that has an adapter, collects county census
statistics when NASS_API_KEY is set, then rescores all farms.

Options:
  -c, --concurrency <n>  Sources run at once (default from config)
  -h, --help             Show this help message
    `,
  },

  score: {
    options: {
      help: { type: 'boolean', short: 'h' },
    },
    help: `
Usage: npm run score

Recomputes the lead score of every farm.
    `,
  },

  report: {
    options: {
      top: { type: 'string', short: 't' },
      runs: { type: 'string', short: 'r' },
      help: { type: 'boolean', short: 'h' },
    },
    help: `
Usage: npm run report -- [--top <n>] [--runs <n>]

Options:
  -t, --top <n>   Print the top N farms by lead score instead of statistics
  -r, --runs <n>  Number of recent runs to list (default: 10)
  -h, --help      Show this help message
    `,
  },

  export: {
    options: {
      out: { type: 'string', short: 'o' },
      help: { type: 'boolean', short: 'h' },
    },
    help: `
Usage: npm run export -- --out <csv>

Options:
  -o, --out <csv>  Output CSV file (required)
  -h, --help       Show this help message
    `,
  },

  census: {
    options: {
      year: { type: 'string', short: 'y' },
      help: { type: 'boolean', short: 'h' },
    },
    help: `
Usage: npm run census -- [--year <yyyy>]

Collects county poultry statistics from USDA NASS Quick Stats (requires NASS_API_KEY).

Options:
  -y, --year <yyyy>  Census year (default from config)
  -h, --help         Show this help message
    `,
  },
} as const;

/**
 * Print the command's help and exit when --help was given
 */
export function exitOnHelp(help: boolean | undefined, command: CliCommand): void {
  if (help) {
    console.log(command.help);
    process.exit(0);
  }
}

/**
 * Exit with the command's help when a required option is missing
 */
export function requireOption(value: string | undefined, option: string, command: CliCommand): string {
  if (!value) {
    console.error(`Error: --${option} is required`);
    console.log(command.help);
    process.exit(1);
  }
  return value;
}

/**
 * Parse a positive integer option, falling back when absent
 */
export function parsePositiveInt(value: string | undefined, option: string, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`--${option} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Process-level handlers shared by every command entry point
 */
export function installProcessHandlers(): void {
  process.on('unhandledRejection', (reason, promise) => {
    logger.error('Unhandled promise rejection', { reason, promise: String(promise) });
    process.exit(1);
  });

  process.on('uncaughtException', error => {
    logger.error('Uncaught exception', { error });
    process.exit(1);
  });
}
