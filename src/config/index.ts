/**
 * Configuration loader and manager
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { validatePipelineConfig, type PipelineConfig } from './schema.js';
import { ConfigError, type DataSourceSeed, type SourcePriorityTable } from '../types.js';
import { logger } from '../util/logger.js';

const DEFAULT_CONFIG_PATH = 'configs/pipeline.yaml';

/**
 * Cache for loaded configurations, keyed by absolute path
 */
const configCache = new Map<string, PipelineConfig>();

/**
 * Load and validate the pipeline configuration from a YAML file
 */
export function loadPipelineConfig(
  configPath: string = process.env.PIPELINE_CONFIG || DEFAULT_CONFIG_PATH
): PipelineConfig {
  const absolutePath = resolve(process.cwd(), configPath);

  const cached = configCache.get(absolutePath);
  if (cached) {
    return cached;
  }

  logger.debug(`Loading config from ${absolutePath}`);

  let yamlContent: string;
  try {
    yamlContent = readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${absolutePath}`);
    }
    throw new ConfigError(`Failed to read configuration '${absolutePath}': ${error}`);
  }

  const config = parsePipelineConfig(yamlContent, absolutePath);
  configCache.set(absolutePath, config);

  logger.info('Loaded pipeline configuration', {
    sources: Object.keys(config.sources),
    fuzzyThreshold: config.matching.fuzzy_threshold,
  });

  return config;
}

/**
 * Parse, substitute environment variables and validate YAML configuration text
 */
export function parsePipelineConfig(
  yamlContent: string,
  origin: string = 'inline',
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  let rawConfig: unknown;
  try {
    rawConfig = parseYaml(yamlContent);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in '${origin}': ${error}`);
  }

  const validation = validatePipelineConfig(substituteEnvVars(rawConfig, env));

  if (!validation.success || !validation.data) {
    throw new ConfigError(
      `Invalid pipeline configuration '${origin}':\n${validation.errors.join('\n')}`
    );
  }

  return validation.data;
}

/**
 * Clear configuration cache
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Configuration cache cleared');
}

/**
 * Substitute ${VAR_NAME} patterns in every string of a parsed YAML document
 */
export function substituteEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (match: string, varName: string) => {
      const replacement = env[varName];
      if (replacement === undefined) {
        logger.warn(`Environment variable not found: ${varName}`);
        return match;
      }
      return replacement;
    });
  }

  if (Array.isArray(value)) {
    return value.map(item => substituteEnvVars(item, env));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = substituteEnvVars(entry, env);
    }
    return result;
  }

  return value;
}

/**
 * Source precedence table consumed by the merge engine
 */
export function getSourcePriorities(config: PipelineConfig): SourcePriorityTable {
  const table: Record<string, { priority: number; confidence: number }> = {};
  for (const [sourceId, source] of Object.entries(config.sources)) {
    table[sourceId] = { priority: source.priority, confidence: source.confidence };
  }
  return table;
}

/**
 * Rows for the data_sources table
 */
export function getDataSourceSeeds(config: PipelineConfig): DataSourceSeed[] {
  return Object.entries(config.sources).map(([sourceId, source]) => ({
    source_id: sourceId,
    name: source.name,
    source_type: source.type,
    priority: source.priority,
  }));
}

/**
 * Get source configuration by id
 */
export function getSourceConfig(config: PipelineConfig, sourceId: string) {
  const source = config.sources[sourceId];
  if (!source) {
    throw new ConfigError(
      `Source '${sourceId}' not found; configured sources: ${Object.keys(config.sources).join(', ')}`
    );
  }
  return source;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Export types for use in other modules
 */
export type { PipelineConfig, SourceConfig, AdapterConfig, CensusConfig } from './schema.js';
