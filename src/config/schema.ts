/**
 * Zod schemas for validating the pipeline configuration file
 */

import { z } from 'zod';

/**
 * Adapter wiring for a source; sources without one are not run automatically
 */
export const AdapterConfigSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('dep_cafo_csv'),
    url: z.string().url().describe('CSV export URL of the CAFO permit report'),
    timeout_ms: z.number().int().positive().default(60000),
  }).strict(),
  z.object({
    kind: z.literal('manual_csv'),
    path: z.string().min(1).describe('CSV file of manually researched farms'),
  }).strict(),
  z.object({
    kind: z.literal('property_csv'),
    path: z.string().min(1).describe('CSV export of county assessor parcels'),
  }).strict(),
]);

/**
 * Schema for one source in the precedence table
 */
export const SourceConfigSchema = z.object({
  name: z.string().min(1).describe('Human readable source name'),
  type: z.enum(['scrape', 'api', 'manual', 'enrichment']),
  priority: z.number().int().positive().describe('Higher wins field-level merge conflicts'),
  confidence: z.number().min(0).max(1).describe('Trust in values contributed by this source'),
  enabled: z.boolean().default(true),
  adapter: AdapterConfigSchema.optional(),
}).strict();

export const CensusConfigSchema = z.object({
  base_url: z.string().url(),
  api_key: z.string().optional(),
  year: z.number().int().min(1997),
  state_alpha: z.string().length(2).default('PA'),
  min_target_birds: z.number().int().nonnegative().default(500000),
}).strict();

/**
 * Schema for the whole pipeline configuration
 */
export const PipelineConfigSchema = z.object({
  jurisdiction: z.object({
    state: z.string().length(2).describe('Default state abbreviation for records without one'),
    state_name: z.string().min(1),
  }).strict(),
  matching: z.object({
    fuzzy_threshold: z.number().gt(0).max(1).default(0.85),
  }).strict().default({}),
  sources: z.record(z.string().regex(/^[a-z][a-z0-9_]*$/), SourceConfigSchema)
    .describe('Source precedence table keyed by source_id'),
  census: CensusConfigSchema.optional(),
  daily: z.object({
    concurrency: z.number().int().positive().default(2),
  }).strict().default({}),
}).strict();

/**
 * Priorities decide merge conflicts, so two sources may not share one
 */
export function validateSourcePriorities(config: PipelineConfig): string[] {
  const errors: string[] = [];
  const seen = new Map<number, string>();

  for (const [sourceId, source] of Object.entries(config.sources)) {
    const other = seen.get(source.priority);
    if (other) {
      errors.push(`Sources '${other}' and '${sourceId}' share priority ${source.priority}`);
    } else {
      seen.set(source.priority, sourceId);
    }
  }

  if (seen.size === 0) {
    errors.push('At least one source must be configured');
  }

  return errors;
}

/**
 * Comprehensive validation of the pipeline configuration
 */
export function validatePipelineConfig(config: unknown): {
  success: boolean;
  data?: PipelineConfig;
  errors: string[];
} {
  const parsed = PipelineConfigSchema.safeParse(config);

  if (!parsed.success) {
    return {
      success: false,
      errors: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
    };
  }

  const priorityErrors = validateSourcePriorities(parsed.data);
  if (priorityErrors.length > 0) {
    return {
      success: false,
      errors: priorityErrors,
    };
  }

  return {
    success: true,
    data: parsed.data,
    errors: [],
  };
}

/**
 * Type exports for use in other modules
 */
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type AdapterConfig = z.infer<typeof AdapterConfigSchema>;
export type CensusConfig = z.infer<typeof CensusConfigSchema>;
