/**
 * Field-level merge of a normalized record into a canonical farm.
 * Pure: persistence and provenance are the orchestrator's job.
 */

import type {
  CanonicalFarm,
  FarmField,
  FieldSource,
  FieldSources,
  FieldValue,
  NewFarm,
  NormalizedAttributes,
  SourcePolicy,
  SourcePriorityTable,
} from '../types.js';
import { ConfigError } from '../types.js';
import { FARM_FIELDS, sameValue } from '../util/field.js';
import { ageInDays, compareTimestamps, latestTimestamp, requireDate } from '../util/dates.js';

export const NEW_FARM_CONFIDENCE = 0.5;

// Contributions lose half their weight per year of age
const CONFIDENCE_HALF_LIFE_DAYS = 365;

export interface MergeContext {
  sourceId: string;
  observedAt: string;
  priorities: SourcePriorityTable;
}

export interface MergeOutcome {
  farm: CanonicalFarm;
  changed: boolean;
  changedFields: FarmField[];
}

type MutableAttributes = { -readonly [K in FarmField]: NormalizedAttributes[K] };

/**
 * Look up a source's policy; a source missing from the table is a configuration error
 */
export function policyFor(priorities: SourcePriorityTable, sourceId: string): SourcePolicy {
  const policy = priorities[sourceId];
  if (!policy) {
    throw new ConfigError(`Source '${sourceId}' has no entry in the source priority table`);
  }
  return policy;
}

/**
 * Merge incoming attributes into an existing farm, field by field
 */
export function mergeFarm(
  existing: CanonicalFarm,
  incoming: NormalizedAttributes,
  context: MergeContext
): MergeOutcome {
  const incomingPolicy = policyFor(context.priorities, context.sourceId);
  const contribution: FieldSource = { source_id: context.sourceId, observed_at: context.observedAt };

  const attributes: MutableAttributes = { ...existing.attributes };
  const fieldSources: FieldSources = { ...existing.field_sources };
  const changedFields: FarmField[] = [];

  for (const field of FARM_FIELDS) {
    const take = shouldTake(
      existing.attributes[field],
      existing.field_sources[field],
      incoming[field],
      contribution,
      incomingPolicy,
      context.priorities
    );
    if (take) {
      assignField(attributes, incoming, field);
      fieldSources[field] = contribution;
      changedFields.push(field);
    }
  }

  if (changedFields.length === 0) {
    return { farm: existing, changed: false, changedFields };
  }

  return {
    farm: {
      ...existing,
      attributes,
      field_sources: fieldSources,
      data_confidence: computeConfidence(attributes, fieldSources, context.priorities),
      last_verified: latestTimestamp(existing.last_verified, context.observedAt),
    },
    changed: true,
    changedFields,
  };
}

function assignField<K extends FarmField>(
  target: MutableAttributes,
  source: NormalizedAttributes,
  field: K
): void {
  target[field] = source[field];
}

function shouldTake(
  current: FieldValue<unknown>,
  currentSource: FieldSource | undefined,
  incoming: FieldValue<unknown>,
  contribution: FieldSource,
  incomingPolicy: SourcePolicy,
  priorities: SourcePriorityTable
): boolean {
  if (incoming.kind === 'unknown') return false;
  if (current.kind === 'unknown') return true;
  if (sameValue(current, incoming)) return false;

  // Values without a recorded contribution rank below every configured source
  if (!currentSource) return true;

  const currentPriority = policyFor(priorities, currentSource.source_id).priority;
  if (incomingPolicy.priority !== currentPriority) {
    return incomingPolicy.priority > currentPriority;
  }
  return compareTimestamps(contribution.observed_at, currentSource.observed_at) > 0;
}

/**
 * Weighted confidence over known fields: source confidence weighted by
 * source priority, decayed by the age of each contribution relative to the newest
 */
export function computeConfidence(
  attributes: NormalizedAttributes,
  fieldSources: FieldSources,
  priorities: SourcePriorityTable
): number {
  const contributions: Array<{ policy: SourcePolicy; observedAt: Date }> = [];

  for (const field of FARM_FIELDS) {
    const source = fieldSources[field];
    if (attributes[field].kind === 'known' && source) {
      contributions.push({
        policy: policyFor(priorities, source.source_id),
        observedAt: requireDate(source.observed_at, `observed_at of ${field}`),
      });
    }
  }

  if (contributions.length === 0) {
    return NEW_FARM_CONFIDENCE;
  }

  const newest = new Date(Math.max(...contributions.map(c => c.observedAt.getTime())));
  let weighted = 0;
  let totalWeight = 0;
  for (const { policy, observedAt } of contributions) {
    const weight = policy.priority * Math.pow(0.5, ageInDays(observedAt, newest) / CONFIDENCE_HALF_LIFE_DAYS);
    weighted += weight * policy.confidence;
    totalWeight += weight;
  }

  if (totalWeight === 0) {
    return NEW_FARM_CONFIDENCE;
  }
  return Math.min(1, Math.max(0, weighted / totalWeight));
}

/**
 * Initial state of a farm created from a record that matched nothing
 */
export function createFarm(incoming: NormalizedAttributes, context: Omit<MergeContext, 'priorities'>): NewFarm {
  const fieldSources: FieldSources = {};
  for (const field of FARM_FIELDS) {
    if (incoming[field].kind === 'known') {
      fieldSources[field] = { source_id: context.sourceId, observed_at: context.observedAt };
    }
  }

  return {
    attributes: incoming,
    field_sources: fieldSources,
    data_confidence: NEW_FARM_CONFIDENCE,
    last_verified: context.observedAt,
    lead_score: 0,
    lead_status: 'new',
    is_active: true,
  };
}
