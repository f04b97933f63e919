/**
 * Entity resolution: decide which canonical farm, if any, a normalized record describes
 */

import type { CanonicalFarm, FieldValue, NormalizedAttributes } from '../types.js';
import { defaultSimilarity, nameKey, type SimilarityFn } from './similarity.js';

export const DEFAULT_FUZZY_THRESHOLD = 0.85;

export type MatchRule = 'exact_key' | 'strong' | 'fuzzy';

export type MatchResult =
  | { kind: 'existing'; farmId: number; rule: MatchRule; similarity: number }
  | { kind: 'none' };

/**
 * Candidates for one record. `linked` is the farm already linked to the
 * record's (source_id, source_external_id); `farms` is the county-scoped set.
 */
export interface CandidatePool {
  linked?: CanonicalFarm;
  farms: readonly CanonicalFarm[];
}

export interface MatchOptions {
  threshold?: number;
  similarity?: SimilarityFn;
}

interface ScoredCandidate {
  farm: CanonicalFarm;
  score: number;
}

/**
 * Match a candidate against the pool: exact key, then strong, then fuzzy.
 * The result does not depend on the order of `pool.farms`.
 */
export function match(
  candidate: NormalizedAttributes,
  pool: CandidatePool,
  options: MatchOptions = {}
): MatchResult {
  if (pool.linked) {
    return { kind: 'existing', farmId: pool.linked.farm_id, rule: 'exact_key', similarity: 1 };
  }

  const { name, county, state } = candidate;
  if (name.kind === 'unknown' || county.kind === 'unknown') {
    return { kind: 'none' };
  }

  const sameCounty = pool.farms.filter(farm => knownEquals(farm.attributes.county, county.value));

  const key = nameKey(name.value);
  const strong = sameCounty
    .filter(farm =>
      state.kind === 'known' &&
      knownEquals(farm.attributes.state, state.value) &&
      farm.attributes.name.kind === 'known' &&
      nameKey(farm.attributes.name.value) === key
    )
    .map(farm => ({ farm, score: 1 }));

  const strongWinner = pickBest(strong);
  if (strongWinner) {
    return { kind: 'existing', farmId: strongWinner.farm.farm_id, rule: 'strong', similarity: 1 };
  }

  const threshold = options.threshold ?? DEFAULT_FUZZY_THRESHOLD;
  const similarity = options.similarity ?? defaultSimilarity;

  const fuzzy: ScoredCandidate[] = [];
  for (const farm of sameCounty) {
    const farmName = farm.attributes.name;
    if (farmName.kind === 'unknown') continue;
    const score = similarity(name.value, farmName.value);
    if (score >= threshold) {
      fuzzy.push({ farm, score });
    }
  }

  const fuzzyWinner = pickBest(fuzzy);
  if (fuzzyWinner) {
    return {
      kind: 'existing',
      farmId: fuzzyWinner.farm.farm_id,
      rule: 'fuzzy',
      similarity: fuzzyWinner.score,
    };
  }

  return { kind: 'none' };
}

function knownEquals(field: FieldValue<string>, value: string): boolean {
  return field.kind === 'known' && field.value === value;
}

/**
 * Highest score, then most recently updated, then lowest farm_id
 */
function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.farm.updated_seq !== b.farm.updated_seq) return b.farm.updated_seq - a.farm.updated_seq;
  return a.farm.farm_id - b.farm.farm_id;
}

function pickBest(candidates: ScoredCandidate[]): ScoredCandidate | undefined {
  return [...candidates].sort(compareCandidates)[0];
}
