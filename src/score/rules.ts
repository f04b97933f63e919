/**
 * Additive lead scoring rules for canonical farms
 */

import type { CanonicalFarm } from '../types.js';
import { parseDate, isWithinDays } from '../util/dates.js';

export const MAX_SCORE = 100;
export const VERIFIED_WINDOW_DAYS = 90;

export interface ScoringRule {
  name: string;
  description: string;
  points: (farm: CanonicalFarm, now: Date) => number;
}

export interface ScoreLine {
  rule: string;
  points: number;
}

export interface ScoreBreakdown {
  lines: ScoreLine[];
  total: number;
}

/**
 * Size bands are exclusive: only the highest matching band scores
 */
export const farmSize: ScoringRule = {
  name: 'Farm Size',
  description: 'Animal equivalent units: 1000+ => 30, 500-999 => 20, 300-499 => 10',
  points: farm => {
    const aeu = farm.attributes.animal_equivalent_units;
    if (aeu.kind === 'unknown') return 0;
    if (aeu.value >= 1000) return 30;
    if (aeu.value >= 500) return 20;
    if (aeu.value >= 300) return 10;
    return 0;
  },
};

export const hasPhone: ScoringRule = {
  name: 'Phone',
  description: 'Phone number known',
  points: farm => (farm.attributes.phone.kind === 'known' ? 15 : 0),
};

export const hasEmail: ScoringRule = {
  name: 'Email',
  description: 'Email address known',
  points: farm => (farm.attributes.email.kind === 'known' ? 15 : 0),
};

export const hasOwner: ScoringRule = {
  name: 'Owner',
  description: 'Owner name known',
  points: farm => (farm.attributes.owner_name.kind === 'known' ? 10 : 0),
};

export const hasRoofEstimate: ScoringRule = {
  name: 'Roof Estimate',
  description: 'Estimated roof square footage known',
  points: farm => (farm.attributes.estimated_roof_sqft.kind === 'known' ? 10 : 0),
};

export const recentlyVerified: ScoringRule = {
  name: 'Recently Verified',
  description: `Verified within the last ${VERIFIED_WINDOW_DAYS} days`,
  points: (farm, now) => {
    const verified = parseDate(farm.last_verified);
    return verified && isWithinDays(verified, VERIFIED_WINDOW_DAYS, now) ? 10 : 0;
  },
};

export const dataConfidence: ScoringRule = {
  name: 'Data Confidence',
  description: 'Data confidence scaled to 0-10',
  points: farm => Math.round(Math.min(1, Math.max(0, farm.data_confidence)) * 10),
};

/**
 * All scoring rules in evaluation order
 */
export const SCORING_RULES: readonly ScoringRule[] = [
  farmSize,
  hasPhone,
  hasEmail,
  hasOwner,
  hasRoofEstimate,
  recentlyVerified,
  dataConfidence,
];

/**
 * Points per rule and the capped total
 */
export function scoreBreakdown(farm: CanonicalFarm, now: Date = new Date()): ScoreBreakdown {
  const lines = SCORING_RULES.map(rule => ({ rule: rule.name, points: rule.points(farm, now) }));
  const sum = lines.reduce((total, line) => total + line.points, 0);
  return { lines, total: Math.min(sum, MAX_SCORE) };
}

/**
 * Lead score in [0, 100]
 */
export function scoreFarm(farm: CanonicalFarm, now: Date = new Date()): number {
  return scoreBreakdown(farm, now).total;
}
