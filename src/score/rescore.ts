/**
 * Recompute and persist lead scores for every farm
 */

import type { Storage } from '../types.js';
import { logger } from '../util/logger.js';
import { scoreFarm } from './rules.js';

export interface RescoreResult {
  scored: number;
  changed: number;
}

export async function rescoreAll(storage: Storage, now: Date = new Date()): Promise<RescoreResult> {
  const farms = await storage.listFarms();
  let changed = 0;

  for (const farm of farms) {
    const score = scoreFarm(farm, now);
    // A farm merged since it was listed is scored by the run that merged it
    if (score !== farm.lead_score && (await storage.setScore(farm.farm_id, score, farm.version))) {
      changed++;
    }
  }

  logger.info('Rescored farms', { scored: farms.length, changed });
  return { scored: farms.length, changed };
}
