import { describe, it, expect } from 'vitest';
import { match } from '../../src/match/matcher.js';
import { attrs, makeFarm } from '../helpers/farms.js';

describe('Matcher', () => {
  const candidate = attrs({ name: 'Zook Poultry Farm', county: 'Lancaster', state: 'PA' });

  describe('exact key', () => {
    it('should prefer the farm linked to the source key', () => {
      const linked = makeFarm({ name: 'Something Else', county: 'York' }, { farm_id: 5 });
      const other = makeFarm({ name: 'Zook Poultry Farm', county: 'Lancaster', state: 'PA' }, { farm_id: 6 });

      expect(match(candidate, { linked, farms: [other] })).toEqual({
        kind: 'existing',
        farmId: 5,
        rule: 'exact_key',
        similarity: 1,
      });
    });
  });

  describe('strong match', () => {
    it('should match equal names in the same county and state', () => {
      const farm = makeFarm({ name: 'ZOOK  poultry farm', county: 'Lancaster', state: 'PA' }, { farm_id: 7 });

      expect(match(candidate, { farms: [farm] })).toEqual({
        kind: 'existing',
        farmId: 7,
        rule: 'strong',
        similarity: 1,
      });
    });

    it('should break ties by most recent update, then lowest id', () => {
      const older = makeFarm({ name: 'Zook Poultry Farm', county: 'Lancaster', state: 'PA' }, { farm_id: 2, updated_seq: 3 });
      const newer = makeFarm({ name: 'Zook Poultry Farm', county: 'Lancaster', state: 'PA' }, { farm_id: 9, updated_seq: 5 });
      const twin = makeFarm({ name: 'Zook Poultry Farm', county: 'Lancaster', state: 'PA' }, { farm_id: 4, updated_seq: 5 });

      const result = match(candidate, { farms: [older, newer, twin] });
      expect(result).toMatchObject({ kind: 'existing', farmId: 4, rule: 'strong' });
    });

    it('should not depend on pool order', () => {
      const farms = [
        makeFarm({ name: 'Zook Poultry Farm', county: 'Lancaster', state: 'PA' }, { farm_id: 3, updated_seq: 8 }),
        makeFarm({ name: 'Zook Poultry Farms', county: 'Lancaster', state: 'PA' }, { farm_id: 1, updated_seq: 9 }),
        makeFarm({ name: 'Zook Poultry Farm', county: 'Lancaster', state: 'PA' }, { farm_id: 2, updated_seq: 8 }),
      ];

      const forward = match(candidate, { farms });
      const reversed = match(candidate, { farms: [...farms].reverse() });
      expect(forward).toEqual(reversed);
      expect(forward).toMatchObject({ farmId: 2, rule: 'strong' });
    });
  });

  describe('fuzzy match', () => {
    it('should match similar names above the threshold', () => {
      const farm = makeFarm({ name: 'Zook Poultry Farms', county: 'Lancaster', state: 'PA' }, { farm_id: 11 });

      const result = match(candidate, { farms: [farm] });
      expect(result).toMatchObject({ kind: 'existing', farmId: 11, rule: 'fuzzy' });
      if (result.kind === 'existing') {
        expect(result.similarity).toBeCloseTo(1 - 1 / 18, 10);
      }
    });

    it('should fall back to fuzzy when the state differs', () => {
      const farm = makeFarm({ name: 'Zook Poultry Farm', county: 'Lancaster', state: 'MD' }, { farm_id: 12 });

      expect(match(candidate, { farms: [farm] })).toMatchObject({ farmId: 12, rule: 'fuzzy', similarity: 1 });
    });

    it('should honor a custom threshold and similarity function', () => {
      const farm = makeFarm({ name: 'Valley View Farm', county: 'Lancaster', state: 'PA' }, { farm_id: 13 });
      const similarity = () => 0.9;

      expect(match(candidate, { farms: [farm] }, { threshold: 0.95, similarity })).toEqual({ kind: 'none' });
      expect(match(candidate, { farms: [farm] }, { threshold: 0.9, similarity })).toMatchObject({
        farmId: 13,
        rule: 'fuzzy',
        similarity: 0.9,
      });
    });
  });

  describe('no match', () => {
    it('should never match across counties', () => {
      const farm = makeFarm({ name: 'Zook Poultry Farm', county: 'York', state: 'PA' });
      expect(match(candidate, { farms: [farm] })).toEqual({ kind: 'none' });
    });

    it('should not match when the candidate county is unknown', () => {
      const farm = makeFarm({ name: 'Zook Poultry Farm', county: 'Lancaster', state: 'PA' });
      const noCounty = attrs({ name: 'Zook Poultry Farm', state: 'PA' });
      expect(match(noCounty, { farms: [farm] })).toEqual({ kind: 'none' });
    });

    it('should not match dissimilar names', () => {
      const farm = makeFarm({ name: 'Hillside Acres', county: 'Lancaster', state: 'PA' });
      expect(match(candidate, { farms: [farm] })).toEqual({ kind: 'none' });
    });

    it('should return none for an empty pool', () => {
      expect(match(candidate, { farms: [] })).toEqual({ kind: 'none' });
    });
  });
});
