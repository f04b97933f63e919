import { describe, it, expect } from 'vitest';
import {
  normalize,
  titleCase,
  normalizeCounty,
  normalizeState,
  normalizeZip,
  parseLocaleNumber,
  normalizeCount,
  normalizeAeu,
  normalizePhone,
  normalizeEmail,
  normalizeOperationType,
  normalizeIntegrator,
} from '../../src/normalize/normalizer.js';
import { UNKNOWN, known } from '../../src/util/field.js';

describe('Normalizer', () => {
  describe('normalize', () => {
    it('should map a sparse field map onto every canonical attribute', () => {
      const result = normalize({
        name: '  STOLTZFUS   POULTRY FARM LLC ',
        county: 'LANCASTER COUNTY',
        address: '123 north main street,',
        phone: '(717) 555-0142',
      });

      expect(result.name).toEqual(known('Stoltzfus Poultry Farm LLC'));
      expect(result.county).toEqual(known('Lancaster'));
      expect(result.address).toEqual(known('123 N MAIN ST'));
      expect(result.phone).toEqual(known('7175550142'));
      expect(result.state).toEqual(known('PA'));
      expect(result.email).toEqual(UNKNOWN);
      expect(result.animal_equivalent_units).toEqual(UNKNOWN);
      expect(Object.keys(result)).toHaveLength(15);
    });

    it('should treat blank and whitespace-only values as unknown', () => {
      const result = normalize({ name: '   ', city: '', owner_name: null });

      expect(result.name).toEqual(UNKNOWN);
      expect(result.city).toEqual(UNKNOWN);
      expect(result.owner_name).toEqual(UNKNOWN);
    });

    it('should honor a configured default state', () => {
      const result = normalize({ name: 'Test Farm' }, { defaultState: 'MD', stateName: 'Maryland' });
      expect(result.state).toEqual(known('MD'));
    });
  });

  describe('titleCase', () => {
    it('should title-case all-upper and all-lower text', () => {
      expect(titleCase('HILLSIDE ACRES')).toBe('Hillside Acres');
      expect(titleCase('hillside acres')).toBe('Hillside Acres');
    });

    it('should keep business suffixes upper-case', () => {
      expect(titleCase('ZOOK BROTHERS II LLC')).toBe('Zook Brothers II LLC');
    });

    it('should capitalize after hyphens', () => {
      expect(titleCase('MILLER-KING FARMS')).toBe('Miller-King Farms');
    });

    it('should leave mixed-case text alone', () => {
      expect(titleCase('McDonald Farms')).toBe('McDonald Farms');
    });
  });

  describe('normalizeCounty', () => {
    it('should resolve canonical county spellings', () => {
      expect(normalizeCounty('LANCASTER')).toEqual(known('Lancaster'));
      expect(normalizeCounty('york co')).toEqual(known('York'));
      expect(normalizeCounty('MC KEAN')).toEqual(known('McKean'));
      expect(normalizeCounty('Mckean Co.')).toEqual(known('McKean'));
    });

    it('should reject names that are not counties', () => {
      expect(normalizeCounty('Springfield')).toEqual(UNKNOWN);
      expect(normalizeCounty(42)).toEqual(UNKNOWN);
    });
  });

  describe('normalizeState', () => {
    it('should default missing states', () => {
      expect(normalizeState(undefined)).toEqual(known('PA'));
      expect(normalizeState('')).toEqual(known('PA'));
    });

    it('should accept abbreviations and the full state name', () => {
      expect(normalizeState('pa')).toEqual(known('PA'));
      expect(normalizeState('Pennsylvania')).toEqual(known('PA'));
      expect(normalizeState('oh')).toEqual(known('OH'));
    });

    it('should reject anything else', () => {
      expect(normalizeState('Penn')).toEqual(UNKNOWN);
      expect(normalizeState(true)).toEqual(UNKNOWN);
    });
  });

  describe('normalizeZip', () => {
    it('should keep the five-digit prefix', () => {
      expect(normalizeZip('17557-1234')).toEqual(known('17557'));
      expect(normalizeZip('175571234')).toEqual(known('17557'));
      expect(normalizeZip(17557)).toEqual(known('17557'));
    });

    it('should reject malformed codes', () => {
      expect(normalizeZip('1755')).toEqual(UNKNOWN);
      expect(normalizeZip('ABCDE')).toEqual(UNKNOWN);
    });
  });

  describe('parseLocaleNumber', () => {
    it('should parse en-US grouping', () => {
      expect(parseLocaleNumber('1,166.25')).toBe(1166.25);
      expect(parseLocaleNumber('12,500')).toBe(12500);
      expect(parseLocaleNumber('10,000,000')).toBe(10000000);
    });

    it('should parse European notation', () => {
      expect(parseLocaleNumber('1.166,25')).toBe(1166.25);
      expect(parseLocaleNumber('12,5')).toBe(12.5);
      expect(parseLocaleNumber('1.166.250')).toBe(1166250);
    });

    it('should parse space-grouped notation', () => {
      expect(parseLocaleNumber('1 166,25')).toBe(1166.25);
    });

    it('should read a single period as a decimal point', () => {
      expect(parseLocaleNumber('1.166')).toBe(1.166);
    });

    it('should pass finite numbers through', () => {
      expect(parseLocaleNumber(42.5)).toBe(42.5);
      expect(parseLocaleNumber(Number.NaN)).toBeUndefined();
      expect(parseLocaleNumber(Number.POSITIVE_INFINITY)).toBeUndefined();
    });

    it('should reject non-numeric text', () => {
      expect(parseLocaleNumber('abc')).toBeUndefined();
      expect(parseLocaleNumber('(D)')).toBeUndefined();
      expect(parseLocaleNumber('1,2,3.4.5')).toBeUndefined();
      expect(parseLocaleNumber(true)).toBeUndefined();
    });
  });

  describe('normalizeCount and normalizeAeu', () => {
    it('should round counts and require them to be positive', () => {
      expect(normalizeCount('12.6')).toEqual(known(13));
      expect(normalizeCount('0')).toEqual(UNKNOWN);
      expect(normalizeCount('-5')).toEqual(UNKNOWN);
    });

    it('should round AEU to two decimals', () => {
      expect(normalizeAeu('1,166.257')).toEqual(known(1166.26));
      expect(normalizeAeu('0.001')).toEqual(UNKNOWN);
    });
  });

  describe('normalizePhone', () => {
    it('should reduce phones to ten digits', () => {
      expect(normalizePhone('(717) 555-0142')).toEqual(known('7175550142'));
      expect(normalizePhone('1-717-555-0142')).toEqual(known('7175550142'));
      expect(normalizePhone(7175550142)).toEqual(known('7175550142'));
    });

    it('should reject short numbers', () => {
      expect(normalizePhone('555-0142')).toEqual(UNKNOWN);
    });
  });

  describe('normalizeEmail', () => {
    it('should lowercase and trim valid addresses', () => {
      expect(normalizeEmail(' Info@ZookFarm.COM ')).toEqual(known('info@zookfarm.com'));
    });

    it('should reject malformed addresses', () => {
      expect(normalizeEmail('not-an-email')).toEqual(UNKNOWN);
      expect(normalizeEmail('a@b')).toEqual(UNKNOWN);
    });
  });

  describe('normalizeOperationType', () => {
    it('should map keywords to operation types', () => {
      expect(normalizeOperationType('Poultry - Layers')).toEqual(known('layer'));
      expect(normalizeOperationType('Pullets')).toEqual(known('layer'));
      expect(normalizeOperationType('BROILERS')).toEqual(known('broiler'));
      expect(normalizeOperationType('Turkeys')).toEqual(known('turkey'));
    });

    it('should report mixed operations', () => {
      expect(normalizeOperationType('Broilers and Turkeys')).toEqual(known('mixed'));
      expect(normalizeOperationType('Mixed poultry')).toEqual(known('mixed'));
    });

    it('should leave unrecognized animals unknown', () => {
      expect(normalizeOperationType('Ducks')).toEqual(UNKNOWN);
    });
  });

  describe('normalizeIntegrator', () => {
    it('should map known integrators to canonical names', () => {
      expect(normalizeIntegrator('PERDUE FARMS')).toEqual(known('Perdue'));
      expect(normalizeIntegrator('Bell and Evans')).toEqual(known('Bell & Evans'));
    });

    it('should keep other integrators as written', () => {
      expect(normalizeIntegrator('  Local   Co-op ')).toEqual(known('Local Co-op'));
      expect(normalizeIntegrator('   ')).toEqual(UNKNOWN);
    });
  });
});
