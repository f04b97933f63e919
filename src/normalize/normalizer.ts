/**
 * Field normalization from raw source field maps to canonical farm attributes.
 * Every function here is total: unparseable input becomes unknown.
 */

import { readFileSync } from 'fs';
import type { FieldValue, NormalizedAttributes, OperationType, RawValue } from '../types.js';
import { UNKNOWN, known } from '../util/field.js';
import { normalizeAddress } from '../util/address.js';

export interface NormalizeOptions {
  /** State abbreviation assumed when a record carries none */
  defaultState?: string;
  /** Full name of the default state, mapped to its abbreviation */
  stateName?: string;
}

const DEFAULT_STATE = 'PA';
const DEFAULT_STATE_NAME = 'Pennsylvania';

// Words kept upper-case when title-casing names
const UPPERCASE_WORDS = new Set(['LLC', 'LP', 'LLP', 'II', 'III', 'IV', 'USA']);

const PA_COUNTIES: ReadonlyMap<string, string> = loadCounties();

function loadCounties(): Map<string, string> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('./pa-counties.json', import.meta.url), 'utf-8')
  );
  if (!Array.isArray(raw)) {
    throw new Error('pa-counties.json must contain an array of county names');
  }
  const lookup = new Map<string, string>();
  for (const county of raw) {
    if (typeof county === 'string') {
      lookup.set(countyKey(county), county);
    }
  }
  return lookup;
}

function countyKey(value: string): string {
  return value.toLowerCase().replace(/[^a-z]/g, '');
}

const INTEGRATORS: ReadonlyArray<[RegExp, string]> = [
  [/bell\s*(&|and)\s*evans/i, 'Bell & Evans'],
  [/perdue/i, 'Perdue'],
  [/tyson/i, 'Tyson'],
  [/pilgrim/i, "Pilgrim's Pride"],
  [/koch/i, 'Koch Foods'],
  [/wenger/i, 'Wenger Feeds'],
];

const OPERATION_KEYWORDS: ReadonlyArray<[RegExp, Exclude<OperationType, 'mixed'>]> = [
  [/layer|egg|pullet/, 'layer'],
  [/broiler/, 'broiler'],
  [/turkey/, 'turkey'],
];

/**
 * Normalize a sparse raw field map into the canonical attribute schema
 */
export function normalize(
  fieldMap: Readonly<Record<string, RawValue>>,
  options: NormalizeOptions = {}
): NormalizedAttributes {
  return {
    name: normalizeName(fieldMap.name),
    address: lift(typeof fieldMap.address === 'string' ? normalizeAddress(fieldMap.address) : undefined),
    city: normalizeName(fieldMap.city),
    county: normalizeCounty(fieldMap.county),
    state: normalizeState(fieldMap.state, options),
    zip: normalizeZip(fieldMap.zip),
    operation_type: normalizeOperationType(fieldMap.operation_type),
    animal_count: normalizeCount(fieldMap.animal_count),
    animal_equivalent_units: normalizeAeu(fieldMap.animal_equivalent_units),
    estimated_houses: normalizeCount(fieldMap.estimated_houses),
    estimated_roof_sqft: normalizeCount(fieldMap.estimated_roof_sqft),
    owner_name: normalizeName(fieldMap.owner_name),
    phone: normalizePhone(fieldMap.phone),
    email: normalizeEmail(fieldMap.email),
    integrator: normalizeIntegrator(fieldMap.integrator),
  };
}

function lift<T>(value: T | undefined): FieldValue<T> {
  return value === undefined ? UNKNOWN : known(value);
}

function textOf(raw: RawValue): string | undefined {
  if (typeof raw === 'string') {
    const collapsed = raw.trim().replace(/\s+/g, ' ');
    return collapsed.length > 0 ? collapsed : undefined;
  }
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return String(raw);
  }
  return undefined;
}

/**
 * Title-case text that arrives entirely upper- or lower-case
 */
export function titleCase(text: string): string {
  if (text !== text.toUpperCase() && text !== text.toLowerCase()) {
    return text;
  }

  return text
    .split(' ')
    .map(word => {
      if (UPPERCASE_WORDS.has(word.replace(/[.,]/g, '').toUpperCase())) {
        return word.toUpperCase();
      }
      return word
        .toLowerCase()
        .replace(/(^|[-/(])([a-z])/g, (_match: string, prefix: string, letter: string) =>
          prefix + letter.toUpperCase()
        );
    })
    .join(' ');
}

export function normalizeName(raw: RawValue): FieldValue<string> {
  const text = textOf(raw);
  return text === undefined ? UNKNOWN : known(titleCase(text));
}

/**
 * Canonical PA county spelling, e.g. "MC KEAN CO." => "McKean"
 */
export function normalizeCounty(raw: RawValue): FieldValue<string> {
  const text = textOf(raw);
  if (text === undefined) {
    return UNKNOWN;
  }
  const stripped = text.replace(/\s+(county|co\.?)$/i, '');
  return lift(PA_COUNTIES.get(countyKey(stripped)));
}

export function normalizeState(raw: RawValue, options: NormalizeOptions = {}): FieldValue<string> {
  const defaultState = options.defaultState ?? DEFAULT_STATE;
  const stateName = options.stateName ?? DEFAULT_STATE_NAME;

  if (raw === undefined || raw === null) {
    return known(defaultState);
  }
  if (typeof raw !== 'string') {
    return UNKNOWN;
  }

  const text = raw.trim();
  if (text.length === 0) {
    return known(defaultState);
  }
  if (/^[A-Za-z]{2}$/.test(text)) {
    return known(text.toUpperCase());
  }
  if (text.toLowerCase() === stateName.toLowerCase()) {
    return known(defaultState);
  }
  return UNKNOWN;
}

export function normalizeZip(raw: RawValue): FieldValue<string> {
  const text = typeof raw === 'number' && Number.isInteger(raw) ? String(raw) : textOf(raw);
  const zip = text?.match(/^(\d{5})(?:-?\d{4})?$/)?.[1];
  return lift(zip);
}

/**
 * Parse numbers written in en-US, European or space-grouped notation.
 * A single separator followed by exactly three digits is read as grouping
 * when it is a comma and as a decimal point when it is a period.
 */
export function parseLocaleNumber(raw: RawValue): number | undefined {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : undefined;
  }
  if (typeof raw !== 'string') {
    return undefined;
  }

  let text = raw.trim().replace(/\s/g, '');
  if (!/^[+-]?[\d.,]+$/.test(text)) {
    return undefined;
  }

  const lastComma = text.lastIndexOf(',');
  const lastDot = text.lastIndexOf('.');

  if (lastComma >= 0 && lastDot >= 0) {
    text = lastComma > lastDot
      ? text.replace(/\./g, '').replace(',', '.')
      : text.replace(/,/g, '');
  } else if (lastComma >= 0) {
    const commas = text.split(',').length - 1;
    const decimals = text.length - lastComma - 1;
    text = commas > 1 || decimals === 3 ? text.replace(/,/g, '') : text.replace(',', '.');
  } else if (lastDot >= 0 && text.split('.').length - 1 > 1) {
    text = text.replace(/\./g, '');
  }

  if (!/^[+-]?\d+(\.\d+)?$/.test(text)) {
    return undefined;
  }

  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

export function normalizeCount(raw: RawValue): FieldValue<number> {
  const value = parseLocaleNumber(raw);
  if (value === undefined) {
    return UNKNOWN;
  }
  const rounded = Math.round(value);
  return rounded > 0 ? known(rounded) : UNKNOWN;
}

export function normalizeAeu(raw: RawValue): FieldValue<number> {
  const value = parseLocaleNumber(raw);
  if (value === undefined) {
    return UNKNOWN;
  }
  const rounded = Math.round(value * 100) / 100;
  return rounded > 0 ? known(rounded) : UNKNOWN;
}

/**
 * Ten-digit US phone number, digits only
 */
export function normalizePhone(raw: RawValue): FieldValue<string> {
  const text = textOf(raw);
  if (text === undefined) {
    return UNKNOWN;
  }

  let digits = text.replace(/\D/g, '');
  if (digits.length === 11 && digits.startsWith('1')) {
    digits = digits.slice(1);
  }
  return digits.length === 10 ? known(digits) : UNKNOWN;
}

export function normalizeEmail(raw: RawValue): FieldValue<string> {
  if (typeof raw !== 'string') {
    return UNKNOWN;
  }
  const email = raw.trim().toLowerCase();
  return /^[^\s@]+@[^\s@]+\.[a-z]{2,}$/.test(email) ? known(email) : UNKNOWN;
}

export function normalizeOperationType(raw: RawValue): FieldValue<OperationType> {
  if (typeof raw !== 'string') {
    return UNKNOWN;
  }

  const text = raw.toLowerCase();
  if (text.includes('mixed')) {
    return known('mixed');
  }

  const categories = new Set<OperationType>();
  for (const [pattern, category] of OPERATION_KEYWORDS) {
    if (pattern.test(text)) {
      categories.add(category);
    }
  }

  if (categories.size > 1) {
    return known('mixed');
  }
  const [only] = categories;
  return lift(only);
}

export function normalizeIntegrator(raw: RawValue): FieldValue<string> {
  const text = textOf(raw);
  if (text === undefined) {
    return UNKNOWN;
  }
  const mapped = INTEGRATORS.find(([pattern]) => pattern.test(text));
  return known(mapped ? mapped[1] : text);
}
