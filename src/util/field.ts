/**
 * Helpers for tagged known/unknown attribute values
 */

import type { FarmField, FieldValue } from '../types.js';

// Canonical attribute order, shared by merge, storage and export
export const FARM_FIELDS: readonly FarmField[] = [
  'name',
  'address',
  'city',
  'county',
  'state',
  'zip',
  'operation_type',
  'animal_count',
  'animal_equivalent_units',
  'estimated_houses',
  'estimated_roof_sqft',
  'owner_name',
  'phone',
  'email',
  'integrator',
];

export const UNKNOWN: FieldValue<never> = Object.freeze({ kind: 'unknown' });

export function known<T>(value: T): FieldValue<T> {
  return { kind: 'known', value };
}

/**
 * Unwrap to the value or undefined
 */
export function valueOf<T>(field: FieldValue<T>): T | undefined {
  return field.kind === 'known' ? field.value : undefined;
}

/**
 * Lift a nullable storage value into a field value
 */
export function fromNullable<T>(value: T | null | undefined): FieldValue<T> {
  return value === null || value === undefined ? UNKNOWN : known(value);
}

export function toNullable<T>(field: FieldValue<T>): T | null {
  return field.kind === 'known' ? field.value : null;
}

export function sameValue<T>(a: FieldValue<T>, b: FieldValue<T>): boolean {
  if (a.kind === 'unknown' || b.kind === 'unknown') {
    return a.kind === b.kind;
  }
  return a.value === b.value;
}
