/**
 * CSV export utilities
 */

import { stringify, type ColumnOption } from 'csv-stringify';
import type { CanonicalFarm } from '../types.js';
import { toNullable } from './field.js';

export interface CsvExportOptions {
  headers?: boolean;
  delimiter?: string;
  quote?: string;
}

type CsvValue = string | number | boolean | null;

const FARM_COLUMNS: ColumnOption[] = [
  { key: 'farm_id', header: 'Farm ID' },
  { key: 'name', header: 'Farm Name' },
  { key: 'owner_name', header: 'Owner' },
  { key: 'phone', header: 'Phone' },
  { key: 'email', header: 'Email' },
  { key: 'address', header: 'Address' },
  { key: 'city', header: 'City' },
  { key: 'county', header: 'County' },
  { key: 'state', header: 'State' },
  { key: 'zip', header: 'ZIP' },
  { key: 'operation_type', header: 'Operation Type' },
  { key: 'integrator', header: 'Integrator' },
  { key: 'animal_equivalent_units', header: 'AEU' },
  { key: 'estimated_houses', header: 'Houses' },
  { key: 'estimated_roof_sqft', header: 'Est. Roof Sqft' },
  { key: 'lead_score', header: 'Lead Score' },
  { key: 'lead_status', header: 'Status' },
  { key: 'data_confidence', header: 'Data Confidence' },
  { key: 'last_verified', header: 'Last Verified' },
];

/**
 * Flatten a farm into one export row; unknown attributes become empty cells
 */
export function farmToRow(farm: CanonicalFarm): Record<string, CsvValue> {
  const { attributes } = farm;
  return {
    farm_id: farm.farm_id,
    name: toNullable(attributes.name),
    owner_name: toNullable(attributes.owner_name),
    phone: toNullable(attributes.phone),
    email: toNullable(attributes.email),
    address: toNullable(attributes.address),
    city: toNullable(attributes.city),
    county: toNullable(attributes.county),
    state: toNullable(attributes.state),
    zip: toNullable(attributes.zip),
    operation_type: toNullable(attributes.operation_type),
    integrator: toNullable(attributes.integrator),
    animal_equivalent_units: toNullable(attributes.animal_equivalent_units),
    estimated_houses: toNullable(attributes.estimated_houses),
    estimated_roof_sqft: toNullable(attributes.estimated_roof_sqft),
    lead_score: farm.lead_score,
    lead_status: farm.lead_status,
    data_confidence: farm.data_confidence.toFixed(2),
    last_verified: farm.last_verified,
  };
}

/**
 * Convert farms to CSV format
 */
export async function farmsToCSV(
  farms: CanonicalFarm[],
  options: CsvExportOptions = {}
): Promise<string> {
  const {
    headers = true,
    delimiter = ',',
    quote = '"',
  } = options;

  return new Promise((resolve, reject) => {
    stringify(
      farms.map(farmToRow),
      { header: headers, columns: FARM_COLUMNS, delimiter, quote },
      (err, output) => {
        if (err) {
          reject(err);
        } else {
          resolve(output);
        }
      }
    );
  });
}
