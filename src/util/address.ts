/**
 * Address normalization utilities for rural street addresses
 */

const STREET_ABBREVIATIONS: ReadonlyArray<[RegExp, string]> = [
  [/\bSTREET\b/g, 'ST'],
  [/\bAVENUE\b/g, 'AVE'],
  [/\bBOULEVARD\b/g, 'BLVD'],
  [/\bROAD\b/g, 'RD'],
  [/\bDRIVE\b/g, 'DR'],
  [/\bLANE\b/g, 'LN'],
  [/\bCOURT\b/g, 'CT'],
  [/\bPLACE\b/g, 'PL'],
  [/\bCIRCLE\b/g, 'CIR'],
  [/\bHIGHWAY\b/g, 'HWY'],
  [/\bTURNPIKE\b/g, 'TPKE'],
  [/\bMOUNTAIN\b/g, 'MTN'],
  [/\bHOLLOW\b/g, 'HOLW'],
  [/\bVALLEY\b/g, 'VLY'],
  [/\bTOWNSHIP\b/g, 'TWP'],
  [/\bNORTHEAST\b/g, 'NE'],
  [/\bNORTHWEST\b/g, 'NW'],
  [/\bSOUTHEAST\b/g, 'SE'],
  [/\bSOUTHWEST\b/g, 'SW'],
  [/\bNORTH\b/g, 'N'],
  [/\bSOUTH\b/g, 'S'],
  [/\bEAST\b/g, 'E'],
  [/\bWEST\b/g, 'W'],
];

/**
 * Normalize an address string for consistent matching
 */
export function normalizeAddress(address: string | null | undefined): string | undefined {
  if (!address || typeof address !== 'string') {
    return undefined;
  }

  let normalized = address
    .trim()
    .toUpperCase()
    .replace(/\s+/g, ' ')
    // Rural route variants: "Rural Route 2", "R.R. 2", "R R 2"
    .replace(/\bRURAL ROUTE\b/g, 'RR')
    .replace(/\bR\.?\s?R\.?(?=\s|$)/g, 'RR')
    .replace(/\bP\.?\s?O\.? BOX\b/g, 'PO BOX');

  for (const [pattern, replacement] of STREET_ABBREVIATIONS) {
    normalized = normalized.replace(pattern, replacement);
  }

  normalized = normalized
    // Periods after abbreviations and trailing punctuation
    .replace(/\b([A-Z]{1,4})\./g, '$1')
    .replace(/[,.;\s]+$/, '')
    .trim();

  return normalized.length > 0 ? normalized : undefined;
}
