/**
 * Station prefix tables used to pick a report dialect
 */

/**
 * Single-letter ICAO region prefixes that report in the US format
 */
export const US_REGION_PREFIXES: ReadonlySet<string> = new Set(['C', 'K', 'M', 'P', 'T']);

/**
 * Single-letter ICAO region prefixes that report in the International format
 */
export const INTERNATIONAL_REGION_PREFIXES: ReadonlySet<string> = new Set([
  'A', 'B', 'D', 'E', 'F', 'G', 'H', 'L', 'N', 'O', 'R', 'S', 'U', 'V', 'W', 'Y', 'Z',
]);

/**
 * Central America and the Caribbean (M) are split between the two formats
 */
export const US_SUBREGION_PREFIXES: ReadonlySet<string> = new Set(['MB', 'MM', 'MT', 'MY']);

export const INTERNATIONAL_SUBREGION_PREFIXES: ReadonlySet<string> = new Set([
  'MD', 'MG', 'MH', 'MK', 'MN', 'MP', 'MR', 'MS', 'MU', 'MW', 'MZ',
]);
