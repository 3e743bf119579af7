import {
  INTERNATIONAL_REGION_PREFIXES,
  INTERNATIONAL_SUBREGION_PREFIXES,
  US_REGION_PREFIXES,
  US_SUBREGION_PREFIXES,
} from '../config/regions';
import type { Variant, VariantPrecedence } from '../types/metar.types';

const STATION_PATTERN = /^[A-Z0-9]{4}$/;

function fromSubRegion(prefix: string): Variant | undefined {
  if (US_SUBREGION_PREFIXES.has(prefix)) return 'us';
  if (INTERNATIONAL_SUBREGION_PREFIXES.has(prefix)) return 'international';
  return undefined;
}

function fromRegion(prefix: string): Variant | undefined {
  if (US_REGION_PREFIXES.has(prefix)) return 'us';
  if (INTERNATIONAL_REGION_PREFIXES.has(prefix)) return 'international';
  return undefined;
}

/**
 * Picks the extraction pipeline for a station identifier
 *
 * `sub-table-first` resolves two-letter prefixes before the single-letter tables,
 * so international M stations (MROC, MPTO...) reach the international pipeline.
 * `single-letter-first` checks the single-letter tables first, which sends every
 * M station to the US pipeline.
 *
 * @returns undefined when the identifier is malformed or its prefix is in no table
 */
export function selectVariant(
  station: string,
  precedence: VariantPrecedence = 'sub-table-first',
): Variant | undefined {
  if (!STATION_PATTERN.test(station)) {
    return undefined;
  }

  const region = station.slice(0, 1);
  const subRegion = station.slice(0, 2);

  if (precedence === 'single-letter-first') {
    return fromRegion(region) ?? fromSubRegion(subRegion);
  }
  return fromSubRegion(subRegion) ?? fromRegion(region);
}
