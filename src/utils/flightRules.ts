import { FlightRules } from '../types/metar.types';
import type { CloudLayer, ParsedReport, Visibility } from '../types/metar.types';

/**
 * Flight rules are determined by:
 * - LIFR: Ceiling < 500 ft AGL and/or visibility < 1 mile
 * - IFR: Ceiling 500 to < 1000 ft AGL and/or visibility 1 to < 3 miles
 * - MVFR: Ceiling 1000 to < 3000 ft AGL and/or visibility 3 to < 5 miles
 * - VFR: Ceiling >= 3000 ft AGL and visibility >= 5 miles
 *
 * Ceilings are in hundreds of feet, as reported.
 */

export const METERS_TO_STATUTE_MILES = 0.000621371;

export const UNLIMITED_CEILING = 99;

const CEILING_TYPES: ReadonlySet<string> = new Set(['BKN', 'OVC', 'VV']);

export function visibilityInMiles(visibility: Visibility | undefined): number | undefined {
  if (!visibility) {
    return undefined;
  }
  return visibility.unit === 'm' ? visibility.value * METERS_TO_STATUTE_MILES : visibility.value;
}

/**
 * Only Broken, Overcast and Vertical Visibility count as ceilings.
 * Layers without a numeric height (FEW///, BKN///) are skipped.
 */
export function getCeiling(clouds: readonly CloudLayer[]): CloudLayer | undefined {
  return clouds.find((layer) => CEILING_TYPES.has(layer.type) && layer.height !== null);
}

/**
 * Visibility that cannot be determined is reported as IFR, whatever the ceiling
 */
export function classifyFlightRules(
  visibilityMiles: number | undefined,
  ceiling: number = UNLIMITED_CEILING,
): FlightRules {
  if (visibilityMiles === undefined || Number.isNaN(visibilityMiles)) {
    return FlightRules.IFR;
  }

  if (visibilityMiles < 5 || ceiling < 30) {
    if (visibilityMiles < 3 || ceiling < 10) {
      if (visibilityMiles < 1 || ceiling < 5) {
        return FlightRules.LIFR;
      }
      return FlightRules.IFR;
    }
    return FlightRules.MVFR;
  }
  return FlightRules.VFR;
}

export function getFlightRules(report: Pick<ParsedReport, 'visibility' | 'clouds'>): FlightRules {
  const ceiling = getCeiling(report.clouds);
  return classifyFlightRules(
    visibilityInMiles(report.visibility),
    ceiling?.height ?? UNLIMITED_CEILING,
  );
}
