import type { ParsedReport } from '../types/metar.types';

export const WEATHER_CODES: Readonly<Record<string, string>> = {
  // Descriptors
  MI: 'Shallow',
  PR: 'Partial',
  BC: 'Patches',
  DR: 'Low Drifting',
  BL: 'Blowing',
  SH: 'Showers',
  TS: 'Thunderstorm',
  FZ: 'Freezing',
  VC: 'Vicinity',
  // Precipitation
  RA: 'Rain',
  DZ: 'Drizzle',
  SN: 'Snow',
  SG: 'Snow Grains',
  IC: 'Ice Crystals',
  PL: 'Ice Pellets',
  GR: 'Hail',
  GS: 'Small Hail',
  UP: 'Unknown Precip',
  // Obscuration
  FG: 'Fog',
  BR: 'Mist',
  HZ: 'Haze',
  VA: 'Volcanic Ash',
  DU: 'Wide Dust',
  FU: 'Smoke',
  SA: 'Sand',
  PY: 'Spray',
  SY: 'Spray',
  // Other
  SQ: 'Squall',
  PO: 'Dust Whirls',
  DS: 'Duststorm',
  SS: 'Sandstorm',
  FC: 'Funnel Cloud',
};

const INTENSITY: Readonly<Record<string, string>> = {
  '+': 'Heavy ',
  '-': 'Light ',
};

const TRANSLATABLE_LENGTHS: ReadonlySet<number> = new Set([2, 4, 6]);

/**
 * Translates a present-weather group into words: "+TSRA" -> "Heavy Thunderstorm Rain ".
 * Groups that are not 2, 4 or 6 letters after the intensity are returned as given.
 */
export function translateWeatherCode(code: string): string {
  const intensity = INTENSITY[code.charAt(0)];
  const phenomena = intensity === undefined ? code : code.slice(1);

  if (!TRANSLATABLE_LENGTHS.has(phenomena.length)) {
    return code;
  }

  let translated = intensity ?? '';
  for (let i = 0; i < phenomena.length; i += 2) {
    const pair = phenomena.slice(i, i + 2);
    const description = WEATHER_CODES[pair];
    translated += description === undefined ? pair : `${description} `;
  }
  return translated;
}

export function translateOtherWeather(report: Pick<ParsedReport, 'other'>): string[] {
  return report.other.map(translateWeatherCode);
}
