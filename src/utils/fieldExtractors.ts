import type {
  Altimeter,
  CloudLayer,
  CloudType,
  Extraction,
  Variant,
  Visibility,
  Wind,
  WindDirection,
} from '../types/metar.types';

/**
 * Field extractors
 *
 * Each extractor takes the unclaimed tokens and returns the field it found plus
 * the tokens it left behind. Inputs are never mutated. Tail extractors never
 * consume the first token, which always belongs to the station.
 */

export interface StationAndTime {
  station: string;
  time?: string;
}

export interface TemperatureAndDewpoint {
  temperature?: number;
  dewpoint?: number;
}

const US_ALTIMETER_PATTERN = /^A(\d{4})$/;
const INTERNATIONAL_ALTIMETER_PATTERN = /^Q(\d{4})$/;
const TEMPERATURE_PATTERN = /^(M?\d{1,2}|\/\/)\/(M?\d{1,2}|\/\/)?$/;
const TIME_PATTERN = /^\d{6}Z$/;
const TIME_SLOT_PATTERN = /^\d+Z$/;
const SPEED_ONLY_WIND_PATTERN = /^\d{5}$/;
const SLASH_WIND_PATTERN = /^\d{3}\/\d{2,3}$/;
const WIND_UNIT_PATTERN = /(KTS|KT|MPS)$/;
const OUT_OF_BAND_GUST_PATTERN = /^G\d{1,2}$/;
const VARIABLE_WIND_PATTERN = /^(\d{3})V(\d{3})$/;
const US_VISIBILITY_PATTERN = /^([MP])?(\d+)(?:\/(\d+))?SM$/;
const FRACTION_VISIBILITY_PATTERN = /^(\d+)\/(\d+)SM$/;
const METER_VISIBILITY_PATTERN = /^\d{4}$/;
const CLOUD_LAYER_TYPES: readonly CloudType[] = ['FEW', 'SCT', 'BKN', 'OVC'];

export const CAVOK_VISIBILITY_METERS = 9999;

const unchanged = <T>(value: T, tokens: readonly string[]): Extraction<T> => ({ value, rest: tokens });

function parseDigits(code: string | undefined): number | undefined {
  if (!code || !/^\d+$/.test(code)) {
    return undefined;
  }
  return Number.parseInt(code, 10);
}

function parseSigned(code: string | undefined): number | undefined {
  if (!code) {
    return undefined;
  }
  const negative = code.startsWith('M');
  const magnitude = parseDigits(negative ? code.slice(1) : code);
  if (magnitude === undefined) {
    return undefined;
  }
  return negative && magnitude !== 0 ? -magnitude : magnitude;
}

export function extractAltimeter(tokens: readonly string[], variant: Variant): Extraction<Altimeter | undefined> {
  if (tokens.length < 2) {
    return unchanged(undefined, tokens);
  }
  const pattern = variant === 'us' ? US_ALTIMETER_PATTERN : INTERNATIONAL_ALTIMETER_PATTERN;
  const match = pattern.exec(tokens[tokens.length - 1]);
  if (!match) {
    return unchanged(undefined, tokens);
  }

  const repr = match[1];
  const numeric = Number.parseInt(repr, 10);
  const altimeter: Altimeter = variant === 'us'
    ? { repr, value: numeric / 100, unit: 'inHg' }
    : { repr, value: numeric, unit: 'hPa' };
  return { value: altimeter, rest: tokens.slice(0, -1) };
}

/**
 * 01/M03 -> 1 and -3. A missing or `//` side is left undefined.
 */
export function extractTemperature(tokens: readonly string[]): Extraction<TemperatureAndDewpoint | undefined> {
  if (tokens.length < 2) {
    return unchanged(undefined, tokens);
  }
  const match = TEMPERATURE_PATTERN.exec(tokens[tokens.length - 1]);
  if (!match) {
    return unchanged(undefined, tokens);
  }
  return {
    value: {
      temperature: parseSigned(match[1]),
      dewpoint: parseSigned(match[2]),
    },
    rest: tokens.slice(0, -1),
  };
}

/**
 * A time-shaped group with the wrong digit count (25125Z) still fills the time
 * slot: it is consumed and `time` is left absent
 */
export function extractStationAndTime(tokens: readonly string[]): Extraction<StationAndTime> {
  const [station = '', candidate, ...remaining] = tokens;
  if (candidate !== undefined && TIME_PATTERN.test(candidate)) {
    return { value: { station, time: candidate }, rest: remaining };
  }
  if (candidate !== undefined && TIME_SLOT_PATTERN.test(candidate)) {
    return { value: { station }, rest: remaining };
  }
  return { value: { station }, rest: tokens.slice(1) };
}

function isWindGroup(token: string): boolean {
  return token.endsWith('KT')
    || token.endsWith('KTS')
    || SPEED_ONLY_WIND_PATTERN.test(token)
    || (token.length >= 8 && token.includes('G') && !token.includes('/') && !token.includes('MPS'))
    || token.endsWith('MPS')
    || SLASH_WIND_PATTERN.test(token);
}

function parseDirection(code: string): WindDirection | undefined {
  if (code === 'VRB') {
    return 'variable';
  }
  const degrees = parseDigits(code);
  if (degrees === undefined || degrees > 360) {
    return undefined;
  }
  return degrees;
}

/**
 * 29019G29KT, 03012, 29019G29, 24008MPS, 290/19
 */
export function parseWindGroup(token: string): Wind | undefined {
  const unit = token.endsWith('MPS') ? 'mps' : 'kt';
  const body = token.replace(WIND_UNIT_PATTERN, '');
  const direction = parseDirection(body.slice(0, 3));

  let remainder = body.slice(3);
  if (remainder.startsWith('/')) {
    remainder = remainder.slice(1);
  }

  const gustIndex = remainder.indexOf('G');
  const speed = parseDigits(gustIndex === -1 ? remainder : remainder.slice(0, gustIndex));
  const gustCode = gustIndex === -1 ? undefined : remainder.slice(gustIndex + 1);
  const gust = parseDigits(gustCode);

  if (direction === undefined || speed === undefined || (gustCode !== undefined && gust === undefined)) {
    return undefined;
  }

  return gust === undefined
    ? { direction, speed, unit }
    : { direction, speed, gust, unit };
}

export function extractWind(tokens: readonly string[]): Extraction<Wind | undefined> {
  const [head, ...remaining] = tokens;
  if (head === undefined || !isWindGroup(head)) {
    return unchanged(undefined, tokens);
  }

  // Wind-shaped but unreadable (/////KT, 45010KT): the slot is used up, the wind is absent
  const parsed = parseWindGroup(head);
  if (!parsed) {
    return { value: undefined, rest: remaining };
  }

  let wind: Wind = parsed;
  let rest = remaining;

  const [gustToken] = rest;
  if (gustToken !== undefined && OUT_OF_BAND_GUST_PATTERN.test(gustToken)) {
    wind = { ...wind, gust: Number.parseInt(gustToken.slice(1), 10) };
    rest = rest.slice(1);
  }

  const [variableToken] = rest;
  const variable = variableToken !== undefined ? VARIABLE_WIND_PATTERN.exec(variableToken) : null;
  if (variable) {
    wind = {
      ...wind,
      variable: [Number.parseInt(variable[1], 10), Number.parseInt(variable[2], 10)],
    };
    rest = rest.slice(1);
  }

  return { value: wind, rest };
}

function parseStatuteMiles(token: string): Visibility | undefined {
  const match = US_VISIBILITY_PATTERN.exec(token);
  if (!match) {
    return undefined;
  }
  const [, qualifierCode, first, denominatorCode] = match;
  const qualifier = qualifierCode === 'M' ? 'less-than' : qualifierCode === 'P' ? 'greater-than' : undefined;

  let value: number;
  let repr: string;
  if (denominatorCode === undefined) {
    value = Number.parseInt(first, 10);
    repr = String(value);
  } else {
    const numerator = Number.parseInt(first, 10);
    const denominator = Number.parseInt(denominatorCode, 10);
    if (denominator === 0) {
      return undefined;
    }
    value = numerator / denominator;
    repr = `${numerator}/${denominator}`;
  }

  const visibility: Visibility = { value, unit: 'SM', repr, cavok: false };
  return qualifier ? { ...visibility, qualifier } : visibility;
}

/**
 * 10SM, 1/2SM, P6SM, M1/4SM, or a whole number followed by a fraction: "2 1/2SM" -> 5/2
 */
export function extractUsVisibility(tokens: readonly string[]): Extraction<Visibility | undefined> {
  const [head, next] = tokens;
  if (head === undefined) {
    return unchanged(undefined, tokens);
  }

  if (head.endsWith('SM')) {
    const visibility = parseStatuteMiles(head);
    return visibility ? { value: visibility, rest: tokens.slice(1) } : unchanged(undefined, tokens);
  }

  const whole = parseDigits(head);
  const fraction = next !== undefined ? FRACTION_VISIBILITY_PATTERN.exec(next) : null;
  if (whole === undefined || !fraction) {
    return unchanged(undefined, tokens);
  }

  const numerator = Number.parseInt(fraction[1], 10);
  const denominator = Number.parseInt(fraction[2], 10);
  if (denominator === 0) {
    return unchanged(undefined, tokens);
  }
  const combined = whole * denominator + numerator;
  return {
    value: {
      value: combined / denominator,
      unit: 'SM',
      repr: `${combined}/${denominator}`,
      cavok: false,
    },
    rest: tokens.slice(2),
  };
}

/**
 * CAVOK or a 4-digit meter value. CAVOK also means no significant cloud,
 * so the caller stops extracting once it sees `cavok: true`.
 */
export function extractInternationalVisibility(tokens: readonly string[]): Extraction<Visibility | undefined> {
  const [head] = tokens;
  if (head === 'CAVOK') {
    return {
      value: {
        value: CAVOK_VISIBILITY_METERS,
        unit: 'm',
        repr: 'CAVOK',
        cavok: true,
      },
      rest: tokens.slice(1),
    };
  }
  if (head !== undefined && METER_VISIBILITY_PATTERN.test(head)) {
    return {
      value: {
        value: Number.parseInt(head, 10),
        unit: 'm',
        repr: head,
        cavok: false,
      },
      rest: tokens.slice(1),
    };
  }
  return unchanged(undefined, tokens);
}

function cloudTypeOf(token: string): CloudType | undefined {
  if (token.startsWith('VV')) {
    return 'VV';
  }
  return CLOUD_LAYER_TYPES.find((type) => token.startsWith(type));
}

/**
 * Repairs the height part of a layer (everything after the type prefix):
 * modifier letters typed before the height move to the end (CB015 -> 015CB),
 * then a letter O inside the height becomes a zero (0O5 -> 005)
 */
export function repairCloudHeight(code: string): string {
  let repaired = code;

  const displaced = /^([A-NP-Z][A-Z]*)([\dO/]{3}.*)$/.exec(repaired);
  if (displaced) {
    repaired = `${displaced[2]}${displaced[1]}`;
  }

  const height = repaired.slice(0, 3);
  if (/^[\dO]{3}$/.test(height) && height.includes('O')) {
    repaired = `${height.replace(/O/g, '0')}${repaired.slice(3)}`;
  }

  return repaired;
}

export function parseCloudLayer(token: string): CloudLayer | undefined {
  const type = cloudTypeOf(token);
  if (!type) {
    return undefined;
  }

  const code = repairCloudHeight(token.slice(type.length));
  const heightCode = code.slice(0, 3);
  const modifier = code.slice(3);
  const layer: CloudLayer = {
    type,
    height: /^\d{3}$/.test(heightCode) ? Number.parseInt(heightCode, 10) : null,
    repr: `${type}${code}`,
  };
  return modifier ? { ...layer, modifier } : layer;
}

/**
 * Claims every cloud layer left in the sequence, scanning from the tail,
 * and returns them in report order
 */
export function extractClouds(tokens: readonly string[]): Extraction<CloudLayer[]> {
  const claimed: CloudLayer[] = [];
  const rest: string[] = [];

  for (let i = tokens.length - 1; i >= 0; i -= 1) {
    const layer = parseCloudLayer(tokens[i]);
    if (layer) {
      claimed.push(layer);
    } else {
      rest.push(tokens[i]);
    }
  }

  return { value: claimed.reverse(), rest: rest.reverse() };
}
