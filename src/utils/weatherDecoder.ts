import { displayOptionsSchema } from '../schemas/metar.schemas';
import type { DisplayOptionsInput } from '../schemas/metar.schemas';
import { FlightRules } from '../types/metar.types';
import type {
  Altimeter,
  CloudLayer,
  ParsedReport,
  Visibility,
  Wind,
} from '../types/metar.types';
import { getFlightRules } from './flightRules';
import { splitRemarks } from './remarksSplitter';
import { translateOtherWeather } from './weatherTranslator';

export interface ReportSummary {
  station: string;
  time: string;
  temperature: string;
  dewpoint: string;
  wind: string;
  visibility: string;
  altimeter: string;
  clouds: string[];
  weather: string[];
  flightRules: FlightRules;
  flightRulesLabel: string;
  summary: string;
}

export interface DisplayData {
  line1: string;
  line2: string;
  flightRules: FlightRules;
}

// Whole-token substitutions on the scrolling line
const DISPLAY_REPLACEMENTS: ReadonlyMap<string, string> = new Map([
  ['00000KT', 'CALM'],
  ['00000MPS', 'CALM'],
  ['10SM', 'UNLM'],
  ['9999', 'UNLM'],
]);

function formatSignedTemperature(value?: number): string {
  if (value === undefined) {
    return 'N/A';
  }
  const prefix = value > 0 ? '+' : '';
  return `${prefix}${value}°C`;
}

function formatWind(wind?: Wind): string {
  if (!wind) {
    return 'N/A';
  }
  if (wind.speed === 0 && wind.gust === undefined) {
    return 'Calm';
  }
  const direction = wind.direction === 'variable'
    ? 'VRB'
    : `${wind.direction.toString().padStart(3, '0')}°`;
  const gustPart = wind.gust !== undefined ? ` G${wind.gust}` : '';
  const variablePart = wind.variable
    ? ` varying ${wind.variable[0]}°-${wind.variable[1]}°`
    : '';
  return `${direction} ${wind.speed}${gustPart} ${wind.unit}${variablePart}`;
}

// 5/2 -> 2 1/2
function formatFraction(repr: string): string {
  const [numeratorCode, denominatorCode] = repr.split('/');
  const numerator = Number.parseInt(numeratorCode, 10);
  const denominator = Number.parseInt(denominatorCode, 10);
  const whole = Math.floor(numerator / denominator);
  const remainder = numerator % denominator;
  if (remainder === 0) return `${whole}`;
  return whole > 0 ? `${whole} ${remainder}/${denominator}` : `${remainder}/${denominator}`;
}

function formatVisibility(visibility?: Visibility): string {
  if (!visibility) {
    return 'N/A';
  }
  if (visibility.cavok) {
    return 'CAVOK';
  }
  if (visibility.unit === 'm') {
    return `${visibility.value} m`;
  }
  const amount = visibility.repr.includes('/') ? formatFraction(visibility.repr) : visibility.repr;
  const qualifier = visibility.qualifier === 'less-than'
    ? 'less than '
    : visibility.qualifier === 'greater-than' ? 'more than ' : '';
  return `${qualifier}${amount} SM`;
}

function formatAltimeter(altimeter?: Altimeter): string {
  if (!altimeter) {
    return 'N/A';
  }
  return altimeter.unit === 'inHg'
    ? `${altimeter.value.toFixed(2)} inHg`
    : `${altimeter.value} hPa`;
}

function describeCloudCover(type: CloudLayer['type']): string {
  switch (type) {
    case 'FEW':
      return 'Few';
    case 'SCT':
      return 'Scattered';
    case 'BKN':
      return 'Broken';
    case 'OVC':
      return 'Overcast';
    case 'VV':
      return 'Vertical visibility';
    default:
      return type;
  }
}

function formatCloudLayers(clouds: readonly CloudLayer[]): string[] {
  return clouds.map((layer) => {
    const coverLabel = describeCloudCover(layer.type);
    const base = layer.height !== null ? `${coverLabel} at ${layer.height * 100} ft` : coverLabel;
    return layer.modifier ? `${base} (${layer.modifier})` : base;
  });
}

function describeFlightRules(category: FlightRules): string {
  switch (category) {
    case FlightRules.VFR:
      return 'VFR – Visual Flight Rules';
    case FlightRules.MVFR:
      return 'MVFR – Marginal VFR';
    case FlightRules.IFR:
      return 'IFR – Instrument Flight Rules';
    case FlightRules.LIFR:
      return 'LIFR – Low IFR';
    default:
      return category;
  }
}

export function summarizeReport(report: ParsedReport): ReportSummary {
  const temperature = formatSignedTemperature(report.temperature);
  const dewpoint = formatSignedTemperature(report.dewpoint);
  const wind = formatWind(report.wind);
  const visibility = formatVisibility(report.visibility);
  const altimeter = formatAltimeter(report.altimeter);
  const clouds = formatCloudLayers(report.clouds);
  const weather = translateOtherWeather(report).map((text) => text.trim());
  const flightRules = getFlightRules(report);
  const flightRulesLabel = describeFlightRules(flightRules);

  const summaryParts: string[] = [];
  if (temperature !== 'N/A') summaryParts.push(`Temp ${temperature}`);
  if (dewpoint !== 'N/A') summaryParts.push(`Dew ${dewpoint}`);
  if (wind !== 'N/A') summaryParts.push(`Wind ${wind}`);
  if (visibility !== 'N/A') summaryParts.push(`Vis ${visibility}`);
  if (altimeter !== 'N/A') summaryParts.push(`Alt ${altimeter}`);
  summaryParts.push(flightRulesLabel);

  return {
    station: report.station,
    time: report.time ?? 'N/A',
    temperature,
    dewpoint,
    wind,
    visibility,
    altimeter,
    clouds,
    weather,
    flightRules,
    flightRulesLabel,
    summary: summaryParts.join(' • '),
  };
}

/**
 * Two text lines for a character display:
 * Line 1: IDEN HHMMZ RULES
 * Line 2: the rest of the report after station and time, with calm wind shown
 * as CALM and unlimited visibility (10SM, 9999) as UNLM
 */
export function createDisplayData(report: ParsedReport, options: DisplayOptionsInput = {}): DisplayData {
  const { includeRemarks } = displayOptionsSchema.parse(options);
  const flightRules = getFlightRules(report);
  const time = report.time ? report.time.slice(2) : '----Z';
  const line1 = `${report.station} ${time} ${flightRules}`;

  const tokens = report.raw.replace(/\?/g, ' ').split(/\s+/).filter(Boolean);
  let start = tokens.indexOf(report.station) + 1;
  if (report.time !== undefined && tokens[start] === report.time) {
    start += 1;
  }
  const rest = tokens.slice(start).join(' ');
  const line2 = (includeRemarks ? rest : splitRemarks(rest).body)
    .split(' ')
    .map((token) => DISPLAY_REPLACEMENTS.get(token) ?? token)
    .join(' ');

  return { line1, line2, flightRules };
}
