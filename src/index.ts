export * from './types/metar.types';
export type { AppConfig } from './types/config.types';
export { MetarDecodeError } from './errors/MetarDecodeError';
export type { MetarDecodeErrorCode } from './errors/MetarDecodeError';
export { decodeMetar, decodeMetarOrThrow } from './utils/metarParser';
export type { DecodeResult } from './utils/metarParser';
export { splitRemarks } from './utils/remarksSplitter';
export { sanitizeTokens } from './utils/tokenSanitizer';
export { selectVariant } from './utils/variantSelector';
export {
  CAVOK_VISIBILITY_METERS,
  extractAltimeter,
  extractClouds,
  extractInternationalVisibility,
  extractStationAndTime,
  extractTemperature,
  extractUsVisibility,
  extractWind,
} from './utils/fieldExtractors';
export {
  classifyFlightRules,
  getCeiling,
  getFlightRules,
  visibilityInMiles,
  METERS_TO_STATUTE_MILES,
  UNLIMITED_CEILING,
} from './utils/flightRules';
export { translateWeatherCode, translateOtherWeather, WEATHER_CODES } from './utils/weatherTranslator';
export {
  IDENT_CHARS,
  cycleIdentChar,
  identToStation,
  stationToIdent,
} from './utils/stationIdent';
export { createDisplayData, summarizeReport } from './utils/weatherDecoder';
export type { DisplayData, ReportSummary } from './utils/weatherDecoder';
export { default as metarDecoderService, MetarDecoderService } from './services/MetarDecoderService';
export type { MetarDecoderServiceOptions } from './services/MetarDecoderService';
