import { MetarDecodeError } from '../errors/MetarDecodeError';
import { decoderOptionsSchema, rawReportSchema } from '../schemas/metar.schemas';
import type { DecoderOptionsInput } from '../schemas/metar.schemas';
import type { CloudLayer, ParsedReport, Variant } from '../types/metar.types';
import {
  extractAltimeter,
  extractClouds,
  extractInternationalVisibility,
  extractStationAndTime,
  extractTemperature,
  extractUsVisibility,
  extractWind,
} from './fieldExtractors';
import { splitRemarks } from './remarksSplitter';
import { sanitizeTokens } from './tokenSanitizer';
import { selectVariant } from './variantSelector';

export type DecodeResult =
  | { ok: true; report: ParsedReport }
  | { ok: false; error: MetarDecodeError };

type ExtractedFields = Omit<ParsedReport, 'raw' | 'variant' | 'runwayVisualRange' | 'remarks'>;

function extractFields(tokens: readonly string[], variant: Variant): ExtractedFields {
  const altimeter = extractAltimeter(tokens, variant);
  const temperature = extractTemperature(altimeter.rest);
  const head = extractStationAndTime(temperature.rest);
  const wind = extractWind(head.rest);
  const visibility = variant === 'us'
    ? extractUsVisibility(wind.rest)
    : extractInternationalVisibility(wind.rest);

  let clouds: CloudLayer[] = [];
  let other = visibility.rest;
  if (!visibility.value?.cavok) {
    const extracted = extractClouds(visibility.rest);
    clouds = extracted.value;
    other = extracted.rest;
  }

  return {
    station: head.value.station,
    time: head.value.time,
    wind: wind.value,
    visibility: visibility.value,
    altimeter: altimeter.value,
    temperature: temperature.value?.temperature,
    dewpoint: temperature.value?.dewpoint,
    clouds,
    other,
  };
}

function deepFreeze<T extends object>(value: T): T {
  Object.values(value).forEach((child: unknown) => {
    if (typeof child === 'object' && child !== null) {
      deepFreeze(child);
    }
  });
  Object.freeze(value);
  return value;
}

/**
 * Decodes one raw METAR into a ParsedReport frozen all the way down.
 *
 * Only two conditions fail the decode: a report too short to hold a station and
 * time, and a station whose prefix no pipeline supports. Any other field that
 * does not match its expected shape is simply left out of the record.
 */
export function decodeMetar(raw: string, options: DecoderOptionsInput = {}): DecodeResult {
  const { variantPrecedence } = decoderOptionsSchema.parse(options);
  const text = rawReportSchema.parse(raw);
  const { body, remarks } = splitRemarks(text);
  const { tokens, runwayVisualRange } = sanitizeTokens(body.split(' '));

  if (tokens.length < 2) {
    return {
      ok: false,
      error: new MetarDecodeError('SHORT_REPORT', `Report is too short to contain a station and time: "${text}"`),
    };
  }

  const station = tokens[0];
  const variant = selectVariant(station, variantPrecedence);
  if (!variant) {
    return {
      ok: false,
      error: new MetarDecodeError('UNSUPPORTED_VARIANT', `Unsupported station identifier: ${station}`, station),
    };
  }

  const report: ParsedReport = {
    raw: text,
    variant,
    ...extractFields(tokens, variant),
    runwayVisualRange,
    remarks,
  };
  return { ok: true, report: deepFreeze(report) };
}

/**
 * @throws MetarDecodeError
 */
export function decodeMetarOrThrow(raw: string, options: DecoderOptionsInput = {}): ParsedReport {
  const result = decodeMetar(raw, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.report;
}
