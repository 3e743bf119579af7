import logger from '../utils/logger';
import config from '../config';
import { decodeMetar } from '../utils/metarParser';
import type { DecodeResult } from '../utils/metarParser';
import { getFlightRules } from '../utils/flightRules';
import { stationToIdent } from '../utils/stationIdent';
import { createDisplayData, summarizeReport } from '../utils/weatherDecoder';
import type { DisplayData, ReportSummary } from '../utils/weatherDecoder';
import { translateOtherWeather } from '../utils/weatherTranslator';
import type {
  DecoderOptions,
  DisplayOptions,
  FlightRules,
  ParsedReport,
} from '../types/metar.types';

export interface MetarDecoderServiceOptions {
  decoder: DecoderOptions;
  display: DisplayOptions;
  defaultStation: string;
}

/**
 * Decoding entry point for the presentation layer: applies the configured
 * options to the pure decoder and logs the outcome of every decode
 */
export class MetarDecoderService {
  private readonly options: MetarDecoderServiceOptions;

  constructor(options?: Partial<MetarDecoderServiceOptions>) {
    this.options = {
      decoder: options?.decoder ?? config.decoder,
      display: options?.display ?? config.display,
      defaultStation: options?.defaultStation ?? config.station.defaultStation,
    };
  }

  decode(raw: string): DecodeResult {
    const result = decodeMetar(raw, this.options.decoder);

    if (!result.ok) {
      logger.warn('METAR decode failed', {
        code: result.error.code,
        station: result.error.station,
        message: result.error.message,
      });
      return result;
    }

    logger.debug('METAR decoded', {
      station: result.report.station,
      variant: result.report.variant,
      unclaimed: result.report.other.length,
    });
    return result;
  }

  /**
   * @throws MetarDecodeError
   */
  decodeOrThrow(raw: string): ParsedReport {
    const result = this.decode(raw);
    if (!result.ok) {
      throw result.error;
    }
    return result.report;
  }

  flightRules(report: ParsedReport): FlightRules {
    return getFlightRules(report);
  }

  translateWeather(report: ParsedReport): string[] {
    return translateOtherWeather(report);
  }

  summarize(report: ParsedReport): ReportSummary {
    return summarizeReport(report);
  }

  displayData(report: ParsedReport): DisplayData {
    return createDisplayData(report, this.options.display);
  }

  defaultStationIdent(): number[] {
    return stationToIdent(this.options.defaultStation);
  }
}

const metarDecoderService = new MetarDecoderService();
export default metarDecoderService;
