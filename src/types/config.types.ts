/**
 * Configuration type definitions
 */

import type { DecoderOptions, DisplayOptions } from './metar.types';

export interface LoggingConfig {
  level: string;
  toFiles: boolean;
}

export interface StationConfig {
  defaultStation: string;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  decoder: DecoderOptions;
  display: DisplayOptions;
  station: StationConfig;
  logging: LoggingConfig;
}
