import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import type { AppConfig } from '../types/config.types';
import type { VariantPrecedence } from '../types/metar.types';
import { stationSchema, variantPrecedenceSchema } from '../schemas/metar.schemas';

const rootEnvPath = path.resolve(__dirname, '../../.env');
if (fs.existsSync(rootEnvPath)) {
  dotenv.config({ path: rootEnvPath });
}

dotenv.config();

const parseEnv = (value: string | undefined): AppConfig['env'] => {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
};

const resolveBooleanFlag = (
  enableKey: string | undefined,
  disableKey: string | undefined,
  defaultValue: boolean,
): boolean => {
  if (enableKey !== undefined) {
    return enableKey === 'true';
  }
  if (disableKey !== undefined) {
    return disableKey !== 'true';
  }
  return defaultValue;
};

const parsePrecedence = (value: string | undefined, fallback: VariantPrecedence): VariantPrecedence => {
  const parsed = variantPrecedenceSchema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
};

const parseStation = (value: string | undefined, fallback: string): string => {
  const parsed = stationSchema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
};

/**
 * Centralized configuration management
 * Environment lookups live here; the decoder itself only ever receives the resulting values
 */
const config: AppConfig = {
  env: parseEnv(process.env.NODE_ENV),
  decoder: {
    variantPrecedence: parsePrecedence(process.env.METAR_VARIANT_PRECEDENCE, 'sub-table-first'),
  },
  display: {
    includeRemarks: resolveBooleanFlag(
      process.env.METAR_INCLUDE_REMARKS,
      process.env.METAR_EXCLUDE_REMARKS,
      false,
    ),
  },
  station: {
    defaultStation: parseStation(process.env.METAR_DEFAULT_STATION, 'KJFK'),
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    toFiles: process.env.LOG_TO_FILES === 'true',
  },
};

export default config;
