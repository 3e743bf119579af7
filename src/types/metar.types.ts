/**
 * METAR report type definitions
 */

export type Variant = 'us' | 'international';

export type VariantPrecedence = 'sub-table-first' | 'single-letter-first';

export enum FlightRules {
  VFR = 'VFR',
  MVFR = 'MVFR',
  IFR = 'IFR',
  LIFR = 'LIFR',
}

export type CloudType = 'FEW' | 'SCT' | 'BKN' | 'OVC' | 'VV';

export interface CloudLayer {
  readonly type: CloudType;
  /** Hundreds of feet AGL, null when the station reports a placeholder (`///`) */
  readonly height: number | null;
  readonly modifier?: string;
  readonly repr: string;
}

export type WindDirection = number | 'variable';

export interface Wind {
  readonly direction: WindDirection;
  readonly speed: number;
  readonly gust?: number;
  readonly variable?: readonly [number, number];
  readonly unit: 'kt' | 'mps';
}

export interface Visibility {
  readonly value: number;
  readonly unit: 'SM' | 'm';
  readonly repr: string;
  readonly cavok: boolean;
  readonly qualifier?: 'less-than' | 'greater-than';
}

export interface Altimeter {
  readonly repr: string;
  readonly value: number;
  readonly unit: 'inHg' | 'hPa';
}

export interface ParsedReport {
  readonly raw: string;
  readonly variant: Variant;
  readonly station: string;
  readonly time?: string;
  readonly wind?: Wind;
  readonly visibility?: Visibility;
  readonly runwayVisualRange: readonly string[];
  readonly altimeter?: Altimeter;
  readonly temperature?: number;
  readonly dewpoint?: number;
  readonly clouds: readonly CloudLayer[];
  readonly other: readonly string[];
  readonly remarks: string;
}

/**
 * Result of a single extractor step: the claimed field plus the unclaimed tokens
 */
export interface Extraction<T> {
  value: T;
  rest: readonly string[];
}

export interface DecoderOptions {
  variantPrecedence: VariantPrecedence;
}

export interface DisplayOptions {
  includeRemarks: boolean;
}
