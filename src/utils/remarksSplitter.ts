export interface SplitReport {
  body: string;
  remarks: string;
}

const REMARK_MARKERS: ReadonlySet<string> = new Set(['BECMG', 'TEMPO', 'RMK']);

/**
 * Separates the report body from trailing trend forecasts and remarks.
 * The earliest BECMG, TEMPO or RMK token starts the remarks; RMK itself is dropped.
 */
export function splitRemarks(raw: string): SplitReport {
  // Corrupted feeds occasionally carry stray '?' characters
  const tokens = raw.replace(/\?/g, ' ').split(/\s+/).filter(Boolean);
  const markerIndex = tokens.findIndex((token) => REMARK_MARKERS.has(token));

  if (markerIndex === -1) {
    return { body: tokens.join(' '), remarks: '' };
  }

  const remarkTokens = tokens[markerIndex] === 'RMK'
    ? tokens.slice(markerIndex + 1)
    : tokens.slice(markerIndex);

  return {
    body: tokens.slice(0, markerIndex).join(' '),
    remarks: remarkTokens.join(' '),
  };
}
