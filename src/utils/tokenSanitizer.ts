/**
 * Token Sanitizer
 * Cleans up a whitespace-split report body before field extraction
 */

export interface SanitizedTokens {
  tokens: string[];
  runwayVisualRange: string[];
}

// AUTO/COR flags, "no cloud" markers, maintenance flag, stray unit and calm markers
const NOISE_TOKENS: ReadonlySet<string> = new Set(['AUTO', 'COR', 'NSC', 'CLR', 'SKC', 'NCD', '$', 'KT', 'M']);
const REPORT_TYPES: ReadonlySet<string> = new Set(['METAR', 'SPECI']);
const CLOUD_TYPES: ReadonlySet<string> = new Set(['FEW', 'SCT', 'BKN', 'OVC', 'VV']);

const SPLIT_WIND_PATTERN = /^(\d{3}|VRB)\d{2,3}(G\d{2,3})?$/;
const SPLIT_VISIBILITY_PATTERN = /^[MP]?\d+(\/\d+)?$/;
const SPLIT_CLOUD_HEIGHT_PATTERN = /^(\d{3}|\/{3})$/;
const RUNWAY_VISUAL_RANGE_PATTERN = /^R\d{2}[A-Z]?\/[MP]?\d+/;
const RECENT_WEATHER_PATTERN = /^RE([A-Z]{2}|[A-Z]{4})$/;

/**
 * Never throws; unrecognised tokens are passed through untouched
 */
export function sanitizeTokens(tokens: readonly string[]): SanitizedTokens {
  const cleaned: string[] = [];
  const runwayVisualRange: string[] = [];

  tokens.forEach((token, index) => {
    if (!token) return;
    if (index === 0 && REPORT_TYPES.has(token)) return;

    const previous = cleaned.at(-1);
    if (previous !== undefined) {
      const rejoin = (token === 'KT' && SPLIT_WIND_PATTERN.test(previous))
        || (token === 'SM' && SPLIT_VISIBILITY_PATTERN.test(previous))
        || (SPLIT_CLOUD_HEIGHT_PATTERN.test(token) && CLOUD_TYPES.has(previous));
      if (rejoin) {
        cleaned[cleaned.length - 1] = `${previous}${token}`;
        return;
      }
    }

    if (NOISE_TOKENS.has(token)) return;

    if (RUNWAY_VISUAL_RANGE_PATTERN.test(token)) {
      runwayVisualRange.push(token);
      return;
    }

    if (RECENT_WEATHER_PATTERN.test(token)) return;

    cleaned.push(token);
  });

  return { tokens: cleaned, runwayVisualRange };
}
