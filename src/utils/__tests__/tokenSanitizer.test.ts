import { sanitizeTokens } from '../tokenSanitizer';

describe('sanitizeTokens', () => {
  it('drops automated and corrected report flags', () => {
    const result = sanitizeTokens(['KTOB', '252234Z', 'AUTO', 'COR', '29019G29KT', '10SM', 'A3002']);
    expect(result.tokens).toEqual(['KTOB', '252234Z', '29019G29KT', '10SM', 'A3002']);
    expect(result.runwayVisualRange).toEqual([]);
  });

  it('drops no-cloud markers, maintenance flags and stray calm markers', () => {
    const result = sanitizeTokens(['KJFK', '251234Z', '00000KT', 'M', 'KT', 'NSC', 'CLR', 'SKC', 'NCD', '$']);
    expect(result.tokens).toEqual(['KJFK', '251234Z', '00000KT']);
  });

  it('rejoins wind, visibility and cloud groups that were split apart', () => {
    const result = sanitizeTokens(['KJFK', '251234Z', '03012', 'KT', '10', 'SM', 'BKN', '010']);
    expect(result.tokens).toEqual(['KJFK', '251234Z', '03012KT', '10SM', 'BKN010']);
  });

  it('rejoins a fractional visibility with its unit', () => {
    const result = sanitizeTokens(['KSFO', '251756Z', '2', '1/2', 'SM']);
    expect(result.tokens).toEqual(['KSFO', '251756Z', '2', '1/2SM']);
  });

  it('extracts runway visual range and drops recent weather', () => {
    const result = sanitizeTokens(['EDDF', '010200Z', 'R25L/1200', 'FG', 'R07C/P2000N', 'RERA', 'RETSRA']);
    expect(result.tokens).toEqual(['EDDF', '010200Z', 'FG']);
    expect(result.runwayVisualRange).toEqual(['R25L/1200', 'R07C/P2000N']);
  });

  it('drops a leading report type', () => {
    expect(sanitizeTokens(['METAR', 'KJFK', '251234Z']).tokens).toEqual(['KJFK', '251234Z']);
    expect(sanitizeTokens(['SPECI', 'KJFK', '251234Z']).tokens).toEqual(['KJFK', '251234Z']);
  });

  it('passes unknown tokens through and ignores empty strings', () => {
    expect(sanitizeTokens(['KJFK', '', 'VCSH', '+FC']).tokens).toEqual(['KJFK', 'VCSH', '+FC']);
  });
});
