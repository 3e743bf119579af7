import { ZodError } from 'zod';
import {
  IDENT_CHARS,
  cycleIdentChar,
  identToStation,
  stationToIdent,
} from '../stationIdent';

describe('stationIdent', () => {
  it('has 36 symbols, letters first', () => {
    expect(IDENT_CHARS).toHaveLength(36);
    expect(IDENT_CHARS[0]).toBe('A');
    expect(IDENT_CHARS[25]).toBe('Z');
    expect(IDENT_CHARS[26]).toBe('0');
    expect(IDENT_CHARS[35]).toBe('9');
  });

  it('encodes stations', () => {
    expect(stationToIdent('KJFK')).toEqual([10, 9, 5, 10]);
    expect(stationToIdent('K1A5')).toEqual([10, 27, 0, 31]);
    expect(stationToIdent('kjfk')).toEqual([10, 9, 5, 10]);
  });

  it('decodes idents', () => {
    expect(identToStation([10, 9, 5, 10])).toBe('KJFK');
    expect(identToStation([4, 6, 11, 11])).toBe('EGLL');
  });

  it('round-trips identifiers drawn from the alphabet', () => {
    ['KJFK', 'EGLL', 'MROC', 'K1A5', '00A0', 'ZZZ9'].forEach((station) => {
      expect(identToStation(stationToIdent(station))).toBe(station);
    });
    IDENT_CHARS.forEach((char, index) => {
      const station = `${char}${IDENT_CHARS[35 - index]}${char}${char}`;
      expect(identToStation(stationToIdent(station))).toBe(station);
    });
  });

  it('rejects malformed input', () => {
    expect(() => stationToIdent('KJF')).toThrow(ZodError);
    expect(() => stationToIdent('KJ-K')).toThrow(ZodError);
    expect(() => identToStation([36, 0, 0, 0])).toThrow(ZodError);
    expect(() => identToStation([1, 2, 3])).toThrow(ZodError);
    expect(() => identToStation([1, 2, 3, 4.5])).toThrow(ZodError);
  });

  describe('cycleIdentChar', () => {
    it('steps one slot and wraps at both ends', () => {
      expect(cycleIdentChar([10, 9, 5, 10], 3, 1)).toEqual([10, 9, 5, 11]);
      expect(cycleIdentChar([0, 0, 0, 0], 0, -1)).toEqual([35, 0, 0, 0]);
      expect(cycleIdentChar([35, 0, 0, 0], 0, 1)).toEqual([0, 0, 0, 0]);
    });

    it('does not modify the input', () => {
      const ident = [10, 9, 5, 10];
      cycleIdentChar(ident, 0, 1);
      expect(ident).toEqual([10, 9, 5, 10]);
    });

    it('rejects positions outside the ident', () => {
      expect(() => cycleIdentChar([10, 9, 5, 10], 4, 1)).toThrow(RangeError);
      expect(() => cycleIdentChar([10, 9, 5, 10], -1, 1)).toThrow(RangeError);
    });
  });
});
