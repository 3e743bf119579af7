import { identSchema, stationSchema } from '../schemas/metar.schemas';

/**
 * Station identifier codec used by the station selection screen,
 * which edits a station one character slot at a time
 */

export const IDENT_CHARS: readonly string[] = [
  ...'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
  ...'0123456789',
];

/**
 * KJFK -> [10, 9, 5, 10]
 * @throws ZodError when the station is not 4 characters from A-Z or 0-9
 */
export function stationToIdent(station: string): number[] {
  const normalized = stationSchema.parse(station);
  return [...normalized].map((char) => IDENT_CHARS.indexOf(char));
}

/**
 * [10, 9, 5, 10] -> KJFK
 * @throws ZodError when the ident is not four integers from 0 to 35
 */
export function identToStation(ident: readonly number[]): string {
  return identSchema.parse(ident).map((index) => IDENT_CHARS[index]).join('');
}

/**
 * Moves one slot forward or back through the alphabet, wrapping at either end
 */
export function cycleIdentChar(ident: readonly number[], position: number, step: 1 | -1): number[] {
  const current = identSchema.parse(ident);
  if (!Number.isInteger(position) || position < 0 || position >= current.length) {
    throw new RangeError(`Ident position must be between 0 and ${current.length - 1}, got ${position}`);
  }
  return current.map((value, index) => (
    index === position
      ? (value + step + IDENT_CHARS.length) % IDENT_CHARS.length
      : value
  ));
}
