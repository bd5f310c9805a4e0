import { ParseError } from '../services/ParseError';

export type DegreeDigits = 2 | 3;

const DIGITS_ONLY = /^\d+$/;

function readField(value: string, start: number, end: number): number {
  const field = value.slice(start, end);
  if (!DIGITS_ONLY.test(field)) {
    throw new ParseError(`non-numeric field "${field}" in "${value}"`, 'coordinate');
  }
  return parseInt(field, 10);
}

/**
 * Convert a fixed-width DMS string (no separators) into decimal degrees.
 *
 * `"354030"` with 2 degree digits is 35°40'30"; `"1394600"` with 3 is
 * 139°46'00". Characters past the fixed width (such as a hemisphere letter)
 * are ignored. The result is rounded to 5 decimal places.
 */
export function parseDms(value: string, integerPartDigits: DegreeDigits): number {
  const width = integerPartDigits + 4;
  if (value.length < width) {
    throw new ParseError(
      `expected at least ${width} characters, got "${value}"`,
      'coordinate',
    );
  }

  const degrees = readField(value, 0, integerPartDigits);
  const minutes = readField(value, integerPartDigits, integerPartDigits + 2);
  const seconds = readField(value, integerPartDigits + 2, width);

  const decimal = degrees + minutes / 60 + seconds / 3600;
  return Math.round(decimal * 1e5) / 1e5;
}

export const parseLatitudeDms = (value: string): number => parseDms(value, 2);

export const parseLongitudeDms = (value: string): number => parseDms(value, 3);
