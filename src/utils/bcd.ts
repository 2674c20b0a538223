// src/utils/bcd.ts

import { BcdDigitError } from '../errors.js';

function checkedNibbles(byte: number): [number, number] {
  const high = (byte >> 4) & 0x0f;
  const low = byte & 0x0f;
  if (high > 9 || low > 9) {
    throw new BcdDigitError(byte);
  }
  return [high, low];
}

/**
 * Decodes one packed BCD byte (two decimal digits), e.g. 0x42 -> 42.
 */
export function bcdToInt(byte: number): number {
  const [high, low] = checkedNibbles(byte);
  return high * 10 + low;
}
