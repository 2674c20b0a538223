import { describe, expect, it } from 'vitest';
import { BcdDigitError, FrameStructureError } from '../src/errors.js';
import {
  assertValidFrame,
  decodeDisplayTemperature,
  decodeDualTemperature,
  isValidFrame,
} from '../src/framers/temp-frame.js';
import { bcdToInt } from '../src/utils/bcd.js';
import { dualFrame } from './helpers.js';

describe('isValidFrame', () => {
  it('accepts 8 bytes framed by 0x02 and 0x03', () => {
    expect(isValidFrame(Uint8Array.of(0x02, 0, 0, 0, 0, 0, 0, 0x03))).toBe(true);
  });

  it('rejects a wrong end marker', () => {
    expect(isValidFrame(Uint8Array.of(0x02, 0, 0, 0, 0, 0, 0, 0x04))).toBe(false);
  });

  it('rejects a wrong length', () => {
    expect(isValidFrame(Uint8Array.of(0x02, 0, 0, 0, 0, 0, 0x03))).toBe(false);
  });
});

describe('assertValidFrame', () => {
  it('names the structural problem', () => {
    expect(() => assertValidFrame(Uint8Array.of(0x02, 0x00, 0x03))).toThrow(
      'Invalid frame (length 3, expected 8): 02 00 03'
    );
    expect(() => assertValidFrame(Uint8Array.of(0x01, 0, 0, 0, 0, 0, 0, 0x03))).toThrow(
      'Invalid frame (bad start marker): 01 00 00 00 00 00 00 03'
    );
    expect(() => assertValidFrame(Uint8Array.of(0x02, 0, 0, 0, 0, 0, 0, 0x00))).toThrow(
      FrameStructureError
    );
  });
});

describe('decodeDualTemperature', () => {
  it('decodes both big-endian channels scaled by 10', () => {
    // 0x016C = 364, 0x012C = 300
    const frame = Uint8Array.of(0x02, 0x00, 0x01, 0x6c, 0x01, 0x2c, 0x00, 0x03);
    expect(decodeDualTemperature(frame)).toEqual({ t1: 36.4, t2: 30 });
  });

  it('decodes the full unsigned range', () => {
    expect(decodeDualTemperature(dualFrame(0xffff, 0))).toEqual({ t1: 6553.5, t2: 0 });
  });

  it('refuses an invalid frame', () => {
    expect(() => decodeDualTemperature(Uint8Array.of(0x02, 0x00, 0x01))).toThrow(
      FrameStructureError
    );
  });
});

describe('decodeDisplayTemperature', () => {
  it('applies the decimal point position', () => {
    // digits 00 00 12 34 -> 0*1000 + 0*100 + 12*10 + 34 = 154, one decimal place
    const frame = Uint8Array.of(0x02, 0x00, 0x01, 0x00, 0x00, 0x12, 0x34, 0x03);
    expect(decodeDisplayTemperature(frame)).toBe(15.4);
  });

  it('applies the sign bit', () => {
    const frame = Uint8Array.of(0x02, 0x00, 0x05, 0x00, 0x00, 0x12, 0x34, 0x03);
    expect(decodeDisplayTemperature(frame)).toBe(-15.4);
  });

  it('reads two decimal places', () => {
    // 0*1000 + 1*100 + 0*10 + 5 = 105
    const frame = Uint8Array.of(0x02, 0x00, 0x02, 0x00, 0x01, 0x00, 0x05, 0x03);
    expect(decodeDisplayTemperature(frame)).toBe(1.05);
  });

  it('does not look at the end marker', () => {
    const frame = Uint8Array.of(0x02, 0x00, 0x00, 0x00, 0x00, 0x00, 0x07, 0xff);
    expect(decodeDisplayTemperature(frame)).toBe(7);
  });

  it('rejects short input and bad digits', () => {
    expect(() => decodeDisplayTemperature(Uint8Array.of(0x02, 0x00, 0x01))).toThrow(
      'Invalid frame (too short: 3 bytes): 02 00 01'
    );
    const badDigit = Uint8Array.of(0x02, 0x00, 0x01, 0x1a, 0x00, 0x00, 0x00, 0x03);
    expect(() => decodeDisplayTemperature(badDigit)).toThrow(BcdDigitError);
  });
});

describe('bcd', () => {
  it('decodes packed digits', () => {
    expect(bcdToInt(0x42)).toBe(42);
    expect(bcdToInt(0x09)).toBe(9);
  });

  it('rejects a nibble above 9', () => {
    expect(() => bcdToInt(0xab)).toThrow('Invalid BCD byte: 0xAB');
    expect(() => bcdToInt(0x3f)).toThrow(BcdDigitError);
  });
});
