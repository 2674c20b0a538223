// src/framers/temp-frame.ts

import { DISPLAY_MODE, TEMP_FRAME } from '../constants/constants.js';
import { FrameStructureError } from '../errors.js';
import { DualTemperature, TempFrame } from '../types/telemetry-types.js';
import { bcdToInt } from '../utils/bcd.js';
import { bytesToUint16BE } from '../utils/utils.js';

/**
 * True when `bytes` is a complete frame: right length, start and end markers.
 */
export function isValidFrame(bytes: Uint8Array): bytes is TempFrame {
  return (
    bytes.length === TEMP_FRAME.LENGTH &&
    bytes[0] === TEMP_FRAME.START_MARKER &&
    bytes[TEMP_FRAME.LENGTH - 1] === TEMP_FRAME.END_MARKER
  );
}

/**
 * Throws FrameStructureError naming the first structural problem found.
 */
export function assertValidFrame(bytes: Uint8Array): asserts bytes is TempFrame {
  if (bytes.length !== TEMP_FRAME.LENGTH) {
    throw new FrameStructureError(`length ${bytes.length}, expected ${TEMP_FRAME.LENGTH}`, bytes);
  }
  if (bytes[0] !== TEMP_FRAME.START_MARKER) {
    throw new FrameStructureError('bad start marker', bytes);
  }
  if (bytes[TEMP_FRAME.LENGTH - 1] !== TEMP_FRAME.END_MARKER) {
    throw new FrameStructureError('bad end marker', bytes);
  }
}

/**
 * Decodes the two ×10 big-endian channels of a dual-reading frame.
 *
 * `t1 = be16(frame[2], frame[3]) / 10`, `t2 = be16(frame[4], frame[5]) / 10`
 */
export function decodeDualTemperature(frame: Uint8Array): DualTemperature {
  assertValidFrame(frame);
  return {
    t1: bytesToUint16BE(frame, TEMP_FRAME.T1_OFFSET) / TEMP_FRAME.SCALE,
    t2: bytesToUint16BE(frame, TEMP_FRAME.T2_OFFSET) / TEMP_FRAME.SCALE,
  };
}

/**
 * Decodes a display-mode message: one signed reading spread over four BCD bytes.
 *
 * Byte 2 is the display mode (bit 2 = negative, bits 0-1 = decimal places), bytes 3-6 are
 * packed BCD bytes weighted 1000/100/10/1. Only the length and start marker are checked.
 */
export function decodeDisplayTemperature(frame: Uint8Array): number {
  if (frame.length < TEMP_FRAME.LENGTH) {
    throw new FrameStructureError(`too short: ${frame.length} bytes`, frame);
  }
  if (frame[0] !== TEMP_FRAME.START_MARKER) {
    throw new FrameStructureError('bad start marker', frame);
  }

  const mode = frame[TEMP_FRAME.DISPLAY_MODE_OFFSET] ?? 0;
  const sign = mode & DISPLAY_MODE.SIGN_NEGATIVE ? -1 : 1;
  const decimalPlaces = mode & DISPLAY_MODE.DECIMAL_POINT_MASK;

  const [d1, d2, d3, d4] = Array.from(
    frame.subarray(TEMP_FRAME.DISPLAY_DIGITS_OFFSET, TEMP_FRAME.DISPLAY_DIGITS_OFFSET + 4),
    bcdToInt
  );
  const value = (d1 ?? 0) * 1000 + (d2 ?? 0) * 100 + (d3 ?? 0) * 10 + (d4 ?? 0);
  return (sign * value) / 10 ** decimalPlaces;
}
