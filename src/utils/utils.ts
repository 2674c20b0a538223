// src/utils/utils.ts

const HEX_TABLE = '0123456789ABCDEF';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Reads a 16-bit unsigned big-endian integer.
 * @param buf - Source bytes.
 * @param offset - Index of the high byte.
 */
export function bytesToUint16BE(buf: Uint8Array, offset: number = 0): number {
  return ((buf[offset] ?? 0) << 8) | (buf[offset + 1] ?? 0);
}

/**
 * Copies the last `size` bytes of the input array, or all of it when shorter.
 */
export function tailUint8Array(arr: Uint8Array, size: number): Uint8Array {
  if (size <= 0) return new Uint8Array(0);
  return arr.slice(Math.max(0, arr.length - size));
}

/**
 * Converts bytes to space separated upper-case hex pairs ("02 01 64 03").
 */
export function toSpacedHex(uint8arr: Uint8Array): string {
  const parts: string[] = [];
  for (let i = 0; i < uint8arr.length; i++) {
    const b = uint8arr[i] ?? 0;
    parts.push((HEX_TABLE[(b >> 4) & 0xf] ?? '0') + (HEX_TABLE[b & 0xf] ?? '0'));
  }
  return parts.join(' ');
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
