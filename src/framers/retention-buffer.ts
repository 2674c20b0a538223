// src/framers/retention-buffer.ts

import { concatUint8Arrays, tailUint8Array } from '../utils/utils.js';

/**
 * Append-only byte buffer that keeps at most `capacity` trailing bytes after a trim.
 */
export class RetentionBuffer {
  private data: Uint8Array = new Uint8Array(0);

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Retention capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.data.length;
  }

  /** Current contents; callers must not mutate the returned view */
  get bytes(): Uint8Array {
    return this.data;
  }

  append(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.data = concatUint8Arrays([this.data, chunk]);
  }

  /**
   * Drops everything but the last `capacity` bytes.
   * @returns number of bytes dropped
   */
  trim(): number {
    const excess = this.data.length - this.capacity;
    if (excess <= 0) return 0;
    this.data = tailUint8Array(this.data, this.capacity);
    return excess;
  }

  clear(): void {
    this.data = new Uint8Array(0);
  }
}
