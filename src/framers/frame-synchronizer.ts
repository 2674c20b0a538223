// src/framers/frame-synchronizer.ts

import { TEMP_FRAME } from '../constants/constants.js';
import { FrameCandidate, FrameMatch, TempFrame } from '../types/telemetry-types.js';
import { isValidFrame } from './temp-frame.js';

/**
 * Locates 8-byte probe frames in an unaligned byte stream.
 *
 * Every start marker opens a candidate window; a window is a frame only when its last byte
 * is the end marker. Rejected windows advance the scan by one byte, so a stray 0x02 in noise
 * cannot hide a real frame that starts inside its window.
 */
export class FrameSynchronizer {
  /**
   * Finds the first valid frame at or after `from`.
   * @returns the frame (a copy) and the offset just past it, or `{ frame: null, bytesConsumed: 0 }`
   */
  decodeNextFrame(buffer: Uint8Array, from: number = 0): FrameMatch {
    const last = buffer.length - TEMP_FRAME.LENGTH;
    for (let i = Math.max(0, from); i <= last; i++) {
      if (buffer[i] !== TEMP_FRAME.START_MARKER) continue;
      const window = buffer.subarray(i, i + TEMP_FRAME.LENGTH);
      if (isValidFrame(window)) {
        return { frame: window.slice(), bytesConsumed: i + TEMP_FRAME.LENGTH };
      }
    }
    return { frame: null, bytesConsumed: 0 };
  }

  /**
   * All valid, non-overlapping frames in buffer order.
   */
  findFrames(buffer: Uint8Array): TempFrame[] {
    const frames: TempFrame[] = [];
    let offset = 0;
    while (offset <= buffer.length - TEMP_FRAME.LENGTH) {
      const { frame, bytesConsumed } = this.decodeNextFrame(buffer, offset);
      if (!frame) break;
      frames.push(frame);
      offset = bytesConsumed;
    }
    return frames;
  }

  /**
   * Every window that starts with the start marker, valid or not.
   */
  findCandidates(buffer: Uint8Array): FrameCandidate[] {
    const candidates: FrameCandidate[] = [];
    for (let i = 0; i <= buffer.length - TEMP_FRAME.LENGTH; i++) {
      if (buffer[i] !== TEMP_FRAME.START_MARKER) continue;
      const bytes = buffer.slice(i, i + TEMP_FRAME.LENGTH);
      candidates.push({ offset: i, bytes, valid: isValidFrame(bytes) });
    }
    return candidates;
  }
}
