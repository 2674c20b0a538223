// src/parsers/line-matchers.ts

import { FLOW_LINES } from '../constants/constants.js';
import { LineParseError } from '../errors.js';
import { LineMatch, LineMatcher } from '../types/telemetry-types.js';
import { expandTwoDigitYear, isValidWallClock, zonedWallClockToIso } from '../utils/time.js';

const TIMESTAMP_PATTERN = /^(\d{2})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})/;
const FLOW_PATTERN = /^Flow\s+([\d.]+)\s+l\/s/;
const VELOCITY_PATTERN = /^Vel:\s+([\d.]+)\s+m\/s/;
const DECIMAL = /^(\d+\.?\d*|\.\d+)$/;

function parseDecimal(line: string, text: string): number {
  if (!DECIMAL.test(text)) {
    throw new LineParseError(line, `"${text}" is not a number`);
  }
  return Number(text);
}

/**
 * `YY-MM-DD HH:MM:SS` read as wall-clock time in a named zone.
 */
export class TimestampLineMatcher implements LineMatcher {
  readonly kind = 'timestamp';

  constructor(private readonly timeZone: string = FLOW_LINES.DEVICE_TIME_ZONE) {}

  match(line: string): LineMatch | null {
    const m = TIMESTAMP_PATTERN.exec(line);
    if (!m) return null;
    const [yy, month, day, hour, minute, second] = m.slice(1).map(Number);
    const parts = {
      year: expandTwoDigitYear(yy ?? 0),
      month: month ?? 0,
      day: day ?? 0,
      hour: hour ?? 0,
      minute: minute ?? 0,
      second: second ?? 0,
    };
    if (!isValidWallClock(parts)) {
      throw new LineParseError(line, 'not a calendar date/time');
    }
    return { kind: 'timestamp', value: zonedWallClockToIso(parts, this.timeZone) };
  }
}

/**
 * `Flow <number> l/s`
 */
export class FlowLineMatcher implements LineMatcher {
  readonly kind = 'flow';

  match(line: string): LineMatch | null {
    const m = FLOW_PATTERN.exec(line);
    if (!m) return null;
    return { kind: 'flow', value: parseDecimal(line, m[1] ?? '') };
  }
}

/**
 * `Vel: <number> m/s`
 */
export class VelocityLineMatcher implements LineMatcher {
  readonly kind = 'velocity';

  match(line: string): LineMatch | null {
    const m = VELOCITY_PATTERN.exec(line);
    if (!m) return null;
    return { kind: 'velocity', value: parseDecimal(line, m[1] ?? '') };
  }
}

/**
 * Matchers in priority order; the first one that recognises a line wins.
 */
export function createDefaultMatchers(timeZone?: string): LineMatcher[] {
  return [new TimestampLineMatcher(timeZone), new FlowLineMatcher(), new VelocityLineMatcher()];
}

/**
 * Classifies a trimmed line, or returns null when no matcher recognises it.
 */
export function classifyLine(line: string, matchers: readonly LineMatcher[]): LineMatch | null {
  const trimmed = line.trim();
  for (const matcher of matchers) {
    const result = matcher.match(trimmed);
    if (result) return result;
  }
  return null;
}
