// src/utils/time.ts

import { TWO_DIGIT_YEAR_PIVOT } from '../constants/constants.js';

export interface WallClockParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const offsetFormatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = offsetFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    offsetFormatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Throws RangeError for zones the runtime does not know.
 */
export function assertTimeZone(timeZone: string): void {
  formatterFor(timeZone);
}

export function expandTwoDigitYear(yy: number): number {
  return yy >= TWO_DIGIT_YEAR_PIVOT ? 1900 + yy : 2000 + yy;
}

export function isValidWallClock(parts: WallClockParts): boolean {
  const { year, month, day, hour, minute, second } = parts;
  if (month < 1 || month > 12) return false;
  if (hour > 23 || minute > 59 || second > 59) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day >= 1 && day <= daysInMonth;
}

/**
 * Offset of `timeZone` from UTC at the given instant, in minutes.
 */
export function zoneOffsetMinutes(instant: Date, timeZone: string): number {
  const values: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    if (part.type !== 'literal') values[part.type] = Number(part.value);
  }
  const asUtc = Date.UTC(
    values['year'] ?? 1970,
    (values['month'] ?? 1) - 1,
    values['day'] ?? 1,
    values['hour'] ?? 0,
    values['minute'] ?? 0,
    values['second'] ?? 0
  );
  const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000;
  return Math.round((asUtc - wholeSeconds) / 60_000);
}

function pad(value: number, width: number = 2): string {
  return String(Math.abs(value)).padStart(width, '0');
}

function formatOffset(minutes: number): string {
  const sign = minutes < 0 ? '-' : '+';
  return `${sign}${pad(Math.trunc(minutes / 60))}:${pad(minutes % 60)}`;
}

/**
 * Renders a wall-clock reading taken in `timeZone` as ISO-8601 with a numeric offset,
 * e.g. 2024-03-05T14:07:09+07:00.
 */
export function zonedWallClockToIso(parts: WallClockParts, timeZone: string): string {
  const naiveUtc = Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second
  );
  // second pass settles readings that straddle a DST change
  let offset = zoneOffsetMinutes(new Date(naiveUtc), timeZone);
  offset = zoneOffsetMinutes(new Date(naiveUtc - offset * 60_000), timeZone);

  const date = `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)}`;
  const time = `${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}`;
  return `${date}T${time}${formatOffset(offset)}`;
}
