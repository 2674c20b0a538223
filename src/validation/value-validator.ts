// src/validation/value-validator.ts

import { TEMPERATURE_RANGE } from '../constants/constants.js';
import { ValueRangeError } from '../errors.js';
import { ValueRange } from '../types/telemetry-types.js';

export const DEFAULT_TEMPERATURE_RANGE: ValueRange = {
  min: TEMPERATURE_RANGE.MIN,
  max: TEMPERATURE_RANGE.MAX,
};

/**
 * Inclusive range check. NaN is never accepted.
 */
export function accept(value: number, low: number, high: number): boolean {
  return value >= low && value <= high;
}

export type ValidationResult = { accepted: true } | { accepted: false; error: ValueRangeError };

/**
 * Checks every named field against one range; the record passes only if all fields do.
 */
export function validateFields(fields: Record<string, number>, range: ValueRange): ValidationResult {
  const rejected: Record<string, number> = {};
  for (const [name, value] of Object.entries(fields)) {
    if (!accept(value, range.min, range.max)) rejected[name] = value;
  }
  if (Object.keys(rejected).length === 0) return { accepted: true };
  return { accepted: false, error: new ValueRangeError(rejected, range.min, range.max) };
}

export function validateTemperatures(
  reading: { t1: number; t2: number },
  range: ValueRange = DEFAULT_TEMPERATURE_RANGE
): ValidationResult {
  return validateFields({ t1: reading.t1, t2: reading.t2 }, range);
}

export function assertValidRange(range: ValueRange, label: string): void {
  if (!Number.isFinite(range.min) || !Number.isFinite(range.max) || range.min > range.max) {
    throw new RangeError(`${label} range is invalid: [${range.min}, ${range.max}]`);
  }
}
