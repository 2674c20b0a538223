// src/errors.ts

import { toSpacedHex } from './utils/utils.js';

/**
 * Base class for all telemetry errors
 */
export class TelemetryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TelemetryError';
  }
}

// --- Structural errors: the offending unit is discarded, decoding continues ---

/**
 * Base class for malformed input units (frames, lines, digits)
 */
export class StructuralError extends TelemetryError {
  constructor(message: string = 'Malformed input unit') {
    super(message);
    this.name = 'StructuralError';
  }
}

/**
 * Error class for a frame with the wrong length or markers
 */
export class FrameStructureError extends StructuralError {
  readonly bytes: Uint8Array;

  constructor(reason: string, bytes: Uint8Array) {
    super(`Invalid frame (${reason}): ${toSpacedHex(bytes)}`);
    this.name = 'FrameStructureError';
    this.bytes = bytes;
  }
}

/**
 * Error class for a text line that matched a pattern but could not be parsed
 */
export class LineParseError extends StructuralError {
  readonly line: string;

  constructor(line: string, reason: string) {
    super(`Cannot parse line "${line}": ${reason}`);
    this.name = 'LineParseError';
    this.line = line;
  }
}

/**
 * Error class for a nibble above 9 in a BCD byte
 */
export class BcdDigitError extends StructuralError {
  constructor(byte: number) {
    super(`Invalid BCD byte: 0x${byte.toString(16).padStart(2, '0').toUpperCase()}`);
    this.name = 'BcdDigitError';
  }
}

// --- Range errors: the record is dropped and reported ---

/**
 * Error class for decoded values outside the accepted physical range
 */
export class ValueRangeError extends TelemetryError {
  readonly rejected: Record<string, number>;
  readonly min: number;
  readonly max: number;

  constructor(rejected: Record<string, number>, min: number, max: number) {
    const values = Object.entries(rejected)
      .map(([field, value]) => `${field}=${value}`)
      .join(', ');
    super(`Value out of range [${min}, ${max}]: ${values}`);
    this.name = 'ValueRangeError';
    this.rejected = rejected;
    this.min = min;
    this.max = max;
  }
}

// --- Source errors: owned by the serial collaborator ---

/**
 * Base class for device I/O failures
 */
export class SourceError extends TelemetryError {
  constructor(message: string = 'Serial source error') {
    super(message);
    this.name = 'SourceError';
  }
}

export class SerialConnectionError extends SourceError {
  constructor(message: string = 'Serial connection error') {
    super(message);
    this.name = 'SerialConnectionError';
  }
}

export class SerialReadError extends SourceError {
  constructor(message: string = 'Serial read error') {
    super(message);
    this.name = 'SerialReadError';
  }
}

export class SerialWriteError extends SourceError {
  constructor(message: string = 'Serial write error') {
    super(message);
    this.name = 'SerialWriteError';
  }
}

/**
 * Error class for a probe that stopped answering polls
 */
export class TooManyEmptyReadsError extends SourceError {
  readonly count: number;

  constructor(count: number) {
    super(`No data received for ${count} consecutive polls`);
    this.name = 'TooManyEmptyReadsError';
    this.count = count;
  }
}

// --- Sink, config, polling ---

/**
 * Error class for a record the sink refused or failed to store
 */
export class SinkError extends TelemetryError {
  readonly sink: string;

  constructor(sink: string, message: string) {
    super(`Sink "${sink}" failed: ${message}`);
    this.name = 'SinkError';
    this.sink = sink;
  }
}

export class ConfigError extends TelemetryError {
  constructor(message: string = 'Invalid configuration') {
    super(message);
    this.name = 'ConfigError';
  }
}

export class TimeoutError extends TelemetryError {
  constructor(message: string = 'Operation timed out') {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class PollingError extends TelemetryError {
  constructor(message: string) {
    super(message);
    this.name = 'PollingError';
  }
}

export class PollingTaskAlreadyExistsError extends PollingError {
  constructor(id: string) {
    super(`Polling task with id "${id}" already exists.`);
    this.name = 'PollingTaskAlreadyExistsError';
  }
}

export class PollingTaskNotFoundError extends PollingError {
  constructor(id: string) {
    super(`Polling task with id "${id}" does not exist.`);
    this.name = 'PollingTaskNotFoundError';
  }
}

export class PollingTaskValidationError extends PollingError {
  constructor(message: string) {
    super(message);
    this.name = 'PollingTaskValidationError';
  }
}

const ERROR_DESCRIPTIONS: Array<[new (...args: never[]) => Error, string]> = [
  [FrameStructureError, 'Frame structure error'],
  [LineParseError, 'Line parse error'],
  [BcdDigitError, 'BCD digit error'],
  [StructuralError, 'Structural error'],
  [ValueRangeError, 'Value range error'],
  [TooManyEmptyReadsError, 'Too many empty reads'],
  [SerialConnectionError, 'Serial connection error'],
  [SerialReadError, 'Serial read error'],
  [SerialWriteError, 'Serial write error'],
  [SourceError, 'Source error'],
  [SinkError, 'Sink error'],
  [ConfigError, 'Configuration error'],
  [TimeoutError, 'Timeout'],
  [PollingError, 'Polling error'],
];

/**
 * Short operator-facing label for an error, most specific class first.
 */
export function describeError(err: unknown): string {
  for (const [ctor, description] of ERROR_DESCRIPTIONS) {
    if (err instanceof ctor) return description;
  }
  return 'Unknown error';
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new TelemetryError(String(err));
}
