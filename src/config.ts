// src/config.ts

import { FLOW_LINES, SERIAL_DEFAULTS, TEMP_POLL, TEMPERATURE_RANGE } from './constants/constants.js';
import { ConfigError } from './errors.js';
import {
  FlowPipelineOptions,
  LogLevel,
  NodeSerialLineReaderOptions,
  NodeSerialTransportOptions,
  TemperatureCollectorOptions,
  TemperaturePipelineOptions,
  TimestampSource,
} from './types/telemetry-types.js';
import { assertTimeZone } from './utils/time.js';

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  logLevel: LogLevel;
  flowmeter: {
    port: string;
    reader: NodeSerialLineReaderOptions;
    pipeline: FlowPipelineOptions;
  };
  temperature: {
    port: string;
    transport: NodeSerialTransportOptions;
    pipeline: TemperaturePipelineOptions;
    collector: TemperatureCollectorOptions;
  };
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];
const TIMESTAMP_SOURCES: readonly TimestampSource[] = ['capture', 'device'];

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  { integer = false, min = -Infinity }: { integer?: boolean; min?: number } = {}
): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigError(`${key} must be a number, got "${raw}"`);
  if (integer && !Number.isInteger(value))
    throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  if (value < min) throw new ConfigError(`${key} must be >= ${min}, got "${raw}"`);
  return value;
}

function readChoice<T extends string>(
  env: Env,
  key: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const match = choices.find(choice => choice === raw.toLowerCase());
  if (match === undefined) {
    throw new ConfigError(`${key} must be one of ${choices.join(', ')}, got "${raw}"`);
  }
  return match;
}

/**
 * Builds collector options from environment variables.
 * @throws ConfigError on a malformed value
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const timeZone = readString(env, 'DEVICE_TIMEZONE', FLOW_LINES.DEVICE_TIME_ZONE);
  try {
    assertTimeZone(timeZone);
  } catch {
    throw new ConfigError(`DEVICE_TIMEZONE is not a known time zone: "${timeZone}"`);
  }

  const min = readNumber(env, 'TEMP_MIN', TEMPERATURE_RANGE.MIN);
  const max = readNumber(env, 'TEMP_MAX', TEMPERATURE_RANGE.MAX);
  if (min > max) throw new ConfigError(`TEMP_MIN (${min}) must not exceed TEMP_MAX (${max})`);

  const intervalSeconds = readNumber(
    env,
    'TEMP_READ_INTERVAL',
    TEMP_POLL.READ_INTERVAL_MS / 1000,
    { min: 1 }
  );

  return {
    logLevel: readChoice(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
    flowmeter: {
      port: readString(env, 'SERIAL_PORT', SERIAL_DEFAULTS.FLOW_PORT),
      reader: {
        baudRate: readNumber(env, 'BAUD_RATE', SERIAL_DEFAULTS.BAUD_RATE, { integer: true, min: 1 }),
      },
      pipeline: {
        bufferSize: readNumber(env, 'BUFFER_SIZE', FLOW_LINES.BUFFER_SIZE, {
          integer: true,
          min: 1,
        }),
        timeZone,
        timestampSource: readChoice(env, 'FLOW_TIMESTAMP_SOURCE', TIMESTAMP_SOURCES, 'capture'),
      },
    },
    temperature: {
      port: readString(env, 'SERIAL_PORT_TEMP', SERIAL_DEFAULTS.TEMP_PORT),
      transport: {
        baudRate: readNumber(env, 'BAUD_RATE_TEMP', SERIAL_DEFAULTS.BAUD_RATE, {
          integer: true,
          min: 1,
        }),
      },
      pipeline: {
        temperatureRange: { min, max },
        retentionBytes: readNumber(env, 'TEMP_RETENTION_BYTES', TEMP_POLL.RETENTION_BYTES, {
          integer: true,
          min: 1,
        }),
      },
      collector: {
        interval: intervalSeconds * 1000,
      },
    },
  };
}
