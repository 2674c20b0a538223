// src/sinks/logging-sink.ts

import Logger, { getSharedLogger } from '../logger.js';
import {
  FlowRecord,
  LoggerInstance,
  RecordSink,
  TelemetryRecord,
  TemperatureRecord,
} from '../types/telemetry-types.js';

function isFlowRecord(record: TelemetryRecord): record is FlowRecord {
  return 'flow' in record;
}

function formatTime(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Describes a stored record in one line.
 */
export function describeRecord(record: TelemetryRecord): string {
  if (isFlowRecord(record)) {
    return (
      `Stored: ${formatTime(record.timestamp)} | ` +
      `Flow: ${record.flow.toFixed(3)} l/s | ` +
      `Vel: ${record.velocity.toFixed(3)} m/s`
    );
  }
  const temperature: TemperatureRecord = record;
  return (
    `Uploaded T1: ${temperature.t1.toFixed(2)} °C, ` +
    `T2: ${temperature.t2.toFixed(2)} °C at ${temperature.timestamp}`
  );
}

/**
 * Sink that only reports what it receives.
 */
export class LoggingRecordSink<T extends TelemetryRecord> implements RecordSink<T> {
  readonly name: string;
  private logger: LoggerInstance;

  constructor(name: string = 'log', loggerInstance: Logger = getSharedLogger()) {
    this.name = name;
    this.logger = loggerInstance.createLogger('LoggingSink');
  }

  async store(record: T): Promise<boolean> {
    this.logger.info(describeRecord(record));
    return true;
  }
}
