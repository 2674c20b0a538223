// src/index.ts

export * from './errors.js';
export * from './types/telemetry-types.js';
export * from './constants/constants.js';

export { default as Logger, getSharedLogger } from './logger.js';
export { loadConfig } from './config.js';
export type { AppConfig, Env } from './config.js';

export { bcdToInt } from './utils/bcd.js';
export { toSpacedHex, bytesToUint16BE } from './utils/utils.js';
export { connectWithRetry } from './utils/retry.js';
export type { ConnectRetryOptions } from './utils/retry.js';
export { zonedWallClockToIso, expandTwoDigitYear } from './utils/time.js';

export {
  isValidFrame,
  assertValidFrame,
  decodeDualTemperature,
  decodeDisplayTemperature,
} from './framers/temp-frame.js';
export { FrameSynchronizer } from './framers/frame-synchronizer.js';
export { RetentionBuffer } from './framers/retention-buffer.js';

export {
  TimestampLineMatcher,
  FlowLineMatcher,
  VelocityLineMatcher,
  createDefaultMatchers,
  classifyLine,
} from './parsers/line-matchers.js';
export { LineRecordAssembler } from './parsers/line-record-assembler.js';

export {
  accept,
  validateFields,
  validateTemperatures,
  DEFAULT_TEMPERATURE_RANGE,
} from './validation/value-validator.js';
export type { ValidationResult } from './validation/value-validator.js';

export { FlowPipeline } from './pipelines/flow-pipeline.js';
export { TemperaturePipeline } from './pipelines/temperature-pipeline.js';
export { default as PollingManager } from './polling-manager.js';
export { FlowmeterCollector } from './collectors/flowmeter-collector.js';
export { TemperatureCollector } from './collectors/temperature-collector.js';
export { startCollectors, stopCollectors } from './app.js';
export type { Collectors } from './app.js';

export { LoggingRecordSink, describeRecord } from './sinks/logging-sink.js';
export { MemoryRecordSink } from './sinks/memory-sink.js';

export { default as NodeSerialTransport } from './transport/node-transports/node-serialport.js';
export { default as NodeSerialLineReader } from './transport/node-transports/node-serial-line-reader.js';
