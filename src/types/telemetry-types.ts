// src/types/telemetry-types.ts

// !=============================================================================
// ! Records
// !=============================================================================

/** A complete flowmeter reading */
export interface FlowRecord {
  timestamp: string;
  flow: number;
  velocity: number;
}

/** Accumulator filled line by line until every FlowRecord field is present */
export interface PartialFlowRecord {
  timestamp?: string;
  flow?: number;
  velocity?: number;
}

/** A validated pair of probe temperatures */
export interface TemperatureRecord {
  timestamp: string;
  t1: number;
  t2: number;
}

export type TelemetryRecord = FlowRecord | TemperatureRecord;

/** Where the stored FlowRecord timestamp comes from */
export type TimestampSource = 'capture' | 'device';

export interface ValueRange {
  min: number;
  max: number;
}

// !=============================================================================
// ! Frames
// !=============================================================================

/** Exactly TEMP_FRAME.LENGTH bytes with both markers checked */
export type TempFrame = Uint8Array;

export interface FrameMatch {
  frame: TempFrame | null;
  /** Offset just past the frame, 0 when nothing was found */
  bytesConsumed: number;
}

/** 8-byte window starting with the start marker */
export interface FrameCandidate {
  offset: number;
  bytes: Uint8Array;
  valid: boolean;
}

export interface DualTemperature {
  t1: number;
  t2: number;
}

// !=============================================================================
// ! Line matching
// !=============================================================================

export type LineMatch =
  | { kind: 'timestamp'; value: string }
  | { kind: 'flow'; value: number }
  | { kind: 'velocity'; value: number };

export interface LineMatcher {
  readonly kind: LineMatch['kind'];
  /** Returns null when the line is not of this kind; throws LineParseError when it is but is malformed */
  match(line: string): LineMatch | null;
}

// !=============================================================================
// ! Collaborators
// !=============================================================================

/** Half-duplex byte link (temperature probe) */
export interface ByteTransport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  /** Resolves with up to maxLength bytes; an empty array means nothing arrived */
  read(maxLength: number, timeout?: number): Promise<Uint8Array>;
  flush?(): Promise<void>;
}

export type LineHandler = (line: string) => void;

/** Line-oriented text link (flowmeter) */
export interface LineSource {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  onLine(handler: LineHandler): void;
}

export interface RecordSink<T extends TelemetryRecord> {
  readonly name: string;
  /** Resolves true when the record was accepted */
  store(record: T): Promise<boolean>;
}

// !=============================================================================
// ! Logging
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type LogField = 'timestamp' | 'level' | 'logger' | 'device' | 'port';

/** Structured fields attached to a log line */
export interface LogContext {
  logger?: string;
  device?: string;
  port?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogEvent {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Serial options
// !=============================================================================

export interface NodeSerialTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  readTimeout?: number;
  maxBufferSize?: number;
  connectAttempts?: number;
  connectRetryDelay?: number;
}

export interface NodeSerialLineReaderOptions {
  baudRate?: number;
  delimiter?: string;
  connectAttempts?: number;
  connectRetryDelay?: number;
}

// !=============================================================================
// ! Pipelines
// !=============================================================================

export interface FlowPipelineOptions {
  bufferSize?: number;
  timeZone?: string;
  timestampSource?: TimestampSource;
  flowRange?: ValueRange;
  velocityRange?: ValueRange;
  device?: string;
  now?: () => Date;
}

export interface FlowPipelineStats {
  linesReceived: number;
  linesDropped: number;
  parseErrors: number;
  recordsEmitted: number;
  recordsStored: number;
  recordsRejected: number;
  sinkFailures: number;
}

export interface TemperaturePipelineOptions {
  pollCommand?: number;
  responseDelay?: number;
  readChunkSize?: number;
  readTimeout?: number;
  retentionBytes?: number;
  temperatureRange?: ValueRange;
  maxConsecutiveEmptyReads?: number;
  device?: string;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export type CycleOutcome =
  | 'stored'
  | 'sink-failed'
  | 'out-of-range'
  | 'insufficient-frames'
  | 'no-data';

export interface CycleResult {
  outcome: CycleOutcome;
  bytesRead: number;
  framesFound: number;
  record: TemperatureRecord | null;
}

export interface TemperaturePipelineStats {
  cycles: number;
  emptyReads: number;
  consecutiveEmptyReads: number;
  framesFound: number;
  recordsStored: number;
  recordsRejected: number;
  sinkFailures: number;
}

// !=============================================================================
// ! Collectors
// !=============================================================================

export interface TemperatureCollectorOptions {
  /** Time between poll cycles, ms */
  interval?: number;
  /** Wait after opening the port before the first poll, ms */
  settleDelay?: number;
  taskId?: string;
  taskTimeout?: number;
  sleep?: (ms: number) => Promise<void>;
}

// !=============================================================================
// ! Polling
// !=============================================================================

export interface PollingManagerConfig {
  defaultMaxRetries?: number;
  defaultBackoffDelay?: number;
  defaultTaskTimeout?: number;
  logLevel?: LogLevel;
}

export interface PollingTaskOptions {
  id: string;
  interval: number;
  fn: () => Promise<unknown>;
  onData?: (data: unknown) => void;
  onError?: (error: Error, retryCount: number) => void;
  name?: string;
  immediate?: boolean;
  maxRetries?: number;
  backoffDelay?: number;
  taskTimeout?: number;
}

export interface PollingTaskState {
  stopped: boolean;
  paused: boolean;
  running: boolean;
  inProgress: boolean;
}

export interface PollingTaskStats {
  totalRuns: number;
  totalErrors: number;
  lastError: Error | null;
  lastResult: unknown;
  lastRunTime: number | null;
  retries: number;
  successes: number;
  failures: number;
}
