// src/pipelines/flow-pipeline.ts

import { Mutex } from 'async-mutex';
import { FLOW_LINES } from '../constants/constants.js';
import { describeError, LineParseError, SinkError, toError } from '../errors.js';
import Logger, { getSharedLogger } from '../logger.js';
import { createDefaultMatchers } from '../parsers/line-matchers.js';
import { LineRecordAssembler } from '../parsers/line-record-assembler.js';
import {
  FlowPipelineOptions,
  FlowPipelineStats,
  FlowRecord,
  LoggerInstance,
  RecordSink,
  ValueRange,
} from '../types/telemetry-types.js';
import { assertTimeZone } from '../utils/time.js';
import { assertValidRange, validateFields } from '../validation/value-validator.js';

const NON_ASCII = /[^\x00-\x7f]/g;

type ResolvedOptions = Required<Omit<FlowPipelineOptions, 'flowRange' | 'velocityRange'>> &
  Pick<FlowPipelineOptions, 'flowRange' | 'velocityRange'>;

/**
 * Flowmeter line pipeline: bounded line queue -> assembler -> optional range check -> sink.
 */
export class FlowPipeline {
  private readonly options: ResolvedOptions;
  private readonly assembler: LineRecordAssembler;
  private readonly lines: string[] = [];
  private readonly mutex = new Mutex();
  private readonly logger: LoggerInstance;
  private stats: FlowPipelineStats = {
    linesReceived: 0,
    linesDropped: 0,
    parseErrors: 0,
    recordsEmitted: 0,
    recordsStored: 0,
    recordsRejected: 0,
    sinkFailures: 0,
  };

  constructor(
    private readonly sink: RecordSink<FlowRecord>,
    options: FlowPipelineOptions = {},
    loggerInstance: Logger = getSharedLogger()
  ) {
    this.options = {
      bufferSize: FLOW_LINES.BUFFER_SIZE,
      timeZone: FLOW_LINES.DEVICE_TIME_ZONE,
      timestampSource: 'capture',
      device: 'flowmeter',
      now: () => new Date(),
      ...options,
    };
    if (!Number.isInteger(this.options.bufferSize) || this.options.bufferSize <= 0) {
      throw new RangeError(`bufferSize must be a positive integer, got ${this.options.bufferSize}`);
    }
    assertTimeZone(this.options.timeZone);
    if (this.options.flowRange) assertValidRange(this.options.flowRange, 'flow');
    if (this.options.velocityRange) assertValidRange(this.options.velocityRange, 'velocity');

    this.assembler = new LineRecordAssembler(createDefaultMatchers(this.options.timeZone));
    this.logger = loggerInstance.createLogger('FlowPipeline', { device: this.options.device });
  }

  /**
   * Queues a raw line. Non-ASCII characters are dropped and blank lines ignored; once the
   * queue holds `bufferSize` lines the oldest one is discarded.
   */
  pushLine(raw: string): void {
    const line = raw.replace(NON_ASCII, '').trim();
    if (line === '') return;
    this.stats.linesReceived++;
    this.lines.push(line);
    if (this.lines.length > this.options.bufferSize) {
      this.lines.shift();
      this.stats.linesDropped++;
      this.logger.warn('Line buffer full, oldest line dropped', {
        bufferSize: this.options.bufferSize,
      });
    }
  }

  /**
   * Drains queued lines through the assembler and stores every completed record.
   * @returns records the sink accepted during this call
   */
  async processBuffer(): Promise<FlowRecord[]> {
    return this.mutex.runExclusive(async () => {
      const emitted: FlowRecord[] = [];
      let line = this.lines.shift();
      while (line !== undefined) {
        const record = this.consumeLine(line);
        if (record) {
          const stored = await this.emit(record);
          if (stored) emitted.push(stored);
        }
        line = this.lines.shift();
      }
      return emitted;
    });
  }

  /** Queues and processes one line */
  async handleLine(raw: string): Promise<FlowRecord[]> {
    this.pushLine(raw);
    return this.processBuffer();
  }

  /** Processes whatever is still queued, e.g. before the source closes */
  async flush(): Promise<FlowRecord[]> {
    return this.processBuffer();
  }

  get pendingLines(): number {
    return this.lines.length;
  }

  get accumulator(): LineRecordAssembler {
    return this.assembler;
  }

  getStats(): FlowPipelineStats {
    return { ...this.stats };
  }

  /** Drops queued lines and any partially assembled record */
  reset(): void {
    this.lines.length = 0;
    this.assembler.reset();
  }

  private consumeLine(line: string): FlowRecord | null {
    try {
      return this.assembler.consume(line);
    } catch (err: unknown) {
      if (err instanceof LineParseError) {
        this.stats.parseErrors++;
        this.logger.warn(err.message);
        return null;
      }
      throw err;
    }
  }

  /**
   * Applies the timestamp policy and range checks, then hands the record to the sink.
   * The assembler has already been reset, so a sink failure only loses this record.
   */
  private async emit(assembled: FlowRecord): Promise<FlowRecord | null> {
    this.stats.recordsEmitted++;
    const record: FlowRecord = {
      ...assembled,
      timestamp:
        this.options.timestampSource === 'capture'
          ? this.options.now().toISOString()
          : assembled.timestamp,
    };

    if (!this.passesRanges(record)) {
      this.stats.recordsRejected++;
      return null;
    }

    try {
      const ok = await this.sink.store(record);
      if (!ok) throw new SinkError(this.sink.name, 'record not accepted');
      this.stats.recordsStored++;
      this.logger.debug('Record stored', { flow: record.flow, velocity: record.velocity });
      return record;
    } catch (err: unknown) {
      const error = toError(err);
      this.stats.sinkFailures++;
      this.logger.error(`${describeError(error)}: ${error.message}`, { sink: this.sink.name });
      return null;
    }
  }

  private passesRanges(record: FlowRecord): boolean {
    const checks: Array<[ValueRange | undefined, Record<string, number>]> = [
      [this.options.flowRange, { flow: record.flow }],
      [this.options.velocityRange, { velocity: record.velocity }],
    ];
    for (const [range, fields] of checks) {
      if (!range) continue;
      const result = validateFields(fields, range);
      if (!result.accepted) {
        this.logger.warn(`Skipped record: ${result.error.message}`);
        return false;
      }
    }
    return true;
  }
}
