// src/pipelines/temperature-pipeline.ts

import { Mutex } from 'async-mutex';
import { TEMP_POLL } from '../constants/constants.js';
import { describeError, SinkError, toError, TooManyEmptyReadsError } from '../errors.js';
import { FrameSynchronizer } from '../framers/frame-synchronizer.js';
import { RetentionBuffer } from '../framers/retention-buffer.js';
import { decodeDualTemperature } from '../framers/temp-frame.js';
import Logger, { getSharedLogger } from '../logger.js';
import {
  ByteTransport,
  CycleResult,
  LoggerInstance,
  RecordSink,
  TempFrame,
  TemperaturePipelineOptions,
  TemperaturePipelineStats,
  TemperatureRecord,
} from '../types/telemetry-types.js';
import { sleep, toSpacedHex } from '../utils/utils.js';
import {
  assertValidRange,
  DEFAULT_TEMPERATURE_RANGE,
  validateTemperatures,
} from '../validation/value-validator.js';

/**
 * Temperature probe poll cycle.
 *
 * Each cycle writes the poll command, waits for the probe to answer, appends whatever arrived
 * to the retained buffer and scans all of it. Only the second valid frame is uploaded: the
 * probe's first answer after a poll is not a settled reading. The buffer is then cut back to
 * the retention window.
 */
export class TemperaturePipeline {
  private readonly options: Required<TemperaturePipelineOptions>;
  private readonly buffer: RetentionBuffer;
  private readonly synchronizer = new FrameSynchronizer();
  private readonly mutex = new Mutex();
  private readonly logger: LoggerInstance;
  private lastValidFrame: TempFrame | null = null;
  private stats: TemperaturePipelineStats = {
    cycles: 0,
    emptyReads: 0,
    consecutiveEmptyReads: 0,
    framesFound: 0,
    recordsStored: 0,
    recordsRejected: 0,
    sinkFailures: 0,
  };

  constructor(
    private readonly transport: ByteTransport,
    private readonly sink: RecordSink<TemperatureRecord>,
    options: TemperaturePipelineOptions = {},
    loggerInstance: Logger = getSharedLogger()
  ) {
    this.options = {
      pollCommand: TEMP_POLL.COMMAND,
      responseDelay: TEMP_POLL.RESPONSE_DELAY_MS,
      readChunkSize: TEMP_POLL.READ_CHUNK_SIZE,
      readTimeout: TEMP_POLL.READ_TIMEOUT_MS,
      retentionBytes: TEMP_POLL.RETENTION_BYTES,
      temperatureRange: DEFAULT_TEMPERATURE_RANGE,
      maxConsecutiveEmptyReads: TEMP_POLL.MAX_CONSECUTIVE_EMPTY_READS,
      device: 'temperature',
      now: () => new Date(),
      sleep,
      ...options,
    };
    assertValidRange(this.options.temperatureRange, 'temperature');
    this.buffer = new RetentionBuffer(this.options.retentionBytes);
    this.logger = loggerInstance.createLogger('TemperaturePipeline', {
      device: this.options.device,
    });
  }

  /**
   * Runs one poll cycle.
   * @throws TooManyEmptyReadsError once `maxConsecutiveEmptyReads` polls in a row returned nothing
   * @throws SourceError from the transport; buffer contents are left as they were
   */
  async runCycle(): Promise<CycleResult> {
    return this.mutex.runExclusive(async () => {
      this.stats.cycles++;
      await this.transport.write(Uint8Array.of(this.options.pollCommand));
      this.logger.debug(`Sent poll command 0x${this.options.pollCommand.toString(16)}`);
      await this.options.sleep(this.options.responseDelay);

      const chunk = await this.transport.read(this.options.readChunkSize, this.options.readTimeout);
      if (chunk.length === 0) {
        return this.handleEmptyRead();
      }
      this.stats.consecutiveEmptyReads = 0;
      this.logger.debug(`Received ${chunk.length} bytes: ${toSpacedHex(chunk)}`);
      return this.ingest(chunk);
    });
  }

  /**
   * Appends bytes, selects and uploads a frame, trims. For callers that read the probe
   * themselves.
   */
  async processChunk(chunk: Uint8Array): Promise<CycleResult> {
    return this.mutex.runExclusive(() => this.ingest(chunk));
  }

  /** Frame picked for upload from a buffer: the second valid one, if any */
  selectFrame(frames: readonly TempFrame[]): TempFrame | null {
    return frames[TEMP_POLL.SELECTED_FRAME_INDEX] ?? null;
  }

  get retainedBytes(): Uint8Array {
    return this.buffer.bytes.slice();
  }

  get lastFrame(): TempFrame | null {
    return this.lastValidFrame;
  }

  getStats(): TemperaturePipelineStats {
    return { ...this.stats };
  }

  reset(): void {
    this.buffer.clear();
    this.stats.consecutiveEmptyReads = 0;
  }

  private async ingest(chunk: Uint8Array): Promise<CycleResult> {
    this.buffer.append(chunk);
    try {
      return await this.selectAndStore(chunk.length);
    } finally {
      const dropped = this.buffer.trim();
      if (dropped > 0) this.logger.trace(`Trimmed ${dropped} bytes from retained buffer`);
    }
  }

  private handleEmptyRead(): CycleResult {
    this.stats.emptyReads++;
    this.stats.consecutiveEmptyReads++;
    this.logger.debug('No data received');
    if (this.stats.consecutiveEmptyReads >= this.options.maxConsecutiveEmptyReads) {
      this.logger.error('Too many consecutive empty reads, check the probe connection');
      if (this.lastValidFrame) {
        this.logger.info(`Last valid frame was: ${toSpacedHex(this.lastValidFrame)}`);
      }
      throw new TooManyEmptyReadsError(this.stats.consecutiveEmptyReads);
    }
    return { outcome: 'no-data', bytesRead: 0, framesFound: 0, record: null };
  }

  private async selectAndStore(bytesRead: number): Promise<CycleResult> {
    const retained = this.buffer.bytes;
    this.logger.trace(`Full buffer: ${toSpacedHex(retained)}`);
    for (const candidate of this.synchronizer.findCandidates(retained)) {
      this.logger.trace(
        `${candidate.valid ? 'Frame' : 'Candidate'} at ${candidate.offset}: ${toSpacedHex(candidate.bytes)}`
      );
    }

    const frames = this.synchronizer.findFrames(retained);
    this.stats.framesFound += frames.length;
    const lastFrame = frames[frames.length - 1];
    if (lastFrame) this.lastValidFrame = lastFrame;

    const selected = this.selectFrame(frames);
    if (!selected) {
      this.logger.debug(`Found ${frames.length} valid frame(s), waiting for a second one`);
      return { outcome: 'insufficient-frames', bytesRead, framesFound: frames.length, record: null };
    }

    const reading = decodeDualTemperature(selected);
    const validation = validateTemperatures(reading, this.options.temperatureRange);
    if (!validation.accepted) {
      this.stats.recordsRejected++;
      this.logger.warn(`Skipped upload: ${validation.error.message}`);
      return { outcome: 'out-of-range', bytesRead, framesFound: frames.length, record: null };
    }

    const record: TemperatureRecord = {
      timestamp: this.options.now().toISOString(),
      t1: reading.t1,
      t2: reading.t2,
    };
    this.logger.debug(`Selected frame ${toSpacedHex(selected)}`, { t1: record.t1, t2: record.t2 });

    try {
      const ok = await this.sink.store(record);
      if (!ok) throw new SinkError(this.sink.name, 'record not accepted');
      this.stats.recordsStored++;
      return { outcome: 'stored', bytesRead, framesFound: frames.length, record };
    } catch (err: unknown) {
      const error = toError(err);
      this.stats.sinkFailures++;
      this.logger.error(`${describeError(error)}: ${error.message}`, { sink: this.sink.name });
      return { outcome: 'sink-failed', bytesRead, framesFound: frames.length, record };
    }
  }
}
