// src/collectors/temperature-collector.ts

import { TEMP_POLL } from '../constants/constants.js';
import { describeError, TooManyEmptyReadsError, toError } from '../errors.js';
import Logger, { getSharedLogger } from '../logger.js';
import { TemperaturePipeline } from '../pipelines/temperature-pipeline.js';
import PollingManager from '../polling-manager.js';
import {
  ByteTransport,
  CycleResult,
  LoggerInstance,
  TemperatureCollectorOptions,
} from '../types/telemetry-types.js';
import { sleep } from '../utils/utils.js';

/**
 * Opens the probe port, lets the probe settle, then runs one pipeline cycle per interval
 * on a polling task. Stops itself when the probe stops answering.
 */
export class TemperatureCollector {
  private readonly options: Required<TemperatureCollectorOptions>;
  private readonly logger: LoggerInstance;
  private running: boolean = false;
  private _lastResult: CycleResult | null = null;
  private _stopReason: Error | null = null;

  constructor(
    private readonly transport: ByteTransport,
    private readonly pipeline: TemperaturePipeline,
    private readonly pollingManager: PollingManager = new PollingManager(),
    options: TemperatureCollectorOptions = {},
    loggerInstance: Logger = getSharedLogger()
  ) {
    this.options = {
      interval: TEMP_POLL.READ_INTERVAL_MS,
      settleDelay: TEMP_POLL.SETTLE_DELAY_MS,
      taskId: 'temperature',
      taskTimeout: 30_000,
      sleep,
      ...options,
    };
    this.logger = loggerInstance.createLogger('TemperatureCollector');
  }

  get isRunning(): boolean {
    return this.running;
  }

  get lastResult(): CycleResult | null {
    return this._lastResult;
  }

  /** Error that stopped the collector, if it stopped on its own */
  get stopReason(): Error | null {
    return this._stopReason;
  }

  async start(): Promise<void> {
    if (this.running) return;
    await this.transport.connect();
    await this.options.sleep(this.options.settleDelay);
    this.running = true;
    this._stopReason = null;

    this.pollingManager.addTask({
      id: this.options.taskId,
      name: 'temperature poll',
      interval: this.options.interval,
      maxRetries: 0,
      taskTimeout: this.options.taskTimeout,
      fn: () => this.pipeline.runCycle(),
      onData: data => this.onCycle(data),
      onError: error => this.onCycleError(error),
    });
    this.logger.info('Temperature collector started', { interval: this.options.interval });
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.pollingManager.removeTask(this.options.taskId);
    await this.transport.disconnect();
    this.logger.info('Temperature collector stopped', { ...this.pipeline.getStats() });
  }

  private onCycle(data: unknown): void {
    if (!isCycleResult(data)) return;
    this._lastResult = data;
    this.logger.debug(`Cycle finished: ${data.outcome}`, {
      bytesRead: data.bytesRead,
      framesFound: data.framesFound,
    });
  }

  private onCycleError(error: Error): void {
    if (!(error instanceof TooManyEmptyReadsError)) return;
    this._stopReason = error;
    this.logger.error('Probe stopped answering, stopping collector');
    this.stop().catch((err: unknown) => {
      const stopError = toError(err);
      this.logger.error(`${describeError(stopError)}: ${stopError.message}`);
    });
  }
}

function isCycleResult(value: unknown): value is CycleResult {
  return typeof value === 'object' && value !== null && 'outcome' in value && 'record' in value;
}
