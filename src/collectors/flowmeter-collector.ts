// src/collectors/flowmeter-collector.ts

import { describeError, toError } from '../errors.js';
import Logger, { getSharedLogger } from '../logger.js';
import { FlowPipeline } from '../pipelines/flow-pipeline.js';
import { LineSource, LoggerInstance } from '../types/telemetry-types.js';

/**
 * Feeds every line from the flowmeter source into the pipeline and drains it.
 */
export class FlowmeterCollector {
  private readonly logger: LoggerInstance;
  private running: boolean = false;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly source: LineSource,
    private readonly pipeline: FlowPipeline,
    loggerInstance: Logger = getSharedLogger()
  ) {
    this.logger = loggerInstance.createLogger('FlowmeterCollector');
    this.source.onLine(line => this.handleLine(line));
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) return;
    await this.source.connect();
    this.running = true;
    this.logger.info('Flowmeter collector started');
  }

  /**
   * Processes lines still queued, then closes the source.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.pending;
    await this.pipeline.flush();
    await this.source.disconnect();
    this.logger.info('Flowmeter collector stopped', { ...this.pipeline.getStats() });
  }

  /** Resolves once every line received so far has been processed */
  idle(): Promise<void> {
    return this.pending;
  }

  private handleLine(line: string): void {
    if (!this.running) return;
    this.pipeline.pushLine(line);
    this.pending = this.pending
      .then(async () => {
        await this.pipeline.processBuffer();
      })
      .catch((err: unknown) => {
        const error = toError(err);
        this.logger.error(`${describeError(error)}: ${error.message}`);
      });
  }
}
