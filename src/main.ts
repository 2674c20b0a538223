#!/usr/bin/env node
// src/main.ts

import { startCollectors, stopCollectors } from './app.js';
import { FlowmeterCollector } from './collectors/flowmeter-collector.js';
import { TemperatureCollector } from './collectors/temperature-collector.js';
import { loadConfig } from './config.js';
import { describeError, toError } from './errors.js';
import { getSharedLogger } from './logger.js';
import { FlowPipeline } from './pipelines/flow-pipeline.js';
import { TemperaturePipeline } from './pipelines/temperature-pipeline.js';
import PollingManager from './polling-manager.js';
import { LoggingRecordSink } from './sinks/logging-sink.js';
import { FlowRecord, TemperatureRecord } from './types/telemetry-types.js';
import NodeSerialLineReader from './transport/node-transports/node-serial-line-reader.js';
import NodeSerialTransport from './transport/node-transports/node-serialport.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const loggerInstance = getSharedLogger();
  loggerInstance.setLevel(config.logLevel);
  const logger = loggerInstance.createLogger('main');

  const flowmeter = new FlowmeterCollector(
    new NodeSerialLineReader(config.flowmeter.port, config.flowmeter.reader, loggerInstance),
    new FlowPipeline(
      new LoggingRecordSink<FlowRecord>('flow-log', loggerInstance),
      config.flowmeter.pipeline,
      loggerInstance
    ),
    loggerInstance
  );

  const pollingManager = new PollingManager({ logLevel: config.logLevel }, loggerInstance);
  const transport = new NodeSerialTransport(
    config.temperature.port,
    config.temperature.transport,
    loggerInstance
  );
  const temperature = new TemperatureCollector(
    transport,
    new TemperaturePipeline(
      transport,
      new LoggingRecordSink<TemperatureRecord>('temperature-log', loggerInstance),
      config.temperature.pipeline,
      loggerInstance
    ),
    pollingManager,
    config.temperature.collector,
    loggerInstance
  );

  const collectors = { flowmeter, temperature, pollingManager };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info(`Received ${signal}, shutting down`);
      void stopCollectors(collectors, logger).then(() => process.exit(0));
    });
  }

  if (!(await startCollectors(collectors, logger))) {
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  const error = toError(err);
  getSharedLogger().error(`${describeError(error)}: ${error.message}`);
  process.exitCode = 1;
});
