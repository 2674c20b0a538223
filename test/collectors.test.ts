import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FlowmeterCollector } from '../src/collectors/flowmeter-collector.js';
import { TemperatureCollector } from '../src/collectors/temperature-collector.js';
import { TooManyEmptyReadsError } from '../src/errors.js';
import Logger from '../src/logger.js';
import { FlowPipeline } from '../src/pipelines/flow-pipeline.js';
import { TemperaturePipeline } from '../src/pipelines/temperature-pipeline.js';
import PollingManager from '../src/polling-manager.js';
import { MemoryRecordSink } from '../src/sinks/memory-sink.js';
import { FlowRecord, TemperatureRecord } from '../src/types/telemetry-types.js';
import {
  concat,
  createTestLogger,
  dualFrame,
  FakeByteTransport,
  FakeLineSource,
} from './helpers.js';

const NOW = new Date('2024-03-05T07:00:00.000Z');

describe('FlowmeterCollector', () => {
  let logger: Logger;

  beforeEach(() => {
    ({ logger } = createTestLogger());
  });

  it('stores records assembled from source lines', async () => {
    const source = new FakeLineSource();
    const sink = new MemoryRecordSink<FlowRecord>();
    const collector = new FlowmeterCollector(
      source,
      new FlowPipeline(sink, { now: () => NOW }, logger),
      logger
    );

    source.emit('Flow 9 l/s');
    await collector.start();
    expect(source.isOpen).toBe(true);

    source.emit('24-03-05 14:07:09', 'Flow 1.234 l/s', 'Vel: 0.567 m/s');
    await collector.idle();
    expect(sink.records).toEqual([
      { timestamp: '2024-03-05T07:00:00.000Z', flow: 1.234, velocity: 0.567 },
    ]);

    await collector.stop();
    expect(collector.isRunning).toBe(false);
    expect(source.disconnectCalls).toBe(1);
  });

  it('processes queued lines on stop', async () => {
    const source = new FakeLineSource();
    const sink = new MemoryRecordSink<FlowRecord>();
    const pipeline = new FlowPipeline(sink, { now: () => NOW }, logger);
    const collector = new FlowmeterCollector(source, pipeline, logger);
    await collector.start();

    pipeline.pushLine('24-03-05 14:07:09');
    pipeline.pushLine('Flow 2 l/s');
    pipeline.pushLine('Vel: 1 m/s');
    await collector.stop();
    expect(sink.records).toHaveLength(1);
    expect(pipeline.pendingLines).toBe(0);
  });
});

describe('TemperatureCollector', () => {
  let logger: Logger;
  let manager: PollingManager;

  beforeEach(() => {
    vi.useFakeTimers();
    ({ logger } = createTestLogger());
    manager = new PollingManager({}, logger);
  });

  afterEach(() => {
    manager.clearAll();
    vi.useRealTimers();
  });

  function collector(
    transport: FakeByteTransport,
    sink: MemoryRecordSink<TemperatureRecord>,
    maxConsecutiveEmptyReads = 5
  ): TemperatureCollector {
    const pipeline = new TemperaturePipeline(
      transport,
      sink,
      { now: () => NOW, sleep: async () => undefined, maxConsecutiveEmptyReads },
      logger
    );
    return new TemperatureCollector(
      transport,
      pipeline,
      manager,
      { interval: 1000, sleep: async () => undefined },
      logger
    );
  }

  it('settles, then polls once per interval', async () => {
    const settle = vi.fn(async () => undefined);
    const transport = new FakeByteTransport(concat(dualFrame(364, 300), dualFrame(368, 304)));
    const sink = new MemoryRecordSink<TemperatureRecord>();
    const pipeline = new TemperaturePipeline(
      transport,
      sink,
      { now: () => NOW, sleep: async () => undefined },
      logger
    );
    const temperature = new TemperatureCollector(
      transport,
      pipeline,
      manager,
      { interval: 1000, settleDelay: 2000, sleep: settle },
      logger
    );

    await temperature.start();
    expect(transport.connectCalls).toBe(1);
    expect(settle).toHaveBeenCalledWith(2000);

    await vi.advanceTimersByTimeAsync(1);
    expect(sink.records).toEqual([{ timestamp: '2024-03-05T07:00:00.000Z', t1: 36.8, t2: 30.4 }]);
    expect(temperature.lastResult?.outcome).toBe('stored');

    await vi.advanceTimersByTimeAsync(1000);
    expect(transport.writes).toHaveLength(2);
    expect(temperature.lastResult?.outcome).toBe('no-data');
    expect(sink.records).toHaveLength(1);
  });

  it('stops itself when the probe goes quiet', async () => {
    const transport = new FakeByteTransport();
    const temperature = collector(transport, new MemoryRecordSink<TemperatureRecord>(), 2);
    await temperature.start();

    await vi.advanceTimersByTimeAsync(1);
    expect(temperature.lastResult?.outcome).toBe('no-data');
    expect(temperature.isRunning).toBe(true);

    await vi.advanceTimersByTimeAsync(1000);
    expect(temperature.isRunning).toBe(false);
    expect(temperature.stopReason).toBeInstanceOf(TooManyEmptyReadsError);
    expect(transport.disconnectCalls).toBe(1);
    expect(manager.hasTask('temperature')).toBe(false);
  });

  it('keeps polling after a transport error', async () => {
    const transport = new FakeByteTransport();
    transport.writeError = new Error('write failed');
    const temperature = collector(transport, new MemoryRecordSink<TemperatureRecord>());
    await temperature.start();

    await vi.advanceTimersByTimeAsync(1);
    transport.writeError = null;
    await vi.advanceTimersByTimeAsync(1000);
    expect(temperature.isRunning).toBe(true);
    expect(transport.writes).toHaveLength(1);
    expect(manager.getTaskStats('temperature')).toMatchObject({ failures: 1, successes: 1 });
  });
});
