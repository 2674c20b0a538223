import { describe, expect, it, vi } from 'vitest';
import Logger from '../src/logger.js';
import { describeRecord, LoggingRecordSink } from '../src/sinks/logging-sink.js';
import { MemoryRecordSink } from '../src/sinks/memory-sink.js';
import { FlowRecord, LogEvent, TemperatureRecord } from '../src/types/telemetry-types.js';
import { createTestLogger, messagesAt } from './helpers.js';

function plainLogger(): Logger {
  const logger = new Logger();
  logger.disableColors();
  logger.setLogFormat(['level', 'logger', 'device']);
  return logger;
}

describe('Logger', () => {
  it('prints the category header and trailing context', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const log = plainLogger().createLogger('Probe', { device: 'temperature' });
    log.info('Cycle finished', { bytesRead: 16 });
    expect(info).toHaveBeenCalledWith('[INFO][Probe][D:temperature]', 'Cycle finished', '{"bytesRead":16}');
  });

  it('filters by global and category level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = plainLogger();
    const quiet = logger.createLogger('Quiet');
    const chatty = logger.createLogger('Chatty');
    chatty.setLevel('debug');

    quiet.debug('hidden');
    chatty.debug('shown');
    expect(debug).toHaveBeenCalledTimes(1);
    expect(logger.getCounts()).toMatchObject({ debug: 1 });
  });

  it('pauses a category and mutes a device', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = plainLogger();
    const log = logger.createLogger('Paused');
    log.pause();
    log.warn('dropped');
    log.resume();
    logger.mute('flowmeter');
    logger.createLogger('Pipe', { device: 'flowmeter' }).warn('also dropped');
    log.warn('kept');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('hands every event to a watcher', () => {
    const events: LogEvent[] = [];
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = plainLogger();
    logger.watch(event => events.push(event));
    logger.createLogger('Sink').error('failed', { sink: 'memory' });
    expect(events).toEqual([
      { level: 'error', args: ['failed'], context: { sink: 'memory', logger: 'Sink' } },
    ]);
  });

  it('rejects fields it cannot format', () => {
    expect(() => plainLogger().setCustomFormatter('level', String)).toThrow(
      'Invalid formatter field: level'
    );
  });
});

describe('sinks', () => {
  const flow: FlowRecord = { timestamp: '2024-03-05T07:07:09.000Z', flow: 1.5, velocity: 0.25 };
  const temperature: TemperatureRecord = {
    timestamp: '2024-03-05T07:00:00.000Z',
    t1: 36.8,
    t2: 30.4,
  };

  it('describes records in one line', () => {
    expect(describeRecord(flow)).toBe('Stored: 2024-03-05 07:07:09 | Flow: 1.500 l/s | Vel: 0.250 m/s');
    expect(describeRecord(temperature)).toBe(
      'Uploaded T1: 36.80 °C, T2: 30.40 °C at 2024-03-05T07:00:00.000Z'
    );
  });

  it('logs what it stores', async () => {
    const { logger, events } = createTestLogger();
    const sink = new LoggingRecordSink<TemperatureRecord>('log', logger);
    await expect(sink.store(temperature)).resolves.toBe(true);
    expect(messagesAt(events, 'info')).toEqual([
      'Uploaded T1: 36.80 °C, T2: 30.40 °C at 2024-03-05T07:00:00.000Z',
    ]);
  });

  it('keeps copies up to its capacity', async () => {
    const sink = new MemoryRecordSink<FlowRecord>('memory', 2);
    await sink.store(flow);
    await sink.store({ ...flow, flow: 2 });
    await sink.store({ ...flow, flow: 3 });
    expect(sink.records.map(r => r.flow)).toEqual([2, 3]);
    sink.clear();
    expect(sink.records).toHaveLength(0);
  });
});
