// test/helpers.ts

import { vi } from 'vitest';
import Logger from '../src/logger.js';
import {
  ByteTransport,
  LineHandler,
  LineSource,
  LogEvent,
  RecordSink,
  TelemetryRecord,
} from '../src/types/telemetry-types.js';

/**
 * Logger whose console output is swallowed; every line that passes the level filter is
 * collected in `events`.
 */
export function createTestLogger(): { logger: Logger; events: LogEvent[] } {
  for (const method of ['trace', 'debug', 'info', 'warn', 'error', 'log'] as const) {
    vi.spyOn(console, method).mockImplementation(() => undefined);
  }
  const logger = new Logger();
  logger.disableColors();
  const events: LogEvent[] = [];
  logger.watch(event => events.push(event));
  return { logger, events };
}

export function messagesAt(events: LogEvent[], level: LogEvent['level']): string[] {
  return events.filter(e => e.level === level).map(e => String(e.args[0]));
}

/**
 * In-memory probe link: each `read` hands out the next queued chunk, or nothing.
 */
export class FakeByteTransport implements ByteTransport {
  isOpen = false;
  readonly writes: Uint8Array[] = [];
  readonly chunks: Uint8Array[] = [];
  connectCalls = 0;
  disconnectCalls = 0;
  writeError: Error | null = null;

  constructor(...chunks: Uint8Array[]) {
    this.chunks.push(...chunks);
  }

  async connect(): Promise<void> {
    this.connectCalls++;
    this.isOpen = true;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.isOpen = false;
  }

  async write(buffer: Uint8Array): Promise<void> {
    if (this.writeError) throw this.writeError;
    this.writes.push(buffer.slice());
  }

  async read(maxLength: number): Promise<Uint8Array> {
    const next = this.chunks.shift();
    return next ? next.slice(0, maxLength) : new Uint8Array(0);
  }
}

export class FakeLineSource implements LineSource {
  isOpen = false;
  disconnectCalls = 0;
  private handlers: LineHandler[] = [];

  async connect(): Promise<void> {
    this.isOpen = true;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.isOpen = false;
  }

  onLine(handler: LineHandler): void {
    this.handlers.push(handler);
  }

  emit(...lines: string[]): void {
    for (const line of lines) {
      for (const handler of this.handlers) handler(line);
    }
  }
}

/** Sink that answers every store with a fixed result, or throws */
export class StubSink<T extends TelemetryRecord> implements RecordSink<T> {
  readonly name = 'stub';
  readonly received: T[] = [];

  constructor(private readonly behaviour: boolean | Error) {}

  async store(record: T): Promise<boolean> {
    this.received.push(record);
    if (this.behaviour instanceof Error) throw this.behaviour;
    return this.behaviour;
  }
}

/** 8-byte dual-reading frame carrying t1 and t2 as ×10 big-endian values */
export function dualFrame(t1x10: number, t2x10: number): Uint8Array {
  return Uint8Array.of(
    0x02,
    0x00,
    (t1x10 >> 8) & 0xff,
    t1x10 & 0xff,
    (t2x10 >> 8) & 0xff,
    t2x10 & 0xff,
    0x00,
    0x03
  );
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
