// src/sinks/memory-sink.ts

import { RecordSink, TelemetryRecord } from '../types/telemetry-types.js';

/**
 * Keeps the most recent records in memory. Refuses nothing; the oldest record is evicted
 * once `capacity` is reached.
 */
export class MemoryRecordSink<T extends TelemetryRecord> implements RecordSink<T> {
  readonly name: string;
  private items: T[] = [];

  constructor(
    name: string = 'memory',
    private readonly capacity: number = Infinity
  ) {
    this.name = name;
  }

  async store(record: T): Promise<boolean> {
    this.items.push({ ...record });
    if (this.items.length > this.capacity) this.items.shift();
    return true;
  }

  get records(): readonly T[] {
    return this.items;
  }

  clear(): void {
    this.items = [];
  }
}
