// src/parsers/line-record-assembler.ts

import { FlowRecord, LineMatcher, PartialFlowRecord } from '../types/telemetry-types.js';
import { classifyLine, createDefaultMatchers } from './line-matchers.js';

/**
 * Builds FlowRecords from the flowmeter's three-line reports.
 *
 * The velocity line closes a report. A closed report with every field present is returned
 * and the accumulator starts over; otherwise the accumulator keeps what it has and waits.
 */
export class LineRecordAssembler {
  private current: PartialFlowRecord = {};
  private readonly matchers: readonly LineMatcher[];

  constructor(matchers?: readonly LineMatcher[]) {
    this.matchers = matchers ?? createDefaultMatchers();
  }

  /**
   * Feeds one line.
   * @returns the completed record, or null while fields are still missing
   * @throws LineParseError when a recognised line carries an unparsable value; state is unchanged
   */
  consume(line: string): FlowRecord | null {
    const match = classifyLine(line, this.matchers);
    if (!match) return null;

    switch (match.kind) {
      case 'timestamp':
        this.current.timestamp = match.value;
        return null;
      case 'flow':
        this.current.flow = match.value;
        return null;
      case 'velocity': {
        this.current.velocity = match.value;
        const record = this.complete();
        if (record) this.reset();
        return record;
      }
    }
  }

  /** Snapshot of the fields collected so far */
  get partial(): PartialFlowRecord {
    return { ...this.current };
  }

  isEmpty(): boolean {
    return (
      this.current.timestamp === undefined &&
      this.current.flow === undefined &&
      this.current.velocity === undefined
    );
  }

  reset(): void {
    this.current = {};
  }

  private complete(): FlowRecord | null {
    const { timestamp, flow, velocity } = this.current;
    if (timestamp === undefined || timestamp === '' || flow === undefined || velocity === undefined) {
      return null;
    }
    return { timestamp, flow, velocity };
  }
}
