import { describe, expect, it } from 'vitest';
import { LineParseError } from '../src/errors.js';
import {
  classifyLine,
  createDefaultMatchers,
  FlowLineMatcher,
  TimestampLineMatcher,
  VelocityLineMatcher,
} from '../src/parsers/line-matchers.js';
import { LineRecordAssembler } from '../src/parsers/line-record-assembler.js';

describe('TimestampLineMatcher', () => {
  it('reads device time in the configured zone', () => {
    const matcher = new TimestampLineMatcher('Asia/Bangkok');
    expect(matcher.match('24-03-05 14:07:09')).toEqual({
      kind: 'timestamp',
      value: '2024-03-05T14:07:09+07:00',
    });
  });

  it('maps two-digit years from 69 to the 1900s', () => {
    const matcher = new TimestampLineMatcher('UTC');
    expect(matcher.match('70-01-01 00:00:00')).toEqual({
      kind: 'timestamp',
      value: '1970-01-01T00:00:00+00:00',
    });
    expect(matcher.match('68-12-31 23:59:59')).toEqual({
      kind: 'timestamp',
      value: '2068-12-31T23:59:59+00:00',
    });
  });

  it('rejects impossible dates', () => {
    const matcher = new TimestampLineMatcher('UTC');
    expect(() => matcher.match('23-02-29 10:00:00')).toThrow(LineParseError);
    expect(matcher.match('24-02-29 10:00:00')).toEqual({
      kind: 'timestamp',
      value: '2024-02-29T10:00:00+00:00',
    });
  });

  it('ignores other lines', () => {
    expect(new TimestampLineMatcher('UTC').match('Flow 1 l/s')).toBeNull();
  });
});

describe('FlowLineMatcher and VelocityLineMatcher', () => {
  it('extracts the numbers', () => {
    expect(new FlowLineMatcher().match('Flow 1.234 l/s')).toEqual({ kind: 'flow', value: 1.234 });
    expect(new VelocityLineMatcher().match('Vel: 0.567 m/s')).toEqual({
      kind: 'velocity',
      value: 0.567,
    });
  });

  it('throws on a malformed number', () => {
    expect(() => new FlowLineMatcher().match('Flow 1.2.3 l/s')).toThrow(
      'Cannot parse line "Flow 1.2.3 l/s": "1.2.3" is not a number'
    );
  });

  it('requires the unit', () => {
    expect(new FlowLineMatcher().match('Flow 1.2')).toBeNull();
    expect(new VelocityLineMatcher().match('Vel 0.5 m/s')).toBeNull();
  });
});

describe('classifyLine', () => {
  const matchers = createDefaultMatchers('UTC');

  it('trims before matching', () => {
    expect(classifyLine('  Flow 2 l/s  ', matchers)).toEqual({ kind: 'flow', value: 2 });
  });

  it('returns null for unrecognised lines', () => {
    expect(classifyLine('Totaliser 123 m3', matchers)).toBeNull();
  });
});

describe('LineRecordAssembler', () => {
  it('closes a record on the velocity line', () => {
    const assembler = new LineRecordAssembler(createDefaultMatchers('Asia/Bangkok'));
    expect(assembler.consume('24-03-05 14:07:09')).toBeNull();
    expect(assembler.consume('Flow 1.234 l/s')).toBeNull();
    expect(assembler.consume('Vel: 0.567 m/s')).toEqual({
      timestamp: '2024-03-05T14:07:09+07:00',
      flow: 1.234,
      velocity: 0.567,
    });
    expect(assembler.isEmpty()).toBe(true);
  });

  it('keeps partial fields until the record is complete', () => {
    const assembler = new LineRecordAssembler(createDefaultMatchers('UTC'));
    assembler.consume('Flow 1.5 l/s');
    expect(assembler.consume('Vel: 0.2 m/s')).toBeNull();
    expect(assembler.partial).toEqual({ flow: 1.5, velocity: 0.2 });

    assembler.consume('24-01-02 03:04:05');
    expect(assembler.consume('Vel: 0.3 m/s')).toEqual({
      timestamp: '2024-01-02T03:04:05+00:00',
      flow: 1.5,
      velocity: 0.3,
    });
  });

  it.each([
    ['velocity first', ['Vel: 0.5 m/s', 'Flow 1 l/s', '24-01-02 03:04:05']],
    ['velocity in the middle', ['24-01-02 03:04:05', 'Vel: 0.5 m/s', 'Flow 1 l/s']],
    ['timestamp last', ['Flow 1 l/s', 'Vel: 0.5 m/s', '24-01-02 03:04:05']],
    ['flow last', ['Vel: 0.5 m/s', '24-01-02 03:04:05', 'Flow 1 l/s']],
  ])('emits nothing when the report arrives %s', (_order, lines) => {
    const assembler = new LineRecordAssembler(createDefaultMatchers('UTC'));
    expect(lines.map(line => assembler.consume(line))).toEqual([null, null, null]);
    expect(assembler.partial).toEqual({
      timestamp: '2024-01-02T03:04:05+00:00',
      flow: 1,
      velocity: 0.5,
    });
  });

  it('treats a zero reading as present', () => {
    const assembler = new LineRecordAssembler(createDefaultMatchers('UTC'));
    assembler.consume('24-01-02 03:04:05');
    assembler.consume('Flow 0 l/s');
    expect(assembler.consume('Vel: 0 m/s')).toEqual({
      timestamp: '2024-01-02T03:04:05+00:00',
      flow: 0,
      velocity: 0,
    });
  });

  it('later lines overwrite earlier values', () => {
    const assembler = new LineRecordAssembler(createDefaultMatchers('UTC'));
    assembler.consume('Flow 1 l/s');
    assembler.consume('Flow 2 l/s');
    expect(assembler.partial).toEqual({ flow: 2 });
  });

  it('leaves state untouched on a parse error', () => {
    const assembler = new LineRecordAssembler(createDefaultMatchers('UTC'));
    assembler.consume('Flow 1 l/s');
    expect(() => assembler.consume('Vel: 1..2 m/s')).toThrow(LineParseError);
    expect(assembler.partial).toEqual({ flow: 1 });
    assembler.reset();
    expect(assembler.isEmpty()).toBe(true);
  });
});
