import { describe, expect, it, vi } from 'vitest';
import { SerialConnectionError } from '../src/errors.js';
import { connectWithRetry } from '../src/utils/retry.js';
import { createTestLogger, messagesAt } from './helpers.js';

describe('connectWithRetry', () => {
  it('retries until the port opens', async () => {
    const { logger, events } = createTestLogger();
    const sleep = vi.fn(async () => undefined);
    const open = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error('busy'))
      .mockRejectedValueOnce(new Error('busy'))
      .mockResolvedValueOnce(undefined);

    await connectWithRetry(open, {
      target: '/dev/ttyUSB1',
      attempts: 3,
      retryDelay: 250,
      logger: logger.createLogger('Retry'),
      sleep,
    });

    expect(open).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[250], [250]]);
    expect(messagesAt(events, 'error')).toEqual([
      'Connection attempt 1/3 failed: busy',
      'Connection attempt 2/3 failed: busy',
    ]);
  });

  it('gives up after the last attempt without waiting again', async () => {
    const { logger } = createTestLogger();
    const sleep = vi.fn(async () => undefined);
    const open = vi.fn(async () => {
      throw new Error('No such file');
    });

    const attempt = connectWithRetry(open, {
      target: '/dev/ttyUSB9',
      attempts: 2,
      retryDelay: 100,
      logger: logger.createLogger('Retry'),
      sleep,
    });

    await expect(attempt).rejects.toThrow(SerialConnectionError);
    await expect(attempt).rejects.toThrow('Cannot open /dev/ttyUSB9 after 2 attempts: No such file');
    expect(open).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});
