// src/utils/retry.ts

import { SerialConnectionError, toError } from '../errors.js';
import { LoggerInstance } from '../types/telemetry-types.js';
import { sleep as defaultSleep } from './utils.js';

export interface ConnectRetryOptions {
  /** Port path, used in the final error */
  target: string;
  attempts: number;
  retryDelay: number;
  logger: LoggerInstance;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Calls `open` until it resolves, at most `attempts` times, waiting `retryDelay` ms between
 * failed attempts.
 * @throws SerialConnectionError carrying the last failure once every attempt failed
 */
export async function connectWithRetry(
  open: () => Promise<void>,
  options: ConnectRetryOptions
): Promise<void> {
  const { target, attempts, retryDelay, logger, sleep = defaultSleep } = options;

  let lastError: Error | null = null;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      await open();
      return;
    } catch (err: unknown) {
      lastError = toError(err);
      logger.error(`Connection attempt ${attempt}/${attempts} failed: ${lastError.message}`);
      if (attempt < attempts) {
        await sleep(retryDelay);
      }
    }
  }
  throw new SerialConnectionError(
    `Cannot open ${target} after ${attempts} attempts: ${lastError?.message ?? 'unknown error'}`
  );
}
