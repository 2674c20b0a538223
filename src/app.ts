// src/app.ts

import { FlowmeterCollector } from './collectors/flowmeter-collector.js';
import { TemperatureCollector } from './collectors/temperature-collector.js';
import { describeError, toError } from './errors.js';
import PollingManager from './polling-manager.js';
import { LoggerInstance } from './types/telemetry-types.js';

export interface Collectors {
  flowmeter: FlowmeterCollector;
  temperature: TemperatureCollector;
  pollingManager: PollingManager;
}

function logFailures(results: PromiseSettledResult<void>[], logger: LoggerInstance): number {
  let failures = 0;
  for (const result of results) {
    if (result.status === 'rejected') {
      const error = toError(result.reason);
      logger.error(`${describeError(error)}: ${error.message}`);
      failures++;
    }
  }
  return failures;
}

/**
 * Stops both collectors and drops every polling task. Stop failures are logged, not thrown.
 */
export async function stopCollectors(
  collectors: Collectors,
  logger: LoggerInstance
): Promise<void> {
  const results = await Promise.allSettled([
    collectors.flowmeter.stop(),
    collectors.temperature.stop(),
  ]);
  logFailures(results, logger);
  collectors.pollingManager.clearAll();
}

/**
 * Starts both collectors. When either fails, whatever did start is stopped again.
 * @returns false when a collector failed to start
 */
export async function startCollectors(
  collectors: Collectors,
  logger: LoggerInstance
): Promise<boolean> {
  const results = await Promise.allSettled([
    collectors.flowmeter.start(),
    collectors.temperature.start(),
  ]);
  if (logFailures(results, logger) > 0) {
    await stopCollectors(collectors, logger);
    return false;
  }
  logger.info('Collectors running');
  return true;
}
