// src/transport/node-transports/node-serial-line-reader.ts

import { ReadlineParser, SerialPort } from 'serialport';
import { SERIAL_DEFAULTS } from '../../constants/constants.js';
import { SerialConnectionError } from '../../errors.js';
import Logger, { getSharedLogger } from '../../logger.js';
import {
  LineHandler,
  LineSource,
  LoggerInstance,
  NodeSerialLineReaderOptions,
} from '../../types/telemetry-types.js';
import { connectWithRetry } from '../../utils/retry.js';

const NON_ASCII = /[^\x00-\x7f]/g;

/**
 * Line-oriented serial source: bytes are split on the delimiter, decoded as latin1 and
 * stripped of anything outside ASCII before reaching the handlers.
 */
class NodeSerialLineReader implements LineSource {
  private readonly options: Required<NodeSerialLineReaderOptions>;
  private readonly logger: LoggerInstance;
  private readonly handlers: LineHandler[] = [];
  private port: SerialPort | null = null;
  private parser: ReadlineParser | null = null;
  private _isOpen: boolean = false;

  constructor(
    private readonly path: string,
    options: NodeSerialLineReaderOptions = {},
    loggerInstance: Logger = getSharedLogger()
  ) {
    this.options = {
      baudRate: SERIAL_DEFAULTS.BAUD_RATE,
      delimiter: '\n',
      connectAttempts: SERIAL_DEFAULTS.CONNECT_ATTEMPTS,
      connectRetryDelay: SERIAL_DEFAULTS.CONNECT_RETRY_DELAY_MS,
      ...options,
    };
    this.logger = loggerInstance.createLogger('NodeSerialLineReader', { port: path });
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  onLine(handler: LineHandler): void {
    this.handlers.push(handler);
  }

  /**
   * @throws SerialConnectionError when every attempt failed
   */
  async connect(): Promise<void> {
    if (this._isOpen) return;

    await connectWithRetry(() => this._open(), {
      target: this.path,
      attempts: this.options.connectAttempts,
      retryDelay: this.options.connectRetryDelay,
      logger: this.logger,
    });
    this.logger.info(`Connected to ${this.path}`, { baudRate: this.options.baudRate });
  }

  private _open(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const port = new SerialPort({
        path: this.path,
        baudRate: this.options.baudRate,
        autoOpen: false,
      });
      port.open((err?: Error | null) => {
        if (err) {
          reject(new SerialConnectionError(err.message));
          return;
        }
        const parser = port.pipe(
          new ReadlineParser({ delimiter: this.options.delimiter, encoding: 'latin1' })
        );
        parser.on('data', (raw: string) => this._emit(raw));
        port.on('error', (error: Error) => {
          this.logger.error(`Serial port ${this.path} error: ${error.message}`);
        });
        port.on('close', () => {
          this._isOpen = false;
          this.logger.info(`Serial port ${this.path} closed`);
        });
        this.port = port;
        this.parser = parser;
        this._isOpen = true;
        resolve();
      });
    });
  }

  private _emit(raw: string): void {
    const line = raw.replace(NON_ASCII, '').trim();
    if (line === '') return;
    this.logger.trace(`Line: ${line}`);
    for (const handler of this.handlers) {
      handler(line);
    }
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    this.parser?.removeAllListeners('data');
    this.parser = null;
    this.port = null;
    this._isOpen = false;
    if (!port) return;

    port.removeAllListeners('error');
    port.removeAllListeners('close');
    if (!port.isOpen) return;
    await new Promise<void>((resolve, reject) => {
      port.close((err?: Error | null) => {
        if (err) reject(new SerialConnectionError(err.message));
        else resolve();
      });
    });
    this.logger.info(`Disconnected from ${this.path}`);
  }
}

export default NodeSerialLineReader;
