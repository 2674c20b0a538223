// src/transport/node-transports/node-serialport.ts

import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { SERIAL_DEFAULTS } from '../../constants/constants.js';
import {
  SerialConnectionError,
  SerialReadError,
  SerialWriteError,
} from '../../errors.js';
import Logger, { getSharedLogger } from '../../logger.js';
import {
  ByteTransport,
  LoggerInstance,
  NodeSerialTransportOptions,
} from '../../types/telemetry-types.js';
import { connectWithRetry } from '../../utils/retry.js';
import { concatUint8Arrays, sleep, tailUint8Array } from '../../utils/utils.js';

const POLL_INTERVAL_MS = 10;

/**
 * Byte-oriented serial link built on `serialport`.
 *
 * Incoming `data` events are collected into a bounded buffer; `read` hands out whatever has
 * arrived once `maxLength` bytes are buffered or the timeout expires. Reads and writes are
 * serialised by a mutex.
 */
class NodeSerialTransport implements ByteTransport {
  private readonly path: string;
  private readonly options: Required<NodeSerialTransportOptions>;
  private readonly logger: LoggerInstance;
  private port: SerialPort | null = null;
  private readBuffer: Uint8Array = new Uint8Array(0);
  private _isOpen: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  constructor(
    path: string,
    options: NodeSerialTransportOptions = {},
    loggerInstance: Logger = getSharedLogger()
  ) {
    this.path = path;
    this.options = {
      baudRate: SERIAL_DEFAULTS.BAUD_RATE,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      readTimeout: 1000,
      maxBufferSize: SERIAL_DEFAULTS.MAX_BUFFER_SIZE,
      connectAttempts: SERIAL_DEFAULTS.CONNECT_ATTEMPTS,
      connectRetryDelay: SERIAL_DEFAULTS.CONNECT_RETRY_DELAY_MS,
      ...options,
    };
    this.logger = loggerInstance.createLogger('NodeSerialTransport', { port: path });
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  /**
   * Opens the port, retrying up to `connectAttempts` times.
   * @throws SerialConnectionError when every attempt failed
   */
  async connect(): Promise<void> {
    if (this._isOpen) return;

    await connectWithRetry(() => this._createAndOpenPort(), {
      target: this.path,
      attempts: this.options.connectAttempts,
      retryDelay: this.options.connectRetryDelay,
      logger: this.logger,
    });
    this.logger.info(`Serial port ${this.path} opened`, { baudRate: this.options.baudRate });
  }

  private _createAndOpenPort(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const port = new SerialPort({
        path: this.path,
        baudRate: this.options.baudRate,
        dataBits: this.options.dataBits,
        stopBits: this.options.stopBits,
        parity: this.options.parity,
        autoOpen: false,
      });

      port.open((err?: Error | null) => {
        if (err) {
          if (err.message.includes('ermission')) {
            reject(new SerialConnectionError('Permission denied'));
          } else if (err.message.includes('busy')) {
            reject(new SerialConnectionError('Serial port is busy'));
          } else if (err.message.includes('No such file')) {
            reject(new SerialConnectionError('Serial port does not exist'));
          } else {
            reject(new SerialConnectionError(err.message));
          }
          return;
        }

        this.port = port;
        this._isOpen = true;
        this.readBuffer = new Uint8Array(0);
        port.on('data', (data: Buffer) => this._onData(data));
        port.on('error', (error: Error) => this._onError(error));
        port.on('close', () => this._onClose());
        resolve();
      });
    });
  }

  private _onData(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    const combined = concatUint8Arrays([this.readBuffer, chunk]);
    if (combined.length > this.options.maxBufferSize) {
      this.logger.warn('Read buffer overflow, oldest bytes dropped', {
        dropped: combined.length - this.options.maxBufferSize,
      });
    }
    this.readBuffer = tailUint8Array(combined, this.options.maxBufferSize);
  }

  private _onError(err: Error): void {
    this.logger.error(`Serial port ${this.path} error: ${err.message}`);
  }

  private _onClose(): void {
    this.logger.info(`Serial port ${this.path} closed`);
    this._isOpen = false;
    this.port = null;
  }

  async flush(): Promise<void> {
    await this._operationMutex.runExclusive(() => {
      this.readBuffer = new Uint8Array(0);
    });
  }

  async write(buffer: Uint8Array): Promise<void> {
    await this._operationMutex.runExclusive(async () => {
      const port = this.port;
      if (!this._isOpen || !port?.isOpen) throw new SerialWriteError('Port closed');
      await new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(buffer), (writeErr?: Error | null) => {
          if (writeErr) {
            reject(new SerialWriteError(writeErr.message));
            return;
          }
          port.drain((drainErr?: Error | null) => {
            if (drainErr) reject(new SerialWriteError(drainErr.message));
            else resolve();
          });
        });
      });
    });
  }

  /**
   * Waits up to `timeout` ms for `maxLength` bytes.
   * @returns the buffered bytes, at most `maxLength`; empty when nothing arrived
   * @throws SerialReadError when the port is closed
   */
  async read(maxLength: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (!Number.isInteger(maxLength) || maxLength <= 0) {
      throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
    }
    return this._operationMutex.runExclusive(async () => {
      const deadline = Date.now() + timeout;
      for (;;) {
        if (!this._isOpen) throw new SerialReadError('Port closed');
        if (this.readBuffer.length >= maxLength || Date.now() >= deadline) break;
        await sleep(POLL_INTERVAL_MS);
      }
      const data = this.readBuffer.slice(0, maxLength);
      this.readBuffer = this.readBuffer.slice(data.length);
      return data;
    });
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    this._isOpen = false;
    this.port = null;
    this.readBuffer = new Uint8Array(0);
    if (!port) return;

    port.removeAllListeners('data');
    port.removeAllListeners('error');
    port.removeAllListeners('close');
    if (!port.isOpen) return;

    await new Promise<void>((resolve, reject) => {
      port.close((err?: Error | null) => {
        if (err) reject(new SerialConnectionError(err.message));
        else resolve();
      });
    });
    this.logger.info(`Serial port ${this.path} closed`);
  }
}

export default NodeSerialTransport;
