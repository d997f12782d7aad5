/**
 * @fileoverview Serial transport backed by the `serialport` package.
 */

import { ReadlineParser, SerialPort } from 'serialport';
import { TransportError, getErrorMessage } from '../errors';
import type { LinkTransport, TransportFactory, TransportHandlers, TransportOptions } from './transport';

export class SerialTransport implements LinkTransport {
  readonly path: string;
  private readonly baudRate: number;
  private port: SerialPort | undefined;
  private closing = false;

  constructor(options: TransportOptions) {
    this.path = options.path;
    this.baudRate = options.baudRate;
  }

  get isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  async open(handlers: TransportHandlers): Promise<void> {
    const port = new SerialPort({
      path: this.path,
      baudRate: this.baudRate,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      autoOpen: false,
    });
    const parser = port.pipe(new ReadlineParser({ delimiter: '\n' }));

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(new TransportError(`Failed to open ${this.path}: ${err.message}`, this.path, err));
          return;
        }
        resolve();
      });
    });

    this.port = port;
    this.closing = false;
    parser.on('data', (line: string) => {
      const clean = line.replace(/\r$/, '');
      if (clean !== '') {
        handlers.onLine(clean);
      }
    });
    port.on('error', (err: Error) => {
      handlers.onError(new TransportError(`Serial error on ${this.path}: ${err.message}`, this.path, err));
    });
    port.on('close', () => {
      if (!this.closing) {
        handlers.onClose();
      }
    });
  }

  write(data: string): Promise<void> {
    const port = this.port;
    if (port === undefined || !port.isOpen) {
      return Promise.reject(TransportError.linkDown(this.path));
    }
    return new Promise<void>((resolve, reject) => {
      port.write(data, (err) => {
        if (err) {
          reject(new TransportError(`Write to ${this.path} failed: ${err.message}`, this.path, err));
          return;
        }
        port.drain((drainErr) => {
          if (drainErr) {
            reject(new TransportError(`Drain on ${this.path} failed: ${getErrorMessage(drainErr)}`, this.path, drainErr));
            return;
          }
          resolve();
        });
      });
    });
  }

  async close(): Promise<void> {
    const port = this.port;
    this.port = undefined;
    if (port === undefined || !port.isOpen) {
      return;
    }
    this.closing = true;
    await new Promise<void>((resolve, reject) => {
      port.close((err) => {
        if (err) {
          reject(new TransportError(`Failed to close ${this.path}: ${err.message}`, this.path, err));
          return;
        }
        resolve();
      });
    });
  }
}

export const createSerialTransport: TransportFactory = (options) => new SerialTransport(options);
