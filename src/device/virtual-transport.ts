/**
 * @fileoverview A {@link LinkTransport} whose far end is an in-process device runtime.
 * Lets the host run end to end without hardware.
 */

import { TransportError } from '../errors';
import type { LinkTransport, TransportHandlers } from '../link/transport';
import type { Logger } from '../logging';
import { createDeviceRuntime, type Compositor, type DeviceRuntime } from './runtime';
import { MemorySettingsStorage, type SettingsStorage } from './settings-store';

export const VIRTUAL_PORT_PATH = 'virtual';
export const DEVICE_PASS_MS = 5;

export interface VirtualTransportOptions {
  storage?: SettingsStorage;
  compositor?: Compositor;
  logger?: Logger;
  random?: () => number;
  passIntervalMs?: number;
  now?: () => number;
}

export class VirtualDeviceTransport implements LinkTransport {
  readonly path = VIRTUAL_PORT_PATH;
  readonly device: DeviceRuntime;
  private readonly passIntervalMs: number;
  private readonly now: () => number;
  private handlers: TransportHandlers | undefined;
  private timer: ReturnType<typeof setInterval> | undefined;
  private outputBuffer = '';

  constructor(options: VirtualTransportOptions = {}) {
    this.passIntervalMs = options.passIntervalMs ?? DEVICE_PASS_MS;
    this.now = options.now ?? Date.now;
    this.device = createDeviceRuntime({
      storage: options.storage ?? new MemorySettingsStorage(),
      onOutput: (line) => this.receive(line),
      now: this.now(),
      ...(options.compositor !== undefined ? { compositor: options.compositor } : {}),
      ...(options.logger !== undefined ? { logger: options.logger } : {}),
      ...(options.random !== undefined ? { random: options.random } : {}),
    });
  }

  get isOpen(): boolean {
    return this.handlers !== undefined;
  }

  async open(handlers: TransportHandlers): Promise<void> {
    if (this.handlers !== undefined) {
      throw new TransportError('Virtual device is already open', this.path);
    }
    this.handlers = handlers;
    this.timer = setInterval(() => this.pump(), this.passIntervalMs);
  }

  async write(data: string): Promise<void> {
    if (this.handlers === undefined) {
      throw TransportError.linkDown(this.path);
    }
    this.device.feedBytes(Buffer.from(data, 'latin1'));
  }

  async close(): Promise<void> {
    this.stopPump();
    this.handlers = undefined;
    this.outputBuffer = '';
  }

  /** Runs one device pass at the current time. */
  pump(): void {
    this.device.runPass(this.now());
  }

  /**
   * Drops the link as if the cable were pulled: the host sees an unexpected close.
   */
  unplug(): void {
    const handlers = this.handlers;
    this.stopPump();
    this.handlers = undefined;
    handlers?.onClose();
  }

  private stopPump(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private receive(chunk: string): void {
    this.outputBuffer += chunk;
    let newline = this.outputBuffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.outputBuffer.slice(0, newline).replace(/\r$/, '');
      this.outputBuffer = this.outputBuffer.slice(newline + 1);
      if (line !== '') {
        this.handlers?.onLine(line);
      }
      newline = this.outputBuffer.indexOf('\n');
    }
  }
}
