/**
 * @file Connection Supervisor
 * @description Owns the serial link: opens the transport, runs the startup handshake,
 * detects failures and drives bounded reconnection. Nothing else reads or writes the
 * transport; all outbound traffic goes through one {@link SendQueue}.
 *
 * States: disconnected → opening → handshaking → connected → error → disconnected.
 * @module link/connection-supervisor
 */

import { ConnectionError, TransportError, getErrorMessage } from '../errors';
import { EventHub } from '../event-hub';
import { silentLogger, type Logger } from '../logging';
import { formatCommand, timeCommand, type DeviceReply, type LinkCommand } from '../protocol/commands';
import { parseReply } from '../protocol/parser';
import { DEFAULT_MIN_COMMAND_INTERVAL_MS, SendQueue, delay } from '../protocol/send-queue';
import { DEFAULT_BAUD_RATE, type LinkTransport, type TransportFactory } from './transport';

export type ConnectionState = 'disconnected' | 'opening' | 'handshaking' | 'connected' | 'error';

export interface SupervisorEventMap {
  state: ConnectionState;
  connected: { path: string; deviceResponded: boolean };
  disconnected: { path: string; error?: Error };
  reply: DeviceReply;
  'reconnect-scheduled': { path: string; attempt: number; delayMs: number };
  'gave-up': { path: string; attempts: number };
}

export interface ConnectionSupervisorOptions {
  transportFactory: TransportFactory;
  /** Resolves the `auto` target to a port path */
  discover?: () => Promise<string | undefined>;
  baudRate?: number;
  /** Wait after open; most boards reboot when the port opens */
  settleMs?: number;
  pingTimeoutMs?: number;
  reconnectDelayMs?: number;
  maxReconnectAttempts?: number;
  minCommandIntervalMs?: number;
  clock?: () => Date;
  logger?: Logger;
}

export const AUTO_TARGET = 'auto';
export const HANDSHAKE_SETTLE_MS = 2000;
export const PING_TIMEOUT_MS = 500;
export const RECONNECT_DELAY_MS = 3000;
export const MAX_RECONNECT_ATTEMPTS = 3;

export interface SupervisorStatus {
  state: ConnectionState;
  path: string | undefined;
  queueLength: number;
  reconnectAttempts: number;
  deviceResponded: boolean;
}

interface ActiveLink {
  token: number;
  path: string;
  transport: LinkTransport;
  queue: SendQueue;
}

export class ConnectionSupervisor {
  private readonly options: Required<Omit<ConnectionSupervisorOptions, 'discover' | 'logger' | 'clock'>>;
  private readonly discover: (() => Promise<string | undefined>) | undefined;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly events = new EventHub<SupervisorEventMap>();
  private state: ConnectionState = 'disconnected';
  private link: ActiveLink | undefined;
  private token = 0;
  private targetPath: string | undefined;
  private attempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | undefined;
  private pongWaiter: (() => void) | undefined;
  private deviceResponded = false;

  constructor(options: ConnectionSupervisorOptions) {
    this.options = {
      transportFactory: options.transportFactory,
      baudRate: options.baudRate ?? DEFAULT_BAUD_RATE,
      settleMs: options.settleMs ?? HANDSHAKE_SETTLE_MS,
      pingTimeoutMs: options.pingTimeoutMs ?? PING_TIMEOUT_MS,
      reconnectDelayMs: options.reconnectDelayMs ?? RECONNECT_DELAY_MS,
      maxReconnectAttempts: options.maxReconnectAttempts ?? MAX_RECONNECT_ATTEMPTS,
      minCommandIntervalMs: options.minCommandIntervalMs ?? DEFAULT_MIN_COMMAND_INTERVAL_MS,
    };
    this.discover = options.discover;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  on<K extends keyof SupervisorEventMap>(
    event: K,
    listener: (payload: SupervisorEventMap[K]) => void
  ): () => void {
    return this.events.on(event, listener);
  }

  getState(): ConnectionState {
    return this.state;
  }

  getStatus(): SupervisorStatus {
    return {
      state: this.state,
      path: this.link?.path ?? this.targetPath,
      queueLength: this.link?.queue.length ?? 0,
      reconnectAttempts: this.attempts,
      deviceResponded: this.deviceResponded,
    };
  }

  get isConnected(): boolean {
    return this.state === 'connected';
  }

  /**
   * Explicit connect request. Resets the reconnect budget. Rejects with a
   * {@link ConnectionError} when the port cannot be found, opened or handshaken.
   */
  async connect(target: string = AUTO_TARGET): Promise<void> {
    this.cancelReconnect();
    if (this.link !== undefined || this.state !== 'disconnected') {
      await this.disconnect();
    }
    this.attempts = 0;

    let path = target;
    if (target === AUTO_TARGET) {
      const found = this.discover !== undefined ? await this.discover() : undefined;
      if (found === undefined) {
        throw ConnectionError.noDeviceFound(0);
      }
      path = found;
    }
    this.targetPath = path;
    await this.establish(path);
  }

  /**
   * Explicit disconnect. Cancels pending reconnects and never schedules new ones.
   */
  async disconnect(): Promise<void> {
    this.cancelReconnect();
    this.targetPath = undefined;
    const link = this.link;
    this.token += 1;
    this.link = undefined;
    if (link === undefined) {
      this.setState('disconnected');
      return;
    }
    link.queue.clear(TransportError.linkDown(link.path));
    try {
      await link.transport.close();
    } finally {
      this.setState('disconnected');
      this.events.emit('disconnected', { path: link.path });
      this.logger.info(`Disconnected from ${link.path}`);
    }
  }

  /**
   * Queues a command. Rejects when not connected or when the write fails.
   */
  send(command: LinkCommand): Promise<void> {
    const link = this.link;
    if (link === undefined || this.state !== 'connected') {
      return Promise.reject(TransportError.linkDown(this.targetPath));
    }
    return link.queue.enqueue(formatCommand(command));
  }

  private async establish(path: string): Promise<void> {
    this.token += 1;
    const token = this.token;
    this.setState('opening');
    this.deviceResponded = false;
    this.logger.info(`Opening ${path} at ${this.options.baudRate} baud`);

    const transport = this.options.transportFactory({ path, baudRate: this.options.baudRate });
    try {
      await transport.open({
        onLine: (line) => this.handleLine(token, line),
        onError: (error) => this.handleLinkLoss(token, error),
        onClose: () => this.handleLinkLoss(token, TransportError.unexpectedClose(path)),
      });
    } catch (err) {
      this.failAttempt(token);
      throw new ConnectionError(`Failed to open ${path}: ${getErrorMessage(err)}`, 'open', {
        path,
      });
    }
    if (token !== this.token) {
      await transport.close();
      throw new ConnectionError(`Connection to ${path} was cancelled`, 'open', { path });
    }

    const queue = new SendQueue((data) => transport.write(data), {
      minIntervalMs: this.options.minCommandIntervalMs,
    });
    this.link = { token, path, transport, queue };
    this.setState('handshaking');

    try {
      await this.handshake(token, queue);
    } catch (err) {
      if (token === this.token) {
        this.token += 1;
        this.link = undefined;
        queue.clear(TransportError.linkDown(path));
        await this.closeQuietly(transport);
        this.failAttempt(this.token);
      }
      throw err instanceof ConnectionError
        ? err
        : new ConnectionError(`Handshake with ${path} failed: ${getErrorMessage(err)}`, 'handshake', {
            path,
          });
    }

    this.setState('connected');
    this.logger.info(
      `Connected to ${path}${this.deviceResponded ? '' : ' (no PONG from device)'}`
    );
    this.events.emit('connected', { path, deviceResponded: this.deviceResponded });
  }

  /**
   * Settle, optional PING, then the initial sync burst. Only transport faults fail the
   * handshake; a silent device still ends up connected.
   */
  private async handshake(token: number, queue: SendQueue): Promise<void> {
    await delay(this.options.settleMs);
    this.assertCurrent(token);

    this.deviceResponded = await this.ping(queue);
    this.assertCurrent(token);

    const sync: LinkCommand[] = [
      timeCommand(this.clock()),
      { kind: 'cpu', percent: 0 },
      { kind: 'ram', percent: 0 },
      { kind: 'wpm', wpm: 0 },
    ];
    for (const command of sync) {
      await queue.enqueue(formatCommand(command));
      this.assertCurrent(token);
    }
  }

  private async ping(queue: SendQueue): Promise<boolean> {
    let answered = false;
    const pong = new Promise<void>((resolve) => {
      this.pongWaiter = () => {
        answered = true;
        resolve();
      };
    });
    await queue.enqueue(formatCommand({ kind: 'ping' }));
    await Promise.race([pong, delay(this.options.pingTimeoutMs)]);
    this.pongWaiter = undefined;
    return answered;
  }

  private assertCurrent(token: number): void {
    if (token !== this.token) {
      throw new ConnectionError('Link lost during handshake', 'handshake');
    }
  }

  private handleLine(token: number, line: string): void {
    if (token !== this.token) {
      return;
    }
    const reply = parseReply(line);
    if (reply.kind === 'pong') {
      this.pongWaiter?.();
    }
    this.events.emit('reply', reply);
  }

  private handleLinkLoss(token: number, error: Error): void {
    const link = this.link;
    if (token !== this.token || link === undefined) {
      return;
    }
    const wasConnected = this.state === 'connected';
    this.token += 1;
    this.link = undefined;
    link.queue.clear(
      error instanceof TransportError ? error : new TransportError(error.message, link.path, error)
    );
    void this.closeQuietly(link.transport);

    this.logger.warn(`Link to ${link.path} lost: ${error.message}`);
    this.setState('error');
    this.events.emit('disconnected', { path: link.path, error });
    this.setState('disconnected');
    if (wasConnected) {
      this.scheduleReconnect();
    }
  }

  /**
   * Marks a failed open or handshake. Automatic attempts keep the reconnect chain going.
   */
  private failAttempt(token: number): void {
    if (token !== this.token) {
      return;
    }
    this.setState('error');
    this.setState('disconnected');
  }

  private scheduleReconnect(): void {
    const path = this.targetPath;
    if (path === undefined) {
      return;
    }
    if (this.attempts >= this.options.maxReconnectAttempts) {
      this.logger.error(`Giving up on ${path} after ${this.attempts} reconnect attempt(s)`);
      this.events.emit('gave-up', { path, attempts: this.attempts });
      return;
    }
    this.attempts += 1;
    const attempt = this.attempts;
    const delayMs = this.options.reconnectDelayMs;
    this.logger.info(
      `Reconnecting to ${path} in ${delayMs} ms (${attempt}/${this.options.maxReconnectAttempts})`
    );
    this.events.emit('reconnect-scheduled', { path, attempt, delayMs });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      void this.reconnect(path);
    }, delayMs);
  }

  private async reconnect(path: string): Promise<void> {
    if (this.targetPath !== path) {
      return;
    }
    try {
      await this.establish(path);
    } catch (err) {
      this.logger.warn(`Reconnect to ${path} failed: ${getErrorMessage(err)}`);
      if (this.targetPath === path && this.link === undefined) {
        this.scheduleReconnect();
      }
    }
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer !== undefined) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
  }

  private async closeQuietly(transport: LinkTransport): Promise<void> {
    try {
      await transport.close();
    } catch (err) {
      this.logger.debug(`Ignoring close failure on ${transport.path}: ${getErrorMessage(err)}`);
    }
  }

  private setState(next: ConnectionState): void {
    if (this.state === next) {
      return;
    }
    this.state = next;
    this.events.emit('state', next);
  }
}
