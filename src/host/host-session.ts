/**
 * @file Host session
 * @description Wires the typing monitor, the telemetry sampler, the animation driver and
 * the connection supervisor together. Estimator samples become directives, telemetry
 * goes out as STATS every second, the clock as TIME every 30 s, and display preferences
 * are pushed to the device after every (re)connect.
 * @module host/host-session
 */

import type { DisplayPreferences, HostConfig } from '../config/types';
import { getErrorMessage } from '../errors';
import { silentLogger, type Logger } from '../logging';
import {
  DISPLAY_FIELDS,
  formatCommand,
  timeCommand,
  type DeviceReply,
  type DisplayField,
  type LinkCommand,
} from '../protocol/commands';
import { ConnectionSupervisor, type SupervisorStatus } from '../link/connection-supervisor';
import { discoverDevicePort } from '../link/port-discovery';
import type { TransportFactory } from '../link/transport';
import { AnimationDriver } from './animation-driver';
import { CadenceEstimator, type CadenceSample } from './cadence-estimator';
import type { TelemetryReading, TelemetrySampler } from './telemetry';
import { TypingMonitor, type KeyEventSource } from './typing-monitor';

export interface HostSessionOptions {
  config: HostConfig;
  supervisor: ConnectionSupervisor;
  monitor: TypingMonitor;
  sampler: TelemetrySampler;
  driver?: AnimationDriver;
  clock?: () => Date;
  logger?: Logger;
}

export interface HostSessionStatus {
  link: SupervisorStatus;
  monitoring: boolean;
  fallbackMode: boolean;
  wpm: number;
  active: boolean;
  streak: boolean;
  telemetry: TelemetryReading | undefined;
}

function displayVisible(prefs: DisplayPreferences, field: DisplayField): boolean {
  switch (field) {
    case 'CPU':
      return prefs.showCpu;
    case 'RAM':
      return prefs.showRam;
    case 'WPM':
      return prefs.showWpm;
    case 'TIME':
      return prefs.showTime;
  }
}

/**
 * The commands that bring the device in line with the given preferences, ending with
 * SAVE_SETTINGS so they survive a device restart.
 */
export function displaySettingsCommands(prefs: DisplayPreferences): LinkCommand[] {
  const commands: LinkCommand[] = DISPLAY_FIELDS.map((field): LinkCommand => ({
    kind: 'display',
    field,
    visible: displayVisible(prefs, field),
  }));
  commands.push(
    { kind: 'timeFormat', hours: prefs.use24HourTime ? 24 : 12 },
    { kind: 'sleepTimeout', minutes: prefs.sleepTimeoutMinutes },
    { kind: 'sensitivity', value: prefs.sensitivity },
    { kind: 'saveSettings' }
  );
  return commands;
}

export class HostSession {
  private readonly supervisor: ConnectionSupervisor;
  private readonly monitor: TypingMonitor;
  private readonly sampler: TelemetrySampler;
  private readonly driver: AnimationDriver;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly config: HostConfig;
  private display: DisplayPreferences;
  private lastSample: CadenceSample | undefined;
  private telemetry: TelemetryReading | undefined;
  private statsTimer: ReturnType<typeof setInterval> | undefined;
  private timeTimer: ReturnType<typeof setInterval> | undefined;
  private unsubscribers: Array<() => void> = [];
  private running = false;

  constructor(options: HostSessionOptions) {
    this.config = options.config;
    this.display = { ...options.config.display };
    this.supervisor = options.supervisor;
    this.monitor = options.monitor;
    this.sampler = options.sampler;
    this.driver = options.driver ?? new AnimationDriver();
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Starts monitoring and the periodic STATS / TIME pushes. Connecting is separate so
   * a session can run (and show fallback notices) before a device is attached.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.unsubscribers = [
      this.monitor.onSample((sample) => this.handleSample(sample)),
      this.monitor.onFallback((notice) => this.logger.warn(notice.message)),
      this.supervisor.on('connected', ({ path }) => this.handleConnected(path)),
      this.supervisor.on('reply', (reply) => this.handleReply(reply)),
      this.supervisor.on('gave-up', ({ path, attempts }) =>
        this.logger.error(`Device on ${path} unreachable after ${attempts} attempt(s)`)
      ),
    ];
    await this.monitor.start();

    this.statsTimer = setInterval(() => this.pushStats(), this.config.behavior.statsIntervalMs);
    this.timeTimer = setInterval(() => this.pushTime(), this.config.behavior.timeSyncIntervalMs);
    this.running = true;
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.statsTimer !== undefined) {
      clearInterval(this.statsTimer);
      this.statsTimer = undefined;
    }
    if (this.timeTimer !== undefined) {
      clearInterval(this.timeTimer);
      this.timeTimer = undefined;
    }
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    await this.monitor.stop();
    await this.supervisor.disconnect();
  }

  connect(target: string = this.config.connection.port): Promise<void> {
    return this.supervisor.connect(target);
  }

  disconnect(): Promise<void> {
    return this.supervisor.disconnect();
  }

  /**
   * Records new display preferences and pushes them to the device when connected.
   */
  async applyDisplaySettings(prefs: DisplayPreferences): Promise<void> {
    this.display = { ...prefs };
    if (!this.supervisor.isConnected) {
      return;
    }
    for (const command of displaySettingsCommands(prefs)) {
      await this.supervisor.send(command);
    }
    this.logger.info('Display settings applied');
  }

  /**
   * Manual keystroke path for fallback mode.
   */
  recordManualKeystroke(key?: string): boolean {
    return this.monitor.recordManualKeystroke(key);
  }

  getStatus(): HostSessionStatus {
    return {
      link: this.supervisor.getStatus(),
      monitoring: this.monitor.isMonitoring,
      fallbackMode: this.monitor.isFallbackMode,
      wpm: this.lastSample?.wpm ?? 0,
      active: this.lastSample?.active ?? false,
      streak: this.driver.isStreakActive,
      telemetry: this.telemetry,
    };
  }

  private handleSample(sample: CadenceSample): void {
    this.lastSample = sample;
    if (!this.supervisor.isConnected) {
      return;
    }
    for (const command of this.driver.handleSample(sample)) {
      this.dispatch(command);
    }
  }

  private handleConnected(path: string): void {
    this.driver.reset();
    this.logger.info(`Session attached to ${path}`);
    this.applyDisplaySettings(this.display).catch((err: unknown) => {
      this.logger.warn(`Failed to apply display settings: ${getErrorMessage(err)}`);
    });
  }

  private handleReply(reply: DeviceReply): void {
    switch (reply.kind) {
      case 'error':
        this.logger.warn(`Device rejected ${reply.verb}: ${reply.reason}`);
        return;
      case 'log':
        this.logger.debug(`device: ${reply.text}`);
        return;
      case 'state':
        this.logger.debug(`device state ${reply.state}${reply.streak ? ' (streak)' : ''}`);
        return;
      case 'ok':
      case 'pong':
        return;
    }
  }

  private pushStats(): void {
    this.telemetry = this.sampler.sample();
    if (!this.supervisor.isConnected) {
      return;
    }
    this.dispatch({
      kind: 'stats',
      cpu: this.telemetry.cpuPercent,
      ram: this.telemetry.memPercent,
      wpm: Math.round(this.lastSample?.wpm ?? 0),
    });
  }

  private pushTime(): void {
    if (this.supervisor.isConnected) {
      this.dispatch(timeCommand(this.clock()));
    }
  }

  /**
   * Fire-and-forget send. A failed directive is superseded by the next sample, so it is
   * logged rather than retried.
   */
  private dispatch(command: LinkCommand): void {
    this.supervisor.send(command).catch((err: unknown) => {
      this.logger.debug(`Dropped ${formatCommand(command)}: ${getErrorMessage(err)}`);
    });
  }
}

export interface HostSessionDeps {
  transportFactory: TransportFactory;
  sampler: TelemetrySampler;
  keySource?: KeyEventSource;
  discover?: () => Promise<string | undefined>;
  logger?: Logger;
}

/**
 * Builds a session and its collaborators from a normalized configuration.
 */
export function createHostSession(config: HostConfig, deps: HostSessionDeps): HostSession {
  const logger = deps.logger ?? silentLogger;
  const { connection, behavior } = config;
  const supervisor = new ConnectionSupervisor({
    transportFactory: deps.transportFactory,
    discover: deps.discover ?? (() => discoverDevicePort()),
    baudRate: connection.baudRate,
    settleMs: connection.settleMs,
    pingTimeoutMs: connection.pingTimeoutMs,
    reconnectDelayMs: connection.reconnectDelayMs,
    maxReconnectAttempts: connection.autoReconnect ? connection.maxReconnectAttempts : 0,
    minCommandIntervalMs: connection.minCommandIntervalMs,
    logger: logger.child('link'),
  });
  const monitor = new TypingMonitor({
    estimator: new CadenceEstimator({ idleTimeoutMs: behavior.idleTimeoutMs }),
    ...(deps.keySource !== undefined ? { source: deps.keySource } : {}),
    logger: logger.child('typing'),
  });
  return new HostSession({ config, supervisor, monitor, sampler: deps.sampler, logger });
}
