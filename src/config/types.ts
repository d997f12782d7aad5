/**
 * @file Host configuration types
 * @description Shape of `pawlink.json` as written by users (every field optional) and the
 * normalized configuration the host session runs with.
 * @module config/types
 */

import type { LogLevel } from '../logging';

/**
 * Display preferences pushed to the device after each connect.
 */
export interface DisplayPreferences {
  showCpu: boolean;
  showRam: boolean;
  showWpm: boolean;
  showTime: boolean;
  use24HourTime: boolean;
  /** Minutes from the end of typing to the deepest idle stage (1-60) */
  sleepTimeoutMinutes: number;
  /** Paw speed multiplier (0.1-5.0) */
  sensitivity: number;
}

export interface ConnectionConfig {
  /** Port path, or `auto` to pick the first likely device */
  port: string;
  baudRate: number;
  autoReconnect: boolean;
  reconnectDelayMs: number;
  maxReconnectAttempts: number;
  settleMs: number;
  pingTimeoutMs: number;
  minCommandIntervalMs: number;
}

export interface BehaviorConfig {
  /** Quiet time after the last keystroke before typing counts as stopped */
  idleTimeoutMs: number;
  statsIntervalMs: number;
  timeSyncIntervalMs: number;
}

export interface HostConfig {
  logLevel: LogLevel;
  display: DisplayPreferences;
  connection: ConnectionConfig;
  behavior: BehaviorConfig;
}

/**
 * Config file contents before normalization.
 */
export interface HostConfigFile {
  logLevel?: LogLevel;
  display?: Partial<DisplayPreferences>;
  connection?: Partial<ConnectionConfig>;
  behavior?: Partial<BehaviorConfig>;
}

export const DEFAULT_DISPLAY_PREFERENCES: DisplayPreferences = {
  showCpu: true,
  showRam: true,
  showWpm: true,
  showTime: true,
  use24HourTime: true,
  sleepTimeoutMinutes: 1,
  sensitivity: 1.0,
};

export const DEFAULT_HOST_CONFIG: HostConfig = {
  logLevel: 'info',
  display: DEFAULT_DISPLAY_PREFERENCES,
  connection: {
    port: 'auto',
    baudRate: 115200,
    autoReconnect: true,
    reconnectDelayMs: 3000,
    maxReconnectAttempts: 3,
    settleMs: 2000,
    pingTimeoutMs: 500,
    minCommandIntervalMs: 50,
  },
  behavior: {
    idleTimeoutMs: 1000,
    statsIntervalMs: 1000,
    timeSyncIntervalMs: 30_000,
  },
};
