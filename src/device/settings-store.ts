/**
 * @fileoverview Persistence for device settings. Storage is synchronous, like the
 * EEPROM-style flash area it stands in for.
 */

import * as fs from 'fs';
import { SettingsError, getErrorMessage } from '../errors';
import { silentLogger, type Logger } from '../logging';
import {
  decodeSettings,
  defaultDeviceSettings,
  encodeSettings,
  type DeviceSettings,
} from './settings-record';

export interface SettingsStorage {
  /** Returns the stored bytes, or undefined when nothing was ever written */
  read(): Uint8Array | undefined;
  write(bytes: Uint8Array): void;
}

export class MemorySettingsStorage implements SettingsStorage {
  private bytes: Uint8Array | undefined;
  writes = 0;

  constructor(initial?: Uint8Array) {
    this.bytes = initial !== undefined ? Uint8Array.from(initial) : undefined;
  }

  read(): Uint8Array | undefined {
    return this.bytes !== undefined ? Uint8Array.from(this.bytes) : undefined;
  }

  write(bytes: Uint8Array): void {
    this.bytes = Uint8Array.from(bytes);
    this.writes += 1;
  }
}

export class FileSettingsStorage implements SettingsStorage {
  constructor(private readonly filePath: string) {}

  read(): Uint8Array | undefined {
    if (!fs.existsSync(this.filePath)) {
      return undefined;
    }
    return new Uint8Array(fs.readFileSync(this.filePath));
  }

  write(bytes: Uint8Array): void {
    fs.writeFileSync(this.filePath, bytes);
  }
}

export interface LoadedSettings {
  settings: DeviceSettings;
  /** Set when the stored record was rejected and defaults were written back */
  diagnostic?: string;
}

export class SettingsStore {
  constructor(
    private readonly storage: SettingsStorage,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Loads the stored settings. A missing or rejected record yields factory defaults,
   * which are saved straight away so the next boot finds a valid record.
   */
  load(): LoadedSettings {
    let bytes: Uint8Array | undefined;
    try {
      bytes = this.storage.read();
    } catch (err) {
      return this.recover(`Settings storage unreadable: ${getErrorMessage(err)}`);
    }
    if (bytes === undefined) {
      return this.recover('No stored settings; using defaults');
    }
    try {
      return { settings: decodeSettings(bytes) };
    } catch (err) {
      if (!(err instanceof SettingsError)) {
        throw err;
      }
      return this.recover(`Stored settings rejected: ${err.message}; using defaults`);
    }
  }

  save(settings: DeviceSettings): void {
    this.storage.write(encodeSettings(settings));
    this.logger.debug('Settings saved');
  }

  private recover(diagnostic: string): LoadedSettings {
    const settings = defaultDeviceSettings();
    this.logger.warn(diagnostic);
    this.save(settings);
    return { settings, diagnostic };
  }
}
