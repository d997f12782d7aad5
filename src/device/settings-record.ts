/**
 * @file Device settings record
 * @description Fixed 14-byte persisted form of {@link DeviceSettings}.
 *
 * | offset | size | field                                  |
 * |--------|------|----------------------------------------|
 * | 0      | 1    | magic `0xB7`                           |
 * | 1      | 1    | version `1`                            |
 * | 2-5    | 4    | showCpu, showRam, showWpm, showTime    |
 * | 6      | 1    | use24HourTime                          |
 * | 7      | 1    | sleepTimeoutMinutes                    |
 * | 8-11   | 4    | sensitivity, float32 LE                |
 * | 12-13  | 2    | additive checksum of bytes 0-11, LE    |
 * @module device/settings-record
 */

import { SettingsError } from '../errors';

export interface DeviceSettings {
  showCpu: boolean;
  showRam: boolean;
  showWpm: boolean;
  showTime: boolean;
  use24HourTime: boolean;
  sleepTimeoutMinutes: number;
  sensitivity: number;
}

export const SETTINGS_MAGIC = 0xb7;
export const SETTINGS_VERSION = 1;
export const SETTINGS_RECORD_SIZE = 14;

export const SLEEP_TIMEOUT_RANGE = { min: 1, max: 60 } as const;
export const SENSITIVITY_RANGE = { min: 0.1, max: 5.0 } as const;

const CHECKSUM_OFFSET = 12;

export const DEFAULT_DEVICE_SETTINGS: Readonly<DeviceSettings> = Object.freeze({
  showCpu: true,
  showRam: true,
  showWpm: true,
  showTime: true,
  use24HourTime: true,
  sleepTimeoutMinutes: 1,
  sensitivity: 1.0,
});

export function defaultDeviceSettings(): DeviceSettings {
  return { ...DEFAULT_DEVICE_SETTINGS };
}

export function isValidSleepTimeout(minutes: number): boolean {
  return (
    Number.isInteger(minutes) &&
    minutes >= SLEEP_TIMEOUT_RANGE.min &&
    minutes <= SLEEP_TIMEOUT_RANGE.max
  );
}

export function isValidSensitivity(value: number): boolean {
  return Number.isFinite(value) && value >= SENSITIVITY_RANGE.min && value <= SENSITIVITY_RANGE.max;
}

export function checksum(bytes: Uint8Array, length = CHECKSUM_OFFSET): number {
  let sum = 0;
  for (let i = 0; i < length; i += 1) {
    sum = (sum + (bytes[i] ?? 0)) & 0xffff;
  }
  return sum;
}

export function encodeSettings(settings: DeviceSettings): Uint8Array {
  const bytes = new Uint8Array(SETTINGS_RECORD_SIZE);
  const view = new DataView(bytes.buffer);
  bytes[0] = SETTINGS_MAGIC;
  bytes[1] = SETTINGS_VERSION;
  bytes[2] = settings.showCpu ? 1 : 0;
  bytes[3] = settings.showRam ? 1 : 0;
  bytes[4] = settings.showWpm ? 1 : 0;
  bytes[5] = settings.showTime ? 1 : 0;
  bytes[6] = settings.use24HourTime ? 1 : 0;
  bytes[7] = settings.sleepTimeoutMinutes & 0xff;
  view.setFloat32(8, settings.sensitivity, true);
  view.setUint16(CHECKSUM_OFFSET, checksum(bytes), true);
  return bytes;
}

function readFlag(bytes: Uint8Array, offset: number, name: string): boolean {
  const value = bytes[offset];
  if (value !== 0 && value !== 1) {
    throw new SettingsError(`${name} flag byte must be 0 or 1, got ${String(value)}`, name);
  }
  return value === 1;
}

/**
 * Decodes and validates a stored record. Sensitivity is rounded to three decimals to
 * hide float32 noise.
 * @throws {SettingsError} On any size, header, flag, range or checksum mismatch
 */
export function decodeSettings(bytes: Uint8Array): DeviceSettings {
  if (bytes.length !== SETTINGS_RECORD_SIZE) {
    throw new SettingsError(
      `Settings record must be ${SETTINGS_RECORD_SIZE} bytes, got ${bytes.length}`
    );
  }
  if (bytes[0] !== SETTINGS_MAGIC) {
    throw new SettingsError(`Bad settings magic 0x${(bytes[0] ?? 0).toString(16)}`);
  }
  if (bytes[1] !== SETTINGS_VERSION) {
    throw new SettingsError(`Unsupported settings version ${String(bytes[1])}`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const stored = view.getUint16(CHECKSUM_OFFSET, true);
  const computed = checksum(bytes);
  if (stored !== computed) {
    throw new SettingsError(`Settings checksum mismatch (stored ${stored}, computed ${computed})`);
  }

  const sleepTimeoutMinutes = bytes[7] ?? 0;
  if (!isValidSleepTimeout(sleepTimeoutMinutes)) {
    throw SettingsError.outOfRange(
      'sleepTimeoutMinutes',
      sleepTimeoutMinutes,
      SLEEP_TIMEOUT_RANGE.min,
      SLEEP_TIMEOUT_RANGE.max
    );
  }
  const sensitivity = Math.round(view.getFloat32(8, true) * 1000) / 1000;
  if (!isValidSensitivity(sensitivity)) {
    throw SettingsError.outOfRange(
      'sensitivity',
      sensitivity,
      SENSITIVITY_RANGE.min,
      SENSITIVITY_RANGE.max
    );
  }

  return {
    showCpu: readFlag(bytes, 2, 'showCpu'),
    showRam: readFlag(bytes, 3, 'showRam'),
    showWpm: readFlag(bytes, 4, 'showWpm'),
    showTime: readFlag(bytes, 5, 'showTime'),
    use24HourTime: readFlag(bytes, 6, 'use24HourTime'),
    sleepTimeoutMinutes,
    sensitivity,
  };
}
