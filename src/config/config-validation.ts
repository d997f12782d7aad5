/**
 * @file Configuration validation for pawlink host configuration.
 * @description Runtime validation of `pawlink.json` contents with detailed error
 * messages, plus normalization onto the defaults.
 * @module config/config-validation
 */

import { ConfigurationError } from '../errors';
import { LOG_LEVELS, isLogLevel } from '../logging';
import {
  DEFAULT_HOST_CONFIG,
  type BehaviorConfig,
  type ConnectionConfig,
  type DisplayPreferences,
  type HostConfig,
  type HostConfigFile,
} from './types';

// ============================================================================
// Constants
// ============================================================================

export const SLEEP_TIMEOUT_MIN = 1;
export const SLEEP_TIMEOUT_MAX = 60;
export const SENSITIVITY_MIN = 0.1;
export const SENSITIVITY_MAX = 5.0;

const BAUD_RATE_MIN = 9600;
const BAUD_RATE_MAX = 115200;
const DEVICE_BAUD_RATE = 115200;

const TOP_LEVEL_KEYS = ['logLevel', 'display', 'connection', 'behavior'];

// ============================================================================
// Validation Result Types
// ============================================================================

/**
 * Validation result containing all issues found.
 */
export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;
  /** List of error messages */
  errors: string[];
  /** List of warning messages */
  warnings: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Individual Validators
// ============================================================================

/**
 * Validates an optional boolean flag.
 */
export function validateBoolean(value: unknown, fieldName: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined) {
    return { valid: true, errors, warnings };
  }

  if (typeof value !== 'boolean') {
    errors.push(`${fieldName} must be a boolean, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }

  return { valid: true, errors, warnings };
}

/**
 * Validates an optional number within an inclusive range.
 * @param integer - Reject fractional values when true
 */
export function validateNumberInRange(
  value: unknown,
  fieldName: string,
  min: number,
  max: number,
  integer = true
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined) {
    return { valid: true, errors, warnings };
  }

  if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push(`${fieldName} must be a number, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }

  if (integer && !Number.isInteger(value)) {
    errors.push(`${fieldName} must be an integer, got ${value}`);
    return { valid: false, errors, warnings };
  }

  if (value < min || value > max) {
    errors.push(`${fieldName} must be between ${min} and ${max}, got ${value}`);
    return { valid: false, errors, warnings };
  }

  return { valid: true, errors, warnings };
}

/**
 * Validates the port setting: `auto` or a non-empty path.
 */
export function validatePortPath(value: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined) {
    return { valid: true, errors, warnings };
  }

  if (typeof value !== 'string') {
    errors.push(`connection.port must be a string, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }

  if (value.trim() === '') {
    errors.push('connection.port cannot be empty; use "auto" to detect the device');
    return { valid: false, errors, warnings };
  }

  return { valid: true, errors, warnings };
}

export function validateLogLevel(value: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined) {
    return { valid: true, errors, warnings };
  }

  if (!isLogLevel(value)) {
    errors.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${String(value)}`);
    return { valid: false, errors, warnings };
  }

  return { valid: true, errors, warnings };
}

// ============================================================================
// Section Validators
// ============================================================================

function validateSection(
  value: unknown,
  section: string,
  validate: (record: Record<string, unknown>) => ValidationResult[]
): ValidationResult {
  if (value === undefined || value === null) {
    return { valid: true, errors: [], warnings: [] };
  }
  if (!isRecord(value)) {
    return { valid: false, errors: [`${section} must be an object`], warnings: [] };
  }
  return mergeResults(validate(value));
}

export function validateDisplayConfig(config: unknown): ValidationResult {
  return validateSection(config, 'display', (d) => [
    validateBoolean(d.showCpu, 'display.showCpu'),
    validateBoolean(d.showRam, 'display.showRam'),
    validateBoolean(d.showWpm, 'display.showWpm'),
    validateBoolean(d.showTime, 'display.showTime'),
    validateBoolean(d.use24HourTime, 'display.use24HourTime'),
    validateNumberInRange(
      d.sleepTimeoutMinutes,
      'display.sleepTimeoutMinutes',
      SLEEP_TIMEOUT_MIN,
      SLEEP_TIMEOUT_MAX
    ),
    validateNumberInRange(
      d.sensitivity,
      'display.sensitivity',
      SENSITIVITY_MIN,
      SENSITIVITY_MAX,
      false
    ),
  ]);
}

export function validateConnectionConfig(config: unknown): ValidationResult {
  return validateSection(config, 'connection', (c) => {
    const results = [
      validatePortPath(c.port),
      validateNumberInRange(c.baudRate, 'connection.baudRate', BAUD_RATE_MIN, BAUD_RATE_MAX),
      validateBoolean(c.autoReconnect, 'connection.autoReconnect'),
      validateNumberInRange(c.reconnectDelayMs, 'connection.reconnectDelayMs', 100, 60_000),
      validateNumberInRange(c.maxReconnectAttempts, 'connection.maxReconnectAttempts', 0, 100),
      validateNumberInRange(c.settleMs, 'connection.settleMs', 0, 10_000),
      validateNumberInRange(c.pingTimeoutMs, 'connection.pingTimeoutMs', 0, 10_000),
      validateNumberInRange(c.minCommandIntervalMs, 'connection.minCommandIntervalMs', 0, 1000),
    ];
    if (typeof c.baudRate === 'number' && c.baudRate !== DEVICE_BAUD_RATE) {
      results.push({
        valid: true,
        errors: [],
        warnings: [`connection.baudRate ${c.baudRate} differs from the device rate ${DEVICE_BAUD_RATE}`],
      });
    }
    return results;
  });
}

export function validateBehaviorConfig(config: unknown): ValidationResult {
  return validateSection(config, 'behavior', (b) => [
    validateNumberInRange(b.idleTimeoutMs, 'behavior.idleTimeoutMs', 100, 10_000),
    validateNumberInRange(b.statsIntervalMs, 'behavior.statsIntervalMs', 100, 10_000),
    validateNumberInRange(b.timeSyncIntervalMs, 'behavior.timeSyncIntervalMs', 1000, 3_600_000),
  ]);
}

// ============================================================================
// Main Validation Function
// ============================================================================

/**
 * Validates a complete configuration file.
 * @returns Validation result with all errors and warnings
 */
export function validateHostConfig(config: unknown): ValidationResult {
  if (config === undefined || config === null) {
    return { valid: false, errors: ['Configuration is required'], warnings: [] };
  }

  if (!isRecord(config)) {
    return {
      valid: false,
      errors: [`Configuration must be an object, got ${typeof config}`],
      warnings: [],
    };
  }

  const unknownKeys = Object.keys(config).filter((key) => !TOP_LEVEL_KEYS.includes(key));
  const results: ValidationResult[] = [
    validateLogLevel(config.logLevel),
    validateDisplayConfig(config.display),
    validateConnectionConfig(config.connection),
    validateBehaviorConfig(config.behavior),
    {
      valid: true,
      errors: [],
      warnings: unknownKeys.map((key) => `Unknown configuration key "${key}" ignored`),
    },
  ];

  return mergeResults(results);
}

/**
 * Validates configuration and throws on error.
 * @throws {ConfigurationError} If validation fails
 */
export function assertValidHostConfig(config: unknown): asserts config is HostConfigFile {
  const result = validateHostConfig(config);
  if (!result.valid) {
    throw new ConfigurationError(`Invalid pawlink configuration:\n- ${result.errors.join('\n- ')}`);
  }
}

/**
 * Fills every missing field from {@link DEFAULT_HOST_CONFIG}.
 */
export function normalizeHostConfig(file: HostConfigFile): HostConfig {
  const display: DisplayPreferences = { ...DEFAULT_HOST_CONFIG.display, ...file.display };
  const connection: ConnectionConfig = { ...DEFAULT_HOST_CONFIG.connection, ...file.connection };
  const behavior: BehaviorConfig = { ...DEFAULT_HOST_CONFIG.behavior, ...file.behavior };
  connection.port = connection.port.trim();
  return {
    logLevel: file.logLevel ?? DEFAULT_HOST_CONFIG.logLevel,
    display,
    connection,
    behavior,
  };
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Merges multiple validation results into one.
 */
function mergeResults(results: ValidationResult[]): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  let valid = true;

  for (const result of results) {
    if (!result.valid) {
      valid = false;
    }
    errors.push(...result.errors);
    warnings.push(...result.warnings);
  }

  return { valid, errors, warnings };
}
