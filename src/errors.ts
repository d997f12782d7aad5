/**
 * @file Pawlink Error Types
 * @description Error classes for the host link and the virtual device. Transport and
 * connection errors drive reconnection; protocol and settings errors stay local to the
 * device; capability errors put the typing monitor into fallback mode.
 * @module errors
 */

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all pawlink errors.
 */
export class PawlinkError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Additional context about the error */
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PawlinkError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    // Maintains proper stack trace in V8
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Error thrown when the host configuration is invalid.
 */
export class ConfigurationError extends PawlinkError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Transport and Connection Errors
// ============================================================================

/**
 * Error raised by the byte transport: port unavailable, write failure, unexpected close.
 */
export class TransportError extends PawlinkError {
  /** Port path the transport was bound to */
  readonly portPath?: string;

  constructor(message: string, portPath?: string, cause?: unknown) {
    super(message, 'TRANSPORT_ERROR', {
      portPath,
      ...(cause !== undefined ? { cause: getErrorMessage(cause) } : {}),
    });
    this.name = 'TransportError';
    if (portPath !== undefined) {
      this.portPath = portPath;
    }
  }

  /**
   * Creates the error reported when the port closes while the link is in use.
   */
  static unexpectedClose(portPath: string): TransportError {
    return new TransportError(`Port ${portPath} closed unexpectedly`, portPath);
  }

  /**
   * Creates the error used to reject sends that were queued when the link went down.
   */
  static linkDown(portPath?: string): TransportError {
    return new TransportError('Link is not connected', portPath);
  }
}

/**
 * Error thrown when a connection attempt fails.
 */
export class ConnectionError extends PawlinkError {
  /** Which supervisor step failed */
  readonly step: 'discover' | 'open' | 'handshake';

  constructor(message: string, step: 'discover' | 'open' | 'handshake', context?: Record<string, unknown>) {
    super(message, 'CONNECTION_ERROR', { step, ...context });
    this.name = 'ConnectionError';
    this.step = step;
  }

  static noDeviceFound(candidates: number): ConnectionError {
    return new ConnectionError(
      `No compatible serial device found (${candidates} port(s) scanned)`,
      'discover',
      { candidates }
    );
  }
}

// ============================================================================
// Protocol Errors
// ============================================================================

/**
 * Error describing a line that does not match any known command shape.
 */
export class ProtocolError extends PawlinkError {
  /** The offending line, without its terminator */
  readonly line: string;

  constructor(message: string, line: string) {
    super(message, 'PROTOCOL_ERROR', { line });
    this.name = 'ProtocolError';
    this.line = line;
  }
}

// ============================================================================
// Settings Errors
// ============================================================================

/**
 * Error reported when a stored settings record is rejected or a value is out of range.
 */
export class SettingsError extends PawlinkError {
  /** Setting name, when the error concerns a single value */
  readonly setting?: string;

  constructor(message: string, setting?: string, context?: Record<string, unknown>) {
    super(message, 'SETTINGS_ERROR', { setting, ...context });
    this.name = 'SettingsError';
    if (setting !== undefined) {
      this.setting = setting;
    }
  }

  static outOfRange(setting: string, value: number, min: number, max: number): SettingsError {
    return new SettingsError(
      `${setting} must be between ${min} and ${max}, got ${value}`,
      setting,
      { value, min, max }
    );
  }
}

// ============================================================================
// Capability Errors
// ============================================================================

/**
 * Error raised when the host cannot observe global key events.
 */
export class CapabilityError extends PawlinkError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CAPABILITY_ERROR', context);
    this.name = 'CapabilityError';
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isPawlinkError(error: unknown): error is PawlinkError {
  return error instanceof PawlinkError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isConnectionError(error: unknown): error is ConnectionError {
  return error instanceof ConnectionError;
}

export function isCapabilityError(error: unknown): error is CapabilityError {
  return error instanceof CapabilityError;
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Wraps an unknown error in a PawlinkError if it isn't already one.
 * @param error - The error to wrap
 * @param defaultMessage - Default message if error is not an Error
 */
export function wrapError(
  error: unknown,
  defaultMessage = 'An unknown error occurred'
): PawlinkError {
  if (isPawlinkError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new PawlinkError(error.message, 'UNKNOWN_ERROR', { originalError: error.name });
  }
  return new PawlinkError(defaultMessage, 'UNKNOWN_ERROR', { originalValue: String(error) });
}

/**
 * Gets a user-friendly error message from any error.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
