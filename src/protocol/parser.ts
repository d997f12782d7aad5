/**
 * @file Strict line parser for the link protocol.
 * @description Every line is matched against a known verb and argument shape; anything
 * else is rejected here rather than inside a handler. Telemetry values outside their
 * wire range are treated as malformed. Settings values are only checked for shape so
 * the device can report an out-of-range diagnostic.
 * @module protocol/parser
 */

import { ProtocolError } from '../errors';
import {
  ANIM_TRIGGERS,
  DISPLAY_FIELDS,
  WIRE_NUMBER_MAX,
  type AnimTrigger,
  type DeviceReply,
  type DisplayField,
  type LinkCommand,
} from './commands';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: ProtocolError };

const UINT_RE = /^\d{1,3}$/;
const DECIMAL_RE = /^\d{1,2}(\.\d{1,3})?$/;
const TIME_RE = /^(\d{1,2}):(\d{2})$/;
const STATS_RE = /^CPU:(\d{1,3}),RAM:(\d{1,3}),WPM:(\d{1,3})$/;
const DISPLAY_RE = /^DISPLAY_(CPU|RAM|WPM|TIME)$/;

function ok<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

function fail<T>(message: string, line: string): ParseResult<T> {
  return { ok: false, error: new ProtocolError(message, line) };
}

function parseBoundedInt(text: string, max: number): number | undefined {
  if (!UINT_RE.test(text)) {
    return undefined;
  }
  const value = Number.parseInt(text, 10);
  return value <= max ? value : undefined;
}

const DISPLAY_FIELD_NAMES: readonly string[] = DISPLAY_FIELDS;
const ANIM_TRIGGER_NAMES: readonly string[] = ANIM_TRIGGERS;

function isDisplayField(value: string): value is DisplayField {
  return DISPLAY_FIELD_NAMES.includes(value);
}

function isAnimTrigger(value: string): value is AnimTrigger {
  return ANIM_TRIGGER_NAMES.includes(value);
}

/**
 * Strips the line terminator (`\n` or `\r\n`) and surrounding blanks.
 */
export function cleanLine(line: string): string {
  return line.replace(/\r?\n$/, '').trim();
}

/**
 * Parses one host command line.
 *
 * @example
 * parseCommand('SPEED:120'); // { ok: true, value: { kind: 'speed', speedMs: 120 } }
 */
export function parseCommand(raw: string): ParseResult<LinkCommand> {
  const line = cleanLine(raw);
  if (line === '') {
    return fail('Empty line', line);
  }
  const colon = line.indexOf(':');
  const verb = colon === -1 ? line : line.slice(0, colon);
  const arg = colon === -1 ? undefined : line.slice(colon + 1);

  if (arg === undefined) {
    switch (verb) {
      case 'PING':
        return ok({ kind: 'ping' });
      case 'STOP':
        return ok({ kind: 'stop' });
      case 'IDLE':
        return ok({ kind: 'idle' });
      case 'IDLE_START':
        return ok({ kind: 'idleStart' });
      case 'HEARTBEAT':
        return ok({ kind: 'heartbeat' });
      case 'STREAK_ON':
        return ok({ kind: 'streak', on: true });
      case 'STREAK_OFF':
        return ok({ kind: 'streak', on: false });
      case 'SAVE_SETTINGS':
        return ok({ kind: 'saveSettings' });
      case 'LOAD_SETTINGS':
        return ok({ kind: 'loadSettings' });
      case 'RESET_SETTINGS':
        return ok({ kind: 'resetSettings' });
      default:
        return fail(`Unknown verb "${verb}"`, line);
    }
  }

  switch (verb) {
    case 'TIME': {
      const match = TIME_RE.exec(arg);
      if (!match) {
        return fail('TIME expects HH:MM', line);
      }
      const hours = Number.parseInt(match[1] ?? '', 10);
      const minutes = Number.parseInt(match[2] ?? '', 10);
      if (hours > 23 || minutes > 59) {
        return fail('TIME out of range', line);
      }
      return ok({ kind: 'time', hours, minutes });
    }
    case 'CPU':
    case 'RAM': {
      const percent = parseBoundedInt(arg, 100);
      if (percent === undefined) {
        return fail(`${verb} expects 0-100`, line);
      }
      return ok(verb === 'CPU' ? { kind: 'cpu', percent } : { kind: 'ram', percent });
    }
    case 'WPM': {
      const wpm = parseBoundedInt(arg, WIRE_NUMBER_MAX);
      if (wpm === undefined) {
        return fail('WPM expects 0-999', line);
      }
      return ok({ kind: 'wpm', wpm });
    }
    case 'STATS': {
      const match = STATS_RE.exec(arg);
      if (!match) {
        return fail('STATS expects CPU:<n>,RAM:<n>,WPM:<n>', line);
      }
      const cpu = parseBoundedInt(match[1] ?? '', 100);
      const ram = parseBoundedInt(match[2] ?? '', 100);
      const wpm = parseBoundedInt(match[3] ?? '', WIRE_NUMBER_MAX);
      if (cpu === undefined || ram === undefined || wpm === undefined) {
        return fail('STATS value out of range', line);
      }
      return ok({ kind: 'stats', cpu, ram, wpm });
    }
    case 'SPEED': {
      const speedMs = parseBoundedInt(arg, WIRE_NUMBER_MAX);
      if (speedMs === undefined) {
        return fail('SPEED expects 0-999', line);
      }
      return ok({ kind: 'speed', speedMs });
    }
    case 'ANIM':
      if (!isAnimTrigger(arg)) {
        return fail(`Unknown animation "${arg}"`, line);
      }
      return ok({ kind: 'anim', trigger: arg });
    case 'TIME_FORMAT':
      if (arg === '12') {
        return ok({ kind: 'timeFormat', hours: 12 });
      }
      if (arg === '24') {
        return ok({ kind: 'timeFormat', hours: 24 });
      }
      return fail('TIME_FORMAT expects 12 or 24', line);
    case 'SLEEP_TIMEOUT': {
      if (!UINT_RE.test(arg)) {
        return fail('SLEEP_TIMEOUT expects an integer', line);
      }
      return ok({ kind: 'sleepTimeout', minutes: Number.parseInt(arg, 10) });
    }
    case 'SENSITIVITY': {
      if (!DECIMAL_RE.test(arg)) {
        return fail('SENSITIVITY expects a decimal number', line);
      }
      return ok({ kind: 'sensitivity', value: Number.parseFloat(arg) });
    }
    default: {
      const display = DISPLAY_RE.exec(verb);
      const field = display?.[1];
      if (field !== undefined && isDisplayField(field)) {
        if (arg === 'ON' || arg === 'OFF') {
          return ok({ kind: 'display', field, visible: arg === 'ON' });
        }
        return fail(`${verb} expects ON or OFF`, line);
      }
      return fail(`Unknown verb "${verb}"`, line);
    }
  }
}

/**
 * Parses one device reply line. Anything unrecognized is kept as a log line so the host
 * can still show it.
 */
export function parseReply(raw: string): DeviceReply {
  const line = cleanLine(raw);
  if (line === 'PONG') {
    return { kind: 'pong' };
  }
  if (line.startsWith('OK:')) {
    return { kind: 'ok', verb: line.slice(3) };
  }
  if (line.startsWith('ERR:')) {
    const rest = line.slice(4);
    const colon = rest.indexOf(':');
    return colon === -1
      ? { kind: 'error', verb: rest, reason: '' }
      : { kind: 'error', verb: rest.slice(0, colon), reason: rest.slice(colon + 1) };
  }
  if (line.startsWith('STATE:')) {
    const parts = line.slice(6).split(':');
    return { kind: 'state', state: parts[0] ?? '', streak: parts[1] === 'STREAK' };
  }
  if (line.startsWith('LOG:')) {
    return { kind: 'log', text: line.slice(4) };
  }
  return { kind: 'log', text: line };
}
