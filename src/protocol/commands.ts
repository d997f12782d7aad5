/**
 * @file Link command types
 * @description Tagged variants for every line exchanged over the serial link, plus the
 * formatter that turns a host command into its ASCII wire form (without terminator).
 * @module protocol/commands
 */

export type DisplayField = 'CPU' | 'RAM' | 'WPM' | 'TIME';

export const DISPLAY_FIELDS: readonly DisplayField[] = ['CPU', 'RAM', 'WPM', 'TIME'];

export type AnimTrigger = 'IDLE_1' | 'IDLE_2' | 'IDLE_3' | 'IDLE_4' | 'BLINK' | 'EAR_TWITCH';

export const ANIM_TRIGGERS: readonly AnimTrigger[] = [
  'IDLE_1',
  'IDLE_2',
  'IDLE_3',
  'IDLE_4',
  'BLINK',
  'EAR_TWITCH',
];

/**
 * Commands sent from the host to the device.
 */
export type LinkCommand =
  | { kind: 'ping' }
  | { kind: 'time'; hours: number; minutes: number }
  | { kind: 'cpu'; percent: number }
  | { kind: 'ram'; percent: number }
  | { kind: 'wpm'; wpm: number }
  | { kind: 'stats'; cpu: number; ram: number; wpm: number }
  | { kind: 'speed'; speedMs: number }
  | { kind: 'stop' }
  | { kind: 'idle' }
  | { kind: 'idleStart' }
  | { kind: 'heartbeat' }
  | { kind: 'streak'; on: boolean }
  | { kind: 'anim'; trigger: AnimTrigger }
  | { kind: 'display'; field: DisplayField; visible: boolean }
  | { kind: 'timeFormat'; hours: 12 | 24 }
  | { kind: 'sleepTimeout'; minutes: number }
  | { kind: 'sensitivity'; value: number }
  | { kind: 'saveSettings' }
  | { kind: 'loadSettings' }
  | { kind: 'resetSettings' };

export type LinkCommandKind = LinkCommand['kind'];

/**
 * Lines sent from the device back to the host.
 */
export type DeviceReply =
  | { kind: 'pong' }
  | { kind: 'ok'; verb: string }
  | { kind: 'error'; verb: string; reason: string }
  | { kind: 'state'; state: string; streak: boolean }
  | { kind: 'log'; text: string };

/** Upper bound of the three-digit numeric fields (WPM, SPEED). */
export const WIRE_NUMBER_MAX = 999;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function wireInt(value: number, max: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(max, Math.round(value)));
}

/**
 * Formats a sensitivity multiplier with one to two decimals (`1.5`, `0.25`, `2.0`).
 */
export function formatSensitivity(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return Number.isInteger(rounded) ? rounded.toFixed(1) : String(rounded);
}

/**
 * Serializes a command into its wire form. Numeric telemetry is rounded and clamped to
 * the wire range so the device never sees a value its parser would reject.
 */
export function formatCommand(command: LinkCommand): string {
  switch (command.kind) {
    case 'ping':
      return 'PING';
    case 'time':
      return `TIME:${pad2(command.hours)}:${pad2(command.minutes)}`;
    case 'cpu':
      return `CPU:${wireInt(command.percent, 100)}`;
    case 'ram':
      return `RAM:${wireInt(command.percent, 100)}`;
    case 'wpm':
      return `WPM:${wireInt(command.wpm, WIRE_NUMBER_MAX)}`;
    case 'stats':
      return `STATS:CPU:${wireInt(command.cpu, 100)},RAM:${wireInt(command.ram, 100)},WPM:${wireInt(command.wpm, WIRE_NUMBER_MAX)}`;
    case 'speed':
      return `SPEED:${wireInt(command.speedMs, WIRE_NUMBER_MAX)}`;
    case 'stop':
      return 'STOP';
    case 'idle':
      return 'IDLE';
    case 'idleStart':
      return 'IDLE_START';
    case 'heartbeat':
      return 'HEARTBEAT';
    case 'streak':
      return command.on ? 'STREAK_ON' : 'STREAK_OFF';
    case 'anim':
      return `ANIM:${command.trigger}`;
    case 'display':
      return `DISPLAY_${command.field}:${command.visible ? 'ON' : 'OFF'}`;
    case 'timeFormat':
      return `TIME_FORMAT:${command.hours}`;
    case 'sleepTimeout':
      return `SLEEP_TIMEOUT:${Math.round(command.minutes)}`;
    case 'sensitivity':
      return `SENSITIVITY:${formatSensitivity(command.value)}`;
    case 'saveSettings':
      return 'SAVE_SETTINGS';
    case 'loadSettings':
      return 'LOAD_SETTINGS';
    case 'resetSettings':
      return 'RESET_SETTINGS';
  }
}

/**
 * Serializes a device reply.
 */
export function formatReply(reply: DeviceReply): string {
  switch (reply.kind) {
    case 'pong':
      return 'PONG';
    case 'ok':
      return `OK:${reply.verb}`;
    case 'error':
      return `ERR:${reply.verb}:${reply.reason}`;
    case 'state':
      return reply.streak ? `STATE:${reply.state}:STREAK` : `STATE:${reply.state}`;
    case 'log':
      return `LOG:${reply.text}`;
  }
}

/**
 * Returns the verb of a formatted command (`SLEEP_TIMEOUT:5` → `SLEEP_TIMEOUT`).
 */
export function commandVerb(command: LinkCommand): string {
  const line = formatCommand(command);
  const colon = line.indexOf(':');
  return colon === -1 ? line : line.slice(0, colon);
}

/**
 * Builds the `TIME` command for a wall-clock instant (24 h, local time).
 */
export function timeCommand(date: Date): LinkCommand {
  return { kind: 'time', hours: date.getHours(), minutes: date.getMinutes() };
}
