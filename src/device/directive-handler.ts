/**
 * @file Directive handler
 * @description Applies parsed host commands to the device. All mutable device state is
 * reached through an explicit {@link DeviceContext}; the handler returns the replies to
 * write back rather than writing them itself.
 * @module device/directive-handler
 */

import { getErrorMessage } from '../errors';
import type { Logger } from '../logging';
import { commandVerb, type DeviceReply, type LinkCommand } from '../protocol/commands';
import { parseCommand } from '../protocol/parser';
import type { AnimationDirector } from './animation-director';
import type { DisplayReadings } from './display-state';
import {
  defaultDeviceSettings,
  isValidSensitivity,
  isValidSleepTimeout,
  type DeviceSettings,
} from './settings-record';
import type { SettingsStore } from './settings-store';

export interface DeviceContext {
  director: AnimationDirector;
  settings: DeviceSettings;
  readings: DisplayReadings;
  store: SettingsStore;
  logger: Logger;
}

const OUT_OF_RANGE = 'out of range';

function ok(command: LinkCommand): DeviceReply {
  return { kind: 'ok', verb: commandVerb(command) };
}

function rejected(command: LinkCommand, reason: string): DeviceReply {
  return { kind: 'error', verb: commandVerb(command), reason };
}

/**
 * Pushes the settings that drive animation timing into the director.
 */
export function applySettingsToDirector(ctx: DeviceContext): void {
  ctx.director.setSleepTimeout(ctx.settings.sleepTimeoutMinutes);
  ctx.director.setSensitivity(ctx.settings.sensitivity);
}

/**
 * Parses and applies one received line. Malformed lines and unknown verbs are dropped
 * without a reply.
 */
export function handleLine(ctx: DeviceContext, line: string, now: number): DeviceReply[] {
  const parsed = parseCommand(line);
  if (!parsed.ok) {
    ctx.logger.debug(`Dropped "${parsed.error.line}": ${parsed.error.message}`);
    return [];
  }
  return handleCommand(ctx, parsed.value, now);
}

export function handleCommand(ctx: DeviceContext, command: LinkCommand, now: number): DeviceReply[] {
  const { director, settings, readings } = ctx;

  switch (command.kind) {
    case 'ping':
      return [{ kind: 'pong' }];
    case 'time':
      readings.time = { hours: command.hours, minutes: command.minutes };
      return [];
    case 'cpu':
      readings.cpuPercent = command.percent;
      return [];
    case 'ram':
      readings.ramPercent = command.percent;
      return [];
    case 'wpm':
      readings.wpm = command.wpm;
      return [];
    case 'stats':
      readings.cpuPercent = command.cpu;
      readings.ramPercent = command.ram;
      readings.wpm = command.wpm;
      return [];
    case 'speed':
      director.typing(now, command.speedMs);
      return [];
    case 'stop':
    case 'idle':
      director.stop(now);
      return [];
    case 'idleStart':
      director.idleStart(now);
      return [];
    case 'heartbeat':
      director.heartbeat(now);
      return [];
    case 'streak':
      director.setStreak(now, command.on);
      return [];
    case 'anim':
      switch (command.trigger) {
        case 'BLINK':
          director.triggerBlink(now);
          break;
        case 'EAR_TWITCH':
          director.triggerEarTwitch(now);
          break;
        case 'IDLE_1':
          director.forceIdleStage(now, 1);
          break;
        case 'IDLE_2':
          director.forceIdleStage(now, 2);
          break;
        case 'IDLE_3':
          director.forceIdleStage(now, 3);
          break;
        case 'IDLE_4':
          director.forceIdleStage(now, 4);
          break;
      }
      return [];
    case 'display':
      switch (command.field) {
        case 'CPU':
          settings.showCpu = command.visible;
          break;
        case 'RAM':
          settings.showRam = command.visible;
          break;
        case 'WPM':
          settings.showWpm = command.visible;
          break;
        case 'TIME':
          settings.showTime = command.visible;
          break;
      }
      return [ok(command)];
    case 'timeFormat':
      settings.use24HourTime = command.hours === 24;
      return [ok(command)];
    case 'sleepTimeout':
      if (!isValidSleepTimeout(command.minutes)) {
        ctx.logger.warn(`Sleep timeout ${command.minutes} out of range`);
        return [rejected(command, OUT_OF_RANGE)];
      }
      settings.sleepTimeoutMinutes = command.minutes;
      director.setSleepTimeout(command.minutes);
      return [ok(command)];
    case 'sensitivity':
      if (!isValidSensitivity(command.value)) {
        ctx.logger.warn(`Sensitivity ${command.value} out of range`);
        return [rejected(command, OUT_OF_RANGE)];
      }
      settings.sensitivity = command.value;
      director.setSensitivity(command.value);
      return [ok(command)];
    case 'saveSettings':
      try {
        ctx.store.save(settings);
      } catch (err) {
        ctx.logger.error(`Saving settings failed: ${getErrorMessage(err)}`);
        return [rejected(command, 'storage failure')];
      }
      return [ok(command)];
    case 'loadSettings': {
      const loaded = ctx.store.load();
      Object.assign(settings, loaded.settings);
      applySettingsToDirector(ctx);
      const replies: DeviceReply[] = [];
      if (loaded.diagnostic !== undefined) {
        replies.push({ kind: 'log', text: loaded.diagnostic });
      }
      replies.push(ok(command));
      return replies;
    }
    case 'resetSettings':
      Object.assign(settings, defaultDeviceSettings());
      applySettingsToDirector(ctx);
      return [ok(command)];
  }
}
