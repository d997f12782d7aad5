/**
 * @file Device runtime
 * @description One cooperative device pass: the serial task drains the line reader and
 * applies directives, the director task advances animation timers every 16 ms, and the
 * redraw task hands a frame to the compositor every 33 ms when something changed (or
 * once a second regardless). All state below is owned by this runtime alone.
 * @module device/runtime
 */

import { silentLogger, type Logger } from '../logging';
import { formatReply, type DeviceReply } from '../protocol/commands';
import { AnimationDirector } from './animation-director';
import { applySettingsToDirector, handleLine, type DeviceContext } from './directive-handler';
import { emptyReadings, linesEqual, renderReadings, type DisplayLine } from './display-state';
import { LineReader } from './line-reader';
import type { DeviceSettings } from './settings-record';
import { SettingsStore, type SettingsStorage } from './settings-store';
import { spriteSetsEqual, type AnimationState, type SpriteLayerSet } from './sprites';
import { TaskScheduler } from './task-scheduler';

export const DIRECTOR_INTERVAL_MS = 16;
export const REDRAW_INTERVAL_MS = 33;
export const FORCED_REDRAW_MS = 1000;

export interface DeviceFrame {
  state: AnimationState;
  streak: boolean;
  sprites: SpriteLayerSet;
  lines: DisplayLine[];
  at: number;
}

/** Renders frames; pixel work is the implementation's business. */
export interface Compositor {
  draw(frame: DeviceFrame): void;
}

export interface DeviceRuntimeOptions {
  storage: SettingsStorage;
  /** Receives each reply line, terminator included */
  onOutput: (line: string) => void;
  compositor?: Compositor;
  logger?: Logger;
  random?: () => number;
  /** Boot time on the runtime's clock */
  now?: number;
}

export interface DeviceRuntimeState {
  context: DeviceContext;
  scheduler: TaskScheduler;
  reader: LineReader;
  framesDrawn: number;
  lastDrawAt: number | null;
}

export interface DeviceRuntime {
  state: DeviceRuntimeState;
  /** Bytes received on the serial line */
  feedBytes(bytes: Uint8Array | readonly number[]): void;
  /** Runs every task due at `now`; returns the names of the tasks that ran */
  runPass(now: number): string[];
  getSettings(): DeviceSettings;
  lastFrame(): DeviceFrame | undefined;
}

export function createDeviceRuntime(options: DeviceRuntimeOptions): DeviceRuntime {
  const logger = options.logger ?? silentLogger;
  const bootAt = options.now ?? 0;
  const store = new SettingsStore(options.storage, logger);
  const loaded = store.load();

  const director = new AnimationDirector(
    {
      sleepTimeoutMinutes: loaded.settings.sleepTimeoutMinutes,
      sensitivity: loaded.settings.sensitivity,
      ...(options.random !== undefined ? { random: options.random } : {}),
    },
    bootAt
  );
  const context: DeviceContext = {
    director,
    settings: loaded.settings,
    readings: emptyReadings(),
    store,
    logger,
  };
  applySettingsToDirector(context);

  const state: DeviceRuntimeState = {
    context,
    scheduler: new TaskScheduler(),
    reader: new LineReader(),
    framesDrawn: 0,
    lastDrawAt: null,
  };
  state.scheduler.advanceTo(bootAt);

  let frame: DeviceFrame | undefined;
  let dirty = true;
  let reportedState = director.getState();
  let reportedStreak = director.isStreak();

  const emit = (reply: DeviceReply): void => {
    options.onOutput(`${formatReply(reply)}\n`);
  };

  const reportStateChange = (): void => {
    const current = director.getState();
    const streak = director.isStreak();
    if (current === reportedState && streak === reportedStreak) {
      return;
    }
    reportedState = current;
    reportedStreak = streak;
    emit({ kind: 'state', state: current, streak });
  };

  const serialTask = (now: number): void => {
    for (const line of state.reader.readLines()) {
      for (const reply of handleLine(context, line, now)) {
        emit(reply);
      }
    }
    reportStateChange();
  };

  const directorTask = (now: number): void => {
    if (director.update(now)) {
      dirty = true;
    }
    reportStateChange();
  };

  const redrawTask = (now: number): void => {
    const lines = renderReadings(context.readings, context.settings);
    const sprites = director.getSprites();
    const stale = state.lastDrawAt === null || now - state.lastDrawAt >= FORCED_REDRAW_MS;
    const changed =
      frame === undefined ||
      dirty ||
      !spriteSetsEqual(frame.sprites, sprites) ||
      !linesEqual(frame.lines, lines);
    if (!changed && !stale) {
      return;
    }
    frame = {
      state: director.getState(),
      streak: director.isStreak(),
      sprites,
      lines,
      at: now,
    };
    dirty = false;
    state.lastDrawAt = now;
    state.framesDrawn += 1;
    options.compositor?.draw(frame);
  };

  state.scheduler.scheduleEvery('serial', 0, serialTask);
  state.scheduler.scheduleEvery('director', DIRECTOR_INTERVAL_MS, directorTask);
  state.scheduler.scheduleEvery('redraw', REDRAW_INTERVAL_MS, redrawTask);

  if (loaded.diagnostic !== undefined) {
    emit({ kind: 'log', text: loaded.diagnostic });
  }
  logger.info('Device runtime booted');

  return {
    state,
    feedBytes: (bytes) => state.reader.push(bytes),
    runPass: (now) => state.scheduler.advanceTo(now),
    getSettings: () => ({ ...context.settings }),
    lastFrame: () => frame,
  };
}
