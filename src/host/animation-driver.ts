/**
 * @fileoverview Turns estimator samples into animation directives for the device.
 * Directives are emitted on changes only, plus a keep-alive while typing so the
 * device's host-timeout fail-safe does not fire mid-burst.
 */

import type { LinkCommand } from '../protocol/commands';
import { wpmToSpeed } from '../protocol/speed';
import { StreakDetector } from '../protocol/streak';
import type { CadenceSample } from './cadence-estimator';

export interface AnimationDriverOptions {
  /** Speed changes at or below this are not worth a new SPEED directive */
  speedDeltaMs?: number;
  keepAliveMs?: number;
  /** Idle time before the device is told to start idle staging */
  idleStartDelayMs?: number;
  streak?: StreakDetector;
}

type DriverPhase = 'unknown' | 'typing' | 'stopped' | 'idleStarted';

export const SPEED_DELTA_MS = 25;
export const KEEP_ALIVE_MS = 1000;
export const IDLE_START_DELAY_MS = 1500;

export class AnimationDriver {
  private readonly speedDeltaMs: number;
  private readonly keepAliveMs: number;
  private readonly idleStartDelayMs: number;
  private readonly streak: StreakDetector;
  private phase: DriverPhase = 'unknown';
  private lastSpeed: number | null = null;
  private lastDirectiveAt = 0;
  private idleSince = 0;

  constructor(options: AnimationDriverOptions = {}) {
    this.speedDeltaMs = options.speedDeltaMs ?? SPEED_DELTA_MS;
    this.keepAliveMs = options.keepAliveMs ?? KEEP_ALIVE_MS;
    this.idleStartDelayMs = options.idleStartDelayMs ?? IDLE_START_DELAY_MS;
    this.streak = options.streak ?? new StreakDetector();
  }

  get isStreakActive(): boolean {
    return this.streak.isActive();
  }

  /**
   * Returns the directives to send for one sample, in send order.
   */
  handleSample(sample: CadenceSample): LinkCommand[] {
    const now = sample.timestamp;
    if (sample.active && sample.wpm > 0) {
      return this.handleTyping(now, sample.wpm);
    }
    if (sample.active) {
      // Typing has begun but there are not enough keystrokes for a WPM value yet.
      return this.keepAlive(now);
    }
    return this.handleIdle(now);
  }

  /**
   * Forgets what was sent, e.g. after a reconnect, so the next sample re-syncs the device.
   */
  reset(): void {
    this.phase = 'unknown';
    this.lastSpeed = null;
    this.lastDirectiveAt = 0;
    this.idleSince = 0;
    this.streak.reset();
  }

  private handleTyping(now: number, wpm: number): LinkCommand[] {
    const commands: LinkCommand[] = [];
    const speed = wpmToSpeed(wpm);
    const moved = this.lastSpeed === null || Math.abs(speed - this.lastSpeed) > this.speedDeltaMs;
    if (this.phase !== 'typing' || moved) {
      commands.push({ kind: 'speed', speedMs: speed });
      this.lastSpeed = speed;
      this.lastDirectiveAt = now;
    } else {
      commands.push(...this.keepAlive(now));
    }
    this.phase = 'typing';

    const edge = this.streak.update(now, wpm);
    if (edge !== null) {
      commands.push({ kind: 'streak', on: edge === 'on' });
      this.lastDirectiveAt = now;
    }
    return commands;
  }

  private keepAlive(now: number): LinkCommand[] {
    if (this.phase !== 'typing' || now - this.lastDirectiveAt < this.keepAliveMs) {
      return [];
    }
    this.lastDirectiveAt = now;
    return [{ kind: 'heartbeat' }];
  }

  private handleIdle(now: number): LinkCommand[] {
    if (this.phase === 'typing' || this.phase === 'unknown') {
      const commands: LinkCommand[] = [{ kind: 'stop' }];
      if (this.streak.reset() === 'off') {
        commands.push({ kind: 'streak', on: false });
      }
      this.phase = 'stopped';
      this.idleSince = now;
      this.lastSpeed = null;
      this.lastDirectiveAt = now;
      return commands;
    }
    if (this.phase === 'stopped' && now - this.idleSince >= this.idleStartDelayMs) {
      this.phase = 'idleStarted';
      this.lastDirectiveAt = now;
      return [{ kind: 'idleStart' }];
    }
    return [];
  }
}
