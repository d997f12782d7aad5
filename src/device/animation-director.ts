/**
 * @file Animation Director
 * @description Timed state machine that owns the character's animation state. Host
 * directives switch between idle and typing states; while the host is not in control
 * the idle stages advance on their own. `update` is called from the device pass and
 * advances paw frames, sleepy effects, blinks and ear twitches.
 * @module device/animation-director
 */

import { speedToIntensity } from '../protocol/speed';
import { computeIdleStages, type IdleStageDurations } from './idle-timing';
import {
  PAW_FRAME_COUNT,
  SLEEPY_FRAME_COUNT,
  isSleepState,
  isTypingState,
  selectSprites,
  spriteSetsEqual,
  type AnimationState,
  type SpriteLayerSet,
} from './sprites';

export interface AnimationDirectorOptions {
  sleepTimeoutMinutes?: number;
  sensitivity?: number;
  /** Host silence after which auto-progression takes over again */
  failSafeMs?: number;
  /** Uniform [0, 1); drives blink and ear-twitch intervals */
  random?: () => number;
}

export interface DirectorSnapshot {
  state: AnimationState;
  streak: boolean;
  autoProgression: boolean;
  pawFrame: number;
  effectFrame: number;
  blinking: boolean;
  earTwitching: boolean;
  sprites: SpriteLayerSet;
}

export type IdleStage = 1 | 2 | 3 | 4;

export const HOST_FAIL_SAFE_MS = 5000;
export const MIN_PAW_INTERVAL_MS = 20;
export const SLEEPY_FRAME_MS = 1000;
export const BLINK_DURATION_MS = 200;
export const BLINK_MIN_INTERVAL_MS = 3000;
export const BLINK_MAX_INTERVAL_MS = 8000;
export const EAR_TWITCH_DURATION_MS = 500;
export const EAR_TWITCH_MIN_INTERVAL_MS = 10_000;
export const EAR_TWITCH_MAX_INTERVAL_MS = 30_000;

const IDLE_BY_STAGE: Record<IdleStage, AnimationState> = {
  1: 'IDLE_1',
  2: 'IDLE_2',
  3: 'IDLE_3',
  4: 'IDLE_4',
};

const TYPING_BY_INTENSITY = {
  slow: 'TYPING_SLOW',
  normal: 'TYPING_NORMAL',
  fast: 'TYPING_FAST',
} as const;

interface Pulse {
  active: boolean;
  until: number;
  nextAt: number;
}

export class AnimationDirector {
  private readonly failSafeMs: number;
  private readonly random: () => number;
  private stages: IdleStageDurations;
  private sensitivity: number;

  private state: AnimationState = 'IDLE_1';
  private streak = false;
  private autoProgression = true;
  private stateEnteredAt: number;
  private lastDirectiveAt: number;

  private speedMs = 0;
  private pawFrame = 0;
  private lastPawStepAt: number;
  private effectFrame = 0;
  private lastEffectStepAt: number;

  private readonly blink: Pulse;
  private readonly earTwitch: Pulse;
  private sprites: SpriteLayerSet;

  constructor(options: AnimationDirectorOptions = {}, now = 0) {
    this.failSafeMs = options.failSafeMs ?? HOST_FAIL_SAFE_MS;
    this.random = options.random ?? Math.random;
    this.stages = computeIdleStages(options.sleepTimeoutMinutes ?? 1);
    this.sensitivity = options.sensitivity ?? 1;
    this.stateEnteredAt = now;
    this.lastDirectiveAt = now;
    this.lastPawStepAt = now;
    this.lastEffectStepAt = now;
    this.blink = {
      active: false,
      until: 0,
      nextAt: now + this.randomInterval(BLINK_MIN_INTERVAL_MS, BLINK_MAX_INTERVAL_MS),
    };
    this.earTwitch = {
      active: false,
      until: 0,
      nextAt: now + this.randomInterval(EAR_TWITCH_MIN_INTERVAL_MS, EAR_TWITCH_MAX_INTERVAL_MS),
    };
    this.sprites = this.computeSprites();
  }

  getState(): AnimationState {
    return this.state;
  }

  isStreak(): boolean {
    return this.streak;
  }

  getSprites(): SpriteLayerSet {
    return { ...this.sprites };
  }

  getIdleStages(): IdleStageDurations {
    return { ...this.stages };
  }

  snapshot(): DirectorSnapshot {
    return {
      state: this.state,
      streak: this.streak,
      autoProgression: this.autoProgression,
      pawFrame: this.pawFrame,
      effectFrame: this.effectFrame,
      blinking: this.blink.active,
      earTwitching: this.earTwitch.active,
      sprites: this.getSprites(),
    };
  }

  /**
   * `SPEED:n`. Always restarts the paw cycle, even when the intensity is unchanged.
   * A speed of 0 is a stop.
   */
  typing(now: number, speedMs: number): void {
    const intensity = speedToIntensity(speedMs);
    if (intensity === 'idle') {
      this.stop(now);
      return;
    }
    this.lastDirectiveAt = now;
    this.autoProgression = false;
    this.speedMs = speedMs;
    this.enter(TYPING_BY_INTENSITY[intensity], now);
  }

  /** `STOP` / `IDLE`: rest pose, held until `IDLE_START` or the fail-safe. */
  stop(now: number): void {
    this.lastDirectiveAt = now;
    this.autoProgression = false;
    this.enter('IDLE_1', now);
  }

  /** `IDLE_START`: rest pose with auto-progression through the idle stages. */
  idleStart(now: number): void {
    this.lastDirectiveAt = now;
    this.autoProgression = true;
    this.enter('IDLE_1', now);
  }

  heartbeat(now: number): void {
    this.lastDirectiveAt = now;
  }

  setStreak(now: number, on: boolean): void {
    this.lastDirectiveAt = now;
    this.streak = on;
    this.sprites = this.computeSprites();
  }

  /** `ANIM:IDLE_n`: jump to a stage and keep progressing from there. */
  forceIdleStage(now: number, stage: IdleStage): void {
    this.lastDirectiveAt = now;
    this.autoProgression = true;
    this.enter(IDLE_BY_STAGE[stage], now);
  }

  /** Blinks are not shown while the character sleeps. */
  triggerBlink(now: number): void {
    if (isSleepState(this.state)) {
      return;
    }
    this.blink.active = true;
    this.blink.until = now + BLINK_DURATION_MS;
    this.sprites = this.computeSprites();
  }

  triggerEarTwitch(now: number): void {
    this.earTwitch.active = true;
    this.earTwitch.until = now + EAR_TWITCH_DURATION_MS;
    this.sprites = this.computeSprites();
  }

  setSleepTimeout(minutes: number): void {
    this.stages = computeIdleStages(minutes);
  }

  setSensitivity(value: number): void {
    this.sensitivity = value > 0 ? value : 1;
  }

  /** Paw step duration for the current speed and sensitivity. */
  pawIntervalMs(): number {
    return Math.max(MIN_PAW_INTERVAL_MS, this.speedMs / this.sensitivity);
  }

  /**
   * Advances all timers to `now`.
   * @returns whether the selected sprites changed during this update
   */
  update(now: number): boolean {
    const before = this.sprites;
    this.applyFailSafe(now);
    this.progressIdle(now);

    if (isTypingState(this.state) && now - this.lastPawStepAt >= this.pawIntervalMs()) {
      this.pawFrame = (this.pawFrame + 1) % PAW_FRAME_COUNT;
      this.lastPawStepAt = now;
    }
    if (this.state === 'IDLE_4' && now - this.lastEffectStepAt >= SLEEPY_FRAME_MS) {
      this.effectFrame = (this.effectFrame + 1) % SLEEPY_FRAME_COUNT;
      this.lastEffectStepAt = now;
    }

    this.updatePulse(
      this.blink,
      now,
      BLINK_DURATION_MS,
      BLINK_MIN_INTERVAL_MS,
      BLINK_MAX_INTERVAL_MS,
      () => !isSleepState(this.state)
    );
    this.updatePulse(
      this.earTwitch,
      now,
      EAR_TWITCH_DURATION_MS,
      EAR_TWITCH_MIN_INTERVAL_MS,
      EAR_TWITCH_MAX_INTERVAL_MS,
      () => true
    );

    this.sprites = this.computeSprites();
    return !spriteSetsEqual(before, this.sprites);
  }

  private applyFailSafe(now: number): void {
    if (this.autoProgression || now - this.lastDirectiveAt <= this.failSafeMs) {
      return;
    }
    this.autoProgression = true;
    this.streak = false;
    if (isTypingState(this.state)) {
      this.enter('IDLE_1', now);
    } else {
      this.stateEnteredAt = now;
    }
  }

  private progressIdle(now: number): void {
    if (!this.autoProgression) {
      return;
    }
    for (;;) {
      const duration = this.stageDuration(this.state);
      if (duration === undefined || now - this.stateEnteredAt < duration) {
        return;
      }
      const enteredAt = this.stateEnteredAt + duration;
      this.enter(this.nextIdleState(this.state), enteredAt);
    }
  }

  private stageDuration(state: AnimationState): number | undefined {
    switch (state) {
      case 'IDLE_1':
        return this.stages.stage1Ms;
      case 'IDLE_2':
        return this.stages.stage2Ms;
      case 'IDLE_3':
        return this.stages.stage3Ms;
      default:
        return undefined;
    }
  }

  private nextIdleState(state: AnimationState): AnimationState {
    if (state === 'IDLE_1') {
      return 'IDLE_2';
    }
    if (state === 'IDLE_2') {
      return 'IDLE_3';
    }
    return 'IDLE_4';
  }

  private updatePulse(
    pulse: Pulse,
    now: number,
    durationMs: number,
    minIntervalMs: number,
    maxIntervalMs: number,
    allowed: () => boolean
  ): void {
    if (pulse.active) {
      if (now < pulse.until) {
        return;
      }
      pulse.active = false;
      pulse.nextAt = now + this.randomInterval(minIntervalMs, maxIntervalMs);
      return;
    }
    if (now < pulse.nextAt) {
      return;
    }
    if (allowed()) {
      pulse.active = true;
      pulse.until = now + durationMs;
    } else {
      pulse.nextAt = now + this.randomInterval(minIntervalMs, maxIntervalMs);
    }
  }

  private enter(state: AnimationState, now: number): void {
    this.state = state;
    this.stateEnteredAt = now;
    this.pawFrame = 0;
    this.lastPawStepAt = now;
    this.effectFrame = 0;
    this.lastEffectStepAt = now;
    if (isSleepState(state)) {
      this.blink.active = false;
    }
    this.sprites = this.computeSprites();
  }

  private randomInterval(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  private computeSprites(): SpriteLayerSet {
    return selectSprites({
      state: this.state,
      streak: this.streak,
      pawFrame: this.pawFrame,
      effectFrame: this.effectFrame,
      blinking: this.blink.active,
      earTwitching: this.earTwitch.active,
    });
  }
}
