/**
 * @file WPM to animation-speed mapping and typing-intensity thresholds.
 */

export const MAX_WPM = 200;
/** Fastest paw cycle step in ms. */
export const MIN_SPEED_MS = 30;
/** Slowest paw cycle step in ms; also the speed reported for a WPM of 0. */
export const MAX_SPEED_MS = 500;

export const SLOW_SPEED_LIMIT = 80;
export const NORMAL_SPEED_LIMIT = 150;

export type TypingIntensity = 'idle' | 'slow' | 'normal' | 'fast';

/**
 * Maps a WPM value to an animation step duration. Higher WPM gives a shorter step.
 * A WPM of 0 (or less) maps to {@link MAX_SPEED_MS}; hosts send `STOP` instead when not
 * typing.
 */
export function wpmToSpeed(wpm: number): number {
  if (!Number.isFinite(wpm) || wpm <= 0) {
    return MAX_SPEED_MS;
  }
  const clamped = Math.min(wpm, MAX_WPM);
  const speed = MAX_SPEED_MS - (clamped / MAX_WPM) * (MAX_SPEED_MS - MIN_SPEED_MS);
  return Math.max(MIN_SPEED_MS, Math.min(MAX_SPEED_MS, Math.round(speed)));
}

/**
 * Selects the typing intensity from a speed value (not from WPM).
 */
export function speedToIntensity(speedMs: number): TypingIntensity {
  if (speedMs <= 0) {
    return 'idle';
  }
  if (speedMs < SLOW_SPEED_LIMIT) {
    return 'slow';
  }
  if (speedMs < NORMAL_SPEED_LIMIT) {
    return 'normal';
  }
  return 'fast';
}
