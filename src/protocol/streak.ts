/**
 * @file Streak detection over a rolling window of WPM samples.
 */

export const STREAK_WPM_THRESHOLD = 65;
export const STREAK_WINDOW_MS = 1000;

export type StreakEdge = 'on' | 'off' | null;

/**
 * Turns on once WPM has stayed at or above the threshold for a full window; turns off on
 * the first sample below it. `update` returns only edges so callers never repeat
 * `STREAK_ON` / `STREAK_OFF`.
 */
export class StreakDetector {
  private aboveSince: number | null = null;
  private active = false;

  constructor(
    private readonly threshold = STREAK_WPM_THRESHOLD,
    private readonly windowMs = STREAK_WINDOW_MS
  ) {}

  isActive(): boolean {
    return this.active;
  }

  update(now: number, wpm: number): StreakEdge {
    if (wpm < this.threshold) {
      this.aboveSince = null;
      if (this.active) {
        this.active = false;
        return 'off';
      }
      return null;
    }

    if (this.aboveSince === null) {
      this.aboveSince = now;
    }
    if (!this.active && now - this.aboveSince >= this.windowMs) {
      this.active = true;
      return 'on';
    }
    return null;
  }

  /**
   * Forgets the current run. Returns `'off'` when a streak was active.
   */
  reset(): StreakEdge {
    this.aboveSince = null;
    if (this.active) {
      this.active = false;
      return 'off';
    }
    return null;
  }
}
