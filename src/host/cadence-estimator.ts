/**
 * @file Cadence Estimator
 * @description Converts raw key-down timestamps into a smoothed words-per-minute signal
 * and an explicit active/idle flag. Both are outputs of {@link CadenceEstimator.tick} so
 * consumers never infer activity from a WPM of zero.
 * @module host/cadence-estimator
 */

import { isTypingKey } from './key-filter';

export interface KeystrokeEvent {
  /** Monotonic timestamp in ms */
  timestamp: number;
  key: string;
}

export interface TypingSession {
  startTime: number | null;
  totalKeystrokes: number;
  lastKeystrokeTime: number | null;
  currentWpm: number;
  active: boolean;
}

export interface CadenceSample {
  timestamp: number;
  wpm: number;
  active: boolean;
  totalKeystrokes: number;
  /** `idle` marks the immediate notification sent when typing stops */
  reason: 'tick' | 'idle';
}

export interface SessionStats {
  sessionDurationMs: number;
  totalKeystrokes: number;
  keystrokesInLastMinute: number;
  currentWpm: number;
  peakWpm: number;
  averageWpm: number;
  /** Keystrokes per 10 s bucket over the last minute, oldest first */
  rhythm: number[];
  active: boolean;
}

export interface CadenceEstimatorOptions {
  retentionMs?: number;
  windowSize?: number;
  minSpanMs?: number;
  charsPerWord?: number;
  /** Weight of the previous smoothed value */
  smoothingWeight?: number;
  maxWpm?: number;
  idleTimeoutMs?: number;
}

export type CadenceListener = (sample: CadenceSample) => void;

export const KEYSTROKE_RETENTION_MS = 60_000;
export const WPM_WINDOW_SIZE = 8;
export const MIN_WPM_SPAN_MS = 400;
export const CHARS_PER_WORD = 5;
export const WPM_SMOOTHING_WEIGHT = 0.6;
export const MAX_REPORTED_WPM = 200;
export const IDLE_TIMEOUT_MS = 1000;

const RHYTHM_BUCKET_MS = 10_000;
const RHYTHM_BUCKETS = 6;

function createSession(): TypingSession {
  return {
    startTime: null,
    totalKeystrokes: 0,
    lastKeystrokeTime: null,
    currentWpm: 0,
    active: false,
  };
}

export class CadenceEstimator {
  private readonly options: Required<CadenceEstimatorOptions>;
  private events: KeystrokeEvent[] = [];
  private session: TypingSession = createSession();
  private previousWpm = 0;
  private peakWpm = 0;
  private readonly listeners = new Set<CadenceListener>();

  constructor(options: CadenceEstimatorOptions = {}) {
    this.options = {
      retentionMs: options.retentionMs ?? KEYSTROKE_RETENTION_MS,
      windowSize: Math.max(2, options.windowSize ?? WPM_WINDOW_SIZE),
      minSpanMs: options.minSpanMs ?? MIN_WPM_SPAN_MS,
      charsPerWord: options.charsPerWord ?? CHARS_PER_WORD,
      smoothingWeight: options.smoothingWeight ?? WPM_SMOOTHING_WEIGHT,
      maxWpm: options.maxWpm ?? MAX_REPORTED_WPM,
      idleTimeoutMs: options.idleTimeoutMs ?? IDLE_TIMEOUT_MS,
    };
  }

  /**
   * Subscribes to samples. Returns a function that removes the listener.
   */
  onSample(listener: CadenceListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getSession(): Readonly<TypingSession> {
    return { ...this.session };
  }

  isActive(): boolean {
    return this.session.active;
  }

  /**
   * Records a key-down. Non-typing keys are ignored.
   * @returns whether the key was counted
   */
  recordKeystroke(timestamp: number, key: string): boolean {
    if (!isTypingKey(key)) {
      return false;
    }
    this.events.push({ timestamp, key });
    this.session.totalKeystrokes += 1;
    this.session.lastKeystrokeTime = timestamp;
    this.session.active = true;
    if (this.session.startTime === null) {
      this.session.startTime = timestamp;
    }
    this.purge(timestamp);
    return true;
  }

  /**
   * Computes the smoothed WPM from the most recent keystrokes and caches it for the
   * next call. Returns 0 for fewer than two recent keystrokes or a span under the
   * minimum; those cases leave the smoothing cache untouched.
   */
  computeWPM(now: number): number {
    this.purge(now);
    if (this.events.length < 2) {
      return 0;
    }
    const recent = this.events.slice(-this.options.windowSize);
    const oldest = recent[0];
    const newest = recent[recent.length - 1];
    if (oldest === undefined || newest === undefined) {
      return 0;
    }
    const spanMs = newest.timestamp - oldest.timestamp;
    if (spanMs < this.options.minSpanMs) {
      return 0;
    }

    const minutes = spanMs / 60_000;
    const raw = recent.length / this.options.charsPerWord / minutes;
    const weight = this.options.smoothingWeight;
    const smoothed =
      this.previousWpm > 0 ? weight * this.previousWpm + (1 - weight) * raw : raw;
    const clamped = Math.max(0, Math.min(this.options.maxWpm, smoothed));
    const rounded = Math.round(clamped * 10) / 10;

    this.previousWpm = rounded;
    this.peakWpm = Math.max(this.peakWpm, rounded);
    return rounded;
  }

  /**
   * Forces the idle transition once the last keystroke is older than the idle timeout.
   * The idle sample is emitted right away instead of waiting for the next tick.
   * @returns the idle sample, or undefined when nothing changed
   */
  checkIdle(now: number): CadenceSample | undefined {
    const last = this.session.lastKeystrokeTime;
    if (!this.session.active || last === null) {
      return undefined;
    }
    if (now - last <= this.options.idleTimeoutMs) {
      return undefined;
    }
    this.session.active = false;
    this.session.currentWpm = 0;
    this.previousWpm = 0;
    const sample = this.makeSample(now, 'idle');
    this.emit(sample);
    return sample;
  }

  /**
   * One sampling step: idle check, then WPM when active.
   */
  tick(now: number): CadenceSample {
    const idle = this.checkIdle(now);
    if (idle !== undefined) {
      return idle;
    }
    this.session.currentWpm = this.session.active ? this.computeWPM(now) : 0;
    const sample = this.makeSample(now, 'tick');
    this.emit(sample);
    return sample;
  }

  getSessionStats(now: number): SessionStats {
    this.purge(now);
    const start = this.session.startTime;
    const sessionDurationMs = start === null ? 0 : Math.max(0, now - start);
    const minutes = sessionDurationMs / 60_000;
    const averageWpm =
      minutes > 0 ? this.session.totalKeystrokes / this.options.charsPerWord / minutes : 0;

    const rhythm: number[] = [];
    for (let i = RHYTHM_BUCKETS - 1; i >= 0; i -= 1) {
      const end = now - i * RHYTHM_BUCKET_MS;
      const begin = end - RHYTHM_BUCKET_MS;
      rhythm.push(
        this.events.filter((event) => event.timestamp > begin && event.timestamp <= end).length
      );
    }

    return {
      sessionDurationMs,
      totalKeystrokes: this.session.totalKeystrokes,
      keystrokesInLastMinute: this.events.filter((event) => now - event.timestamp <= 60_000)
        .length,
      currentWpm: this.session.currentWpm,
      peakWpm: this.peakWpm,
      averageWpm: Math.round(averageWpm * 10) / 10,
      rhythm,
      active: this.session.active,
    };
  }

  /**
   * Clears keystrokes, smoothing and session counters.
   */
  reset(): void {
    this.events = [];
    this.session = createSession();
    this.previousWpm = 0;
    this.peakWpm = 0;
  }

  private purge(now: number): void {
    const cutoff = now - this.options.retentionMs;
    if (this.events.length > 0 && (this.events[0]?.timestamp ?? cutoff) < cutoff) {
      this.events = this.events.filter((event) => event.timestamp >= cutoff);
    }
  }

  private makeSample(now: number, reason: CadenceSample['reason']): CadenceSample {
    return {
      timestamp: now,
      wpm: this.session.currentWpm,
      active: this.session.active,
      totalKeystrokes: this.session.totalKeystrokes,
      reason,
    };
  }

  private emit(sample: CadenceSample): void {
    for (const listener of this.listeners) {
      listener(sample);
    }
  }
}
