/**
 * @fileoverview Typing monitor: binds a key-event source to the cadence estimator and
 * re-evaluates the estimator on a fixed ~12 Hz tick, independent of keystrokes.
 */

import { CapabilityError, getErrorMessage, isCapabilityError, wrapError } from '../errors';
import { silentLogger, type Logger } from '../logging';
import type { CadenceEstimator, CadenceListener } from './cadence-estimator';

export interface KeyEvent {
  timestamp: number;
  key: string;
}

/**
 * Source of physical key-down events. `start` throws a {@link CapabilityError} when the
 * host cannot observe global key events.
 */
export interface KeyEventSource {
  start(onKey: (event: KeyEvent) => void): void | Promise<void>;
  stop(): void | Promise<void>;
}

export interface FallbackNotice {
  mode: 'fallback';
  message: string;
  solutions: string[];
}

export type FallbackListener = (notice: FallbackNotice) => void;

export interface TypingMonitorOptions {
  estimator: CadenceEstimator;
  source?: KeyEventSource;
  /** Estimator tick interval; 80 ms gives roughly 12 samples per second */
  tickMs?: number;
  now?: () => number;
  logger?: Logger;
}

export const ESTIMATOR_TICK_MS = 80;

export const MANUAL_KEY = 'MANUAL INPUT';

export class TypingMonitor {
  private readonly estimator: CadenceEstimator;
  private readonly source: KeyEventSource | undefined;
  private readonly tickMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | undefined;
  private monitoring = false;
  private fallback = false;
  private sourceStarted = false;
  private readonly fallbackListeners = new Set<FallbackListener>();

  constructor(options: TypingMonitorOptions) {
    this.estimator = options.estimator;
    this.source = options.source;
    this.tickMs = Math.max(10, options.tickMs ?? ESTIMATOR_TICK_MS);
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  get isMonitoring(): boolean {
    return this.monitoring;
  }

  get isFallbackMode(): boolean {
    return this.fallback;
  }

  onSample(listener: CadenceListener): () => void {
    return this.estimator.onSample(listener);
  }

  onFallback(listener: FallbackListener): () => void {
    this.fallbackListeners.add(listener);
    return () => {
      this.fallbackListeners.delete(listener);
    };
  }

  /**
   * Resets the typing session, starts the key source and the sampling tick. A source that
   * cannot observe keys puts the monitor into fallback mode instead of failing.
   */
  async start(): Promise<void> {
    if (this.monitoring) {
      return;
    }
    this.estimator.reset();
    this.fallback = false;

    if (this.source === undefined) {
      this.enterFallback(new CapabilityError('No key event source configured'));
    } else {
      try {
        await this.source.start((event) => this.handleKey(event));
        this.sourceStarted = true;
      } catch (err) {
        if (!isCapabilityError(err)) {
          throw wrapError(err, 'Key event source failed to start');
        }
        this.enterFallback(err);
      }
    }

    this.timer = setInterval(() => {
      this.estimator.tick(this.now());
    }, this.tickMs);
    this.monitoring = true;
    this.logger.info(
      this.fallback ? 'Typing monitor started in fallback mode' : 'Typing monitor started'
    );
  }

  async stop(): Promise<void> {
    if (!this.monitoring) {
      return;
    }
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.monitoring = false;
    if (this.sourceStarted && this.source !== undefined) {
      this.sourceStarted = false;
      await this.source.stop();
    }
    this.logger.info('Typing monitor stopped');
  }

  /**
   * Alternative input path for fallback mode (a test button, a built-in typing area).
   */
  recordManualKeystroke(key: string = MANUAL_KEY): boolean {
    return this.estimator.recordKeystroke(this.now(), key);
  }

  private handleKey(event: KeyEvent): void {
    this.estimator.recordKeystroke(event.timestamp, event.key);
  }

  private enterFallback(error: CapabilityError): void {
    if (this.fallback) {
      return;
    }
    this.fallback = true;
    this.logger.warn(`Global key monitoring unavailable: ${getErrorMessage(error)}`);
    const notice: FallbackNotice = {
      mode: 'fallback',
      message: 'Global keyboard monitoring is unavailable; manual input is enabled.',
      solutions: [
        'Run the host with permission to observe keyboard input',
        'Feed keystrokes through the manual input path',
      ],
    };
    for (const listener of this.fallbackListeners) {
      listener(notice);
    }
  }
}
