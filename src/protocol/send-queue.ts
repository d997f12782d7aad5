/**
 * @fileoverview FIFO outbound queue that spaces writes so the device is never flooded.
 * Callers enqueue a line and await its write; only the drain loop touches the writer.
 */

import { TransportError, getErrorMessage } from '../errors';

/** Writes one already-terminated line to the transport. */
export type LineWriter = (data: string) => Promise<void>;

export interface SendQueueOptions {
  /** Minimum gap between the end of one write and the start of the next. */
  minIntervalMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_MIN_COMMAND_INTERVAL_MS = 50;

interface PendingSend {
  line: string;
  resolve: () => void;
  reject: (error: Error) => void;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class SendQueue {
  private readonly writer: LineWriter;
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private pending: PendingSend[] = [];
  private draining = false;
  private lastWriteAt: number | null = null;
  private generation = 0;
  private clearReason: Error | undefined;

  constructor(writer: LineWriter, options: SendQueueOptions = {}) {
    this.writer = writer;
    this.minIntervalMs = Math.max(0, options.minIntervalMs ?? DEFAULT_MIN_COMMAND_INTERVAL_MS);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? delay;
  }

  get length(): number {
    return this.pending.length;
  }

  get isDraining(): boolean {
    return this.draining;
  }

  /**
   * Queues a line (without terminator). Resolves once the bytes were written, rejects
   * with a {@link TransportError} if the write fails or the queue is cleared first.
   */
  enqueue(line: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.pending.push({ line, resolve, reject });
      if (!this.draining) {
        void this.drain();
      }
    });
  }

  /**
   * Rejects every pending send, including one waiting out its spacing delay.
   */
  clear(reason: Error): void {
    this.generation += 1;
    this.clearReason = reason;
    const dropped = this.pending;
    this.pending = [];
    for (const item of dropped) {
      item.reject(reason);
    }
  }

  private async drain(): Promise<void> {
    this.draining = true;
    try {
      while (this.pending.length > 0) {
        const item = this.pending.shift();
        if (item === undefined) {
          break;
        }
        const generation = this.generation;
        const wait = this.spacingRemaining();
        if (wait > 0) {
          await this.sleep(wait);
        }
        if (generation !== this.generation) {
          item.reject(this.clearReason ?? TransportError.linkDown());
          continue;
        }
        try {
          await this.writer(`${item.line}\n`);
          this.lastWriteAt = this.now();
          item.resolve();
        } catch (err) {
          this.lastWriteAt = this.now();
          item.reject(
            err instanceof TransportError
              ? err
              : new TransportError(`Failed to write "${item.line}": ${getErrorMessage(err)}`, undefined, err)
          );
        }
      }
    } finally {
      this.draining = false;
    }
  }

  private spacingRemaining(): number {
    if (this.lastWriteAt === null) {
      return 0;
    }
    return this.minIntervalMs - (this.now() - this.lastWriteAt);
  }
}
