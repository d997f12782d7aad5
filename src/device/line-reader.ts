/**
 * @fileoverview Bounded serial line reader. Bytes are buffered as they arrive and consumed
 * at most {@link MAX_BYTES_PER_PASS} per pass so one flood of input cannot starve the
 * animation tasks.
 */

export const MAX_LINE_LENGTH = 64;
export const MAX_BYTES_PER_PASS = 64;

const LF = 0x0a;
const CR = 0x0d;

export interface LineReaderStats {
  linesRead: number;
  overlongDropped: number;
  nonPrintableDropped: number;
}

function isPrintable(byte: number): boolean {
  return byte >= 0x20 && byte <= 0x7e;
}

export class LineReader {
  private pending: number[] = [];
  private line: number[] = [];
  private overflow = false;
  private readonly stats: LineReaderStats = {
    linesRead: 0,
    overlongDropped: 0,
    nonPrintableDropped: 0,
  };

  constructor(
    private readonly maxLineLength = MAX_LINE_LENGTH,
    private readonly maxBytesPerPass = MAX_BYTES_PER_PASS
  ) {}

  get buffered(): number {
    return this.pending.length;
  }

  getStats(): LineReaderStats {
    return { ...this.stats };
  }

  /** Queues received bytes; nothing is parsed until {@link readLines}. */
  push(bytes: Uint8Array | readonly number[]): void {
    for (const byte of bytes) {
      this.pending.push(byte & 0xff);
    }
  }

  /**
   * Consumes up to the per-pass budget and returns the complete lines found, without
   * terminators. A line longer than the limit is dropped whole, as is a line with any
   * byte outside printable ASCII. A partial line carries over to the next pass.
   */
  readLines(): string[] {
    const budget = Math.min(this.maxBytesPerPass, this.pending.length);
    const chunk = this.pending.splice(0, budget);
    const lines: string[] = [];

    for (const byte of chunk) {
      if (byte === LF) {
        const line = this.finishLine();
        if (line !== undefined) {
          lines.push(line);
        }
        continue;
      }
      if (this.overflow) {
        continue;
      }
      if (this.line.length >= this.maxLineLength) {
        this.overflow = true;
        this.line = [];
        continue;
      }
      this.line.push(byte);
    }
    return lines;
  }

  reset(): void {
    this.pending = [];
    this.line = [];
    this.overflow = false;
  }

  private finishLine(): string | undefined {
    const bytes = this.line;
    const overflow = this.overflow;
    this.line = [];
    this.overflow = false;

    if (overflow) {
      this.stats.overlongDropped += 1;
      return undefined;
    }
    if (bytes.length > 0 && bytes[bytes.length - 1] === CR) {
      bytes.pop();
    }
    if (bytes.length === 0) {
      return undefined;
    }
    if (!bytes.every(isPrintable)) {
      this.stats.nonPrintableDropped += 1;
      return undefined;
    }
    this.stats.linesRead += 1;
    return String.fromCharCode(...bytes);
  }
}
