/**
 * @fileoverview Key source reading raw keystrokes from the controlling terminal.
 */

import { CapabilityError } from '../errors';
import type { KeyEvent, KeyEventSource } from './typing-monitor';

const CTRL_C = '\u0003';

const CONTROL_NAMES: Record<string, string> = {
  '\r': 'ENTER',
  '\n': 'ENTER',
  '\t': 'TAB',
  '\u007f': 'BACKSPACE',
  '\u001b': 'ESCAPE',
  ' ': 'SPACE',
};

export interface StdinKeySourceOptions {
  stream?: NodeJS.ReadStream;
  now?: () => number;
  /** Called on Ctrl+C, which raw mode no longer turns into SIGINT */
  onInterrupt?: () => void;
}

/**
 * Maps one decoded terminal chunk to key names. Escape sequences (arrows and the like)
 * collapse to `ESCAPE` so they are filtered as navigation keys.
 */
export function keysFromChunk(chunk: string): string[] {
  if (chunk.startsWith('\u001b')) {
    return ['ESCAPE'];
  }
  return Array.from(chunk).map((ch) => CONTROL_NAMES[ch] ?? ch);
}

export class StdinKeySource implements KeyEventSource {
  private readonly stream: NodeJS.ReadStream;
  private readonly now: () => number;
  private readonly onInterrupt: (() => void) | undefined;
  private listener: ((chunk: Buffer | string) => void) | undefined;

  constructor(options: StdinKeySourceOptions = {}) {
    this.stream = options.stream ?? process.stdin;
    this.now = options.now ?? Date.now;
    this.onInterrupt = options.onInterrupt;
  }

  start(onKey: (event: KeyEvent) => void): void {
    if (!this.stream.isTTY) {
      throw new CapabilityError('Standard input is not a terminal; key events are unavailable');
    }
    this.stream.setRawMode(true);
    this.stream.setEncoding('utf8');
    this.listener = (chunk) => {
      const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
      if (text === CTRL_C) {
        this.onInterrupt?.();
        return;
      }
      const timestamp = this.now();
      for (const key of keysFromChunk(text)) {
        onKey({ timestamp, key });
      }
    };
    this.stream.on('data', this.listener);
    this.stream.resume();
  }

  stop(): void {
    if (this.listener !== undefined) {
      this.stream.off('data', this.listener);
      this.listener = undefined;
    }
    if (this.stream.isTTY) {
      this.stream.setRawMode(false);
    }
    this.stream.pause();
  }
}
