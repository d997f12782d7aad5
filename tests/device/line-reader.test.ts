/**
 * @file Line reader tests
 */

import { describe, it, expect } from 'vitest';
import { LineReader } from '../../src/device/line-reader';

function bytes(text: string): number[] {
  return Array.from(text, (ch) => ch.charCodeAt(0));
}

describe('LineReader', () => {
  it('splits on LF and strips a trailing CR', () => {
    const reader = new LineReader();
    reader.push(bytes('PING\nSTOP\r\n'));
    expect(reader.readLines()).toEqual(['PING', 'STOP']);
    expect(reader.getStats().linesRead).toBe(2);
  });

  it('carries a partial line over to the next pass', () => {
    const reader = new LineReader();
    reader.push(bytes('SPE'));
    expect(reader.readLines()).toEqual([]);
    reader.push(bytes('ED:120\n'));
    expect(reader.readLines()).toEqual(['SPEED:120']);
  });

  it('consumes at most the per-pass budget', () => {
    const reader = new LineReader();
    reader.push(bytes('HEARTBEAT\n'.repeat(10)));

    expect(reader.readLines()).toHaveLength(6);
    expect(reader.buffered).toBe(36);
    expect(reader.readLines()).toHaveLength(4);
    expect(reader.buffered).toBe(0);
  });

  it('drops an overlong line whole', () => {
    const reader = new LineReader(64, 1024);
    reader.push(bytes(`${'A'.repeat(70)}\nPING\n`));
    expect(reader.readLines()).toEqual(['PING']);
    expect(reader.getStats().overlongDropped).toBe(1);
  });

  it('accepts a line of exactly the maximum length', () => {
    const reader = new LineReader(64, 1024);
    const line = 'B'.repeat(64);
    reader.push(bytes(`${line}\n`));
    expect(reader.readLines()).toEqual([line]);
  });

  it('drops lines with non-printable bytes and ignores empty lines', () => {
    const reader = new LineReader();
    reader.push([0x50, 0x01, 0x0a]);
    reader.push(bytes('\n\r\nSTOP\n'));
    expect(reader.readLines()).toEqual(['STOP']);
    expect(reader.getStats()).toEqual({ linesRead: 1, overlongDropped: 0, nonPrintableDropped: 1 });
  });

  it('reset discards buffered input', () => {
    const reader = new LineReader();
    reader.push(bytes('STO'));
    reader.readLines();
    reader.push(bytes('P'));
    reader.reset();
    reader.push(bytes('PING\n'));
    expect(reader.readLines()).toEqual(['PING']);
  });
});
