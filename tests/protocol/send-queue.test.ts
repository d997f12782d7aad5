/**
 * @file Send queue tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { TransportError } from '../../src/errors';
import { SendQueue } from '../../src/protocol/send-queue';

describe('SendQueue', () => {
  let start = 0;

  beforeEach(() => {
    vi.useFakeTimers();
    start = Date.now();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('writes in order with at least the minimum gap', async () => {
    const writes: Array<{ data: string; at: number }> = [];
    const queue = new SendQueue(
      async (data) => {
        writes.push({ data, at: Date.now() - start });
      },
      { minIntervalMs: 50 }
    );

    const sent = Promise.all([queue.enqueue('A'), queue.enqueue('B'), queue.enqueue('C')]);
    await vi.advanceTimersByTimeAsync(200);
    await sent;

    expect(writes).toEqual([
      { data: 'A\n', at: 0 },
      { data: 'B\n', at: 50 },
      { data: 'C\n', at: 100 },
    ]);
    expect(queue.length).toBe(0);
    expect(queue.isDraining).toBe(false);
  });

  it('does not delay a send when the line has been quiet', async () => {
    const writes: number[] = [];
    const queue = new SendQueue(
      async () => {
        writes.push(Date.now() - start);
      },
      { minIntervalMs: 50 }
    );

    await queue.enqueue('A');
    await vi.advanceTimersByTimeAsync(500);
    const second = queue.enqueue('B');
    await vi.advanceTimersByTimeAsync(0);
    await second;

    expect(writes).toEqual([0, 500]);
  });

  it('rejects a failed write with a TransportError and keeps draining', async () => {
    const written: string[] = [];
    const queue = new SendQueue(
      async (data) => {
        if (data === 'BAD\n') {
          throw new Error('EIO');
        }
        written.push(data);
      },
      { minIntervalMs: 10 }
    );

    const bad = queue.enqueue('BAD');
    const good = queue.enqueue('GOOD');
    const badResult = expect(bad).rejects.toThrow('Failed to write "BAD": EIO');
    await vi.advanceTimersByTimeAsync(50);

    await badResult;
    await expect(bad).rejects.toBeInstanceOf(TransportError);
    await good;
    expect(written).toEqual(['GOOD\n']);
  });

  it('clear rejects queued sends and the one waiting for its slot', async () => {
    const written: string[] = [];
    const queue = new SendQueue(
      async (data) => {
        written.push(data);
      },
      { minIntervalMs: 50 }
    );

    const first = queue.enqueue('A');
    const waiting = queue.enqueue('B');
    const queued = queue.enqueue('C');
    await first;

    const reason = new TransportError('Port closed', '/dev/ttyTEST0');
    const waitingResult = expect(waiting).rejects.toBe(reason);
    const queuedResult = expect(queued).rejects.toBe(reason);
    queue.clear(reason);
    await vi.advanceTimersByTimeAsync(100);

    await waitingResult;
    await queuedResult;
    expect(written).toEqual(['A\n']);
  });
});
