/**
 * @file Event hub tests
 */

import { describe, it, expect } from 'vitest';
import { EventHub } from '../src/event-hub';

interface Events {
  line: string;
  count: number;
}

describe('EventHub', () => {
  it('should deliver payloads to listeners of the same event only', () => {
    const hub = new EventHub<Events>();
    const lines: string[] = [];
    const counts: number[] = [];
    hub.on('line', (line) => lines.push(line));
    hub.on('count', (count) => counts.push(count));

    hub.emit('line', 'PONG');
    hub.emit('count', 3);

    expect(lines).toEqual(['PONG']);
    expect(counts).toEqual([3]);
  });

  it('should stop delivering after unsubscribe', () => {
    const hub = new EventHub<Events>();
    const lines: string[] = [];
    const off = hub.on('line', (line) => lines.push(line));
    hub.emit('line', 'a');
    off();
    hub.emit('line', 'b');
    expect(lines).toEqual(['a']);
  });

  it('should ignore events nobody listens to', () => {
    const hub = new EventHub<Events>();
    expect(() => hub.emit('count', 1)).not.toThrow();
  });
});
