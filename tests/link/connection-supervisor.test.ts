/**
 * @file Connection supervisor tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ConnectionError, TransportError } from '../../src/errors';
import {
  ConnectionSupervisor,
  type ConnectionState,
  type ConnectionSupervisorOptions,
} from '../../src/link/connection-supervisor';
import type { DeviceReply } from '../../src/protocol/commands';
import type { TransportOptions } from '../../src/link/transport';
import { FakeTransport } from './fake-transport';

const PORT = '/dev/ttyTEST0';

interface Harness {
  supervisor: ConnectionSupervisor;
  transports: FakeTransport[];
}

/**
 * `plan` decides, per opened transport, whether open fails; transports beyond the plan
 * open normally.
 */
function createHarness(
  plan: Array<Error | undefined> = [],
  overrides: Partial<ConnectionSupervisorOptions> = {}
): Harness {
  const transports: FakeTransport[] = [];
  const supervisor = new ConnectionSupervisor({
    transportFactory: (options: TransportOptions) => {
      const transport = new FakeTransport(options, plan[transports.length]);
      transports.push(transport);
      return transport;
    },
    settleMs: 0,
    pingTimeoutMs: 100,
    reconnectDelayMs: 1000,
    maxReconnectAttempts: 3,
    minCommandIntervalMs: 0,
    clock: () => new Date(2024, 0, 1, 9, 5),
    ...overrides,
  });
  return { supervisor, transports };
}

async function connectNow(supervisor: ConnectionSupervisor, target = PORT): Promise<void> {
  const connecting = supervisor.connect(target);
  await vi.advanceTimersByTimeAsync(200);
  await connecting;
}

describe('ConnectionSupervisor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('connect', () => {
    it('runs the handshake and the initial sync burst', async () => {
      const { supervisor, transports } = createHarness();
      const states: ConnectionState[] = [];
      const connected: Array<{ path: string; deviceResponded: boolean }> = [];
      supervisor.on('state', (state) => states.push(state));
      supervisor.on('connected', (event) => connected.push(event));

      await connectNow(supervisor);

      expect(transports).toHaveLength(1);
      expect(transports[0]?.baudRate).toBe(115200);
      expect(transports[0]?.written).toEqual([
        'PING\n',
        'TIME:09:05\n',
        'CPU:0\n',
        'RAM:0\n',
        'WPM:0\n',
      ]);
      expect(states).toEqual(['opening', 'handshaking', 'connected']);
      expect(connected).toEqual([{ path: PORT, deviceResponded: true }]);
      expect(supervisor.isConnected).toBe(true);
    });

    it('connects to a device that never answers PING', async () => {
      const { supervisor, transports } = createHarness();
      const connecting = supervisor.connect(PORT);
      const transport = transports[0];
      if (transport !== undefined) {
        transport.autoPong = false;
      }
      await vi.advanceTimersByTimeAsync(200);
      await connecting;

      expect(supervisor.getStatus()).toEqual({
        state: 'connected',
        path: PORT,
        queueLength: 0,
        reconnectAttempts: 0,
        deviceResponded: false,
      });
    });

    it('resolves the auto target through discovery', async () => {
      const { supervisor, transports } = createHarness([], {
        discover: async () => '/dev/ttyUSB9',
      });
      await connectNow(supervisor, 'auto');
      expect(transports[0]?.path).toBe('/dev/ttyUSB9');
    });

    it('fails when discovery finds nothing', async () => {
      const { supervisor, transports } = createHarness([], { discover: async () => undefined });
      await expect(supervisor.connect('auto')).rejects.toThrow(
        'No compatible serial device found (0 port(s) scanned)'
      );
      expect(transports).toHaveLength(0);
    });

    it('reports an open failure without scheduling a reconnect', async () => {
      const { supervisor, transports } = createHarness([new Error('busy')]);
      const scheduled: number[] = [];
      supervisor.on('reconnect-scheduled', ({ attempt }) => scheduled.push(attempt));

      const connecting = supervisor.connect(PORT);
      await expect(connecting).rejects.toThrow(`Failed to open ${PORT}: busy`);
      await expect(connecting).rejects.toBeInstanceOf(ConnectionError);
      await vi.advanceTimersByTimeAsync(10_000);

      expect(transports).toHaveLength(1);
      expect(scheduled).toEqual([]);
      expect(supervisor.getState()).toBe('disconnected');
    });

    it('fails the handshake when the link drops during it', async () => {
      const { supervisor, transports } = createHarness();
      const connecting = supervisor.connect(PORT);
      const result = expect(connecting).rejects.toThrow('Link lost during handshake');
      const transport = transports[0];
      if (transport !== undefined) {
        transport.autoPong = false;
      }
      await vi.advanceTimersByTimeAsync(10);
      transport?.unplug();
      await vi.advanceTimersByTimeAsync(200);

      await result;
      expect(supervisor.getState()).toBe('disconnected');
    });
  });

  describe('send', () => {
    it('rejects while disconnected', async () => {
      const { supervisor } = createHarness();
      const sending = supervisor.send({ kind: 'stop' });
      await expect(sending).rejects.toBeInstanceOf(TransportError);
      await expect(sending).rejects.toThrow('Link is not connected');
    });

    it('writes formatted commands once connected', async () => {
      const { supervisor, transports } = createHarness();
      await connectNow(supervisor);
      await supervisor.send({ kind: 'speed', speedMs: 120 });
      expect(transports[0]?.written.at(-1)).toBe('SPEED:120\n');
    });
  });

  describe('replies', () => {
    it('parses device lines into reply events', async () => {
      const { supervisor, transports } = createHarness();
      const replies: DeviceReply[] = [];
      supervisor.on('reply', (reply) => replies.push(reply));
      await connectNow(supervisor);

      transports[0]?.receive('STATE:TYPING_FAST:STREAK');
      transports[0]?.receive('ERR:SLEEP_TIMEOUT:out of range');

      expect(replies).toEqual([
        { kind: 'pong' },
        { kind: 'state', state: 'TYPING_FAST', streak: true },
        { kind: 'error', verb: 'SLEEP_TIMEOUT', reason: 'out of range' },
      ]);
    });
  });

  describe('reconnection', () => {
    it('reconnects after the link is lost', async () => {
      const { supervisor, transports } = createHarness();
      const disconnected: Array<{ path: string; error?: Error }> = [];
      const connected: string[] = [];
      supervisor.on('disconnected', (event) => disconnected.push(event));
      supervisor.on('connected', ({ path }) => connected.push(path));
      await connectNow(supervisor);

      transports[0]?.unplug();
      expect(supervisor.getState()).toBe('disconnected');
      expect(disconnected).toHaveLength(1);
      expect(disconnected[0]?.error?.message).toBe(`Port ${PORT} closed unexpectedly`);

      await vi.advanceTimersByTimeAsync(999);
      expect(transports).toHaveLength(1);
      await vi.advanceTimersByTimeAsync(500);

      expect(transports).toHaveLength(2);
      expect(connected).toEqual([PORT, PORT]);
      expect(supervisor.getStatus().reconnectAttempts).toBe(1);
    });

    it('gives up after the maximum number of attempts', async () => {
      const busy = new Error('busy');
      const { supervisor, transports } = createHarness([undefined, busy, busy, busy]);
      const scheduled: number[] = [];
      const gaveUp: Array<{ path: string; attempts: number }> = [];
      supervisor.on('reconnect-scheduled', ({ attempt }) => scheduled.push(attempt));
      supervisor.on('gave-up', (event) => gaveUp.push(event));
      await connectNow(supervisor);

      transports[0]?.unplug();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(scheduled).toEqual([1, 2, 3]);
      expect(gaveUp).toEqual([{ path: PORT, attempts: 3 }]);
      expect(transports).toHaveLength(4);
      expect(supervisor.getState()).toBe('disconnected');
    });

    it('never reconnects after an explicit disconnect', async () => {
      const { supervisor, transports } = createHarness();
      const disconnected: Array<{ path: string; error?: Error }> = [];
      supervisor.on('disconnected', (event) => disconnected.push(event));
      await connectNow(supervisor);

      await supervisor.disconnect();
      transports[0]?.unplug();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(disconnected).toEqual([{ path: PORT }]);
      expect(transports).toHaveLength(1);
      expect(transports[0]?.closeCount).toBe(1);
      expect(supervisor.getState()).toBe('disconnected');
    });

    it('does not reconnect when automatic attempts are disabled', async () => {
      const { supervisor, transports } = createHarness([], { maxReconnectAttempts: 0 });
      const gaveUp: number[] = [];
      supervisor.on('gave-up', ({ attempts }) => gaveUp.push(attempts));
      await connectNow(supervisor);

      transports[0]?.unplug();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(gaveUp).toEqual([0]);
      expect(transports).toHaveLength(1);
    });
  });
});
