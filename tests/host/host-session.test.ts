/**
 * @file Host session tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { normalizeHostConfig } from '../../src/config/config-validation';
import { DEFAULT_DISPLAY_PREFERENCES } from '../../src/config/types';
import { isTypingState } from '../../src/device/sprites';
import { MemorySettingsStorage } from '../../src/device/settings-store';
import { VirtualDeviceTransport } from '../../src/device/virtual-transport';
import { createHostSession, displaySettingsCommands } from '../../src/host/host-session';
import type { TelemetrySampler } from '../../src/host/telemetry';
import type { KeyEvent, KeyEventSource } from '../../src/host/typing-monitor';
import { formatCommand } from '../../src/protocol/commands';

class ScriptedKeys implements KeyEventSource {
  private onKey: ((event: KeyEvent) => void) | undefined;

  start(onKey: (event: KeyEvent) => void): void {
    this.onKey = onKey;
  }

  stop(): void {
    this.onKey = undefined;
  }

  press(key = 'a'): void {
    this.onKey?.({ timestamp: Date.now(), key });
  }
}

const sampler: TelemetrySampler = { sample: () => ({ cpuPercent: 12, memPercent: 48 }) };

describe('displaySettingsCommands', () => {
  it('covers every display preference and ends with a save', () => {
    const commands = displaySettingsCommands({
      ...DEFAULT_DISPLAY_PREFERENCES,
      showRam: false,
      use24HourTime: false,
      sleepTimeoutMinutes: 5,
      sensitivity: 1.5,
    });
    expect(commands.map(formatCommand)).toEqual([
      'DISPLAY_CPU:ON',
      'DISPLAY_RAM:OFF',
      'DISPLAY_WPM:ON',
      'DISPLAY_TIME:ON',
      'TIME_FORMAT:12',
      'SLEEP_TIMEOUT:5',
      'SENSITIVITY:1.5',
      'SAVE_SETTINGS',
    ]);
  });
});

describe('HostSession', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const config = normalizeHostConfig({
    display: { use24HourTime: false, sleepTimeoutMinutes: 10 },
    connection: { settleMs: 0, minCommandIntervalMs: 0 },
  });

  it('syncs the virtual device after connecting', async () => {
    const storage = new MemorySettingsStorage();
    const transport = new VirtualDeviceTransport({ storage, random: () => 0.999 });
    const session = createHostSession(config, {
      transportFactory: () => transport,
      sampler,
      keySource: new ScriptedKeys(),
    });

    await session.start();
    const connecting = session.connect(transport.path);
    await vi.advanceTimersByTimeAsync(1500);
    await connecting;

    const status = session.getStatus();
    expect(status.link.state).toBe('connected');
    expect(status.link.deviceResponded).toBe(true);
    expect(status.monitoring).toBe(true);
    expect(status.fallbackMode).toBe(false);
    expect(status.telemetry).toEqual({ cpuPercent: 12, memPercent: 48 });

    expect(transport.device.getSettings()).toMatchObject({
      use24HourTime: false,
      sleepTimeoutMinutes: 10,
      showCpu: true,
    });
    expect(storage.writes).toBe(2);
    expect(transport.device.state.context.readings).toMatchObject({ cpuPercent: 12, ramPercent: 48 });

    await session.stop();
    expect(session.isRunning).toBe(false);
    expect(session.getStatus().link.state).toBe('disconnected');
  });

  it('animates the device while keys are pressed', async () => {
    const keys = new ScriptedKeys();
    const transport = new VirtualDeviceTransport({ random: () => 0.999 });
    const session = createHostSession(config, {
      transportFactory: () => transport,
      sampler,
      keySource: keys,
    });

    await session.start();
    const connecting = session.connect(transport.path);
    await vi.advanceTimersByTimeAsync(500);
    await connecting;

    for (let i = 0; i < 8; i += 1) {
      keys.press();
      await vi.advanceTimersByTimeAsync(100);
    }

    expect(session.getStatus().active).toBe(true);
    expect(session.getStatus().wpm).toBeGreaterThan(0);
    expect(isTypingState(transport.device.state.context.director.getState())).toBe(true);

    await session.stop();
  });

  it('runs in fallback mode without a key source', async () => {
    const transport = new VirtualDeviceTransport();
    const session = createHostSession(config, { transportFactory: () => transport, sampler });

    await session.start();
    expect(session.getStatus().fallbackMode).toBe(true);
    expect(session.recordManualKeystroke()).toBe(true);

    await session.applyDisplaySettings({ ...DEFAULT_DISPLAY_PREFERENCES, showWpm: false });
    expect(transport.device.getSettings().showWpm).toBe(true);

    await session.stop();
  });
});
