/**
 * @file Display readings tests
 */

import { describe, it, expect } from 'vitest';
import { emptyReadings, formatClock, linesEqual, renderReadings } from '../../src/device/display-state';
import { defaultDeviceSettings } from '../../src/device/settings-record';

describe('formatClock', () => {
  it('formats 24 hour time with leading zeros', () => {
    expect(formatClock(9, 5, true)).toBe('09:05');
    expect(formatClock(23, 59, true)).toBe('23:59');
  });

  it('formats 12 hour time with a suffix', () => {
    expect(formatClock(21, 5, false)).toBe('9:05 PM');
    expect(formatClock(0, 7, false)).toBe('12:07 AM');
    expect(formatClock(12, 0, false)).toBe('12:00 PM');
  });
});

describe('renderReadings', () => {
  it('omits the clock until a time is known', () => {
    expect(renderReadings(emptyReadings(), defaultDeviceSettings())).toEqual([
      { field: 'CPU', text: 'CPU 0%' },
      { field: 'RAM', text: 'RAM 0%' },
      { field: 'WPM', text: 'WPM 0' },
    ]);
  });

  it('shows only the visible fields', () => {
    const readings = { cpuPercent: 12, ramPercent: 48, wpm: 96, time: { hours: 14, minutes: 30 } };
    const settings = { ...defaultDeviceSettings(), showRam: false, use24HourTime: false };
    expect(renderReadings(readings, settings)).toEqual([
      { field: 'CPU', text: 'CPU 12%' },
      { field: 'WPM', text: 'WPM 96' },
      { field: 'TIME', text: '2:30 PM' },
    ]);
  });
});

describe('linesEqual', () => {
  it('compares field and text', () => {
    const a = [{ field: 'CPU' as const, text: 'CPU 1%' }];
    expect(linesEqual(a, [{ field: 'CPU', text: 'CPU 1%' }])).toBe(true);
    expect(linesEqual(a, [{ field: 'CPU', text: 'CPU 2%' }])).toBe(false);
    expect(linesEqual(a, [])).toBe(false);
  });
});
