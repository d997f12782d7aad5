/**
 * @fileoverview Text readings shown next to the character: CPU, RAM, WPM and the clock.
 */

import type { DeviceSettings } from './settings-record';

export interface DisplayReadings {
  cpuPercent: number;
  ramPercent: number;
  wpm: number;
  /** Last time received from the host; undefined until the first TIME */
  time: { hours: number; minutes: number } | undefined;
}

export interface DisplayLine {
  field: 'CPU' | 'RAM' | 'WPM' | 'TIME';
  text: string;
}

export function emptyReadings(): DisplayReadings {
  return { cpuPercent: 0, ramPercent: 0, wpm: 0, time: undefined };
}

export function formatClock(hours: number, minutes: number, use24HourTime: boolean): string {
  const mm = String(minutes).padStart(2, '0');
  if (use24HourTime) {
    return `${String(hours).padStart(2, '0')}:${mm}`;
  }
  const suffix = hours < 12 ? 'AM' : 'PM';
  const h12 = hours % 12 === 0 ? 12 : hours % 12;
  return `${h12}:${mm} ${suffix}`;
}

/**
 * Lines for every visible field, top to bottom. The clock is omitted until a time is known.
 */
export function renderReadings(readings: DisplayReadings, settings: DeviceSettings): DisplayLine[] {
  const lines: DisplayLine[] = [];
  if (settings.showCpu) {
    lines.push({ field: 'CPU', text: `CPU ${readings.cpuPercent}%` });
  }
  if (settings.showRam) {
    lines.push({ field: 'RAM', text: `RAM ${readings.ramPercent}%` });
  }
  if (settings.showWpm) {
    lines.push({ field: 'WPM', text: `WPM ${readings.wpm}` });
  }
  if (settings.showTime && readings.time !== undefined) {
    lines.push({
      field: 'TIME',
      text: formatClock(readings.time.hours, readings.time.minutes, settings.use24HourTime),
    });
  }
  return lines;
}

export function linesEqual(a: readonly DisplayLine[], b: readonly DisplayLine[]): boolean {
  return (
    a.length === b.length &&
    a.every((line, i) => line.field === b[i]?.field && line.text === b[i]?.text)
  );
}
