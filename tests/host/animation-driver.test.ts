/**
 * @file Animation driver tests
 */

import { describe, it, expect } from 'vitest';
import { AnimationDriver } from '../../src/host/animation-driver';
import type { CadenceSample } from '../../src/host/cadence-estimator';

function typing(timestamp: number, wpm: number): CadenceSample {
  return { timestamp, wpm, active: true, totalKeystrokes: 10, reason: 'tick' };
}

function idle(timestamp: number): CadenceSample {
  return { timestamp, wpm: 0, active: false, totalKeystrokes: 10, reason: 'idle' };
}

describe('AnimationDriver', () => {
  it('sends nothing before the first WPM value', () => {
    const driver = new AnimationDriver();
    expect(driver.handleSample(typing(0, 0))).toEqual([]);
  });

  it('sends SPEED on the first typing sample', () => {
    const driver = new AnimationDriver();
    expect(driver.handleSample(typing(100, 96))).toEqual([{ kind: 'speed', speedMs: 274 }]);
  });

  it('holds back small speed changes until the keep-alive is due', () => {
    const driver = new AnimationDriver();
    driver.handleSample(typing(100, 96));
    expect(driver.handleSample(typing(200, 100))).toEqual([]);
    expect(driver.handleSample(typing(1099, 100))).toEqual([]);
    expect(driver.handleSample(typing(1100, 100))).toEqual([
      { kind: 'heartbeat' },
      { kind: 'streak', on: true },
    ]);
    expect(driver.isStreakActive).toBe(true);
  });

  it('sends SPEED again when the speed moves by more than the threshold', () => {
    const driver = new AnimationDriver();
    driver.handleSample(typing(100, 96));
    expect(driver.handleSample(typing(200, 40))).toEqual([{ kind: 'speed', speedMs: 406 }]);
  });

  it('ends a streak when WPM drops below the threshold', () => {
    const driver = new AnimationDriver();
    driver.handleSample(typing(0, 100));
    driver.handleSample(typing(1000, 100));
    expect(driver.handleSample(typing(1100, 40))).toEqual([
      { kind: 'speed', speedMs: 406 },
      { kind: 'streak', on: false },
    ]);
  });

  it('stops once, then starts idle staging after the delay', () => {
    const driver = new AnimationDriver();
    driver.handleSample(typing(100, 96));
    expect(driver.handleSample(idle(1300))).toEqual([{ kind: 'stop' }]);
    expect(driver.handleSample(idle(1400))).toEqual([]);
    expect(driver.handleSample(idle(2799))).toEqual([]);
    expect(driver.handleSample(idle(2800))).toEqual([{ kind: 'idleStart' }]);
    expect(driver.handleSample(idle(5000))).toEqual([]);
  });

  it('turns the streak off together with the stop', () => {
    const driver = new AnimationDriver();
    driver.handleSample(typing(0, 100));
    driver.handleSample(typing(1000, 100));
    expect(driver.handleSample(idle(2100))).toEqual([{ kind: 'stop' }, { kind: 'streak', on: false }]);
  });

  it('resends SPEED after a reset', () => {
    const driver = new AnimationDriver();
    driver.handleSample(typing(100, 96));
    driver.reset();
    expect(driver.handleSample(typing(200, 96))).toEqual([{ kind: 'speed', speedMs: 274 }]);
  });
});
