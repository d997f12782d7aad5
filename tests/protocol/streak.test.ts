/**
 * @file Streak detector tests
 */

import { describe, it, expect } from 'vitest';
import { StreakDetector } from '../../src/protocol/streak';

describe('StreakDetector', () => {
  it('turns on after a full window at or above the threshold', () => {
    const streak = new StreakDetector();
    expect(streak.update(0, 70)).toBeNull();
    expect(streak.update(500, 65)).toBeNull();
    expect(streak.update(1000, 70)).toBe('on');
    expect(streak.isActive()).toBe(true);
  });

  it('reports each edge once', () => {
    const streak = new StreakDetector();
    streak.update(0, 70);
    expect(streak.update(1000, 70)).toBe('on');
    expect(streak.update(1100, 90)).toBeNull();
    expect(streak.update(1200, 60)).toBe('off');
    expect(streak.update(1300, 60)).toBeNull();
    expect(streak.isActive()).toBe(false);
  });

  it('restarts the window after a dip', () => {
    const streak = new StreakDetector();
    streak.update(0, 70);
    expect(streak.update(600, 50)).toBeNull();
    expect(streak.update(700, 70)).toBeNull();
    expect(streak.update(1600, 70)).toBeNull();
    expect(streak.update(1700, 70)).toBe('on');
  });

  it('reset reports off only when a streak was active', () => {
    const streak = new StreakDetector(65, 200);
    expect(streak.reset()).toBeNull();
    streak.update(0, 80);
    streak.update(200, 80);
    expect(streak.reset()).toBe('off');
    expect(streak.update(300, 80)).toBeNull();
  });
});
