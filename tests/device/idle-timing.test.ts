/**
 * @file Idle stage timing tests
 */

import { describe, it, expect } from 'vitest';
import { computeIdleStages } from '../../src/device/idle-timing';

describe('computeIdleStages', () => {
  it('gives short timeouts larger middle stages', () => {
    expect(computeIdleStages(1)).toEqual({ stage1Ms: 24_000, stage2Ms: 15_000, stage3Ms: 21_000 });
    expect(computeIdleStages(5)).toEqual({ stage1Ms: 120_000, stage2Ms: 75_000, stage3Ms: 105_000 });
  });

  it('uses medium fractions up to fifteen minutes', () => {
    expect(computeIdleStages(10)).toEqual({ stage1Ms: 390_000, stage2Ms: 90_000, stage3Ms: 120_000 });
  });

  it('caps the middle stages for long timeouts', () => {
    expect(computeIdleStages(60)).toEqual({
      stage1Ms: 3_300_000,
      stage2Ms: 120_000,
      stage3Ms: 180_000,
    });
  });

  it('always adds up to the full timeout', () => {
    for (let minutes = 1; minutes <= 60; minutes += 1) {
      const { stage1Ms, stage2Ms, stage3Ms } = computeIdleStages(minutes);
      expect(stage1Ms + stage2Ms + stage3Ms).toBe(minutes * 60_000);
      expect(stage1Ms).toBeGreaterThan(0);
    }
  });
});
