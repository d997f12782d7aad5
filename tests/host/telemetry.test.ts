/**
 * @file Telemetry sampler tests
 */

import type { CpuInfo } from 'os';
import { describe, it, expect } from 'vitest';
import { OsTelemetrySampler } from '../../src/host/telemetry';

function cpu(user: number, idle: number): CpuInfo {
  return { model: 'test', speed: 1000, times: { user, nice: 0, sys: 0, idle, irq: 0 } };
}

describe('OsTelemetrySampler', () => {
  it('reports 0% CPU on the first sample and the delta afterwards', () => {
    const readings = [[cpu(100, 900), cpu(100, 900)], [cpu(130, 970), cpu(160, 940)]];
    let call = 0;
    const sampler = new OsTelemetrySampler(
      () => readings[Math.min(call++, readings.length - 1)] ?? [],
      () => ({ free: 250, total: 1000 })
    );

    expect(sampler.sample()).toEqual({ cpuPercent: 0, memPercent: 75 });
    // busy 90 of 200 ticks
    expect(sampler.sample()).toEqual({ cpuPercent: 45, memPercent: 75 });
  });

  it('reports 0 when nothing moved or memory is unknown', () => {
    const sampler = new OsTelemetrySampler(
      () => [cpu(10, 10)],
      () => ({ free: 0, total: 0 })
    );
    sampler.sample();
    expect(sampler.sample()).toEqual({ cpuPercent: 0, memPercent: 0 });
  });
});
