/**
 * @fileoverview Host telemetry: the sampler interface consumed by the host session and a
 * basic implementation built on the `os` module.
 */

import * as os from 'os';

export interface TelemetryReading {
  cpuPercent: number;
  memPercent: number;
}

export interface TelemetrySampler {
  sample(): TelemetryReading;
}

interface CpuTimes {
  idle: number;
  total: number;
}

export type CpuInfoProvider = () => os.CpuInfo[];
export type MemoryProvider = () => { free: number; total: number };

function readCpuTimes(cpus: os.CpuInfo[]): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus) {
    const { user, nice, sys, idle: idleTime, irq } = cpu.times;
    idle += idleTime;
    total += user + nice + sys + idleTime + irq;
  }
  return { idle, total };
}

function clampPercent(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(100, Math.round(value)));
}

/**
 * CPU load is computed from the difference between consecutive samples; the first call
 * reports 0.
 */
export class OsTelemetrySampler implements TelemetrySampler {
  private previous: CpuTimes | undefined;

  constructor(
    private readonly cpus: CpuInfoProvider = os.cpus,
    private readonly memory: MemoryProvider = () => ({ free: os.freemem(), total: os.totalmem() })
  ) {}

  sample(): TelemetryReading {
    const current = readCpuTimes(this.cpus());
    let cpuPercent = 0;
    if (this.previous !== undefined) {
      const totalDelta = current.total - this.previous.total;
      const idleDelta = current.idle - this.previous.idle;
      cpuPercent = totalDelta > 0 ? (1 - idleDelta / totalDelta) * 100 : 0;
    }
    this.previous = current;

    const { free, total } = this.memory();
    const memPercent = total > 0 ? ((total - free) / total) * 100 : 0;
    return { cpuPercent: clampPercent(cpuPercent), memPercent: clampPercent(memPercent) };
  }
}
