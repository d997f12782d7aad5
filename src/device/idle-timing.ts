/**
 * @fileoverview Idle stage durations derived from the sleep timeout. Short timeouts give
 * the middle stages a larger share so each stage stays visible; the three durations
 * always add up to the full timeout.
 */

export interface IdleStageDurations {
  /** IDLE_1 → IDLE_2 */
  stage1Ms: number;
  /** IDLE_2 → IDLE_3 */
  stage2Ms: number;
  /** IDLE_3 → IDLE_4 */
  stage3Ms: number;
}

const FIVE_MINUTES_MS = 5 * 60_000;
const FIFTEEN_MINUTES_MS = 15 * 60_000;

const STAGE2_MIN_MS = 5_000;
const STAGE2_MAX_MS = 120_000;
const STAGE3_MIN_MS = 5_000;
const STAGE3_MAX_MS = 180_000;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function computeIdleStages(sleepTimeoutMinutes: number): IdleStageDurations {
  const totalMs = Math.max(1, Math.round(sleepTimeoutMinutes)) * 60_000;

  let stage2Fraction = 0.1;
  let stage3Fraction = 0.1;
  if (totalMs <= FIVE_MINUTES_MS) {
    stage2Fraction = 0.25;
    stage3Fraction = 0.35;
  } else if (totalMs <= FIFTEEN_MINUTES_MS) {
    stage2Fraction = 0.15;
    stage3Fraction = 0.2;
  }

  const stage2Ms = clamp(Math.round(totalMs * stage2Fraction), STAGE2_MIN_MS, STAGE2_MAX_MS);
  const stage3Ms = clamp(Math.round(totalMs * stage3Fraction), STAGE3_MIN_MS, STAGE3_MAX_MS);
  return {
    stage1Ms: totalMs - stage2Ms - stage3Ms,
    stage2Ms,
    stage3Ms,
  };
}
