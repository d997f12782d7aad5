/**
 * @file Animation director tests
 */

import { describe, it, expect } from 'vitest';
import { AnimationDirector } from '../../src/device/animation-director';

/** Pushes blinks and ear twitches as late as possible (7995 ms and 29980 ms). */
const late = (): number => 0.999;
/** Blinks at 3000 ms, ear twitch at 10000 ms. */
const early = (): number => 0;

describe('AnimationDirector', () => {
  describe('typing directives', () => {
    it('selects the typing state from the speed value', () => {
      const director = new AnimationDirector({ random: late });
      director.typing(0, 50);
      expect(director.getState()).toBe('TYPING_SLOW');
      director.typing(10, 100);
      expect(director.getState()).toBe('TYPING_NORMAL');
      director.typing(20, 200);
      expect(director.getState()).toBe('TYPING_FAST');
      expect(director.snapshot().autoProgression).toBe(false);
    });

    it('treats a speed of zero as a stop', () => {
      const director = new AnimationDirector({ random: late });
      director.typing(0, 120);
      director.typing(10, 0);
      expect(director.getState()).toBe('IDLE_1');
      expect(director.snapshot().autoProgression).toBe(false);
    });

    it('steps the paw cycle at the speed interval', () => {
      const director = new AnimationDirector({ random: late });
      director.typing(0, 120);

      expect(director.getSprites().paws).toBe('leftPawDown');
      expect(director.update(0)).toBe(false);
      expect(director.update(119)).toBe(false);
      expect(director.update(120)).toBe(true);
      expect(director.getSprites().paws).toBe('twoPawsUp');
      director.update(240);
      expect(director.getSprites().paws).toBe('rightPawDown');
    });

    it('restarts the paw cycle on every SPEED', () => {
      const director = new AnimationDirector({ random: late });
      director.typing(0, 120);
      director.update(120);
      director.update(240);
      expect(director.snapshot().pawFrame).toBe(2);

      director.typing(250, 120);
      expect(director.snapshot().pawFrame).toBe(0);
      expect(director.snapshot().sprites.paws).toBe('leftPawDown');
    });

    it('shows directive changes before the next update', () => {
      const director = new AnimationDirector({ random: late });
      director.typing(0, 120);
      director.setStreak(0, true);
      expect(director.getSprites().face).toBe('happyFace');
      director.triggerBlink(10);
      expect(director.getSprites().face).toBe('blinkFace');
      director.triggerEarTwitch(10);
      expect(director.getSprites().body).toBe('bodyEarTwitch');
    });

    it('divides the paw interval by the sensitivity', () => {
      const director = new AnimationDirector({ random: late, sensitivity: 2 });
      director.typing(0, 120);
      expect(director.pawIntervalMs()).toBe(60);
      director.typing(0, 30);
      expect(director.pawIntervalMs()).toBe(20);
      director.setSensitivity(0);
      expect(director.pawIntervalMs()).toBe(30);
    });

    it('shows the streak face while typing', () => {
      const director = new AnimationDirector({ random: late });
      director.typing(0, 120);
      director.setStreak(0, true);
      director.update(0);
      expect(director.isStreak()).toBe(true);
      expect(director.getSprites().face).toBe('happyFace');
    });
  });

  describe('host fail-safe', () => {
    it('returns to auto-progression after five seconds without directives', () => {
      const director = new AnimationDirector({ random: late });
      director.typing(0, 120);
      director.setStreak(0, true);

      director.update(5000);
      expect(director.getState()).toBe('TYPING_NORMAL');
      director.update(5001);
      expect(director.snapshot()).toMatchObject({
        state: 'IDLE_1',
        streak: false,
        autoProgression: true,
      });
    });

    it('keeps the rest pose while heartbeats arrive', () => {
      const director = new AnimationDirector({ random: late });
      director.stop(0);
      for (let t = 4000; t <= 28_000; t += 4000) {
        director.heartbeat(t);
        director.update(t);
      }
      director.update(30_000);
      expect(director.getState()).toBe('IDLE_1');
      expect(director.snapshot().autoProgression).toBe(false);
    });
  });

  describe('idle progression', () => {
    it('walks through the idle stages on the sleep timeout schedule', () => {
      const director = new AnimationDirector({ random: late });
      director.update(23_999);
      expect(director.getState()).toBe('IDLE_1');
      director.update(24_000);
      expect(director.getState()).toBe('IDLE_2');
      director.update(39_000);
      expect(director.getState()).toBe('IDLE_3');
      director.update(60_000);
      expect(director.getState()).toBe('IDLE_4');
    });

    it('catches up several stages in one update', () => {
      const director = new AnimationDirector({ random: late });
      director.update(60_000);
      expect(director.getState()).toBe('IDLE_4');
    });

    it('animates the sleepy effect once per second', () => {
      const director = new AnimationDirector({ random: late });
      director.update(60_000);
      expect(director.getSprites().effects).toBe('sleepy1');
      director.update(61_000);
      expect(director.getSprites().effects).toBe('sleepy2');
      director.update(62_000);
      director.update(63_000);
      expect(director.getSprites().effects).toBe('sleepy1');
    });

    it('restarts progression on IDLE_START', () => {
      const director = new AnimationDirector({ random: late });
      director.typing(0, 120);
      director.idleStart(1000);
      director.update(24_999);
      expect(director.getState()).toBe('IDLE_1');
      director.update(25_000);
      expect(director.getState()).toBe('IDLE_2');
    });

    it('jumps to a forced stage and keeps progressing', () => {
      const director = new AnimationDirector({ random: late });
      director.forceIdleStage(0, 3);
      expect(director.getState()).toBe('IDLE_3');
      director.update(21_000);
      expect(director.getState()).toBe('IDLE_4');
    });

    it('follows a new sleep timeout', () => {
      const director = new AnimationDirector({ random: late });
      director.setSleepTimeout(10);
      expect(director.getIdleStages().stage1Ms).toBe(390_000);
      director.update(389_999);
      expect(director.getState()).toBe('IDLE_1');
    });
  });

  describe('blinks and ear twitches', () => {
    it('blinks for 200 ms on the random schedule', () => {
      const director = new AnimationDirector({ random: early });
      director.update(2999);
      expect(director.getSprites().face).toBe('stockFace');
      expect(director.update(3000)).toBe(true);
      expect(director.getSprites().face).toBe('blinkFace');
      director.update(3199);
      expect(director.snapshot().blinking).toBe(true);
      director.update(3200);
      expect(director.getSprites().face).toBe('stockFace');
    });

    it('does not blink while asleep', () => {
      const director = new AnimationDirector({ random: early });
      director.forceIdleStage(0, 3);
      director.update(3000);
      expect(director.snapshot().blinking).toBe(false);
      director.triggerBlink(3100);
      director.update(3100);
      expect(director.getSprites().face).toBe('sleepyFace');
    });

    it('blinks on demand', () => {
      const director = new AnimationDirector({ random: late });
      director.triggerBlink(100);
      director.update(100);
      expect(director.getSprites().face).toBe('blinkFace');
    });

    it('twitches an ear for 500 ms', () => {
      const director = new AnimationDirector({ random: early });
      director.update(10_000);
      expect(director.getSprites().body).toBe('bodyEarTwitch');
      director.update(10_500);
      expect(director.getSprites().body).toBe('standardBody');
    });
  });
});
