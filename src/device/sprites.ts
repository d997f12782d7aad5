/**
 * @file Sprite layers
 * @description Named sprite references and the pure selection rules that turn the
 * director's state into one sprite per layer. Pixel data lives with the renderer.
 * @module device/sprites
 */

export type SpriteId =
  | 'standardBody'
  | 'bodyEarTwitch'
  | 'stockFace'
  | 'happyFace'
  | 'blinkFace'
  | 'sleepyFace'
  | 'leftPawDown'
  | 'rightPawDown'
  | 'twoPawsUp'
  | 'table'
  | 'leftClickEffect'
  | 'rightClickEffect'
  | 'sleepy1'
  | 'sleepy2'
  | 'sleepy3';

/** Back-to-front draw order. */
export const SPRITE_LAYERS = ['body', 'face', 'table', 'paws', 'effects'] as const;

export type SpriteLayer = (typeof SPRITE_LAYERS)[number];

export interface SpriteLayerSet {
  body: SpriteId;
  face: SpriteId;
  table: SpriteId;
  paws: SpriteId | null;
  effects: SpriteId | null;
}

export type AnimationState =
  | 'IDLE_1'
  | 'IDLE_2'
  | 'IDLE_3'
  | 'IDLE_4'
  | 'TYPING_SLOW'
  | 'TYPING_NORMAL'
  | 'TYPING_FAST';

export function isTypingState(state: AnimationState): boolean {
  return state === 'TYPING_SLOW' || state === 'TYPING_NORMAL' || state === 'TYPING_FAST';
}

export function isSleepState(state: AnimationState): boolean {
  return state === 'IDLE_3' || state === 'IDLE_4';
}

/** Four-step paw cycle: left down, rest, right down, rest. */
const PAW_CYCLE: readonly SpriteId[] = ['leftPawDown', 'twoPawsUp', 'rightPawDown', 'twoPawsUp'];
const SLEEPY_FRAMES: readonly SpriteId[] = ['sleepy1', 'sleepy2', 'sleepy3'];

export const PAW_FRAME_COUNT = PAW_CYCLE.length;
export const SLEEPY_FRAME_COUNT = SLEEPY_FRAMES.length;

export interface SpriteInputs {
  state: AnimationState;
  streak: boolean;
  pawFrame: number;
  effectFrame: number;
  blinking: boolean;
  earTwitching: boolean;
}

function pickFace(input: SpriteInputs): SpriteId {
  if (input.blinking) {
    return 'blinkFace';
  }
  if (isSleepState(input.state)) {
    return 'sleepyFace';
  }
  if (input.streak && isTypingState(input.state)) {
    return 'happyFace';
  }
  return 'stockFace';
}

function pickPaws(input: SpriteInputs): SpriteId | null {
  if (isTypingState(input.state)) {
    return PAW_CYCLE[input.pawFrame % PAW_FRAME_COUNT] ?? 'twoPawsUp';
  }
  return input.state === 'IDLE_1' ? 'twoPawsUp' : null;
}

function pickEffects(input: SpriteInputs): SpriteId | null {
  if (input.state === 'IDLE_4') {
    return SLEEPY_FRAMES[input.effectFrame % SLEEPY_FRAME_COUNT] ?? null;
  }
  const clicking = input.state === 'TYPING_FAST' || (input.streak && isTypingState(input.state));
  if (!clicking) {
    return null;
  }
  const frame = input.pawFrame % PAW_FRAME_COUNT;
  if (frame === 0) {
    return 'leftClickEffect';
  }
  if (frame === 2) {
    return 'rightClickEffect';
  }
  return null;
}

export function selectSprites(input: SpriteInputs): SpriteLayerSet {
  return {
    body: input.earTwitching ? 'bodyEarTwitch' : 'standardBody',
    face: pickFace(input),
    table: 'table',
    paws: pickPaws(input),
    effects: pickEffects(input),
  };
}

export function spriteSetsEqual(a: SpriteLayerSet, b: SpriteLayerSet): boolean {
  return SPRITE_LAYERS.every((layer) => a[layer] === b[layer]);
}
