/**
 * @file Typing-key filter for the cadence estimator.
 * @description Key names come from whatever global key source the host uses, so they are
 * normalized first (`left_shift`, `Left-Shift` and `LEFT SHIFT` are the same key).
 */

const MODIFIER_KEYS = new Set([
  'LEFT CTRL',
  'RIGHT CTRL',
  'LEFT ALT',
  'RIGHT ALT',
  'LEFT SHIFT',
  'RIGHT SHIFT',
  'LEFT META',
  'RIGHT META',
  'LEFT WIN',
  'RIGHT WIN',
  'CTRL',
  'CONTROL',
  'ALT',
  'ALTGR',
  'OPTION',
  'SHIFT',
  'META',
  'CMD',
  'COMMAND',
  'SUPER',
  'FN',
]);

const NAVIGATION_KEYS = new Set([
  'UP',
  'DOWN',
  'LEFT',
  'RIGHT',
  'UP ARROW',
  'DOWN ARROW',
  'LEFT ARROW',
  'RIGHT ARROW',
  'HOME',
  'END',
  'PAGE UP',
  'PAGE DOWN',
  'PAGEUP',
  'PAGEDOWN',
  'INSERT',
  'DELETE',
  'TAB',
  'ESC',
  'ESCAPE',
  'CAPS LOCK',
  'NUM LOCK',
  'SCROLL LOCK',
  'PRINT SCREEN',
  'PAUSE',
]);

const FUNCTION_KEY_RE = /^F([1-9]|1\d|2[0-4])$/;
const POINTER_RE = /MOUSE|BUTTON|CLICK|SCROLL|WHEEL/;
const SCAN_CODE_RE = /^\d{2,}$/;

export function normalizeKeyName(key: string): string {
  return key.trim().toUpperCase().replace(/[_-]+/g, ' ').replace(/\s+/g, ' ');
}

export function isModifierKey(key: string): boolean {
  return MODIFIER_KEYS.has(normalizeKeyName(key));
}

/**
 * Pointer pseudo-keys are matched by name pattern, so unlisted variants
 * (`MOUSE WHEEL LEFT`, `X BUTTON 2`) are rejected too.
 */
export function isPointerKey(key: string): boolean {
  return POINTER_RE.test(normalizeKeyName(key));
}

/**
 * True for keys that count towards WPM. Single digits are typing keys; longer numeric
 * names are raw scan codes some sources report for unmapped buttons.
 */
export function isTypingKey(key: string): boolean {
  const name = normalizeKeyName(key);
  if (name === '') {
    return false;
  }
  if (MODIFIER_KEYS.has(name) || NAVIGATION_KEYS.has(name)) {
    return false;
  }
  if (FUNCTION_KEY_RE.test(name) || SCAN_CODE_RE.test(name)) {
    return false;
  }
  return !POINTER_RE.test(name);
}
