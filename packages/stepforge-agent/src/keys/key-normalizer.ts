import { InvalidKeyError } from '../errors/translation.errors';
import vocabulary from './valid-keys.json';

export const VALID_KEYS: ReadonlySet<string> = new Set(vocabulary.keys);

const KEY_VARIATIONS: Record<string, readonly string[]> = {
  pageup: ['page_up', 'page up', 'page-up', 'pageup', 'pgup'],
  pagedown: ['page_down', 'page down', 'page-down', 'pagedown', 'pgdn'],
  printscreen: ['print_screen', 'printscreen', 'prtsc', 'prtscr'],
  numlock: ['num_lock', 'numlock'],
  scrolllock: ['scroll_lock', 'scrolllock'],
  capslock: ['caps_lock', 'caps lock', 'caps', 'capslock'],
  win: ['windows', 'super', 'meta', 'win'],
  command: ['cmd', 'command'],
  ctrl: ['control', 'ctrl'],
  volumemute: ['mute', 'volumemute'],
  playpause: ['play', 'playpause'],
};

const ALIASES: ReadonlyMap<string, string> = new Map(
  Object.entries(KEY_VARIATIONS).flatMap(([canonical, variants]) =>
    variants.map((variant) => [variant, canonical] as const),
  ),
);

const CORRECTIONS: Record<string, string> = {
  ret: 'enter',
  cr: 'enter',
  bksp: 'backspace',
  bs: 'backspace',
  ins: 'insert',
  spacebar: 'space',
  arrowup: 'up',
  arrowdown: 'down',
  arrowleft: 'left',
  arrowright: 'right',
};

const NUMPAD_PATTERN = /^(?:numpad|num_|kp_?)(\d)$/;

/**
 * Canonical spelling for a key name. Single-character keys keep their
 * whitespace so that a literal space or tab survives.
 */
export function normalizeKey(key: string): string {
  const lowered = key.length === 1 ? key.toLowerCase() : key.trim().toLowerCase();
  return ALIASES.get(lowered) ?? lowered;
}

function suggestionFor(key: string): string {
  const correction = CORRECTIONS[key];
  if (correction) {
    return `'${key}' → use '${correction}'`;
  }
  const numpad = NUMPAD_PATTERN.exec(key);
  if (numpad) {
    return `'${key}' → use 'num${numpad[1]}'`;
  }
  if (key.startsWith('num') && key.length > 3) {
    return `'${key}' → numpad keys use format 'num0'-'num9'`;
  }
  return `'${key}' is not a valid key name`;
}

export function validateKeys(keys: readonly string[]): void {
  const invalid = keys.filter((key) => key && !VALID_KEYS.has(key));
  if (invalid.length > 0) {
    throw new InvalidKeyError(invalid, invalid.map(suggestionFor));
  }
}

export interface ParseHotkeyOptions {
  validate?: boolean;
}

/**
 * Splits "ctrl+c" (or the comma form "alt, tab") into canonical key names.
 */
export function parseHotkey(
  text: string,
  options: ParseHotkeyOptions = {},
): string[] {
  const { validate = true } = options;
  const stripped = text.trim().replace(/^\(+/, '').replace(/\)+$/, '');
  const separator = stripped.includes('+') ? '+' : ',';
  const keys = stripped
    .split(separator)
    .map((token) => normalizeKey(token.trim()))
    .filter((key) => key.length > 0);

  if (validate) {
    validateKeys(keys);
  }
  return keys;
}
