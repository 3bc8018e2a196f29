import { normalizeKey, parseHotkey, validateKeys } from './key-normalizer';
import { InvalidKeyError } from '../errors/translation.errors';

describe('normalizeKey', () => {
  it.each([
    ['Super', 'win'],
    ['windows', 'win'],
    [' META ', 'win'],
    ['Page_Up', 'pageup'],
    ['page down', 'pagedown'],
    ['PgDn', 'pagedown'],
    ['Caps_Lock', 'capslock'],
    ['caps', 'capslock'],
    ['Control', 'ctrl'],
    ['cmd', 'command'],
    ['mute', 'volumemute'],
    ['Enter', 'enter'],
  ])('maps %p to %p', (input, expected) => {
    expect(normalizeKey(input)).toBe(expected);
  });
});

describe('parseHotkey', () => {
  it('splits plus-joined combinations', () => {
    expect(parseHotkey('Ctrl+Shift+T')).toEqual(['ctrl', 'shift', 't']);
  });

  it('falls back to comma separation', () => {
    expect(parseHotkey('alt, tab')).toEqual(['alt', 'tab']);
  });

  it('strips surrounding parentheses and drops empty tokens', () => {
    expect(parseHotkey('(ctrl++c)')).toEqual(['ctrl', 'c']);
  });

  it('raises with a corrected-name suggestion for common mistakes', () => {
    expect(() => parseHotkey('ctrl+ret')).toThrow(InvalidKeyError);
    expect(() => parseHotkey('ctrl+ret')).toThrow("'ret' → use 'enter'");
  });

  it('decodes numpad spellings into the canonical form', () => {
    expect(() => parseHotkey('numpad5')).toThrow("'numpad5' → use 'num5'");
  });

  it('hints at the numpad format for unknown num keys', () => {
    expect(() => parseHotkey('numenter')).toThrow(
      "numpad keys use format 'num0'-'num9'",
    );
  });

  it('skips validation when asked to', () => {
    expect(parseHotkey('hyper+x', { validate: false })).toEqual([
      'hyper',
      'x',
    ]);
  });
});

describe('validateKeys', () => {
  it('reports every invalid key', () => {
    let caught: unknown;
    try {
      validateKeys(['ctrl', 'foo', 'bar']);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidKeyError);
    expect((caught as InvalidKeyError).invalidKeys).toEqual(['foo', 'bar']);
  });
});
