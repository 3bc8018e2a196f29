import { Coordinates } from '@stepforge/shared';
import { FormatError } from '../errors/translation.errors';

export type ClickCommand = 'click' | 'doubleClick' | 'tripleClick' | 'rightClick';

export const DONE = 'DONE';
export const FAIL = 'FAIL';

// keyboard.type only handles printable ASCII on one line.
const MAX_TYPED_LENGTH = 200;
const UNTYPEABLE = /[^\t\x20-\x7e]/;
const PLAIN_DECIMAL = /^[0-9]+(?:\.[0-9]+)?$/;

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  "'": "\\'",
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

/**
 * Single-quoted string literal for the command vocabulary.
 */
export function quote(text: string): string {
  return `'${text.replace(/[\\'\n\r\t]/g, (ch) => ESCAPES[ch] ?? ch)}'`;
}

export function click(point: Coordinates, kind: ClickCommand = 'click'): string {
  return `mouse.${kind}(x=${point.x}, y=${point.y})`;
}

export function middleClick(point: Coordinates): string {
  return `mouse.click(x=${point.x}, y=${point.y}, button='middle')`;
}

export function moveTo(point: Coordinates): string {
  return `mouse.moveTo(${point.x}, ${point.y})`;
}

export function dragTo(point: Coordinates, duration: number): string {
  return `mouse.dragTo(${point.x}, ${point.y}, duration=${duration})`;
}

export function scroll(amount: number): string {
  return `mouse.scroll(${amount})`;
}

export function hscroll(amount: number): string {
  return `mouse.hscroll(${amount})`;
}

export function hotkey(keys: readonly string[], interval: number): string {
  return `keyboard.hotkey(${keys.map(quote).join(', ')}, interval=${interval})`;
}

export function press(key: string): string {
  return `keyboard.press(${quote(key)})`;
}

export function keyDown(key: string): string {
  return `keyboard.keyDown(${quote(key)})`;
}

export function keyUp(key: string): string {
  return `keyboard.keyUp(${quote(key)})`;
}

export function shouldPaste(text: string): boolean {
  return text.length > MAX_TYPED_LENGTH || UNTYPEABLE.test(text);
}

/**
 * Types short ASCII text directly and routes anything else through the
 * clipboard.
 */
export function typeText(text: string): string {
  return shouldPaste(text)
    ? `clipboard.paste(${quote(text)})`
    : `keyboard.type(${quote(text)})`;
}

/**
 * `WAIT(n)` with `n` in plain decimal notation, at most millisecond
 * precision.
 */
export function wait(seconds: number): string {
  const formatted = Number.isFinite(seconds)
    ? seconds.toFixed(3).replace(/\.?0+$/, '')
    : '';
  if (seconds < 0 || !PLAIN_DECIMAL.test(formatted)) {
    throw new FormatError(`Invalid wait duration: ${seconds}`);
  }
  return `WAIT(${formatted})`;
}
