import { WebAction } from '@stepforge/shared';
import { createConverterConfig } from '../config/converter.config';
import { AllConversionsFailedError } from '../errors/translation.errors';
import { WebActionConverter } from './web.converter';

describe('WebActionConverter', () => {
  let converter: WebActionConverter;

  const commandsOf = (...actions: WebAction[]) =>
    converter.convert(actions).map((entry) => entry.command);

  beforeEach(() => {
    converter = new WebActionConverter();
  });

  it('clicks and hovers on the 0-1000 grid', () => {
    expect(
      commandsOf(
        { action: 'click_at', x: 500, y: 500 },
        { action: 'hover_at', x: 0, y: 1000 },
      ),
    ).toEqual(['mouse.click(x=960, y=540)', 'mouse.moveTo(0, 1079)']);
  });

  it('clears the field and submits when typing at a point', () => {
    expect(
      commandsOf({
        action: 'type_text_at',
        x: 500,
        y: 500,
        text: 'query',
        clearBeforeTyping: true,
        pressEnter: true,
      }),
    ).toEqual([
      'mouse.click(x=960, y=540)',
      "keyboard.hotkey('ctrl', 'a', interval=0.1)",
      "keyboard.press('delete')",
      "keyboard.type('query')",
      "keyboard.press('enter')",
    ]);
  });

  it('navigates through the address bar', () => {
    expect(commandsOf({ action: 'navigate', url: 'example.com' })).toEqual([
      "keyboard.hotkey('ctrl', 'l', interval=0.1)",
      "keyboard.hotkey('ctrl', 'a', interval=0.1)",
      "keyboard.type('https://example.com')",
      "keyboard.press('enter')",
    ]);
  });

  it('keeps an explicit scheme when navigating', () => {
    expect(
      commandsOf({ action: 'navigate', url: 'http://localhost:3000' })[2],
    ).toBe("keyboard.type('http://localhost:3000')");
  });

  it('opens the search home page', () => {
    expect(commandsOf({ action: 'search' })).toEqual([
      "keyboard.hotkey('ctrl', 'l', interval=0.1)",
      "keyboard.type('https://www.google.com')",
      "keyboard.press('enter')",
    ]);
  });

  it('maps document scrolling onto paging keys', () => {
    expect(
      commandsOf(
        { action: 'scroll_document', direction: 'down' },
        { action: 'scroll_document', direction: 'Up' },
      ),
    ).toEqual(["keyboard.press('pagedown')", "keyboard.press('pageup')"]);
  });

  it('derives scroll clicks from the magnitude', () => {
    expect(
      commandsOf(
        { action: 'scroll_at', x: 500, y: 500, direction: 'up', magnitude: 300 },
        { action: 'scroll_at', x: 500, y: 500, direction: 'down', magnitude: 50 },
      ),
    ).toEqual([
      'mouse.moveTo(960, 540)',
      'mouse.scroll(3)',
      'mouse.moveTo(960, 540)',
      'mouse.scroll(-1)',
    ]);
  });

  it('translates browser history and key combinations', () => {
    expect(
      commandsOf(
        { action: 'go_back' },
        { action: 'go_forward' },
        { action: 'key_combination', keys: 'Control-Shift-T' },
        { action: 'wait_5_seconds' },
      ),
    ).toEqual([
      "keyboard.hotkey('alt', 'left', interval=0.1)",
      "keyboard.hotkey('alt', 'right', interval=0.1)",
      "keyboard.hotkey('ctrl', 'shift', 't', interval=0.1)",
      'WAIT(5)',
    ]);
  });

  it('drags to the scaled destination', () => {
    expect(
      commandsOf({
        action: 'drag_and_drop',
        x: 0,
        y: 0,
        destinationX: 500,
        destinationY: 500,
      }),
    ).toEqual(['mouse.moveTo(0, 0)', 'mouse.dragTo(960, 540, duration=0.5)']);
    expect(converter.state.cursor).toEqual({ x: 960, y: 540 });
  });

  it('has no terminal action and treats opening the browser as a no-op', () => {
    expect(
      commandsOf({ action: 'open_web_browser' }, { action: 'go_back' }),
    ).toEqual(["keyboard.hotkey('alt', 'left', interval=0.1)"]);
  });

  it('rejects actions without their required fields', () => {
    expect(() =>
      converter.convert([
        { action: 'click_at', x: 10 },
        { action: 'scroll_document', direction: 'sideways' },
      ]),
    ).toThrow(AllConversionsFailedError);
  });

  it('scales onto a configured display size', () => {
    const small = new WebActionConverter(
      createConverterConfig({ targetWidth: 1000, targetHeight: 500 }),
    );

    expect(
      small.convert([{ action: 'click_at', x: 250, y: 250 }]).map((e) => e.command),
    ).toEqual(['mouse.click(x=250, y=125)']);
  });
});
