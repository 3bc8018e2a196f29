import { CursorAction } from '@stepforge/shared';
import {
  AllConversionsFailedError,
  DuplicateTerminalActionError,
} from '../errors/translation.errors';
import { CursorActionConverter } from './cursor.converter';

describe('CursorActionConverter', () => {
  let converter: CursorActionConverter;

  const commandsOf = (...actions: CursorAction[]) =>
    converter.convert(actions).map((entry) => entry.command);

  beforeEach(() => {
    converter = new CursorActionConverter();
  });

  it('starts the cursor at the centre of the display', () => {
    expect(converter.getCursor()).toEqual({ x: 960, y: 540 });
    expect(commandsOf({ action: 'left_click' })).toEqual([
      'mouse.click(x=960, y=540)',
    ]);
  });

  it('truncates fractional grid coordinates before scaling', () => {
    expect(
      commandsOf({ action: 'mouse_move', coordinate: [500.7, 500.2] }),
    ).toEqual(['mouse.moveTo(961, 541)']);
    expect(converter.getCursor()).toEqual({ x: 961, y: 541 });
  });

  it('reuses the running cursor across batches', () => {
    converter.convert([{ action: 'mouse_move', coordinate: [0, 0] }]);

    expect(
      commandsOf({ action: 'double_click' }, { action: 'triple_click' }),
    ).toEqual(['mouse.doubleClick(x=0, y=0)', 'mouse.tripleClick(x=0, y=0)']);
  });

  it('drags from the cursor to the given end point', () => {
    expect(
      commandsOf({ action: 'left_click_drag', coordinate: [999, 999] }),
    ).toEqual(['mouse.moveTo(960, 540)', 'mouse.dragTo(1919, 1079, duration=0.5)']);
    expect(converter.getCursor()).toEqual({ x: 1919, y: 1079 });
  });

  it('scrolls in the direction of the pixel delta', () => {
    expect(
      commandsOf(
        { action: 'scroll', pixels: -120 },
        { action: 'hscroll', coordinate: [0, 0], pixels: 40 },
      ),
    ).toEqual([
      'mouse.moveTo(960, 540)',
      'mouse.scroll(-2)',
      'mouse.moveTo(0, 0)',
      'mouse.hscroll(2)',
    ]);
  });

  it('normalizes key names without rejecting unknown ones', () => {
    expect(commandsOf({ action: 'key', keys: ['Control', 'Alt', 'F13x'] })).toEqual([
      "keyboard.hotkey('ctrl', 'alt', 'f13x', interval=0.1)",
    ]);
  });

  it('terminates with the status the model reported', () => {
    expect(
      commandsOf({ action: 'answer', text: '42' }, { action: 'terminate', status: 'failure' }),
    ).toEqual(['FAIL']);
    expect(commandsOf({ action: 'terminate' })).toEqual(['DONE']);
  });

  it('returns the cursor to the centre after terminating', () => {
    converter.convert([
      { action: 'mouse_move', coordinate: [0, 0] },
      { action: 'terminate', status: 'success' },
    ]);

    expect(converter.getCursor()).toEqual({ x: 960, y: 540 });
  });

  it('allows only one terminate per batch', () => {
    expect(() =>
      converter.convert([{ action: 'terminate' }, { action: 'terminate' }]),
    ).toThrow(DuplicateTerminalActionError);
  });

  it('requires an end point for a drag', () => {
    expect(() => converter.convert([{ action: 'left_click_drag' }])).toThrow(
      AllConversionsFailedError,
    );
  });

  it('accepts cursor feedback from the executor', () => {
    converter.updateCursor(100, 200);

    expect(commandsOf({ action: 'right_click' })).toEqual([
      'mouse.rightClick(x=100, y=200)',
    ]);
  });

  it('recentres on a new display and after a reset', () => {
    converter.updateCursor(5, 5);
    converter.setTargetScreen({
      name: 'left',
      x: -1280,
      y: 0,
      width: 1280,
      height: 1024,
      isPrimary: false,
    });
    expect(converter.getCursor()).toEqual({ x: -640, y: 512 });

    converter.updateCursor(5, 5);
    converter.reset();
    expect(converter.getCursor()).toEqual({ x: -640, y: 512 });
  });
});
