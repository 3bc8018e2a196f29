import {
  CURSOR_ACTION_KINDS,
  Coordinates,
  CursorAction,
  CursorActionKind,
} from '@stepforge/shared';
import * as cmd from '../commands/command-builder';
import {
  ConverterConfig,
  DEFAULT_CONVERTER_CONFIG,
} from '../config/converter.config';
import { FormatError, UnknownActionError } from '../errors/translation.errors';
import { normalizeKey } from '../keys/key-normalizer';
import { BaseActionConverter, ConversionContext } from './base.converter';
import { SessionState, createSessionState } from './session-state';

export const CURSOR_COORD_SIZE = 999;

type CursorHandler = (
  action: CursorAction,
  context: ConversionContext,
) => string[];

/**
 * Running-cursor dialect on a 0-999 grid. The cursor starts at the centre
 * of the target display and any action without a coordinate reuses it.
 */
export class CursorActionConverter extends BaseActionConverter<CursorAction> {
  constructor(config: ConverterConfig = DEFAULT_CONVERTER_CONFIG) {
    super({ width: CURSOR_COORD_SIZE, height: CURSOR_COORD_SIZE }, config);
  }

  protected get terminalKinds(): readonly string[] {
    return ['terminate'];
  }

  protected isTerminal(action: CursorAction): boolean {
    return action.action === 'terminate';
  }

  protected describe(action: CursorAction): string {
    return JSON.stringify(action);
  }

  protected initialState(): SessionState {
    return createSessionState(this.targetCenter());
  }

  serializeActions(actions: readonly CursorAction[]): Record<string, unknown>[] {
    return actions.map((action) => ({
      type: action.action,
      coordinate: action.coordinate ?? null,
      text: action.text ?? null,
      keys: action.keys ?? null,
      pixels: action.pixels ?? null,
      time: action.time ?? null,
      status: action.status ?? null,
    }));
  }

  getCursor(): Coordinates {
    return this.state.cursor ?? this.targetCenter();
  }

  /**
   * Records where the pointer actually ended up, in target pixels.
   */
  updateCursor(x: number, y: number): void {
    this.commitCursor({ x, y });
  }

  private readonly handlers: Record<CursorActionKind, CursorHandler> = {
    mouse_move: (action, ctx) => [cmd.moveTo(this.pointOrCursor(action, ctx))],
    left_click: (action, ctx) => [cmd.click(this.pointOrCursor(action, ctx))],
    double_click: (action, ctx) => [
      cmd.click(this.pointOrCursor(action, ctx), 'doubleClick'),
    ],
    triple_click: (action, ctx) => [
      cmd.click(this.pointOrCursor(action, ctx), 'tripleClick'),
    ],
    right_click: (action, ctx) => [
      cmd.click(this.pointOrCursor(action, ctx), 'rightClick'),
    ],
    middle_click: (action, ctx) => [
      cmd.middleClick(this.pointOrCursor(action, ctx)),
    ],
    left_click_drag: (action, ctx) => {
      const start = this.lastOrCenter(ctx);
      const end = this.explicitPoint(action);
      if (!end) {
        throw new FormatError(
          'coordinate (end position) is required for left_click_drag',
        );
      }
      ctx.cursor = end;
      return this.dragCommands(start, end);
    },
    type: (action, ctx) => {
      if (action.text === undefined) {
        throw new FormatError('text is required for type action');
      }
      return this.typeCommands(action.text, ctx);
    },
    key: (action, ctx) => {
      if (!action.keys || action.keys.length === 0) {
        throw new FormatError('keys array is required for key action');
      }
      const keys = action.keys
        .map((key) => normalizeKey(key))
        .filter((key) => key.length > 0);
      if (keys.length === 0) {
        throw new FormatError(`Invalid key combination: ${action.keys.join(', ')}`);
      }
      return this.hotkeyCommands(keys, ctx);
    },
    scroll: (action, ctx) => {
      const point = this.pointOrCursor(action, ctx);
      return [cmd.moveTo(point), cmd.scroll(this.scrollAmountFor(action))];
    },
    hscroll: (action, ctx) => {
      const point = this.pointOrCursor(action, ctx);
      return [cmd.moveTo(point), cmd.hscroll(this.scrollAmountFor(action))];
    },
    wait: (action) => [cmd.wait(action.time ?? this.config.waitDuration)],
    terminate: (action) => {
      const status = action.status ?? 'success';
      this.logger.log(`Task terminated with status: ${status}`);
      return [status === 'failure' ? cmd.FAIL : cmd.DONE];
    },
    answer: (action) => {
      this.logger.log(`Model answer: ${action.text ?? ''}`);
      return [];
    },
  };

  private readonly dispatch = new Map(Object.entries(this.handlers));

  protected convertAction(
    action: CursorAction,
    context: ConversionContext,
  ): string[] {
    const handler = this.dispatch.get(action.action);
    if (!handler) {
      throw new UnknownActionError(action.action, CURSOR_ACTION_KINDS);
    }
    return handler(action, context);
  }

  private explicitPoint(action: CursorAction): Coordinates | null {
    const coordinate = action.coordinate;
    if (!coordinate || coordinate.length < 2) {
      return null;
    }
    return this.scalePoint(Math.trunc(coordinate[0]), Math.trunc(coordinate[1]));
  }

  private pointOrCursor(
    action: CursorAction,
    context: ConversionContext,
  ): Coordinates {
    const point = this.explicitPoint(action);
    if (!point) {
      return this.lastOrCenter(context);
    }
    context.cursor = point;
    return point;
  }

  private scrollAmountFor(action: CursorAction): number {
    const amount = this.config.scrollAmount;
    return (action.pixels ?? 0) >= 0 ? amount : -amount;
  }
}
