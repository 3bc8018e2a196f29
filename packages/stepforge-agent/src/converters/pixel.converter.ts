import {
  Coordinates,
  PIXEL_ACTION_KINDS,
  PixelAction,
  PixelActionKind,
  Point,
} from '@stepforge/shared';
import * as cmd from '../commands/command-builder';
import {
  ConverterConfig,
  DEFAULT_CONVERTER_CONFIG,
} from '../config/converter.config';
import { FormatError, UnknownActionError } from '../errors/translation.errors';
import { parseHotkey } from '../keys/key-normalizer';
import { BaseActionConverter, ConversionContext } from './base.converter';

export const PIXEL_COORD_WIDTH = 1024;
export const PIXEL_COORD_HEIGHT = 768;

type PixelHandler = (action: PixelAction, context: ConversionContext) => string[];

function required<T>(value: T | undefined, message: string): T {
  if (value === undefined) {
    throw new FormatError(message);
  }
  return value;
}

/**
 * Fixed-resolution pixel dialect (1024x768). Clicks without a coordinate
 * land on the last cursor position.
 */
export class PixelActionConverter extends BaseActionConverter<PixelAction> {
  constructor(config: ConverterConfig = DEFAULT_CONVERTER_CONFIG) {
    super({ width: PIXEL_COORD_WIDTH, height: PIXEL_COORD_HEIGHT }, config);
  }

  protected get terminalKinds(): readonly string[] {
    return ['finish'];
  }

  protected isTerminal(action: PixelAction): boolean {
    return action.action === 'finish';
  }

  protected describe(action: PixelAction): string {
    return JSON.stringify(action);
  }

  serializeActions(actions: readonly PixelAction[]): Record<string, unknown>[] {
    return actions.map((action) => ({
      type: action.action,
      coordinate: action.coordinate ?? null,
      startCoordinate: action.startCoordinate ?? null,
      text: action.text ?? null,
      scrollDirection: action.scrollDirection ?? null,
      scrollAmount: action.scrollAmount ?? null,
      duration: action.duration ?? null,
    }));
  }

  private readonly handlers: Record<PixelActionKind, PixelHandler> = {
    screenshot: () => [],
    cursor_position: () => [],
    mouse_move: (action, ctx) => {
      const point = this.scaleTo(
        required(action.coordinate, 'coordinate is required for mouse_move'),
      );
      ctx.cursor = point;
      return [cmd.moveTo(point)];
    },
    left_click: (action, ctx) => [cmd.click(this.pointOrLast(action, ctx))],
    double_click: (action, ctx) => [
      cmd.click(this.pointOrLast(action, ctx), 'doubleClick'),
    ],
    triple_click: (action, ctx) => [
      cmd.click(this.pointOrLast(action, ctx), 'tripleClick'),
    ],
    right_click: (action, ctx) => [
      cmd.click(this.pointOrLast(action, ctx), 'rightClick'),
    ],
    middle_click: (action, ctx) => [cmd.middleClick(this.pointOrLast(action, ctx))],
    left_click_drag: (action, ctx) => {
      const start = action.startCoordinate
        ? this.scaleTo(action.startCoordinate)
        : this.lastOrCenter(ctx);
      const end = this.scaleTo(
        required(
          action.coordinate,
          'coordinate (end position) is required for left_click_drag',
        ),
      );
      ctx.cursor = end;
      return this.dragCommands(start, end);
    },
    type: (action, ctx) =>
      this.typeCommands(required(action.text, 'text is required for type action'), ctx),
    key: (action, ctx) => {
      const text = required(action.text, 'text is required for key action');
      // Accepts "ctrl+c", "ctrl-c" and "ctrl, c".
      const keys = parseHotkey(text.replace(/-/g, '+'), { validate: false });
      if (keys.length === 0) {
        throw new FormatError(`Invalid key combination: ${text}`);
      }
      return this.hotkeyCommands(keys, ctx);
    },
    scroll: (action, ctx) => {
      const point = this.scaleTo(
        required(action.coordinate, 'coordinate is required for scroll action'),
      );
      const direction = (action.scrollDirection ?? 'down').trim().toLowerCase();
      const amount = action.scrollAmount ?? this.config.scrollAmount;
      if (direction !== 'up' && direction !== 'down') {
        throw new FormatError(`Invalid scroll direction: ${direction}`);
      }
      ctx.cursor = point;
      return this.scrollCommands(point, direction === 'up' ? amount : -amount);
    },
    wait: (action) => [cmd.wait(action.duration ?? this.config.waitDuration)],
    finish: () => {
      this.logger.log('Task completion action -> DONE');
      return [cmd.DONE];
    },
  };

  private readonly dispatch = new Map(Object.entries(this.handlers));

  protected convertAction(
    action: PixelAction,
    context: ConversionContext,
  ): string[] {
    const handler = this.dispatch.get(action.action);
    if (!handler) {
      throw new UnknownActionError(action.action, PIXEL_ACTION_KINDS);
    }
    return handler(action, context);
  }

  private scaleTo([x, y]: Point): Coordinates {
    return this.scalePoint(x, y);
  }

  private pointOrLast(
    action: PixelAction,
    context: ConversionContext,
  ): Coordinates {
    if (!action.coordinate) {
      return this.lastOrCenter(context);
    }
    const point = this.scaleTo(action.coordinate);
    context.cursor = point;
    return point;
  }
}
