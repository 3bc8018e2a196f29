import {
  Action,
  ActionType,
  ClickType,
  Coordinates,
  describeAction,
  isTerminalAction,
} from '@stepforge/shared';
import { z } from 'zod';
import * as cmd from '../commands/command-builder';
import {
  ConverterConfig,
  DEFAULT_CONVERTER_CONFIG,
} from '../config/converter.config';
import {
  FormatError,
  UnknownActionError,
} from '../errors/translation.errors';
import { normalizeKey, parseHotkey, validateKeys } from '../keys/key-normalizer';
import { BaseActionConverter, ConversionContext } from './base.converter';

export const NATIVE_COORD_SIZE = 1000;

type NativeHandler = (argument: string, context: ConversionContext) => string[];

const CLICK_COMMANDS: Record<ClickType, cmd.ClickCommand> = {
  left_click: 'click',
  right_click: 'rightClick',
  double_click: 'doubleClick',
  triple_click: 'tripleClick',
};

const pressClickSchema = z.object({
  keys: z.array(z.string()).default([]),
  click_type: z.enum(['left_click', 'right_click', 'double_click', 'triple_click']),
  coordinate: z.tuple([z.number(), z.number()]),
});

const COMBINED_ACTIONS = /\s(?:and|then)\s/i;

function stripParens(argument: string): string {
  return argument.replace(/^[()]+|[()]+$/g, '');
}

function stripQuotes(text: string): string {
  return text.replace(/^["']+|["']+$/g, '');
}

function parseNumber(part: string, onError: () => FormatError): number {
  const trimmed = part.trim();
  const value = trimmed === '' ? NaN : Number(trimmed);
  if (!Number.isFinite(value)) {
    throw onError();
  }
  return value;
}

function rejectCombined(argument: string, kind: string): void {
  if (COMBINED_ACTIONS.test(argument)) {
    throw new FormatError(
      `Invalid ${kind} format: '${argument}'. ` +
        `Cannot combine multiple actions with 'and' or 'then'. ` +
        'Each action must be separate in the action list.',
    );
  }
}

/**
 * Converts the native instruction set, whose coordinates live on a
 * normalized 0-1000 grid.
 */
export class NativeActionConverter extends BaseActionConverter<Action> {
  constructor(config: ConverterConfig = DEFAULT_CONVERTER_CONFIG) {
    super({ width: NATIVE_COORD_SIZE, height: NATIVE_COORD_SIZE }, config);
  }

  protected get terminalKinds(): readonly string[] {
    return [ActionType.Finish, ActionType.Fail];
  }

  protected isTerminal(action: Action): boolean {
    return isTerminalAction(action);
  }

  protected describe(action: Action): string {
    return describeAction(action);
  }

  protected repeatCount(action: Action): number {
    return action.count;
  }

  serializeActions(actions: readonly Action[]): Record<string, unknown>[] {
    return actions.map((action) => ({
      type: action.type,
      argument: action.argument,
      count: action.count,
    }));
  }

  private readonly handlers: Record<ActionType, NativeHandler> = {
    [ActionType.Click]: (arg, ctx) => this.clickAt(arg, ctx, 'click'),
    [ActionType.DoubleClick]: (arg, ctx) => this.clickAt(arg, ctx, 'doubleClick'),
    [ActionType.TripleClick]: (arg, ctx) => this.clickAt(arg, ctx, 'tripleClick'),
    [ActionType.RightClick]: (arg, ctx) => this.clickAt(arg, ctx, 'rightClick'),
    [ActionType.MouseMove]: (arg, ctx) => {
      const point = this.parsePoint(arg, 'mouse move');
      ctx.cursor = point;
      return [cmd.moveTo(point)];
    },
    [ActionType.Drag]: (arg, ctx) => {
      const [start, end] = this.parseDrag(arg);
      ctx.cursor = end;
      return this.dragCommands(start, end);
    },
    [ActionType.ClickDrag]: (arg, ctx) => {
      const start = this.lastOrCenter(ctx);
      const end = this.parsePoint(arg, 'click drag');
      ctx.cursor = end;
      return this.dragCommands(start, end);
    },
    [ActionType.PressClick]: (arg, ctx) => this.pressClick(arg, ctx),
    [ActionType.Hotkey]: (arg, ctx) =>
      this.hotkeyCommands(parseHotkey(arg, { validate: true }), ctx),
    [ActionType.TypeText]: (arg, ctx) => this.typeCommands(arg, ctx),
    [ActionType.Scroll]: (arg, ctx) => this.scrollAt(arg, ctx),
    [ActionType.Wait]: (arg) => [cmd.wait(this.parseWait(arg))],
    [ActionType.Finish]: () => {
      this.logger.log('Task completion action -> DONE');
      return [cmd.DONE];
    },
    [ActionType.Fail]: () => {
      this.logger.log('Task infeasible action -> FAIL');
      return [cmd.FAIL];
    },
    [ActionType.CallUser]: () => {
      this.logger.log('User intervention requested');
      return [];
    },
  };

  private readonly dispatch = new Map(Object.entries(this.handlers));

  protected convertAction(action: Action, context: ConversionContext): string[] {
    const handler = this.dispatch.get(action.type);
    if (!handler) {
      throw new UnknownActionError(action.type, Object.values(ActionType));
    }
    // Typed text keeps its inner whitespace; only the wrapping parentheses
    // and quotes come off.
    const argument =
      action.type === ActionType.TypeText
        ? stripQuotes(stripParens(action.argument))
        : stripParens(action.argument.trim());
    return handler(argument, context);
  }

  private clickAt(
    argument: string,
    context: ConversionContext,
    kind: cmd.ClickCommand,
  ): string[] {
    const point = this.parsePoint(argument, 'click');
    context.cursor = point;
    return [cmd.click(point, kind)];
  }

  private parsePoint(argument: string, kind: string): Coordinates {
    rejectCombined(argument, kind);
    const parts = argument ? argument.split(',') : [];
    if (parts.length < 2) {
      throw new FormatError(
        `Invalid ${kind} coordinate format: '${argument}'. ` +
          "Expected 'x, y' (comma-separated numeric values)",
      );
    }
    const [x, y] = parts.slice(0, 2).map((part) =>
      parseNumber(
        part,
        () =>
          new FormatError(
            `Failed to parse ${kind} coords '${argument}': '${part.trim()}' is not a number. ` +
              "Coordinates must be comma-separated numeric values, e.g. 'click(500, 300)'",
          ),
      ),
    );
    return this.scalePoint(x, y);
  }

  private parseDrag(argument: string): [Coordinates, Coordinates] {
    rejectCombined(argument, 'drag');
    const parts = argument ? argument.split(',') : [];
    if (parts.length !== 4) {
      throw new FormatError(
        `Invalid drag coordinate format: '${argument}'. ` +
          "Expected 'x1, y1, x2, y2' (4 comma-separated numeric values)",
      );
    }
    const [sx, sy, ex, ey] = parts.map((part) =>
      parseNumber(
        part,
        () =>
          new FormatError(
            `Failed to parse drag coords '${argument}': '${part.trim()}' is not a number. ` +
              "Coordinates must be comma-separated numeric values, e.g. 'drag(100, 200, 300, 400)'",
          ),
      ),
    );
    return [this.scalePoint(sx, sy), this.scalePoint(ex, ey)];
  }

  private scrollAt(argument: string, context: ConversionContext): string[] {
    const parts = argument.split(',').map((part) => part.trim());
    if (parts.length !== 3) {
      throw new FormatError(
        `Invalid scroll format: '${argument}'. ` +
          `Expected 'x, y, direction' (3 comma-separated values), got ${parts.length} parts`,
      );
    }
    const invalidCoords = () =>
      new FormatError(
        `Invalid scroll coordinates: '${argument}'. ` +
          "x and y must be numeric values, e.g. 'scroll(500, 300, up)'",
      );
    const point = this.scalePoint(
      parseNumber(parts[0], invalidCoords),
      parseNumber(parts[1], invalidCoords),
    );

    const direction = parts[2].toLowerCase();
    if (direction !== 'up' && direction !== 'down') {
      throw new FormatError(
        `Invalid scroll direction: '${direction}' in '${argument}'. Expected 'up' or 'down'`,
      );
    }

    context.cursor = point;
    const amount = this.config.scrollAmount;
    return this.scrollCommands(point, direction === 'up' ? amount : -amount);
  }

  private parseWait(argument: string): number {
    if (!argument.trim()) {
      return this.config.waitDuration;
    }
    const invalid = () =>
      new FormatError(
        `Invalid wait duration: '${argument}'. Expected non-negative numeric value in seconds, e.g. 'wait(2.0)'`,
      );
    const seconds = parseNumber(argument, invalid);
    if (seconds < 0) {
      throw invalid();
    }
    return seconds;
  }

  private pressClick(argument: string, context: ConversionContext): string[] {
    let payload: unknown;
    try {
      payload = JSON.parse(argument);
    } catch {
      throw new FormatError(`Invalid press_click payload: '${argument}'`);
    }
    const parsed = pressClickSchema.safeParse(payload);
    if (!parsed.success) {
      throw new FormatError(
        `Invalid press_click payload: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'payload'} ${issue.message}`)
          .join(', ')}`,
      );
    }

    const keys = parsed.data.keys
      .map((key) => normalizeKey(key))
      .filter((key) => key.length > 0);
    validateKeys(keys);

    const [x, y] = parsed.data.coordinate;
    const point = this.scalePoint(x, y);
    context.cursor = point;

    return [
      ...keys.map((key) => cmd.keyDown(key)),
      cmd.click(point, CLICK_COMMANDS[parsed.data.click_type]),
      ...[...keys].reverse().map((key) => cmd.keyUp(key)),
    ];
  }
}
