import {
  Coordinates,
  WEB_ACTION_KINDS,
  WebAction,
  WebActionKind,
} from '@stepforge/shared';
import * as cmd from '../commands/command-builder';
import {
  ConverterConfig,
  DEFAULT_CONVERTER_CONFIG,
} from '../config/converter.config';
import { FormatError, UnknownActionError } from '../errors/translation.errors';
import { parseHotkey } from '../keys/key-normalizer';
import { BaseActionConverter, ConversionContext } from './base.converter';

export const WEB_COORD_SIZE = 1000;
export const SEARCH_HOME_URL = 'https://www.google.com';

const DOCUMENT_SCROLL_KEYS: ReadonlyMap<string, string> = new Map([
  ['down', 'pagedown'],
  ['up', 'pageup'],
  ['left', 'left'],
  ['right', 'right'],
]);

type WebHandler = (action: WebAction, context: ConversionContext) => string[];

export class WebActionConverter extends BaseActionConverter<WebAction> {
  constructor(config: ConverterConfig = DEFAULT_CONVERTER_CONFIG) {
    super({ width: WEB_COORD_SIZE, height: WEB_COORD_SIZE }, config);
  }

  // Browser sessions never signal completion through an action.
  protected get terminalKinds(): readonly string[] {
    return [];
  }

  protected isTerminal(): boolean {
    return false;
  }

  protected describe(action: WebAction): string {
    return JSON.stringify(action);
  }

  serializeActions(actions: readonly WebAction[]): Record<string, unknown>[] {
    return actions.map((action) => ({
      type: action.action,
      x: action.x ?? null,
      y: action.y ?? null,
      text: action.text ?? null,
      pressEnter: action.pressEnter ?? null,
      clearBeforeTyping: action.clearBeforeTyping ?? null,
      direction: action.direction ?? null,
      magnitude: action.magnitude ?? null,
      destinationX: action.destinationX ?? null,
      destinationY: action.destinationY ?? null,
      keys: action.keys ?? null,
      url: action.url ?? null,
    }));
  }

  private get interval(): number {
    return this.config.hotkeyInterval;
  }

  private readonly handlers: Record<WebActionKind, WebHandler> = {
    open_web_browser: () => [],
    click_at: (action, ctx) => {
      const point = this.pointAt(action.x, action.y, 'click_at');
      ctx.cursor = point;
      return [cmd.click(point)];
    },
    hover_at: (action, ctx) => {
      const point = this.pointAt(action.x, action.y, 'hover_at');
      ctx.cursor = point;
      return [cmd.moveTo(point)];
    },
    type_text_at: (action, ctx) => {
      const point = this.pointAt(action.x, action.y, 'type_text_at');
      if (action.text === undefined) {
        throw new FormatError('text is required for type_text_at');
      }
      ctx.cursor = point;
      const commands = [cmd.click(point)];
      if (action.clearBeforeTyping) {
        commands.push(cmd.hotkey(['ctrl', 'a'], this.interval), cmd.press('delete'));
      }
      commands.push(...this.typeCommands(action.text, ctx));
      if (action.pressEnter) {
        commands.push(cmd.press('enter'));
      }
      return commands;
    },
    scroll_document: (action) => {
      const direction = (action.direction ?? 'down').trim().toLowerCase();
      const key = DOCUMENT_SCROLL_KEYS.get(direction);
      if (!key) {
        throw new FormatError(`Invalid scroll direction: ${direction}`);
      }
      return [cmd.press(key)];
    },
    scroll_at: (action, ctx) => {
      const point = this.pointAt(action.x, action.y, 'scroll_at');
      const direction = (action.direction ?? 'down').trim().toLowerCase();
      const amount =
        action.magnitude !== undefined
          ? Math.max(1, Math.floor(action.magnitude / 100))
          : this.config.scrollAmount;
      if (direction !== 'up' && direction !== 'down') {
        this.logger.debug(
          `Unsupported scroll direction '${direction}', defaulting to down`,
        );
      }
      ctx.cursor = point;
      return this.scrollCommands(point, direction === 'up' ? amount : -amount);
    },
    wait_5_seconds: () => [cmd.wait(5)],
    go_back: () => [cmd.hotkey(['alt', 'left'], this.interval)],
    go_forward: () => [cmd.hotkey(['alt', 'right'], this.interval)],
    search: () => [
      cmd.hotkey(['ctrl', 'l'], this.interval),
      cmd.typeText(SEARCH_HOME_URL),
      cmd.press('enter'),
    ],
    navigate: (action) => {
      if (action.url === undefined) {
        throw new FormatError('url is required for navigate action');
      }
      const url = /^https?:\/\//.test(action.url)
        ? action.url
        : `https://${action.url}`;
      return [
        cmd.hotkey(['ctrl', 'l'], this.interval),
        cmd.hotkey(['ctrl', 'a'], this.interval),
        cmd.typeText(url),
        cmd.press('enter'),
      ];
    },
    key_combination: (action, ctx) => {
      if (action.keys === undefined) {
        throw new FormatError('keys is required for key_combination action');
      }
      const keys = parseHotkey(action.keys.replace(/-/g, '+'), {
        validate: false,
      });
      if (keys.length === 0) {
        throw new FormatError(`Invalid key combination: ${action.keys}`);
      }
      return this.hotkeyCommands(keys, ctx);
    },
    drag_and_drop: (action, ctx) => {
      const start = this.pointAt(action.x, action.y, 'drag_and_drop');
      if (action.destinationX === undefined || action.destinationY === undefined) {
        throw new FormatError(
          'destinationX and destinationY are required for drag_and_drop',
        );
      }
      const end = this.scalePoint(action.destinationX, action.destinationY);
      ctx.cursor = end;
      return this.dragCommands(start, end);
    },
  };

  private readonly dispatch = new Map(Object.entries(this.handlers));

  protected convertAction(
    action: WebAction,
    context: ConversionContext,
  ): string[] {
    const handler = this.dispatch.get(action.action);
    if (!handler) {
      throw new UnknownActionError(action.action, WEB_ACTION_KINDS);
    }
    return handler(action, context);
  }

  private pointAt(
    x: number | undefined,
    y: number | undefined,
    kind: string,
  ): Coordinates {
    if (x === undefined || y === undefined) {
      throw new FormatError(`x and y are required for ${kind}`);
    }
    return this.scalePoint(x, y);
  }
}
