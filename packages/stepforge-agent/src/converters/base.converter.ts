import { Logger } from '@nestjs/common';
import { CommandEntry, Coordinates, Screen } from '@stepforge/shared';
import { CapsLockManager } from '../capslock/capslock-manager';
import * as cmd from '../commands/command-builder';
import {
  ConverterConfig,
  DEFAULT_CONVERTER_CONFIG,
} from '../config/converter.config';
import { CoordinateScaler } from '../coordinate-system/coordinate-scaler';
import {
  AllConversionsFailedError,
  ConversionFailure,
  CoordinateRangeError,
  DuplicateTerminalActionError,
  FormatError,
} from '../errors/translation.errors';
import { DisplayConfigurable, Resettable } from './capabilities';
import { SessionState, createSessionState } from './session-state';

/**
 * Working copy of the session state for a single batch.
 */
export interface ConversionContext {
  cursor: Coordinates | null;
  readonly capsLock: CapsLockManager;
}

/**
 * Extent of a dialect's coordinate space.
 */
export interface CoordinateSpace {
  readonly width: number;
  readonly height: number;
}

/**
 * Shared conversion loop for every action dialect.
 *
 * Subclasses describe their coordinate space and convert one action at a
 * time; this class enforces the batch invariants (a single terminal action,
 * repeat expansion, failure aggregation) and owns the session state, which
 * is only replaced once a batch has converted.
 */
export abstract class BaseActionConverter<TAction>
  implements Resettable, DisplayConfigurable
{
  protected readonly logger = new Logger(this.constructor.name);
  protected readonly scaler: CoordinateScaler;
  private sessionState: SessionState;

  protected constructor(
    private readonly space: CoordinateSpace,
    readonly config: ConverterConfig = DEFAULT_CONVERTER_CONFIG,
  ) {
    this.scaler = new CoordinateScaler({
      sourceWidth: space.width,
      sourceHeight: space.height,
      targetWidth: config.targetWidth,
      targetHeight: config.targetHeight,
    });
    this.sessionState = this.initialState();
  }

  get coordWidth(): number {
    return this.space.width;
  }

  get coordHeight(): number {
    return this.space.height;
  }

  // Terminal action names, used in the duplicate-terminal message.
  protected abstract get terminalKinds(): readonly string[];

  protected abstract isTerminal(action: TAction): boolean;

  protected abstract describe(action: TAction): string;

  /**
   * Commands for one action. An empty list marks a no-op.
   */
  protected abstract convertAction(
    action: TAction,
    context: ConversionContext,
  ): string[];

  abstract serializeActions(
    actions: readonly TAction[],
  ): Record<string, unknown>[];

  protected repeatCount(_action: TAction): number {
    return 1;
  }

  protected initialState(): SessionState {
    return createSessionState();
  }

  get state(): SessionState {
    return this.sessionState;
  }

  convert(actions: readonly TAction[]): CommandEntry[] {
    if (actions.length === 0) {
      return [];
    }
    if (actions.filter((action) => this.isTerminal(action)).length > 1) {
      throw new DuplicateTerminalActionError(this.terminalKinds);
    }

    const context: ConversionContext = {
      cursor: this.sessionState.cursor,
      capsLock: new CapsLockManager(
        this.config.capsLockMode,
        this.sessionState.capsLockEnabled,
      ),
    };
    const commands: string[] = [];
    const failures: ConversionFailure[] = [];
    const skipped: string[] = [];

    for (const action of actions) {
      const label = this.describe(action);
      let converted: string[];
      try {
        converted = this.convertAction(action, context);
      } catch (error) {
        if (error instanceof CoordinateRangeError) {
          throw error;
        }
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.error(
          `Failed to convert action: ${label}, error: ${reason}`,
        );
        failures.push({ action: label, reason });
        continue;
      }

      if (converted.length === 0) {
        skipped.push(label);
      } else {
        const repeat = this.repeatCount(action);
        for (let i = 0; i < repeat; i++) {
          commands.push(...converted);
        }
      }

      if (this.isTerminal(action)) {
        context.cursor = this.initialState().cursor;
        context.capsLock.reset();
      }
    }

    if (skipped.length > 0) {
      this.logger.debug(`Skipped no-op actions: ${skipped.join(', ')}`);
    }
    if (commands.length === 0 && failures.length > 0) {
      throw new AllConversionsFailedError(failures, actions.length);
    }

    this.sessionState = Object.freeze({
      cursor: context.cursor,
      capsLockEnabled: context.capsLock.isEnabled,
    });

    return commands.map((command, index) => ({
      command,
      isLast: index === commands.length - 1,
    }));
  }

  reset(): void {
    this.sessionState = this.initialState();
  }

  setTargetScreen(screen: Screen): void {
    this.scaler.setTargetSize(screen.width, screen.height);
    this.scaler.setOrigin(screen.x, screen.y);
    // Cursor positions from the previous display no longer apply.
    this.commitCursor(this.initialState().cursor);
  }

  protected commitCursor(cursor: Coordinates | null): void {
    this.sessionState = Object.freeze({ ...this.sessionState, cursor });
  }

  protected scalePoint(x: number, y: number): Coordinates {
    return this.scaler.scale(x, y, {
      strict: this.config.strictCoordinates,
      preventCornerLock: this.config.preventCornerLock,
    });
  }

  protected targetCenter(): Coordinates {
    const center = this.scaler.center();
    const origin = this.scaler.origin;
    return { x: center.x + origin.x, y: center.y + origin.y };
  }

  protected lastOrCenter(context: ConversionContext): Coordinates {
    return context.cursor ?? this.targetCenter();
  }

  protected hotkeyCommands(
    keys: readonly string[],
    context: ConversionContext,
  ): string[] {
    if (keys.length === 0) {
      throw new FormatError('Hotkey requires at least one key');
    }
    if (keys.length === 1 && keys[0] === 'capslock') {
      if (context.capsLock.shouldDelegateToSystem()) {
        return [cmd.hotkey(keys, this.config.hotkeyInterval)];
      }
      context.capsLock.toggle();
      return [];
    }
    return [cmd.hotkey(keys, this.config.hotkeyInterval)];
  }

  protected typeCommands(text: string, context: ConversionContext): string[] {
    return [cmd.typeText(context.capsLock.transformText(text))];
  }

  protected scrollCommands(point: Coordinates, amount: number): string[] {
    return [cmd.moveTo(point), cmd.scroll(amount)];
  }

  protected dragCommands(start: Coordinates, end: Coordinates): string[] {
    return [cmd.moveTo(start), cmd.dragTo(end, this.config.dragDuration)];
  }
}
