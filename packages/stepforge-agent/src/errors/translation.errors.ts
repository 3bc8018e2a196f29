export type TranslationErrorCode =
  | 'FORMAT_ERROR'
  | 'UNKNOWN_ACTION'
  | 'COORDINATE_RANGE'
  | 'DUPLICATE_TERMINAL_ACTION'
  | 'ALL_CONVERSIONS_FAILED'
  | 'INVALID_KEY';

export abstract class TranslationError extends Error {
  abstract readonly code: TranslationErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class FormatError extends TranslationError {
  readonly code = 'FORMAT_ERROR';
}

export class UnknownActionError extends TranslationError {
  readonly code = 'UNKNOWN_ACTION';

  constructor(
    public readonly actionName: string,
    supported: readonly string[],
  ) {
    super(
      `Unknown action type: '${actionName}'. Supported: ${supported.join(', ')}`,
    );
  }
}

export class CoordinateRangeError extends TranslationError {
  readonly code = 'COORDINATE_RANGE';

  constructor(
    public readonly axis: 'x' | 'y',
    public readonly value: number,
    public readonly max: number,
  ) {
    super(
      `${axis} coordinate ${value} out of valid range [0, ${max}]. ` +
        `Coordinates must be normalized between 0 and ${max}.`,
    );
  }
}

export class DuplicateTerminalActionError extends TranslationError {
  readonly code = 'DUPLICATE_TERMINAL_ACTION';

  constructor(terminals: readonly string[]) {
    super(
      `Duplicate ${terminals.join('/')} detected. ` +
        `Only one ${terminals.join(' or ')} is allowed per action sequence.`,
    );
  }
}

export interface ConversionFailure {
  action: string;
  reason: string;
}

export class AllConversionsFailedError extends TranslationError {
  readonly code = 'ALL_CONVERSIONS_FAILED';

  constructor(
    public readonly failures: readonly ConversionFailure[],
    total: number,
  ) {
    super(
      `All action conversions failed (${failures.length}/${total}): ` +
        failures.map((f) => `${f.action}: ${f.reason}`).join('; '),
    );
  }
}

export class InvalidKeyError extends TranslationError {
  readonly code = 'INVALID_KEY';

  constructor(
    public readonly invalidKeys: readonly string[],
    suggestions: readonly string[],
  ) {
    super(`Invalid key name(s) in hotkey: ${suggestions.join(', ')}`);
  }
}
