import {
  Action,
  ActionType,
  AutomationStep,
  ExecutionStep,
  ShellStep,
  SleepStep,
  TerminalActionType,
} from "../types/desktopAction.types";
import {
  CURSOR_ACTION_KINDS,
  CursorActionKind,
  PIXEL_ACTION_KINDS,
  PixelActionKind,
  WEB_ACTION_KINDS,
  WebActionKind,
} from "../types/dialectAction.types";

const ACTION_TYPES: ReadonlySet<string> = new Set(Object.values(ActionType));

export function isActionType(value: unknown): value is ActionType {
  return typeof value === "string" && ACTION_TYPES.has(value);
}

export function isTerminalActionType(
  type: ActionType,
): type is TerminalActionType {
  return type === ActionType.Finish || type === ActionType.Fail;
}

export function isTerminalAction(action: Action): boolean {
  return isTerminalActionType(action.type);
}

/**
 * Builds an Action, coercing the repeat count to an integer of at least 1.
 */
export function createAction(
  type: ActionType,
  argument = "",
  count = 1,
): Action {
  const repeat = Number.isFinite(count) ? Math.max(1, Math.trunc(count)) : 1;
  return { type, argument, count: repeat };
}

export function describeAction(action: Action): string {
  return `${action.type}(${action.argument})`;
}

/**
 * Type guard factory for dialect action kinds
 */
function createKindGuard<K extends string>(
  kinds: readonly K[],
): (value: unknown) => value is K {
  const known: ReadonlySet<string> = new Set(kinds);
  return (value: unknown): value is K =>
    typeof value === "string" && known.has(value);
}

export const isPixelActionKind =
  createKindGuard<PixelActionKind>(PIXEL_ACTION_KINDS);
export const isWebActionKind = createKindGuard<WebActionKind>(WEB_ACTION_KINDS);
export const isCursorActionKind =
  createKindGuard<CursorActionKind>(CURSOR_ACTION_KINDS);

/**
 * Type guards for execution steps
 */
export const isSleepStep = (step: ExecutionStep): step is SleepStep =>
  step.type === "sleep";
export const isAutomationStep = (
  step: ExecutionStep,
): step is AutomationStep => step.type === "automation";
export const isShellStep = (step: ExecutionStep): step is ShellStep =>
  step.type === "shell";
