import {
  Action,
  ActionType,
  ClickType,
  Step,
  createAction,
  isTerminalAction,
} from '@stepforge/shared';
import {
  COMPUTER_USE_TOOL,
  ToolCallArguments,
  toolCallArgumentsSchema,
  toolCallEnvelopeSchema,
} from './tool-call.schema';

const THINK_PATTERN = /<think>([\s\S]*?)<\/think>/i;
const SUMMARY_PATTERN = /^\s*Action\s*:\s*(.+)$/m;
const TOOL_CALL_PATTERN = /<tool_call>\s*([\s\S]*?)\s*<\/tool_call>/gi;
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

const CLICK_TYPES: readonly ClickType[] = [
  'left_click',
  'right_click',
  'double_click',
  'triple_click',
];

const CLICK_ACTIONS: Record<ClickType, ActionType> = {
  left_click: ActionType.Click,
  right_click: ActionType.RightClick,
  double_click: ActionType.DoubleClick,
  triple_click: ActionType.TripleClick,
};

function isClickType(value: string): value is ClickType {
  return CLICK_TYPES.some((type) => type === value);
}

function asText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined || value === null) {
    return '';
  }
  return String(value);
}

export function coercePositiveInt(value: unknown, fallback = 1): number {
  let parsed: number;
  if (typeof value === 'number' && Number.isFinite(value)) {
    parsed = Math.trunc(value);
  } else if (typeof value === 'string' && INTEGER_PATTERN.test(value)) {
    parsed = parseInt(value, 10);
  } else {
    return fallback;
  }
  return Math.max(parsed, 1);
}

export function coerceFloat(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return fallback;
}

function toInteger(value: unknown): number | null {
  const parsed =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim() !== ''
        ? Number(value)
        : NaN;
  return Number.isFinite(parsed) ? Math.trunc(parsed) : null;
}

export function extractCoords(raw: unknown): [number, number] | null {
  if (!Array.isArray(raw) || raw.length < 2) {
    return null;
  }
  const x = toInteger(raw[0]);
  const y = toInteger(raw[1]);
  return x === null || y === null ? null : [x, y];
}

export function extractKeys(raw: unknown): string[] {
  const tokens = Array.isArray(raw)
    ? raw.map(asText)
    : typeof raw === 'string'
      ? raw.split(/[+,]/)
      : [];
  return tokens.map((key) => key.trim()).filter((key) => key.length > 0);
}

function scrollDirectionAndCount(args: ToolCallArguments): [string, number] {
  let direction = asText(args.direction).trim().toLowerCase();
  const rawCount = args.count ?? 1;
  const signed =
    typeof rawCount === 'number' && Number.isFinite(rawCount)
      ? Math.trunc(rawCount)
      : 1;

  if (direction !== 'up' && direction !== 'down') {
    direction = signed < 0 ? 'down' : 'up';
  }
  return [direction, Math.max(Math.abs(signed), 1)];
}

type ToolCallHandler = (args: ToolCallArguments, count: number) => Action | null;

function pointAction(type: ActionType): ToolCallHandler {
  return (args, count) => {
    const coords = extractCoords(args.coordinate);
    return coords ? createAction(type, `${coords[0]}, ${coords[1]}`, count) : null;
  };
}

const HANDLERS: ReadonlyMap<string, ToolCallHandler> = new Map<
  string,
  ToolCallHandler
>([
  [
    'key',
    (args, count) => {
      const keys = extractKeys(args.keys);
      return keys.length > 0
        ? createAction(ActionType.Hotkey, keys.join('+'), count)
        : null;
    },
  ],
  [
    'type',
    (args, count) => createAction(ActionType.TypeText, asText(args.text), count),
  ],
  ['mouse_move', pointAction(ActionType.MouseMove)],
  ['left_click', pointAction(CLICK_ACTIONS.left_click)],
  ['right_click', pointAction(CLICK_ACTIONS.right_click)],
  ['double_click', pointAction(CLICK_ACTIONS.double_click)],
  ['triple_click', pointAction(CLICK_ACTIONS.triple_click)],
  ['left_click_drag', pointAction(ActionType.ClickDrag)],
  [
    'press_click',
    (args, count) => {
      const coords = extractCoords(args.coordinate);
      const clickType = asText(args.click_type).trim().toLowerCase();
      if (!coords || !isClickType(clickType)) {
        return null;
      }
      const argument = JSON.stringify({
        keys: extractKeys(args.keys),
        click_type: clickType,
        coordinate: coords,
      });
      return createAction(ActionType.PressClick, argument, count);
    },
  ],
  [
    'scroll',
    (args) => {
      const [x, y] = extractCoords(args.coordinate) ?? [500, 500];
      const [direction, count] = scrollDirectionAndCount(args);
      return createAction(ActionType.Scroll, `${x}, ${y}, ${direction}`, count);
    },
  ],
  [
    'wait',
    (args) =>
      createAction(ActionType.Wait, String(coerceFloat(args.time, 1)), 1),
  ],
  [
    'terminate',
    (args) => {
      const status = asText(args.status ?? 'success').trim().toLowerCase();
      return createAction(
        status === 'failure' ? ActionType.Fail : ActionType.Finish,
      );
    },
  ],
]);

export function stripCodeFence(text: string): string {
  let stripped = text.trim();
  if (stripped.startsWith('```')) {
    stripped = stripped.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  }
  return stripped.trim();
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Converts one `<tool_call>` payload into an Action, or null when the
 * payload is malformed, addressed to another tool, or names an unsupported
 * action.
 */
export function parseToolCall(payload: string): Action | null {
  const envelope = toolCallEnvelopeSchema.safeParse(
    parseJson(stripCodeFence(payload)),
  );
  if (!envelope.success) {
    return null;
  }

  const name = (envelope.data.name ?? '').trim();
  if (name && name !== COMPUTER_USE_TOOL) {
    return null;
  }

  const rawArguments =
    typeof envelope.data.arguments === 'string'
      ? parseJson(envelope.data.arguments)
      : envelope.data.arguments;
  const args = toolCallArgumentsSchema.safeParse(rawArguments);
  if (!args.success) {
    return null;
  }

  const actionName = asText(args.data.action).trim().toLowerCase();
  const handler = HANDLERS.get(actionName);
  if (!handler) {
    return null;
  }
  return handler(args.data, coercePositiveInt(args.data.count));
}

export function parseToolCallOutput(raw: string): Step {
  const thinkMatch = THINK_PATTERN.exec(raw);
  let reason = thinkMatch ? thinkMatch[1].trim() : '';
  if (!reason) {
    const summary = SUMMARY_PATTERN.exec(raw);
    reason = summary ? summary[1].trim() : '';
  }

  const actions: Action[] = [];
  for (const match of raw.matchAll(TOOL_CALL_PATTERN)) {
    const action = parseToolCall(match[1]);
    if (action) {
      actions.push(action);
    }
  }

  return { reason, actions, stop: actions.some(isTerminalAction) };
}
