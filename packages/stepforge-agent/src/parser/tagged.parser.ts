import {
  Action,
  ActionType,
  Step,
  createAction,
  isTerminalAction,
} from '@stepforge/shared';

const THINK_PATTERN = /<\|think_start\|>([\s\S]*?)<\|think_end\|>/;
const ACTION_PATTERN = /<\|action_start\|>([\s\S]*?)<\|action_end\|>/;
const CALL_PATTERN = /^(\w+)\(([\s\S]*)\)/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

const CALL_NAMES: ReadonlyMap<string, ActionType> = new Map([
  ['click', ActionType.Click],
  ['left_double', ActionType.DoubleClick],
  ['left_triple', ActionType.TripleClick],
  ['right_single', ActionType.RightClick],
  ['drag', ActionType.Drag],
  ['mouse_move', ActionType.MouseMove],
  ['left_click_drag', ActionType.ClickDrag],
  ['press_click', ActionType.PressClick],
  ['hotkey', ActionType.Hotkey],
  ['type', ActionType.TypeText],
  ['scroll', ActionType.Scroll],
  ['wait', ActionType.Wait],
  ['finish', ActionType.Finish],
  ['fail', ActionType.Fail],
  ['call_user', ActionType.CallUser],
]);

/**
 * Splits an action block on `&` outside parentheses. Quotes are not
 * tracked, so `type(a&b)` stays whole but a bare `&` inside quotes at
 * depth zero still splits.
 */
export function splitActions(block: string): string[] {
  const actions: string[] = [];
  let current = '';
  let depth = 0;

  const flush = () => {
    const trimmed = current.trim();
    if (trimmed) {
      actions.push(trimmed);
    }
    current = '';
  };

  for (const ch of block) {
    if (ch === '(') {
      depth += 1;
    } else if (ch === ')') {
      depth -= 1;
    } else if (ch === '&' && depth === 0) {
      flush();
      continue;
    }
    current += ch;
  }
  flush();

  return actions;
}

// hotkey(key, c): the trailing field is a repeat count only when it is an
// integer, so "alt, tab" keeps both keys.
function parseHotkeyCall(argument: string): Action {
  const comma = argument.lastIndexOf(',');
  if (comma >= 0) {
    const tail = argument.slice(comma + 1).trim();
    if (INTEGER_PATTERN.test(tail)) {
      return createAction(
        ActionType.Hotkey,
        argument.slice(0, comma).trim(),
        parseInt(tail, 10),
      );
    }
  }
  return createAction(ActionType.Hotkey, argument.trim());
}

function parseScrollCall(argument: string): Action {
  const fields = argument.split(',');
  if (fields.length < 4) {
    return createAction(ActionType.Scroll, argument);
  }
  const [x, y, direction, rawCount] = fields.map((field) => field.trim());
  const count = INTEGER_PATTERN.test(rawCount) ? parseInt(rawCount, 10) : 1;
  return createAction(ActionType.Scroll, `${x},${y},${direction}`, count);
}

export function parseTaggedAction(text: string): Action | null {
  const match = CALL_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const type = CALL_NAMES.get(match[1].toLowerCase());
  if (type === undefined) {
    return null;
  }

  // Typed text keeps its surrounding whitespace.
  const argument = type === ActionType.TypeText ? match[2] : match[2].trim();

  switch (type) {
    case ActionType.Hotkey:
      return parseHotkeyCall(argument);
    case ActionType.Scroll:
      return parseScrollCall(argument);
    default:
      return createAction(type, argument);
  }
}

export function parseTaggedOutput(raw: string): Step {
  const thinkMatch = THINK_PATTERN.exec(raw);
  const reason = thinkMatch ? thinkMatch[1].trim() : '';

  const actionMatch = ACTION_PATTERN.exec(raw);
  const actions: Action[] = [];
  if (actionMatch) {
    for (const text of splitActions(actionMatch[1].trim())) {
      const action = parseTaggedAction(text);
      if (action) {
        actions.push(action);
      }
    }
  }

  return { reason, actions, stop: actions.some(isTerminalAction) };
}
