export type Coordinates = { x: number; y: number };

export enum ActionType {
  Click = "click",
  DoubleClick = "double-click",
  TripleClick = "triple-click",
  RightClick = "right-click",
  Drag = "drag",
  MouseMove = "mouse-move",
  ClickDrag = "click-drag",
  PressClick = "press-click",
  Hotkey = "hotkey",
  TypeText = "type-text",
  Scroll = "scroll",
  Wait = "wait",
  Finish = "finish",
  Fail = "fail",
  CallUser = "call-user",
}

export type TerminalActionType = ActionType.Finish | ActionType.Fail;

export type ClickType =
  | "left_click"
  | "right_click"
  | "double_click"
  | "triple_click";

export type ScrollDirection = "up" | "down";

// Normalized instruction produced by the output parser. `argument` is a
// positional payload whose encoding depends on `type`:
//   click family / mouse-move / click-drag: "x, y"
//   drag: "x1, y1, x2, y2"
//   scroll: "x, y, direction"
//   hotkey: "ctrl+c"
//   type-text: verbatim text
//   press-click: {"keys":[...],"click_type":"left_click","coordinate":[x,y]}
//   wait: seconds (empty for the configured default)
export type Action = {
  readonly type: ActionType;
  readonly argument: string;
  readonly count: number;
};

export type Step = {
  readonly reason: string;
  readonly actions: readonly Action[];
  readonly stop: boolean;
};

export type ParserMode = "tagged" | "tool-call" | "auto";

export type CapsLockMode = "session" | "system";

export type CommandEntry = {
  command: string;
  isLast: boolean;
};

export type SleepStep = {
  type: "sleep";
  parameters: { seconds: number };
};

export type AutomationStep = {
  type: "automation";
  parameters: { code: string };
};

export type ShellStep = {
  type: "shell";
  parameters: { command: string };
};

export type ExecutionStep = SleepStep | AutomationStep | ShellStep;

export type Screen = {
  name: string;
  x: number;
  y: number;
  width: number;
  height: number;
  isPrimary: boolean;
};
