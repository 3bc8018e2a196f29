export type Point = [number, number];

/**
 * Fixed-resolution pixel dialect. Coordinates are XGA pixels (1024×768).
 */
export const PIXEL_ACTION_KINDS = [
  "screenshot",
  "cursor_position",
  "mouse_move",
  "left_click",
  "double_click",
  "triple_click",
  "right_click",
  "middle_click",
  "left_click_drag",
  "type",
  "key",
  "scroll",
  "wait",
  "finish",
] as const;

export type PixelActionKind = (typeof PIXEL_ACTION_KINDS)[number];

export type PixelAction = {
  action: PixelActionKind;
  coordinate?: Point;
  startCoordinate?: Point;
  text?: string;
  scrollDirection?: string;
  scrollAmount?: number;
  // seconds
  duration?: number;
};

/**
 * Browser-oriented dialect on a 0-1000 grid with high-level navigation verbs.
 */
export const WEB_ACTION_KINDS = [
  "open_web_browser",
  "click_at",
  "hover_at",
  "type_text_at",
  "scroll_document",
  "scroll_at",
  "wait_5_seconds",
  "go_back",
  "go_forward",
  "search",
  "navigate",
  "key_combination",
  "drag_and_drop",
] as const;

export type WebActionKind = (typeof WEB_ACTION_KINDS)[number];

export type WebAction = {
  action: WebActionKind;
  x?: number;
  y?: number;
  text?: string;
  pressEnter?: boolean;
  clearBeforeTyping?: boolean;
  direction?: string;
  magnitude?: number;
  destinationX?: number;
  destinationY?: number;
  keys?: string;
  url?: string;
};

/**
 * Running-cursor dialect on a 0-999 grid. Most actions may omit the
 * coordinate and act at the last known cursor position.
 */
export const CURSOR_ACTION_KINDS = [
  "mouse_move",
  "left_click",
  "double_click",
  "triple_click",
  "right_click",
  "middle_click",
  "left_click_drag",
  "type",
  "key",
  "scroll",
  "hscroll",
  "wait",
  "terminate",
  "answer",
] as const;

export type CursorActionKind = (typeof CURSOR_ACTION_KINDS)[number];

export type CursorAction = {
  action: CursorActionKind;
  coordinate?: number[];
  text?: string;
  keys?: string[];
  pixels?: number;
  // seconds
  time?: number;
  status?: "success" | "failure";
};

export type DialectName = "native" | "pixel" | "web" | "cursor";
