import { ActionType } from "../types/desktopAction.types";
import {
  createAction,
  describeAction,
  isActionType,
  isAutomationStep,
  isCursorActionKind,
  isPixelActionKind,
  isSleepStep,
  isTerminalAction,
  isWebActionKind,
} from "./desktopAction.utils";

describe("createAction", () => {
  it("defaults to an empty argument and a single repeat", () => {
    expect(createAction(ActionType.Finish)).toEqual({
      type: ActionType.Finish,
      argument: "",
      count: 1,
    });
  });

  it("truncates the repeat count and keeps it at least 1", () => {
    expect(createAction(ActionType.Click, "1, 2", 3.8).count).toBe(3);
    expect(createAction(ActionType.Click, "1, 2", 0).count).toBe(1);
    expect(createAction(ActionType.Click, "1, 2", Number.NaN).count).toBe(1);
  });
});

describe("action helpers", () => {
  it("describes an action as a call", () => {
    expect(describeAction(createAction(ActionType.Hotkey, "ctrl+c"))).toBe(
      "hotkey(ctrl+c)",
    );
  });

  it("recognises terminal actions", () => {
    expect(isTerminalAction(createAction(ActionType.Fail))).toBe(true);
    expect(isTerminalAction(createAction(ActionType.CallUser))).toBe(false);
  });

  it("guards action type names", () => {
    expect(isActionType("double-click")).toBe(true);
    expect(isActionType("toString")).toBe(false);
    expect(isActionType(3)).toBe(false);
  });

  it("guards dialect action kinds", () => {
    expect(isPixelActionKind("cursor_position")).toBe(true);
    expect(isWebActionKind("navigate")).toBe(true);
    expect(isCursorActionKind("hscroll")).toBe(true);
    expect(isCursorActionKind("navigate")).toBe(false);
  });

  it("narrows execution steps", () => {
    expect(isSleepStep({ type: "sleep", parameters: { seconds: 1 } })).toBe(true);
    expect(
      isAutomationStep({ type: "shell", parameters: { command: "ls" } }),
    ).toBe(false);
  });
});
