export * from "./types/desktopAction.types";
export * from "./types/dialectAction.types";
export * from "./utils/desktopAction.utils";
