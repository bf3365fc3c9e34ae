export { ContextWindow, checkPattern, DEFAULT_LOOKBACK_LINES } from "./context-window";
export type { CheckKind, GuardKind } from "./context-window";
