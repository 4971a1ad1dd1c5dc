export { KeypadSession, BUTTON_LABELS, ERROR_DISPLAY } from "./keypad";
export type { KeypadOptions } from "./keypad";
export { formatResult, DEFAULT_FRACTION_DIGITS } from "./format";
