export { loadConfig, ConfigError, LOG_LEVELS, MAX_FRACTION_DIGITS } from "./config";
export type { CalculatorConfig, LogLevel } from "./config";
export { createLogger } from "./logger";
export { createProgram, evaluateLine, replayKeys, run } from "./program";
export type { CliContext, CliIO } from "./program";
export { runRepl } from "./repl";
