/**
 * `@repo/backtest-client` is the typed HTTP layer for the backtesting
 * service: wire schemas, the three endpoint calls and the error taxonomy
 * the console renders. It holds no session state.
 */
export * from "./types";
export * from "./errors";
export * from "./result";
export * from "./settings";
export * from "./adapters";
export * from "./client";
