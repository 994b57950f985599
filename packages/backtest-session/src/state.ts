import type {
  AnyBacktestError,
  BacktestConfig,
  BacktestResult,
  ExchangeId,
  SymbolId,
} from "@repo/backtest-client";
import type { ResultView } from "./normalizer";

export type SessionPhase =
  | "idle"
  | "exchanges-loading"
  | "exchanges-ready"
  | "symbols-loading"
  | "symbols-ready"
  | "backtest-running"
  | "backtest-complete"
  | "backtest-failed";

export interface LastRun {
  request: BacktestConfig;
  submittedAt: Date;
  result: BacktestResult;
  view: ResultView;
}

/**
 * Everything one user session knows. Transitions below never mutate a
 * state; they return the next one.
 */
export interface SessionState {
  phase: SessionPhase;
  exchanges: readonly ExchangeId[];
  selectedExchange: ExchangeId | null;
  symbols: readonly SymbolId[];
  /** Exchange the current symbol set was fetched for. */
  symbolsExchange: ExchangeId | null;
  selectedSymbol: SymbolId | null;
  lastRun: LastRun | null;
  error: AnyBacktestError | null;
}

export function createSessionState(): SessionState {
  return {
    phase: "idle",
    exchanges: [],
    selectedExchange: null,
    symbols: [],
    symbolsExchange: null,
    selectedSymbol: null,
    lastRun: null,
    error: null,
  };
}

export function isBusy(state: SessionState): boolean {
  return (
    state.phase === "exchanges-loading" ||
    state.phase === "symbols-loading" ||
    state.phase === "backtest-running"
  );
}

export function hasExchanges(state: SessionState): boolean {
  return state.exchanges.length > 0;
}

/** Confirmation shown once a symbol set is loaded, `null` otherwise. */
export function symbolsStatus(state: SessionState): string | null {
  if (!state.symbolsExchange || state.symbols.length === 0) return null;
  return `Symbols loaded for ${state.symbolsExchange}.`;
}

/** Phase to settle on once an in-flight call has finished. */
function restingPhase(state: SessionState): SessionPhase {
  if (!hasExchanges(state)) return "idle";
  return state.symbols.length > 0 ? "symbols-ready" : "exchanges-ready";
}

export const transitions = {
  exchangesRequested(state: SessionState): SessionState {
    return { ...state, phase: "exchanges-loading", error: null };
  },

  exchangesLoaded(state: SessionState, exchanges: readonly ExchangeId[]): SessionState {
    const next: SessionState = {
      ...state,
      exchanges: [...exchanges],
      selectedExchange: exchanges[0] ?? null,
      symbols: [],
      symbolsExchange: null,
      selectedSymbol: null,
      error: null,
    };
    return { ...next, phase: restingPhase(next) };
  },

  exchangesFailed(state: SessionState, error: AnyBacktestError): SessionState {
    return {
      ...state,
      phase: "idle",
      exchanges: [],
      selectedExchange: null,
      error,
    };
  },

  exchangeSelected(state: SessionState, exchange: ExchangeId): SessionState {
    if (exchange === state.selectedExchange) return { ...state, error: null };

    const next: SessionState = {
      ...state,
      selectedExchange: exchange,
      symbols: [],
      symbolsExchange: null,
      selectedSymbol: null,
      error: null,
    };
    return { ...next, phase: restingPhase(next) };
  },

  symbolsRequested(state: SessionState): SessionState {
    return { ...state, phase: "symbols-loading", error: null };
  },

  /** Replaces the symbol set wholesale; symbols of other exchanges never survive. */
  symbolsLoaded(
    state: SessionState,
    exchange: ExchangeId,
    symbols: readonly SymbolId[],
  ): SessionState {
    const next: SessionState = {
      ...state,
      symbols: [...symbols],
      symbolsExchange: exchange,
      selectedSymbol: symbols[0] ?? null,
      error: null,
    };
    return { ...next, phase: restingPhase(next) };
  },

  symbolsFailed(state: SessionState, error: AnyBacktestError): SessionState {
    const next: SessionState = {
      ...state,
      symbols: [],
      symbolsExchange: null,
      selectedSymbol: null,
      error,
    };
    return { ...next, phase: restingPhase(next) };
  },

  symbolSelected(state: SessionState, symbol: SymbolId): SessionState {
    return { ...state, selectedSymbol: symbol, error: null };
  },

  backtestRequested(state: SessionState): SessionState {
    return { ...state, phase: "backtest-running", error: null };
  },

  backtestSucceeded(state: SessionState, run: LastRun): SessionState {
    return { ...state, phase: "backtest-complete", lastRun: run, error: null };
  },

  /** The previous successful run stays on screen. */
  backtestFailed(state: SessionState, error: AnyBacktestError): SessionState {
    return { ...state, phase: "backtest-failed", error };
  },

  rejected(state: SessionState, error: AnyBacktestError): SessionState {
    return { ...state, error };
  },
};
