import {
  BacktestRequestError,
  ExchangeFetchError,
  SymbolFetchError,
  ValidationError,
  createConsoleLogger,
  describeCause,
  failure,
  systemClock,
  type BacktestApiClient,
  type ClientResult,
  type ExchangeId,
  type Logger,
  type SymbolId,
} from "@repo/backtest-client";
import { buildBacktestConfig, type WidgetValues } from "./config-builder";
import { presentResult } from "./normalizer";
import {
  createSessionState,
  isBusy,
  transitions,
  type SessionState,
} from "./state";

/** The three service calls the session depends on. */
export type BacktestGateway = Pick<
  BacktestApiClient,
  "listExchanges" | "listSymbols" | "runBacktest"
>;

export interface BacktestSessionOptions {
  gateway: BacktestGateway;
  logger?: Logger;
  clock?: () => Date;
  initialState?: SessionState;
}

export type SessionListener = (state: SessionState) => void;

/**
 * Drives one user session through exchange discovery, symbol discovery and
 * backtest submission. It is the only writer of the session state.
 *
 * At most one call is in flight: any action issued meanwhile is ignored and
 * resolves to the current state. A gateway call that throws is recorded as
 * that endpoint's failure, so the session always leaves its loading phase.
 */
export class BacktestSession {
  private state: SessionState;
  private readonly listeners = new Set<SessionListener>();
  private readonly gateway: BacktestGateway;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: BacktestSessionOptions) {
    this.gateway = options.gateway;
    this.logger = options.logger ?? createConsoleLogger("backtest-session");
    this.clock = options.clock ?? systemClock;
    this.state = options.initialState ?? createSessionState();
  }

  getState = (): SessionState => this.state;

  subscribe = (listener: SessionListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Loads the exchange list. Runs once per session; after a failure it may
   * be called again.
   */
  async start(): Promise<SessionState> {
    if (this.guardBusy("start")) return this.state;
    if (this.state.exchanges.length > 0) return this.state;

    this.commit(transitions.exchangesRequested(this.state));
    const result = await this.attempt(
      "listExchanges",
      () => this.gateway.listExchanges(),
      (cause) => new ExchangeFetchError(undefined, undefined, { cause }),
    );

    if (!result.ok) {
      this.logger.error("exchange discovery failed", { error: result.error.message });
      return this.commit(transitions.exchangesFailed(this.state, result.error));
    }

    this.logger.info("exchanges loaded", { count: result.value.length });
    return this.commit(transitions.exchangesLoaded(this.state, result.value));
  }

  selectExchange(exchange: ExchangeId): SessionState {
    if (this.guardBusy("selectExchange")) return this.state;

    if (!this.state.exchanges.includes(exchange)) {
      return this.commit(
        transitions.rejected(
          this.state,
          new ValidationError(`Unknown exchange "${exchange}".`),
        ),
      );
    }

    return this.commit(transitions.exchangeSelected(this.state, exchange));
  }

  async fetchSymbols(): Promise<SessionState> {
    if (this.guardBusy("fetchSymbols")) return this.state;

    const exchange = this.state.selectedExchange;
    if (!exchange || exchange.trim().length === 0) {
      return this.commit(
        transitions.rejected(
          this.state,
          new ValidationError("Select an exchange before fetching symbols."),
        ),
      );
    }

    this.commit(transitions.symbolsRequested(this.state));
    const result = await this.attempt(
      "listSymbols",
      () => this.gateway.listSymbols(exchange),
      (cause) => new SymbolFetchError(exchange, undefined, undefined, { cause }),
    );

    if (!result.ok) {
      this.logger.warn("symbol discovery failed", { exchange });
      return this.commit(transitions.symbolsFailed(this.state, result.error));
    }

    this.logger.info("symbols loaded", { exchange, count: result.value.length });
    return this.commit(transitions.symbolsLoaded(this.state, exchange, result.value));
  }

  selectSymbol(symbol: SymbolId): SessionState {
    if (this.guardBusy("selectSymbol")) return this.state;

    if (!this.state.symbols.includes(symbol)) {
      return this.commit(
        transitions.rejected(
          this.state,
          new ValidationError(`Unknown symbol "${symbol}".`),
        ),
      );
    }

    return this.commit(transitions.symbolSelected(this.state, symbol));
  }

  /**
   * Submits a backtest built from the current selection and `widgets`. A
   * failure keeps the last successful run in `lastRun`.
   */
  async submit(widgets: WidgetValues, submittedAt?: Date): Promise<SessionState> {
    if (this.guardBusy("submit")) return this.state;

    const built = buildBacktestConfig(this.state, widgets);
    if (!built.ok) {
      return this.commit(transitions.rejected(this.state, built.error));
    }

    const request = built.value;
    const at = submittedAt ?? this.clock();

    this.commit(transitions.backtestRequested(this.state));
    const result = await this.attempt(
      "runBacktest",
      () => this.gateway.runBacktest(request),
      (cause) => new BacktestRequestError(describeCause(cause), undefined, { cause }),
    );

    if (!result.ok) {
      this.logger.warn("backtest failed", {
        kind: result.error.kind,
        error: result.error.message,
      });
      return this.commit(transitions.backtestFailed(this.state, result.error));
    }

    return this.commit(
      transitions.backtestSucceeded(this.state, {
        request,
        submittedAt: at,
        result: result.value,
        view: presentResult(result.value, request, at),
      }),
    );
  }

  private async attempt<T, E extends Error>(
    action: string,
    call: () => Promise<ClientResult<T, E>>,
    onThrow: (cause: unknown) => E,
  ): Promise<ClientResult<T, E>> {
    try {
      return await call();
    } catch (cause) {
      this.logger.error("gateway call threw", { action, error: describeCause(cause) });
      return failure(onThrow(cause));
    }
  }

  private guardBusy(action: string): boolean {
    if (!isBusy(this.state)) return false;
    this.logger.debug("ignored while a call is in flight", {
      action,
      phase: this.state.phase,
    });
    return true;
  }

  private commit(next: SessionState): SessionState {
    this.state = next;
    for (const listener of this.listeners) {
      listener(next);
    }
    return next;
  }
}
