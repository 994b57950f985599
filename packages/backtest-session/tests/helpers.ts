import {
  BacktestResultSchema,
  failure,
  success,
  type BacktestConfig,
  type BacktestRequestError,
  type BacktestResult,
  type BacktestResultInput,
  type ClientResult,
  type ConnectionError,
  type ExchangeFetchError,
  type SymbolFetchError,
  type Trade,
} from "@repo/backtest-client";
import type { BacktestGateway } from "../src/orchestrator";

export function trade(overrides: Partial<Trade> = {}): Trade {
  return {
    symbol: "BTC/USDT",
    trade_type: "long",
    entry_time: "2025-03-01T09:00:00Z",
    entry_price: 100,
    entry_rsi: null,
    exit_time: "2025-03-01T10:00:00Z",
    exit_price: 102.5,
    exit_rsi: null,
    profit_pct: 2.5,
    ...overrides,
  };
}

export function result(input: BacktestResultInput): BacktestResult {
  return BacktestResultSchema.parse(input);
}

type Reply<T, E extends Error> = ClientResult<T, E> | Promise<ClientResult<T, E>>;

type GatewayCall = keyof BacktestGateway;

/**
 * In-process stand-in for the backtest service. Replies are queued per
 * endpoint and every call is recorded. An error set in `throws` makes that
 * call reject instead of replying.
 */
export class FakeGateway implements BacktestGateway {
  exchangeReplies: Reply<string[], ExchangeFetchError>[] = [];
  symbolReplies = new Map<string, Reply<string[], SymbolFetchError>>();
  backtestReplies: Reply<BacktestResult, BacktestRequestError | ConnectionError>[] = [];

  throws: Partial<Record<GatewayCall, Error>> = {};

  exchangeCalls = 0;
  symbolCalls: string[] = [];
  backtestCalls: BacktestConfig[] = [];

  async listExchanges(): Promise<ClientResult<string[], ExchangeFetchError>> {
    this.exchangeCalls += 1;
    this.rejectIfArmed("listExchanges");
    return this.exchangeReplies.shift() ?? success<string[]>([]);
  }

  async listSymbols(exchange: string): Promise<ClientResult<string[], SymbolFetchError>> {
    this.symbolCalls.push(exchange);
    this.rejectIfArmed("listSymbols");
    return this.symbolReplies.get(exchange) ?? success<string[]>([]);
  }

  async runBacktest(
    config: BacktestConfig,
  ): Promise<ClientResult<BacktestResult, BacktestRequestError | ConnectionError>> {
    this.backtestCalls.push(config);
    this.rejectIfArmed("runBacktest");
    const reply = this.backtestReplies.shift();
    if (!reply) throw new Error("no backtest reply queued");
    return reply;
  }

  private rejectIfArmed(call: GatewayCall): void {
    const error = this.throws[call];
    if (error) throw error;
  }
}

export { failure, success };
