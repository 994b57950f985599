import { consoleLogger } from "./adapters";
import {
  BacktestRequestError,
  ConnectionError,
  ExchangeFetchError,
  SymbolFetchError,
} from "./errors";
import { failure, success, type ClientResult } from "./result";
import { DEFAULT_API_URL } from "./settings";
import {
  BacktestResultSchema,
  ExchangesResponseSchema,
  ServiceErrorSchema,
  SymbolsResponseSchema,
  type BacktestConfig,
  type BacktestResult,
  type ExchangeId,
  type Logger,
  type SymbolId,
} from "./types";

export interface BacktestApiClientOptions {
  baseUrl?: string;
  fetchFn?: typeof fetch;
  logger?: Logger;
}

type RawResponse =
  | { kind: "response"; ok: boolean; status: number; text: string }
  | { kind: "transport"; cause: unknown };

type JsonBody = { ok: true; value: unknown } | { ok: false; cause: unknown };

function parseJsonBody(text: string): JsonBody {
  if (text.trim().length === 0) return { ok: true, value: null };
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch (cause) {
    return { ok: false, cause };
  }
}

/**
 * Typed client for the backtesting service. Each call is a single round
 * trip: no retries, no caching, no timeout beyond the transport's own.
 *
 * Recoverable failures never throw; they come back as `{ ok: false }` with
 * one of the error classes from `./errors`.
 */
export class BacktestApiClient {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(options: BacktestApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * `GET /exchanges`
   */
  async listExchanges(): Promise<ClientResult<ExchangeId[], ExchangeFetchError>> {
    const raw = await this.send("/exchanges");

    if (raw.kind === "transport") {
      this.logger.warn("exchange list unreachable", { cause: raw.cause });
      return failure(
        new ExchangeFetchError(undefined, undefined, { cause: raw.cause }),
      );
    }
    if (!raw.ok) {
      this.logger.warn("exchange list rejected", { status: raw.status });
      return failure(new ExchangeFetchError(undefined, raw.status));
    }

    const body = parseJsonBody(raw.text);
    const parsed = ExchangesResponseSchema.safeParse(body.ok ? body.value : null);
    if (!body.ok || !parsed.success) {
      this.logger.warn("exchange list malformed", { status: raw.status });
      return failure(
        new ExchangeFetchError(undefined, raw.status, {
          cause: body.ok ? parsed.error : body.cause,
        }),
      );
    }

    return success(parsed.data.exchanges);
  }

  /**
   * `GET /symbols?exchange=<id>`
   *
   * @throws Error when `exchange` is blank; callers must select an exchange
   * first.
   */
  async listSymbols(
    exchange: ExchangeId,
  ): Promise<ClientResult<SymbolId[], SymbolFetchError>> {
    if (exchange.trim().length === 0) {
      throw new Error("listSymbols requires a non-empty exchange id");
    }

    const params = new URLSearchParams({ exchange });
    const raw = await this.send(`/symbols?${params.toString()}`);

    if (raw.kind === "transport") {
      this.logger.warn("symbol list unreachable", { exchange, cause: raw.cause });
      return failure(
        new SymbolFetchError(exchange, undefined, undefined, { cause: raw.cause }),
      );
    }
    if (!raw.ok) {
      this.logger.warn("symbol list rejected", { exchange, status: raw.status });
      return failure(new SymbolFetchError(exchange, undefined, raw.status));
    }

    const body = parseJsonBody(raw.text);
    const parsed = SymbolsResponseSchema.safeParse(body.ok ? body.value : null);
    if (!body.ok || !parsed.success) {
      this.logger.warn("symbol list malformed", { exchange, status: raw.status });
      return failure(
        new SymbolFetchError(exchange, undefined, raw.status, {
          cause: body.ok ? parsed.error : body.cause,
        }),
      );
    }

    return success(parsed.data.symbols);
  }

  /**
   * `POST /trade`
   *
   * The config is sent exactly as given, every field included, whatever the
   * strategy; the service ignores parameters a strategy does not use.
   */
  async runBacktest(
    config: BacktestConfig,
  ): Promise<ClientResult<BacktestResult, BacktestRequestError | ConnectionError>> {
    this.logger.info("submitting backtest", {
      exchange: config.exchange,
      symbol: config.symbol,
      strategy: config.strategy,
    });

    const raw = await this.send("/trade", {
      method: "POST",
      body: JSON.stringify(config),
      headers: {
        "content-type": "application/json",
      },
    });

    if (raw.kind === "transport") {
      this.logger.error("backtest service unreachable", {
        baseUrl: this.baseUrl,
        cause: raw.cause,
      });
      return failure(new ConnectionError(this.baseUrl, { cause: raw.cause }));
    }

    if (!raw.ok) {
      this.logger.warn("backtest rejected", { status: raw.status });
      const message = raw.text.length > 0 ? raw.text : `HTTP ${raw.status}`;
      return failure(new BacktestRequestError(message, raw.status));
    }

    const body = parseJsonBody(raw.text);
    if (!body.ok) {
      return failure(
        new BacktestRequestError("Malformed backtest response", raw.status, {
          cause: body.cause,
        }),
      );
    }

    const serviceError = ServiceErrorSchema.safeParse(body.value);
    if (serviceError.success) {
      this.logger.warn("backtest returned an error payload", {
        status: raw.status,
        error: serviceError.data.error,
      });
      return failure(new BacktestRequestError(serviceError.data.error, raw.status));
    }

    const parsed = BacktestResultSchema.safeParse(body.value);
    if (!parsed.success) {
      this.logger.warn("backtest response malformed", {
        issues: parsed.error.issues.length,
      });
      return failure(
        new BacktestRequestError("Malformed backtest response", raw.status, {
          cause: parsed.error,
        }),
      );
    }

    this.logger.info("backtest completed", {
      trades: parsed.data.trades.length,
    });
    return success(parsed.data);
  }

  private async send(path: string, init?: RequestInit): Promise<RawResponse> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug("request", { method: init?.method ?? "GET", url });

    try {
      const response = await this.fetchFn(url, init);
      const text = await response.text();
      return { kind: "response", ok: response.ok, status: response.status, text };
    } catch (cause) {
      return { kind: "transport", cause };
    }
  }
}
