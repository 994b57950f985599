import { describe, expect, it } from "vitest";
import { silentLogger } from "../src/adapters";
import { BacktestApiClient } from "../src/client";
import {
  BacktestRequestError,
  ConnectionError,
  ExchangeFetchError,
  SymbolFetchError,
} from "../src/errors";
import type { BacktestConfig } from "../src/types";

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

const config: BacktestConfig = {
  exchange: "binance",
  symbol: "ETH/USDT",
  username: "default_user",
  rsi_period: 14,
  buy_threshold: 30,
  sell_threshold: 70,
  trade_type: "long",
  strategy: "KAGE",
  ma_period: 20,
  use_scratch_rsi: false,
  use_csv: false,
};

describe("backtest api client", () => {
  it("lists exchanges from the service", async () => {
    let requestedUrl = "";
    const client = new BacktestApiClient({
      baseUrl: "http://backtest.test/",
      logger: silentLogger,
      fetchFn: async (input) => {
        requestedUrl = String(input);
        return jsonResponse({ exchanges: ["binance", "kraken"] });
      },
    });

    const result = await client.listExchanges();

    expect(requestedUrl).toBe("http://backtest.test/exchanges");
    expect(result).toEqual({ ok: true, value: ["binance", "kraken"] });
  });

  it("maps a non-200 exchange response to ExchangeFetchError", async () => {
    const client = new BacktestApiClient({
      logger: silentLogger,
      fetchFn: async () => new Response("boom", { status: 503 }),
    });

    const result = await client.listExchanges();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ExchangeFetchError);
    expect(result.error.status).toBe(503);
    expect(result.error.message).toBe("Error fetching exchanges.");
  });

  it("maps an unreachable exchange endpoint to ExchangeFetchError with the cause", async () => {
    const cause = new TypeError("fetch failed");
    const client = new BacktestApiClient({
      logger: silentLogger,
      fetchFn: async () => {
        throw cause;
      },
    });

    const result = await client.listExchanges();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("exchange-fetch");
    expect(result.error.cause).toBe(cause);
  });

  it("encodes the exchange when listing symbols", async () => {
    let requestedUrl = "";
    const client = new BacktestApiClient({
      baseUrl: "http://backtest.test",
      logger: silentLogger,
      fetchFn: async (input) => {
        requestedUrl = String(input);
        return jsonResponse({ exchange: "binance", symbols: ["BTC/USDT", "ETH/USDT"] });
      },
    });

    const result = await client.listSymbols("binance us");

    expect(requestedUrl).toBe("http://backtest.test/symbols?exchange=binance+us");
    expect(result).toEqual({ ok: true, value: ["BTC/USDT", "ETH/USDT"] });
  });

  it("reads a null symbol list as an empty one", async () => {
    const client = new BacktestApiClient({
      logger: silentLogger,
      fetchFn: async () => jsonResponse({ exchange: "kraken", symbols: null }),
    });

    const result = await client.listSymbols("kraken");

    expect(result).toEqual({ ok: true, value: [] });
  });

  it("reads a null exchange list as an empty one", async () => {
    const client = new BacktestApiClient({
      logger: silentLogger,
      fetchFn: async () => jsonResponse({ exchanges: null }),
    });

    const result = await client.listExchanges();

    expect(result).toEqual({ ok: true, value: [] });
  });

  it("returns SymbolFetchError naming the exchange on failure", async () => {
    const client = new BacktestApiClient({
      logger: silentLogger,
      fetchFn: async () => jsonResponse({ error: "unsupported" }, 400),
    });

    const result = await client.listSymbols("kraken");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SymbolFetchError);
    expect(result.error.exchange).toBe("kraken");
    expect(result.error.status).toBe(400);
  });

  it("rejects a blank exchange before any request", async () => {
    let calls = 0;
    const client = new BacktestApiClient({
      logger: silentLogger,
      fetchFn: async () => {
        calls += 1;
        return jsonResponse({ symbols: [] });
      },
    });

    await expect(client.listSymbols("  ")).rejects.toThrow(
      "listSymbols requires a non-empty exchange id",
    );
    expect(calls).toBe(0);
  });

  it("posts the full config and normalizes the result envelope", async () => {
    let method = "";
    let body = "";
    const client = new BacktestApiClient({
      baseUrl: "http://backtest.test",
      logger: silentLogger,
      fetchFn: async (_input, init) => {
        method = init?.method ?? "GET";
        body = String(init?.body ?? "");
        return jsonResponse({
          trades: [
            {
              symbol: "ETH/USDT",
              trade_type: "long",
              entry_time: "2025-01-02T10:00:00Z",
              entry_price: 3300,
              exit_time: "2025-01-02T11:00:00Z",
              exit_price: 3333,
              profit_pct: 1,
            },
          ],
          plot: "iVBORw0KGgo=",
          summary: {
            total_trades: 1,
            winning_trades: 1,
            total_profit_pct: 1,
            avg_profit_per_trade: 1,
          },
        });
      },
    });

    const result = await client.runBacktest(config);

    expect(method).toBe("POST");
    expect(JSON.parse(body)).toEqual(config);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.trades[0]?.entry_rsi).toBeNull();
    expect(result.value.trades[0]?.exit_rsi).toBeNull();
    expect(result.value.data).toEqual([]);
    expect(result.value.plot).toBe("iVBORw0KGgo=");
  });

  it("treats a null trade list as an empty successful run", async () => {
    const client = new BacktestApiClient({
      logger: silentLogger,
      fetchFn: async () =>
        jsonResponse({
          trades: null,
          plot: "",
          summary: {
            total_trades: 0,
            winning_trades: 0,
            total_profit_pct: 0,
            avg_profit_per_trade: 0,
          },
        }),
    });

    const result = await client.runBacktest(config);

    expect(result).toEqual({
      ok: true,
      value: {
        trades: [],
        data: [],
        plot: "",
        summary: {
          total_trades: 0,
          winning_trades: 0,
          total_profit_pct: 0,
          avg_profit_per_trade: 0,
        },
      },
    });
  });

  it("surfaces the raw body of a failed run verbatim", async () => {
    const client = new BacktestApiClient({
      logger: silentLogger,
      fetchFn: async () =>
        new Response("strategy error: invalid period", { status: 500 }),
    });

    const result = await client.runBacktest(config);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(BacktestRequestError);
    expect(result.error.message).toBe("strategy error: invalid period");
  });

  it("falls back to the status when a failed run has no body", async () => {
    const client = new BacktestApiClient({
      logger: silentLogger,
      fetchFn: async () => new Response("", { status: 502 }),
    });

    const result = await client.runBacktest(config);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("HTTP 502");
  });

  it("treats an error payload with a success status as a rejected run", async () => {
    const client = new BacktestApiClient({
      logger: silentLogger,
      fetchFn: async () =>
        jsonResponse({ error: "RSI/MA-based strategies not implemented." }),
    });

    const result = await client.runBacktest({ ...config, strategy: "RSI" });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("backtest-request");
    expect(result.error.message).toBe("RSI/MA-based strategies not implemented.");
  });

  it("reports a malformed envelope as a rejected run", async () => {
    const client = new BacktestApiClient({
      logger: silentLogger,
      fetchFn: async () => jsonResponse({ trades: "nope" }),
    });

    const result = await client.runBacktest(config);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("Malformed backtest response");
  });

  it("returns ConnectionError when the service is unreachable", async () => {
    const client = new BacktestApiClient({
      baseUrl: "http://127.0.0.1:8080",
      logger: silentLogger,
      fetchFn: async () => {
        throw new TypeError("fetch failed");
      },
    });

    const result = await client.runBacktest(config);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConnectionError);
    expect(result.error.message).toBe("Connection error: fetch failed");
    if (result.error instanceof ConnectionError) {
      expect(result.error.baseUrl).toBe("http://127.0.0.1:8080");
    }
  });
});
