import { describe, expect, it } from "vitest";
import {
  DEFAULT_SYMBOL,
  buildBacktestConfig,
  defaultWidgetValues,
} from "../src/config-builder";

describe("buildBacktestConfig", () => {
  it("maps widget values onto the wire format", () => {
    const built = buildBacktestConfig(
      { selectedExchange: "binance", selectedSymbol: "ETH/USDT" },
      {
        ...defaultWidgetValues,
        username: "trader-1",
        rsiPeriod: 21,
        buyThreshold: 25,
        sellThreshold: 75,
        maPeriod: 50,
        tradeType: "short",
        strategy: "KAGE",
        useCsv: true,
      },
    );

    expect(built).toEqual({
      ok: true,
      value: {
        exchange: "binance",
        symbol: "ETH/USDT",
        username: "trader-1",
        rsi_period: 21,
        buy_threshold: 25,
        sell_threshold: 75,
        trade_type: "short",
        strategy: "KAGE",
        ma_period: 50,
        use_scratch_rsi: false,
        use_csv: true,
      },
    });
  });

  it("falls back to BTC/USDT before symbols are fetched", () => {
    const built = buildBacktestConfig(
      { selectedExchange: "binance", selectedSymbol: null },
      defaultWidgetValues,
    );

    expect(built.ok).toBe(true);
    if (!built.ok) return;
    expect(built.value.symbol).toBe(DEFAULT_SYMBOL);
    expect(DEFAULT_SYMBOL).toBe("BTC/USDT");
  });

  it("keeps the RSI fields for strategies that do not use them", () => {
    const built = buildBacktestConfig(
      { selectedExchange: "binance", selectedSymbol: "BTC/USDT" },
      { ...defaultWidgetValues, strategy: "ZEN", useScratchRsi: true },
    );

    expect(built.ok).toBe(true);
    if (!built.ok) return;
    expect(built.value).toMatchObject({
      strategy: "ZEN",
      use_scratch_rsi: true,
      rsi_period: 14,
      buy_threshold: 30,
      sell_threshold: 70,
    });
    expect(Object.keys(built.value)).toHaveLength(11);
  });

  it("requires a selected exchange", () => {
    const built = buildBacktestConfig(
      { selectedExchange: null, selectedSymbol: null },
      defaultWidgetValues,
    );

    expect(built.ok).toBe(false);
    if (built.ok) return;
    expect(built.error.kind).toBe("validation");
    expect(built.error.message).toBe("Select an exchange before running a backtest.");
  });

  it("rejects parameters outside the declared ranges", () => {
    const built = buildBacktestConfig(
      { selectedExchange: "binance", selectedSymbol: "BTC/USDT" },
      { ...defaultWidgetValues, rsiPeriod: 1 },
    );

    expect(built.ok).toBe(false);
    if (built.ok) return;
    expect(built.error.kind).toBe("validation");
    expect(built.error.message).toBe(
      "Invalid rsi_period: Number must be greater than or equal to 2",
    );
  });

  it("rejects a fractional period", () => {
    const built = buildBacktestConfig(
      { selectedExchange: "binance", selectedSymbol: "BTC/USDT" },
      { ...defaultWidgetValues, maPeriod: 20.5 },
    );

    expect(built.ok).toBe(false);
    if (built.ok) return;
    expect(built.error.message).toBe("Invalid ma_period: Expected integer, received float");
  });
});
