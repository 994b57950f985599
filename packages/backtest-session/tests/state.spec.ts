import { describe, expect, it } from "vitest";
import { createSessionState, symbolsStatus, transitions } from "../src/state";

describe("symbolsStatus", () => {
  it("confirms the exchange a symbol set was loaded for", () => {
    const loaded = transitions.symbolsLoaded(
      transitions.exchangesLoaded(createSessionState(), ["binance", "kraken"]),
      "binance",
      ["BTC/USDT"],
    );

    expect(symbolsStatus(loaded)).toBe("Symbols loaded for binance.");
  });

  it("stays silent once the exchange changes", () => {
    const loaded = transitions.symbolsLoaded(
      transitions.exchangesLoaded(createSessionState(), ["binance", "kraken"]),
      "binance",
      ["BTC/USDT"],
    );

    expect(symbolsStatus(transitions.exchangeSelected(loaded, "kraken"))).toBeNull();
    expect(symbolsStatus(createSessionState())).toBeNull();
  });
});
