import { describe, expect, it } from "vitest";
import { csvDataUri } from "../src/lib/download";

describe("csvDataUri", () => {
  it("percent-encodes the export into a text/csv data uri", () => {
    const uri = csvDataUri({
      filename: "trades_BTCUSDT_20250610.csv",
      content: "symbol,profit_pct\nBTC/USDT,2.5\n",
      mimeType: "text/csv",
    });

    expect(uri).toBe(
      "data:text/csv;charset=utf-8,symbol%2Cprofit_pct%0ABTC%2FUSDT%2C2.5%0A",
    );
  });
});
