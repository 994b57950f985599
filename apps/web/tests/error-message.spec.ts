import { describe, expect, it } from "vitest";
import {
  BacktestRequestError,
  ConnectionError,
  ValidationError,
} from "@repo/backtest-client";
import { describeError } from "../src/lib/error-message";

const apiUrl = "http://127.0.0.1:8080";

describe("describeError", () => {
  it("shows the service message verbatim", () => {
    const described = describeError(
      new BacktestRequestError("strategy error: invalid period", 500),
      apiUrl,
    );

    expect(described).toEqual({
      title: "Backtest failed",
      message: "strategy error: invalid period",
    });
  });

  it("adds a hint naming the backend for connection failures", () => {
    const described = describeError(
      new ConnectionError(apiUrl, { cause: new TypeError("fetch failed") }),
      apiUrl,
    );

    expect(described.title).toBe("Backend unreachable");
    expect(described.message).toBe("Connection error: fetch failed");
    expect(described.hint).toBe("Ensure the backend server is running on http://127.0.0.1:8080.");
  });

  it("labels client-side validation failures", () => {
    const described = describeError(
      new ValidationError("Select an exchange before running a backtest."),
      apiUrl,
    );

    expect(described.title).toBe("Check the parameters");
    expect(described.hint).toBeUndefined();
  });
});
