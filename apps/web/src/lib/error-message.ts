import type { AnyBacktestError } from "@repo/backtest-client";

export interface ErrorMessage {
  title: string;
  message: string;
  hint?: string;
}

const titleByKind: Record<AnyBacktestError["kind"], string> = {
  "exchange-fetch": "Exchanges unavailable",
  "symbol-fetch": "Symbols unavailable",
  "backtest-request": "Backtest failed",
  connection: "Backend unreachable",
  validation: "Check the parameters",
};

export function describeError(error: AnyBacktestError, apiUrl: string): ErrorMessage {
  const described: ErrorMessage = {
    title: titleByKind[error.kind],
    message: error.message,
  };

  if (error.kind === "connection") {
    described.hint = `Ensure the backend server is running on ${apiUrl}.`;
  }

  return described;
}
