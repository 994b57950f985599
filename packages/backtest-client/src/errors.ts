export type BacktestErrorKind =
  | "exchange-fetch"
  | "symbol-fetch"
  | "backtest-request"
  | "connection"
  | "validation";

/**
 * Base class for every failure the backtest console surfaces to the user.
 * `kind` is the discriminant the UI switches on.
 */
export abstract class BacktestClientError extends Error {
  abstract readonly kind: BacktestErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ExchangeFetchError extends BacktestClientError {
  readonly kind = "exchange-fetch" as const;

  constructor(
    message = "Error fetching exchanges.",
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class SymbolFetchError extends BacktestClientError {
  readonly kind = "symbol-fetch" as const;

  constructor(
    readonly exchange: string,
    message = "Error fetching symbols.",
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The service answered but rejected the run. `message` is the text the
 * service sent, unmodified.
 */
export class BacktestRequestError extends BacktestClientError {
  readonly kind = "backtest-request" as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ConnectionError extends BacktestClientError {
  readonly kind = "connection" as const;

  constructor(
    readonly baseUrl: string,
    options?: { cause?: unknown },
  ) {
    super(`Connection error: ${describeCause(options?.cause)}`, options);
  }
}

export class ValidationError extends BacktestClientError {
  readonly kind = "validation" as const;
}

export type AnyBacktestError =
  | ExchangeFetchError
  | SymbolFetchError
  | BacktestRequestError
  | ConnectionError
  | ValidationError;

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "string" && cause.length > 0) return cause;
  return "unknown transport failure";
}
