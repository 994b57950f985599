import {
  BacktestConfigSchema,
  ValidationError,
  failure,
  success,
  type BacktestConfig,
  type ClientResult,
  type Strategy,
  type TradeType,
} from "@repo/backtest-client";
import type { SessionState } from "./state";

export const DEFAULT_SYMBOL = "BTC/USDT";

/**
 * Raw values of the parameter widgets. The inputs clamp to
 * `PARAMETER_RANGES`; values that still fall outside are rejected, not
 * clamped.
 */
export interface WidgetValues {
  username: string;
  rsiPeriod: number;
  buyThreshold: number;
  sellThreshold: number;
  maPeriod: number;
  tradeType: TradeType;
  strategy: Strategy;
  useScratchRsi: boolean;
  useCsv: boolean;
}

export const defaultWidgetValues: WidgetValues = {
  username: "default_user",
  rsiPeriod: 14,
  buyThreshold: 30,
  sellThreshold: 70,
  maPeriod: 20,
  tradeType: "long",
  strategy: "RSI",
  useScratchRsi: false,
  useCsv: false,
};

/**
 * Assembles the `POST /trade` body from the current selection and widget
 * values. Every parameter is sent whatever the strategy, and the body must
 * satisfy `BacktestConfigSchema`.
 */
export function buildBacktestConfig(
  state: Pick<SessionState, "selectedExchange" | "selectedSymbol">,
  widgets: WidgetValues,
): ClientResult<BacktestConfig, ValidationError> {
  if (!state.selectedExchange) {
    return failure(
      new ValidationError("Select an exchange before running a backtest."),
    );
  }

  const parsed = BacktestConfigSchema.safeParse({
    exchange: state.selectedExchange,
    symbol: state.selectedSymbol ?? DEFAULT_SYMBOL,
    username: widgets.username,
    rsi_period: widgets.rsiPeriod,
    buy_threshold: widgets.buyThreshold,
    sell_threshold: widgets.sellThreshold,
    trade_type: widgets.tradeType,
    strategy: widgets.strategy,
    ma_period: widgets.maPeriod,
    use_scratch_rsi: widgets.useScratchRsi,
    use_csv: widgets.useCsv,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "config";
    return failure(
      new ValidationError(`Invalid ${field}: ${issue?.message ?? "rejected"}`, {
        cause: parsed.error,
      }),
    );
  }

  return success(parsed.data);
}
