import { z } from "zod";

/**
 * Strategy variants understood by the backtesting service. The signal math
 * lives entirely on the service; the client only forwards the name.
 */
export const StrategySchema = z.enum([
  "RSI",
  "MA",
  "RAMSEY",
  "KAGE",
  "KITSUNE",
  "RYU",
  "SAKURA",
  "HIKARI",
  "TENSHI",
  "ZEN",
]);
export type Strategy = z.infer<typeof StrategySchema>;

export const TradeTypeSchema = z.enum(["long", "short"]);
export type TradeType = z.infer<typeof TradeTypeSchema>;

export type ExchangeId = string;
export type SymbolId = string;

/**
 * Declared widget bounds. The form clamps to them and `buildBacktestConfig`
 * validates the assembled body against `BacktestConfigSchema`.
 */
export const PARAMETER_RANGES = {
  rsi_period: { min: 2, max: 50, step: 1 },
  buy_threshold: { min: 1, max: 99, step: 1 },
  sell_threshold: { min: 1, max: 99, step: 1 },
  ma_period: { min: 2, max: 100, step: 1 },
} as const;

export type RangedParameter = keyof typeof PARAMETER_RANGES;

const ranged = (name: RangedParameter) =>
  z.number().min(PARAMETER_RANGES[name].min).max(PARAMETER_RANGES[name].max);

/**
 * Body of `POST /trade`. Field names follow the service's snake_case wire
 * format so the object can be serialized as-is.
 */
export const BacktestConfigSchema = z.object({
  exchange: z.string().min(1),
  symbol: z.string().min(1),
  username: z.string(),
  rsi_period: ranged("rsi_period").int(),
  buy_threshold: ranged("buy_threshold"),
  sell_threshold: ranged("sell_threshold"),
  trade_type: TradeTypeSchema,
  strategy: StrategySchema,
  ma_period: ranged("ma_period").int(),
  use_scratch_rsi: z.boolean(),
  use_csv: z.boolean(),
});
export type BacktestConfig = z.infer<typeof BacktestConfigSchema>;

/**
 * A single simulated position. Strategies that do not compute RSI leave the
 * RSI fields out of the payload; they are modeled as `null` here.
 */
export const TradeSchema = z.object({
  symbol: z.string(),
  trade_type: z.string(),
  entry_time: z.string(),
  entry_price: z.number(),
  entry_rsi: z
    .number()
    .nullish()
    .transform((value) => value ?? null),
  exit_time: z.string(),
  exit_price: z.number(),
  exit_rsi: z
    .number()
    .nullish()
    .transform((value) => value ?? null),
  profit_pct: z.number(),
});
export type Trade = z.infer<typeof TradeSchema>;

export const BacktestSummarySchema = z.object({
  total_trades: z.number().int().nonnegative().default(0),
  winning_trades: z.number().int().nonnegative().default(0),
  total_profit_pct: z.number().default(0),
  avg_profit_per_trade: z.number().default(0),
});
export type BacktestSummary = z.infer<typeof BacktestSummarySchema>;

export const EMPTY_SUMMARY: BacktestSummary = {
  total_trades: 0,
  winning_trades: 0,
  total_profit_pct: 0,
  avg_profit_per_trade: 0,
};

export const HistoricalCellSchema = z.union([
  z.number(),
  z.string(),
  z.boolean(),
  z.null(),
]);
export type HistoricalCell = z.infer<typeof HistoricalCellSchema>;

/** One row of price/indicator history; the column set is service-defined. */
export const HistoricalPointSchema = z.record(HistoricalCellSchema);
export type HistoricalPoint = z.infer<typeof HistoricalPointSchema>;

/**
 * Response envelope of `POST /trade`. The service serializes an empty trade
 * list as `null` and omits `data` for most strategies, so every field
 * normalizes to an empty value instead of failing validation.
 */
export const BacktestResultSchema = z.object({
  trades: z
    .array(TradeSchema)
    .nullish()
    .transform((value) => value ?? []),
  data: z
    .array(HistoricalPointSchema)
    .nullish()
    .transform((value) => value ?? []),
  plot: z
    .string()
    .nullish()
    .transform((value) => value ?? ""),
  summary: BacktestSummarySchema.nullish().transform(
    (value) => value ?? EMPTY_SUMMARY,
  ),
});
export type BacktestResult = z.infer<typeof BacktestResultSchema>;
export type BacktestResultInput = z.input<typeof BacktestResultSchema>;

export const ExchangesResponseSchema = z.object({
  exchanges: z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? []),
});

export const SymbolsResponseSchema = z.object({
  exchange: z.string().optional(),
  symbols: z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? []),
});

/**
 * Some strategy failures come back with a success status and an
 * `{ error }` body instead of a result envelope.
 */
export const ServiceErrorSchema = z.object({
  error: z.string(),
});

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug: (msg: string, meta?: Record<string, unknown>) => void;
  info: (msg: string, meta?: Record<string, unknown>) => void;
  warn: (msg: string, meta?: Record<string, unknown>) => void;
  error: (msg: string, meta?: Record<string, unknown>) => void;
}
