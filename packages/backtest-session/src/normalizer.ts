import type {
  BacktestConfig,
  BacktestResult,
  BacktestSummary,
  HistoricalCell,
  HistoricalPoint,
  Trade,
} from "@repo/backtest-client";
import { CSV_COLUMNS, exportTradesCsv, type CsvExport } from "./csv";

export const NO_TRADES_MESSAGE = "No trades executed. Adjust parameters.";

export const TRADE_TABLE_COLUMNS = CSV_COLUMNS;
export type TradeTableColumn = (typeof TRADE_TABLE_COLUMNS)[number];

export interface SummaryView {
  totalTrades: number;
  winningTrades: number;
  winRatePct: number;
  winningLabel: string;
  totalReturn: string;
  avgTrade: string;
}

export interface TradeTableRow {
  symbol: string;
  trade_type: string;
  entry_time: string;
  entry_price: number;
  entry_rsi: number | "";
  exit_time: string;
  exit_price: number;
  exit_rsi: number | "";
  profit_pct: string;
}

export interface TradeTable {
  columns: readonly TradeTableColumn[];
  rows: TradeTableRow[];
}

export type ChartView =
  | { kind: "chart"; mimeType: "image/png"; dataUrl: string }
  | { kind: "no-chart" };

export type HistoricalView =
  | { kind: "table"; columns: string[]; rows: HistoricalCell[][] }
  | { kind: "no-data" };

export interface ResultView {
  title: string;
  summary: SummaryView;
  trades: TradeTable;
  emptyTradesMessage: string | null;
  csv: CsvExport | null;
  chart: ChartView;
  historical: HistoricalView;
}

export function formatPct(value: number): string {
  return `${value.toFixed(2)}%`;
}

export function deriveSummaryView(summary: BacktestSummary): SummaryView {
  const winRatePct = Math.floor(
    (summary.winning_trades / Math.max(summary.total_trades, 1)) * 100,
  );

  return {
    totalTrades: summary.total_trades,
    winningTrades: summary.winning_trades,
    winRatePct,
    winningLabel: `${summary.winning_trades} (${winRatePct}%)`,
    totalReturn: formatPct(summary.total_profit_pct),
    avgTrade: formatPct(summary.avg_profit_per_trade),
  };
}

/**
 * Display rows with a fixed column set. Missing RSI values only turn into
 * empty strings here, at the presentation edge.
 */
export function shapeTradeTable(trades: readonly Trade[]): TradeTable {
  return {
    columns: TRADE_TABLE_COLUMNS,
    rows: trades.map((trade) => ({
      symbol: trade.symbol,
      trade_type: trade.trade_type,
      entry_time: trade.entry_time,
      entry_price: trade.entry_price,
      entry_rsi: trade.entry_rsi ?? "",
      exit_time: trade.exit_time,
      exit_price: trade.exit_price,
      exit_rsi: trade.exit_rsi ?? "",
      profit_pct: formatPct(trade.profit_pct),
    })),
  };
}

export function decodeChart(plot: string | null | undefined): ChartView {
  const encoded = plot?.trim() ?? "";
  if (encoded.length === 0) return { kind: "no-chart" };

  return {
    kind: "chart",
    mimeType: "image/png",
    dataUrl: `data:image/png;base64,${encoded}`,
  };
}

export function toHistoricalTable(
  points: readonly HistoricalPoint[] | null | undefined,
): HistoricalView {
  if (!points || points.length === 0) return { kind: "no-data" };

  const columns: string[] = [];
  const seen = new Set<string>();
  for (const point of points) {
    for (const key of Object.keys(point)) {
      if (seen.has(key)) continue;
      seen.add(key);
      columns.push(key);
    }
  }

  return {
    kind: "table",
    columns,
    rows: points.map((point) => columns.map((column) => point[column] ?? null)),
  };
}

export function resultTitle(request: Pick<BacktestConfig, "symbol" | "exchange">): string {
  return `Backtest Results for ${request.symbol} on ${request.exchange}`;
}

export function presentResult(
  result: BacktestResult,
  request: BacktestConfig,
  submittedAt: Date,
): ResultView {
  const hasTrades = result.trades.length > 0;

  return {
    title: resultTitle(request),
    summary: deriveSummaryView(result.summary),
    trades: shapeTradeTable(result.trades),
    emptyTradesMessage: hasTrades ? null : NO_TRADES_MESSAGE,
    csv: hasTrades ? exportTradesCsv(result.trades, request.symbol, submittedAt) : null,
    chart: decodeChart(result.plot),
    historical: toHistoricalTable(result.data),
  };
}
