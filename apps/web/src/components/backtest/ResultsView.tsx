import { Activity, Download, Percent, Trophy, TrendingUp } from "lucide-react";
import type { LastRun } from "@repo/backtest-session";
import { MetricCard, Notice, Panel, toneForValue } from "@repo/ui";
import { csvDataUri } from "../../lib/download";
import { HistoricalTable } from "./HistoricalTable";
import { TradeTable } from "./TradeTable";

export function ResultsView({ run }: { run: LastRun }) {
  const { view, result } = run;

  return (
    <div className="space-y-6">
      <h2 className="text-2xl font-semibold text-slate-100">{view.title}</h2>

      <section className="grid grid-cols-1 gap-4 sm:grid-cols-2 xl:grid-cols-4">
        <MetricCard
          label="Total Trades"
          value={String(view.summary.totalTrades)}
          icon={<Activity className="h-5 w-5" />}
        />
        <MetricCard
          label="Winning Trades"
          value={view.summary.winningLabel}
          icon={<Trophy className="h-5 w-5" />}
        />
        <MetricCard
          label="Total Return"
          value={view.summary.totalReturn}
          tone={toneForValue(result.summary.total_profit_pct)}
          icon={<TrendingUp className="h-5 w-5" />}
        />
        <MetricCard
          label="Avg. Trade"
          value={view.summary.avgTrade}
          tone={toneForValue(result.summary.avg_profit_per_trade)}
          icon={<Percent className="h-5 w-5" />}
        />
      </section>

      <Panel className="p-5" heading="Price Chart">
        {view.chart.kind === "chart" ? (
          <img
            src={view.chart.dataUrl}
            alt={`Backtest chart for ${run.request.symbol}`}
            className="w-full rounded-xl"
          />
        ) : (
          <p className="text-sm text-slate-400">No plot available.</p>
        )}
      </Panel>

      {view.emptyTradesMessage ? (
        <Notice>{view.emptyTradesMessage}</Notice>
      ) : (
        <TradeTable table={view.trades} />
      )}

      {view.csv ? (
        <a
          href={csvDataUri(view.csv)}
          download={view.csv.filename}
          className="inline-flex items-center gap-2 rounded-lg border border-white/15 bg-white/5 px-4 py-2.5 text-sm font-medium text-slate-200 transition hover:bg-white/10"
        >
          <Download className="h-4 w-4" />
          Download Trades CSV
        </a>
      ) : null}

      <HistoricalTable view={view.historical} />
    </div>
  );
}
