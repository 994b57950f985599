import { useState } from "react";
import { defaultWidgetValues, type WidgetValues } from "@repo/backtest-session";
import { PageHeader, Panel } from "@repo/ui";
import { ErrorNotice } from "../components/backtest/ErrorNotice";
import { ParameterSidebar } from "../components/backtest/ParameterSidebar";
import { ResultsView } from "../components/backtest/ResultsView";
import { StrategyOverview } from "../components/backtest/StrategyOverview";
import { useAppShellData } from "../components/layout/AppShell";
import { useBacktestSession } from "../hooks/useBacktestSession";

export function BacktestPage() {
  const { session, settings } = useAppShellData();
  const state = useBacktestSession(session);
  const [widgets, setWidgets] = useState<WidgetValues>(defaultWidgetValues);

  return (
    <div className="space-y-6">
      <PageHeader
        kicker="Backtest Console"
        title="Trading Strategy Backtester"
        description="Replay traditional and advanced strategies against exchange history."
      />

      <div className="grid gap-6 lg:grid-cols-[340px_minmax(0,1fr)]">
        <ParameterSidebar
          state={state}
          widgets={widgets}
          onWidgetsChange={setWidgets}
          onSelectExchange={(exchange) => session.selectExchange(exchange)}
          onSelectSymbol={(symbol) => session.selectSymbol(symbol)}
          onFetchSymbols={() => void session.fetchSymbols()}
          onRetryExchanges={() => void session.start()}
          onSubmit={() => void session.submit(widgets)}
        />

        <main className="min-w-0 space-y-6">
          {state.error ? <ErrorNotice error={state.error} apiUrl={settings.apiUrl} /> : null}

          {state.phase === "backtest-running" ? (
            <Panel className="p-6 text-sm text-slate-300">Running backtest...</Panel>
          ) : null}

          {state.lastRun ? <ResultsView run={state.lastRun} /> : <StrategyOverview />}
        </main>
      </div>
    </div>
  );
}
