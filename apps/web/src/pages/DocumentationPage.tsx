import { PARAMETER_RANGES } from "@repo/backtest-client";
import { STRATEGIES, STRATEGY_INFO } from "@repo/backtest-session";
import { PageHeader, Panel } from "@repo/ui";

const parameterRows = [
  { name: "RSI Period", range: PARAMETER_RANGES.rsi_period, fallback: 14 },
  { name: "Buy Threshold", range: PARAMETER_RANGES.buy_threshold, fallback: 30 },
  { name: "Sell Threshold", range: PARAMETER_RANGES.sell_threshold, fallback: 70 },
  { name: "MA Period", range: PARAMETER_RANGES.ma_period, fallback: 20 },
];

export function DocumentationPage() {
  return (
    <div className="space-y-6">
      <PageHeader kicker="Guide" title="Documentation" />

      <Panel className="p-6" heading="Trading Strategies">
        <ul className="space-y-2 text-sm text-slate-300">
          {STRATEGIES.map((strategy) => (
            <li key={strategy}>
              <span className="font-medium text-slate-100">{strategy}</span>{" "}
              <span className="text-xs uppercase text-slate-500">
                {STRATEGY_INFO[strategy].family}
              </span>
              <p>{STRATEGY_INFO[strategy].description}</p>
            </li>
          ))}
        </ul>
      </Panel>

      <Panel className="p-6" heading="Parameters">
        <table className="min-w-full text-left text-sm">
          <thead>
            <tr className="text-xs uppercase tracking-wide text-slate-400">
              <th className="pb-2 pr-4">Parameter</th>
              <th className="pb-2 pr-4">Range</th>
              <th className="pb-2">Default</th>
            </tr>
          </thead>
          <tbody>
            {parameterRows.map((row) => (
              <tr key={row.name} className="border-t border-white/5 text-slate-200">
                <td className="py-2 pr-4">{row.name}</td>
                <td className="py-2 pr-4 mono">
                  {row.range.min} to {row.range.max}
                </td>
                <td className="py-2 mono">{row.fallback}</td>
              </tr>
            ))}
          </tbody>
        </table>
        <p className="mt-3 text-xs text-slate-400">
          Every parameter is sent with each run; strategies ignore the ones they do not use.
        </p>
      </Panel>

      <Panel className="p-6" heading="Data Options">
        <ul className="list-disc space-y-1 pl-5 text-sm text-slate-300">
          <li>Live candles from the selected exchange.</li>
          <li>Minute candles from a CSV file on the server, with "Use CSV data".</li>
          <li>Choose the exchange, then fetch its symbols, in the sidebar.</li>
        </ul>
      </Panel>
    </div>
  );
}
