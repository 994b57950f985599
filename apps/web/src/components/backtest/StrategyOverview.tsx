import { STRATEGIES, STRATEGY_INFO } from "@repo/backtest-session";
import { Panel } from "@repo/ui";

export function StrategyOverview() {
  const traditional = STRATEGIES.filter((s) => STRATEGY_INFO[s].family === "traditional");
  const advanced = STRATEGIES.filter((s) => STRATEGY_INFO[s].family === "advanced");

  return (
    <Panel className="space-y-4 p-6">
      <div>
        <h2 className="text-xl font-semibold text-slate-100">Welcome</h2>
        <p className="mt-1 text-sm text-slate-300/90">
          Pick an exchange, fetch its symbols, tune the parameters in the sidebar and press
          "Run Backtest" to replay a strategy over historical candles.
        </p>
      </div>

      <div className="grid gap-4 md:grid-cols-2">
        {[
          { title: "Traditional", items: traditional },
          { title: "Advanced", items: advanced },
        ].map((group) => (
          <div key={group.title}>
            <h3 className="text-xs uppercase tracking-[0.16em] text-cyan-300/80">
              {group.title}
            </h3>
            <ul className="mt-2 space-y-2">
              {group.items.map((strategy) => (
                <li key={strategy} className="text-sm text-slate-300">
                  <span className="font-medium text-slate-100">
                    {STRATEGY_INFO[strategy].label}
                  </span>
                  : {STRATEGY_INFO[strategy].description}
                </li>
              ))}
            </ul>
          </div>
        ))}
      </div>
    </Panel>
  );
}
