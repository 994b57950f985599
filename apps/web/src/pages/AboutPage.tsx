import { PageHeader, Panel } from "@repo/ui";
import { useAppShellData } from "../components/layout/AppShell";

export function AboutPage() {
  const { settings } = useAppShellData();

  return (
    <div className="space-y-6">
      <PageHeader
        kicker="About"
        title="Trading Strategy Backtester"
        description="A proof-of-concept console for testing algorithmic strategies."
      />
      <Panel className="p-6" heading="Features">
        <ul className="list-disc space-y-1 pl-5 text-sm text-slate-300">
          <li>Traditional and advanced strategies.</li>
          <li>Multi-exchange support with symbol selection.</li>
          <li>Configurable indicators and thresholds.</li>
          <li>Trade tables, charts and CSV export.</li>
        </ul>
        <p className="mt-4 text-xs text-slate-400">
          Backend: <span className="mono">{settings.apiUrl}</span>
        </p>
      </Panel>
    </div>
  );
}
