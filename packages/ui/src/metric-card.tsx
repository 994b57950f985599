import type { ReactNode } from "react";
import { Panel } from "./panel.js";

export type MetricTone = "neutral" | "positive" | "negative";

export interface MetricCardProps {
  label: string;
  value: string;
  tone?: MetricTone;
  icon?: ReactNode;
}

const toneClassByName: Record<MetricTone, string> = {
  neutral: "text-slate-100",
  positive: "text-emerald-300",
  negative: "text-rose-300",
};

/** Sign of a metric, for coloring returns. */
export function toneForValue(value: number): MetricTone {
  if (value > 0) return "positive";
  if (value < 0) return "negative";
  return "neutral";
}

export function MetricCard({ label, value, tone = "neutral", icon }: MetricCardProps) {
  return (
    <Panel className="p-5" aria-label={label}>
      <div className="flex items-start justify-between gap-3">
        <div>
          <p className="text-xs uppercase tracking-[0.16em] text-slate-400">{label}</p>
          <p className={`mt-2 text-2xl font-semibold ${toneClassByName[tone]}`}>{value}</p>
        </div>
        {icon ? <div className="text-cyan-300/90">{icon}</div> : null}
      </div>
    </Panel>
  );
}
