import type { TradeTable as TradeTableView } from "@repo/backtest-session";
import { Panel } from "@repo/ui";

interface TradeTableProps {
  table: TradeTableView;
}

export function TradeTable({ table }: TradeTableProps) {
  return (
    <Panel className="p-5">
      <h3 className="mb-4 text-lg font-semibold text-slate-100">Trade Details</h3>
      <div className="overflow-x-auto">
        <table className="min-w-full text-left text-sm">
          <thead>
            <tr className="text-xs uppercase tracking-wide text-slate-400">
              {table.columns.map((column) => (
                <th key={column} className="pb-3 pr-4">
                  {column}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {table.rows.map((row, index) => {
              const pnlTone = row.profit_pct.startsWith("-")
                ? "text-rose-300"
                : "text-emerald-300";

              return (
                <tr
                  key={`${row.entry_time}-${index}`}
                  className="border-t border-white/5 text-slate-200"
                >
                  {table.columns.map((column) => (
                    <td
                      key={column}
                      className={`py-3 pr-4 mono ${column === "profit_pct" ? pnlTone : ""}`}
                    >
                      {row[column]}
                    </td>
                  ))}
                </tr>
              );
            })}
          </tbody>
        </table>
      </div>
    </Panel>
  );
}
