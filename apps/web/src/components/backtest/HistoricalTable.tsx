import type { HistoricalCell } from "@repo/backtest-client";
import type { HistoricalView } from "@repo/backtest-session";
import { Collapsible } from "@repo/ui";

function formatCell(cell: HistoricalCell): string {
  if (cell === null) return "";
  return String(cell);
}

export function HistoricalTable({ view }: { view: HistoricalView }) {
  return (
    <Collapsible title="Historical Price and RSI Data">
      {view.kind === "no-data" ? (
        <p className="text-sm text-slate-400">No historical data available.</p>
      ) : (
        <HistoricalRows columns={view.columns} rows={view.rows} />
      )}
    </Collapsible>
  );
}

function HistoricalRows({ columns, rows }: { columns: string[]; rows: HistoricalCell[][] }) {
  return (
    <div className="max-h-96 overflow-auto">
      <table className="min-w-full text-left text-xs">
        <thead>
          <tr className="uppercase tracking-wide text-slate-400">
            {columns.map((column) => (
              <th key={column} className="pb-2 pr-4">
                {column}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row, rowIndex) => (
            <tr key={rowIndex} className="border-t border-white/5 text-slate-300">
              {row.map((cell, cellIndex) => (
                <td key={columns[cellIndex]} className="py-1.5 pr-4 mono">
                  {formatCell(cell)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
