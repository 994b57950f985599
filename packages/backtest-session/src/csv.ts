import type { Trade } from "@repo/backtest-client";

export const CSV_COLUMNS = [
  "symbol",
  "trade_type",
  "entry_time",
  "entry_price",
  "entry_rsi",
  "exit_time",
  "exit_price",
  "exit_rsi",
  "profit_pct",
] as const satisfies readonly (keyof Trade)[];

export interface CsvExport {
  filename: string;
  content: string;
  mimeType: "text/csv";
}

function escapeCell(value: string | number | null): string {
  if (value === null) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** YYYYMMDD in local time. */
export function formatDateStamp(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}${month}${day}`;
}

export function tradesCsvFilename(symbol: string, submittedAt: Date): string {
  return `trades_${symbol.replace(/\//g, "")}_${formatDateStamp(submittedAt)}.csv`;
}

/**
 * Serializes the trades as returned by the service: `profit_pct` keeps its
 * numeric value, missing RSI values become empty cells.
 */
export function exportTradesCsv(
  trades: readonly Trade[],
  symbol: string,
  submittedAt: Date,
): CsvExport {
  const lines = [CSV_COLUMNS.join(",")];
  for (const trade of trades) {
    lines.push(CSV_COLUMNS.map((column) => escapeCell(trade[column])).join(","));
  }

  return {
    filename: tradesCsvFilename(symbol, submittedAt),
    content: `${lines.join("\n")}\n`,
    mimeType: "text/csv",
  };
}

function splitRecords(content: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let cell = "";
  let quoted = false;

  for (let i = 0; i < content.length; i += 1) {
    const char = content[i];

    if (quoted) {
      if (char === '"' && content[i + 1] === '"') {
        cell += '"';
        i += 1;
      } else if (char === '"') {
        quoted = false;
      } else {
        cell += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      record.push(cell);
      cell = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && content[i + 1] === "\n") i += 1;
      record.push(cell);
      records.push(record);
      record = [];
      cell = "";
    } else {
      cell += char;
    }
  }

  if (cell.length > 0 || record.length > 0) {
    record.push(cell);
    records.push(record);
  }

  return records;
}

function toNumber(value: string | undefined): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

function toOptionalNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === "") return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Reads back a file produced by `exportTradesCsv`. Columns are matched by
 * header name, so reordered files still load.
 */
export function parseTradesCsv(content: string): Trade[] {
  const [header, ...rows] = splitRecords(content);
  if (!header) return [];

  const index = new Map(header.map((name, position) => [name.trim(), position]));
  const cell = (row: string[], column: (typeof CSV_COLUMNS)[number]) => {
    const position = index.get(column);
    return position === undefined ? undefined : row[position];
  };

  return rows
    .filter((row) => row.some((value) => value.length > 0))
    .map((row) => ({
      symbol: cell(row, "symbol") ?? "",
      trade_type: cell(row, "trade_type") ?? "",
      entry_time: cell(row, "entry_time") ?? "",
      entry_price: toNumber(cell(row, "entry_price")),
      entry_rsi: toOptionalNumber(cell(row, "entry_rsi")),
      exit_time: cell(row, "exit_time") ?? "",
      exit_price: toNumber(cell(row, "exit_price")),
      exit_rsi: toOptionalNumber(cell(row, "exit_rsi")),
      profit_pct: toNumber(cell(row, "profit_pct")),
    }));
}
