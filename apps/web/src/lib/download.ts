import type { CsvExport } from "@repo/backtest-session";

/** `href` for a download link carrying the export inline. */
export function csvDataUri(csv: CsvExport): string {
  return `data:${csv.mimeType};charset=utf-8,${encodeURIComponent(csv.content)}`;
}
