export type CsvValue = string | number | boolean | null | undefined;

function escapeField(value: CsvValue): string {
  if (value === null || value === undefined) return "";
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** RFC 4180 CSV: header line, one line per row, CRLF line endings */
export function toCsv(columns: readonly string[], rows: readonly (readonly CsvValue[])[]): string {
  const lines = [columns, ...rows].map((row) => row.map(escapeField).join(","));
  return lines.join("\r\n") + "\r\n";
}

/** Rows given as objects keyed by column name */
export function recordsToCsv(columns: readonly string[], rows: readonly Record<string, CsvValue>[]): string {
  return toCsv(columns, rows.map((row) => columns.map((c) => row[c])));
}
