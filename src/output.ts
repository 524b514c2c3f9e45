import { toCsv } from "./csv.js";
import { isRecord, type JsonRecord } from "./json.js";

export const OUTPUT_FORMATS = ["json", "jsonl", "table", "csv"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Pick specific fields from an object or each object of an array */
export function pickFields(data: unknown, fields: string[]): unknown {
  if (!fields.length) return data;

  const pick = (obj: unknown): unknown => {
    if (!isRecord(obj)) return obj;
    const result: JsonRecord = {};
    for (const f of fields) {
      if (f in obj) result[f] = obj[f];
    }
    return result;
  };

  if (Array.isArray(data)) return data.map(pick);
  return pick(data);
}

export function formatOutput(data: unknown, format: string): string {
  switch (format) {
    case "jsonl":
      if (Array.isArray(data)) return data.map((d) => JSON.stringify(d)).join("\n");
      return JSON.stringify(data);
    case "table":
      return formatTable(data);
    case "csv":
      return formatCsv(data);
    case "json":
    default:
      return JSON.stringify(data, null, 2);
  }
}

function rowsOf(data: unknown): JsonRecord[] | null {
  if (Array.isArray(data)) return data.filter(isRecord);
  if (isRecord(data)) return [data];
  return null;
}

function cell(v: unknown): string {
  if (v === null || v === undefined) return "";
  if (typeof v === "object") return JSON.stringify(v);
  return String(v);
}

function formatTable(data: unknown): string {
  const items = rowsOf(data);
  if (!items) return String(data);
  if (!items.length) return "(no results)";

  const keys = [...new Set(items.flatMap((item) => Object.keys(item)))];

  const widths = keys.map((k) => {
    const vals = items.map((item) => cell(item[k]));
    return Math.min(60, Math.max(k.length, ...vals.map((v) => v.length)));
  });

  const header = keys.map((k, i) => k.padEnd(widths[i])).join("  ");
  const sep = widths.map((w) => "─".repeat(w)).join("──");
  const rows = items.map((item) =>
    keys
      .map((k, i) => {
        const s = cell(item[k]);
        return s.length > widths[i] ? s.slice(0, widths[i] - 1) + "…" : s.padEnd(widths[i]);
      })
      .join("  "),
  );

  return [header, sep, ...rows].join("\n");
}

function formatCsv(data: unknown): string {
  const items = rowsOf(data);
  if (!items) return cell(data);
  const keys = [...new Set(items.flatMap((item) => Object.keys(item)))];
  return toCsv(keys, items.map((item) => keys.map((k) => cell(item[k]))));
}
