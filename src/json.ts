// Narrowing helpers for untyped API JSON.

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Keep only the object elements of an array response; anything else yields [] */
export function records(value: unknown): JsonRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/** String field, or the fallback when missing/null. Numbers are stringified. */
export function str(obj: JsonRecord, key: string, fallback: string): string {
  const v = obj[key];
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return fallback;
}

export function optStr(obj: JsonRecord, key: string): string | undefined {
  const v = obj[key];
  return typeof v === "string" ? v : undefined;
}

export function num(obj: JsonRecord, key: string, fallback = 0): number {
  const v = obj[key];
  return typeof v === "number" && Number.isFinite(v) ? v : fallback;
}

export function optNum(obj: JsonRecord, key: string): number | undefined {
  const v = obj[key];
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function strings(obj: JsonRecord, key: string): string[] {
  const v = obj[key];
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : [];
}

export function record(obj: JsonRecord, key: string): JsonRecord {
  const v = obj[key];
  return isRecord(v) ? v : {};
}
