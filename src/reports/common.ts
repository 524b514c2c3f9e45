import { ApiError, InputError } from "../errors.js";
import { bytesToHuman } from "../format.js";

export const SECONDS_PER_DAY = 86400;

export interface TrafficTotals {
  sent: number;
  received: number;
  total: number;
  sentHuman: string;
  receivedHuman: string;
  totalHuman: string;
}

export function trafficTotals(sent: number, received: number): TrafficTotals {
  const total = sent + received;
  return {
    sent,
    received,
    total,
    sentHuman: bytesToHuman(sent),
    receivedHuman: bytesToHuman(received),
    totalHuman: bytesToHuman(total),
  };
}

export function sum<T>(items: readonly T[], value: (item: T) => number): number {
  return items.reduce((acc, item) => acc + value(item), 0);
}

export function countBy<T>(items: readonly T[], key: (item: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const k = key(item);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

export function sumBy<T>(items: readonly T[], key: (item: T) => string, value: (item: T) => number): Record<string, number> {
  const totals: Record<string, number> = {};
  for (const item of items) {
    const k = key(item);
    totals[k] = (totals[k] ?? 0) + value(item);
  }
  return totals;
}

/** Entries sorted by value, largest first (ties keep insertion order) */
export function byValueDesc(map: Record<string, number>): [string, number][] {
  return Object.entries(map).sort((a, b) => b[1] - a[1]);
}

export function parsePositiveInt(raw: string | number | undefined, name: string, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  const n = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(n) || n < 1) {
    throw new InputError(`${name} must be a positive integer, got '${raw}'`);
  }
  return n;
}

/** Per-entity failures are skipped; anything that is not an API failure propagates */
export function isSkippable(err: unknown): err is ApiError {
  return err instanceof ApiError;
}
