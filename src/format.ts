const UNITS = ["KB", "MB", "GB", "TB"] as const;

/** 1536 → "1.50 KB"; values under 1024 stay in bytes */
export function bytesToHuman(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(2)} ${UNITS[unit]}`;
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function bytesToMegabytes(bytes: number): number {
  return round2(bytes / (1024 * 1024));
}

const pad = (n: number) => String(n).padStart(2, "0");

/** YYYYMMDD_HHMMSS in local time, for report file names */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** YYYY-MM-DD HH:MM:SS in local time */
export function displayTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** YYYY-MM-DDTHH:MM:SS in local time, without an offset, for report JSON */
export function localIsoTimestamp(date: Date): string {
  return displayTimestamp(date).replace(" ", "T");
}

export function safeFileName(name: string): string {
  return name.replace(/[\\/:*?"<>|\x00-\x1f]/g, "_").trim() || "_";
}

/** Left-aligned fixed-width cell, truncated to the width */
export function fixed(value: string | number, width: number): string {
  return String(value).slice(0, width).padEnd(width);
}
