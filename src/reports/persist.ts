import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { fileTimestamp } from "../format.js";

export function reportFileName(prefix: string, ext: string, now: Date): string {
  return `${prefix}_${fileTimestamp(now)}.${ext}`;
}

export function toJsonFile(data: unknown): string {
  return JSON.stringify(data, null, 2) + "\n";
}

/** Write each `name → contents` pair under `dir` (created if missing); returns the paths */
export async function writeReportFiles(dir: string, files: Record<string, string>): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const written: string[] = [];
  for (const [name, contents] of Object.entries(files)) {
    const path = join(dir, name);
    await writeFile(path, contents);
    written.push(path);
  }
  return written;
}
