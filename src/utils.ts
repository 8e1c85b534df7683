import { DateTime } from "luxon";

export function nowLabel(at: DateTime = DateTime.utc()): string {
  return at.toUTC().toFormat("yyyy-MM-dd HH:mm:ss.SSS");
}

export function formatError(message: string, at?: DateTime): string {
  console.error(`[ERROR] ${message}`);
  return `[${nowLabel(at)}] ${message}`;
}

export function courseKey(course: string, period: string): string {
  return `${course} ${period}`;
}

export function slugify(key: string): string {
  const slug = key
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "course";
}

export function parseRunIndex(key: string): number | null {
  if (!/^\d+$/.test(key)) return null;
  const n = Number(key);
  return Number.isSafeInteger(n) && n > 0 ? n : null;
}

export function maxRunIndex(keys: Iterable<string>): number | null {
  let max: number | null = null;
  for (const key of keys) {
    const n = parseRunIndex(key);
    if (n !== null && (max === null || n > max)) max = n;
  }
  return max;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
