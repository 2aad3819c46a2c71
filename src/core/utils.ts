import { isDeepStrictEqual } from "node:util";

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultSessionId(): string {
  return isoNow().replace(/[-:]/g, "").replace("T", "-").slice(0, 15);
}

/** Structural equality: two arrays or plain objects with equal contents are the same value. */
export function valuesEqual(a: unknown, b: unknown): boolean {
  return isDeepStrictEqual(a, b);
}

export function uniqueBy<T>(items: Iterable<T>, key: (item: T) => string): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const item of items) {
    const k = key(item);
    if (seen.has(k)) continue;
    seen.add(k);
    out.push(item);
  }
  return out;
}
