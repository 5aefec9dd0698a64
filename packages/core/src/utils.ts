export function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  return null;
}

export function asBytes(value: unknown): Uint8Array | null {
  return value instanceof Uint8Array ? value : null;
}

/** First index whose element is not less than `value`. */
export function bisectLeft<T>(items: readonly T[], value: number, key: (item: T) => number): number {
  let lo = 0;
  let hi = items.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const item = items[mid];
    if (item !== undefined && key(item) < value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** First index whose element is greater than `value`. */
export function bisectRight<T>(items: readonly T[], value: number, key: (item: T) => number): number {
  let lo = 0;
  let hi = items.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const item = items[mid];
    if (item !== undefined && value < key(item)) hi = mid;
    else lo = mid + 1;
  }
  return lo;
}

const identity = (value: number): number => value;

/**
 * Inserts `value` into an ascending list of distinct numbers.
 * Returns the insert position, or null when the value was already present.
 */
export function insertDistinct(sorted: number[], value: number): number | null {
  const idx = bisectLeft(sorted, value, identity);
  if (sorted[idx] === value) return null;
  sorted.splice(idx, 0, value);
  return idx;
}
