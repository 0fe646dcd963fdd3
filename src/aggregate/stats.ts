import { EmptyInputError } from "../utils/errors.js";
import type { BucketCount, ModelUsage } from "../summary/types.js";

function compareKeys(a: number | string, b: number | string): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = String(a);
  const right = String(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/** Counts events and tokens per bucket key. */
export class BucketTally<K extends number | string> {
  private readonly counts = new Map<K, { events: number; tokens: number }>();

  add(key: K, tokens: number): void {
    const entry = this.counts.get(key);
    if (entry) {
      entry.events += 1;
      entry.tokens += tokens;
    } else {
      this.counts.set(key, { events: 1, tokens });
    }
  }

  get size(): number {
    return this.counts.size;
  }

  /**
   * Buckets in ascending key order. With `keys`, every listed key appears,
   * zero-filled when nothing landed in it.
   */
  list(keys?: readonly K[]): BucketCount<K>[] {
    const order = keys ?? [...this.counts.keys()].sort(compareKeys);
    return order.map((key) => {
      const entry = this.counts.get(key);
      return { key, events: entry?.events ?? 0, tokens: entry?.tokens ?? 0 };
    });
  }
}

/** The bucket with the most events; ties go to the lowest key. */
export function pickPeak<K extends number | string>(
  buckets: readonly BucketCount<K>[],
): BucketCount<K> {
  let peak: BucketCount<K> | undefined;
  for (const bucket of buckets) {
    if (
      !peak ||
      bucket.events > peak.events ||
      (bucket.events === peak.events && compareKeys(bucket.key, peak.key) < 0)
    ) {
      peak = bucket;
    }
  }
  if (!peak) throw new EmptyInputError();
  return peak;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) throw new EmptyInputError();
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/** Order-statistic median; even-length input averages the two middle values. */
export function median(values: readonly number[]): number {
  if (values.length === 0) throw new EmptyInputError();
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? 0;
  return (lower + upper) / 2;
}

/** Events descending, then tokens descending, then model name ascending. */
export function compareModels(a: ModelUsage, b: ModelUsage): number {
  if (a.events !== b.events) return b.events - a.events;
  if (a.tokens !== b.tokens) return b.tokens - a.tokens;
  return compareKeys(a.model, b.model);
}

export function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

export function range(start: number, end: number): number[] {
  return Array.from({ length: end - start + 1 }, (_, i) => start + i);
}
