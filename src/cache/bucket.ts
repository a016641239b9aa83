import type { RangeConfig } from "../config/types.js";
import { ShipgaugeError } from "../errors.js";

/** A calendar month in UTC; the unit of caching and aggregation. */
export interface MonthBucket {
  readonly year: number;
  readonly month: number;
}

const BUCKET_ID = /^(0[1-9]|1[0-2])-(\d{4})$/;

const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
] as const;

export function makeBucket(year: number, month: number): MonthBucket {
  if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
    throw new ShipgaugeError(`Invalid month bucket: ${year}-${month}`, "INVALID_BUCKET");
  }
  return { year, month };
}

export function formatBucketId(bucket: MonthBucket): string {
  return `${String(bucket.month).padStart(2, "0")}-${bucket.year}`;
}

export function parseBucketId(id: string): MonthBucket {
  const match = BUCKET_ID.exec(id.trim());
  if (!match) {
    throw new ShipgaugeError(`Invalid bucket id '${id}', expected MM-YYYY`, "INVALID_BUCKET");
  }
  return makeBucket(Number(match[2]), Number(match[1]));
}

export function bucketLabel(bucket: MonthBucket): string {
  return `${MONTH_NAMES[bucket.month - 1] ?? `Month ${bucket.month}`} ${bucket.year}`;
}

export function compareBuckets(a: MonthBucket, b: MonthBucket): number {
  return a.year - b.year || a.month - b.month;
}

export function nextBucket(bucket: MonthBucket): MonthBucket {
  return bucket.month === 12
    ? { year: bucket.year + 1, month: 1 }
    : { year: bucket.year, month: bucket.month + 1 };
}

/** First millisecond of the month, UTC. */
export function bucketStartMs(bucket: MonthBucket): number {
  return Date.UTC(bucket.year, bucket.month - 1, 1);
}

/** First millisecond of the following month, UTC (exclusive end). */
export function bucketEndMs(bucket: MonthBucket): number {
  return bucketStartMs(nextBucket(bucket));
}

/** YYYY-MM-DD of a UTC instant. */
export function isoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function bucketOfDate(date: Date): MonthBucket {
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1 };
}

/** The current month and the `count - 1` before it, oldest first. */
export function monthsBack(count: number, today: Date): MonthBucket[] {
  const current = bucketOfDate(today);
  const buckets: MonthBucket[] = [];
  for (let i = count - 1; i >= 0; i--) {
    const index = current.year * 12 + (current.month - 1) - i;
    buckets.push({ year: Math.floor(index / 12), month: (index % 12) + 1 });
  }
  return buckets;
}

/** Every month from `from` to `to`, both inclusive. */
export function bucketRange(from: MonthBucket, to: MonthBucket): MonthBucket[] {
  if (compareBuckets(from, to) > 0) {
    throw new ShipgaugeError(
      `Range start ${formatBucketId(from)} is after its end ${formatBucketId(to)}`,
      "INVALID_RANGE",
    );
  }
  const buckets: MonthBucket[] = [];
  for (let b = from; compareBuckets(b, to) <= 0; b = nextBucket(b)) {
    buckets.push(b);
  }
  return buckets;
}

export function resolveBuckets(range: RangeConfig, today: Date): MonthBucket[] {
  if (range.from !== undefined) {
    const to = range.to !== undefined ? parseBucketId(range.to) : bucketOfDate(today);
    return bucketRange(parseBucketId(range.from), to);
  }
  return monthsBack(range.monthsBack, today);
}
