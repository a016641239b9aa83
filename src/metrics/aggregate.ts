import { mean, median, round, sum } from "./stats.js";

export interface AggregateMetric {
  readonly key: string;
  readonly count: number;
  readonly total: number;
  readonly median: number;
  readonly mean: number;
  /** 1-based position after sorting by total descending, key ascending. */
  readonly rank: number;
}

export interface AggregateOptions<R> {
  filter?(record: R): boolean;
  groupBy(record: R): string;
  value(record: R): number;
}

/** Plain code-point order, so rankings do not depend on the host locale. */
export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Descending order of two totals compared at six decimals, so sums that
 * differ only by float noise (0.1 + 0.2 against 0.3) count as equal.
 */
export function compareTotals(a: number, b: number): number {
  return round(b, 6) - round(a, 6);
}

export function aggregate<R>(records: Iterable<R>, opts: AggregateOptions<R>): AggregateMetric[] {
  const groups = new Map<string, number[]>();
  for (const record of records) {
    if (opts.filter && !opts.filter(record)) continue;
    const key = opts.groupBy(record);
    const values = groups.get(key);
    if (values) values.push(opts.value(record));
    else groups.set(key, [opts.value(record)]);
  }

  const metrics = [...groups.entries()].map(([key, values]) => ({
    key,
    count: values.length,
    total: sum(values),
    median: median(values) ?? 0,
    mean: mean(values) ?? 0,
  }));

  return metrics
    .sort((a, b) => compareTotals(a.total, b.total) || compareKeys(a.key, b.key))
    .map((metric, i) => ({ ...metric, rank: i + 1 }));
}

export function topN(metrics: readonly AggregateMetric[], count: number): AggregateMetric[] {
  return metrics.slice(0, Math.max(0, count));
}
