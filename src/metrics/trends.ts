export interface SeriesPoint {
  readonly key: string;
  readonly value: number | null;
}

export interface TrendPoint extends SeriesPoint {
  /** current - previous; null for the first point or when either side is missing. */
  readonly delta: number | null;
  /** Relative change in percent; null when the previous value is zero or missing. */
  readonly percentChange: number | null;
}

export function withTrends(series: readonly SeriesPoint[]): TrendPoint[] {
  return series.map((point, i) => {
    const previous = i === 0 ? null : (series[i - 1]?.value ?? null);
    if (previous === null || point.value === null) {
      return { ...point, delta: null, percentChange: null };
    }
    const delta = point.value - previous;
    return { ...point, delta, percentChange: previous === 0 ? null : (delta / previous) * 100 };
  });
}
