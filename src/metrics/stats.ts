/** Middle value, or the mean of the two middle values; null for an empty input. */
export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? upper) + upper) / 2;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return sum(values) / values.length;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/**
 * Half away from zero on the decimal representation, so 118.55 rounds to
 * 118.6 even though its binary value sits just below, and -0.125 mirrors 0.125.
 */
export function round(value: number, digits = 0): number {
  if (value < 0) {
    const magnitude = round(-value, digits);
    return magnitude === 0 ? 0 : -magnitude;
  }
  const text = String(value);
  if (text.includes("e")) {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
  }
  return Number(`${Math.round(Number(`${text}e${digits}`))}e-${digits}`);
}

export function roundOrNull(value: number | null, digits = 0): number | null {
  return value === null ? null : round(value, digits);
}
