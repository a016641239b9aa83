import type { Logger } from "../logging/logger.js";

export type SkipReason = "malformed" | "negative_duration";

const REASONS: readonly SkipReason[] = ["malformed", "negative_duration"];

/**
 * Record-level defects found while parsing or aggregating. A skipped record
 * never aborts the run; it is logged once and counted here so the report can
 * say how much data was left out.
 */
export class QualityLedger {
  private readonly counts = new Map<SkipReason, number>();
  private readonly seen = new Set<string>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "quality" });
  }

  /**
   * Counts one skipped record. With a `recordId`, a record already skipped for
   * the same reason is not counted again, so two metrics reading the same
   * records report it once.
   */
  skip(reason: SkipReason, detail: Record<string, unknown>, recordId?: string): void {
    if (recordId !== undefined) {
      const id = `${reason}:${recordId}`;
      if (this.seen.has(id)) return;
      this.seen.add(id);
    }
    this.counts.set(reason, this.count(reason) + 1);
    this.logger.warn({ ...detail, reason }, "Record skipped");
  }

  count(reason: SkipReason): number {
    return this.counts.get(reason) ?? 0;
  }

  get total(): number {
    let sum = 0;
    for (const n of this.counts.values()) sum += n;
    return sum;
  }

  /** `"N records skipped: reason"` per reason seen, in a fixed order. */
  summaryLines(): string[] {
    return REASONS.filter((reason) => this.count(reason) > 0).map(
      (reason) => `${this.count(reason)} records skipped: ${reason}`,
    );
  }
}
