import type { Clock } from "../utils/clock.js";

/**
 * Minimum spacing between requests, measured from the moment the previous
 * request returned. Not a token bucket: the upstream APIs cap requests per
 * minute, so a fixed gap is enough.
 */
export class Throttle {
  private lastCompletedAt: number | null = null;

  constructor(
    private readonly minSpacingMs: number,
    private readonly clock: Clock,
  ) {}

  /** Waits out the remaining gap, returning how long it slept. */
  async wait(): Promise<number> {
    if (this.lastCompletedAt === null || this.minSpacingMs <= 0) return 0;

    const elapsed = this.clock.now() - this.lastCompletedAt;
    const remaining = this.minSpacingMs - elapsed;
    if (remaining <= 0) return 0;

    await this.clock.sleep(remaining);
    return remaining;
  }

  markCompleted(): void {
    this.lastCompletedAt = this.clock.now();
  }
}
