import { bucketOfDate, formatBucketId, type MonthBucket } from "../cache/bucket.js";
import type { UsageEvent } from "../records/types.js";
import { parseWireTimestamp } from "../sources/timestamps.js";
import { aggregate, type AggregateMetric } from "./aggregate.js";
import type { QualityLedger } from "./quality.js";

export interface MonthlyAdoption {
  readonly bucketId: string;
  /** Distinct users with at least one request in the month. */
  readonly activeUsers: number;
  readonly requests: number;
}

export interface AdoptionStats {
  readonly totalRequests: number;
  /** One entry per requested month, in the order given. */
  readonly monthly: MonthlyAdoption[];
  /** Users ranked by request count; `total` and `count` are both the request count. */
  readonly byUser: AggregateMetric[];
}

/**
 * Request counts of every usage event kind, billable or not, within the
 * requested months. Emails are compared lowercased.
 */
export function adoptionStats(
  events: Iterable<UsageEvent>,
  buckets: readonly MonthBucket[],
  ledger: QualityLedger,
): AdoptionStats {
  const wanted = new Set(buckets.map(formatBucketId));
  const inRange: { email: string; bucketId: string }[] = [];

  for (const event of events) {
    const ms = parseWireTimestamp(event.timestamp);
    if (ms === null) {
      ledger.skip("malformed", { source: "usage", timestamp: event.timestamp, user: event.userEmail });
      continue;
    }
    const bucketId = formatBucketId(bucketOfDate(new Date(ms)));
    if (wanted.has(bucketId)) inRange.push({ email: event.userEmail.toLowerCase(), bucketId });
  }

  const users = new Map<string, Set<string>>();
  const requests = new Map<string, number>();
  for (const { email, bucketId } of inRange) {
    const active = users.get(bucketId);
    if (active) active.add(email);
    else users.set(bucketId, new Set([email]));
    requests.set(bucketId, (requests.get(bucketId) ?? 0) + 1);
  }

  return {
    totalRequests: inRange.length,
    monthly: buckets.map((bucket) => {
      const bucketId = formatBucketId(bucket);
      return {
        bucketId,
        activeUsers: users.get(bucketId)?.size ?? 0,
        requests: requests.get(bucketId) ?? 0,
      };
    }),
    byUser: aggregate(inRange, { groupBy: (r) => r.email, value: () => 1 }),
  };
}
