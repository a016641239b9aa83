import { bucketOfDate, formatBucketId } from "../cache/bucket.js";
import { totalTokens, usageEventCostCents, type TokenCounts, type UsageEvent } from "../records/types.js";
import { parseWireTimestamp } from "../sources/timestamps.js";
import { aggregate, compareKeys, compareTotals, type AggregateMetric } from "./aggregate.js";
import type { QualityLedger } from "./quality.js";

export interface ModelUsage extends TokenCounts {
  readonly totalTokens: number;
  readonly uniqueUsers: number;
}

/** Spend of one slice of events (all of them, or one month), ranked both ways. */
export interface SpendBreakdown {
  readonly byModel: AggregateMetric[];
  readonly byUser: AggregateMetric[];
  /** Model x user cross-product: users ranked within each model. */
  readonly usersByModel: ReadonlyMap<string, AggregateMetric[]>;
  /** Each user's highest-spend model. */
  readonly userTopModel: ReadonlyMap<string, string>;
}

export interface BillingRollup extends SpendBreakdown {
  readonly totalCents: number;
  readonly billableEvents: number;
  /** Events left out by the billing predicate (included plan usage, non-chargeable, non-token). */
  readonly excludedEvents: number;
  /** Keyed by bucket id (MM-YYYY). */
  readonly byMonth: AggregateMetric[];
  /** Per-month model and user spend, keyed by bucket id; months without billable events are absent. */
  readonly months: ReadonlyMap<string, SpendBreakdown>;
  readonly modelUsage: ReadonlyMap<string, ModelUsage>;
}

export function isBillable(event: UsageEvent): boolean {
  return event.kind === "usage_based" && event.isChargeable && event.isTokenBased;
}

interface BillableEvent {
  readonly event: UsageEvent;
  readonly bucketId: string;
  readonly cents: number;
}

export function rollupBilling(events: Iterable<UsageEvent>, ledger: QualityLedger): BillingRollup {
  const billable: BillableEvent[] = [];
  let excludedEvents = 0;

  for (const event of events) {
    if (!isBillable(event)) {
      excludedEvents++;
      continue;
    }
    const ms = parseWireTimestamp(event.timestamp);
    if (ms === null) {
      ledger.skip("malformed", { source: "usage", timestamp: event.timestamp, user: event.userEmail });
      continue;
    }
    billable.push({
      event,
      bucketId: formatBucketId(bucketOfDate(new Date(ms))),
      cents: usageEventCostCents(event),
    });
  }

  const eventsByMonth = new Map<string, BillableEvent[]>();
  for (const b of billable) {
    const month = eventsByMonth.get(b.bucketId);
    if (month) month.push(b);
    else eventsByMonth.set(b.bucketId, [b]);
  }
  const months = new Map<string, SpendBreakdown>();
  for (const [bucketId, monthEvents] of eventsByMonth) {
    months.set(bucketId, breakdown(monthEvents));
  }

  return {
    ...breakdown(billable),
    totalCents: billable.reduce((acc, b) => acc + b.cents, 0),
    billableEvents: billable.length,
    excludedEvents,
    byMonth: aggregate(billable, { groupBy: (b) => b.bucketId, value: centsOf }),
    months,
    modelUsage: modelUsage(billable),
  };
}

function centsOf(b: BillableEvent): number {
  return b.cents;
}

function breakdown(billable: readonly BillableEvent[]): SpendBreakdown {
  const byModel = aggregate(billable, { groupBy: (b) => b.event.model, value: centsOf });

  const usersByModel = new Map<string, AggregateMetric[]>();
  for (const model of byModel) {
    usersByModel.set(
      model.key,
      aggregate(billable, {
        filter: (b) => b.event.model === model.key,
        groupBy: (b) => b.event.userEmail,
        value: centsOf,
      }),
    );
  }

  return {
    byModel,
    byUser: aggregate(billable, { groupBy: (b) => b.event.userEmail, value: centsOf }),
    usersByModel,
    userTopModel: topModelPerUser(usersByModel),
  };
}

function modelUsage(billable: readonly BillableEvent[]): Map<string, ModelUsage> {
  const tokens = new Map<string, { counts: TokenCounts; users: Set<string> }>();
  for (const { event } of billable) {
    const entry = tokens.get(event.model);
    if (entry) {
      entry.counts = addTokens(entry.counts, event.tokens);
      entry.users.add(event.userEmail);
    } else {
      tokens.set(event.model, { counts: event.tokens, users: new Set([event.userEmail]) });
    }
  }

  const usage = new Map<string, ModelUsage>();
  for (const [model, { counts, users }] of tokens) {
    usage.set(model, { ...counts, totalTokens: totalTokens(counts), uniqueUsers: users.size });
  }
  return usage;
}

function addTokens(a: TokenCounts, b: TokenCounts): TokenCounts {
  return {
    input: a.input + b.input,
    output: a.output + b.output,
    cacheWrite: a.cacheWrite + b.cacheWrite,
    cacheRead: a.cacheRead + b.cacheRead,
  };
}

function topModelPerUser(usersByModel: ReadonlyMap<string, AggregateMetric[]>): Map<string, string> {
  const best = new Map<string, { model: string; total: number }>();
  for (const [model, users] of usersByModel) {
    for (const user of users) {
      const current = best.get(user.key);
      const order = current ? compareTotals(user.total, current.total) : -1;
      if (order < 0 || (order === 0 && current && compareKeys(model, current.model) < 0)) {
        best.set(user.key, { model, total: user.total });
      }
    }
  }
  return new Map([...best].map(([user, { model }]) => [user, model]));
}
