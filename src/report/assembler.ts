import { bucketLabel, formatBucketId, type MonthBucket } from "../cache/bucket.js";
import type { IdleSeat, SeatActivity } from "../matching/seats.js";
import type { AdoptionStats } from "../metrics/adoption.js";
import { topN } from "../metrics/aggregate.js";
import type { BillingRollup, SpendBreakdown } from "../metrics/billing.js";
import { durationsByMonth, type CycleTimeResult, type LeadTimeResult } from "../metrics/durations.js";
import { round, roundOrNull } from "../metrics/stats.js";
import { withTrends } from "../metrics/trends.js";
import { formatWireTimestamp } from "../sources/timestamps.js";

// Report shapes are final: renderers print them without further arithmetic.
// Durations are hours to one decimal, money is dollars to two.

export interface ReportPeriod {
  readonly from: string;
  readonly to: string;
  readonly months: { readonly bucketId: string; readonly label: string }[];
}

export interface MonthlyCost {
  readonly bucketId: string;
  readonly label: string;
  readonly costDollars: number;
  readonly events: number;
  readonly deltaDollars: number | null;
  readonly percentChange: number | null;
  readonly topModels: MonthlyModelCost[];
  readonly topUsers: RankedUser[];
}

export interface MonthlyModelCost {
  readonly rank: number;
  readonly model: string;
  readonly costDollars: number;
  readonly events: number;
}

export interface RankedUser {
  readonly rank: number;
  readonly email: string;
  readonly costDollars: number;
  readonly events: number;
  readonly topModel: string | null;
}

export interface RankedModel {
  readonly rank: number;
  readonly model: string;
  readonly costDollars: number;
  readonly events: number;
  readonly totalTokens: number;
  readonly uniqueUsers: number;
}

export interface BillingReport {
  readonly kind: "billing";
  readonly generatedAt: string;
  readonly period: ReportPeriod;
  readonly totals: {
    readonly costDollars: number;
    readonly billableEvents: number;
    readonly excludedEvents: number;
    readonly averageCostPerEventCents: number | null;
  };
  readonly monthly: MonthlyCost[];
  readonly topUsers: RankedUser[];
  readonly topModels: RankedModel[];
  readonly topUsersByModel: { readonly model: string; readonly users: RankedUser[] }[];
  readonly dataQuality: string[];
}

export interface BillingReportOptions {
  readonly buckets: readonly MonthBucket[];
  readonly generatedAt: Date;
  readonly topCount: number;
  readonly topModelsForUsers: number;
  readonly dataQuality: string[];
}

export interface DurationBlock {
  readonly count: number;
  readonly medianHours: number | null;
  readonly meanHours: number | null;
}

export interface MonthlyLeadTime extends DurationBlock {
  readonly bucketId: string;
  readonly label: string;
  readonly deltaHours: number | null;
  readonly percentChange: number | null;
}

export interface CycleTimeBlock extends DurationBlock {
  readonly inProgress: number;
  readonly excluded: CycleTimeResult["excluded"];
}

export interface DeliveryReport {
  readonly kind: "delivery";
  readonly generatedAt: string;
  readonly period: ReportPeriod;
  readonly pullRequests: {
    readonly total: number;
    readonly matched: number;
    readonly unmatched: number;
  };
  readonly leadTime: DurationBlock & {
    readonly excluded: LeadTimeResult["excluded"];
    readonly averages: LeadTimeResult["averages"];
  };
  readonly cycleTime: CycleTimeBlock;
  readonly bugResolution: CycleTimeBlock;
  readonly monthlyLeadTime: MonthlyLeadTime[];
  readonly dataQuality: string[];
}

export interface DeliveryReportInput {
  readonly leadTime: LeadTimeResult;
  readonly cycleTime: CycleTimeResult;
  readonly bugResolution: CycleTimeResult;
  readonly buckets: readonly MonthBucket[];
  readonly generatedAt: Date;
  readonly dataQuality: string[];
}

export interface MonthlyRequests {
  readonly bucketId: string;
  readonly label: string;
  readonly activeUsers: number;
  readonly requests: number;
}

export interface SeatReport {
  readonly kind: "seats";
  readonly generatedAt: string;
  readonly referenceDate: string;
  readonly members: {
    readonly total: number;
    readonly active: number;
    readonly owners: number;
    readonly removed: number;
  };
  readonly adoptionRate: number;
  readonly idle: { readonly thresholdDays: number; readonly count: number; readonly members: IdleSeat[] }[];
  readonly neverUsed: IdleSeat[];
  readonly usage: {
    readonly totalRequests: number;
    /** Active users of the last requested month. */
    readonly currentMonthActiveUsers: number;
    readonly monthly: MonthlyRequests[];
    readonly topUsers: { readonly rank: number; readonly email: string; readonly requests: number }[];
  };
  readonly dataQuality: string[];
}

export type Report = BillingReport | DeliveryReport | SeatReport;

export function toDollars(cents: number): number {
  return round(cents / 100, 2);
}

export function describePeriod(buckets: readonly MonthBucket[]): ReportPeriod {
  const months = buckets.map((b) => ({ bucketId: formatBucketId(b), label: bucketLabel(b) }));
  return {
    from: months[0]?.bucketId ?? "",
    to: months[months.length - 1]?.bucketId ?? "",
    months,
  };
}

export function assembleBillingReport(rollup: BillingRollup, opts: BillingReportOptions): BillingReport {
  const byMonth = new Map(rollup.byMonth.map((m) => [m.key, m]));
  const monthly = withTrends(
    opts.buckets.map((b) => {
      const id = formatBucketId(b);
      return { key: id, value: byMonth.get(id)?.total ?? 0 };
    }),
  ).map((point, i): MonthlyCost => {
    const bucket = opts.buckets[i];
    return {
      bucketId: point.key,
      label: bucket ? bucketLabel(bucket) : point.key,
      costDollars: toDollars(point.value ?? 0),
      events: byMonth.get(point.key)?.count ?? 0,
      deltaDollars: point.delta === null ? null : toDollars(point.delta),
      percentChange: roundOrNull(point.percentChange, 1),
      ...monthSpend(rollup.months.get(point.key), opts.topCount),
    };
  });

  const topUsers = rankUsers(rollup, opts.topCount);

  const topModels = topN(rollup.byModel, opts.topCount).map((m): RankedModel => {
    const usage = rollup.modelUsage.get(m.key);
    return {
      rank: m.rank,
      model: m.key,
      costDollars: toDollars(m.total),
      events: m.count,
      totalTokens: usage?.totalTokens ?? 0,
      uniqueUsers: usage?.uniqueUsers ?? 0,
    };
  });

  const topUsersByModel = topN(rollup.byModel, opts.topModelsForUsers).map((m) => ({
    model: m.key,
    users: topN(rollup.usersByModel.get(m.key) ?? [], opts.topCount).map(
      (u): RankedUser => ({
        rank: u.rank,
        email: u.key,
        costDollars: toDollars(u.total),
        events: u.count,
        topModel: m.key,
      }),
    ),
  }));

  return {
    kind: "billing",
    generatedAt: formatWireTimestamp(opts.generatedAt.getTime()),
    period: describePeriod(opts.buckets),
    totals: {
      costDollars: toDollars(rollup.totalCents),
      billableEvents: rollup.billableEvents,
      excludedEvents: rollup.excludedEvents,
      averageCostPerEventCents:
        rollup.billableEvents === 0 ? null : round(rollup.totalCents / rollup.billableEvents, 2),
    },
    monthly,
    topUsers,
    topModels,
    topUsersByModel,
    dataQuality: opts.dataQuality,
  };
}

function rankUsers(spend: SpendBreakdown, count: number): RankedUser[] {
  return topN(spend.byUser, count).map(
    (u): RankedUser => ({
      rank: u.rank,
      email: u.key,
      costDollars: toDollars(u.total),
      events: u.count,
      topModel: spend.userTopModel.get(u.key) ?? null,
    }),
  );
}

function monthSpend(
  spend: SpendBreakdown | undefined,
  count: number,
): Pick<MonthlyCost, "topModels" | "topUsers"> {
  if (!spend) return { topModels: [], topUsers: [] };
  return {
    topModels: topN(spend.byModel, count).map((m) => ({
      rank: m.rank,
      model: m.key,
      costDollars: toDollars(m.total),
      events: m.count,
    })),
    topUsers: rankUsers(spend, count),
  };
}

function cycleBlock(result: CycleTimeResult): CycleTimeBlock {
  return {
    count: result.completed,
    medianHours: roundOrNull(result.median, 1),
    meanHours: roundOrNull(result.mean, 1),
    inProgress: result.inProgress,
    excluded: result.excluded,
  };
}

export function assembleDeliveryReport(input: DeliveryReportInput): DeliveryReport {
  const { leadTime } = input;
  const months = durationsByMonth(leadTime.samples, input.buckets);
  const trend = withTrends(months.map((m) => ({ key: m.bucketId, value: m.median })));

  const monthlyLeadTime = months.map((m, i): MonthlyLeadTime => {
    const bucket = input.buckets[i];
    const point = trend[i];
    return {
      bucketId: m.bucketId,
      label: bucket ? bucketLabel(bucket) : m.bucketId,
      count: m.count,
      medianHours: roundOrNull(m.median, 1),
      meanHours: roundOrNull(m.mean, 1),
      deltaHours: roundOrNull(point?.delta ?? null, 1),
      percentChange: roundOrNull(point?.percentChange ?? null, 1),
    };
  });

  return {
    kind: "delivery",
    generatedAt: formatWireTimestamp(input.generatedAt.getTime()),
    period: describePeriod(input.buckets),
    pullRequests: {
      total: leadTime.totalPullRequests,
      matched: leadTime.matchedPullRequests,
      unmatched: leadTime.totalPullRequests - leadTime.matchedPullRequests,
    },
    leadTime: {
      count: leadTime.count,
      medianHours: roundOrNull(leadTime.median, 1),
      meanHours: roundOrNull(leadTime.mean, 1),
      excluded: leadTime.excluded,
      averages: {
        comments: roundOrNull(leadTime.averages.comments, 1),
        commits: roundOrNull(leadTime.averages.commits, 1),
        filesChanged: roundOrNull(leadTime.averages.filesChanged, 1),
      },
    },
    cycleTime: cycleBlock(input.cycleTime),
    bugResolution: cycleBlock(input.bugResolution),
    monthlyLeadTime,
    dataQuality: input.dataQuality,
  };
}

export interface SeatReportInput {
  readonly activity: SeatActivity;
  readonly adoption: AdoptionStats;
  readonly buckets: readonly MonthBucket[];
  readonly topCount: number;
  readonly referenceDate: Date;
  readonly generatedAt: Date;
  readonly dataQuality: string[];
}

export function assembleSeatReport(input: SeatReportInput): SeatReport {
  const { activity, adoption } = input;
  return {
    kind: "seats",
    generatedAt: formatWireTimestamp(input.generatedAt.getTime()),
    referenceDate: input.referenceDate.toISOString().slice(0, 10),
    members: {
      total: activity.totalMembers,
      active: activity.activeMembers,
      owners: activity.owners,
      removed: activity.removedMembers,
    },
    adoptionRate: round(activity.adoptionRate, 1),
    idle: activity.idle.map((t) => ({
      thresholdDays: t.thresholdDays,
      count: t.members.length,
      members: t.members,
    })),
    neverUsed: activity.neverUsed,
    usage: {
      totalRequests: adoption.totalRequests,
      currentMonthActiveUsers: adoption.monthly[adoption.monthly.length - 1]?.activeUsers ?? 0,
      monthly: adoption.monthly.map((m, i): MonthlyRequests => {
        const bucket = input.buckets[i];
        return { ...m, label: bucket ? bucketLabel(bucket) : m.bucketId };
      }),
      topUsers: topN(adoption.byUser, input.topCount).map((u) => ({ rank: u.rank, email: u.key, requests: u.count })),
    },
    dataQuality: input.dataQuality,
  };
}
