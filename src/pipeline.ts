import { bucketOfDate, bucketRange, compareBuckets, formatBucketId, type MonthBucket } from "./cache/bucket.js";
import type { CacheArtifact, MonthlyCacheStore } from "./cache/store.js";
import { syncBuckets, type SyncResult } from "./cache/sync.js";
import { getCacheDir } from "./config/paths.js";
import type { ShipgaugeConfig } from "./config/types.js";
import { NotFoundError } from "./errors.js";
import type { FetchFn } from "./http/fetcher.js";
import type { Logger } from "./logging/logger.js";
import { findIdleSeats } from "./matching/seats.js";
import { buildIssueIndex } from "./matching/ticket-key.js";
import { adoptionStats } from "./metrics/adoption.js";
import { rollupBilling } from "./metrics/billing.js";
import { computeCycleTime, computeLeadTime } from "./metrics/durations.js";
import type { QualityLedger } from "./metrics/quality.js";
import {
  assembleBillingReport,
  assembleDeliveryReport,
  assembleSeatReport,
  type BillingReport,
  type DeliveryReport,
  type SeatReport,
} from "./report/assembler.js";
import {
  createGithubClient,
  createJiraClient,
  createUsageClient,
  openStore,
  type SourceName,
  type SourceRecordMap,
  type SourceRuntime,
} from "./sources/index.js";
import type { Clock } from "./utils/clock.js";

export interface PipelineContext {
  readonly config: ShipgaugeConfig;
  readonly logger: Logger;
  readonly ledger: QualityLedger;
  readonly now: Date;
  /** Report from the cache only; months that were never fetched are left out with a warning. */
  readonly offline?: boolean;
  readonly clock?: Clock;
  readonly fetchFn?: FetchFn;
}

function runtimeOf(ctx: PipelineContext): SourceRuntime {
  return { logger: ctx.logger, ledger: ctx.ledger, clock: ctx.clock, fetchFn: ctx.fetchFn };
}

function storeOf<K extends SourceName>(source: K, ctx: PipelineContext): MonthlyCacheStore<SourceRecordMap[K]> {
  return openStore(source, getCacheDir(ctx.config), ctx.clock);
}

/** Fetches the months of `buckets` that are not cached yet for one source. */
export async function syncSource(
  source: SourceName,
  ctx: PipelineContext,
  buckets: readonly MonthBucket[],
): Promise<SyncResult> {
  const runtime = runtimeOf(ctx);
  switch (source) {
    case "usage": {
      const client = createUsageClient(ctx.config, runtime);
      return syncBuckets({
        store: storeOf("usage", ctx),
        buckets,
        fetchBucket: (b) => client.fetchMonth(b),
        logger: ctx.logger,
      });
    }
    case "pulls": {
      const client = createGithubClient(ctx.config, runtime);
      return syncBuckets({
        store: storeOf("pulls", ctx),
        buckets,
        fetchBucket: (b) => client.fetchMonth(b),
        logger: ctx.logger,
      });
    }
    case "issues": {
      const client = createJiraClient(ctx.config, runtime);
      return syncBuckets({
        store: storeOf("issues", ctx),
        buckets,
        fetchBucket: (b) => client.fetchMonth(b),
        logger: ctx.logger,
      });
    }
  }
}

/**
 * Cached records of every requested month, in month order. Records that no
 * longer match their shape are counted as malformed and left out.
 */
export async function loadCached<K extends SourceName>(
  source: K,
  ctx: PipelineContext,
  buckets: readonly MonthBucket[],
): Promise<SourceRecordMap[K][]> {
  const store = storeOf(source, ctx);
  const log = ctx.logger.child({ component: "pipeline", source });
  const records: SourceRecordMap[K][] = [];

  for (const bucket of buckets) {
    let artifact: CacheArtifact<SourceRecordMap[K]>;
    try {
      artifact = await store.load(bucket);
    } catch (err) {
      if (ctx.offline && err instanceof NotFoundError) {
        log.warn({ bucket: formatBucketId(bucket) }, "No cached data for month, skipping");
        continue;
      }
      throw err;
    }
    for (const rejected of artifact.rejected) {
      ctx.ledger.skip("malformed", {
        source,
        bucket: artifact.bucketId,
        index: rejected.index,
        detail: rejected.reason,
      });
    }
    for (const record of artifact.records) records.push(record);
  }
  return records;
}

async function prepare(source: SourceName, ctx: PipelineContext, buckets: readonly MonthBucket[]): Promise<void> {
  if (!ctx.offline) await syncSource(source, ctx, buckets);
}

export async function runBillingReport(
  ctx: PipelineContext,
  buckets: readonly MonthBucket[],
): Promise<BillingReport> {
  await prepare("usage", ctx, buckets);
  const events = await loadCached("usage", ctx, buckets);
  const rollup = rollupBilling(events, ctx.ledger);
  return assembleBillingReport(rollup, {
    buckets,
    generatedAt: ctx.now,
    topCount: ctx.config.billing.topCount,
    topModelsForUsers: ctx.config.billing.topModelsForUsers,
    dataQuality: ctx.ledger.summaryLines(),
  });
}

export async function runDeliveryReport(
  ctx: PipelineContext,
  buckets: readonly MonthBucket[],
): Promise<DeliveryReport> {
  await prepare("issues", ctx, buckets);
  await prepare("pulls", ctx, buckets);
  const issues = await loadCached("issues", ctx, buckets);
  const prs = await loadCached("pulls", ctx, buckets);

  const index = buildIssueIndex(issues);
  const leadTime = computeLeadTime(prs, index, ctx.ledger);
  const cycleTime = computeCycleTime(issues, ctx.config.metrics.cycleTime, ctx.ledger);
  const bugResolution = computeCycleTime(issues, ctx.config.metrics.bugResolution, ctx.ledger);

  return assembleDeliveryReport({
    leadTime,
    cycleTime,
    bugResolution,
    buckets,
    generatedAt: ctx.now,
    dataQuality: ctx.ledger.summaryLines(),
  });
}

const DAY_MS = 86_400_000;

/**
 * Months whose usage decides seat idleness: from the longest threshold
 * before the reference date up to the reference month (never past the
 * current one), widened to cover the report's own months.
 */
export function seatHistoryBuckets(
  buckets: readonly MonthBucket[],
  referenceDate: Date,
  thresholdsDays: readonly number[],
  now: Date,
): MonthBucket[] {
  const longest = Math.max(0, ...thresholdsDays);
  const historyStart = bucketOfDate(new Date(referenceDate.getTime() - longest * DAY_MS));
  const referenceMonth = bucketOfDate(referenceDate);
  const currentMonth = bucketOfDate(now);
  let from = compareBuckets(referenceMonth, currentMonth) > 0 ? currentMonth : referenceMonth;
  let to = from;
  if (compareBuckets(historyStart, from) < 0) from = historyStart;

  const first = buckets[0];
  const last = buckets[buckets.length - 1];
  if (first && compareBuckets(first, from) < 0) from = first;
  if (last && compareBuckets(last, to) > 0) to = last;
  return bucketRange(from, to);
}

/** Seat holders always come from the API; only usage history is read from the cache. */
export async function runSeatReport(
  ctx: PipelineContext,
  buckets: readonly MonthBucket[],
): Promise<SeatReport> {
  const { seats } = ctx.config;
  const referenceDate = seats.referenceDate ? new Date(`${seats.referenceDate}T00:00:00Z`) : ctx.now;
  const history = seatHistoryBuckets(buckets, referenceDate, seats.thresholdsDays, ctx.now);

  const client = createUsageClient(ctx.config, runtimeOf(ctx));
  await prepare("usage", ctx, history);
  const events = await loadCached("usage", ctx, history);
  const members = await client.fetchTeamMembers();

  const activity = findIdleSeats(members, events, referenceDate, seats.thresholdsDays);
  return assembleSeatReport({
    activity,
    adoption: adoptionStats(events, buckets, ctx.ledger),
    buckets,
    topCount: seats.topCount,
    referenceDate,
    generatedAt: ctx.now,
    dataQuality: ctx.ledger.summaryLines(),
  });
}
