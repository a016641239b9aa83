import { bucketOfDate, formatBucketId, type MonthBucket } from "../cache/bucket.js";
import { matchPullRequest, type IssueIndex } from "../matching/ticket-key.js";
import type { IssueRecord, PullRequestRecord } from "../records/types.js";
import { parseWireTimestamp } from "../sources/timestamps.js";
import type { QualityLedger } from "./quality.js";
import { mean, median } from "./stats.js";

const HOUR_MS = 3_600_000;

export interface DurationSample {
  readonly key: string;
  readonly hours: number;
  /** Bucket id of the record's creation month. */
  readonly bucketId: string;
}

export interface LeadTimeResult {
  readonly totalPullRequests: number;
  readonly matchedPullRequests: number;
  readonly count: number;
  readonly median: number | null;
  readonly mean: number | null;
  readonly excluded: {
    readonly notMerged: number;
    readonly unmatched: number;
    readonly negativeDuration: number;
    readonly malformed: number;
  };
  /** Averages over the pull requests that made it into the lead-time sample. */
  readonly averages: {
    readonly comments: number | null;
    readonly commits: number | null;
    readonly filesChanged: number | null;
  };
  readonly samples: DurationSample[];
}

export interface CycleTimeOptions {
  readonly issueTypes: readonly string[];
}

export interface CycleTimeResult {
  readonly totalIssues: number;
  readonly completed: number;
  readonly inProgress: number;
  readonly median: number | null;
  readonly mean: number | null;
  readonly excluded: {
    readonly wrongType: number;
    readonly missingTimestamp: number;
    readonly negativeDuration: number;
    readonly malformed: number;
  };
  readonly samples: DurationSample[];
}

export interface MonthlyDuration {
  readonly bucketId: string;
  readonly count: number;
  readonly median: number | null;
  readonly mean: number | null;
}

type Span = { ok: true; hours: number; bucketId: string } | { ok: false; reason: "malformed" | "negative_duration" };

function span(start: string, end: string): Span {
  const startMs = parseWireTimestamp(start);
  const endMs = parseWireTimestamp(end);
  if (startMs === null || endMs === null) return { ok: false, reason: "malformed" };
  if (endMs < startMs) return { ok: false, reason: "negative_duration" };
  return {
    ok: true,
    hours: (endMs - startMs) / HOUR_MS,
    bucketId: formatBucketId(bucketOfDate(new Date(startMs))),
  };
}

/** Change lead time: pull request creation to merge, for merged pull requests whose ticket is known. */
export function computeLeadTime(
  prs: readonly PullRequestRecord[],
  index: IssueIndex,
  ledger: QualityLedger,
): LeadTimeResult {
  const excluded = { notMerged: 0, unmatched: 0, negativeDuration: 0, malformed: 0 };
  const samples: DurationSample[] = [];
  const included: PullRequestRecord[] = [];
  let matchedPullRequests = 0;

  for (const pr of prs) {
    const matched = matchPullRequest(pr, index) !== null;
    if (matched) matchedPullRequests++;

    if (!pr.isMerged) {
      excluded.notMerged++;
      continue;
    }
    if (!matched) {
      excluded.unmatched++;
      continue;
    }

    const result = pr.mergedAt === null ? null : span(pr.createdAt, pr.mergedAt);
    if (result === null || !result.ok) {
      const reason = result === null ? "malformed" : result.reason;
      if (reason === "malformed") excluded.malformed++;
      else excluded.negativeDuration++;
      ledger.skip(reason, { source: "pulls", repository: pr.repository, number: pr.number });
      continue;
    }

    samples.push({ key: `${pr.repository}#${pr.number}`, hours: result.hours, bucketId: result.bucketId });
    included.push(pr);
  }

  const hours = samples.map((s) => s.hours);
  return {
    totalPullRequests: prs.length,
    matchedPullRequests,
    count: samples.length,
    median: median(hours),
    mean: mean(hours),
    excluded,
    averages: {
      comments: mean(included.map((pr) => pr.commentCount)),
      commits: mean(included.map((pr) => pr.commitCount)),
      filesChanged: mean(included.map((pr) => pr.filesChangedCount)),
    },
    samples,
  };
}

/** Cycle time: latest "in progress" transition to latest "done" transition, for allow-listed issue types. */
export function computeCycleTime(
  issues: readonly IssueRecord[],
  opts: CycleTimeOptions,
  ledger: QualityLedger,
): CycleTimeResult {
  const allowed = new Set(opts.issueTypes);
  const excluded = { wrongType: 0, missingTimestamp: 0, negativeDuration: 0, malformed: 0 };
  const samples: DurationSample[] = [];
  let inProgress = 0;

  for (const issue of issues) {
    if (!allowed.has(issue.issueType)) {
      excluded.wrongType++;
      continue;
    }
    if (issue.latestInProgressAt === null || issue.latestDoneAt === null) {
      if (issue.latestInProgressAt !== null) inProgress++;
      excluded.missingTimestamp++;
      continue;
    }

    const result = span(issue.latestInProgressAt, issue.latestDoneAt);
    if (!result.ok) {
      if (result.reason === "malformed") excluded.malformed++;
      else excluded.negativeDuration++;
      ledger.skip(result.reason, { source: "issues", key: issue.key }, `issues/${issue.key}`);
      continue;
    }
    samples.push({ key: issue.key, hours: result.hours, bucketId: result.bucketId });
  }

  const hours = samples.map((s) => s.hours);
  return {
    totalIssues: issues.length,
    completed: samples.length,
    inProgress,
    median: median(hours),
    mean: mean(hours),
    excluded,
    samples,
  };
}

/** One entry per requested month, in the order given; months without samples carry nulls. */
export function durationsByMonth(
  samples: readonly DurationSample[],
  buckets: readonly MonthBucket[],
): MonthlyDuration[] {
  const byBucket = new Map<string, number[]>();
  for (const sample of samples) {
    const hours = byBucket.get(sample.bucketId);
    if (hours) hours.push(sample.hours);
    else byBucket.set(sample.bucketId, [sample.hours]);
  }

  return buckets.map((bucket) => {
    const bucketId = formatBucketId(bucket);
    const hours = byBucket.get(bucketId) ?? [];
    return { bucketId, count: hours.length, median: median(hours), mean: mean(hours) };
  });
}
