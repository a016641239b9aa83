import type { ZodType, ZodTypeDef } from "zod";
import { MonthlyCacheStore } from "../cache/store.js";
import {
  resolveGithubSettings,
  resolveJiraSettings,
  resolveUsageSettings,
  type SourceSettings,
} from "../config/sources.js";
import type { ShipgaugeConfig } from "../config/types.js";
import { ThrottledFetcher, type FetchFn } from "../http/fetcher.js";
import { createRetryPolicy } from "../http/retry-policy.js";
import type { Logger } from "../logging/logger.js";
import type { QualityLedger } from "../metrics/quality.js";
import { issueSchema, pullRequestSchema, usageEventSchema } from "../records/schema.js";
import type { IssueRecord, PullRequestRecord, UsageEvent } from "../records/types.js";
import type { Clock } from "../utils/clock.js";
import { GithubClient } from "./github/client.js";
import { JiraClient } from "./jira/client.js";
import { UsageClient } from "./usage/client.js";

export const SOURCE_NAMES = ["usage", "pulls", "issues"] as const;
export type SourceName = (typeof SOURCE_NAMES)[number];

export interface SourceRecordMap {
  usage: UsageEvent;
  pulls: PullRequestRecord;
  issues: IssueRecord;
}

const STORE_LAYOUT: {
  [K in SourceName]: { suffix: string; schema: ZodType<SourceRecordMap[K], ZodTypeDef, unknown> };
} = {
  usage: { suffix: "usage-events", schema: usageEventSchema },
  pulls: { suffix: "pull-requests", schema: pullRequestSchema },
  issues: { suffix: "issues", schema: issueSchema },
};

export function isSourceName(value: string): value is SourceName {
  return SOURCE_NAMES.some((name) => name === value);
}

export function openStore<K extends SourceName>(
  source: K,
  cacheDir: string,
  clock?: Clock,
): MonthlyCacheStore<SourceRecordMap[K]> {
  const layout = STORE_LAYOUT[source];
  return new MonthlyCacheStore({
    cacheDir,
    namespace: source,
    suffix: layout.suffix,
    recordSchema: layout.schema,
    clock,
  });
}

/** Process-level collaborators every client shares; tests swap clock and fetch. */
export interface SourceRuntime {
  readonly logger: Logger;
  readonly ledger: QualityLedger;
  readonly clock?: Clock;
  readonly fetchFn?: FetchFn;
}

export function createFetcher(settings: SourceSettings, runtime: SourceRuntime): ThrottledFetcher {
  return new ThrottledFetcher({
    logger: runtime.logger,
    requestDelayMs: settings.requestDelayMs,
    timeoutMs: settings.timeoutMs,
    retry: createRetryPolicy({ maxRetries: settings.maxRetries }),
    clock: runtime.clock,
    fetchFn: runtime.fetchFn,
  });
}

export function createUsageClient(config: ShipgaugeConfig, runtime: SourceRuntime): UsageClient {
  const settings = resolveUsageSettings(config);
  return new UsageClient({
    settings,
    fetcher: createFetcher(settings, runtime),
    logger: runtime.logger,
    ledger: runtime.ledger,
  });
}

export function createGithubClient(config: ShipgaugeConfig, runtime: SourceRuntime): GithubClient {
  const settings = resolveGithubSettings(config);
  return new GithubClient({
    settings,
    fetcher: createFetcher(settings, runtime),
    logger: runtime.logger,
    ledger: runtime.ledger,
  });
}

export function createJiraClient(config: ShipgaugeConfig, runtime: SourceRuntime): JiraClient {
  const settings = resolveJiraSettings(config);
  return new JiraClient({
    settings,
    statuses: config.statuses,
    fetcher: createFetcher(settings, runtime),
    logger: runtime.logger,
    ledger: runtime.ledger,
  });
}
