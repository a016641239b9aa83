import { parseConfig } from "../../src/config/schema.js";
import type { ShipgaugeConfig } from "../../src/config/types.js";
import { createLogger, type Logger } from "../../src/logging/logger.js";
import { QualityLedger } from "../../src/metrics/quality.js";
import type { IssueRecord, PullRequestRecord, UsageEvent } from "../../src/records/types.js";

export function silentLogger(): Logger {
  return createLogger({ level: "silent", json: true });
}

export function makeLedger(): QualityLedger {
  return new QualityLedger(silentLogger());
}

export function makeUsageEvent(overrides: Partial<UsageEvent> = {}): UsageEvent {
  return {
    type: "usage_event",
    timestamp: "2025-10-06 09:15:00",
    userEmail: "ana@example.com",
    model: "claude-4-sonnet",
    kind: "usage_based",
    tokenCostCents: 40,
    platformFeeCents: 2,
    isChargeable: true,
    isTokenBased: true,
    tokens: { input: 1000, output: 200, cacheWrite: 0, cacheRead: 300 },
    ...overrides,
  };
}

export function makePullRequest(overrides: Partial<PullRequestRecord> = {}): PullRequestRecord {
  return {
    type: "pull_request",
    repository: "web-app",
    title: "OA-100: Add checkout page",
    number: 1,
    createdAt: "2025-10-01 08:00:00",
    mergedAt: "2025-10-02 08:00:00",
    isMerged: true,
    commentCount: 2,
    commitCount: 3,
    filesChangedCount: 4,
    ...overrides,
  };
}

export function makeIssue(overrides: Partial<IssueRecord> = {}): IssueRecord {
  return {
    type: "issue",
    key: "OA-100",
    summary: "Checkout page",
    issueType: "Story",
    createdAt: "2025-09-28 10:00:00",
    latestInProgressAt: "2025-10-01 09:00:00",
    latestDoneAt: "2025-10-03 09:00:00",
    ...overrides,
  };
}

/** Config for tests: quiet JSON logging, no request spacing, cache under `stateDir`. */
export function makeConfig(stateDir: string, raw: Record<string, unknown> = {}): ShipgaugeConfig {
  return parseConfig({
    fetch: { requestDelaySeconds: 0 },
    logging: { level: "silent", json: true },
    cacheDir: `${stateDir}/cache`,
    outputDir: `${stateDir}/reports`,
    ...raw,
  });
}
