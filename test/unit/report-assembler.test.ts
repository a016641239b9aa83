import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { findIdleSeats } from "../../src/matching/seats.js";
import { adoptionStats } from "../../src/metrics/adoption.js";
import { buildIssueIndex } from "../../src/matching/ticket-key.js";
import { rollupBilling } from "../../src/metrics/billing.js";
import { computeCycleTime, computeLeadTime } from "../../src/metrics/durations.js";
import {
  assembleBillingReport,
  assembleDeliveryReport,
  assembleSeatReport,
  describePeriod,
  toDollars,
} from "../../src/report/assembler.js";
import { reportPath, writeReport } from "../../src/report/writer.js";
import { makeIssue, makeLedger, makePullRequest, makeUsageEvent } from "../helpers/fixtures.js";

const OCT = { year: 2025, month: 10 };
const NOV = { year: 2025, month: 11 };
const GENERATED = new Date(Date.UTC(2025, 10, 15, 12, 0, 0));

function billingReport() {
  const rollup = rollupBilling(
    [
      makeUsageEvent({ userEmail: "ben@example.com", timestamp: "2025-10-07 10:00:00" }),
      makeUsageEvent({ userEmail: "ana@example.com" }),
      makeUsageEvent({ model: "gpt-5", timestamp: "2025-11-02 09:00:00", tokenCostCents: 100, platformFeeCents: 0 }),
      makeUsageEvent({ userEmail: "cid@example.com", kind: "included" }),
    ],
    makeLedger(),
  );
  return assembleBillingReport(rollup, {
    buckets: [OCT, NOV],
    generatedAt: GENERATED,
    topCount: 10,
    topModelsForUsers: 1,
    dataQuality: ["1 records skipped: malformed"],
  });
}

describe("toDollars", () => {
  it("converts cents to dollars with two decimals", () => {
    expect(toDollars(184)).toBe(1.84);
    expect(toDollars(12345.5)).toBe(123.46);
  });
});

describe("describePeriod", () => {
  it("names the first and last month", () => {
    expect(describePeriod([OCT, NOV])).toEqual({
      from: "10-2025",
      to: "11-2025",
      months: [
        { bucketId: "10-2025", label: "October 2025" },
        { bucketId: "11-2025", label: "November 2025" },
      ],
    });
  });
});

describe("assembleBillingReport", () => {
  it("reports totals in dollars", () => {
    const report = billingReport();

    expect(report.kind).toBe("billing");
    expect(report.generatedAt).toBe("2025-11-15 12:00:00");
    expect(report.totals).toEqual({
      costDollars: 1.84,
      billableEvents: 3,
      excludedEvents: 1,
      averageCostPerEventCents: 61.33,
    });
    expect(report.dataQuality).toEqual(["1 records skipped: malformed"]);
  });

  it("lists every requested month with its change and its top spenders", () => {
    expect(billingReport().monthly).toEqual([
      {
        bucketId: "10-2025",
        label: "October 2025",
        costDollars: 0.84,
        events: 2,
        deltaDollars: null,
        percentChange: null,
        topModels: [{ rank: 1, model: "claude-4-sonnet", costDollars: 0.84, events: 2 }],
        topUsers: [
          { rank: 1, email: "ana@example.com", costDollars: 0.42, events: 1, topModel: "claude-4-sonnet" },
          { rank: 2, email: "ben@example.com", costDollars: 0.42, events: 1, topModel: "claude-4-sonnet" },
        ],
      },
      {
        bucketId: "11-2025",
        label: "November 2025",
        costDollars: 1,
        events: 1,
        deltaDollars: 0.16,
        percentChange: 19,
        topModels: [{ rank: 1, model: "gpt-5", costDollars: 1, events: 1 }],
        topUsers: [{ rank: 1, email: "ana@example.com", costDollars: 1, events: 1, topModel: "gpt-5" }],
      },
    ]);
  });

  it("ranks users and models", () => {
    const report = billingReport();

    expect(report.topUsers).toEqual([
      { rank: 1, email: "ana@example.com", costDollars: 1.42, events: 2, topModel: "gpt-5" },
      { rank: 2, email: "ben@example.com", costDollars: 0.42, events: 1, topModel: "claude-4-sonnet" },
    ]);
    expect(report.topModels).toEqual([
      { rank: 1, model: "gpt-5", costDollars: 1, events: 1, totalTokens: 1500, uniqueUsers: 1 },
      { rank: 2, model: "claude-4-sonnet", costDollars: 0.84, events: 2, totalTokens: 3000, uniqueUsers: 2 },
    ]);
  });

  it("breaks down users for the top models only", () => {
    expect(billingReport().topUsersByModel).toEqual([
      {
        model: "gpt-5",
        users: [{ rank: 1, email: "ana@example.com", costDollars: 1, events: 1, topModel: "gpt-5" }],
      },
    ]);
  });

  it("leaves the average empty without billable events", () => {
    const report = assembleBillingReport(rollupBilling([], makeLedger()), {
      buckets: [OCT],
      generatedAt: GENERATED,
      topCount: 5,
      topModelsForUsers: 5,
      dataQuality: [],
    });

    expect(report.totals.averageCostPerEventCents).toBeNull();
    expect(report.monthly).toEqual([
      {
        bucketId: "10-2025",
        label: "October 2025",
        costDollars: 0,
        events: 0,
        deltaDollars: null,
        percentChange: null,
        topModels: [],
        topUsers: [],
      },
    ]);
  });
});

describe("assembleDeliveryReport", () => {
  const issues = [
    makeIssue({ key: "OA-100" }),
    makeIssue({
      key: "OA-7",
      issueType: "Bug",
      latestInProgressAt: "2025-10-01 09:00:00",
      latestDoneAt: "2025-10-01 21:00:00",
    }),
  ];
  const prs = [
    makePullRequest(),
    makePullRequest({
      number: 2,
      title: "OA-7: Fix rounding",
      createdAt: "2025-11-03 00:00:00",
      mergedAt: "2025-11-03 12:00:00",
    }),
    makePullRequest({ number: 3, title: "release 1.2.0" }),
  ];

  function deliveryReport() {
    const ledger = makeLedger();
    return assembleDeliveryReport({
      leadTime: computeLeadTime(prs, buildIssueIndex(issues), ledger),
      cycleTime: computeCycleTime(issues, { issueTypes: ["Story"] }, ledger),
      bugResolution: computeCycleTime(issues, { issueTypes: ["Bug"] }, ledger),
      buckets: [OCT, NOV],
      generatedAt: GENERATED,
      dataQuality: ledger.summaryLines(),
    });
  }

  it("summarizes lead time over matched pull requests", () => {
    const report = deliveryReport();

    expect(report.pullRequests).toEqual({ total: 3, matched: 2, unmatched: 1 });
    expect(report.leadTime).toEqual({
      count: 2,
      medianHours: 18,
      meanHours: 18,
      excluded: { notMerged: 0, unmatched: 1, negativeDuration: 0, malformed: 0 },
      averages: { comments: 2, commits: 3, filesChanged: 4 },
    });
  });

  it("reports cycle time and bug resolution separately", () => {
    const report = deliveryReport();

    expect(report.cycleTime).toEqual({
      count: 1,
      medianHours: 48,
      meanHours: 48,
      inProgress: 0,
      excluded: { wrongType: 1, missingTimestamp: 0, negativeDuration: 0, malformed: 0 },
    });
    expect(report.bugResolution.count).toBe(1);
    expect(report.bugResolution.medianHours).toBe(12);
  });

  it("trends the monthly lead-time median", () => {
    expect(deliveryReport().monthlyLeadTime).toEqual([
      {
        bucketId: "10-2025",
        label: "October 2025",
        count: 1,
        medianHours: 24,
        meanHours: 24,
        deltaHours: null,
        percentChange: null,
      },
      {
        bucketId: "11-2025",
        label: "November 2025",
        count: 1,
        medianHours: 12,
        meanHours: 12,
        deltaHours: -12,
        percentChange: -50,
      },
    ]);
  });
});

describe("assembleSeatReport", () => {
  it("carries seat counts and rounds the adoption rate", () => {
    const members = ["ana", "ben", "cy"].map((name) => ({
      name,
      email: `${name}@example.com`,
      userId: name,
      role: "member",
      isRemoved: false,
    }));
    const reference = new Date("2025-11-15T00:00:00Z");
    const events = [makeUsageEvent({ userEmail: "ana@example.com", timestamp: "2025-11-10 09:00:00" })];
    const activity = findIdleSeats(members, events, reference, [30]);

    const report = assembleSeatReport({
      activity,
      adoption: adoptionStats(events, [NOV], makeLedger()),
      buckets: [NOV],
      topCount: 5,
      referenceDate: reference,
      generatedAt: GENERATED,
      dataQuality: [],
    });

    expect(report.kind).toBe("seats");
    expect(report.referenceDate).toBe("2025-11-15");
    expect(report.members).toEqual({ total: 3, active: 3, owners: 0, removed: 0 });
    expect(report.adoptionRate).toBe(33.3);
    expect(report.idle).toEqual([
      { thresholdDays: 30, count: 2, members: activity.idle[0]?.members },
    ]);
    expect(report.neverUsed.map((s) => s.email)).toEqual(["ben@example.com", "cy@example.com"]);
  });

  it("reports monthly active users and the request leaderboard", () => {
    const events = [
      makeUsageEvent({ userEmail: "ben@example.com", timestamp: "2025-10-03 09:00:00", kind: "included" }),
      makeUsageEvent({ userEmail: "ana@example.com", timestamp: "2025-10-04 09:00:00" }),
      makeUsageEvent({ userEmail: "Ben@Example.com", timestamp: "2025-11-02 09:00:00" }),
      makeUsageEvent({ userEmail: "ben@example.com", timestamp: "2025-11-03 09:00:00", isChargeable: false }),
    ];
    const reference = new Date("2025-11-15T00:00:00Z");

    const report = assembleSeatReport({
      activity: findIdleSeats([], events, reference, [30]),
      adoption: adoptionStats(events, [OCT, NOV], makeLedger()),
      buckets: [OCT, NOV],
      topCount: 1,
      referenceDate: reference,
      generatedAt: GENERATED,
      dataQuality: [],
    });

    expect(report.usage).toEqual({
      totalRequests: 4,
      currentMonthActiveUsers: 1,
      monthly: [
        { bucketId: "10-2025", label: "October 2025", activeUsers: 2, requests: 2 },
        { bucketId: "11-2025", label: "November 2025", activeUsers: 1, requests: 2 },
      ],
      topUsers: [{ rank: 1, email: "ben@example.com", requests: 3 }],
    });
  });
});

describe("writeReport", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "shipgauge-report-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("writes the report as indented JSON under its kind", async () => {
    const report = billingReport();
    const path = reportPath(join(tempDir, "out"), report);

    expect(path).toBe(join(tempDir, "out", "billing-report.json"));
    expect(await writeReport(path, report)).toBe(path);

    const content = readFileSync(path, "utf-8");
    expect(content.endsWith("}\n")).toBe(true);
    expect(JSON.parse(content)).toEqual(report);
  });
});
