import { z } from "zod";
import type { IssueRecord, PullRequestRecord, UsageEvent } from "./types.js";

// Shapes of records as they sit in cache artifacts. Timestamps are checked
// for presence here; their format is checked where durations are computed.

export const usageEventSchema: z.ZodType<UsageEvent, z.ZodTypeDef, unknown> = z.object({
  type: z.literal("usage_event"),
  timestamp: z.string(),
  userEmail: z.string(),
  model: z.string(),
  kind: z.enum(["usage_based", "included"]),
  tokenCostCents: z.number(),
  platformFeeCents: z.number(),
  isChargeable: z.boolean(),
  isTokenBased: z.boolean(),
  tokens: z.object({
    input: z.number(),
    output: z.number(),
    cacheWrite: z.number(),
    cacheRead: z.number(),
  }),
});

export const pullRequestSchema: z.ZodType<PullRequestRecord, z.ZodTypeDef, unknown> = z.object({
  type: z.literal("pull_request"),
  repository: z.string(),
  title: z.string(),
  number: z.number().int(),
  createdAt: z.string(),
  mergedAt: z.string().nullable(),
  isMerged: z.boolean(),
  commentCount: z.number().int().nonnegative(),
  commitCount: z.number().int().nonnegative(),
  filesChangedCount: z.number().int().nonnegative(),
});

export const issueSchema: z.ZodType<IssueRecord, z.ZodTypeDef, unknown> = z.object({
  type: z.literal("issue"),
  key: z.string().min(1),
  summary: z.string(),
  issueType: z.string(),
  createdAt: z.string(),
  latestInProgressAt: z.string().nullable(),
  latestDoneAt: z.string().nullable(),
});
