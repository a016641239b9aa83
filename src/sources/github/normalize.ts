import type { PullRequestRecord } from "../../records/types.js";
import { normalizeTimestamp } from "../timestamps.js";
import { rejectFrom, type Normalized } from "../types.js";
import { rawPullRequestSchema } from "./types.js";

export function normalizePullRequest(repository: string, raw: unknown): Normalized<PullRequestRecord> {
  const parsed = rawPullRequestSchema.safeParse(raw);
  if (!parsed.success) return rejectFrom(parsed.error);
  const pr = parsed.data;

  const createdAt = normalizeTimestamp(pr.created_at);
  if (createdAt === null) {
    return { ok: false, reason: `unparseable created_at ${JSON.stringify(pr.created_at)}` };
  }
  const mergedAt = pr.merged_at === null ? null : normalizeTimestamp(pr.merged_at);
  if (pr.merged_at !== null && mergedAt === null) {
    return { ok: false, reason: `unparseable merged_at ${JSON.stringify(pr.merged_at)}` };
  }

  return {
    ok: true,
    record: {
      type: "pull_request",
      repository,
      title: pr.title,
      number: pr.number,
      createdAt,
      mergedAt,
      isMerged: pr.merged ?? mergedAt !== null,
      commentCount: pr.comments + pr.review_comments,
      commitCount: pr.commits,
      filesChangedCount: pr.changed_files,
    },
  };
}
