import type { StatusConfig } from "../../config/types.js";
import type { IssueRecord, WireTimestamp } from "../../records/types.js";
import { formatWireTimestamp, normalizeTimestamp, parseWireTimestamp } from "../timestamps.js";
import { rejectFrom, type Normalized } from "../types.js";
import { rawIssueSchema, type RawHistory, type RawIssue } from "./types.js";

export function parseRawIssue(raw: unknown): Normalized<RawIssue> {
  const parsed = rawIssueSchema.safeParse(raw);
  return parsed.success ? { ok: true, record: parsed.data } : rejectFrom(parsed.error);
}

export interface StatusTimestamps {
  readonly latestInProgressAt: WireTimestamp | null;
  readonly latestDoneAt: WireTimestamp | null;
}

/**
 * Latest transition into any of the configured statuses. Histories are not
 * assumed to be ordered; the greatest timestamp wins.
 */
export function extractStatusTimestamps(
  histories: readonly RawHistory[],
  statuses: StatusConfig,
): StatusTimestamps {
  const inProgress = new Set(statuses.inProgress);
  const done = new Set(statuses.done);
  let latestInProgress: number | null = null;
  let latestDone: number | null = null;

  for (const history of histories) {
    const wire = normalizeTimestamp(history.created);
    const at = wire === null ? null : parseWireTimestamp(wire);
    if (at === null) continue;

    for (const item of history.items) {
      const to = item["toString"];
      if (item["field"] !== "status" || typeof to !== "string") continue;
      if (inProgress.has(to) && (latestInProgress === null || at > latestInProgress)) {
        latestInProgress = at;
      }
      if (done.has(to) && (latestDone === null || at > latestDone)) {
        latestDone = at;
      }
    }
  }

  return {
    latestInProgressAt: latestInProgress === null ? null : formatWireTimestamp(latestInProgress),
    latestDoneAt: latestDone === null ? null : formatWireTimestamp(latestDone),
  };
}

export function normalizeIssue(
  issue: RawIssue,
  histories: readonly RawHistory[],
  statuses: StatusConfig,
): Normalized<IssueRecord> {
  const createdAt = normalizeTimestamp(issue.fields.created);
  if (createdAt === null) {
    return { ok: false, reason: `unparseable created ${JSON.stringify(issue.fields.created)}` };
  }

  return {
    ok: true,
    record: {
      type: "issue",
      key: issue.key.toUpperCase(),
      summary: issue.fields.summary ?? "",
      issueType: issue.fields.issuetype.name,
      createdAt,
      ...extractStatusTimestamps(histories, statuses),
    },
  };
}
