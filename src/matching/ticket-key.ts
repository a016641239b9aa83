import type { IssueRecord, PullRequestRecord } from "../records/types.js";

const TICKET_KEY = /^([A-Za-z]+)-(\d+):/;

/**
 * Ticket key at the very start of a title, e.g. `"oa-414: Fix"` -> `"OA-414"`.
 * Titles without one (release bots, dependency bumps) yield null.
 */
export function extractTicketKey(text: string): string | null {
  const match = TICKET_KEY.exec(text.trim());
  if (!match?.[1] || !match[2]) return null;
  return `${match[1].toUpperCase()}-${match[2]}`;
}

export type IssueIndex = ReadonlyMap<string, IssueRecord>;

/** Keyed by uppercased issue key; a later duplicate replaces an earlier one. */
export function buildIssueIndex(issues: Iterable<IssueRecord>): IssueIndex {
  const index = new Map<string, IssueRecord>();
  for (const issue of issues) {
    index.set(issue.key.toUpperCase(), issue);
  }
  return index;
}

export function resolveIssue(key: string | null, index: IssueIndex): IssueRecord | null {
  if (key === null) return null;
  return index.get(key.toUpperCase()) ?? null;
}

export interface MatchedPullRequest {
  readonly pr: PullRequestRecord;
  readonly issue: IssueRecord;
  readonly key: string;
}

export interface MatchResult {
  readonly matched: MatchedPullRequest[];
  readonly unmatched: PullRequestRecord[];
}

export function matchPullRequest(pr: PullRequestRecord, index: IssueIndex): MatchedPullRequest | null {
  const key = extractTicketKey(pr.title);
  const issue = resolveIssue(key, index);
  return key !== null && issue !== null ? { pr, issue, key } : null;
}

export function matchPullRequests(prs: readonly PullRequestRecord[], index: IssueIndex): MatchResult {
  const matched: MatchedPullRequest[] = [];
  const unmatched: PullRequestRecord[] = [];
  for (const pr of prs) {
    const match = matchPullRequest(pr, index);
    if (match) matched.push(match);
    else unmatched.push(pr);
  }
  return { matched, unmatched };
}
