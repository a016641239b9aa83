/** Timestamps in records are always `YYYY-MM-DD HH:MM:SS`, UTC. */
export type WireTimestamp = string;

export type UsageKind = "usage_based" | "included";

export interface TokenCounts {
  readonly input: number;
  readonly output: number;
  readonly cacheWrite: number;
  readonly cacheRead: number;
}

export interface UsageEvent {
  readonly type: "usage_event";
  readonly timestamp: WireTimestamp;
  readonly userEmail: string;
  readonly model: string;
  readonly kind: UsageKind;
  readonly tokenCostCents: number;
  readonly platformFeeCents: number;
  readonly isChargeable: boolean;
  readonly isTokenBased: boolean;
  readonly tokens: TokenCounts;
}

export interface PullRequestRecord {
  readonly type: "pull_request";
  readonly repository: string;
  readonly title: string;
  readonly number: number;
  readonly createdAt: WireTimestamp;
  readonly mergedAt: WireTimestamp | null;
  readonly isMerged: boolean;
  readonly commentCount: number;
  readonly commitCount: number;
  readonly filesChangedCount: number;
}

export interface IssueRecord {
  readonly type: "issue";
  readonly key: string;
  readonly summary: string;
  readonly issueType: string;
  readonly createdAt: WireTimestamp;
  readonly latestInProgressAt: WireTimestamp | null;
  readonly latestDoneAt: WireTimestamp | null;
}

export interface TeamMember {
  readonly name: string;
  readonly email: string;
  readonly userId: string;
  readonly role: string;
  readonly isRemoved: boolean;
}

export function usageEventCostCents(event: UsageEvent): number {
  return event.tokenCostCents + event.platformFeeCents;
}

export function totalTokens(tokens: TokenCounts): number {
  return tokens.input + tokens.output + tokens.cacheWrite + tokens.cacheRead;
}
