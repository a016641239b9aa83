export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface ShipgaugeConfig {
  readonly fetch: FetchConfig;
  readonly range: RangeConfig;
  readonly sources: SourcesConfig;
  readonly statuses: StatusConfig;
  readonly metrics: MetricsConfig;
  readonly billing: BillingConfig;
  readonly seats: SeatsConfig;
  readonly cacheDir?: string;
  readonly outputDir?: string;
  readonly logging: LoggingConfig;
}

export interface FetchConfig {
  readonly pageSize: number;
  readonly requestDelaySeconds: number;
  readonly maxRetries: number;
  readonly timeoutSeconds: number;
}

/** Either the last `monthsBack` months (current month included) or an explicit MM-YYYY span. */
export interface RangeConfig {
  readonly monthsBack: number;
  readonly from?: string;
  readonly to?: string;
}

export interface SourcesConfig {
  readonly usage?: UsageSourceConfig;
  readonly github?: GithubSourceConfig;
  readonly jira?: JiraSourceConfig;
}

export interface UsageSourceConfig {
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly pageSize?: number;
}

export interface GithubSourceConfig {
  readonly baseUrl: string;
  readonly token?: string;
  readonly organization?: string;
  readonly repositories: string[];
  readonly pageSize?: number;
}

export interface JiraSourceConfig {
  readonly baseUrl?: string;
  readonly email?: string;
  readonly apiToken?: string;
  readonly projectKey?: string;
  readonly pageSize?: number;
}

export interface StatusConfig {
  readonly inProgress: string[];
  readonly done: string[];
}

export interface MetricsConfig {
  readonly cycleTime: { readonly issueTypes: string[] };
  readonly bugResolution: { readonly issueTypes: string[] };
}

export interface BillingConfig {
  readonly topCount: number;
  readonly topModelsForUsers: number;
}

export interface SeatsConfig {
  readonly thresholdsDays: number[];
  /** Length of the request-count leaderboard. */
  readonly topCount: number;
  readonly referenceDate?: string;
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}
