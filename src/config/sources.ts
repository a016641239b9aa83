import { ConfigError } from "../errors.js";
import type { FetchConfig, ShipgaugeConfig } from "./types.js";

/** Everything a source client needs, resolved once from the config file. */
export interface SourceSettings {
  readonly baseUrl: string;
  readonly authHeader: string;
  readonly pageSize: number;
  readonly requestDelayMs: number;
  readonly maxRetries: number;
  readonly timeoutMs: number;
}

export interface GithubSettings extends SourceSettings {
  readonly organization: string;
  readonly repositories: string[];
}

export interface JiraSettings extends SourceSettings {
  readonly projectKey: string;
}

export function basicAuth(user: string, secret: string): string {
  return `Basic ${Buffer.from(`${user}:${secret}`, "utf-8").toString("base64")}`;
}

export function resolveUsageSettings(config: ShipgaugeConfig): SourceSettings {
  const usage = config.sources.usage;
  if (!usage?.apiKey) {
    throw new ConfigError("sources.usage.apiKey is required to fetch usage events");
  }
  return {
    ...fetchSettings(config.fetch, usage.pageSize),
    baseUrl: trimSlash(usage.baseUrl),
    authHeader: basicAuth(usage.apiKey, ""),
  };
}

export function resolveGithubSettings(config: ShipgaugeConfig): GithubSettings {
  const github = config.sources.github;
  if (!github?.token || !github.organization) {
    throw new ConfigError("sources.github.token and sources.github.organization are required");
  }
  if (github.repositories.length === 0) {
    throw new ConfigError("sources.github.repositories must list at least one repository");
  }
  return {
    // GitHub search caps per_page at 100
    ...fetchSettings(config.fetch, Math.min(github.pageSize ?? config.fetch.pageSize, 100)),
    baseUrl: trimSlash(github.baseUrl),
    authHeader: `Bearer ${github.token}`,
    organization: github.organization,
    repositories: github.repositories,
  };
}

export function resolveJiraSettings(config: ShipgaugeConfig): JiraSettings {
  const jira = config.sources.jira;
  if (!jira?.baseUrl || !jira.email || !jira.apiToken || !jira.projectKey) {
    throw new ConfigError(
      "sources.jira.baseUrl, email, apiToken and projectKey are required to fetch issues",
    );
  }
  return {
    ...fetchSettings(config.fetch, jira.pageSize),
    baseUrl: trimSlash(jira.baseUrl),
    authHeader: basicAuth(jira.email, jira.apiToken),
    projectKey: jira.projectKey.toUpperCase(),
  };
}

function fetchSettings(
  fetch: FetchConfig,
  pageSize: number | undefined,
): Omit<SourceSettings, "baseUrl" | "authHeader"> {
  return {
    pageSize: pageSize ?? fetch.pageSize,
    requestDelayMs: fetch.requestDelaySeconds * 1000,
    maxRetries: fetch.maxRetries,
    timeoutMs: fetch.timeoutSeconds * 1000,
  };
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "");
}
