import { bucketEndMs, bucketStartMs, isoDate, type MonthBucket } from "../../cache/bucket.js";
import type { JiraSettings } from "../../config/sources.js";
import type { StatusConfig } from "../../config/types.js";
import { decodeBody, type ThrottledFetcher } from "../../http/fetcher.js";
import { fetchAll } from "../../http/paginator.js";
import type { Logger } from "../../logging/logger.js";
import type { QualityLedger } from "../../metrics/quality.js";
import type { IssueRecord } from "../../records/types.js";
import { normalizeIssue, parseRawIssue } from "./normalize.js";
import { issueChangelogSchema, searchPageSchema, type RawHistory, type RawIssue } from "./types.js";

export interface JiraClientOptions {
  readonly settings: JiraSettings;
  readonly statuses: StatusConfig;
  readonly fetcher: ThrottledFetcher;
  readonly logger: Logger;
  readonly ledger: QualityLedger;
}

export class JiraClient {
  private readonly settings: JiraSettings;
  private readonly statuses: StatusConfig;
  private readonly fetcher: ThrottledFetcher;
  private readonly logger: Logger;
  private readonly ledger: QualityLedger;

  constructor(opts: JiraClientOptions) {
    this.settings = opts.settings;
    this.statuses = opts.statuses;
    this.fetcher = opts.fetcher;
    this.logger = opts.logger.child({ component: "jira-client" });
    this.ledger = opts.ledger;
  }

  /** Issues of the project created during the month, oldest first. */
  async fetchMonth(bucket: MonthBucket): Promise<IssueRecord[]> {
    const url = `${this.settings.baseUrl}/rest/api/3/search/jql`;
    const jql =
      `project = ${this.settings.projectKey}` +
      ` AND created >= "${isoDate(bucketStartMs(bucket))}"` +
      ` AND created < "${isoDate(bucketEndMs(bucket))}"` +
      " ORDER BY created ASC";

    const raw = await fetchAll<unknown>({
      style: "cursor",
      requestPage: async (cursor) => {
        const response = await this.fetcher.request({
          method: "GET",
          url,
          params: {
            jql,
            maxResults: this.settings.pageSize,
            nextPageToken: cursor,
            expand: "changelog",
            fields: "summary,issuetype,created",
          },
          headers: { Authorization: this.settings.authHeader },
        });
        const page = decodeBody(searchPageSchema, response, url);
        return {
          items: page.issues,
          hasNextPage: page.isLast === undefined ? page.nextPageToken !== undefined : !page.isLast,
          nextCursor: page.nextPageToken,
        };
      },
    });
    this.logger.info({ count: raw.length }, "Found issues");

    const records: IssueRecord[] = [];
    for (const [index, item] of raw.entries()) {
      const parsed = parseRawIssue(item);
      if (!parsed.ok) {
        this.ledger.skip("malformed", { source: "issues", index, detail: parsed.reason });
        continue;
      }
      const histories = await this.historiesOf(parsed.record);
      const result = normalizeIssue(parsed.record, histories, this.statuses);
      if (result.ok) {
        records.push(result.record);
      } else {
        this.ledger.skip("malformed", { source: "issues", key: parsed.record.key, detail: result.reason });
      }
    }
    return records;
  }

  /** The search response may omit or truncate the changelog; then the issue is asked for it directly. */
  private async historiesOf(issue: RawIssue): Promise<RawHistory[]> {
    const changelog = issue.changelog;
    if (changelog && (changelog.total === undefined || changelog.total <= changelog.histories.length)) {
      return changelog.histories;
    }

    this.logger.debug({ key: issue.key }, "Fetching full changelog");
    const url = `${this.settings.baseUrl}/rest/api/3/issue/${encodeURIComponent(issue.key)}`;
    const response = await this.fetcher.request({
      method: "GET",
      url,
      params: { expand: "changelog", fields: "created" },
      headers: { Authorization: this.settings.authHeader },
    });
    return decodeBody(issueChangelogSchema, response, url).changelog.histories;
  }
}
