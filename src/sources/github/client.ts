import { bucketEndMs, bucketStartMs, isoDate, type MonthBucket } from "../../cache/bucket.js";
import type { GithubSettings } from "../../config/sources.js";
import { decodeBody, type ThrottledFetcher } from "../../http/fetcher.js";
import { fetchAll } from "../../http/paginator.js";
import type { Logger } from "../../logging/logger.js";
import type { QualityLedger } from "../../metrics/quality.js";
import type { PullRequestRecord } from "../../records/types.js";
import { normalizePullRequest } from "./normalize.js";
import { searchPageSchema, type SearchItem } from "./types.js";

export interface GithubClientOptions {
  readonly settings: GithubSettings;
  readonly fetcher: ThrottledFetcher;
  readonly logger: Logger;
  readonly ledger: QualityLedger;
}

const ACCEPT = "application/vnd.github+json";

export class GithubClient {
  private readonly settings: GithubSettings;
  private readonly fetcher: ThrottledFetcher;
  private readonly logger: Logger;
  private readonly ledger: QualityLedger;

  constructor(opts: GithubClientOptions) {
    this.settings = opts.settings;
    this.fetcher = opts.fetcher;
    this.logger = opts.logger.child({ component: "github-client" });
    this.ledger = opts.ledger;
  }

  /** Pull requests created during the month across all configured repositories, in repository order. */
  async fetchMonth(bucket: MonthBucket): Promise<PullRequestRecord[]> {
    const records: PullRequestRecord[] = [];
    for (const repository of this.settings.repositories) {
      const items = await this.searchRepository(repository, bucket);
      this.logger.info({ repository, count: items.length }, "Found pull requests");

      for (const item of items) {
        const detail = await this.fetchDetail(repository, item.number);
        const result = normalizePullRequest(repository, detail);
        if (result.ok) {
          records.push(result.record);
        } else {
          this.ledger.skip("malformed", {
            source: "pulls",
            repository,
            number: item.number,
            detail: result.reason,
          });
        }
      }
    }
    return records;
  }

  private async searchRepository(repository: string, bucket: MonthBucket): Promise<SearchItem[]> {
    const url = `${this.settings.baseUrl}/search/issues`;
    const from = isoDate(bucketStartMs(bucket));
    const to = isoDate(bucketEndMs(bucket) - 1);
    const q = `repo:${this.settings.organization}/${repository} is:pr created:${from}..${to}`;

    return fetchAll<SearchItem>({
      style: "offset",
      pageSize: this.settings.pageSize,
      requestPage: async (offset, limit) => {
        const response = await this.fetcher.request({
          method: "GET",
          url,
          params: { q, sort: "created", order: "asc", per_page: limit, page: offset / limit + 1 },
          headers: { Authorization: this.settings.authHeader, Accept: ACCEPT },
        });
        const page = decodeBody(searchPageSchema, response, url);
        return { items: page.items, total: page.total_count };
      },
    });
  }

  private async fetchDetail(repository: string, number: number): Promise<unknown> {
    const url = `${this.settings.baseUrl}/repos/${this.settings.organization}/${repository}/pulls/${number}`;
    const response = await this.fetcher.request({
      method: "GET",
      url,
      headers: { Authorization: this.settings.authHeader, Accept: ACCEPT },
    });
    return response.body;
  }
}
