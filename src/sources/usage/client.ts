import { bucketEndMs, bucketLabel, bucketStartMs, type MonthBucket } from "../../cache/bucket.js";
import type { SourceSettings } from "../../config/sources.js";
import { decodeBody, type ThrottledFetcher } from "../../http/fetcher.js";
import { fetchAll } from "../../http/paginator.js";
import type { Logger } from "../../logging/logger.js";
import type { QualityLedger } from "../../metrics/quality.js";
import type { TeamMember, UsageEvent } from "../../records/types.js";
import { normalizeTeamMember, normalizeUsageEvent } from "./normalize.js";
import { teamMembersSchema, usageEventsPageSchema } from "./types.js";

const MAX_PAGES = 10_000;

export interface UsageClientOptions {
  readonly settings: SourceSettings;
  readonly fetcher: ThrottledFetcher;
  readonly logger: Logger;
  readonly ledger: QualityLedger;
}

/** Admin API of the AI coding tool: per-request usage events and seat holders. */
export class UsageClient {
  private readonly settings: SourceSettings;
  private readonly fetcher: ThrottledFetcher;
  private readonly logger: Logger;
  private readonly ledger: QualityLedger;

  constructor(opts: UsageClientOptions) {
    this.settings = opts.settings;
    this.fetcher = opts.fetcher;
    this.logger = opts.logger.child({ component: "usage-client" });
    this.ledger = opts.ledger;
  }

  /** Every usage event of the month, all kinds; billing filters them later. */
  async fetchMonth(bucket: MonthBucket): Promise<UsageEvent[]> {
    const url = `${this.settings.baseUrl}/teams/filtered-usage-events`;
    const startDate = bucketStartMs(bucket);
    const endDate = bucketEndMs(bucket);

    const raw = await fetchAll<unknown>({
      style: "cursor",
      maxPages: MAX_PAGES,
      requestPage: async (cursor) => {
        const page = cursor === undefined ? 1 : Number(cursor);
        const response = await this.fetcher.request({
          method: "POST",
          url,
          headers: { Authorization: this.settings.authHeader },
          body: { startDate, endDate, page, pageSize: this.settings.pageSize },
        });
        const data = decodeBody(usageEventsPageSchema, response, url);
        this.logger.debug(
          { month: bucketLabel(bucket), page, numPages: data.pagination.numPages },
          "Fetched usage page",
        );
        const { hasNextPage, numPages } = data.pagination;
        return {
          items: data.usageEvents,
          hasNextPage: hasNextPage && (numPages === undefined || page < numPages),
          nextCursor: String(page + 1),
        };
      },
    });

    const events: UsageEvent[] = [];
    raw.forEach((item, index) => {
      const result = normalizeUsageEvent(item);
      if (result.ok) {
        events.push(result.record);
      } else {
        this.ledger.skip("malformed", { source: "usage", index, detail: result.reason });
      }
    });
    return events;
  }

  async fetchTeamMembers(): Promise<TeamMember[]> {
    const url = `${this.settings.baseUrl}/teams/members`;
    const response = await this.fetcher.request({
      method: "GET",
      url,
      headers: { Authorization: this.settings.authHeader },
    });
    return decodeBody(teamMembersSchema, response, url).teamMembers.map(normalizeTeamMember);
  }
}
