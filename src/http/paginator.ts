import { ShipgaugeError } from "../errors.js";

export interface OffsetPage<T> {
  readonly items: T[];
  readonly total: number;
}

export interface CursorPage<T> {
  readonly items: T[];
  readonly hasNextPage: boolean;
  readonly nextCursor?: string;
}

/** `startAt`/`maxResults` style: stop once offset + pageSize reaches the reported total. */
export interface OffsetQuery<T> {
  readonly style: "offset";
  readonly pageSize: number;
  requestPage(offset: number, limit: number): Promise<OffsetPage<T>>;
}

/** `hasNextPage` style: each response says whether another page follows and how to ask for it. */
export interface CursorQuery<T> {
  readonly style: "cursor";
  /** Upper bound on requests; a query still announcing more pages after this fails. */
  readonly maxPages?: number;
  requestPage(cursor: string | undefined): Promise<CursorPage<T>>;
}

export type PageQuery<T> = OffsetQuery<T> | CursorQuery<T>;

/**
 * Drives one logical query to exhaustion. Pages are requested strictly one
 * after another and concatenated in request order; a failing page rejects
 * the whole call.
 */
export async function fetchAll<T>(query: PageQuery<T>): Promise<T[]> {
  return query.style === "offset" ? fetchOffsetPages(query) : fetchCursorPages(query);
}

async function fetchOffsetPages<T>(query: OffsetQuery<T>): Promise<T[]> {
  if (query.pageSize <= 0) {
    throw new ShipgaugeError(`Page size must be positive, got ${query.pageSize}`, "INVALID_PAGE_SIZE");
  }

  const items: T[] = [];
  let offset = 0;

  for (;;) {
    const page = await query.requestPage(offset, query.pageSize);
    items.push(...page.items);

    if (page.items.length === 0 || offset + query.pageSize >= page.total) break;
    offset += query.pageSize;
  }

  return items;
}

async function fetchCursorPages<T>(query: CursorQuery<T>): Promise<T[]> {
  const items: T[] = [];
  let cursor: string | undefined;

  for (let requested = 1; ; requested++) {
    const page = await query.requestPage(cursor);
    items.push(...page.items);

    if (!page.hasNextPage) break;
    if (query.maxPages !== undefined && requested >= query.maxPages) {
      throw new ShipgaugeError(
        `Paginated response still announced more pages after ${requested} requests`,
        "PAGINATION_LIMIT",
      );
    }
    if (page.nextCursor === undefined || page.nextCursor === cursor) {
      throw new ShipgaugeError(
        "Paginated response announced another page without a new cursor",
        "PAGINATION_STALLED",
      );
    }
    cursor = page.nextCursor;
  }

  return items;
}
