import type { Logger } from "../logging/logger.js";
import { withFileLock } from "../utils/file-lock.js";
import { formatBucketId, type MonthBucket } from "./bucket.js";
import type { MonthlyCacheStore } from "./store.js";

export interface SyncOptions<T> {
  readonly store: MonthlyCacheStore<T>;
  readonly buckets: readonly MonthBucket[];
  fetchBucket(bucket: MonthBucket): Promise<T[]>;
  readonly logger: Logger;
}

export interface SyncResult {
  readonly fetched: string[];
  readonly skipped: string[];
}

/**
 * Fetch-if-absent over a range of months. Each missing month is persisted
 * before the next one is requested, so an aborted run keeps what it finished
 * and a re-run only asks for the rest.
 */
export async function syncBuckets<T>(opts: SyncOptions<T>): Promise<SyncResult> {
  const log = opts.logger.child({ component: "sync", namespace: opts.store.namespace });

  return withFileLock(opts.store.dir, async () => {
    const fetched: string[] = [];
    const skipped: string[] = [];

    for (const bucket of opts.buckets) {
      const id = formatBucketId(bucket);
      if (await opts.store.exists(bucket)) {
        log.debug({ bucket: id }, "Cached, skipping");
        skipped.push(id);
        continue;
      }

      log.info({ bucket: id }, "Fetching month");
      const records = await opts.fetchBucket(bucket);
      const path = await opts.store.save(bucket, records);
      log.info({ bucket: id, records: records.length, path }, "Month cached");
      fetched.push(id);
    }

    return { fetched, skipped };
  });
}
