import { mkdirSync } from "node:fs";
import { readdir, readFile, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { z, type ZodType, type ZodTypeDef } from "zod";
import { CacheCorruptError, NotFoundError } from "../errors.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { writeFileAtomic } from "../utils/atomic-write.js";
import { compareBuckets, formatBucketId, parseBucketId, type MonthBucket } from "./bucket.js";

export interface CacheArtifact<T> {
  readonly bucketId: string;
  readonly fetchedAt: string;
  readonly recordCount: number;
  readonly records: T[];
  /** Records present on disk that no longer match the record shape. */
  readonly rejected: RejectedRecord[];
}

export interface RejectedRecord {
  readonly index: number;
  readonly reason: string;
}

export interface CacheStoreOptions<T> {
  readonly cacheDir: string;
  /** Sub-directory per source, e.g. "usage". */
  readonly namespace: string;
  /** File name tail after the bucket id, e.g. "usage-events". */
  readonly suffix: string;
  readonly recordSchema: ZodType<T, ZodTypeDef, unknown>;
  readonly clock?: Clock;
}

const envelopeSchema = z.object({
  bucket_id: z.string(),
  fetched_at: z.string(),
  record_count: z.number().int().nonnegative(),
  records: z.array(z.unknown()),
});

/**
 * One JSON artifact per month per source. An artifact that exists is complete:
 * writes go through a temp file and a rename, so a crash never leaves a
 * half-written file under the final name.
 */
export class MonthlyCacheStore<T> {
  readonly dir: string;
  readonly namespace: string;
  private readonly suffix: string;
  private readonly recordSchema: ZodType<T, ZodTypeDef, unknown>;
  private readonly clock: Clock;
  private readonly fileName: RegExp;

  constructor(opts: CacheStoreOptions<T>) {
    this.namespace = opts.namespace;
    this.dir = join(opts.cacheDir, opts.namespace);
    mkdirSync(this.dir, { recursive: true });
    this.suffix = opts.suffix;
    this.recordSchema = opts.recordSchema;
    this.clock = opts.clock ?? systemClock;
    this.fileName = new RegExp(`^(\\d{2}-\\d{4})-${escapeRegExp(opts.suffix)}\\.json$`);
  }

  pathFor(bucket: MonthBucket): string {
    return join(this.dir, `${formatBucketId(bucket)}-${this.suffix}.json`);
  }

  async exists(bucket: MonthBucket): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(bucket));
      return info.isFile();
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async load(bucket: MonthBucket): Promise<CacheArtifact<T>> {
    const path = this.pathFor(bucket);

    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (err) {
      if (isMissing(err)) {
        throw new NotFoundError(`${this.namespace} cache`, formatBucketId(bucket));
      }
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new CacheCorruptError(path, err instanceof Error ? err.message : String(err));
    }

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new CacheCorruptError(path, envelope.error.issues[0]?.message ?? "invalid envelope");
    }
    const { bucket_id, fetched_at, record_count, records } = envelope.data;
    if (bucket_id !== formatBucketId(bucket)) {
      throw new CacheCorruptError(path, `holds bucket ${bucket_id}`);
    }
    if (record_count !== records.length) {
      throw new CacheCorruptError(
        path,
        `record_count ${record_count} does not match ${records.length} records`,
      );
    }

    const valid: T[] = [];
    const rejected: RejectedRecord[] = [];
    records.forEach((record, index) => {
      const parsed = this.recordSchema.safeParse(record);
      if (parsed.success) {
        valid.push(parsed.data);
      } else {
        const issue = parsed.error.issues[0];
        rejected.push({
          index,
          reason: issue ? `${issue.path.join(".") || "(record)"}: ${issue.message}` : "invalid record",
        });
      }
    });

    return {
      bucketId: bucket_id,
      fetchedAt: fetched_at,
      recordCount: record_count,
      records: valid,
      rejected,
    };
  }

  async save(bucket: MonthBucket, records: readonly T[]): Promise<string> {
    const path = this.pathFor(bucket);
    const content = JSON.stringify(
      {
        bucket_id: formatBucketId(bucket),
        fetched_at: new Date(this.clock.now()).toISOString(),
        record_count: records.length,
        records,
      },
      null,
      2,
    );
    await writeFileAtomic(path, content + "\n");
    return path;
  }

  /** Cached buckets, oldest first. Leftover temp files are not artifacts and are ignored. */
  async list(): Promise<MonthBucket[]> {
    const entries = await readdir(this.dir);
    const buckets: MonthBucket[] = [];
    for (const entry of entries) {
      const match = this.fileName.exec(entry);
      if (!match?.[1]) continue;
      try {
        buckets.push(parseBucketId(match[1]));
      } catch {
        // a name like 13-2025 matches the pattern but is no bucket
        continue;
      }
    }
    return buckets.sort(compareBuckets);
  }

  async remove(bucket: MonthBucket): Promise<boolean> {
    if (!(await this.exists(bucket))) return false;
    await rm(this.pathFor(bucket));
    return true;
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
