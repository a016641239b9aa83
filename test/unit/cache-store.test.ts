import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MonthlyCacheStore } from "../../src/cache/store.js";
import { CacheCorruptError, NotFoundError } from "../../src/errors.js";
import { usageEventSchema } from "../../src/records/schema.js";
import type { UsageEvent } from "../../src/records/types.js";
import { FakeClock } from "../helpers/fake-api.js";
import { makeUsageEvent } from "../helpers/fixtures.js";

const OCT = { year: 2025, month: 10 };
const NOV = { year: 2025, month: 11 };

describe("MonthlyCacheStore", () => {
  let tempDir: string;
  let store: MonthlyCacheStore<UsageEvent>;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "shipgauge-store-"));
    store = new MonthlyCacheStore({
      cacheDir: tempDir,
      namespace: "usage",
      suffix: "usage-events",
      recordSchema: usageEventSchema,
      clock: new FakeClock(),
    });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("names artifacts by bucket and source", () => {
    expect(store.pathFor(OCT)).toBe(join(tempDir, "usage", "10-2025-usage-events.json"));
  });

  it("saves an envelope and loads the records back", async () => {
    const events = [makeUsageEvent(), makeUsageEvent({ userEmail: "ben@example.com" })];

    const path = await store.save(OCT, events);
    const envelope: unknown = JSON.parse(readFileSync(path, "utf-8"));
    expect(envelope).toMatchObject({
      bucket_id: "10-2025",
      fetched_at: "2025-11-15T12:00:00.000Z",
      record_count: 2,
    });

    const artifact = await store.load(OCT);
    expect(artifact.bucketId).toBe("10-2025");
    expect(artifact.recordCount).toBe(2);
    expect(artifact.records).toEqual(events);
    expect(artifact.rejected).toEqual([]);
  });

  it("stores an empty month as a complete artifact", async () => {
    await store.save(OCT, []);

    expect(await store.exists(OCT)).toBe(true);
    expect((await store.load(OCT)).records).toEqual([]);
  });

  it("reports a missing month as not found", async () => {
    expect(await store.exists(OCT)).toBe(false);
    await expect(store.load(OCT)).rejects.toThrow(NotFoundError);
    await expect(store.load(OCT)).rejects.toThrow("usage cache '10-2025' not found");
  });

  it("rejects a file that is not JSON", async () => {
    writeFileSync(store.pathFor(OCT), "{ half");

    await expect(store.load(OCT)).rejects.toThrow(CacheCorruptError);
  });

  it("rejects a record count that does not match", async () => {
    writeFileSync(
      store.pathFor(OCT),
      JSON.stringify({ bucket_id: "10-2025", fetched_at: "x", record_count: 3, records: [] }),
    );

    await expect(store.load(OCT)).rejects.toThrow("record_count 3 does not match 0 records");
  });

  it("rejects an artifact holding another month", async () => {
    writeFileSync(
      store.pathFor(OCT),
      JSON.stringify({ bucket_id: "09-2025", fetched_at: "x", record_count: 0, records: [] }),
    );

    await expect(store.load(OCT)).rejects.toThrow("holds bucket 09-2025");
  });

  it("sets aside records that no longer match their shape", async () => {
    const good = makeUsageEvent();
    writeFileSync(
      store.pathFor(OCT),
      JSON.stringify({
        bucket_id: "10-2025",
        fetched_at: "x",
        record_count: 3,
        records: [good, { ...good, model: 7 }, "junk"],
      }),
    );

    const artifact = await store.load(OCT);

    expect(artifact.records).toEqual([good]);
    expect(artifact.rejected).toEqual([
      { index: 1, reason: "model: Expected string, received number" },
      { index: 2, reason: "(record): Expected object, received string" },
    ]);
  });

  it("lists cached months oldest first and ignores temp files", async () => {
    await store.save(NOV, []);
    await store.save(OCT, []);
    writeFileSync(join(store.dir, "09-2025-usage-events.json.123.abcd.tmp"), "{");
    writeFileSync(join(store.dir, "notes.txt"), "");

    expect(await store.list()).toEqual([OCT, NOV]);
  });

  it("treats a month whose write never finished as absent", async () => {
    // a crash between writing the temp file and the rename
    writeFileSync(`${store.pathFor(OCT)}.999.dead.tmp`, '{"bucket_id":"10-20');

    expect(await store.exists(OCT)).toBe(false);
    expect(await store.list()).toEqual([]);
  });

  it("removes a cached month", async () => {
    await store.save(OCT, []);

    expect(await store.remove(OCT)).toBe(true);
    expect(await store.exists(OCT)).toBe(false);
    expect(await store.remove(OCT)).toBe(false);
  });
});
