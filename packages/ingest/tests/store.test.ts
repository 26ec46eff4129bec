import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StoreError } from "../src/lib/errors";
import { MemoryRepository } from "../src/repo/memory";
import { SqliteRepository } from "../src/repo/sqlite";
import type { RecordStore, StoreOptions } from "../src/repo/types";
import { makeEnriched } from "./helpers";

const factories: Array<[string, (options: StoreOptions) => RecordStore]> = [
  ["memory", (options) => new MemoryRepository(options)],
  ["sqlite", (options) => new SqliteRepository(":memory:", options)],
];

describe.each(factories)("%s store", (_name, create) => {
  let current = new Date("2024-05-01T00:00:00.000Z");
  const clock = { now: () => current };
  const advance = (minutes: number) => {
    current = new Date(current.getTime() + minutes * 60_000);
  };
  let store: RecordStore;

  beforeEach(() => {
    current = new Date("2024-05-01T00:00:00.000Z");
    store = create(clock);
  });

  afterEach(async () => {
    await store.close();
  });

  it("inserts, detects duplicates and updates changed content", async () => {
    const original = makeEnriched({ companies: ["迈瑞医疗"], category: "bidding_tendering" });

    const first = await store.insert(original);
    const again = await store.insert(makeEnriched({ companies: ["迈瑞医疗"], category: "bidding_tendering" }));
    advance(5);
    const changed = await store.insert(
      makeEnriched({ summary: "Deadline extended", companies: ["迈瑞医疗"], category: "bidding_tendering" }),
    );

    expect(first).toEqual({ status: "inserted", recordId: 1, duplicateOf: null });
    expect(again).toEqual({ status: "duplicate", recordId: 1, duplicateOf: 1 });
    expect(changed).toEqual({ status: "updated", recordId: 1, duplicateOf: null });
    expect(await store.countRecords()).toBe(1);

    const stored = await store.getRecordByUrl("https://Example.test/notice/1/?utm_source=mail");
    expect(stored?.summary).toBe("Deadline extended");
    expect(stored?.companies).toEqual(["迈瑞医疗"]);
    expect(stored?.category).toBe("bidding_tendering");
    expect(stored?.created_at.toISOString()).toBe("2024-05-01T00:00:00.000Z");
    expect(stored?.updated_at.toISOString()).toBe("2024-05-01T00:05:00.000Z");
  });

  it("treats tracking parameters as the same URL", async () => {
    await store.insert(makeEnriched({ url: "https://example.test/notice/9?id=3" }));

    const result = await store.insert(makeEnriched({ url: "https://EXAMPLE.test/notice/9?utm_campaign=x&id=3#top" }));

    expect(result.status).toBe("duplicate");
    expect((await store.getRecordByUrl("https://example.test/notice/9?id=3"))?.url).toBe(
      "https://example.test/notice/9?id=3",
    );
  });

  it("keeps a known publish date when an update has none", async () => {
    await store.insert(makeEnriched({ publishDate: new Date("2024-04-30T08:00:00.000Z") }));

    const result = await store.insert(makeEnriched({ title: "Reagent tender notice (revised)", publishDate: null }));

    expect(result.status).toBe("updated");
    const stored = await store.getRecordByUrl("https://example.test/notice/1");
    expect(stored?.title).toBe("Reagent tender notice (revised)");
    expect(stored?.publish_date?.toISOString()).toBe("2024-04-30T08:00:00.000Z");
  });

  it("stores identical content under different URLs unless asked otherwise", async () => {
    await store.insert(makeEnriched({ url: "https://example.test/a" }));
    const second = await store.insert(makeEnriched({ url: "https://mirror.example.test/a" }));
    expect(second.status).toBe("inserted");

    const strict = create({ ...clock, detectCrossUrlDuplicates: true });
    await strict.insert(makeEnriched({ url: "https://example.test/a" }));
    const mirrored = await strict.insert(makeEnriched({ url: "https://mirror.example.test/a" }));
    await strict.close();

    expect(mirrored).toEqual({ status: "duplicate", recordId: 1, duplicateOf: 1 });
  });

  it("counts inserts against an open run and closes it once", async () => {
    const runId = await store.startIngestionRun("all");

    await store.insert(makeEnriched({ url: "https://example.test/a" }), runId);
    await store.insert(makeEnriched({ url: "https://example.test/a" }), runId);
    await store.insert(makeEnriched({ url: "https://example.test/b" }), runId);
    advance(2);
    const run = await store.completeIngestionRun(runId, "completed");

    expect(run).toEqual({
      id: runId,
      source_id: "all",
      started_at: new Date("2024-05-01T00:00:00.000Z"),
      completed_at: new Date("2024-05-01T00:02:00.000Z"),
      status: "completed",
      total_processed: 3,
      new_records: 2,
      updated_records: 0,
      duplicate_records: 1,
      error_metadata: null,
    });
    await expect(store.insert(makeEnriched({ url: "https://example.test/c" }), runId)).rejects.toThrow(
      `Ingestion run ${runId} is already completed`,
    );
    await expect(store.completeIngestionRun(runId, "failed")).rejects.toBeInstanceOf(StoreError);
    await expect(store.insert(makeEnriched(), 99)).rejects.toThrow("Ingestion run 99 does not exist");
    expect(await store.countRecords()).toBe(2);
  });

  it("records error metadata on failed runs", async () => {
    const runId = await store.startIngestionRun("ccgp_procurement");

    await store.completeIngestionRun(runId, "failed", { code: "STORE_FAILED", failed_sources: ["ccgp_procurement"] });

    const run = await store.getIngestionRun(runId);
    expect(run?.status).toBe("failed");
    expect(run?.error_metadata).toEqual({ code: "STORE_FAILED", failed_sources: ["ccgp_procurement"] });
    expect(await store.getIngestionRun(404)).toBeNull();
  });

  it("lists runs newest first with filters", async () => {
    const first = await store.startIngestionRun("a");
    advance(1);
    const second = await store.startIngestionRun("b");
    advance(1);
    const third = await store.startIngestionRun("a");
    await store.completeIngestionRun(first, "failed");

    expect((await store.listIngestionRuns()).map((run) => run.id)).toEqual([third, second, first]);
    expect((await store.listIngestionRuns({ status: "running" })).map((run) => run.id)).toEqual([third, second]);
    expect((await store.listIngestionRuns({ sourceId: "a", limit: 1 })).map((run) => run.id)).toEqual([third]);
  });

  it("aggregates run counters over a time window", async () => {
    const early = await store.startIngestionRun("all");
    await store.insert(makeEnriched({ url: "https://example.test/a" }), early);
    await store.completeIngestionRun(early, "completed");
    advance(60);
    const late = await store.startIngestionRun("all");
    await store.insert(makeEnriched({ url: "https://example.test/a" }), late);
    await store.insert(makeEnriched({ url: "https://example.test/b" }), late);
    await store.completeIngestionRun(late, "completed");

    expect(await store.getIngestionStats()).toEqual({
      totalRuns: 2,
      recordsProcessed: 3,
      newRecords: 2,
      updatedRecords: 0,
      duplicateRecords: 1,
    });
    expect(await store.getIngestionStats({ since: new Date("2024-05-01T00:30:00.000Z") })).toEqual({
      totalRuns: 1,
      recordsProcessed: 2,
      newRecords: 1,
      updatedRecords: 0,
      duplicateRecords: 1,
    });
    expect(await store.getIngestionStats({ until: new Date("2024-04-01T00:00:00.000Z") })).toEqual({
      totalRuns: 0,
      recordsProcessed: 0,
      newRecords: 0,
      updatedRecords: 0,
      duplicateRecords: 0,
    });
  });

  it("finds runs left running past a cutoff", async () => {
    const abandoned = await store.startIngestionRun("all");
    advance(180);
    await store.startIngestionRun("all");

    expect((await store.findStaleRuns(120 * 60_000)).map((run) => run.id)).toEqual([abandoned]);
  });
});
