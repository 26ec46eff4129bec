import { StoreError } from "../lib/errors";
import { canonicalUrl, hashContent, hashUrl } from "../lib/hash";
import type { EnrichedRecord, InsertResult, InsertStatus, RunStatus } from "../lib/types";
import type {
  IngestionRunRecord,
  IngestionStats,
  RecordStore,
  RunQuery,
  StatsQuery,
  StoreOptions,
  StoredRecord,
} from "./types";

const cloneRecord = (record: StoredRecord): StoredRecord => ({
  ...record,
  companies: [...record.companies],
  raw_metadata: { ...record.raw_metadata },
});

export class MemoryRepository implements RecordStore {
  records: StoredRecord[] = [];
  runs: IngestionRunRecord[] = [];
  private readonly now: () => Date;
  private readonly detectCrossUrlDuplicates: boolean;

  constructor(options: StoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.detectCrossUrlDuplicates = options.detectCrossUrlDuplicates ?? false;
  }

  async insert(record: EnrichedRecord, runId?: number | null): Promise<InsertResult> {
    const run = runId ? this.requireOpenRun(runId) : null;
    const urlHash = hashUrl(record.url);
    const contentHash = hashContent(record);
    const now = this.now();
    let result: InsertResult;

    const existing = this.records.find((item) => item.url_hash === urlHash);
    if (existing) {
      if (existing.content_hash === contentHash) {
        result = { status: "duplicate", recordId: existing.id, duplicateOf: existing.id };
      } else {
        existing.title = record.title;
        existing.summary = record.summary;
        existing.content_html = record.contentHtml;
        existing.category = record.category;
        existing.companies = [...record.companies];
        existing.publish_date = record.publishDate ?? existing.publish_date;
        existing.raw_metadata = { ...record.rawMetadata };
        existing.content_hash = contentHash;
        existing.scraped_at = now;
        existing.updated_at = now;
        result = { status: "updated", recordId: existing.id, duplicateOf: null };
      }
    } else {
      const twin = this.detectCrossUrlDuplicates
        ? this.records.find((item) => item.content_hash === contentHash)
        : undefined;
      if (twin) {
        result = { status: "duplicate", recordId: twin.id, duplicateOf: twin.id };
      } else {
        const id = this.records.length + 1;
        this.records.push({
          id,
          source_id: record.sourceId,
          source_type: record.sourceType,
          category: record.category,
          companies: [...record.companies],
          title: record.title,
          summary: record.summary,
          content_html: record.contentHtml,
          url: canonicalUrl(record.url),
          url_hash: urlHash,
          content_hash: contentHash,
          publish_date: record.publishDate,
          region: record.region,
          raw_metadata: { ...record.rawMetadata },
          scraped_at: now,
          created_at: now,
          updated_at: now,
        });
        result = { status: "inserted", recordId: id, duplicateOf: null };
      }
    }

    if (run) {
      this.bump(run, result.status);
    }
    return result;
  }

  async startIngestionRun(sourceId: string): Promise<number> {
    const id = this.runs.length + 1;
    this.runs.push({
      id,
      source_id: sourceId,
      started_at: this.now(),
      completed_at: null,
      status: "running",
      total_processed: 0,
      new_records: 0,
      updated_records: 0,
      duplicate_records: 0,
      error_metadata: null,
    });
    return id;
  }

  async completeIngestionRun(
    runId: number,
    status: Exclude<RunStatus, "running">,
    errorMetadata: Record<string, unknown> | null = null,
  ): Promise<IngestionRunRecord> {
    const run = this.requireOpenRun(runId);
    run.status = status;
    run.completed_at = this.now();
    run.error_metadata = errorMetadata;
    return { ...run };
  }

  async getIngestionRun(runId: number): Promise<IngestionRunRecord | null> {
    const run = this.runs.find((item) => item.id === runId);
    return run ? { ...run } : null;
  }

  async listIngestionRuns(query: RunQuery = {}): Promise<IngestionRunRecord[]> {
    return this.runs
      .filter((run) => !query.status || run.status === query.status)
      .filter((run) => !query.sourceId || run.source_id === query.sourceId)
      .sort((a, b) => b.started_at.getTime() - a.started_at.getTime() || b.id - a.id)
      .slice(0, query.limit ?? 50)
      .map((run) => ({ ...run }));
  }

  async getIngestionStats(query: StatsQuery = {}): Promise<IngestionStats> {
    const runs = this.runs.filter(
      (run) =>
        (!query.since || run.started_at >= query.since) && (!query.until || run.started_at < query.until),
    );
    return {
      totalRuns: runs.length,
      recordsProcessed: runs.reduce((sum, run) => sum + run.total_processed, 0),
      newRecords: runs.reduce((sum, run) => sum + run.new_records, 0),
      updatedRecords: runs.reduce((sum, run) => sum + run.updated_records, 0),
      duplicateRecords: runs.reduce((sum, run) => sum + run.duplicate_records, 0),
    };
  }

  async findStaleRuns(olderThanMs: number): Promise<IngestionRunRecord[]> {
    const cutoff = this.now().getTime() - olderThanMs;
    return this.runs
      .filter((run) => run.status === "running" && run.started_at.getTime() < cutoff)
      .map((run) => ({ ...run }));
  }

  async getRecordByUrl(url: string): Promise<StoredRecord | null> {
    const urlHash = hashUrl(url);
    const record = this.records.find((item) => item.url_hash === urlHash);
    return record ? cloneRecord(record) : null;
  }

  async countRecords(): Promise<number> {
    return this.records.length;
  }

  async close(): Promise<void> {}

  private requireOpenRun(runId: number) {
    const run = this.runs.find((item) => item.id === runId);
    if (!run) {
      throw new StoreError(`Ingestion run ${runId} does not exist`);
    }
    if (run.status !== "running") {
      throw new StoreError(`Ingestion run ${runId} is already ${run.status}`);
    }
    return run;
  }

  private bump(run: IngestionRunRecord, status: InsertStatus) {
    run.total_processed += 1;
    if (status === "inserted") {
      run.new_records += 1;
    } else if (status === "updated") {
      run.updated_records += 1;
    } else {
      run.duplicate_records += 1;
    }
  }
}
