import { openDatabase, type IngestionRunRow, type RecordRow, type SqliteDatabase } from "@ivdsignal/db";
import { StoreError } from "../lib/errors";
import { canonicalUrl, hashContent, hashUrl } from "../lib/hash";
import {
  CATEGORIES,
  SOURCE_TYPES,
  type EnrichedRecord,
  type InsertResult,
  type InsertStatus,
  type RunStatus,
} from "../lib/types";
import type {
  IngestionRunRecord,
  IngestionStats,
  RecordStore,
  RunQuery,
  StatsQuery,
  StoreOptions,
  StoredRecord,
} from "./types";

const RUN_STATUSES: readonly RunStatus[] = ["running", "completed", "failed"];

const COUNTER_COLUMNS: Record<InsertStatus, string> = {
  inserted: "new_records",
  updated: "updated_records",
  duplicate: "duplicate_records",
};

const parseJson = (value: string | null): unknown => {
  if (!value) {
    return null;
  }
  try {
    return JSON.parse(value);
  } catch {
    return null;
  }
};

const parseObject = (value: string | null): Record<string, unknown> | null => {
  const parsed = parseJson(value);
  if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return null;
};

const parseStringList = (value: string | null): string[] => {
  const parsed = parseJson(value);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
};

const toDate = (value: string | null) => (value ? new Date(value) : null);

const toRecord = (row: RecordRow): StoredRecord => ({
  id: row.id,
  source_id: row.source_id,
  source_type: SOURCE_TYPES.find((type) => type === row.source_type) ?? "industry_media",
  category: CATEGORIES.find((category) => category === row.category) ?? "unknown",
  companies: parseStringList(row.companies),
  title: row.title,
  summary: row.summary,
  content_html: row.content_html,
  url: row.url,
  url_hash: row.url_hash,
  content_hash: row.content_hash,
  publish_date: toDate(row.publish_date),
  region: row.region,
  raw_metadata: parseObject(row.raw_metadata) ?? {},
  scraped_at: new Date(row.scraped_at),
  created_at: new Date(row.created_at),
  updated_at: new Date(row.updated_at),
});

const toRun = (row: IngestionRunRow): IngestionRunRecord => ({
  id: row.id,
  source_id: row.source_id,
  started_at: new Date(row.started_at),
  completed_at: toDate(row.completed_at),
  status: RUN_STATUSES.find((status) => status === row.status) ?? "failed",
  total_processed: row.total_processed,
  new_records: row.new_records,
  updated_records: row.updated_records,
  duplicate_records: row.duplicate_records,
  error_metadata: parseObject(row.error_metadata),
});

type StatsRow = {
  total_runs: number;
  records_processed: number | null;
  new_records: number | null;
  updated_records: number | null;
  duplicate_records: number | null;
};

export class SqliteRepository implements RecordStore {
  private readonly db: SqliteDatabase;
  private readonly now: () => Date;
  private readonly detectCrossUrlDuplicates: boolean;

  constructor(db: SqliteDatabase | string, options: StoreOptions = {}) {
    this.db = typeof db === "string" ? this.guard(() => openDatabase(db), "open database") : db;
    this.now = options.now ?? (() => new Date());
    this.detectCrossUrlDuplicates = options.detectCrossUrlDuplicates ?? false;
  }

  async insert(record: EnrichedRecord, runId?: number | null): Promise<InsertResult> {
    const urlHash = hashUrl(record.url);
    const contentHash = hashContent(record);
    const now = this.now().toISOString();

    const transaction = this.db.transaction((): InsertResult => {
      if (runId) {
        this.requireOpenRun(runId);
      }
      const result = this.upsert(record, urlHash, contentHash, now);
      if (runId) {
        this.db
          .prepare<[number]>(
            `UPDATE ingestion_runs
             SET total_processed = total_processed + 1,
                 ${COUNTER_COLUMNS[result.status]} = ${COUNTER_COLUMNS[result.status]} + 1
             WHERE id = ?`,
          )
          .run(runId);
      }
      return result;
    });

    return this.guard(() => transaction(), `insert ${record.url}`);
  }

  async startIngestionRun(sourceId: string): Promise<number> {
    return this.guard(() => {
      const info = this.db
        .prepare<[string, string]>("INSERT INTO ingestion_runs (source_id, started_at, status) VALUES (?, ?, 'running')")
        .run(sourceId, this.now().toISOString());
      return Number(info.lastInsertRowid);
    }, "start ingestion run");
  }

  async completeIngestionRun(
    runId: number,
    status: Exclude<RunStatus, "running">,
    errorMetadata: Record<string, unknown> | null = null,
  ): Promise<IngestionRunRecord> {
    const transaction = this.db.transaction(() => {
      this.requireOpenRun(runId);
      this.db
        .prepare<[string, string, string | null, number]>(
          "UPDATE ingestion_runs SET status = ?, completed_at = ?, error_metadata = ? WHERE id = ?",
        )
        .run(status, this.now().toISOString(), errorMetadata ? JSON.stringify(errorMetadata) : null, runId);
      return this.requireRun(runId);
    });
    return toRun(this.guard(() => transaction(), `complete ingestion run ${runId}`));
  }

  async getIngestionRun(runId: number): Promise<IngestionRunRecord | null> {
    const row = this.guard(
      () => this.db.prepare<[number], IngestionRunRow>("SELECT * FROM ingestion_runs WHERE id = ?").get(runId),
      "read ingestion run",
    );
    return row ? toRun(row) : null;
  }

  async listIngestionRuns(query: RunQuery = {}): Promise<IngestionRunRecord[]> {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (query.status) {
      clauses.push("status = ?");
      params.push(query.status);
    }
    if (query.sourceId) {
      clauses.push("source_id = ?");
      params.push(query.sourceId);
    }
    params.push(query.limit ?? 50);
    const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.guard(
      () =>
        this.db
          .prepare<Array<string | number>, IngestionRunRow>(
            `SELECT * FROM ingestion_runs ${where} ORDER BY started_at DESC, id DESC LIMIT ?`,
          )
          .all(...params),
      "list ingestion runs",
    );
    return rows.map(toRun);
  }

  async getIngestionStats(query: StatsQuery = {}): Promise<IngestionStats> {
    const clauses: string[] = [];
    const params: string[] = [];
    if (query.since) {
      clauses.push("started_at >= ?");
      params.push(query.since.toISOString());
    }
    if (query.until) {
      clauses.push("started_at < ?");
      params.push(query.until.toISOString());
    }
    const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";
    const row = this.guard(
      () =>
        this.db
          .prepare<string[], StatsRow>(
            `SELECT COUNT(*) AS total_runs,
                    SUM(total_processed) AS records_processed,
                    SUM(new_records) AS new_records,
                    SUM(updated_records) AS updated_records,
                    SUM(duplicate_records) AS duplicate_records
             FROM ingestion_runs ${where}`,
          )
          .get(...params),
      "read ingestion stats",
    );
    return {
      totalRuns: row?.total_runs ?? 0,
      recordsProcessed: row?.records_processed ?? 0,
      newRecords: row?.new_records ?? 0,
      updatedRecords: row?.updated_records ?? 0,
      duplicateRecords: row?.duplicate_records ?? 0,
    };
  }

  async findStaleRuns(olderThanMs: number): Promise<IngestionRunRecord[]> {
    const cutoff = new Date(this.now().getTime() - olderThanMs).toISOString();
    const rows = this.guard(
      () =>
        this.db
          .prepare<[string], IngestionRunRow>(
            "SELECT * FROM ingestion_runs WHERE status = 'running' AND started_at < ? ORDER BY started_at",
          )
          .all(cutoff),
      "find stale runs",
    );
    return rows.map(toRun);
  }

  async getRecordByUrl(url: string): Promise<StoredRecord | null> {
    const row = this.guard(
      () => this.db.prepare<[string], RecordRow>("SELECT * FROM records WHERE url_hash = ?").get(hashUrl(url)),
      "read record",
    );
    return row ? toRecord(row) : null;
  }

  async countRecords(): Promise<number> {
    const row = this.guard(
      () => this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM records").get(),
      "count records",
    );
    return row?.total ?? 0;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private upsert(record: EnrichedRecord, urlHash: string, contentHash: string, now: string): InsertResult {
    const existing = this.db
      .prepare<[string], { id: number; content_hash: string }>("SELECT id, content_hash FROM records WHERE url_hash = ?")
      .get(urlHash);

    if (existing) {
      if (existing.content_hash === contentHash) {
        return { status: "duplicate", recordId: existing.id, duplicateOf: existing.id };
      }
      this.db
        .prepare(
          `UPDATE records
           SET title = @title, summary = @summary, content_html = @content_html, category = @category,
               companies = @companies, publish_date = COALESCE(@publish_date, publish_date),
               raw_metadata = @raw_metadata, content_hash = @content_hash,
               scraped_at = @now, updated_at = @now
           WHERE id = @id`,
        )
        .run({
          id: existing.id,
          title: record.title,
          summary: record.summary,
          content_html: record.contentHtml,
          category: record.category,
          companies: JSON.stringify(record.companies),
          publish_date: record.publishDate?.toISOString() ?? null,
          raw_metadata: JSON.stringify(record.rawMetadata),
          content_hash: contentHash,
          now,
        });
      return { status: "updated", recordId: existing.id, duplicateOf: null };
    }

    if (this.detectCrossUrlDuplicates) {
      const twin = this.db
        .prepare<[string], { id: number }>("SELECT id FROM records WHERE content_hash = ? ORDER BY id LIMIT 1")
        .get(contentHash);
      if (twin) {
        return { status: "duplicate", recordId: twin.id, duplicateOf: twin.id };
      }
    }

    const info = this.db
      .prepare(
        `INSERT INTO records (
           source_id, source_type, category, companies, title, summary, content_html, url,
           url_hash, content_hash, publish_date, region, raw_metadata, scraped_at, created_at, updated_at
         ) VALUES (
           @source_id, @source_type, @category, @companies, @title, @summary, @content_html, @url,
           @url_hash, @content_hash, @publish_date, @region, @raw_metadata, @now, @now, @now
         )`,
      )
      .run({
        source_id: record.sourceId,
        source_type: record.sourceType,
        category: record.category,
        companies: JSON.stringify(record.companies),
        title: record.title,
        summary: record.summary,
        content_html: record.contentHtml,
        url: canonicalUrl(record.url),
        url_hash: urlHash,
        content_hash: contentHash,
        publish_date: record.publishDate?.toISOString() ?? null,
        region: record.region,
        raw_metadata: JSON.stringify(record.rawMetadata),
        now,
      });
    return { status: "inserted", recordId: Number(info.lastInsertRowid), duplicateOf: null };
  }

  private requireRun(runId: number): IngestionRunRow {
    const run = this.db.prepare<[number], IngestionRunRow>("SELECT * FROM ingestion_runs WHERE id = ?").get(runId);
    if (!run) {
      throw new StoreError(`Ingestion run ${runId} does not exist`);
    }
    return run;
  }

  private requireOpenRun(runId: number): IngestionRunRow {
    const run = this.requireRun(runId);
    if (run.status !== "running") {
      throw new StoreError(`Ingestion run ${runId} is already ${run.status}`);
    }
    return run;
  }

  private guard<T>(operation: () => T, action: string): T {
    try {
      return operation();
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      throw new StoreError(`Failed to ${action}: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
  }
}
