import type { Category, EnrichedRecord, InsertResult, RunStatus, SourceType } from "../lib/types";

export type StoredRecord = {
  id: number;
  source_id: string;
  source_type: SourceType;
  category: Category;
  companies: string[];
  title: string;
  summary: string | null;
  content_html: string | null;
  url: string;
  url_hash: string;
  content_hash: string;
  publish_date: Date | null;
  region: string | null;
  raw_metadata: Record<string, unknown>;
  scraped_at: Date;
  created_at: Date;
  updated_at: Date;
};

export type IngestionRunRecord = {
  id: number;
  source_id: string;
  started_at: Date;
  completed_at: Date | null;
  status: RunStatus;
  total_processed: number;
  new_records: number;
  updated_records: number;
  duplicate_records: number;
  error_metadata: Record<string, unknown> | null;
};

export type IngestionStats = {
  totalRuns: number;
  recordsProcessed: number;
  newRecords: number;
  updatedRecords: number;
  duplicateRecords: number;
};

export type RunQuery = {
  limit?: number;
  status?: RunStatus;
  sourceId?: string;
};

export type StatsQuery = {
  since?: Date;
  until?: Date;
};

export interface RecordStore {
  insert(record: EnrichedRecord, runId?: number | null): Promise<InsertResult>;
  startIngestionRun(sourceId: string): Promise<number>;
  completeIngestionRun(
    runId: number,
    status: Exclude<RunStatus, "running">,
    errorMetadata?: Record<string, unknown> | null,
  ): Promise<IngestionRunRecord>;
  getIngestionRun(runId: number): Promise<IngestionRunRecord | null>;
  listIngestionRuns(query?: RunQuery): Promise<IngestionRunRecord[]>;
  getIngestionStats(query?: StatsQuery): Promise<IngestionStats>;
  findStaleRuns(olderThanMs: number): Promise<IngestionRunRecord[]>;
  getRecordByUrl(url: string): Promise<StoredRecord | null>;
  countRecords(): Promise<number>;
  close(): Promise<void>;
}

export type StoreOptions = {
  now?: () => Date;
  detectCrossUrlDuplicates?: boolean;
};
