export const SOURCE_TYPES = [
  "financial_reports",
  "product_launches",
  "reimbursement_policy",
  "health_commission_policy",
  "procurement",
  "industry_media",
] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

export const CATEGORIES = [
  "financial_reports",
  "product_launches",
  "bidding_tendering",
  "nhsa_policy",
  "nhc_policy",
  "industry_media",
  "unknown",
] as const;

export type Category = (typeof CATEGORIES)[number];

export type RawMetadata = Record<string, unknown>;

export type RawRecord = {
  sourceId: string;
  sourceType: SourceType;
  title: string;
  summary: string | null;
  contentHtml: string | null;
  url: string;
  publishDate: Date | null;
  region: string | null;
  rawMetadata: RawMetadata;
};

export type EnrichedRecord = Readonly<
  Omit<RawRecord, "rawMetadata"> & {
    rawMetadata: Readonly<RawMetadata>;
    companies: readonly string[];
    category: Category;
  }
>;

export type CompanyEntry = {
  name: string;
  englishName?: string | null;
  externalId?: string | null;
  aliases: string[];
  keywords: string[];
};

export type KeywordRule = {
  category: Category;
  patterns: string[];
};

export type ClassificationRules = {
  sources?: Record<string, Category>;
  keywords?: KeywordRule[];
};

export type CollectorStatus = "succeeded" | "partially_succeeded" | "failed";

export type CollectorErrorEntry = {
  kind: string;
  message: string;
  page: number | null;
  adapter: "primary" | "fallback";
};

export type CollectorStats = {
  sourceId: string;
  status: CollectorStatus;
  pagesFetched: number;
  recordsYielded: number;
  errors: CollectorErrorEntry[];
  httpRequests: number;
  retryAttempts: number;
  usedFallback: boolean;
  cancelled: boolean;
  startedAt: Date;
  completedAt: Date;
};

export type CollectorResult = {
  sourceId: string;
  status: CollectorStatus;
  records: RawRecord[];
  stats: CollectorStats;
};

export type ManagerResult = {
  records: RawRecord[];
  perSource: Record<string, CollectorStats>;
  failedSources: string[];
  errors: string[];
};

export type InsertStatus = "inserted" | "updated" | "duplicate";

export type InsertResult = {
  status: InsertStatus;
  recordId: number;
  duplicateOf: number | null;
};

export type RunStatus = "running" | "completed" | "failed";

export type RunSummary = {
  run_id: number | null;
  started_at: string;
  completed_at: string;
  total_sources: number;
  successful_sources: number;
  failed_sources: string[];
  total_records_collected: number;
  records_inserted: number;
  records_updated: number;
  records_duplicate: number;
  errors: string[];
};
