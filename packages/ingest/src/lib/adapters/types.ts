import type { FetchRequest } from "../fetcher";
import type { CollectorType } from "../sources-config";
import type { RawRecord, SourceType } from "../types";

export type AdapterContext = {
  sourceId: string;
  sourceType: SourceType;
  region: string | null;
  pageSize: number;
  utcOffset: string;
};

export type ParsedPage = {
  records: RawRecord[];
  hasMore: boolean;
  skipped: number;
};

export interface SourceAdapter {
  readonly kind: CollectorType;
  readonly firstPage: number;
  buildRequest(page: number): FetchRequest;
  parsePage(body: string, page: number, pageUrl: string): Promise<ParsedPage>;
}
