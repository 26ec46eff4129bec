import type { ParsedPage, SourceAdapter } from "../src/lib/adapters";
import type { PageFetcher } from "../src/lib/collector";
import { FetchError, ParseError } from "../src/lib/errors";
import type { FetchOutcome, FetchRequest } from "../src/lib/fetcher";
import type { EnrichedRecord, RawRecord } from "../src/lib/types";

export const makeRecord = (overrides: Partial<RawRecord> = {}): RawRecord => ({
  sourceId: "test_source",
  sourceType: "procurement",
  title: "Reagent tender notice",
  summary: null,
  contentHtml: null,
  url: "https://example.test/notice/1",
  publishDate: null,
  region: null,
  rawMetadata: {},
  ...overrides,
});

export const makeEnriched = (
  overrides: Partial<RawRecord> & { companies?: string[]; category?: EnrichedRecord["category"] } = {},
): EnrichedRecord => {
  const { companies = [], category = "unknown", ...raw } = overrides;
  return { ...makeRecord(raw), companies, category };
};

export type ScriptedPage = { urls: string[]; hasMore: boolean };

/** Adapter whose pages are JSON documents of the form {"urls": [...], "hasMore": bool}. */
export const scriptedAdapter = (name: string, firstPage = 1): SourceAdapter => ({
  kind: "generic_html",
  firstPage,
  buildRequest: (page: number): FetchRequest => ({ url: `https://${name}.test/page/${page}` }),
  parsePage: async (body: string): Promise<ParsedPage> => {
    if (body === "garbage") {
      throw new ParseError(`${name} page is garbage`);
    }
    const parsed: unknown = JSON.parse(body);
    if (!parsed || typeof parsed !== "object" || !("urls" in parsed) || !Array.isArray(parsed.urls)) {
      throw new ParseError("unexpected page shape");
    }
    const hasMore = "hasMore" in parsed && parsed.hasMore === true;
    const records = parsed.urls
      .filter((url): url is string => typeof url === "string")
      .map((url) => makeRecord({ sourceId: name, url, title: `Item ${url}` }));
    return { records, hasMore, skipped: 0 };
  },
});

export const page = (urls: string[], hasMore: boolean) => JSON.stringify({ urls, hasMore });

export type ScriptedFetcher = PageFetcher & { requested: string[] };

export const scriptedFetcher = (
  responses: Record<string, string | FetchError>,
  onRequest?: (url: string) => void,
): ScriptedFetcher => {
  const requested: string[] = [];
  return {
    requested,
    fetch: async (request: FetchRequest): Promise<FetchOutcome> => {
      requested.push(request.url);
      onRequest?.(request.url);
      const response = responses[request.url];
      if (response === undefined) {
        return {
          ok: false,
          error: new FetchError("http_status", "Fetch failed (404)", { url: request.url, attempts: 1, status: 404 }),
        };
      }
      if (response instanceof FetchError) {
        return { ok: false, error: response };
      }
      return { ok: true, attempts: 1, page: { url: request.url, status: 200, headers: new Headers(), body: response } };
    },
  };
};

export const connectionError = (url: string, attempts = 3) =>
  new FetchError("connection_failed", "Connection failed: socket hang up", { url, attempts });
