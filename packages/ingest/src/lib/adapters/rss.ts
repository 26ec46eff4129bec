import Parser from "rss-parser";
import { ParseError } from "../errors";
import type { FetchRequest } from "../fetcher";
import { parseDateValue } from "../dates";
import { normalizeWhitespace, truncate } from "../normalize";
import { htmlToText, sanitizeHtml } from "../sanitize";
import type { RssExtraction } from "../sources-config";
import type { RawRecord } from "../types";
import { normalizeUrl } from "../url";
import type { AdapterContext, ParsedPage, SourceAdapter } from "./types";

const parser = new Parser();

export class RssFeedAdapter implements SourceAdapter {
  readonly kind = "rss" as const;
  readonly firstPage = 1;

  constructor(
    private readonly ctx: AdapterContext,
    private readonly extraction: RssExtraction,
  ) {}

  buildRequest(): FetchRequest {
    return {
      url: this.extraction.feed_url,
      method: "GET",
      headers: { Accept: "application/rss+xml, application/xml;q=0.9, */*;q=0.8", ...this.extraction.headers },
    };
  }

  async parsePage(body: string, page: number, pageUrl: string): Promise<ParsedPage> {
    let feed: Awaited<ReturnType<typeof parser.parseString>>;
    try {
      feed = await parser.parseString(body);
    } catch (error) {
      throw new ParseError(`Feed ${this.ctx.sourceId} could not be parsed`, { cause: error });
    }

    const records: RawRecord[] = [];
    let skipped = 0;
    for (const item of feed.items ?? []) {
      const link = item.link ?? item.guid ?? null;
      const url = link ? normalizeUrl(link, pageUrl) : null;
      const title = item.title ? normalizeWhitespace(item.title) : "";
      if (!url || !title) {
        skipped += 1;
        continue;
      }
      const snippet = item.contentSnippet ?? htmlToText(item.content ?? item.summary ?? "");
      const rawMetadata: Record<string, unknown> = {
        ...this.extraction.constant_metadata,
        feed_title: feed.title ?? null,
      };
      if (item.creator) {
        rawMetadata.author = item.creator;
      }
      if (item.categories?.length) {
        rawMetadata.tags = item.categories;
      }
      records.push({
        sourceId: this.ctx.sourceId,
        sourceType: this.ctx.sourceType,
        title,
        summary: snippet ? truncate(normalizeWhitespace(snippet), this.extraction.summary_max_length) : null,
        contentHtml: item.content ? sanitizeHtml(item.content, url) || null : null,
        url,
        publishDate: parseDateValue(item.isoDate ?? item.pubDate ?? null, { utcOffset: this.ctx.utcOffset }),
        region: this.ctx.region,
        rawMetadata,
      });
    }

    if (!records.length && skipped > 0) {
      throw new ParseError(`Feed ${this.ctx.sourceId} page ${page} had no usable items`);
    }
    return { records, hasMore: false, skipped };
  }
}
