import * as cheerio from "cheerio";
import type { FetchRequest } from "../fetcher";
import { ParseError } from "../errors";
import type { HtmlExtraction } from "../sources-config";
import type { RawRecord } from "../types";
import { buildPageUrl, buildRecord, firstPageFor, type ExtractedFields, type FieldRules } from "./fields";
import type { AdapterContext, ParsedPage, SourceAdapter } from "./types";

export class HtmlListAdapter implements SourceAdapter {
  readonly firstPage: number;

  constructor(
    readonly kind: "procurement_html" | "generic_html",
    private readonly ctx: AdapterContext,
    private readonly extraction: HtmlExtraction,
  ) {
    this.firstPage = firstPageFor(extraction.pagination);
  }

  buildRequest(page: number): FetchRequest {
    return {
      url: buildPageUrl(this.extraction, page, this.ctx.pageSize, this.firstPage),
      method: "GET",
      headers: { Accept: "text/html,application/xhtml+xml", ...this.extraction.headers },
    };
  }

  async parsePage(body: string, page: number, pageUrl: string): Promise<ParsedPage> {
    if (!/<[a-z!]/i.test(body)) {
      throw new ParseError(`Page ${page} of ${this.ctx.sourceId} is not HTML`);
    }
    const $ = cheerio.load(body);
    const items = $(this.extraction.item_selector).toArray();

    const records: RawRecord[] = [];
    let skipped = 0;
    for (const element of items) {
      const item = $(element);
      const fields: ExtractedFields = {};
      for (const [key, field] of Object.entries(this.extraction.fields)) {
        const rules: FieldRules = field;
        const node = rules.selector ? item.find(rules.selector).first() : item;
        let raw: string | undefined;
        if (!node.length) {
          raw = undefined;
        } else if (rules.attr === "html") {
          raw = node.html() ?? undefined;
        } else if (rules.attr) {
          raw = node.attr(rules.attr);
        } else {
          raw = node.text();
        }
        fields[key] = { raw, rules };
      }
      const built = buildRecord(this.ctx, fields, {
        pageUrl,
        baseUrl: this.extraction.base_url,
        procurement: this.kind === "procurement_html",
        constantMetadata: this.extraction.constant_metadata,
      });
      if ("record" in built) {
        records.push(built.record);
      } else {
        skipped += 1;
      }
    }

    if (items.length > 0 && records.length === 0) {
      throw new ParseError(`No usable items on page ${page} of ${this.ctx.sourceId}`);
    }

    let hasMore: boolean;
    if (items.length === 0) {
      hasMore = false;
    } else if (this.extraction.next_page_selector) {
      hasMore = $(this.extraction.next_page_selector).length > 0;
    } else {
      hasMore = items.length >= this.ctx.pageSize;
    }

    return { records, hasMore, skipped };
  }
}
