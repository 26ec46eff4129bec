import { ParseError } from "../errors";
import type { FetchRequest } from "../fetcher";
import type { JsonExtraction } from "../sources-config";
import type { RawRecord } from "../types";
import { buildPageUrl, buildRecord, fillTemplateValue, firstPageFor, getPath, type ExtractedFields } from "./fields";
import type { AdapterContext, ParsedPage, SourceAdapter } from "./types";

export class JsonListAdapter implements SourceAdapter {
  readonly kind = "procurement_json" as const;
  readonly firstPage: number;

  constructor(
    private readonly ctx: AdapterContext,
    private readonly extraction: JsonExtraction,
  ) {
    this.firstPage = firstPageFor(extraction.pagination);
  }

  buildRequest(page: number): FetchRequest {
    const url = buildPageUrl(this.extraction, page, this.ctx.pageSize, this.firstPage);
    const headers: Record<string, string> = { Accept: "application/json", ...this.extraction.headers };
    if (this.extraction.method === "POST") {
      const body = this.extraction.body_template
        ? fillTemplateValue(this.extraction.body_template, { page, page_size: this.ctx.pageSize })
        : {};
      return {
        url,
        method: "POST",
        headers: { "Content-Type": "application/json", ...headers },
        body: JSON.stringify(body),
      };
    }
    return { url, method: "GET", headers };
  }

  async parsePage(body: string, page: number, pageUrl: string): Promise<ParsedPage> {
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new ParseError(`Page ${page} of ${this.ctx.sourceId} is not valid JSON`, { cause: error });
    }

    const items = getPath(payload, this.extraction.list_path);
    if (items === null || items === undefined) {
      throw new ParseError(`Page ${page} of ${this.ctx.sourceId} has no list at ${this.extraction.list_path}`);
    }
    if (!Array.isArray(items)) {
      throw new ParseError(`Expected an array at ${this.extraction.list_path} on page ${page}`);
    }

    const records: RawRecord[] = [];
    let skipped = 0;
    for (const item of items) {
      const fields: ExtractedFields = {};
      for (const [key, field] of Object.entries(this.extraction.fields)) {
        fields[key] = { raw: getPath(item, field.path), rules: field };
      }
      const built = buildRecord(this.ctx, fields, {
        pageUrl,
        baseUrl: this.extraction.base_url,
        procurement: true,
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

    return { records, hasMore: this.hasMore(payload, page, items.length), skipped };
  }

  private hasMore(payload: unknown, page: number, itemCount: number) {
    if (itemCount === 0) {
      return false;
    }
    if (this.extraction.total_path) {
      const total = Number(getPath(payload, this.extraction.total_path));
      if (Number.isFinite(total)) {
        return (page - this.firstPage + 1) * this.ctx.pageSize < total;
      }
    }
    return itemCount >= this.ctx.pageSize;
  }
}
