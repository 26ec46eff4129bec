import { ParseError } from "../errors";
import { parseDateValue } from "../dates";
import { normalizeWhitespace } from "../normalize";
import { sanitizeHtml } from "../sanitize";
import type { PaginationConfig } from "../sources-config";
import { normalizeUrl } from "../url";
import type { RawMetadata, RawRecord } from "../types";
import type { AdapterContext } from "./types";

const RECORD_FIELDS = new Set(["title", "url", "summary", "content_html", "publish_date", "region"]);
const PROCUREMENT_FIELD_KEYS: Record<string, string> = {
  status: "bid_status",
  bid_status: "bid_status",
  budget: "budget",
};

export type FieldRules = {
  path?: string;
  selector?: string;
  attr?: string;
  regex?: string;
  regex_group?: number;
  date_format?: string;
  optional?: boolean;
  default?: string | number | null;
};

export type ExtractedFields = Record<string, { raw: unknown; rules: FieldRules }>;

export const getPath = (input: unknown, path: string): unknown => {
  const segments = path
    .replace(/\[(\d+)\]/g, ".$1")
    .split(".")
    .filter(Boolean);
  let current: unknown = input;
  for (const segment of segments) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (current && typeof current === "object") {
      current = Object.entries(current).find(([key]) => key === segment)?.[1];
    } else {
      return undefined;
    }
    if (current === undefined) {
      return undefined;
    }
  }
  return current;
};

export const applyRegex = (value: string, rules: FieldRules): string | null => {
  if (!rules.regex) {
    return value;
  }
  const match = new RegExp(rules.regex).exec(value);
  if (!match) {
    return null;
  }
  return match[rules.regex_group ?? (match.length > 1 ? 1 : 0)] ?? null;
};

const scalarToString = (value: unknown): string | null => {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return null;
};

const isRequired = (key: string, rules: FieldRules) =>
  rules.optional === undefined ? key === "title" || key === "url" : !rules.optional;

const resolveValue = (raw: unknown, rules: FieldRules): unknown => {
  let value = raw;
  if (value !== null && value !== undefined && rules.regex) {
    const text = scalarToString(value);
    value = text === null ? null : applyRegex(text, rules);
  }
  if (typeof value === "string" && !value.trim()) {
    value = null;
  }
  if (value === null || value === undefined) {
    return rules.default ?? null;
  }
  return value;
};

export type BuildOptions = {
  pageUrl: string;
  baseUrl?: string | null;
  procurement: boolean;
  constantMetadata: RawMetadata;
};

export const buildRecord = (
  ctx: AdapterContext,
  fields: ExtractedFields,
  options: BuildOptions,
): { record: RawRecord } | { skipped: string } => {
  const values: Record<string, unknown> = {};
  for (const [key, { raw, rules }] of Object.entries(fields)) {
    const value = resolveValue(raw, rules);
    if ((value === null || value === undefined) && isRequired(key, rules)) {
      return { skipped: `missing ${key}` };
    }
    values[key] = value;
  }

  const title = scalarToString(values.title);
  const rawUrl = scalarToString(values.url);
  if (!title || !rawUrl) {
    return { skipped: "missing title or url" };
  }
  const url = normalizeUrl(rawUrl, options.baseUrl ?? options.pageUrl);
  if (!url) {
    return { skipped: `unresolvable url ${rawUrl}` };
  }

  const rawMetadata: RawMetadata = { ...options.constantMetadata };
  for (const [key, value] of Object.entries(values)) {
    if (RECORD_FIELDS.has(key) || value === null) {
      continue;
    }
    const target = options.procurement ? PROCUREMENT_FIELD_KEYS[key] ?? key : key;
    rawMetadata[target] = typeof value === "string" ? normalizeWhitespace(value) : value;
  }

  const summary = scalarToString(values.summary);
  const content = scalarToString(values.content_html);
  const region = scalarToString(values.region);
  const dateRules = fields.publish_date?.rules ?? {};

  return {
    record: {
      sourceId: ctx.sourceId,
      sourceType: ctx.sourceType,
      title: normalizeWhitespace(title),
      summary: summary ? normalizeWhitespace(summary) : null,
      contentHtml: content ? sanitizeHtml(content, url) || null : null,
      url,
      publishDate: parseDateValue(values.publish_date, {
        format: dateRules.date_format ?? null,
        utcOffset: ctx.utcOffset,
      }),
      region: region ?? ctx.region,
      rawMetadata,
    },
  };
};

export const firstPageFor = (pagination: PaginationConfig) => {
  if (pagination.start !== undefined) {
    return pagination.start;
  }
  return pagination.style === "zero_based" ? 0 : 1;
};

export const fillTemplate = (template: string, vars: Record<string, number>) =>
  template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in vars ? String(vars[name]) : match,
  );

export const fillTemplateValue = (value: unknown, vars: Record<string, number>): unknown => {
  if (typeof value === "string") {
    const exact = /^\{(\w+)\}$/.exec(value);
    if (exact && exact[1] in vars) {
      return vars[exact[1]];
    }
    return fillTemplate(value, vars);
  }
  if (Array.isArray(value)) {
    return value.map((item) => fillTemplateValue(item, vars));
  }
  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, fillTemplateValue(item, vars)]),
    );
  }
  return value;
};

export const buildPageUrl = (
  extraction: { list_url: string; first_page_url?: string; pagination: PaginationConfig },
  page: number,
  pageSize: number,
  firstPage: number,
) => {
  const vars = { page, page_size: pageSize };
  const template = page === firstPage && extraction.first_page_url ? extraction.first_page_url : extraction.list_url;
  const filled = fillTemplate(template, vars);
  const { pagination } = extraction;
  if (pagination.style !== "query_param") {
    return filled;
  }
  let url: URL;
  try {
    url = new URL(filled);
  } catch (error) {
    throw new ParseError(`Invalid list URL ${filled}`, { cause: error });
  }
  url.searchParams.set(pagination.param, String(page));
  if (pagination.size_param) {
    url.searchParams.set(pagination.size_param, String(pageSize));
  }
  return url.toString();
};
