import * as cheerio from "cheerio";
import { normalizeWhitespace } from "./normalize";

const DROPPED_TAGS = "script, style, noscript, iframe, object, embed, form, input, button, select, textarea";
const BLOCK_TAGS = "p, div, li, br, tr, td, th, h1, h2, h3, h4, h5, h6, section, article";

const ALLOWED_TAGS = new Set([
  "a", "p", "br", "div", "span", "strong", "b", "em", "i", "u",
  "ul", "ol", "li", "table", "thead", "tbody", "tr", "td", "th",
  "h1", "h2", "h3", "h4", "h5", "h6", "blockquote", "img",
]);

const ALLOWED_ATTRIBUTES: Record<string, Set<string>> = {
  a: new Set(["href", "title"]),
  img: new Set(["src", "alt", "title"]),
  td: new Set(["colspan", "rowspan"]),
  th: new Set(["colspan", "rowspan"]),
};

const resolveLink = (value: string, baseUrl?: string | null) => {
  if (/^\s*javascript:/i.test(value)) {
    return null;
  }
  try {
    const url = baseUrl ? new URL(value, baseUrl) : new URL(value);
    return url.protocol === "http:" || url.protocol === "https:" ? url.toString() : null;
  } catch {
    return null;
  }
};

export const sanitizeHtml = (html: string, baseUrl?: string | null): string => {
  const $ = cheerio.load(html, null, false);
  $(DROPPED_TAGS).remove();

  for (const element of $("*").toArray()) {
    if (!("tagName" in element)) {
      continue;
    }
    const tag = element.tagName.toLowerCase();
    const node = $(element);
    if (!ALLOWED_TAGS.has(tag)) {
      node.replaceWith(node.contents());
      continue;
    }
    const allowed = ALLOWED_ATTRIBUTES[tag];
    for (const name of Object.keys(element.attribs)) {
      if (!allowed?.has(name)) {
        node.removeAttr(name);
      }
    }
    for (const name of ["href", "src"]) {
      const value = node.attr(name);
      if (value === undefined) {
        continue;
      }
      const absolute = resolveLink(value, baseUrl);
      if (absolute) {
        node.attr(name, absolute);
      } else {
        node.removeAttr(name);
      }
    }
  }

  return ($.root().html() ?? "").trim();
};

export const htmlToText = (html: string | null | undefined): string => {
  if (!html) {
    return "";
  }
  if (!/[<&]/.test(html)) {
    return normalizeWhitespace(html);
  }
  const $ = cheerio.load(html, null, false);
  $(DROPPED_TAGS).remove();
  $(BLOCK_TAGS).after(" ");
  return normalizeWhitespace($.root().text());
};
