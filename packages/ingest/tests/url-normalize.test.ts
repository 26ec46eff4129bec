import { describe, expect, it } from "vitest";
import { normalizeUrl, resolveUrl } from "../src/lib/url";
import { normalizeName, normalizeWhitespace, truncate } from "../src/lib/normalize";
import { hashContent, hashUrl } from "../src/lib/hash";

describe("normalizeUrl", () => {
  it("strips tracking params and fragments", () => {
    const input = "https://Example.com/path/?utm_source=foo&gclid=bar#section";
    expect(normalizeUrl(input)).toBe("https://example.com/path");
  });

  it("preserves non-tracking params", () => {
    const input = "https://example.com/path/?spm=a1&id=42";
    expect(normalizeUrl(input)).toBe("https://example.com/path?id=42");
  });

  it("resolves relative links against a base", () => {
    expect(normalizeUrl("../notice/7.html", "https://gov.example.test/list/index.html")).toBe(
      "https://gov.example.test/notice/7.html",
    );
  });

  it("rejects non-http links", () => {
    expect(resolveUrl("javascript:void(0)", "https://example.com/")).toBeNull();
    expect(normalizeUrl("mailto:someone@example.com")).toBeNull();
    expect(normalizeUrl("ftp://example.com/file")).toBeNull();
  });
});

describe("normalize helpers", () => {
  it("collapses whitespace and casing", () => {
    expect(normalizeWhitespace("  迈瑞\n  医疗 ")).toBe("迈瑞 医疗");
    expect(normalizeName(" Mindray   MEDICAL ")).toBe("mindray medical");
  });

  it("truncates with an ellipsis", () => {
    expect(truncate("abcdefghij", 8)).toBe("abcde...");
    expect(truncate("short", 8)).toBe("short");
  });
});

describe("hashing", () => {
  it("hashes the canonical url", () => {
    expect(hashUrl("https://example.com/a/?utm_campaign=x")).toBe(hashUrl("https://example.com/a"));
  });

  it("ignores whitespace differences in content", () => {
    const a = hashContent({ title: "Tender  notice", summary: " summary ", contentHtml: null });
    const b = hashContent({ title: "Tender notice", summary: "summary", contentHtml: "" });
    expect(a).toBe(b);
    expect(hashContent({ title: "Tender notice (revised)", summary: "summary", contentHtml: null })).not.toBe(a);
  });
});
