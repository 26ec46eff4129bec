import { describe, expect, it } from "vitest";
import { CategoryClassifier, categoryDisplayName, normalizeCategoryName } from "../src/lib/classifier";
import { CompanyMatcher, parseCompanyDataset } from "../src/lib/company-matcher";
import { enrichRecord } from "../src/lib/enrich";
import { ConfigError } from "../src/lib/errors";
import { makeRecord } from "./helpers";

describe("CategoryClassifier", () => {
  const classifier = new CategoryClassifier();

  it("honours category overrides in metadata", () => {
    expect(classifier.classify({ sourceId: "nhsa_policy", metadata: { category_override: "招标" } })).toBe(
      "bidding_tendering",
    );
    expect(classifier.classify({ sourceId: "any", metadata: { category: "Financial" } })).toBe("financial_reports");
  });

  it("maps known sources before looking at text", () => {
    expect(classifier.classify({ sourceId: "nhsa_policy", title: "某医院招标公告" })).toBe("nhsa_policy");
    expect(classifier.classify({ sourceId: "sse_announcements" })).toBe("financial_reports");
  });

  it("matches headline keywords in rule order", () => {
    expect(classifier.classify({ sourceId: "other", title: "某医院化学发光试剂招标公告" })).toBe("bidding_tendering");
    expect(classifier.classify({ sourceId: "other", title: "年报显示中标金额增长" })).toBe("financial_reports");
    expect(classifier.classify({ sourceId: "other", title: "Reagent TENDER notice" })).toBe("bidding_tendering");
  });

  it("falls back to the body text", () => {
    expect(
      classifier.classify({ sourceId: "other", title: "Weekly notes", content: "<p>国家医保局发布新版目录</p>" }),
    ).toBe("nhsa_policy");
    expect(classifier.classify({ sourceId: "other", title: "Hello world" })).toBe("unknown");
  });

  it("layers custom rules over the defaults", () => {
    const custom = new CategoryClassifier({
      sources: { my_source: "industry_media" },
      keywords: [{ category: "industry_media", patterns: ["白皮书"] }],
    });

    expect(custom.classify({ sourceId: "my_source", title: "招标" })).toBe("industry_media");
    expect(custom.classify({ sourceId: "other", title: "白皮书：招标市场" })).toBe("industry_media");
    expect(custom.classify({ sourceId: "ccgp_procurement" })).toBe("bidding_tendering");
  });

  it("rejects invalid patterns", () => {
    expect(() => new CategoryClassifier({ keywords: [{ category: "unknown", patterns: ["("] }] })).toThrow(
      ConfigError,
    );
  });
});

describe("category names", () => {
  it("normalizes synonyms", () => {
    expect(normalizeCategoryName(" Tender ")).toBe("bidding_tendering");
    expect(normalizeCategoryName("卫健委")).toBe("nhc_policy");
    expect(normalizeCategoryName("weird")).toBeNull();
    expect(normalizeCategoryName(42)).toBeNull();
  });

  it("has display names in both languages", () => {
    expect(categoryDisplayName("nhc_policy", "zh")).toBe("卫健委政策");
    expect(categoryDisplayName("bidding_tendering")).toBe("Bidding & Tendering");
  });
});

describe("enrichRecord", () => {
  it("attaches companies and a category to a frozen copy", () => {
    const matcher = new CompanyMatcher(parseCompanyDataset([{ name: "迈瑞医疗", aliases: ["迈瑞"] }]));
    const record = makeRecord({ title: "迈瑞 中标", contentHtml: "<p>化学发光</p>", rawMetadata: { budget: 10 } });

    const enriched = enrichRecord(record, { matcher, classifier: new CategoryClassifier() });

    expect(enriched.companies).toEqual(["迈瑞医疗"]);
    expect(enriched.category).toBe("bidding_tendering");
    expect(enriched.rawMetadata).toEqual({ budget: 10 });
    expect(Object.isFrozen(enriched)).toBe(true);
    expect(Object.isFrozen(enriched.companies)).toBe(true);
    expect(record).not.toHaveProperty("companies");
  });
});
