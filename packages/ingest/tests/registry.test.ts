import { describe, expect, it } from "vitest";
import { ConfigError } from "../src/lib/errors";
import { buildRegistry } from "../src/lib/registry";
import { getSourcesPath } from "../src/lib/settings";
import { loadSourcesConfig, parseSourcesConfig } from "../src/lib/sources-config";

const rssSource = (sourceId: string, extra: Record<string, unknown> = {}) => ({
  source_id: sourceId,
  collector_type: "rss",
  source_type: "industry_media",
  extraction: { feed_url: `https://${sourceId}.example.test/feed` },
  ...extra,
});

describe("parseSourcesConfig", () => {
  it("fills defaults for optional settings", () => {
    const { sources, issues } = parseSourcesConfig({ sources: [rssSource("wire")] });

    expect(issues).toEqual([]);
    expect(sources[0]).toMatchObject({
      source_id: "wire",
      enabled: true,
      page_size: 20,
      max_pages: 5,
      rate_limit_delay_ms: 300,
      timeout_s: 15,
      max_retries: 2,
      utc_offset: "+08:00",
    });
  });

  it("isolates invalid and duplicate sources", () => {
    const { sources, issues } = parseSourcesConfig({
      sources: [
        rssSource("wire"),
        rssSource("bad", { extraction: { feed_url: "not a url" } }),
        rssSource("wire"),
        { collector_type: "xml" },
        rssSource("eager", { max_retries: 11 }),
      ],
    });

    expect(sources.map((source) => source.source_id)).toEqual(["wire"]);
    expect(issues.map((issue) => [issue.sourceId, issue.index])).toEqual([
      ["bad", 1],
      ["wire", 2],
      [null, 3],
      ["eager", 4],
    ]);
    expect(issues[0].error.message).toBe("Invalid configuration for source bad: extraction.feed_url: Invalid url");
    expect(issues[1].error.message).toBe("Duplicate source_id: wire");
    expect(issues[2].error.message).toMatch(/^Invalid configuration for source #3: /);
    expect(issues.every((issue) => issue.error instanceof ConfigError)).toBe(true);
  });

  it("rejects a file without a sources list", () => {
    expect(() => parseSourcesConfig({ feeds: [] })).toThrow("Invalid source registry: sources: Required");
  });
});

describe("Registry", () => {
  it("loads the bundled source registry", () => {
    const file = loadSourcesConfig(getSourcesPath());
    const registry = buildRegistry(file);

    expect(file.sources).toHaveLength(6);
    expect(file.issues).toEqual([]);
    expect(registry.sourceIds).toEqual([
      "nhsa_policy",
      "nhc_policy",
      "ccgp_procurement",
      "gd_procurement",
      "ivd_industry_news",
    ]);
    expect(registry.collectors()).toHaveLength(5);
    expect(registry.get("gd_procurement")?.plan.primary.kind).toBe("procurement_json");
    expect(registry.get("gd_procurement")?.plan.fallback?.kind).toBe("procurement_html");
    expect(registry.get("nhsa_policy")?.plan.fallback).toBeNull();
  });

  it("explains why a single source cannot run", () => {
    const registry = buildRegistry(
      parseSourcesConfig({
        sources: [rssSource("wire"), rssSource("paused", { enabled: false }), rssSource("bad", { page_size: 0 })],
      }),
    );

    expect(registry.collectors("wire").map((collector) => collector.sourceId)).toEqual(["wire"]);
    expect(() => registry.collectors("paused")).toThrow("Source paused is disabled");
    expect(() => registry.collectors("bad")).toThrow("Invalid configuration for source bad");
    expect(() => registry.collectors("missing")).toThrow("Unknown source: missing");
    expect(registry.configErrors("bad")).toHaveLength(1);
    expect(registry.configErrors("wire")).toEqual([]);
    expect(registry.configErrors()).toHaveLength(1);
  });

  it("hands out fresh collectors on every call", () => {
    const registry = buildRegistry(parseSourcesConfig({ sources: [rssSource("wire")] }));

    const [first] = registry.collectors();
    const [second] = registry.collectors();

    expect(first).not.toBe(second);
    expect(first.state).toBe("idle");
  });

  it("merges file and per-source classification rules", () => {
    const registry = buildRegistry(
      parseSourcesConfig({
        sources: [rssSource("wire", { category: "industry_media" }), rssSource("plain")],
        classification: {
          sources: { legacy_feed: "product_launches", wire: "financial_reports" },
          keywords: [{ category: "nhc_policy", patterns: ["guideline"] }],
        },
      }),
    );

    expect(registry.classificationRules()).toEqual({
      sources: { legacy_feed: "product_launches", wire: "industry_media" },
      keywords: [{ category: "nhc_policy", patterns: ["guideline"] }],
    });
  });
});
