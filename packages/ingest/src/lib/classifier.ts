import { z } from "zod";
import defaults from "./category-rules.json";
import { ConfigError } from "./errors";
import { htmlToText } from "./sanitize";
import { CATEGORIES, type Category, type ClassificationRules, type RawMetadata } from "./types";

const categorySchema = z.enum(CATEGORIES);

const rulesFileSchema = z.object({
  synonyms: z.record(categorySchema, z.array(z.string())),
  sources: z.record(z.string(), categorySchema),
  keywords: z.array(z.object({ category: categorySchema, patterns: z.array(z.string()) })),
});

const DEFAULT_RULES = rulesFileSchema.parse(defaults);

const DISPLAY_NAMES: Record<Category, { en: string; zh: string }> = {
  financial_reports: { en: "Financial Reports", zh: "财报资讯" },
  product_launches: { en: "Product Launches", zh: "产品上市" },
  bidding_tendering: { en: "Bidding & Tendering", zh: "招标采购" },
  nhsa_policy: { en: "NHSA Policy", zh: "医保政策" },
  nhc_policy: { en: "NHC Policy", zh: "卫健委政策" },
  industry_media: { en: "Industry Media", zh: "行业媒体" },
  unknown: { en: "Unknown", zh: "未分类" },
};

export type ClassifyInput = {
  sourceId: string;
  title?: string | null;
  summary?: string | null;
  content?: string | null;
  metadata?: RawMetadata;
};

type CompiledRule = {
  category: Category;
  patterns: RegExp[];
};

const buildAliasLookup = () => {
  const lookup = new Map<string, Category>();
  for (const category of CATEGORIES) {
    lookup.set(category, category);
    for (const alias of DEFAULT_RULES.synonyms[category] ?? []) {
      lookup.set(alias.trim().toLowerCase(), category);
    }
  }
  return lookup;
};

const ALIAS_LOOKUP = buildAliasLookup();

export const normalizeCategoryName = (value: unknown): Category | null => {
  if (typeof value !== "string") {
    return null;
  }
  return ALIAS_LOOKUP.get(value.trim().toLowerCase()) ?? null;
};

export const categoryDisplayName = (category: Category, language: "en" | "zh" = "en") =>
  DISPLAY_NAMES[category][language];

const compilePattern = (pattern: string, category: Category) => {
  try {
    return new RegExp(pattern, "iu");
  } catch (error) {
    throw new ConfigError(`Invalid keyword pattern for ${category}: ${pattern}`, { cause: error });
  }
};

export class CategoryClassifier {
  private readonly sourceRules: Map<string, Category>;
  private readonly keywordRules: CompiledRule[];

  constructor(custom: ClassificationRules = {}) {
    this.sourceRules = new Map(Object.entries({ ...DEFAULT_RULES.sources, ...custom.sources }));
    this.keywordRules = [...(custom.keywords ?? []), ...DEFAULT_RULES.keywords].map((rule) => ({
      category: rule.category,
      patterns: rule.patterns.map((pattern) => compilePattern(pattern, rule.category)),
    }));
  }

  classify(input: ClassifyInput): Category {
    const metadata = input.metadata ?? {};
    for (const key of ["category_override", "category"]) {
      const override = normalizeCategoryName(metadata[key]);
      if (override) {
        return override;
      }
    }

    const bySource = this.sourceRules.get(input.sourceId);
    if (bySource) {
      return bySource;
    }

    const headline = [input.title, input.summary].filter(Boolean).join(" ");
    const headlineMatch = this.matchKeywords(headline);
    if (headlineMatch) {
      return headlineMatch;
    }

    return this.matchKeywords(htmlToText(input.content)) ?? "unknown";
  }

  private matchKeywords(text: string): Category | null {
    if (!text.trim()) {
      return null;
    }
    for (const rule of this.keywordRules) {
      if (rule.patterns.some((pattern) => pattern.test(text))) {
        return rule.category;
      }
    }
    return null;
  }
}
