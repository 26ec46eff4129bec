import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigError } from "./errors";
import { CATEGORIES, SOURCE_TYPES } from "./types";

const OFFSET_PATTERN = /^[+-]\d{2}:?\d{2}$/;

const templateValue: z.ZodType<unknown> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(templateValue), z.record(templateValue)]),
);

const jsonFieldSchema = z.union([
  z.string().min(1).transform((path) => ({ path })),
  z.object({
    path: z.string().min(1),
    regex: z.string().optional(),
    regex_group: z.number().int().min(0).optional(),
    date_format: z.string().optional(),
    optional: z.boolean().optional(),
    default: z.union([z.string(), z.number(), z.null()]).optional(),
  }),
]);

const htmlFieldSchema = z.union([
  z.string().min(1).transform((selector) => ({ selector })),
  z.object({
    selector: z.string().optional(),
    attr: z.string().optional(),
    regex: z.string().optional(),
    regex_group: z.number().int().min(0).optional(),
    date_format: z.string().optional(),
    optional: z.boolean().optional(),
    default: z.union([z.string(), z.number(), z.null()]).optional(),
  }),
]);

const paginationSchema = z
  .object({
    style: z.enum(["zero_based", "one_based", "query_param"]).default("one_based"),
    param: z.string().min(1).default("page"),
    size_param: z.string().min(1).optional(),
    start: z.number().int().min(0).optional(),
  })
  .default({});

const sharedExtraction = {
  list_url: z.string().min(1),
  first_page_url: z.string().min(1).optional(),
  base_url: z.string().url().optional(),
  headers: z.record(z.string()).optional(),
  pagination: paginationSchema,
  constant_metadata: z.record(z.unknown()).default({}),
};

const jsonExtractionSchema = z.object({
  ...sharedExtraction,
  method: z.enum(["GET", "POST"]).default("GET"),
  body_template: z.record(templateValue).optional(),
  list_path: z.string().min(1),
  total_path: z.string().min(1).optional(),
  fields: z.object({ title: jsonFieldSchema, url: jsonFieldSchema }).catchall(jsonFieldSchema),
});

const htmlExtractionSchema = z.object({
  ...sharedExtraction,
  item_selector: z.string().min(1),
  next_page_selector: z.string().min(1).optional(),
  fields: z.object({ title: htmlFieldSchema, url: htmlFieldSchema }).catchall(htmlFieldSchema),
});

const rssExtractionSchema = z.object({
  feed_url: z.string().url(),
  headers: z.record(z.string()).optional(),
  summary_max_length: z.number().int().positive().default(500),
  constant_metadata: z.record(z.unknown()).default({}),
});

const strategyShapes = {
  procurement_json: { collector_type: z.literal("procurement_json"), extraction: jsonExtractionSchema },
  procurement_html: { collector_type: z.literal("procurement_html"), extraction: htmlExtractionSchema },
  generic_html: { collector_type: z.literal("generic_html"), extraction: htmlExtractionSchema },
  rss: { collector_type: z.literal("rss"), extraction: rssExtractionSchema },
};

export const fallbackStrategySchema = z.discriminatedUnion("collector_type", [
  z.object({ description: z.string().optional(), ...strategyShapes.procurement_json }),
  z.object({ description: z.string().optional(), ...strategyShapes.procurement_html }),
  z.object({ description: z.string().optional(), ...strategyShapes.generic_html }),
  z.object({ description: z.string().optional(), ...strategyShapes.rss }),
]);

const baseSourceShape = {
  source_id: z.string().min(1).regex(/^[a-z0-9_.-]+$/i, "source_id may only contain letters, digits, _ . -"),
  enabled: z.boolean().default(true),
  description: z.string().optional(),
  source_type: z.enum(SOURCE_TYPES),
  category: z.enum(CATEGORIES).optional(),
  region: z.string().min(1).optional(),
  page_size: z.number().int().positive().default(20),
  max_pages: z.number().int().positive().default(5),
  rate_limit_delay_ms: z.number().int().min(0).default(300),
  timeout_s: z.number().positive().default(15),
  max_retries: z.number().int().min(0).max(10).default(2),
  utc_offset: z.string().regex(OFFSET_PATTERN, "utc_offset must look like +08:00").default("+08:00"),
  fallback_strategy: fallbackStrategySchema.optional(),
};

export const sourceConfigSchema = z.discriminatedUnion("collector_type", [
  z.object({ ...baseSourceShape, ...strategyShapes.procurement_json }),
  z.object({ ...baseSourceShape, ...strategyShapes.procurement_html }),
  z.object({ ...baseSourceShape, ...strategyShapes.generic_html }),
  z.object({ ...baseSourceShape, ...strategyShapes.rss }),
]);

const keywordRuleSchema = z.object({
  category: z.enum(CATEGORIES),
  patterns: z.array(z.string().min(1)).min(1),
});

const registryFileSchema = z.object({
  sources: z.array(z.unknown()),
  classification: z
    .object({
      sources: z.record(z.enum(CATEGORIES)).optional(),
      keywords: z.array(keywordRuleSchema).optional(),
    })
    .optional(),
});

export type CollectorType = z.infer<typeof sourceConfigSchema>["collector_type"];
export type SourceConfig = z.infer<typeof sourceConfigSchema>;
export type StrategyConfig = z.infer<typeof fallbackStrategySchema>;
export type JsonExtraction = z.infer<typeof jsonExtractionSchema>;
export type HtmlExtraction = z.infer<typeof htmlExtractionSchema>;
export type RssExtraction = z.infer<typeof rssExtractionSchema>;
export type PaginationConfig = z.infer<typeof paginationSchema>;

export type SourceConfigIssue = {
  sourceId: string | null;
  index: number;
  error: ConfigError;
};

export type SourcesFile = {
  sources: SourceConfig[];
  issues: SourceConfigIssue[];
  classification: z.infer<typeof registryFileSchema>["classification"];
};

export const formatZodIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");

const rawSourceId = (raw: unknown): string | null => {
  if (raw && typeof raw === "object" && "source_id" in raw) {
    const value = raw.source_id;
    return typeof value === "string" && value ? value : null;
  }
  return null;
};

export const parseSourcesConfig = (input: unknown): SourcesFile => {
  const parsed = registryFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid source registry: ${formatZodIssues(parsed.error)}`);
  }

  const sources: SourceConfig[] = [];
  const issues: SourceConfigIssue[] = [];
  const seen = new Set<string>();

  parsed.data.sources.forEach((raw, index) => {
    const sourceId = rawSourceId(raw);
    const result = sourceConfigSchema.safeParse(raw);
    if (!result.success) {
      issues.push({
        sourceId,
        index,
        error: new ConfigError(
          `Invalid configuration for source ${sourceId ?? `#${index}`}: ${formatZodIssues(result.error)}`,
          { sourceId },
        ),
      });
      return;
    }
    if (seen.has(result.data.source_id)) {
      issues.push({
        sourceId,
        index,
        error: new ConfigError(`Duplicate source_id: ${result.data.source_id}`, { sourceId }),
      });
      return;
    }
    seen.add(result.data.source_id);
    sources.push(result.data);
  });

  return { sources, issues, classification: parsed.data.classification };
};

export const loadSourcesConfig = (filePath: string): SourcesFile => {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Unable to read source registry at ${filePath}`, { cause: error });
  }
  return parseSourcesConfig(raw);
};
