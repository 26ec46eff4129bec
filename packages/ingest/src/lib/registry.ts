import { createAdapter, type AdapterContext } from "./adapters";
import { Collector, type AdapterPlan } from "./collector";
import { ConfigError } from "./errors";
import { RateLimitedFetcher, type FetchFn, type SleepFn } from "./fetcher";
import type { SourceConfig, SourceConfigIssue, SourcesFile } from "./sources-config";
import type { Category, ClassificationRules } from "./types";

export type RegistryOptions = {
  fetchImpl?: FetchFn;
  sleep?: SleepFn;
  now?: () => number;
  userAgent?: string;
  backoffBaseMs?: number;
};

export type RegistryEntry = {
  config: SourceConfig;
  plan: AdapterPlan;
  fetcher: RateLimitedFetcher;
};

export class Registry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly disabled = new Set<string>();

  constructor(
    entries: RegistryEntry[],
    disabled: string[],
    readonly issues: SourceConfigIssue[],
    private readonly classification: ClassificationRules = {},
  ) {
    for (const entry of entries) {
      this.entries.set(entry.config.source_id, entry);
    }
    for (const sourceId of disabled) {
      this.disabled.add(sourceId);
    }
  }

  get sourceIds(): string[] {
    return Array.from(this.entries.keys());
  }

  get(sourceId: string): RegistryEntry | undefined {
    return this.entries.get(sourceId);
  }

  collectors(sourceId?: string | null): Collector[] {
    const selected = sourceId ? [this.require(sourceId)] : Array.from(this.entries.values());
    return selected.map(
      (entry) =>
        new Collector({
          sourceId: entry.config.source_id,
          plan: entry.plan,
          fetcher: entry.fetcher,
          maxPages: entry.config.max_pages,
        }),
    );
  }

  configErrors(sourceId?: string | null): SourceConfigIssue[] {
    if (!sourceId) {
      return this.issues;
    }
    return this.issues.filter((issue) => issue.sourceId === sourceId);
  }

  sourceCategories(): Record<string, Category> {
    const categories: Record<string, Category> = {};
    for (const entry of this.entries.values()) {
      if (entry.config.category) {
        categories[entry.config.source_id] = entry.config.category;
      }
    }
    return categories;
  }

  classificationRules(): ClassificationRules {
    return {
      sources: { ...this.classification.sources, ...this.sourceCategories() },
      keywords: this.classification.keywords ?? [],
    };
  }

  private require(sourceId: string): RegistryEntry {
    const entry = this.entries.get(sourceId);
    if (entry) {
      return entry;
    }
    if (this.disabled.has(sourceId)) {
      throw new ConfigError(`Source ${sourceId} is disabled`, { sourceId });
    }
    const issue = this.issues.find((item) => item.sourceId === sourceId);
    if (issue) {
      throw issue.error;
    }
    throw new ConfigError(`Unknown source: ${sourceId}`, { sourceId });
  }
}

const contextFor = (config: SourceConfig): AdapterContext => ({
  sourceId: config.source_id,
  sourceType: config.source_type,
  region: config.region ?? null,
  pageSize: config.page_size,
  utcOffset: config.utc_offset,
});

export const buildRegistry = (file: SourcesFile, options: RegistryOptions = {}): Registry => {
  const entries: RegistryEntry[] = [];
  const disabled: string[] = [];

  for (const config of file.sources) {
    if (!config.enabled) {
      disabled.push(config.source_id);
      continue;
    }
    const ctx = contextFor(config);
    const fallback = config.fallback_strategy ?? null;
    entries.push({
      config,
      plan: {
        primary: createAdapter(config, ctx),
        fallback: fallback ? createAdapter(fallback, ctx) : null,
        fallbackDescription: fallback?.description ?? null,
      },
      fetcher: new RateLimitedFetcher({
        sourceId: config.source_id,
        minDelayMs: config.rate_limit_delay_ms,
        timeoutMs: Math.round(config.timeout_s * 1000),
        maxRetries: config.max_retries,
        backoffBaseMs: options.backoffBaseMs,
        userAgent: options.userAgent,
        fetchImpl: options.fetchImpl,
        sleep: options.sleep,
        now: options.now,
      }),
    });
  }

  for (const issue of file.issues) {
    console.warn(`[registry] ${issue.error.message}`);
  }

  return new Registry(entries, disabled, file.issues, {
    sources: file.classification?.sources,
    keywords: file.classification?.keywords,
  });
};
