import type { ParsedPage, SourceAdapter } from "./adapters";
import { describeError, FetchError, ParseError } from "./errors";
import type { FetchOutcome, FetchRequest } from "./fetcher";
import type {
  CollectorErrorEntry,
  CollectorResult,
  CollectorStats,
  CollectorStatus,
  RawRecord,
} from "./types";

export interface PageFetcher {
  fetch(request: FetchRequest, signal?: AbortSignal): Promise<FetchOutcome>;
}

export type AdapterRole = "primary" | "fallback";

export type AdapterPlan = {
  primary: SourceAdapter;
  fallback: SourceAdapter | null;
  fallbackDescription?: string | null;
};

export type CollectorState = "idle" | "paginating" | CollectorStatus;

export type CollectorOptions = {
  sourceId: string;
  plan: AdapterPlan;
  fetcher: PageFetcher;
  maxPages: number;
  now?: () => Date;
};

type StepOutcome =
  | { kind: "completed" }
  | { kind: "cancelled" }
  | { kind: "failed"; error: CollectorErrorEntry };

type Attempt = {
  records: RawRecord[];
  seenUrls: Set<string>;
  errors: CollectorErrorEntry[];
  pagesFetched: number;
  httpRequests: number;
  retryAttempts: number;
};

const toErrorEntry = (error: unknown, page: number | null, adapter: AdapterRole): CollectorErrorEntry => {
  let kind = "unexpected";
  if (error instanceof FetchError) {
    kind = error.kind;
  } else if (error instanceof ParseError) {
    kind = "parse";
  }
  return { kind, message: describeError(error), page, adapter };
};

export class Collector {
  readonly sourceId: string;
  private readonly plan: AdapterPlan;
  private readonly fetcher: PageFetcher;
  private readonly maxPages: number;
  private readonly now: () => Date;
  private currentState: CollectorState = "idle";

  constructor(options: CollectorOptions) {
    this.sourceId = options.sourceId;
    this.plan = options.plan;
    this.fetcher = options.fetcher;
    this.maxPages = Math.max(1, options.maxPages);
    this.now = options.now ?? (() => new Date());
  }

  get state(): CollectorState {
    return this.currentState;
  }

  async collect(signal?: AbortSignal): Promise<CollectorResult> {
    const startedAt = this.now();
    this.currentState = "paginating";
    const attempt: Attempt = {
      records: [],
      seenUrls: new Set(),
      errors: [],
      pagesFetched: 0,
      httpRequests: 0,
      retryAttempts: 0,
    };

    const steps: Array<{ role: AdapterRole; adapter: SourceAdapter }> = [{ role: "primary", adapter: this.plan.primary }];
    if (this.plan.fallback) {
      steps.push({ role: "fallback", adapter: this.plan.fallback });
    }

    let final: StepOutcome = { kind: "completed" };
    let usedFallback = false;
    for (const step of steps) {
      if (step.role === "fallback") {
        usedFallback = true;
        console.warn(
          `[collector:${this.sourceId}] switching to fallback${
            this.plan.fallbackDescription ? ` (${this.plan.fallbackDescription})` : ""
          }`,
        );
      }
      final = await this.paginate(step.role, step.adapter, attempt, signal);
      if (final.kind === "failed") {
        attempt.errors.push(final.error);
        console.warn(`[collector:${this.sourceId}] ${step.role} failed: ${final.error.message}`);
        continue;
      }
      break;
    }

    let status: CollectorStatus;
    if (final.kind === "completed") {
      status = "succeeded";
    } else if (final.kind === "cancelled") {
      status = "failed";
      attempt.errors.push({
        kind: "cancelled",
        message: "Collection cancelled",
        page: null,
        adapter: usedFallback ? "fallback" : "primary",
      });
    } else {
      status = attempt.records.length > 0 ? "partially_succeeded" : "failed";
    }
    this.currentState = status;

    const stats: CollectorStats = {
      sourceId: this.sourceId,
      status,
      pagesFetched: attempt.pagesFetched,
      recordsYielded: attempt.records.length,
      errors: attempt.errors,
      httpRequests: attempt.httpRequests,
      retryAttempts: attempt.retryAttempts,
      usedFallback,
      cancelled: final.kind === "cancelled",
      startedAt,
      completedAt: this.now(),
    };
    console.log(
      `[collector:${this.sourceId}] ${status}: ${stats.recordsYielded} records from ${stats.pagesFetched} pages`,
    );

    return { sourceId: this.sourceId, status, records: attempt.records, stats };
  }

  private async paginate(
    role: AdapterRole,
    adapter: SourceAdapter,
    attempt: Attempt,
    signal?: AbortSignal,
  ): Promise<StepOutcome> {
    let page = adapter.firstPage;

    for (let fetched = 0; fetched < this.maxPages; fetched += 1, page += 1) {
      if (signal?.aborted) {
        return { kind: "cancelled" };
      }

      let request: FetchRequest;
      try {
        request = adapter.buildRequest(page);
      } catch (error) {
        return { kind: "failed", error: toErrorEntry(error, page, role) };
      }

      const outcome = await this.fetcher.fetch(request, signal);
      const attempts = outcome.ok ? outcome.attempts : outcome.error.attempts;
      attempt.httpRequests += attempts;
      attempt.retryAttempts += Math.max(0, attempts - 1);
      if (!outcome.ok) {
        if (outcome.error.kind === "cancelled" || signal?.aborted) {
          return { kind: "cancelled" };
        }
        return { kind: "failed", error: toErrorEntry(outcome.error, page, role) };
      }

      let parsed: ParsedPage;
      try {
        parsed = await adapter.parsePage(outcome.page.body, page, outcome.page.url);
      } catch (error) {
        return { kind: "failed", error: toErrorEntry(error, page, role) };
      }
      attempt.pagesFetched += 1;

      let fresh = 0;
      for (const record of parsed.records) {
        if (attempt.seenUrls.has(record.url)) {
          continue;
        }
        attempt.seenUrls.add(record.url);
        attempt.records.push(record);
        fresh += 1;
      }

      if (!parsed.records.length || !parsed.hasMore) {
        return { kind: "completed" };
      }
      if (fresh === 0) {
        console.warn(`[collector:${this.sourceId}] page ${page} repeated earlier results; stopping`);
        return { kind: "completed" };
      }
    }

    return { kind: "completed" };
  }
}
