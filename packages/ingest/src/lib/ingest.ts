import type { CategoryClassifier } from "./classifier";
import type { CompanyMatcher } from "./company-matcher";
import { enrichRecords } from "./enrich";
import { ConfigError, describeError, IngestError, StoreError } from "./errors";
import { collectAll, type RecordCollector } from "./manager";
import type { Registry } from "./registry";
import type { ManagerResult, RunSummary } from "./types";
import type { RecordStore } from "../repo/types";

export type ExitCode = 0 | 1 | 2;

export type IngestionDeps = {
  registry: Registry;
  store: RecordStore;
  matcher: CompanyMatcher;
  classifier: CategoryClassifier;
  now?: () => Date;
};

export type IngestionOptions = {
  sourceId?: string | null;
  timeoutMs?: number | null;
  signal?: AbortSignal;
};

export type IngestionOutcome = {
  exitCode: ExitCode;
  summary: RunSummary;
  collection: ManagerResult | null;
};

export const emptySummary = (startedAt: Date): RunSummary => ({
  run_id: null,
  started_at: startedAt.toISOString(),
  completed_at: startedAt.toISOString(),
  total_sources: 0,
  successful_sources: 0,
  failed_sources: [],
  total_records_collected: 0,
  records_inserted: 0,
  records_updated: 0,
  records_duplicate: 0,
  errors: [],
});

export type OpenedStore = { ok: true; store: RecordStore } | { ok: false; summary: RunSummary };

/**
 * Opens the store and reports runs left in `running` for longer than `staleRunMs`.
 * Store failures come back as an empty failed summary instead of throwing.
 */
export const openRunStore = async (
  open: () => RecordStore,
  staleRunMs: number,
  now: () => Date = () => new Date(),
): Promise<OpenedStore> => {
  const failed = (error: StoreError): OpenedStore => {
    console.error(`[ingest] store unavailable: ${error.message}`);
    const summary = emptySummary(now());
    summary.errors.push(error.message);
    return { ok: false, summary };
  };

  let store: RecordStore;
  try {
    store = open();
  } catch (error) {
    if (error instanceof StoreError) {
      return failed(error);
    }
    throw error;
  }

  try {
    for (const run of await store.findStaleRuns(staleRunMs)) {
      console.warn(
        `[ingest] run ${run.id} (${run.source_id}) has been running since ${run.started_at.toISOString()}; needs manual reconciliation`,
      );
    }
  } catch (error) {
    await store.close();
    if (error instanceof StoreError) {
      return failed(error);
    }
    throw error;
  }
  return { ok: true, store };
};

export const runIngestion = async (
  deps: IngestionDeps,
  options: IngestionOptions = {},
): Promise<IngestionOutcome> => {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const summary = emptySummary(startedAt);
  const finish = (exitCode: ExitCode, collection: ManagerResult | null): IngestionOutcome => {
    summary.completed_at = now().toISOString();
    return { exitCode, summary, collection };
  };

  let collectors: RecordCollector[];
  try {
    collectors = deps.registry.collectors(options.sourceId);
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    console.error(`[ingest] ${error.message}`);
    summary.errors.push(error.message);
    if (options.sourceId) {
      summary.failed_sources.push(options.sourceId);
    }
    return finish(1, null);
  }

  const configIssues = deps.registry.configErrors(options.sourceId);
  summary.total_sources = collectors.length + configIssues.length;
  for (const issue of configIssues) {
    summary.failed_sources.push(issue.sourceId ?? `#${issue.index}`);
    summary.errors.push(issue.error.message);
  }

  let runId: number;
  try {
    runId = await deps.store.startIngestionRun(options.sourceId ?? "all");
  } catch (error) {
    console.error("[ingest] unable to open ingestion run:", describeError(error));
    summary.errors.push(describeError(error));
    return finish(1, null);
  }
  summary.run_id = runId;
  console.log(`[ingest] run ${runId} started for ${options.sourceId ?? "all sources"} (${collectors.length} collectors)`);

  let collection: ManagerResult | null = null;
  let fatal: IngestError | null = null;
  try {
    collection = await collectAll(collectors, { timeoutMs: options.timeoutMs, signal: options.signal });
    summary.total_records_collected = collection.records.length;
    summary.successful_sources = collectors.length - collection.failedSources.length;
    summary.failed_sources.push(...collection.failedSources);
    summary.errors.push(...collection.errors);

    const enriched = enrichRecords(collection.records, deps);
    for (const record of enriched) {
      const result = await deps.store.insert(record, runId);
      if (result.status === "inserted") {
        summary.records_inserted += 1;
      } else if (result.status === "updated") {
        summary.records_updated += 1;
      } else {
        summary.records_duplicate += 1;
      }
    }
  } catch (error) {
    fatal =
      error instanceof IngestError
        ? error
        : new IngestError("INGEST_FAILED", `Ingestion aborted: ${describeError(error)}`, { cause: error });
    console.error(`[ingest] run ${runId} aborted:`, fatal.message);
    summary.errors.push(fatal.message);
  }

  const errorMetadata = fatal
    ? { code: fatal.code, message: fatal.message, failed_sources: summary.failed_sources }
    : summary.failed_sources.length
      ? { failed_sources: summary.failed_sources, errors: summary.errors }
      : null;

  try {
    await deps.store.completeIngestionRun(runId, fatal ? "failed" : "completed", errorMetadata);
  } catch (error) {
    console.error(`[ingest] unable to close run ${runId}:`, describeError(error));
    summary.errors.push(describeError(error));
    return finish(1, collection);
  }

  console.log(
    `[ingest] run ${runId} ${fatal ? "failed" : "completed"}: ${summary.records_inserted} inserted, ${summary.records_updated} updated, ${summary.records_duplicate} duplicate`,
  );

  if (fatal) {
    return finish(1, collection);
  }
  return finish(summary.failed_sources.length ? 2 : 0, collection);
};
