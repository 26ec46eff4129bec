import { describeError } from "./errors";
import type { CollectorResult, CollectorStats, ManagerResult, RawRecord } from "./types";

export interface RecordCollector {
  readonly sourceId: string;
  collect(signal?: AbortSignal): Promise<CollectorResult>;
}

export type CollectAllOptions = {
  timeoutMs?: number | null;
  signal?: AbortSignal;
};

const byPublishDateDesc = (a: RawRecord, b: RawRecord) => {
  if (!a.publishDate && !b.publishDate) {
    return 0;
  }
  if (!a.publishDate) {
    return 1;
  }
  if (!b.publishDate) {
    return -1;
  }
  return b.publishDate.getTime() - a.publishDate.getTime();
};

const crashedStats = (sourceId: string, error: unknown, startedAt: Date): CollectorStats => ({
  sourceId,
  status: "failed",
  pagesFetched: 0,
  recordsYielded: 0,
  errors: [{ kind: "unexpected", message: describeError(error), page: null, adapter: "primary" }],
  httpRequests: 0,
  retryAttempts: 0,
  usedFallback: false,
  cancelled: false,
  startedAt,
  completedAt: new Date(),
});

export const collectAll = async (
  collectors: RecordCollector[],
  options: CollectAllOptions = {},
): Promise<ManagerResult> => {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener("abort", onAbort, { once: true });
  }
  const timeout = options.timeoutMs
    ? setTimeout(() => {
        console.warn(`[manager] timeout after ${options.timeoutMs}ms; cancelling outstanding collectors`);
        controller.abort();
      }, options.timeoutMs)
    : null;

  const startedAt = new Date();
  let settled: PromiseSettledResult<CollectorResult>[];
  try {
    // One slot per collector; results are merged only after every task settles.
    settled = await Promise.allSettled(
      collectors.map((collector) => Promise.resolve().then(() => collector.collect(controller.signal))),
    );
  } finally {
    if (timeout) {
      clearTimeout(timeout);
    }
    options.signal?.removeEventListener("abort", onAbort);
  }

  const records: RawRecord[] = [];
  const perSource: Record<string, CollectorStats> = {};
  const failedSources: string[] = [];
  const errors: string[] = [];

  settled.forEach((outcome, index) => {
    const sourceId = collectors[index].sourceId;
    if (outcome.status === "rejected") {
      console.error(`[manager] collector ${sourceId} crashed:`, outcome.reason);
      perSource[sourceId] = crashedStats(sourceId, outcome.reason, startedAt);
      failedSources.push(sourceId);
      errors.push(`${sourceId}: ${describeError(outcome.reason)}`);
      return;
    }
    const result = outcome.value;
    perSource[sourceId] = result.stats;
    records.push(...result.records);
    if (result.status !== "succeeded") {
      failedSources.push(sourceId);
    }
    for (const error of result.stats.errors) {
      errors.push(`${sourceId}: ${error.message}`);
    }
  });

  records.sort(byPublishDateDesc);
  return { records, perSource, failedSources, errors };
};
