import { appendFileSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { IngestionStats } from "../repo/types";
import type { CollectorStats, ManagerResult, RunSummary } from "./types";

export type SourceReport = {
  sourceId: string;
  status: CollectorStats["status"];
  pagesFetched: number;
  recordsYielded: number;
  httpRequests: number;
  retryAttempts: number;
  usedFallback: boolean;
  cancelled: boolean;
  durationMs: number;
  errors: string[];
};

export type IngestReport = {
  generatedAt: string;
  dryRun: boolean;
  exitCode: number;
  summary: RunSummary;
  sources: SourceReport[];
  stats: IngestionStats | null;
};

export const buildIngestReport = (input: {
  summary: RunSummary;
  exitCode: number;
  collection: ManagerResult | null;
  dryRun: boolean;
  stats?: IngestionStats | null;
  now?: Date;
}): IngestReport => ({
  generatedAt: (input.now ?? new Date()).toISOString(),
  dryRun: input.dryRun,
  exitCode: input.exitCode,
  summary: input.summary,
  sources: Object.values(input.collection?.perSource ?? {})
    .map((stats) => ({
      sourceId: stats.sourceId,
      status: stats.status,
      pagesFetched: stats.pagesFetched,
      recordsYielded: stats.recordsYielded,
      httpRequests: stats.httpRequests,
      retryAttempts: stats.retryAttempts,
      usedFallback: stats.usedFallback,
      cancelled: stats.cancelled,
      durationMs: stats.completedAt.getTime() - stats.startedAt.getTime(),
      errors: stats.errors.map((error) => (error.page === null ? error.message : `page ${error.page}: ${error.message}`)),
    }))
    .sort((a, b) => a.sourceId.localeCompare(b.sourceId)),
  stats: input.stats ?? null,
});

export const writeIngestReport = (report: IngestReport, filePath: string) => {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
};

export const renderReportSummary = (report: IngestReport): string => {
  const { summary } = report;
  const lines: string[] = [];
  lines.push("## Ingestion Report");
  lines.push("");
  lines.push(`Run: **${summary.run_id ?? "n/a"}**${report.dryRun ? " (dry run)" : ""} | exit code **${report.exitCode}**`);
  lines.push(
    `Sources: **${summary.successful_sources}/${summary.total_sources}** succeeded | records collected **${summary.total_records_collected}**`,
  );
  lines.push(
    `Inserted **${summary.records_inserted}** | updated **${summary.records_updated}** | duplicate **${summary.records_duplicate}**`,
  );
  lines.push("");
  lines.push("**Failed sources**: " + (summary.failed_sources.join(", ") || "none"));
  if (report.sources.length) {
    lines.push("");
    lines.push("| Source | Status | Pages | Records | Fallback |");
    lines.push("| --- | --- | --- | --- | --- |");
    for (const source of report.sources) {
      lines.push(
        `| ${source.sourceId} | ${source.status} | ${source.pagesFetched} | ${source.recordsYielded} | ${source.usedFallback ? "yes" : "no"} |`,
      );
    }
  }
  if (summary.errors.length) {
    lines.push("");
    lines.push("### Errors");
    for (const error of summary.errors) {
      lines.push(`- ${error}`);
    }
  }
  return `${lines.join("\n")}\n`;
};

export const writeReportSummary = (report: IngestReport, summaryPath = process.env.GITHUB_STEP_SUMMARY) => {
  if (!summaryPath) {
    return;
  }
  appendFileSync(summaryPath, renderReportSummary(report), "utf-8");
};
