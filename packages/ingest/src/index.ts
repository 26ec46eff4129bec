import { existsSync, readFileSync } from "fs";
import { dirname, resolve } from "path";
import { CategoryClassifier } from "./lib/classifier";
import { CompanyMatcher, loadCompanyDataset } from "./lib/company-matcher";
import { ConfigError } from "./lib/errors";
import { openRunStore, runIngestion } from "./lib/ingest";
import { buildRegistry, type Registry } from "./lib/registry";
import { buildIngestReport, writeIngestReport, writeReportSummary } from "./lib/report";
import {
  getCompaniesPath,
  getDatabasePath,
  getReportPath,
  getRunTimeoutMs,
  getSourceFilter,
  getSourcesPath,
  getStaleRunMinutes,
  getUserAgent,
  isDryRun,
} from "./lib/settings";
import { loadSourcesConfig } from "./lib/sources-config";
import { MemoryRepository } from "./repo/memory";
import { SqliteRepository } from "./repo/sqlite";
import type { RecordStore } from "./repo/types";

const loadDotEnv = () => {
  let currentDir = process.cwd();
  for (let i = 0; i < 6; i += 1) {
    const envPath = resolve(currentDir, ".env");
    if (existsSync(envPath)) {
      const contents = readFileSync(envPath, "utf-8");
      for (const line of contents.split("\n")) {
        const trimmed = line.trim();
        if (!trimmed || trimmed.startsWith("#")) {
          continue;
        }
        const eqIdx = trimmed.indexOf("=");
        if (eqIdx === -1) {
          continue;
        }
        const key = trimmed.slice(0, eqIdx).trim();
        const rawValue = trimmed.slice(eqIdx + 1).trim();
        const value = rawValue.replace(/^['"]|['"]$/g, "");
        if (!process.env[key]) {
          process.env[key] = value;
        }
      }
      return envPath;
    }
    const parent = dirname(currentDir);
    if (parent === currentDir) {
      break;
    }
    currentDir = parent;
  }
  return null;
};

const main = async () => {
  loadDotEnv();
  const dryRun = isDryRun();
  const sourceId = getSourceFilter();

  let registry: Registry;
  let matcher: CompanyMatcher;
  let classifier: CategoryClassifier;
  try {
    const companies = loadCompanyDataset(getCompaniesPath());
    registry = buildRegistry(loadSourcesConfig(getSourcesPath()), { userAgent: getUserAgent() });
    matcher = new CompanyMatcher(companies);
    classifier = new CategoryClassifier(registry.classificationRules());
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[ingest] configuration error: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const opened = await openRunStore(
    (): RecordStore => (dryRun ? new MemoryRepository() : new SqliteRepository(getDatabasePath())),
    getStaleRunMinutes() * 60_000,
  );
  if (!opened.ok) {
    console.log(JSON.stringify(opened.summary, null, 2));
    process.exitCode = 1;
    return;
  }
  const { store } = opened;
  try {
    const outcome = await runIngestion(
      { registry, store, matcher, classifier },
      { sourceId, timeoutMs: getRunTimeoutMs() },
    );
    const report = buildIngestReport({
      summary: outcome.summary,
      exitCode: outcome.exitCode,
      collection: outcome.collection,
      dryRun,
      stats: await store.getIngestionStats(),
    });
    const reportPath = getReportPath();
    writeIngestReport(report, reportPath);
    writeReportSummary(report);
    console.log(`[ingest] report written to ${reportPath}`);
    console.log(JSON.stringify(outcome.summary, null, 2));
    process.exitCode = outcome.exitCode;
  } finally {
    await store.close();
  }
};

main().catch((error) => {
  console.error("Ingestion failed:", error);
  process.exitCode = 1;
});
