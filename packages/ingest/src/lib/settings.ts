import { fileURLToPath } from "url";

const configPath = (name: string) =>
  fileURLToPath(new URL(`../../config/${name}`, import.meta.url));

const coercePositiveInt = (value: string | undefined) => {
  if (!value) {
    return null;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return Math.floor(parsed);
};

export const DEFAULT_USER_AGENT = "IvdSignalBot/1.0 (+regulatory-monitoring)";

export const getDatabasePath = (): string =>
  process.env.INGEST_DB_PATH ?? "data/ivd-signal.db";

export const getSourcesPath = (): string =>
  process.env.INGEST_SOURCES_PATH ?? configPath("sources.json");

export const getCompaniesPath = (): string =>
  process.env.INGEST_COMPANIES_PATH ?? configPath("companies.json");

export const getRunTimeoutMs = (): number | null =>
  coercePositiveInt(process.env.INGEST_TIMEOUT_MS);

export const getReportPath = (): string =>
  process.env.INGEST_REPORT_PATH ?? "artifacts/ingest-report.json";

export const isDryRun = (): boolean => process.env.INGEST_DRY_RUN === "1";

export const getStaleRunMinutes = (): number =>
  coercePositiveInt(process.env.INGEST_STALE_RUN_MINUTES) ?? 120;

export const getUserAgent = (): string =>
  process.env.INGEST_USER_AGENT?.trim() || DEFAULT_USER_AGENT;

export const getSourceFilter = (argv: string[] = process.argv.slice(2)): string | null => {
  for (const arg of argv) {
    if (arg.startsWith("--source=")) {
      const value = arg.slice("--source=".length).trim();
      return value || null;
    }
  }
  return process.env.INGEST_SOURCE?.trim() || null;
};
